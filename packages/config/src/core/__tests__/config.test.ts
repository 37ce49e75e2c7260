import { Config } from "../config"

describe("Config", () => {
  const data = {
    server: { host: "localhost", port: 3000 },
    debug: false,
    createdAt: new Date("2024-01-15T10:30:00.000Z"),
  }
  const provenance = new Map([
    ["server.host", "dotenv:.env"],
    ["server.port", "env"],
    ["debug", "default"],
    ["createdAt", "env"],
  ])
  const mergedLeaves = ["server.host", "server.port", "server.stale", "createdAt", "legacy"]

  const config = new Config(data, provenance, mergedLeaves, ["toml:app.toml", "env", "dotenv:.env"])

  describe("get", () => {
    it("returns value by key with its type", () => {
      const port: number = config.get("server").port
      const debug: boolean = config.get("debug")

      expect(port).toBe(3000)
      expect(debug).toBe(false)
    })
  })

  describe("keys", () => {
    it("returns the top-level keys of the validated data", () => {
      expect(config.keys()).toEqual(["server", "debug", "createdAt"])
    })
  })

  describe("explain", () => {
    it("returns the source of a leaf", () => {
      expect(config.explain("server.port")).toBe("env")
      expect(config.explain("server.host")).toBe("dotenv:.env")
    })

    it("returns 'default' for unknown paths", () => {
      expect(config.explain("server")).toBe("default")
      expect(config.explain("nope")).toBe("default")
    })
  })

  describe("sourcesUsed", () => {
    it("lists contributing sources in application order, defaults last", () => {
      expect(config.sourcesUsed()).toEqual(["env", "dotenv:.env", "default"])
    })
  })

  describe("unknownKeys", () => {
    it("returns merged leaves the validated data dropped", () => {
      expect(config.unknownKeys()).toEqual(["server.stale", "legacy"])
    })

    it("treats leaves under a value the schema transformed as known", () => {
      const transformed = new Config({ endpoint: new URL("http://localhost/") }, new Map(), [
        "endpoint.host",
      ])

      expect(transformed.unknownKeys()).toEqual([])
    })

    it("returns an empty array when every key is known", () => {
      expect(new Config(data, provenance, ["debug"]).unknownKeys()).toEqual([])
    })
  })

  describe("immutability", () => {
    it("freezes the data deeply", () => {
      expect(Object.isFrozen(config.value)).toBe(true)
      expect(Object.isFrozen(config.value.server)).toBe(true)
      expect(() => {
        Object.assign(config.value.server, { port: 9999 })
      }).toThrow(TypeError)
    })
  })
})
