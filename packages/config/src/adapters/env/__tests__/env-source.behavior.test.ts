import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("maps every variable when no prefix is given", async () => {
    const source = new EnvSource({ env: { PORT: "3000", DB__HOST: "localhost" } })

    expect(await source.entries()).toEqual([
      { path: ["port"], value: 3000 },
      { path: ["db", "host"], value: "localhost" },
    ])
  })

  it("filters on and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "APP",
      env: {
        APP__SERVER__PORT: "9090",
        APP__DEBUG: "TRUE",
        APPLICATION: "ignored",
        APP_SINGLE: "ignored",
        PATH: "/usr/bin",
      },
    })

    expect(await source.entries()).toEqual([
      { path: ["server", "port"], value: 9090 },
      { path: ["debug"], value: true },
    ])
  })

  it("supports a custom separator", async () => {
    const source = new EnvSource({
      prefix: "APP",
      separator: "_",
      env: { APP_DB_NAME: "main" },
    })

    expect(await source.entries()).toEqual([{ path: ["db", "name"], value: "main" }])
  })

  it("skips undefined values and an empty remainder", async () => {
    const source = new EnvSource({
      prefix: "APP",
      env: { APP__: "nothing", APP__UNSET: undefined, APP__SET: "x" },
    })

    expect(await source.entries()).toEqual([{ path: ["set"], value: "x" }])
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("GW_TEST__FEATURE__ENABLED", "true")

    const source = new EnvSource({ prefix: "GW_TEST" })

    expect(await source.entries()).toEqual([{ path: ["feature", "enabled"], value: true }])

    vi.unstubAllEnvs()
  })
})
