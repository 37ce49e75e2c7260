import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("bad reference", {
        code: "invalid_reference_path",
        context: { reference: "a..b" },
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "invalid_reference_path",
        message: "bad reference",
        context: { reference: "a..b" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits stack unless requested", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits stack when it is empty", () => {
      const err = new BaseError("test", { code: "test" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain", () => {
      const root = new Error("ENOENT")
      const middle = new BaseError("read failed", { code: "read_failed", cause: root })
      const outer = new BaseError("source failed", { code: "source_failed", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("read_failed")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("ENOENT")
    })

    it("omits cause when there is none", () => {
      const err = new BaseError("no cause", { code: "test" })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("uses code unknown and marks them non-operational", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized.code).toBe("unknown")
      expect(serialized.name).toBe("TypeError")
      expect(serialized.isOperational).toBe(false)
    })

    it("follows Error.cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("something went wrong")
    })

    it("wraps other values in context.value", () => {
      const thrown = { status: 42 }

      const serialized = serializeError(thrown)

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: thrown })
      expect(serialized.isOperational).toBe(false)
    })

    it("handles null and undefined", () => {
      expect(serializeError(null).context).toEqual({ value: null })
      expect(serializeError(undefined).context).toEqual({ value: undefined })
    })
  })
})
