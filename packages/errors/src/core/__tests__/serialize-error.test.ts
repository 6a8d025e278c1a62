import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError", () => {
    it("serializes every field", () => {
      const err = new BaseError("write failed", {
        code: "write_failed",
        context: { key: "users:1" },
        isRetryable: true,
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "write_failed",
        message: "write failed",
        context: { key: "users:1" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits cause and stack by default", () => {
      const serialized = serializeError(new BaseError("x", { code: "x" }))

      expect("cause" in serialized).toBe(false)
      expect("stack" in serialized).toBe(false)
    })

    it("includes the stack on request", () => {
      const serialized = serializeError(new BaseError("x", { code: "x" }), {
        includeStack: true,
      })

      expect(serialized.stack).toContain("BaseError")
    })

    it("omits an empty stack even on request", () => {
      const err = new BaseError("x", { code: "x" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain", () => {
      const root = new Error("socket closed")
      const middle = new BaseError("get failed", { code: "get_failed", cause: root })
      const outer = new BaseError("lookup failed", { code: "lookup_failed", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("get_failed")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("socket closed")
    })
  })

  describe("plain Error", () => {
    it("uses the unknown code and marks it non-operational", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized).toEqual({
        name: "TypeError",
        code: "unknown",
        message: "not a function",
        context: {},
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("serializes a native cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("boom")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("boom")
    })

    it("keeps other values in the context", () => {
      const serialized = serializeError({ reply: "ERR" })

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: { reply: "ERR" } })
      expect(serialized.isOperational).toBe(false)
    })

    it("handles null", () => {
      expect(serializeError(null).context).toEqual({ value: null })
    })
  })
})
