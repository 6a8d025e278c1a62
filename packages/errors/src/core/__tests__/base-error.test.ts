import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("keeps message and code", () => {
      const err = new BaseError("backend unavailable", { code: "backend_unavailable" })

      expect(err.message).toBe("backend unavailable")
      expect(err.code).toBe("backend_unavailable")
    })

    it("uses the concrete class name", () => {
      class StoreClosedError extends BaseError<"store_closed"> {
        constructor() {
          super("store is closed", { code: "store_closed" })
        }
      }

      expect(new BaseError("x", { code: "x" }).name).toBe("BaseError")
      expect(new StoreClosedError().name).toBe("StoreClosedError")
    })

    it("applies defaults", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("freezes a copy of the context", () => {
      const context = { key: "users:1" }
      const err = new BaseError("x", { code: "x", context })

      expect(err.context).toEqual({ key: "users:1" })
      expect(err.context).not.toBe(context)
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("ECONNRESET")
      const err = new BaseError("wrapped", { code: "x", cause })

      expect(err.cause).toBe(cause)
    })

    it("leaves cause unset when none is given", () => {
      const err = new BaseError("x", { code: "x" })

      expect("cause" in err).toBe(false)
    })

    it("accepts retryable and operational flags", () => {
      const err = new BaseError("x", { code: "x", isRetryable: true, isOperational: false })

      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("has a stack trace", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("inheritance", () => {
    it("is an Error and a BaseError", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(BaseError)
    })

    it("narrows the code type for subclasses", () => {
      type StoreCode = "store_closed" | "store_busy"
      const err = new BaseError<StoreCode>("busy", { code: "store_busy" })

      const code: StoreCode = err.code

      expect(code).toBe("store_busy")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized form", () => {
      const err = new BaseError("no such key", {
        code: "not_found",
        context: { key: "users:1" },
      })

      expect(JSON.parse(JSON.stringify(err))).toEqual({
        name: "BaseError",
        code: "not_found",
        message: "no such key",
        context: { key: "users:1" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
