import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns an AppError unchanged", () => {
    const err = new BaseError("miss", { code: "miss", context: { key: "k" } })

    expect(toAppError(err)).toBe(err)
  })

  describe("Error input", () => {
    it("wraps it as a non-operational BaseError", () => {
      const cause = new Error("socket hang up")

      const result = toAppError(cause)

      expect(result).toBeInstanceOf(BaseError)
      expect(result.message).toBe("socket hang up")
      expect(result.cause).toBe(cause)
      expect(result.code).toBe("unknown")
      expect(result.isOperational).toBe(false)
    })

    it("uses the given fallback code", () => {
      expect(toAppError(new Error("x"), "redis_failed").code).toBe("redis_failed")
    })
  })

  describe("other input", () => {
    it("uses a string as the message with an empty context", () => {
      const result = toAppError("oops")

      expect(result.message).toBe("oops")
      expect(result.context).toEqual({})
    })

    it("keeps other values in the context", () => {
      const result = toAppError({ reply: "ERR" })

      expect(result.message).toBe("Unknown error")
      expect(result.context).toEqual({ value: { reply: "ERR" } })
      expect(result.isOperational).toBe(false)
    })
  })
})
