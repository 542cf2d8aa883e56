import { BaseError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("defaults flags and context", () => {
      const err = new BaseError("backend unreachable", { code: "backend_unavailable" })

      expect(err.message).toBe("backend unreachable")
      expect(err.code).toBe("backend_unavailable")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("uses the subclass name", () => {
      class DecodeFailure extends BaseError<"decode_failed"> {
        constructor() {
          super("bad payload", { code: "decode_failed" })
        }
      }

      const err = new DecodeFailure()

      expect(err.name).toBe("DecodeFailure")
      expect(err).toBeInstanceOf(Error)
    })

    it("keeps cause and flags", () => {
      const cause = new Error("ECONNRESET")
      const err = new BaseError("lookup failed", {
        code: "backend_unavailable",
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the context", () => {
      const context = { key: "app:items:getItem:[1]" }
      const err = new BaseError("x", { code: "key_build_failed", context })

      context.key = "changed"

      expect(err.context).toEqual({ key: "app:items:getItem:[1]" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })
  })

  describe("serializeError", () => {
    it("serializes a BaseError with a nested cause", () => {
      const err = new BaseError("store failed", {
        code: "backend_timeout",
        context: { backend: "redis" },
        cause: new Error("socket closed"),
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "backend_timeout",
        message: "store failed",
        context: { backend: "redis" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
        cause: {
          name: "Error",
          code: "unknown",
          message: "socket closed",
          context: {},
          isOperational: false,
          timestamp: "2024-01-15T10:30:00.000Z",
        },
      })
    })

    it("includes the stack only when asked", () => {
      const err = new BaseError("x", { code: "decode_failed" })

      expect(serializeError(err).stack).toBeUndefined()
      expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
    })

    it("keeps the fields of structural AppErrors from other copies", () => {
      const foreign = Object.assign(new Error("evicted"), {
        code: "entry_evicted",
        context: { key: "k" },
        isRetryable: true,
        isOperational: true,
        timestamp: new Date("2024-01-01T00:00:00.000Z"),
      })

      expect(serializeError(foreign)).toEqual({
        name: "Error",
        code: "entry_evicted",
        message: "evicted",
        context: { key: "k" },
        isOperational: true,
        timestamp: "2024-01-01T00:00:00.000Z",
      })
    })

    it("wraps non-error values", () => {
      expect(serializeError(42)).toEqual({
        name: "NonErrorThrown",
        code: "unknown",
        message: "Unknown error",
        context: { value: 42 },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is what toJSON returns", () => {
      const err = new BaseError("x", { code: "decode_failed" })

      expect(JSON.parse(JSON.stringify(err))).toEqual(serializeError(err))
    })
  })
})
