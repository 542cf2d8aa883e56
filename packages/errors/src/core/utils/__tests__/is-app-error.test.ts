import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  it("accepts BaseError and its subclasses", () => {
    class KeyFailure extends BaseError<"key_build_failed"> {
      constructor() {
        super("unencodable", { code: "key_build_failed" })
      }
    }

    expect(isAppError(new BaseError("x", { code: "decode_failed" }))).toBe(true)
    expect(isAppError(new KeyFailure())).toBe(true)
  })

  it("accepts structurally matching objects", () => {
    const duck = {
      name: "RemoteError",
      message: "from another realm",
      code: "backend_unavailable",
      context: {},
      isRetryable: true,
      isOperational: true,
      timestamp: new Date(0),
    }

    expect(isAppError(duck)).toBe(true)
  })

  it.each([
    ["plain Error", new Error("x")],
    ["null", null],
    ["string", "decode_failed"],
    [
      "invalid timestamp",
      {
        name: "E",
        message: "m",
        code: "c",
        context: {},
        isRetryable: false,
        isOperational: true,
        timestamp: new Date(Number.NaN),
      },
    ],
  ])("rejects %s", (_label, value) => {
    expect(isAppError(value)).toBe(false)
  })
})
