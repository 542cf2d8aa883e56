import { maxAge, parseCacheControl } from "../cache-control"

describe("parseCacheControl", () => {
  it("returns an empty set for a missing header", () => {
    expect(parseCacheControl(undefined).size).toBe(0)
    expect(parseCacheControl(null).size).toBe(0)
    expect(parseCacheControl("").size).toBe(0)
  })

  it("lowercases, trims and drops parameters", () => {
    expect([...parseCacheControl(" No-Cache , max-age=0,NO-STORE")]).toStrictEqual([
      "no-cache",
      "max-age",
      "no-store",
    ])
  })

  it("skips empty members", () => {
    expect([...parseCacheControl("no-cache,,")]).toStrictEqual(["no-cache"])
  })
})

describe("maxAge", () => {
  it("rounds up and never goes negative", () => {
    expect(maxAge(60)).toBe("max-age=60")
    expect(maxAge(0.2)).toBe("max-age=1")
    expect(maxAge(-3)).toBe("max-age=0")
  })
})
