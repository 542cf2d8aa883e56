import { InFlightGroup } from "../in-flight-group"

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  let reject: (err: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })

  return { promise, resolve, reject }
}

describe("InFlightGroup", () => {
  it("shares one execution between concurrent callers", async () => {
    const group = new InFlightGroup<number>()
    const gate = deferred<number>()
    const work = vi.fn(() => gate.promise)

    const first = group.run("k", work)
    const second = group.run("k", work)
    expect(group.size).toBe(1)

    gate.resolve(5)

    expect(await first).toStrictEqual({ value: 5, isLeader: true })
    expect(await second).toStrictEqual({ value: 5, isLeader: false })
    expect(work).toHaveBeenCalledTimes(1)
    expect(group.size).toBe(0)
  })

  it("keeps different keys apart", async () => {
    const group = new InFlightGroup<string>()

    const [a, b] = await Promise.all([
      group.run("a", async () => "A"),
      group.run("b", async () => "B"),
    ])

    expect(a.value).toBe("A")
    expect(b.value).toBe("B")
  })

  it("hands the leader's rejection to followers and frees the key", async () => {
    const group = new InFlightGroup<number>()
    const gate = deferred<number>()

    const first = group.run("k", () => gate.promise)
    const second = group.run("k", () => gate.promise)
    gate.reject(new Error("boom"))

    const [leader, follower] = await Promise.allSettled([first, second])

    expect(leader).toMatchObject({ status: "rejected", reason: new Error("boom") })
    expect(follower).toMatchObject({ status: "rejected", reason: new Error("boom") })
    expect(group.size).toBe(0)

    await expect(group.run("k", async () => 1)).resolves.toStrictEqual({
      value: 1,
      isLeader: true,
    })
  })
})
