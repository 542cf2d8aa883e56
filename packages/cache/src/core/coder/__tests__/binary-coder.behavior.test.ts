import { serialize } from "node:v8"
import { BinaryCoder } from "../binary-coder"

describe("BinaryCoder", () => {
  const coder = new BinaryCoder()

  it("keeps cyclic structures", () => {
    type Node = { name: string; self?: Node }
    const node: Node = { name: "root" }
    node.self = node

    const decoded = coder.decode<Node>(coder.encode(node))

    expect(decoded.name).toBe("root")
    expect(decoded.self).toBe(decoded)
  })

  it("keeps RegExp, Error and sparse arrays", () => {
    const sparse = [1, , 3]
    const decoded = coder.decode<{ re: RegExp; err: Error; sparse: unknown[] }>(
      coder.encode({ re: /ab+c/gi, err: new Error("boom"), sparse }),
    )

    expect(decoded.re.source).toBe("ab+c")
    expect(decoded.re.flags).toBe("gi")
    expect(decoded.err).toBeInstanceOf(Error)
    expect(decoded.err.message).toBe("boom")
    expect(decoded.sparse.length).toBe(3)
    expect(1 in decoded.sparse).toBe(false)
  })

  it("rejects V8 payloads without the value tag", () => {
    expect(() => coder.decode(new Uint8Array(serialize({ ret: 1 })))).toThrow(
      "Payload is missing its value tag",
    )
  })

  it("rejects unknown tags", () => {
    expect(() => coder.decode(new Uint8Array(serialize([7, "x"])))).toThrow(
      "Payload has an unknown value tag",
    )
  })
})
