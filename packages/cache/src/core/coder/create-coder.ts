import type { Coder } from "../../ports/coder"
import { BinaryCoder } from "./binary-coder"
import { JsonCoder } from "./json-coder"

export type CoderName = "json" | "binary"

export function createCoder(name: CoderName): Coder {
  return name === "binary" ? new BinaryCoder() : new JsonCoder()
}
