import { BinaryCoder } from "../binary-coder"
import { JsonCoder } from "../json-coder"
import { describeCoderContract } from "./coder.contract"

describeCoderContract(() => new JsonCoder())
describeCoderContract(() => new BinaryCoder())
