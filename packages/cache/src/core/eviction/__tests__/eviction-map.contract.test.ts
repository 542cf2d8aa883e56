import { FifoMemoryMap } from "../fifo-memory-map"
import { LruMemoryMap } from "../lru-memory-map"
import { describeEvictionMapContract } from "./eviction-map.contract"

describeEvictionMapContract("LruMemoryMap", () => new LruMemoryMap())
describeEvictionMapContract("FifoMemoryMap", () => new FifoMemoryMap())
