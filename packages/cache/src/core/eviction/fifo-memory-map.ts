import type { EvictionMap } from "./eviction-map"

export class FifoMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly map = new Map<K, V>()

  get(key: K): V | undefined {
    return this.map.get(key)
  }

  // Map keeps the original insertion slot on overwrite.
  set(key: K, value: V): void {
    this.map.set(key, value)
  }

  delete(key: K): boolean {
    return this.map.delete(key)
  }

  peek(key: K): V | undefined {
    return this.map.get(key)
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  size(): number {
    return this.map.size
  }

  victim(): K | undefined {
    const first = this.map.keys().next()

    return first.done ? undefined : first.value
  }

  keys(): K[] {
    return [...this.map.keys()]
  }
}
