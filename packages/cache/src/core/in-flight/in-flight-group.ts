export type FlightResult<T> = {
  value: T
  /** `true` for the caller that ran the work. */
  isLeader: boolean
}

/**
 * Shares one execution between concurrent callers of the same key.
 * Followers get the leader's outcome, rejection included. The key is free
 * again as soon as the flight settles.
 */
export class InFlightGroup<T> {
  private readonly flights = new Map<string, Promise<T>>()

  async run(key: string, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const existing = this.flights.get(key)

    if (existing) {
      return { value: await existing, isLeader: false }
    }

    const flight = fn().finally(() => {
      this.flights.delete(key)
    })

    this.flights.set(key, flight)

    return { value: await flight, isLeader: true }
  }

  get size(): number {
    return this.flights.size
  }
}
