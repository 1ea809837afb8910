/**
 * Per-key in-flight deduplication.
 * While a computation for a key is pending, later callers join it instead of
 * starting their own; the slot is released once it settles either way.
 */
export class SingleFlight<T> {
  private flights = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const pending = this.flights.get(key);
    if (pending) return pending;

    // fn starts on the next microtask, after the slot is registered
    const flight: Promise<T> = Promise.resolve()
      .then(fn)
      .finally(() => {
        if (this.flights.get(key) === flight) {
          this.flights.delete(key);
        }
      });

    this.flights.set(key, flight);
    return flight;
  }

  isInFlight(key: string): boolean {
    return this.flights.has(key);
  }

  keys(): string[] {
    return [...this.flights.keys()];
  }

  get size(): number {
    return this.flights.size;
  }
}
