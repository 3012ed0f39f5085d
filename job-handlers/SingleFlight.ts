/**
 * Registry of pending work per key.
 * While a flight for a key is running, further callers attach to the same promise
 * instead of starting the work again. The entry is removed as soon as the flight
 * settles, whether it resolved or rejected.
 */
export type FlightState<T> =
  { status: 'idle' } |
  { status: 'in_flight', promise: Promise<T> };

export default class SingleFlight<T> {
  private flights = new Map<string, Promise<T>>();

  public run(key: string, work: () => Promise<T>): Promise<T> {
    const existing = this.flights.get(key);
    if (existing) return existing;

    // deferred by a tick so the entry is registered before the work can settle
    const flight: Promise<T> = Promise.resolve()
      .then(work)
      .finally(() => {
        if (this.flights.get(key) === flight) this.flights.delete(key);
      });
    this.flights.set(key, flight);
    return flight;
  }

  public state(key: string): FlightState<T> {
    const promise = this.flights.get(key);
    return promise ? { status: 'in_flight', promise } : { status: 'idle' };
  }

  public get size() {
    return this.flights.size;
  }
}
