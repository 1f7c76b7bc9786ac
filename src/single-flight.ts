import { abortError } from "./errors";

interface Flight<V> {
  readonly promise: Promise<V>;
  readonly controller: AbortController;
  waiters: number;
  done: boolean;
}

/**
 * Coalesces concurrent calls for the same key into one underlying operation.
 *
 * Each caller may pass its own AbortSignal. A caller that aborts stops waiting
 * immediately; the shared operation is aborted only once every caller has
 * left. Callers still waiting always receive the operation's result or its
 * failure.
 */
export class SingleFlight<K, V> {
  private readonly inflight = new Map<K, Flight<V>>();

  /** Number of operations currently running. */
  public get size(): number {
    return this.inflight.size;
  }

  /**
   * Run `fn` for `key`, or join the run already in progress.
   * `fn` receives a signal that fires when all callers have gone away.
   */
  public run(key: K, fn: (signal: AbortSignal) => Promise<V>, signal?: AbortSignal): Promise<V> {
    if (signal?.aborted) return Promise.reject(abortError(signal));
    let flight = this.inflight.get(key);
    if (!flight) flight = this.start(key, fn);
    return this.attach(key, flight, signal);
  }

  private start(key: K, fn: (signal: AbortSignal) => Promise<V>): Flight<V> {
    const controller = new AbortController();
    // Wrap so a synchronous throw inside fn becomes a rejection.
    const promise = (async () => fn(controller.signal))();
    const flight: Flight<V> = { promise, controller, waiters: 0, done: false };
    this.inflight.set(key, flight);
    const settle = () => {
      flight.done = true;
      if (this.inflight.get(key) === flight) this.inflight.delete(key);
    };
    promise.then(settle, settle);
    return flight;
  }

  private attach(key: K, flight: Flight<V>, signal?: AbortSignal): Promise<V> {
    flight.waiters++;
    return new Promise<V>((resolve, reject) => {
      let left = false;
      const leave = () => {
        if (left) return false;
        left = true;
        flight.waiters--;
        signal?.removeEventListener("abort", onAbort);
        return true;
      };
      const onAbort = () => {
        if (!leave()) return;
        if (flight.waiters === 0 && !flight.done) {
          // Last one out: cancel the work and let the next caller start fresh.
          if (this.inflight.get(key) === flight) this.inflight.delete(key);
          flight.controller.abort(abortError(signal));
        }
        reject(abortError(signal));
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      flight.promise.then(
        (value) => {
          if (leave()) resolve(value);
        },
        (err: unknown) => {
          if (leave()) reject(err);
        },
      );
    });
  }
}
