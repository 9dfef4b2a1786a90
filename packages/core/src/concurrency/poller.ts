import type { Listener, ReadonlyObservable, Unsubscribe } from "./observable";

/**
 * Observable backed by periodic sampling.
 *
 * The interval only runs while at least one subscriber is attached, and
 * subscribers are only notified when a sample differs from the previous one.
 */
export function createPolledObservable<T>(
  sample: () => T,
  intervalMs: number,
  equals: (a: T, b: T) => boolean = Object.is
): ReadonlyObservable<T> {
  const listeners = new Set<Listener<T>>();
  let timer: ReturnType<typeof setInterval> | null = null;
  let last: T = sample();

  const tick = () => {
    const next = sample();
    if (equals(last, next)) {
      return;
    }
    last = next;
    for (const listener of [...listeners]) {
      listener(next);
    }
  };

  return {
    get value() {
      return sample();
    },
    subscribe(listener: Listener<T>): Unsubscribe {
      listeners.add(listener);
      if (timer === null) {
        last = sample();
        timer = setInterval(tick, intervalMs);
      }
      listener(last);
      return () => {
        listeners.delete(listener);
        if (listeners.size === 0 && timer !== null) {
          clearInterval(timer);
          timer = null;
        }
      };
    },
  };
}
