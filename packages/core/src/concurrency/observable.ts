/**
 * Observable Value
 *
 * Single-writer broadcast of the latest value. Subscribers receive the
 * current value on subscribe and every distinct value after that.
 */

export type Listener<T> = (value: T) => void;
export type Unsubscribe = () => void;

export interface ReadonlyObservable<T> {
  readonly value: T;
  subscribe(listener: Listener<T>): Unsubscribe;
}

export class ObservableValue<T> implements ReadonlyObservable<T> {
  private current: T;
  private version = 0;
  private readonly listeners = new Set<Listener<T>>();
  private readonly equals: (a: T, b: T) => boolean;

  constructor(initial: T, equals: (a: T, b: T) => boolean = Object.is) {
    this.current = initial;
    this.equals = equals;
  }

  get value(): T {
    return this.current;
  }

  /**
   * A listener may call set() while a value is being delivered; the newer
   * value then reaches every listener and delivery of the older one stops.
   */
  set(next: T): void {
    if (this.equals(this.current, next)) {
      return;
    }
    this.current = next;
    const version = ++this.version;
    for (const listener of [...this.listeners]) {
      if (version !== this.version) {
        return;
      }
      listener(next);
    }
  }

  update(updater: (current: T) => T): void {
    this.set(updater(this.current));
  }

  subscribe(listener: Listener<T>): Unsubscribe {
    this.listeners.add(listener);
    listener(this.current);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  /** View without the write side */
  asReadonly(): ReadonlyObservable<T> {
    const source = this;
    return {
      get value() {
        return source.value;
      },
      subscribe: (listener) => source.subscribe(listener),
    };
  }
}
