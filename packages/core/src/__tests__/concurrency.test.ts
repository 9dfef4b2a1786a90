/**
 * Concurrency Primitive Tests
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { delay, waitFor } from "../concurrency/delay";
import { Mutex } from "../concurrency/mutex";
import { ObservableValue } from "../concurrency/observable";
import { createPolledObservable } from "../concurrency/poller";
import { SerialExecutor } from "../concurrency/serialExecutor";

afterEach(() => {
  vi.useRealTimers();
});

describe("Mutex", () => {
  it("resumes waiters in acquisition order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    const release = await mutex.acquire();
    const second = mutex.runExclusive(async () => {
      order.push(2);
    });
    const third = mutex.runExclusive(async () => {
      order.push(3);
    });

    order.push(1);
    release();
    await Promise.all([second, third]);

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked()).toBe(false);
  });

  it("releases the lock when the task throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(mutex.isLocked()).toBe(false);
  });
});

describe("SerialExecutor", () => {
  it("runs one task at a time in submission order", async () => {
    const executor = new SerialExecutor();
    const events: string[] = [];

    const first = executor.run(async () => {
      events.push("a:start");
      await Promise.resolve();
      events.push("a:end");
      return 1;
    });
    const second = executor.run(() => {
      events.push("b");
      return 2;
    });

    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(["a:start", "a:end", "b"]);
  });

  it("keeps running after a task rejects", async () => {
    const executor = new SerialExecutor();

    const failing = executor.run(() => {
      throw new Error("nope");
    });
    const next = executor.run(() => "ok");

    await expect(failing).rejects.toThrow("nope");
    await expect(next).resolves.toBe("ok");
    expect(executor.size).toBe(0);
  });
});

describe("ObservableValue", () => {
  it("emits the current value on subscribe and distinct values after", () => {
    const observable = new ObservableValue(1);
    const seen: number[] = [];

    const unsubscribe = observable.subscribe((value) => seen.push(value));
    observable.set(1);
    observable.set(2);
    observable.update((value) => value + 1);
    unsubscribe();
    observable.set(5);

    expect(seen).toEqual([1, 2, 3]);
    expect(observable.value).toBe(5);
    expect(observable.subscriberCount).toBe(0);
  });

  it("delivers a value set from inside a listener to every later listener", () => {
    const observable = new ObservableValue("idle");
    const first: string[] = [];
    const second: string[] = [];
    observable.subscribe((value) => {
      first.push(value);
      if (value === "A") {
        observable.set("B");
      }
    });
    observable.subscribe((value) => second.push(value));

    observable.set("A");

    expect(observable.value).toBe("B");
    expect(first).toEqual(["idle", "A", "B"]);
    expect(second).toEqual(["idle", "B"]);
  });

  it("exposes a read-only view", () => {
    const observable = new ObservableValue("a");
    const view = observable.asReadonly();

    observable.set("b");

    expect(view.value).toBe("b");
    expect("set" in view).toBe(false);
  });
});

describe("createPolledObservable", () => {
  it("notifies only on sampled changes and stops polling when unsubscribed", () => {
    vi.useFakeTimers();
    let playing = false;
    const stream = createPolledObservable(() => playing, 100);
    const seen: boolean[] = [];

    const unsubscribe = stream.subscribe((value) => seen.push(value));
    playing = true;
    vi.advanceTimersByTime(100);
    vi.advanceTimersByTime(100);
    playing = false;
    vi.advanceTimersByTime(100);

    expect(seen).toEqual([false, true, false]);

    unsubscribe();
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe("delay", () => {
  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = delay(1000, controller.signal);

    controller.abort(new Error("cancelled"));

    await expect(pending).rejects.toThrow("cancelled");
  });
});

describe("waitFor", () => {
  it("resolves true once the predicate holds", async () => {
    vi.useFakeTimers();
    let ready = false;

    const result = waitFor(() => ready, { timeoutMs: 3000, intervalMs: 50 });
    await vi.advanceTimersByTimeAsync(120);
    ready = true;
    await vi.advanceTimersByTimeAsync(50);

    await expect(result).resolves.toBe(true);
  });

  it("resolves false after the timeout", async () => {
    vi.useFakeTimers();

    const result = waitFor(() => false, { timeoutMs: 200, intervalMs: 50 });
    await vi.advanceTimersByTimeAsync(250);

    await expect(result).resolves.toBe(false);
  });

  it("stops waiting when the signal aborts", async () => {
    const controller = new AbortController();

    const result = waitFor(() => false, {
      timeoutMs: 3000,
      intervalMs: 50,
      signal: controller.signal,
    });
    controller.abort(new Error("unmounted"));

    await expect(result).rejects.toThrow("unmounted");
  });
});
