/**
 * Long-poll hub tests (fake timers).
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { LongPollHub, type WakeReason } from "../src/long-poll/hub.js";
import { InFlightRegistry } from "../src/long-poll/registry.js";
import { amt } from "./fixtures.js";

const PUB = "aa".repeat(32);

function track(p: Promise<WakeReason>): { reason: WakeReason | null } {
  const state: { reason: WakeReason | null } = { reason: null };
  void p.then((r) => {
    state.reason = r;
  });
  return state;
}

let hub: LongPollHub;

beforeEach(() => {
  vi.useFakeTimers();
  hub = new LongPollHub();
});

afterEach(() => {
  hub.forceResumeAll();
  vi.useRealTimers();
});

describe("LongPollHub", () => {
  it("resumes a waiter when its order is paid", async () => {
    const waiting = hub.suspend("o1", PUB, Date.now() + 30_000, null);
    expect(hub.size).toBe(1);
    expect(hub.resume("o1", PUB)).toBe(1);
    await expect(waiting).resolves.toBe("resumed");
    expect(hub.size).toBe(0);
  });

  it("leaves other orders and instances alone", async () => {
    const waiter = track(hub.suspend("o1", PUB, Date.now() + 30_000, null));
    expect(hub.resume("o2", PUB)).toBe(0);
    expect(hub.resume("o1", "bb".repeat(32))).toBe(0);
    await vi.advanceTimersByTimeAsync(0);
    expect(waiter.reason).toBeNull();
  });

  it("times out at the deadline", async () => {
    const waiter = track(hub.suspend("o1", PUB, Date.now() + 1_000, null));
    await vi.advanceTimersByTimeAsync(999);
    expect(waiter.reason).toBeNull();
    await vi.advanceTimersByTimeAsync(1);
    expect(waiter.reason).toBe("timeout");
    expect(hub.size).toBe(0);
  });

  it("expires waiters in deadline order", async () => {
    const late = track(hub.suspend("o1", PUB, Date.now() + 5_000, null));
    const early = track(hub.suspend("o2", PUB, Date.now() + 1_000, null));
    await vi.advanceTimersByTimeAsync(1_000);
    expect(early.reason).toBe("timeout");
    expect(late.reason).toBeNull();
    await vi.advanceTimersByTimeAsync(4_000);
    expect(late.reason).toBe("timeout");
  });

  it("wakes refund waiters only above their threshold", async () => {
    const deadline = Date.now() + 30_000;
    const overOne = track(hub.suspend("o1", PUB, deadline, amt("EUR:1")));
    const payment = track(hub.suspend("o1", PUB, deadline, null));
    const overThree = track(hub.suspend("o1", PUB, deadline, amt("EUR:3")));

    expect(hub.resume("o1", PUB, amt("EUR:2"))).toBe(2);
    await vi.advanceTimersByTimeAsync(0);
    expect(overOne.reason).toBe("resumed");
    expect(payment.reason).toBe("resumed");
    expect(overThree.reason).toBeNull();

    expect(hub.resume("o1", PUB, amt("EUR:3"))).toBe(0);
    expect(hub.resume("o1", PUB, amt("USD:5"))).toBe(0);
    expect(hub.resume("o1", PUB)).toBe(0);
    expect(hub.size).toBe(1);
  });

  it("wakes everyone with the shutdown reason", async () => {
    const a = hub.suspend("o1", PUB, Date.now() + 30_000, null);
    const b = hub.suspend("o2", PUB, Date.now() + 30_000, amt("EUR:1"));
    expect(hub.forceResumeAll()).toBe(2);
    await expect(Promise.all([a, b])).resolves.toEqual(["shutdown", "shutdown"]);
    expect(hub.size).toBe(0);
  });

  it("settles a waiter once", async () => {
    const waiter = track(hub.suspend("o1", PUB, Date.now() + 1_000, null));
    hub.resume("o1", PUB);
    await vi.advanceTimersByTimeAsync(2_000);
    expect(waiter.reason).toBe("resumed");
    expect(hub.forceResumeAll()).toBe(0);
  });
});

describe("InFlightRegistry", () => {
  it("aborts every tracked item once", () => {
    const registry = new InFlightRegistry();
    const aborted: string[] = [];
    registry.add({ abort: () => aborted.push("a") });
    const removeB = registry.add({ abort: () => aborted.push("b") });
    registry.add({ abort: () => aborted.push("c") });
    removeB();
    expect(registry.size).toBe(2);
    expect(registry.abortAll()).toBe(2);
    expect(aborted).toEqual(["a", "c"]);
    expect(registry.size).toBe(0);
    expect(registry.abortAll()).toBe(0);
  });
});
