/**
 * Long-poll hub — suspended poll-payment requests waiting for an order
 * to be paid (or refunded beyond a threshold).
 *
 * Two views of the same waiters:
 *   buckets  H(order_id ‖ merchant_pub) → waiters
 *   heap     waiters by deadline; its head drives the single expiry timer
 *
 * A waiter leaves both views before its promise settles, and settles once.
 */

import { amountCmp, computePayKey, sameCurrency, type Amount, type HashCode } from "@coinmerchant/primitives";
import { TimeoutHeap } from "./timeout-heap.js";

export type WakeReason = "resumed" | "timeout" | "shutdown";

interface Waiter {
  readonly key: HashCode;
  readonly deadline: number;
  /** Resume only for a refund above this amount; null = on payment. */
  readonly refundExpected: Amount | null;
  readonly wake: (reason: WakeReason) => void;
}

export class LongPollHub {
  private readonly buckets = new Map<HashCode, Set<Waiter>>();
  private readonly heap = new TimeoutHeap<Waiter>();
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly now: () => number = () => Date.now()) {}

  /** Number of suspended waiters. */
  get size(): number {
    return this.heap.size;
  }

  /** Wait until resumed, until `deadline` (epoch ms), or until shutdown. */
  suspend(orderId: string, merchantPub: string, deadline: number, minRefund: Amount | null): Promise<WakeReason> {
    const key = computePayKey(orderId, merchantPub);
    return new Promise<WakeReason>((resolve) => {
      const waiter: Waiter = { key, deadline, refundExpected: minRefund, wake: resolve };
      let bucket = this.buckets.get(key);
      if (!bucket) {
        bucket = new Set();
        this.buckets.set(key, bucket);
      }
      bucket.add(waiter);
      this.heap.push(waiter);
      this.schedule();
    });
  }

  /**
   * Wake waiters for an order: those waiting for payment, and, when
   * `refundAmount` is given, those whose threshold is below it.
   * Returns how many were woken.
   */
  resume(orderId: string, merchantPub: string, refundAmount?: Amount): number {
    const bucket = this.buckets.get(computePayKey(orderId, merchantPub));
    if (!bucket) return 0;
    let woken = 0;
    for (const waiter of [...bucket]) {
      if (!wants(waiter, refundAmount)) continue;
      this.finish(waiter, "resumed");
      woken++;
    }
    if (woken > 0) this.schedule();
    return woken;
  }

  /** Shutdown: wake everyone with the shutdown sentinel. */
  forceResumeAll(): number {
    const all: Waiter[] = [];
    for (const bucket of this.buckets.values()) all.push(...bucket);
    for (const waiter of all) this.finish(waiter, "shutdown");
    this.clearTimer();
    return all.length;
  }

  private finish(waiter: Waiter, reason: WakeReason): void {
    const bucket = this.buckets.get(waiter.key);
    if (!bucket?.delete(waiter)) return;
    if (bucket.size === 0) this.buckets.delete(waiter.key);
    this.heap.remove(waiter);
    waiter.wake(reason);
  }

  private sweep(): void {
    this.timer = null;
    const now = this.now();
    for (let head = this.heap.peek(); head && head.deadline <= now; head = this.heap.peek()) {
      this.finish(head, "timeout");
    }
    this.schedule();
  }

  private schedule(): void {
    this.clearTimer();
    const head = this.heap.peek();
    if (!head) return;
    this.timer = setTimeout(() => this.sweep(), Math.max(0, head.deadline - this.now()));
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

function wants(waiter: Waiter, refundAmount: Amount | undefined): boolean {
  if (waiter.refundExpected === null) return true;
  if (refundAmount === undefined || !sameCurrency(refundAmount, waiter.refundExpected)) return false;
  return amountCmp(refundAmount, waiter.refundExpected) > 0;
}
