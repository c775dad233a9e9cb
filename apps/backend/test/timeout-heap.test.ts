import { describe, it, expect } from "vitest";
import { TimeoutHeap } from "../src/long-poll/timeout-heap.js";

interface Entry {
  name: string;
  deadline: number;
}

function drain(heap: TimeoutHeap<Entry>): string[] {
  const out: string[] = [];
  for (let e = heap.pop(); e; e = heap.pop()) out.push(e.name);
  return out;
}

describe("TimeoutHeap", () => {
  it("pops in deadline order", () => {
    const heap = new TimeoutHeap<Entry>();
    for (const [name, deadline] of [["c", 30], ["a", 10], ["e", 50], ["b", 20], ["d", 40]] as const) {
      heap.push({ name, deadline });
    }
    expect(heap.size).toBe(5);
    expect(heap.peek()?.name).toBe("a");
    expect(drain(heap)).toEqual(["a", "b", "c", "d", "e"]);
    expect(heap.size).toBe(0);
  });

  it("removes an arbitrary entry", () => {
    const heap = new TimeoutHeap<Entry>();
    const entries = [10, 20, 30, 40, 50, 60].map((deadline) => ({ name: String(deadline), deadline }));
    for (const e of entries) heap.push(e);
    const [, second, , fourth] = entries;
    if (!second || !fourth) throw new Error("fixture");
    expect(heap.remove(fourth)).toBe(true);
    expect(heap.remove(second)).toBe(true);
    expect(heap.remove(second)).toBe(false);
    expect(heap.has(fourth)).toBe(false);
    expect(drain(heap)).toEqual(["10", "30", "50", "60"]);
  });

  it("removes the head", () => {
    const heap = new TimeoutHeap<Entry>();
    const head = { name: "head", deadline: 1 };
    heap.push({ name: "tail", deadline: 2 });
    heap.push(head);
    heap.remove(head);
    expect(heap.peek()?.name).toBe("tail");
  });
});
