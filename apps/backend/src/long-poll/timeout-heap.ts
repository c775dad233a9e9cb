/**
 * Binary min-heap on deadline with O(log n) removal of arbitrary entries.
 */

export interface Deadlined {
  readonly deadline: number;
}

export class TimeoutHeap<T extends Deadlined> {
  private readonly items: T[] = [];
  private readonly positions = new Map<T, number>();

  get size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  has(item: T): boolean {
    return this.positions.has(item);
  }

  push(item: T): void {
    if (this.positions.has(item)) return;
    this.items.push(item);
    this.positions.set(item, this.items.length - 1);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const head = this.items[0];
    if (head !== undefined) this.remove(head);
    return head;
  }

  remove(item: T): boolean {
    const index = this.positions.get(item);
    if (index === undefined) return false;
    const last = this.items.pop();
    this.positions.delete(item);
    if (last === undefined || last === item) return true;
    this.items[index] = last;
    this.positions.set(last, index);
    this.siftDown(this.siftUp(index));
    return true;
  }

  private siftUp(index: number): number {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.deadlineAt(parent) <= this.deadlineAt(i)) break;
      this.swap(i, parent);
      i = parent;
    }
    return i;
  }

  private siftDown(index: number): void {
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < this.items.length && this.deadlineAt(left) < this.deadlineAt(smallest)) smallest = left;
      if (right < this.items.length && this.deadlineAt(right) < this.deadlineAt(smallest)) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private deadlineAt(index: number): number {
    return this.items[index]?.deadline ?? Number.POSITIVE_INFINITY;
  }

  private swap(a: number, b: number): void {
    const x = this.items[a];
    const y = this.items[b];
    if (x === undefined || y === undefined) return;
    this.items[a] = y;
    this.items[b] = x;
    this.positions.set(y, a);
    this.positions.set(x, b);
  }
}
