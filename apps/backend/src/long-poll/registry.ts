/**
 * Live pay and refund-lookup contexts, so shutdown can abort their
 * outbound exchange requests and timers.
 */

export interface Abortable {
  abort(): void;
}

export class InFlightRegistry {
  private readonly live = new Set<Abortable>();

  get size(): number {
    return this.live.size;
  }

  /** Track `item`; the returned function stops tracking it. */
  add(item: Abortable): () => void {
    this.live.add(item);
    return () => {
      this.live.delete(item);
    };
  }

  abortAll(): number {
    const items = [...this.live];
    this.live.clear();
    for (const item of items) item.abort();
    return items.length;
  }
}
