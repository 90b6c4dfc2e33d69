/**
 * FIFO of events waiting for the next tick. Producers only push; the tick loop
 * is the only consumer, so events are applied in arrival order.
 */
export class EventQueue<T> {
  private items: T[] = [];

  push(item: T): void {
    this.items.push(item);
  }

  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get size(): number {
    return this.items.length;
  }
}
