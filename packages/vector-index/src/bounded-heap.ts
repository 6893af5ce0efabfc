/**
 * Max-heap holding at most `capacity` items: the root is always the worst
 * item kept, so a better candidate replaces it in O(log capacity).
 */
export class BoundedMaxHeap<T> {
  private items: T[] = [];

  /**
   * @param compare - negative when `a` ranks before (is better than) `b`
   */
  constructor(
    private readonly capacity: number,
    private readonly compare: (a: T, b: T) => number,
  ) {}

  get size(): number {
    return this.items.length;
  }

  offer(item: T): void {
    if (this.capacity <= 0) return;

    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.siftUp(this.items.length - 1);
      return;
    }

    const worst = this.items[0];
    if (worst !== undefined && this.compare(item, worst) < 0) {
      this.items[0] = item;
      this.siftDown(0);
    }
  }

  /** Kept items, best first. */
  toSortedArray(): T[] {
    return [...this.items].sort(this.compare);
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.compare(this.at(child), this.at(parent)) <= 0) return;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let largest = parent;

      if (left < this.items.length && this.compare(this.at(left), this.at(largest)) > 0) {
        largest = left;
      }
      if (right < this.items.length && this.compare(this.at(right), this.at(largest)) > 0) {
        largest = right;
      }
      if (largest === parent) return;

      this.swap(parent, largest);
      parent = largest;
    }
  }

  private at(index: number): T {
    const item = this.items[index];
    if (item === undefined) {
      throw new RangeError(`Heap index ${String(index)} out of bounds`);
    }
    return item;
  }

  private swap(a: number, b: number): void {
    const first = this.at(a);
    this.items[a] = this.at(b);
    this.items[b] = first;
  }
}
