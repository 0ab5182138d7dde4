/** Negative when `a` must leave the heap before `b`. */
export type Comparator<T> = (a: T, b: T) => number;

export class BinaryHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: Comparator<T>, initial: Iterable<T> = []) {
    for (const item of initial) {
      this.items.push(item);
    }
    for (let idx = (this.items.length >>> 1) - 1; idx >= 0; idx -= 1) {
      this.siftDown(idx);
    }
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(item: T): void {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  peek(): T | undefined {
    return this.items[0];
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(start: number): void {
    let idx = start;
    while (idx > 0) {
      const parent = (idx - 1) >>> 1;
      if (this.compare(this.items[idx], this.items[parent]) >= 0) {
        return;
      }
      this.swap(idx, parent);
      idx = parent;
    }
  }

  private siftDown(start: number): void {
    let idx = start;
    const length = this.items.length;
    for (;;) {
      const left = idx * 2 + 1;
      const right = left + 1;
      let best = idx;
      if (left < length && this.compare(this.items[left], this.items[best]) < 0) {
        best = left;
      }
      if (right < length && this.compare(this.items[right], this.items[best]) < 0) {
        best = right;
      }
      if (best === idx) {
        return;
      }
      this.swap(idx, best);
      idx = best;
    }
  }

  private swap(a: number, b: number): void {
    const held = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = held;
  }
}
