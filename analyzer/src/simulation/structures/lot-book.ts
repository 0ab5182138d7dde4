const EXHAUSTED_WH = 1e-9;
const NONE = -1;

/**
 * Energy lots offered at fixed step indices, each with a cost basis and a
 * remaining amount. A segment tree over the indices answers "cheapest live lot
 * in [from, to]" in O(log n); equal costs resolve to the latest index.
 */
export class LotBook {
  private readonly leaves: number;
  private readonly tree: Int32Array;
  private readonly costs: Float64Array;
  private readonly remaining: Float64Array;

  constructor(readonly length: number) {
    let leaves = 1;
    while (leaves < Math.max(1, length)) {
      leaves *= 2;
    }
    this.leaves = leaves;
    this.tree = new Int32Array(leaves * 2).fill(NONE);
    this.costs = new Float64Array(length);
    this.remaining = new Float64Array(length);
  }

  /** Offers `amountWh` at `index`; `Infinity` models an unlimited lot. */
  offer(index: number, costBasis: number, amountWh: number): void {
    this.assertIndex(index);
    this.costs[index] = costBasis;
    this.remaining[index] = amountWh;
    this.refresh(index);
  }

  costAt(index: number): number {
    this.assertIndex(index);
    return this.costs[index];
  }

  remainingAt(index: number): number {
    this.assertIndex(index);
    return this.remaining[index];
  }

  /** Index of the cheapest live lot in `[from, to]`, or `null`. */
  cheapest(from: number, to: number): number | null {
    const lower = Math.max(0, from);
    const upper = Math.min(this.length - 1, to);
    if (lower > upper) {
      return null;
    }
    let left = lower + this.leaves;
    let right = upper + this.leaves + 1;
    let best = NONE;
    while (left < right) {
      if (left & 1) {
        best = this.better(best, this.tree[left]);
        left += 1;
      }
      if (right & 1) {
        right -= 1;
        best = this.better(best, this.tree[right]);
      }
      left >>>= 1;
      right >>>= 1;
    }
    return best === NONE ? null : best;
  }

  /** Takes up to `amountWh` from the lot and returns what was taken. */
  consume(index: number, amountWh: number): number {
    this.assertIndex(index);
    const taken = Math.min(Math.max(0, amountWh), this.remaining[index]);
    this.remaining[index] -= taken;
    if (this.remaining[index] <= EXHAUSTED_WH) {
      this.remaining[index] = 0;
    }
    this.refresh(index);
    return taken;
  }

  /** Drops whatever is left of the lot. */
  exhaust(index: number): void {
    this.assertIndex(index);
    this.remaining[index] = 0;
    this.refresh(index);
  }

  private refresh(index: number): void {
    let node = index + this.leaves;
    this.tree[node] = this.remaining[index] > EXHAUSTED_WH ? index : NONE;
    node >>>= 1;
    while (node >= 1) {
      this.tree[node] = this.better(this.tree[node * 2], this.tree[node * 2 + 1]);
      node >>>= 1;
    }
  }

  private better(a: number, b: number): number {
    if (a === NONE) {
      return b;
    }
    if (b === NONE) {
      return a;
    }
    if (this.costs[a] !== this.costs[b]) {
      return this.costs[a] < this.costs[b] ? a : b;
    }
    return Math.max(a, b);
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`Lot index ${index} out of range (length=${this.length})`);
    }
  }
}
