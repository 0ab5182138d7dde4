/**
 * Planned battery level after each step of a window. Lazy segment tree with
 * range add, range min/max and a search for the last step at or above a level.
 */
export class LevelProfile {
  private readonly maxTree: Float64Array;
  private readonly minTree: Float64Array;
  private readonly pending: Float64Array;

  constructor(readonly length: number, initialWh: number) {
    const nodes = Math.max(1, length) * 4;
    this.maxTree = new Float64Array(nodes);
    this.minTree = new Float64Array(nodes);
    this.pending = new Float64Array(nodes);
    if (length > 0) {
      this.build(1, 0, length - 1, initialWh);
    }
  }

  /** Adds `deltaWh` to every step in `[from, to]`. */
  add(from: number, to: number, deltaWh: number): void {
    if (from > to || deltaWh === 0) {
      return;
    }
    this.assertRange(from, to);
    this.update(1, 0, this.length - 1, from, to, deltaWh);
  }

  max(from: number, to: number): number {
    this.assertRange(from, to);
    return this.queryMax(1, 0, this.length - 1, from, to);
  }

  min(from: number, to: number): number {
    this.assertRange(from, to);
    return this.queryMin(1, 0, this.length - 1, from, to);
  }

  valueAt(index: number): number {
    return this.max(index, index);
  }

  /** Last index in `[from, to]` whose level is at least `thresholdWh`, or -1. */
  lastAtLeast(from: number, to: number, thresholdWh: number): number {
    if (from > to) {
      return -1;
    }
    this.assertRange(from, to);
    return this.findLast(1, 0, this.length - 1, from, to, thresholdWh);
  }

  toArray(): number[] {
    const values: number[] = [];
    for (let idx = 0; idx < this.length; idx += 1) {
      values.push(this.valueAt(idx));
    }
    return values;
  }

  private build(node: number, lo: number, hi: number, value: number): void {
    this.maxTree[node] = value;
    this.minTree[node] = value;
    if (lo === hi) {
      return;
    }
    const mid = (lo + hi) >>> 1;
    this.build(node * 2, lo, mid, value);
    this.build(node * 2 + 1, mid + 1, hi, value);
  }

  private apply(node: number, delta: number): void {
    this.maxTree[node] += delta;
    this.minTree[node] += delta;
    this.pending[node] += delta;
  }

  private push(node: number): void {
    const delta = this.pending[node];
    if (delta !== 0) {
      this.apply(node * 2, delta);
      this.apply(node * 2 + 1, delta);
      this.pending[node] = 0;
    }
  }

  private update(node: number, lo: number, hi: number, from: number, to: number, delta: number): void {
    if (to < lo || hi < from) {
      return;
    }
    if (from <= lo && hi <= to) {
      this.apply(node, delta);
      return;
    }
    this.push(node);
    const mid = (lo + hi) >>> 1;
    this.update(node * 2, lo, mid, from, to, delta);
    this.update(node * 2 + 1, mid + 1, hi, from, to, delta);
    this.maxTree[node] = Math.max(this.maxTree[node * 2], this.maxTree[node * 2 + 1]);
    this.minTree[node] = Math.min(this.minTree[node * 2], this.minTree[node * 2 + 1]);
  }

  private queryMax(node: number, lo: number, hi: number, from: number, to: number): number {
    if (to < lo || hi < from) {
      return Number.NEGATIVE_INFINITY;
    }
    if (from <= lo && hi <= to) {
      return this.maxTree[node];
    }
    this.push(node);
    const mid = (lo + hi) >>> 1;
    return Math.max(
      this.queryMax(node * 2, lo, mid, from, to),
      this.queryMax(node * 2 + 1, mid + 1, hi, from, to),
    );
  }

  private queryMin(node: number, lo: number, hi: number, from: number, to: number): number {
    if (to < lo || hi < from) {
      return Number.POSITIVE_INFINITY;
    }
    if (from <= lo && hi <= to) {
      return this.minTree[node];
    }
    this.push(node);
    const mid = (lo + hi) >>> 1;
    return Math.min(
      this.queryMin(node * 2, lo, mid, from, to),
      this.queryMin(node * 2 + 1, mid + 1, hi, from, to),
    );
  }

  private findLast(node: number, lo: number, hi: number, from: number, to: number, threshold: number): number {
    if (to < lo || hi < from || this.maxTree[node] < threshold) {
      return -1;
    }
    if (lo === hi) {
      return lo;
    }
    this.push(node);
    const mid = (lo + hi) >>> 1;
    const right = this.findLast(node * 2 + 1, mid + 1, hi, from, to, threshold);
    if (right !== -1) {
      return right;
    }
    return this.findLast(node * 2, lo, mid, from, to, threshold);
  }

  private assertRange(from: number, to: number): void {
    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || to >= this.length || from > to) {
      throw new RangeError(`Level range [${from}, ${to}] invalid for length ${this.length}`);
    }
  }
}
