import { Duration, TimeSlot } from "@battery-savings/domain";
import type { Reading, ReadingSeries } from "@battery-savings/domain";

export interface AnalysisWindow {
  /** Position of the window on the grid anchored at the first reading. */
  index: number;
  slot: TimeSlot;
  readings: readonly Reading[];
}

/** The requested period contains no readings. */
export class EmptyPeriodError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "EmptyPeriodError";
  }
}

export interface WindowRange {
  startTime: Date | null;
  endTime: Date | null;
}

/**
 * Fixed-duration, non-overlapping windows over a clipped series. Iterating
 * twice yields the same windows; nothing is materialised up front.
 */
export class WindowSequence implements Iterable<AnalysisWindow> {
  private readonly windowMs: number;

  constructor(private readonly series: ReadingSeries, readonly duration: Duration) {
    if (duration.isZero()) {
      throw new RangeError("Window duration must be positive");
    }
    this.windowMs = duration.milliseconds;
  }

  get readingCount(): number {
    return this.series.length;
  }

  span(): TimeSlot {
    return this.series.span();
  }

  *[Symbol.iterator](): Iterator<AnalysisWindow> {
    const series = this.series;
    const anchorMs = series.at(0).timestampMs;
    const seriesEndMs = series.span().endMs;
    let cursor = 0;
    while (cursor < series.length) {
      const index = Math.floor((series.at(cursor).timestampMs - anchorMs) / this.windowMs);
      const startMs = anchorMs + index * this.windowMs;
      const endMs = startMs + this.windowMs;
      const next = series.indexAtOrAfter(endMs);
      yield {
        index,
        slot: TimeSlot.fromTimestamps(startMs, Math.min(endMs, seriesEndMs)),
        readings: series.slice(cursor, next),
      };
      cursor = next;
    }
  }
}

/**
 * Clips `series` to `[startTime, endTime]` (inclusive) and partitions it into
 * windows of `windowMinutes`.
 */
export function segmentWindows(series: ReadingSeries, windowMinutes: number, range: WindowRange): WindowSequence {
  if (!(windowMinutes > 0)) {
    throw new RangeError(`Window size must be positive, got ${windowMinutes} minutes`);
  }
  const clipped = series.clip(range.startTime, range.endTime);
  if (clipped.isEmpty()) {
    const from = range.startTime?.toISOString() ?? "start of data";
    const to = range.endTime?.toISOString() ?? "end of data";
    throw new EmptyPeriodError(`No readings between ${from} and ${to}`);
  }
  return new WindowSequence(clipped, Duration.fromMinutes(windowMinutes));
}
