import { Duration } from "./duration";

/** Half-open time interval `[start, end)`. */
export class TimeSlot {
  private readonly _startMs: number;
  private readonly _endMs: number;

  private constructor(startMs: number, endMs: number) {
    if (!Number.isFinite(startMs)) {
      throw new TypeError("Invalid start date for time slot");
    }
    if (!Number.isFinite(endMs)) {
      throw new TypeError("Invalid end date for time slot");
    }
    if (endMs <= startMs) {
      throw new RangeError("Time slot end must be after start");
    }
    this._startMs = startMs;
    this._endMs = endMs;
  }

  static fromTimestamps(start: number, end: number): TimeSlot {
    return new TimeSlot(start, end);
  }

  get start(): Date {
    return new Date(this._startMs);
  }

  get end(): Date {
    return new Date(this._endMs);
  }

  get startMs(): number {
    return this._startMs;
  }

  get endMs(): number {
    return this._endMs;
  }

  get duration(): Duration {
    return Duration.fromMilliseconds(this._endMs - this._startMs);
  }
}
