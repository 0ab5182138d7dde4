const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 86_400_000;

export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new TypeError("Duration requires a finite number of milliseconds");
    }
    if (milliseconds < 0) {
      throw new RangeError("Duration cannot be negative");
    }
    this._milliseconds = milliseconds;
  }

  static fromMilliseconds(value: number): Duration {
    return new Duration(value);
  }

  static fromMinutes(value: number): Duration {
    return new Duration(value * MS_PER_MINUTE);
  }

  get milliseconds(): number {
    return this._milliseconds;
  }

  get minutes(): number {
    return this._milliseconds / MS_PER_MINUTE;
  }

  get hours(): number {
    return this._milliseconds / MS_PER_HOUR;
  }

  get days(): number {
    return this._milliseconds / MS_PER_DAY;
  }

  isZero(): boolean {
    return this._milliseconds === 0;
  }
}
