import { Duration } from "./duration";
import { Energy } from "./energy";

export class Power {
  private readonly _watts: number;

  private constructor(watts: number) {
    if (!Number.isFinite(watts)) {
      throw new TypeError("Power requires a finite numeric value in watts");
    }
    this._watts = watts;
  }

  static fromWatts(value: number): Power {
    return new Power(value);
  }

  get watts(): number {
    return this._watts;
  }

  /** Energy moved at this power over `duration`, e.g. the grid-charge allowance of one step. */
  forDuration(duration: Duration): Energy {
    return Energy.fromPowerAndDuration(this, duration);
  }
}
