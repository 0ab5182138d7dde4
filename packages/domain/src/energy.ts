import { Duration } from "./duration";
import { Power } from "./power";
import { Scalar } from "./scalar";

export class Energy {
  private readonly _wattHours: number;

  private constructor(wattHours: number) {
    if (!Number.isFinite(wattHours)) {
      throw new TypeError("Energy requires a finite numeric value in watt-hours");
    }
    this._wattHours = wattHours;
  }

  static fromWattHours(value: number): Energy {
    return new Energy(value);
  }

  static fromPowerAndDuration(power: Power, duration: Duration): Energy {
    return new Energy(power.watts * duration.hours);
  }

  get wattHours(): number {
    return this._wattHours;
  }

  get kilowattHours(): number {
    return this._wattHours / 1000;
  }

  scale(factor: number | Scalar): Energy {
    const numeric = factor instanceof Scalar ? factor.value : factor;
    return new Energy(this._wattHours * numeric);
  }

  /** How many times `other` fits into this amount, e.g. full cycles of a capacity. */
  ratioTo(other: Energy): number {
    if (other._wattHours === 0) {
      throw new RangeError("Cannot compare energy against a zero amount");
    }
    return this._wattHours / other._wattHours;
  }
}
