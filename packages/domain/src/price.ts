import { Energy } from "./energy";

/**
 * Price of one kilowatt-hour in the currency of the input data. Negative prices
 * are valid: they occur on spot markets during oversupply.
 */
export class EnergyPrice {
  private readonly _perKwh: number;

  private constructor(perKwh: number) {
    if (!Number.isFinite(perKwh)) {
      throw new TypeError("EnergyPrice requires a finite numeric value per kWh");
    }
    this._perKwh = perKwh;
  }

  static perKwh(value: number): EnergyPrice {
    return new EnergyPrice(value);
  }

  get perKwh(): number {
    return this._perKwh;
  }

  /** Monetary value of `energy` at this price: kWh × price. */
  costFor(energy: Energy): number {
    return energy.kilowattHours * this._perKwh;
  }
}
