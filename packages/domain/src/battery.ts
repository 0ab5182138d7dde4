import { Energy } from "./energy";
import { Percentage } from "./percentage";
import type { BatteryConfig } from "./simulation";

/** Tolerance for level comparisons against the floor and capacity. */
export const LEVEL_TOLERANCE_WH = 1e-6;

export function batteryFloor(config: BatteryConfig): Energy {
  return Energy.fromWattHours(config.capacityWh).scale(Percentage.fromRatio(config.minLevelFraction));
}

export function chargeEfficiency(config: BatteryConfig): Percentage {
  return Percentage.fromRatio(config.chargeLossFraction).invert();
}

export function dischargeEfficiency(config: BatteryConfig): Percentage {
  return Percentage.fromRatio(config.dischargeLossFraction).invert();
}

/**
 * Factor a stored lot's cost basis must be multiplied by to break even after
 * the round trip: `1 / ((1 - chargeLoss)(1 - dischargeLoss))`.
 */
export function lossMultiplier(config: BatteryConfig): number {
  return chargeEfficiency(config).times(dischargeEfficiency(config)).reciprocal().value;
}
