import { ReadingSeries } from "@battery-savings/domain";
import type { BatteryConfig, SimulationOptions, StepFlow } from "@battery-savings/domain";

export const SERIES_START_MS = Date.UTC(2024, 4, 1, 0, 0, 0);

/** `[netEnergyWh, importPrice, exportPrice]` */
export type Step = [number, number, number];

export function seriesOf(steps: Step[], stepMinutes = 60, startMs = SERIES_START_MS): ReadingSeries {
  return ReadingSeries.fromInputs(steps.map(([netEnergyWh, importPrice, exportPrice], index) => ({
    timestampMs: startMs + index * stepMinutes * 60_000,
    netEnergyWh,
    importPrice,
    exportPrice,
  })));
}

export function batteryOf(overrides: Partial<BatteryConfig> = {}): BatteryConfig {
  return {
    capacityWh: 1000,
    minLevelFraction: 0,
    chargeLossFraction: 0,
    dischargeLossFraction: 0,
    maxGridChargePowerW: null,
    gridChargeEnabled: true,
    ...overrides,
  };
}

export function optionsOf(overrides: Partial<SimulationOptions> = {}): SimulationOptions {
  return {
    windowMinutes: 1440,
    startTime: null,
    endTime: null,
    initialLevelWh: null,
    boundaryPolicy: "carry-surplus",
    recordTrace: false,
    ...overrides,
  };
}

export function flowOf(overrides: Partial<StepFlow> = {}): StepFlow {
  return {
    windowIndex: 0,
    timestamp: new Date(SERIES_START_MS).toISOString(),
    timestampMs: SERIES_START_MS,
    importPrice: 0,
    exportPrice: 0,
    surplusToBatteryWh: 0,
    surplusToGridWh: 0,
    batteryToLoadWh: 0,
    gridToLoadWh: 0,
    gridToBatteryWh: 0,
    forcedExportWh: 0,
    forcedImportWh: 0,
    gridChargeCurtailedWh: 0,
    levelBeforeWh: 0,
    levelAfterWh: 0,
    ...overrides,
  };
}

/** Store, discharge, store, discharge: the second demand is worth twice the first. */
export const ARBITRAGE_STEPS: Step[] = [
  [500, 1.0, 0.5],
  [-500, 1.0, 0.5],
  [500, 1.0, 0.5],
  [-500, 2.0, 0.5],
];
