import { describe, expect, it } from "vitest";

import type { SavingsSummary } from "@battery-savings/domain";

import { SimulationService } from "../src/simulation/simulation.service";
import { SummaryService } from "../src/simulation/summary.service";
import { ARBITRAGE_STEPS, batteryOf, optionsOf, seriesOf } from "./helpers";

function quietSummary(): SavingsSummary {
  const zero = () => ({energyWh: 0, value: 0});
  return {
    period: {start: "2024-06-01T00:00:00.000Z", end: "2024-06-02T00:00:00.000Z", days: 1, years: 1 / 365},
    battery: {capacityWh: 10000, floorWh: 500, finalLevelWh: 500},
    totals: {
      surplusStored: zero(),
      negativePriceStored: zero(),
      gridCharged: zero(),
      batteryUsed: zero(),
      forcedExportWh: 0,
      forcedImportWh: 0,
      gridChargeCurtailedWh: 0,
    },
    financial: {
      exportValueLost: 0,
      negativePriceImpact: 0,
      gridChargingCost: 0,
      importCostSaved: 0,
      netSavings: 0,
      annualizedEstimate: 0,
    },
    cycles: {total: 0, perDay: 0},
    occupancy: {
      totalSteps: 24,
      fullSteps: 0,
      emptySteps: 24,
      partialSteps: 0,
      timesFull: 0,
      timesEmpty: 0,
      fullPercent: 0,
      emptyPercent: 100,
      partialPercent: 0,
    },
    monthly: [],
    gridChargeActions: [],
    windowCount: 1,
    stepCount: 24,
  };
}

describe("SummaryService", () => {
  const simulation = new SimulationService();
  const formatter = new SummaryService();

  it("formats the arbitrage scenario", () => {
    const {summary} = simulation.run(seriesOf(ARBITRAGE_STEPS), batteryOf(), optionsOf());

    expect(formatter.format(summary).split("\n")).toEqual([
      "Optimized Battery Simulation Summary",
      "==================================================",
      "",
      "Period: 2024-05-01T00:00:00.000Z to 2024-05-01T04:00:00.000Z (0.17 days)",
      "",
      "Battery Configuration:",
      "  Capacity: 1.0 kWh",
      "  Minimum level: 0.00 kWh",
      "  Final level: 0.00 kWh",
      "  Cycles: 1.00 (6.000 per day)",
      "",
      "Energy Flows:",
      "Excess energy stored: 1.00 kWh",
      "  2024-05: 1.00 kWh",
      "",
      "Grid energy charged: 0.00 kWh",
      "",
      "Battery energy used: 1.00 kWh",
      "  2024-05: 1.00 kWh",
      "",
      "Forced export: 0.00 kWh",
      "Forced import: 0.00 kWh",
      "",
      "Financial Summary:",
      "Export value lost: 0.50",
      "  2024-05: 0.50",
      "",
      "Grid charging cost: 0.00",
      "",
      "Import cost saved: 1.50",
      "  2024-05: 1.50",
      "",
      "Net savings: 1.00",
      "Annualized savings (estimate): 2190.00",
      "",
      "Battery State Statistics:",
      "Number of times battery was full: 0",
      "Number of times battery was empty: 2",
      "Battery was full 0.0% of the time",
      "Battery was empty 50.0% of the time",
      "Battery was partially charged 50.0% of the time",
      "",
      "Grid Charging Actions (first 5):",
      "  none",
    ]);
  });

  it("lists grid charging actions", () => {
    const {summary} = simulation.run(seriesOf([[-100, 1.0, 0], [-500, 1.5, 0]]), batteryOf(), optionsOf());

    const lines = formatter.format(summary).split("\n");

    expect(lines).toContain("Grid energy charged: 0.50 kWh");
    expect(lines).toContain("Grid charging cost: 0.50");
    expect(lines).toContain("Net savings: 0.25");
    expect(lines[lines.length - 1]).toBe(
      "  2024-05-01T00:00:00.000Z: charged 0.50 kWh at 1.0000 for 2024-05-01T01:00:00.000Z at 1.5000",
    );
  });

  it("adds curtailment and negative-price lines only when they occurred", () => {
    const quiet = formatter.format(quietSummary());
    expect(quiet).not.toContain("Curtailed grid charge");
    expect(quiet).not.toContain("WARNING");
    expect(quiet).not.toContain("Negative-price storage impact");

    const noisy = quietSummary();
    noisy.totals.gridChargeCurtailedWh = 250;
    noisy.totals.negativePriceStored = {energyWh: 2000, value: -0.1};
    noisy.financial.negativePriceImpact = -0.1;
    const lines = formatter.format(noisy).split("\n");

    expect(lines).toContain("Curtailed grid charge: 0.25 kWh");
    expect(lines).toContain("WARNING: surplus stored at negative export prices: 2.00 kWh (value -0.10)");
    expect(lines).toContain("Negative-price storage impact: -0.10");
  });
});
