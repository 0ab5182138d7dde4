import { describe, expect, it } from "vitest";

import { InvariantViolationError } from "@battery-savings/domain";
import type { StepPlan } from "@battery-savings/domain";

import { BatterySimulator } from "../src/simulation/battery-simulator";
import { batteryOf, seriesOf } from "./helpers";
import type { Step } from "./helpers";

function step(values: Partial<StepPlan>): StepPlan {
  return {storeWh: 0, exportWh: 0, dischargeWh: 0, importWh: 0, gridChargeWh: 0, ...values};
}

function readings(steps: Step[]) {
  const series = seriesOf(steps);
  return series.slice(0, series.length);
}

describe("BatterySimulator", () => {
  it("exports all surplus as forced export when the battery is full", () => {
    const simulator = new BatterySimulator(batteryOf(), 1000);

    const [flow] = simulator.applyWindow(0, readings([[300, 1, 0.2]]), [step({storeWh: 300})]);

    expect(flow.surplusToBatteryWh).toBe(0);
    expect(flow.surplusToGridWh).toBe(300);
    expect(flow.forcedExportWh).toBe(300);
    expect(flow.levelAfterWh).toBe(1000);
  });

  it("imports the shortfall of a deficit larger than the battery as forced import", () => {
    const simulator = new BatterySimulator(batteryOf({minLevelFraction: 0.1}), 400);

    const [flow] = simulator.applyWindow(0, readings([[-1000, 1, 0]]), [step({dischargeWh: 1000})]);

    expect(flow.batteryToLoadWh).toBe(300);
    expect(flow.gridToLoadWh).toBe(700);
    expect(flow.forcedImportWh).toBe(700);
    expect(flow.levelAfterWh).toBe(100);
    expect(simulator.state).toEqual({batteryLevelWh: 100});
  });

  it("applies charge and discharge losses", () => {
    const simulator = new BatterySimulator(batteryOf({chargeLossFraction: 0.1, dischargeLossFraction: 0.2}), 0);

    const flows = simulator.applyWindow(
      0,
      readings([[500, 1, 0.2], [-200, 1, 0]]),
      [step({storeWh: 500}), step({dischargeWh: 200})],
    );

    expect(flows[0].levelAfterWh).toBeCloseTo(450, 9);
    expect(flows[1].batteryToLoadWh).toBeCloseTo(200, 9);
    expect(flows[1].levelAfterWh).toBeCloseTo(200, 9);
    expect(simulator.totalDeliveredWh).toBeCloseTo(200, 9);
  });

  it("curtails grid charge the battery cannot accept", () => {
    const simulator = new BatterySimulator(batteryOf(), 900);

    const [flow] = simulator.applyWindow(0, readings([[0, 0.1, 0]]), [step({gridChargeWh: 300})]);

    expect(flow.gridToBatteryWh).toBe(100);
    expect(flow.gridChargeCurtailedWh).toBe(200);
    expect(flow.levelAfterWh).toBe(1000);
  });

  it("counts occupancy, transitions and cycles across windows", () => {
    const simulator = new BatterySimulator(batteryOf(), 0);

    simulator.applyWindow(0, readings([[1000, 1, 0.1], [-1000, 2, 0]]), [
      step({storeWh: 1000}),
      step({dischargeWh: 1000}),
    ]);
    simulator.applyWindow(1, readings([[500, 1, 0.1]]), [step({storeWh: 500})]);

    const stats = simulator.occupancyStats();
    expect(stats).toMatchObject({
      totalSteps: 3,
      fullSteps: 1,
      emptySteps: 1,
      partialSteps: 1,
      timesFull: 1,
      timesEmpty: 1,
    });
    expect(stats.fullPercent).toBeCloseTo(100 / 3, 9);
    expect(simulator.cycles).toBe(1);
    expect(simulator.state.batteryLevelWh).toBe(500);
  });

  it("rejects a plan that does not cover the window", () => {
    const simulator = new BatterySimulator(batteryOf(), 0);

    expect(() => simulator.applyWindow(3, readings([[100, 1, 0], [100, 1, 0]]), [step({})]))
      .toThrow(InvariantViolationError);
  });

  it("rejects grid charge above the power limit", () => {
    const simulator = new BatterySimulator(batteryOf({maxGridChargePowerW: 100}), 0);

    let caught: unknown = null;
    try {
      simulator.applyWindow(2, readings([[0, 0.1, 0], [-100, 1, 0]]), [step({gridChargeWh: 300}), step({})]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvariantViolationError);
    if (caught instanceof InvariantViolationError) {
      expect(caught.context).toEqual({
        windowIndex: 2,
        timestamp: "2024-05-01T00:00:00.000Z",
        quantity: "gridToBatteryWh",
        expected: 100,
        observed: 300,
      });
    }
  });

  it("rejects a starting level outside the battery bounds", () => {
    expect(() => new BatterySimulator(batteryOf({minLevelFraction: 0.2}), 100)).toThrow(RangeError);
    expect(() => new BatterySimulator(batteryOf(), 1200)).toThrow(RangeError);
  });
});
