import { Logger } from "@nestjs/common";
import {
  Duration,
  Energy,
  InvariantViolationError,
  LEVEL_TOLERANCE_WH,
  Percentage,
  Power,
  batteryFloor,
  chargeEfficiency,
  dischargeEfficiency,
} from "@battery-savings/domain";
import type {
  BatteryConfig,
  OccupancyState,
  OccupancyStats,
  Reading,
  SimulationState,
  StepFlow,
  StepPlan,
} from "@battery-savings/domain";

const FLOW_TOLERANCE_WH = 1e-6;

/**
 * Applies window plans step by step and owns the battery level between
 * windows. Surplus charge is applied first and clamped at capacity, discharge
 * next and clamped at the floor, grid charge last with whatever room remains.
 */
export class BatterySimulator {
  private readonly logger = new Logger(BatterySimulator.name);
  private readonly capacityWh: number;
  private readonly floorWh: number;
  private readonly chargeEff: number;
  private readonly dischargeEff: number;

  private levelWh: number;
  private previousState: OccupancyState;
  private deliveredWh = 0;
  private readonly occupancy = {
    fullSteps: 0,
    emptySteps: 0,
    partialSteps: 0,
    timesFull: 0,
    timesEmpty: 0,
  };

  constructor(private readonly battery: BatteryConfig, initialLevelWh: number) {
    this.capacityWh = battery.capacityWh;
    this.floorWh = batteryFloor(battery).wattHours;
    this.chargeEff = chargeEfficiency(battery).ratio;
    this.dischargeEff = dischargeEfficiency(battery).ratio;
    if (initialLevelWh < this.floorWh - LEVEL_TOLERANCE_WH || initialLevelWh > this.capacityWh + LEVEL_TOLERANCE_WH) {
      throw new RangeError(
        `Initial battery level ${initialLevelWh} Wh outside [${this.floorWh}, ${this.capacityWh}] Wh`,
      );
    }
    this.levelWh = this.snap(initialLevelWh);
    this.previousState = this.classify(this.levelWh);
  }

  get state(): SimulationState {
    return {batteryLevelWh: this.levelWh};
  }

  /** Energy delivered to the load so far, over all windows. */
  get totalDeliveredWh(): number {
    return this.deliveredWh;
  }

  /** Full equivalent cycles: delivered energy over capacity, never reset. */
  get cycles(): number {
    return Energy.fromWattHours(this.deliveredWh).ratioTo(Energy.fromWattHours(this.capacityWh));
  }

  occupancyStats(): OccupancyStats {
    const totalSteps = this.occupancy.fullSteps + this.occupancy.emptySteps + this.occupancy.partialSteps;
    return {
      totalSteps,
      ...this.occupancy,
      fullPercent: Percentage.share(this.occupancy.fullSteps, totalSteps).percent,
      emptyPercent: Percentage.share(this.occupancy.emptySteps, totalSteps).percent,
      partialPercent: Percentage.share(this.occupancy.partialSteps, totalSteps).percent,
    };
  }

  applyWindow(windowIndex: number, readings: readonly Reading[], plan: readonly StepPlan[]): StepFlow[] {
    if (readings.length !== plan.length) {
      throw new InvariantViolationError("Plan length does not match window length", {
        windowIndex,
        timestamp: readings[0]?.timestamp ?? "n/a",
        quantity: "steps",
        expected: readings.length,
        observed: plan.length,
      });
    }
    return readings.map((reading, index) => this.applyStep(windowIndex, reading, plan[index]));
  }

  private applyStep(windowIndex: number, reading: Reading, step: StepPlan): StepFlow {
    const levelBeforeWh = this.levelWh;
    const surplusWh = Math.max(0, reading.netEnergyWh);
    const deficitWh = Math.max(0, -reading.netEnergyWh);

    const plannedStoreWh = Math.min(Math.max(0, step.storeWh), surplusWh);
    const storeRoomWh = Math.max(0, this.capacityWh - this.levelWh);
    const storedWh = Math.min(plannedStoreWh * this.chargeEff, storeRoomWh);
    const storeInputWh = storedWh === plannedStoreWh * this.chargeEff ? plannedStoreWh : storedWh / this.chargeEff;
    const overflowWh = plannedStoreWh - storeInputWh;
    this.levelWh += storedWh;

    const plannedDischargeWh = Math.min(Math.max(0, step.dischargeWh), deficitWh);
    const availableWh = Math.max(0, this.levelWh - this.floorWh);
    const drainWh = Math.min(plannedDischargeWh / this.dischargeEff, availableWh);
    const deliveredWh = drainWh === plannedDischargeWh / this.dischargeEff
      ? plannedDischargeWh
      : drainWh * this.dischargeEff;
    const shortfallWh = plannedDischargeWh - deliveredWh;
    this.levelWh -= drainWh;

    const plannedGridWh = Math.max(0, step.gridChargeWh);
    const gridRoomWh = Math.max(0, this.capacityWh - this.levelWh);
    const gridStoredWh = Math.min(plannedGridWh * this.chargeEff, gridRoomWh);
    const gridInputWh = gridStoredWh === plannedGridWh * this.chargeEff ? plannedGridWh : gridStoredWh / this.chargeEff;
    this.levelWh += gridStoredWh;

    this.levelWh = this.snap(this.levelWh);
    const state = this.classify(this.levelWh);

    const exportWh = surplusWh - storeInputWh;
    const importWh = deficitWh - deliveredWh;
    const flow: StepFlow = {
      windowIndex,
      timestamp: reading.timestamp,
      timestampMs: reading.timestampMs,
      importPrice: reading.importPrice,
      exportPrice: reading.exportPrice,
      surplusToBatteryWh: storeInputWh,
      surplusToGridWh: exportWh,
      batteryToLoadWh: deliveredWh,
      gridToLoadWh: importWh,
      gridToBatteryWh: gridInputWh,
      forcedExportWh: state === "full" ? exportWh : Math.min(exportWh, overflowWh),
      forcedImportWh: state === "empty" ? importWh : Math.min(importWh, shortfallWh),
      gridChargeCurtailedWh: plannedGridWh - gridInputWh,
      levelBeforeWh,
      levelAfterWh: this.levelWh,
    };

    if (overflowWh > FLOW_TOLERANCE_WH || shortfallWh > FLOW_TOLERANCE_WH) {
      this.logger.debug(
        `Clamped step ${reading.timestamp}: overflow=${overflowWh.toFixed(3)} Wh, shortfall=${shortfallWh.toFixed(3)} Wh`,
      );
    }

    this.verify(windowIndex, reading, flow, drainWh, gridStoredWh + storedWh);
    this.track(state, deliveredWh);
    return flow;
  }

  private verify(windowIndex: number, reading: Reading, flow: StepFlow, drainWh: number, chargedWh: number): void {
    const fail = (message: string, quantity: string, expected: number, observed: number): never => {
      throw new InvariantViolationError(message, {
        windowIndex,
        timestamp: reading.timestamp,
        quantity,
        expected,
        observed,
      });
    };
    if (flow.levelAfterWh < this.floorWh - LEVEL_TOLERANCE_WH) {
      fail("Battery level below floor", "levelAfterWh", this.floorWh, flow.levelAfterWh);
    }
    if (flow.levelAfterWh > this.capacityWh + LEVEL_TOLERANCE_WH) {
      fail("Battery level above capacity", "levelAfterWh", this.capacityWh, flow.levelAfterWh);
    }
    const expectedLevel = flow.levelBeforeWh + chargedWh - drainWh;
    if (Math.abs(expectedLevel - flow.levelAfterWh) > FLOW_TOLERANCE_WH) {
      fail("Battery energy not conserved", "levelAfterWh", expectedLevel, flow.levelAfterWh);
    }
    const surplusWh = Math.max(0, reading.netEnergyWh);
    if (Math.abs(flow.surplusToBatteryWh + flow.surplusToGridWh - surplusWh) > FLOW_TOLERANCE_WH) {
      fail("Surplus not fully absorbed", "surplusWh", surplusWh, flow.surplusToBatteryWh + flow.surplusToGridWh);
    }
    const deficitWh = Math.max(0, -reading.netEnergyWh);
    if (Math.abs(flow.batteryToLoadWh + flow.gridToLoadWh - deficitWh) > FLOW_TOLERANCE_WH) {
      fail("Deficit not fully satisfied", "deficitWh", deficitWh, flow.batteryToLoadWh + flow.gridToLoadWh);
    }
    for (const [quantity, value] of Object.entries({
      surplusToBatteryWh: flow.surplusToBatteryWh,
      surplusToGridWh: flow.surplusToGridWh,
      batteryToLoadWh: flow.batteryToLoadWh,
      gridToLoadWh: flow.gridToLoadWh,
      gridToBatteryWh: flow.gridToBatteryWh,
    })) {
      if (value < -FLOW_TOLERANCE_WH) {
        fail("Negative energy flow", quantity, 0, value);
      }
    }
    if (this.battery.maxGridChargePowerW !== null) {
      const allowanceWh = Power.fromWatts(this.battery.maxGridChargePowerW)
        .forDuration(Duration.fromMinutes(reading.durationMinutes))
        .wattHours;
      if (flow.gridToBatteryWh > allowanceWh + FLOW_TOLERANCE_WH) {
        fail("Grid charge exceeds power limit", "gridToBatteryWh", allowanceWh, flow.gridToBatteryWh);
      }
    }
  }

  private track(state: OccupancyState, deliveredWh: number): void {
    this.deliveredWh += deliveredWh;
    if (state === "full") {
      this.occupancy.fullSteps += 1;
      if (this.previousState !== "full") {
        this.occupancy.timesFull += 1;
      }
    } else if (state === "empty") {
      this.occupancy.emptySteps += 1;
      if (this.previousState !== "empty") {
        this.occupancy.timesEmpty += 1;
      }
    } else {
      this.occupancy.partialSteps += 1;
    }
    this.previousState = state;
  }

  private classify(levelWh: number): OccupancyState {
    if (levelWh >= this.capacityWh - LEVEL_TOLERANCE_WH) {
      return "full";
    }
    if (levelWh <= this.floorWh + LEVEL_TOLERANCE_WH) {
      return "empty";
    }
    return "partial";
  }

  /** Pulls levels within tolerance of a bound onto the bound. */
  private snap(levelWh: number): number {
    if (Math.abs(levelWh - this.capacityWh) <= LEVEL_TOLERANCE_WH) {
      return this.capacityWh;
    }
    if (Math.abs(levelWh - this.floorWh) <= LEVEL_TOLERANCE_WH) {
      return this.floorWh;
    }
    return levelWh;
  }
}
