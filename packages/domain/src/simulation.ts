export interface BatteryConfig {
  capacityWh: number;
  /** Depth-of-discharge floor as a fraction of capacity, in [0, 1). */
  minLevelFraction: number;
  chargeLossFraction: number;
  dischargeLossFraction: number;
  /** `null` leaves the grid-charge rate unconstrained. */
  maxGridChargePowerW: number | null;
  gridChargeEnabled: boolean;
}

/**
 * What the optimizer does with surplus it could not match to a demand inside
 * the window: keep it for the next window, or export it.
 */
export type BoundaryPolicy = "carry-surplus" | "window-only";

export const BOUNDARY_POLICIES: readonly BoundaryPolicy[] = ["carry-surplus", "window-only"];

export interface SimulationOptions {
  windowMinutes: number;
  startTime: Date | null;
  endTime: Date | null;
  /** Battery level at the first step; defaults to the depth-of-discharge floor. */
  initialLevelWh: number | null;
  boundaryPolicy: BoundaryPolicy;
  recordTrace: boolean;
}

/** The only state carried across windows. */
export interface SimulationState {
  batteryLevelWh: number;
}

/**
 * Optimizer decision for one step. Charge amounts are energy taken in before
 * charge losses; `dischargeWh` is energy delivered to the load.
 */
export interface StepPlan {
  storeWh: number;
  exportWh: number;
  dischargeWh: number;
  importWh: number;
  gridChargeWh: number;
}

export type LotKind = "carry-in" | "surplus" | "grid";

/** One matched transfer from a stored lot to a later demand step. */
export interface PairingRecord {
  lotKind: LotKind;
  lotTimestamp: string | null;
  demandTimestamp: string;
  /** Energy added to (and later removed from) the battery. */
  storedWh: number;
  deliveredWh: number;
  lotCostBasis: number;
  demandValue: number;
}

export interface WindowPlan {
  steps: StepPlan[];
  pairings: PairingRecord[];
  /** Planned battery level after each step. */
  plannedLevelsWh: number[];
}

/** Energy actually moved in one step after physical clamping, all values in Wh. */
export interface StepFlow {
  windowIndex: number;
  timestamp: string;
  timestampMs: number;
  importPrice: number;
  exportPrice: number;
  surplusToBatteryWh: number;
  surplusToGridWh: number;
  batteryToLoadWh: number;
  gridToLoadWh: number;
  gridToBatteryWh: number;
  forcedExportWh: number;
  forcedImportWh: number;
  gridChargeCurtailedWh: number;
  levelBeforeWh: number;
  levelAfterWh: number;
}

export type OccupancyState = "full" | "empty" | "partial";

/** Monetary value of the battery flows of a step (kWh × price). */
export interface StepValuation {
  exportValueLost: number;
  gridChargeCost: number;
  importCostSaved: number;
}

export interface FlowTotal {
  energyWh: number;
  value: number;
}

export interface MonthlyTotals {
  month: string;
  surplusStored: FlowTotal;
  negativePriceStored: FlowTotal;
  gridCharged: FlowTotal;
  batteryUsed: FlowTotal;
}

export interface OccupancyStats {
  totalSteps: number;
  fullSteps: number;
  emptySteps: number;
  partialSteps: number;
  timesFull: number;
  timesEmpty: number;
  fullPercent: number;
  emptyPercent: number;
  partialPercent: number;
}

export interface SavingsSummary {
  period: {
    start: string;
    end: string;
    days: number;
    years: number;
  };
  battery: {
    capacityWh: number;
    floorWh: number;
    finalLevelWh: number;
  };
  totals: {
    surplusStored: FlowTotal;
    negativePriceStored: FlowTotal;
    gridCharged: FlowTotal;
    batteryUsed: FlowTotal;
    forcedExportWh: number;
    forcedImportWh: number;
    gridChargeCurtailedWh: number;
  };
  financial: {
    exportValueLost: number;
    negativePriceImpact: number;
    gridChargingCost: number;
    importCostSaved: number;
    netSavings: number;
    /** Net savings scaled to 365 days; an estimate, never an authoritative figure. */
    annualizedEstimate: number;
  };
  cycles: {
    total: number;
    perDay: number;
  };
  occupancy: OccupancyStats;
  monthly: MonthlyTotals[];
  gridChargeActions: PairingRecord[];
  windowCount: number;
  stepCount: number;
}

/** Hourly bucket of the per-step trace, consumed by the visualization writer. */
export interface TracePoint {
  hour: string;
  batteryLevelWh: number;
  solarStoredWh: number;
  gridChargedWh: number;
  batteryUsedWh: number;
  exportedWh: number;
  importedWh: number;
}
