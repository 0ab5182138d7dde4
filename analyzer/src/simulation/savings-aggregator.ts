import { Logger } from "@nestjs/common";
import { Energy, EnergyPrice, monthKey } from "@battery-savings/domain";
import type {
  FlowTotal,
  MonthlyTotals,
  OccupancyStats,
  PairingRecord,
  SavingsSummary,
  StepFlow,
  StepValuation,
  TimeSlot,
} from "@battery-savings/domain";

const DAYS_PER_YEAR = 365;
const GRID_ACTION_LOG_LIMIT = 5;

/** Monetary value of the battery flows of a step, kWh × price of that step. */
export function valueStep(flow: StepFlow): StepValuation {
  const importPrice = EnergyPrice.perKwh(flow.importPrice);
  const exportPrice = EnergyPrice.perKwh(flow.exportPrice);
  return {
    exportValueLost: exportPrice.costFor(Energy.fromWattHours(flow.surplusToBatteryWh)),
    gridChargeCost: importPrice.costFor(Energy.fromWattHours(flow.gridToBatteryWh)),
    importCostSaved: importPrice.costFor(Energy.fromWattHours(flow.batteryToLoadWh)),
  };
}

export interface SummaryContext {
  span: TimeSlot;
  capacityWh: number;
  floorWh: number;
  finalLevelWh: number;
  cycles: number;
  occupancy: OccupancyStats;
  windowCount: number;
}

function emptyTotal(): FlowTotal {
  return {energyWh: 0, value: 0};
}

function addTo(total: FlowTotal, energyWh: number, value: number): void {
  total.energyWh += energyWh;
  total.value += value;
}

function copyTotal(total: FlowTotal): FlowTotal {
  return {energyWh: total.energyWh, value: total.value};
}

/**
 * Accumulates step flows into running totals and calendar-month buckets. Only
 * totals are held, so memory grows with the number of months, not steps.
 */
export class SavingsAggregator {
  private readonly logger = new Logger(SavingsAggregator.name);

  private readonly surplusStored = emptyTotal();
  private readonly negativePriceStored = emptyTotal();
  private readonly gridCharged = emptyTotal();
  private readonly batteryUsed = emptyTotal();
  private forcedExportWh = 0;
  private forcedImportWh = 0;
  private gridChargeCurtailedWh = 0;
  private stepCount = 0;
  private negativePriceSteps = 0;
  private readonly monthly = new Map<string, MonthlyTotals>();
  private readonly gridActions: PairingRecord[] = [];

  record(flow: StepFlow): void {
    const valuation = valueStep(flow);
    const bucket = this.bucketFor(flow.timestampMs);
    this.stepCount += 1;

    if (flow.surplusToBatteryWh > 0) {
      if (flow.exportPrice < 0) {
        addTo(this.negativePriceStored, flow.surplusToBatteryWh, valuation.exportValueLost);
        addTo(bucket.negativePriceStored, flow.surplusToBatteryWh, valuation.exportValueLost);
        this.negativePriceSteps += 1;
        this.logger.debug(
          `Stored ${flow.surplusToBatteryWh.toFixed(1)} Wh at negative export price ${flow.exportPrice} (${flow.timestamp})`,
        );
      } else {
        addTo(this.surplusStored, flow.surplusToBatteryWh, valuation.exportValueLost);
        addTo(bucket.surplusStored, flow.surplusToBatteryWh, valuation.exportValueLost);
      }
    }
    if (flow.gridToBatteryWh > 0) {
      addTo(this.gridCharged, flow.gridToBatteryWh, valuation.gridChargeCost);
      addTo(bucket.gridCharged, flow.gridToBatteryWh, valuation.gridChargeCost);
    }
    if (flow.batteryToLoadWh > 0) {
      addTo(this.batteryUsed, flow.batteryToLoadWh, valuation.importCostSaved);
      addTo(bucket.batteryUsed, flow.batteryToLoadWh, valuation.importCostSaved);
    }

    this.forcedExportWh += flow.forcedExportWh;
    this.forcedImportWh += flow.forcedImportWh;
    this.gridChargeCurtailedWh += flow.gridChargeCurtailedWh;
  }

  /** Keeps the first grid-charge pairings as an action log. */
  recordPairings(pairings: readonly PairingRecord[]): void {
    for (const pairing of pairings) {
      if (this.gridActions.length >= GRID_ACTION_LOG_LIMIT) {
        return;
      }
      if (pairing.lotKind === "grid") {
        this.gridActions.push(pairing);
      }
    }
  }

  /** Net savings so far: import cost saved minus export value lost minus grid charging cost. */
  netSavings(): number {
    return this.batteryUsed.value
      - this.surplusStored.value
      - this.negativePriceStored.value
      - this.gridCharged.value;
  }

  summarize(context: SummaryContext): SavingsSummary {
    const days = context.span.duration.days;
    const netSavings = this.netSavings();
    if (this.forcedExportWh > 0 || this.forcedImportWh > 0) {
      this.logger.warn(
        `Battery bounds forced ${Energy.fromWattHours(this.forcedExportWh).kilowattHours.toFixed(2)} kWh of export and ` +
        `${Energy.fromWattHours(this.forcedImportWh).kilowattHours.toFixed(2)} kWh of import`,
      );
    }
    if (this.negativePriceSteps > 0) {
      this.logger.warn(
        `Stored ${Energy.fromWattHours(this.negativePriceStored.energyWh).kilowattHours.toFixed(2)} kWh of surplus ` +
        `at negative export prices in ${this.negativePriceSteps} steps`,
      );
    }

    return {
      period: {
        start: context.span.start.toISOString(),
        end: context.span.end.toISOString(),
        days,
        years: days / DAYS_PER_YEAR,
      },
      battery: {
        capacityWh: context.capacityWh,
        floorWh: context.floorWh,
        finalLevelWh: context.finalLevelWh,
      },
      totals: {
        surplusStored: copyTotal(this.surplusStored),
        negativePriceStored: copyTotal(this.negativePriceStored),
        gridCharged: copyTotal(this.gridCharged),
        batteryUsed: copyTotal(this.batteryUsed),
        forcedExportWh: this.forcedExportWh,
        forcedImportWh: this.forcedImportWh,
        gridChargeCurtailedWh: this.gridChargeCurtailedWh,
      },
      financial: {
        exportValueLost: this.surplusStored.value,
        negativePriceImpact: this.negativePriceStored.value,
        gridChargingCost: this.gridCharged.value,
        importCostSaved: this.batteryUsed.value,
        netSavings,
        annualizedEstimate: days > 0 ? (netSavings * DAYS_PER_YEAR) / days : 0,
      },
      cycles: {
        total: context.cycles,
        perDay: days > 0 ? context.cycles / days : 0,
      },
      occupancy: context.occupancy,
      monthly: [...this.monthly.values()]
        .sort((a, b) => a.month.localeCompare(b.month))
        .map((bucket) => ({
          month: bucket.month,
          surplusStored: copyTotal(bucket.surplusStored),
          negativePriceStored: copyTotal(bucket.negativePriceStored),
          gridCharged: copyTotal(bucket.gridCharged),
          batteryUsed: copyTotal(bucket.batteryUsed),
        })),
      gridChargeActions: [...this.gridActions],
      windowCount: context.windowCount,
      stepCount: this.stepCount,
    };
  }

  private bucketFor(timestampMs: number): MonthlyTotals {
    const month = monthKey(timestampMs);
    let bucket = this.monthly.get(month);
    if (!bucket) {
      bucket = {
        month,
        surplusStored: emptyTotal(),
        negativePriceStored: emptyTotal(),
        gridCharged: emptyTotal(),
        batteryUsed: emptyTotal(),
      };
      this.monthly.set(month, bucket);
    }
    return bucket;
  }
}
