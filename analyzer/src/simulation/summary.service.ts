import { Injectable, Logger } from "@nestjs/common";
import { Energy } from "@battery-savings/domain";
import type { FlowTotal, MonthlyTotals, PairingRecord, SavingsSummary } from "@battery-savings/domain";

const RULE = "=".repeat(50);

const kwh = (wattHours: number): string => Energy.fromWattHours(wattHours).kilowattHours.toFixed(2);
const money = (value: number): string => value.toFixed(2);

type MonthlyField = Exclude<keyof MonthlyTotals, "month">;

function monthlyLines(
  monthly: readonly MonthlyTotals[],
  field: MonthlyField,
  pick: (total: FlowTotal) => string,
): string[] {
  return monthly
    .filter((bucket) => bucket[field].energyWh > 0)
    .map((bucket) => `  ${bucket.month}: ${pick(bucket[field])}`);
}

function describeAction(action: PairingRecord): string {
  return `  ${action.lotTimestamp ?? "window start"}: charged ${kwh(action.storedWh)} kWh at ${action.lotCostBasis.toFixed(4)}` +
    ` for ${action.demandTimestamp} at ${action.demandValue.toFixed(4)}`;
}

/** Plain-text report of a savings summary, one line per figure. */
@Injectable()
export class SummaryService {
  private readonly logger = new Logger(SummaryService.name);

  format(summary: SavingsSummary): string {
    this.logger.verbose(`Formatting summary for ${summary.stepCount} steps in ${summary.windowCount} windows`);
    const {totals, financial, occupancy, monthly} = summary;
    const kwhOf = (total: FlowTotal) => `${kwh(total.energyWh)} kWh`;
    const valueOf = (total: FlowTotal) => money(total.value);

    const lines: string[] = [
      "Optimized Battery Simulation Summary",
      RULE,
      "",
      `Period: ${summary.period.start} to ${summary.period.end} (${summary.period.days.toFixed(2)} days)`,
      "",
      "Battery Configuration:",
      `  Capacity: ${Energy.fromWattHours(summary.battery.capacityWh).kilowattHours.toFixed(1)} kWh`,
      `  Minimum level: ${kwh(summary.battery.floorWh)} kWh`,
      `  Final level: ${kwh(summary.battery.finalLevelWh)} kWh`,
      `  Cycles: ${summary.cycles.total.toFixed(2)} (${summary.cycles.perDay.toFixed(3)} per day)`,
      "",
      "Energy Flows:",
      `Excess energy stored: ${kwhOf(totals.surplusStored)}`,
      ...monthlyLines(monthly, "surplusStored", kwhOf),
      "",
      `Grid energy charged: ${kwhOf(totals.gridCharged)}`,
      ...monthlyLines(monthly, "gridCharged", kwhOf),
      "",
      `Battery energy used: ${kwhOf(totals.batteryUsed)}`,
      ...monthlyLines(monthly, "batteryUsed", kwhOf),
      "",
      `Forced export: ${kwh(totals.forcedExportWh)} kWh`,
      `Forced import: ${kwh(totals.forcedImportWh)} kWh`,
    ];
    if (totals.gridChargeCurtailedWh > 0) {
      lines.push(`Curtailed grid charge: ${kwh(totals.gridChargeCurtailedWh)} kWh`);
    }
    if (totals.negativePriceStored.energyWh > 0) {
      lines.push(
        `WARNING: surplus stored at negative export prices: ${kwhOf(totals.negativePriceStored)} ` +
        `(value ${valueOf(totals.negativePriceStored)})`,
      );
    }

    lines.push(
      "",
      "Financial Summary:",
      `Export value lost: ${money(financial.exportValueLost)}`,
      ...monthlyLines(monthly, "surplusStored", valueOf),
      "",
      `Grid charging cost: ${money(financial.gridChargingCost)}`,
      ...monthlyLines(monthly, "gridCharged", valueOf),
      "",
      `Import cost saved: ${money(financial.importCostSaved)}`,
      ...monthlyLines(monthly, "batteryUsed", valueOf),
      "",
    );
    if (financial.negativePriceImpact !== 0) {
      lines.push(`Negative-price storage impact: ${money(financial.negativePriceImpact)}`);
    }
    lines.push(
      `Net savings: ${money(financial.netSavings)}`,
      `Annualized savings (estimate): ${money(financial.annualizedEstimate)}`,
      "",
      "Battery State Statistics:",
      `Number of times battery was full: ${occupancy.timesFull}`,
      `Number of times battery was empty: ${occupancy.timesEmpty}`,
      `Battery was full ${occupancy.fullPercent.toFixed(1)}% of the time`,
      `Battery was empty ${occupancy.emptyPercent.toFixed(1)}% of the time`,
      `Battery was partially charged ${occupancy.partialPercent.toFixed(1)}% of the time`,
      "",
      "Grid Charging Actions (first 5):",
    );
    if (summary.gridChargeActions.length === 0) {
      lines.push("  none");
    } else {
      lines.push(...summary.gridChargeActions.map(describeAction));
    }
    return lines.join("\n");
  }
}
