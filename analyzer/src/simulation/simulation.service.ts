import { Injectable, Logger } from "@nestjs/common";
import { Energy, batteryFloor } from "@battery-savings/domain";
import type {
  BatteryConfig,
  ReadingSeries,
  SavingsSummary,
  SimulationOptions,
  TracePoint,
} from "@battery-savings/domain";

import { BatterySimulator } from "./battery-simulator";
import { planWindow } from "./dispatch-optimizer";
import { SavingsAggregator } from "./savings-aggregator";
import { TraceRecorder } from "./trace-recorder";
import { segmentWindows } from "./window-segmenter";

export interface SimulationResult {
  summary: SavingsSummary;
  /** Hourly trace; `null` unless requested through `recordTrace`. */
  trace: TracePoint[] | null;
}

@Injectable()
export class SimulationService {
  private readonly logger = new Logger(SimulationService.name);

  run(series: ReadingSeries, battery: BatteryConfig, options: SimulationOptions): SimulationResult {
    const windows = segmentWindows(series, options.windowMinutes, {
      startTime: options.startTime,
      endTime: options.endTime,
    });
    const initialLevelWh = options.initialLevelWh ?? batteryFloor(battery).wattHours;
    const simulator = new BatterySimulator(battery, initialLevelWh);
    const aggregator = new SavingsAggregator();
    const trace = options.recordTrace ? new TraceRecorder() : null;

    this.logger.log(
      `Simulating ${windows.readingCount} readings in ${options.windowMinutes}-minute windows ` +
      `(capacity ${Energy.fromWattHours(battery.capacityWh).kilowattHours.toFixed(1)} kWh, ` +
      `grid charge ${battery.gridChargeEnabled ? "on" : "off"}, policy ${options.boundaryPolicy})`,
    );

    let windowCount = 0;
    for (const window of windows) {
      const plan = planWindow({
        readings: window.readings,
        startLevelWh: simulator.state.batteryLevelWh,
        battery,
        boundaryPolicy: options.boundaryPolicy,
      });
      const flows = simulator.applyWindow(window.index, window.readings, plan.steps);
      for (const flow of flows) {
        aggregator.record(flow);
        trace?.record(flow);
      }
      aggregator.recordPairings(plan.pairings);
      windowCount += 1;
      this.logger.debug(
        `Window ${window.index} (${window.slot.start.toISOString()}): ${window.readings.length} steps, ` +
        `level ${simulator.state.batteryLevelWh.toFixed(1)} Wh, running net ${aggregator.netSavings().toFixed(4)}`,
      );
    }

    const summary = aggregator.summarize({
      span: windows.span(),
      capacityWh: battery.capacityWh,
      floorWh: batteryFloor(battery).wattHours,
      finalLevelWh: simulator.state.batteryLevelWh,
      cycles: simulator.cycles,
      occupancy: simulator.occupancyStats(),
      windowCount,
    });
    this.logger.log(
      `Simulation finished: ${windowCount} windows, net savings ${summary.financial.netSavings.toFixed(2)}`,
    );
    return {summary, trace: trace ? trace.toPoints() : null};
  }
}
