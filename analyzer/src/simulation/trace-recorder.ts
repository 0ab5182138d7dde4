import { hourKey } from "@battery-savings/domain";
import type { StepFlow, TracePoint } from "@battery-savings/domain";

/**
 * Down-samples step flows into hourly buckets for the viewer. Flows are summed
 * per hour; the battery level is the level after the last step of the hour.
 */
export class TraceRecorder {
  private readonly points: TracePoint[] = [];
  private current: TracePoint | null = null;

  record(flow: StepFlow): void {
    const hour = hourKey(flow.timestampMs);
    if (!this.current || this.current.hour !== hour) {
      this.current = {
        hour,
        batteryLevelWh: flow.levelAfterWh,
        solarStoredWh: 0,
        gridChargedWh: 0,
        batteryUsedWh: 0,
        exportedWh: 0,
        importedWh: 0,
      };
      this.points.push(this.current);
    }
    this.current.batteryLevelWh = flow.levelAfterWh;
    this.current.solarStoredWh += flow.surplusToBatteryWh;
    this.current.gridChargedWh += flow.gridToBatteryWh;
    this.current.batteryUsedWh += flow.batteryToLoadWh;
    this.current.exportedWh += flow.surplusToGridWh;
    this.current.importedWh += flow.gridToLoadWh;
  }

  get size(): number {
    return this.points.length;
  }

  toPoints(): TracePoint[] {
    return this.points.map((point) => ({...point}));
  }
}
