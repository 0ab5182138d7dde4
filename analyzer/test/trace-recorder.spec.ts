import { describe, expect, it } from "vitest";

import { TraceRecorder } from "../src/simulation/trace-recorder";
import { SERIES_START_MS, flowOf } from "./helpers";

const QUARTER_MS = 15 * 60_000;

describe("TraceRecorder", () => {
  it("sums flows per hour and keeps the last level of each hour", () => {
    const recorder = new TraceRecorder();
    recorder.record(flowOf({timestampMs: SERIES_START_MS, surplusToBatteryWh: 100, levelAfterWh: 100}));
    recorder.record(flowOf({timestampMs: SERIES_START_MS + QUARTER_MS, surplusToBatteryWh: 50, surplusToGridWh: 20, levelAfterWh: 150}));
    recorder.record(flowOf({timestampMs: SERIES_START_MS + 4 * QUARTER_MS, batteryToLoadWh: 80, gridToLoadWh: 5, levelAfterWh: 70}));
    recorder.record(flowOf({timestampMs: SERIES_START_MS + 5 * QUARTER_MS, gridToBatteryWh: 30, levelAfterWh: 100}));

    expect(recorder.size).toBe(2);
    expect(recorder.toPoints()).toEqual([
      {
        hour: "2024-05-01T00:00:00Z",
        batteryLevelWh: 150,
        solarStoredWh: 150,
        gridChargedWh: 0,
        batteryUsedWh: 0,
        exportedWh: 20,
        importedWh: 0,
      },
      {
        hour: "2024-05-01T01:00:00Z",
        batteryLevelWh: 100,
        solarStoredWh: 0,
        gridChargedWh: 30,
        batteryUsedWh: 80,
        exportedWh: 0,
        importedWh: 5,
      },
    ]);
  });

  it("hands out copies of its points", () => {
    const recorder = new TraceRecorder();
    recorder.record(flowOf({levelAfterWh: 10}));

    recorder.toPoints()[0].batteryLevelWh = 999;

    expect(recorder.toPoints()[0].batteryLevelWh).toBe(10);
  });
});
