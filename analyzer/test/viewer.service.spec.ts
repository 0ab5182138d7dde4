import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, it } from "vitest";

import type { OccupancyStats, TracePoint } from "@battery-savings/domain";

import { buildChartConfiguration } from "../src/visualization/chart-config";
import {
  VIEWER_FILE_NAME,
  ViewerService,
  describeOccupancy,
  embedJson,
  renderViewerHtml,
} from "../src/visualization/viewer.service";

const workDir = mkdtempSync(join(tmpdir(), "battery-viewer-"));

afterAll(() => {
  rmSync(workDir, {recursive: true, force: true});
});

const TRACE: TracePoint[] = [
  {
    hour: "2024-05-01T10:00:00Z",
    batteryLevelWh: 1500,
    solarStoredWh: 1000,
    gridChargedWh: 0,
    batteryUsedWh: 0,
    exportedWh: 200,
    importedWh: 0,
  },
  {
    hour: "2024-05-01T11:00:00Z",
    batteryLevelWh: 750,
    solarStoredWh: 0,
    gridChargedWh: 250,
    batteryUsedWh: 1000,
    exportedWh: 0,
    importedWh: 100,
  },
];

const BATTERY = {capacityWh: 2000, floorWh: 500};

const OCCUPANCY: OccupancyStats = {
  totalSteps: 8,
  fullSteps: 1,
  emptySteps: 2,
  partialSteps: 5,
  timesFull: 1,
  timesEmpty: 1,
  fullPercent: 12.5,
  emptyPercent: 25,
  partialPercent: 62.5,
};

describe("embedJson", () => {
  it("escapes characters that would end a script element", () => {
    const embedded = embedJson({note: "</script>&\u2028"});

    expect(embedded).toBe("{\"note\":\"\\u003c/script\\u003e\\u0026\\u2028\"}");
    expect(JSON.parse(embedded)).toEqual({note: "</script>&\u2028"});
  });
});

describe("buildChartConfiguration", () => {
  it("plots levels and hourly flows in kWh", () => {
    const config = buildChartConfiguration(TRACE, BATTERY);

    expect(config.data.labels).toEqual(["2024-05-01T10:00:00Z", "2024-05-01T11:00:00Z"]);
    expect(config.data.datasets.map((dataset) => [dataset.label, dataset.data])).toEqual([
      ["Battery Level", [1.5, 0.75]],
      ["Min Level", [0.5, 0.5]],
      ["Max Level", [2, 2]],
      ["Solar Stored", [1, 0]],
      ["Grid Charged", [0, 0.25]],
      ["Battery Used", [0, 1]],
    ]);
  });
});

describe("renderViewerHtml", () => {
  it("embeds the occupancy line and the chart configuration", () => {
    const html = renderViewerHtml(TRACE, BATTERY, OCCUPANCY);

    expect(describeOccupancy(OCCUPANCY)).toBe("Battery State: 12.5% Full, 25.0% Empty, 62.5% Partial");
    expect(html).toContain("<div class=\"stats\">Battery State: 12.5% Full, 25.0% Empty, 62.5% Partial</div>");

    const match = /const chartConfig = (.*);\n/.exec(html);
    expect(match).not.toBeNull();
    const embedded: unknown = JSON.parse(match?.[1] ?? "null");
    expect(embedded).toEqual(JSON.parse(JSON.stringify(buildChartConfiguration(TRACE, BATTERY))));
  });
});

describe("ViewerService", () => {
  it("creates the output directory and writes the viewer", async () => {
    const outputDir = join(workDir, "reports", "may");

    const path = await new ViewerService().write(outputDir, TRACE, BATTERY, OCCUPANCY);

    expect(path).toBe(join(outputDir, VIEWER_FILE_NAME));
    const html = readFileSync(path, "utf-8");
    expect(html.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(html).toContain("new Chart(document.getElementById(\"chart\"), chartConfig);");
  });
});
