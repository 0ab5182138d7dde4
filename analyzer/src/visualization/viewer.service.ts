import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import type { OccupancyStats, TracePoint } from "@battery-savings/domain";

import { buildChartConfiguration } from "./chart-config";
import type { ViewerBattery } from "./chart-config";

export const VIEWER_FILE_NAME = "battery_viewer.html";

const CHART_JS_URL = "https://cdn.jsdelivr.net/npm/chart.js@4.4.1/dist/chart.umd.min.js";

/** JSON safe to place inside a `<script>` element. */
export function embedJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export function describeOccupancy(occupancy: OccupancyStats): string {
  return `Battery State: ${occupancy.fullPercent.toFixed(1)}% Full, ` +
    `${occupancy.emptyPercent.toFixed(1)}% Empty, ${occupancy.partialPercent.toFixed(1)}% Partial`;
}

export function renderViewerHtml(trace: readonly TracePoint[], battery: ViewerBattery, occupancy: OccupancyStats): string {
  const chartConfig = buildChartConfiguration(trace, battery);
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Battery Analysis Visualization</title>
  <script src="${CHART_JS_URL}"></script>
  <style>
    body { margin: 0; padding: 20px; font-family: Arial, sans-serif; }
    .chart-container { position: relative; height: 800px; }
    .stats { margin-bottom: 20px; }
  </style>
</head>
<body>
  <div class="stats">${describeOccupancy(occupancy)}</div>
  <div class="chart-container"><canvas id="chart"></canvas></div>
  <script>
    const chartConfig = ${embedJson(chartConfig)};
    new Chart(document.getElementById("chart"), chartConfig);
  </script>
</body>
</html>
`;
}

@Injectable()
export class ViewerService {
  private readonly logger = new Logger(ViewerService.name);

  /** Writes the viewer into `outputDir` (created when missing) and returns its path. */
  async write(
    outputDir: string,
    trace: readonly TracePoint[],
    battery: ViewerBattery,
    occupancy: OccupancyStats,
  ): Promise<string> {
    await mkdir(outputDir, {recursive: true});
    const path = join(outputDir, VIEWER_FILE_NAME);
    await writeFile(path, renderViewerHtml(trace, battery, occupancy), "utf-8");
    this.logger.log(`Visualization written to ${path} (${trace.length} hourly points)`);
    return path;
  }
}
