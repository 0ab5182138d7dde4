import type { ChartConfiguration, ChartDataset } from "chart.js";
import { Energy } from "@battery-savings/domain";
import type { TracePoint } from "@battery-savings/domain";

export const LEVEL_BORDER = "rgb(128, 0, 128)";
export const FLOOR_BORDER = "rgb(220, 53, 69)";
export const CAPACITY_BORDER = "rgb(40, 167, 69)";
export const SOLAR_BORDER = "rgb(25, 135, 84)";
export const GRID_BORDER = "rgb(253, 126, 20)";
export const USED_BORDER = "rgb(13, 110, 253)";

export interface ViewerBattery {
  capacityWh: number;
  floorWh: number;
}

const toKwh = (wattHours: number): number => Energy.fromWattHours(wattHours).kilowattHours;

function flowDataset(label: string, color: string, values: number[]): ChartDataset<"line", number[]> {
  return {
    label,
    data: values,
    yAxisID: "flow",
    borderColor: color,
    backgroundColor: color,
    borderWidth: 1,
    pointRadius: 0,
    stepped: true,
    fill: false,
  };
}

/** Battery level on the left axis, hourly energy flows on the right, all in kWh. */
export function buildChartConfiguration(
  trace: readonly TracePoint[],
  battery: ViewerBattery,
): ChartConfiguration<"line", number[], string> {
  const labels = trace.map((point) => point.hour);
  const datasets: ChartDataset<"line", number[]>[] = [
    {
      label: "Battery Level",
      data: trace.map((point) => toKwh(point.batteryLevelWh)),
      yAxisID: "level",
      borderColor: LEVEL_BORDER,
      backgroundColor: LEVEL_BORDER,
      borderWidth: 2,
      pointRadius: 0,
      stepped: true,
      fill: false,
    },
    {
      label: "Min Level",
      data: trace.map(() => toKwh(battery.floorWh)),
      yAxisID: "level",
      borderColor: FLOOR_BORDER,
      borderDash: [6, 4],
      borderWidth: 1,
      pointRadius: 0,
      fill: false,
    },
    {
      label: "Max Level",
      data: trace.map(() => toKwh(battery.capacityWh)),
      yAxisID: "level",
      borderColor: CAPACITY_BORDER,
      borderDash: [6, 4],
      borderWidth: 1,
      pointRadius: 0,
      fill: false,
    },
    flowDataset("Solar Stored", SOLAR_BORDER, trace.map((point) => toKwh(point.solarStoredWh))),
    flowDataset("Grid Charged", GRID_BORDER, trace.map((point) => toKwh(point.gridChargedWh))),
    flowDataset("Battery Used", USED_BORDER, trace.map((point) => toKwh(point.batteryUsedWh))),
  ];

  return {
    type: "line",
    data: {labels, datasets},
    options: {
      animation: false,
      responsive: true,
      maintainAspectRatio: false,
      interaction: {mode: "index", intersect: false},
      plugins: {
        title: {display: true, text: "Battery State and Energy Flows"},
        legend: {position: "right"},
      },
      scales: {
        level: {
          type: "linear",
          position: "left",
          min: 0,
          max: toKwh(battery.capacityWh),
          title: {display: true, text: "Battery Level (kWh)"},
        },
        flow: {
          type: "linear",
          position: "right",
          beginAtZero: true,
          grid: {drawOnChartArea: false},
          title: {display: true, text: "Energy Flow (kWh)"},
        },
      },
    },
  };
}
