import { ConfigurationError, parseTemporal } from "@battery-savings/domain";

import type { AnalyzerConfigDocument } from "./config-document";

function requireRange(
  value: number,
  name: string,
  {min, max, minInclusive = true, maxInclusive = false}: {
    min: number;
    max: number;
    minInclusive?: boolean;
    maxInclusive?: boolean;
  },
): void {
  const aboveMin = minInclusive ? value >= min : value > min;
  const belowMax = maxInclusive ? value <= max : value < max;
  if (!Number.isFinite(value) || !aboveMin || !belowMax) {
    const lower = minInclusive ? "[" : "(";
    const upper = maxInclusive ? "]" : ")";
    throw new ConfigurationError(`${name} must be in ${lower}${min}, ${max}${upper}, got ${value}`);
  }
}

function optionalTime(value: string, name: string): Date | null {
  if (!value.trim()) {
    return null;
  }
  const parsed = parseTemporal(value);
  if (!parsed) {
    throw new ConfigurationError(`${name} '${value}' is not an ISO-8601 timestamp`);
  }
  return parsed;
}

/** Rejects configurations the simulation cannot run with. */
export function validateAnalyzerConfig(document: AnalyzerConfigDocument): void {
  if (!document.input.file.trim()) {
    throw new ConfigurationError("No input file given; pass it as the first argument or with --input");
  }
  requireRange(document.window.minutes, "window", {min: 0, max: Number.POSITIVE_INFINITY, minInclusive: false});
  requireRange(document.battery.capacity_wh, "battery-capacity", {
    min: 0,
    max: Number.POSITIVE_INFINITY,
    minInclusive: false,
  });
  requireRange(document.battery.depth_of_discharge_percent, "depth-of-discharge", {min: 0, max: 100});
  requireRange(document.battery.charging_loss_percent, "charging-loss", {min: 0, max: 100});
  requireRange(document.battery.discharging_loss_percent, "discharging-loss", {min: 0, max: 100});
  requireRange(document.grid.max_charge_power_w, "max-grid-power", {min: 0, max: Number.POSITIVE_INFINITY});

  const initialLevel = document.battery.initial_level_percent;
  if (initialLevel !== null) {
    requireRange(initialLevel, "initial-level", {
      min: document.battery.depth_of_discharge_percent,
      max: 100,
      maxInclusive: true,
    });
  }

  const start = optionalTime(document.period.start_time, "start-time");
  const end = optionalTime(document.period.end_time, "end-time");
  if (start && end && start.getTime() > end.getTime()) {
    throw new ConfigurationError(
      `start-time ${start.toISOString()} is after end-time ${end.toISOString()}`,
    );
  }
}
