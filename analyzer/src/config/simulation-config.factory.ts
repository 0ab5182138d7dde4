import { Injectable } from "@nestjs/common";
import { Energy, Percentage, Power, parseTemporal } from "@battery-savings/domain";
import type { BatteryConfig, SimulationOptions } from "@battery-savings/domain";

import type { AnalyzerConfigDocument } from "./config-document";

function optionalTime(value: string): Date | null {
  return value.trim() ? parseTemporal(value) : null;
}

/** Turns a validated configuration document into simulation inputs. */
@Injectable()
export class SimulationConfigFactory {
  createBattery(document: AnalyzerConfigDocument): BatteryConfig {
    const {battery, grid} = document;
    const maxPower = Power.fromWatts(grid.max_charge_power_w);
    return {
      capacityWh: Energy.fromWattHours(battery.capacity_wh).wattHours,
      minLevelFraction: Percentage.fromPercent(battery.depth_of_discharge_percent).ratio,
      chargeLossFraction: Percentage.fromPercent(battery.charging_loss_percent).ratio,
      dischargeLossFraction: Percentage.fromPercent(battery.discharging_loss_percent).ratio,
      maxGridChargePowerW: maxPower.watts > 0 ? maxPower.watts : null,
      gridChargeEnabled: grid.charge_enabled,
    };
  }

  createOptions(document: AnalyzerConfigDocument): SimulationOptions {
    const initialPercent = document.battery.initial_level_percent;
    return {
      windowMinutes: document.window.minutes,
      startTime: optionalTime(document.period.start_time),
      endTime: optionalTime(document.period.end_time),
      initialLevelWh: initialPercent === null
        ? null
        : Energy.fromWattHours(document.battery.capacity_wh).scale(Percentage.fromPercent(initialPercent)).wattHours,
      boundaryPolicy: document.optimizer.boundary_policy,
      recordTrace: document.output.dir.trim().length > 0,
    };
  }
}
