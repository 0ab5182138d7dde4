import convict from "convict";
import yaml from "js-yaml";

import { BOUNDARY_POLICIES, ConfigurationError, describeError } from "@battery-savings/domain";
import type { BoundaryPolicy } from "@battery-savings/domain";

convict.addParser({extension: ["yml", "yaml"], parse: yaml.load});

export interface AnalyzerConfigDocument {
  input: {
    file: string;
  };
  config_file: string;
  window: {
    minutes: number;
  };
  battery: {
    capacity_wh: number;
    depth_of_discharge_percent: number;
    charging_loss_percent: number;
    discharging_loss_percent: number;
    initial_level_percent: number | null;
  };
  grid: {
    /** 0 disables the rate limit. */
    max_charge_power_w: number;
    charge_enabled: boolean;
  };
  period: {
    start_time: string;
    end_time: string;
  };
  optimizer: {
    boundary_policy: BoundaryPolicy;
  };
  output: {
    dir: string;
  };
  logging: {
    level: string;
  };
}

const CONVICT_SCHEMA: convict.Schema<AnalyzerConfigDocument> = {
  input: {
    file: {
      default: "",
      doc: "Input JSON (or gzip-compressed JSON) file mapping ISO timestamps to readings. Also accepted as the first positional argument.",
      format: String,
      env: "BATTERY_INPUT",
      arg: "input",
    },
  },
  config_file: {
    default: "",
    doc: "Optional YAML file with any of these settings.",
    format: String,
    env: "BATTERY_CONFIG",
    arg: "config",
  },
  window: {
    minutes: {
      default: 1440,
      doc: "Optimization window size in minutes.",
      format: Number,
      env: "BATTERY_WINDOW_MINUTES",
      arg: "window",
    },
  },
  battery: {
    capacity_wh: {
      default: 24000,
      doc: "Battery capacity in Wh.",
      format: Number,
      env: "BATTERY_CAPACITY_WH",
      arg: "battery-capacity",
    },
    depth_of_discharge_percent: {
      default: 5,
      doc: "Share of capacity that is never discharged, in percent.",
      format: Number,
      env: "BATTERY_DEPTH_OF_DISCHARGE",
      arg: "depth-of-discharge",
    },
    charging_loss_percent: {
      default: 7.5,
      doc: "Energy lost while charging, in percent.",
      format: Number,
      env: "BATTERY_CHARGING_LOSS",
      arg: "charging-loss",
    },
    discharging_loss_percent: {
      default: 7.5,
      doc: "Energy lost while discharging, in percent.",
      format: Number,
      env: "BATTERY_DISCHARGING_LOSS",
      arg: "discharging-loss",
    },
    initial_level_percent: {
      default: null,
      nullable: true,
      doc: "Battery level at the first step, in percent of capacity. Defaults to the depth-of-discharge floor.",
      format: Number,
      env: "BATTERY_INITIAL_LEVEL",
      arg: "initial-level",
    },
  },
  grid: {
    max_charge_power_w: {
      default: 17250,
      doc: "Maximum grid charging power in W; 0 leaves the rate unconstrained.",
      format: Number,
      env: "BATTERY_MAX_GRID_POWER",
      arg: "max-grid-power",
    },
    charge_enabled: {
      default: true,
      doc: "Allow charging the battery from the grid (--no-grid-charge disables it).",
      format: Boolean,
      env: "BATTERY_GRID_CHARGE",
      arg: "grid-charge",
    },
  },
  period: {
    start_time: {
      default: "",
      doc: "Only analyze readings at or after this ISO timestamp.",
      format: String,
      env: "BATTERY_START_TIME",
      arg: "start-time",
    },
    end_time: {
      default: "",
      doc: "Only analyze readings at or before this ISO timestamp.",
      format: String,
      env: "BATTERY_END_TIME",
      arg: "end-time",
    },
  },
  optimizer: {
    boundary_policy: {
      default: "carry-surplus",
      doc: "What happens to surplus not matched inside a window: carry-surplus stores it, window-only exports it.",
      format: [...BOUNDARY_POLICIES],
      env: "BATTERY_BOUNDARY_POLICY",
      arg: "boundary-policy",
    },
  },
  output: {
    dir: {
      default: "",
      doc: "Directory for battery_viewer.html; no visualization is written when empty.",
      format: String,
      env: "BATTERY_OUTPUT_DIR",
      arg: "output-dir",
    },
  },
  logging: {
    level: {
      default: "info",
      doc: "Log level: fatal, error, warn, info, debug or verbose.",
      format: String,
      env: "BATTERY_LOG_LEVEL",
      arg: "log-level",
    },
  },
};

/** Options that never take a value on the command line. */
const FLAG_OPTIONS = new Set(["grid-charge", "no-grid-charge", "help", "h"]);

/**
 * First bare argument, skipping option values. Lets the input file be given
 * as `battery-savings data.json.gz` instead of `--input`.
 */
export function positionalInput(argv: readonly string[]): string | null {
  for (let idx = 0; idx < argv.length; idx += 1) {
    const token = argv[idx];
    if (token === "--") {
      return argv[idx + 1] ?? null;
    }
    if (token.startsWith("-")) {
      const name = token.replace(/^-+/, "");
      if (!name.includes("=") && !FLAG_OPTIONS.has(name)) {
        idx += 1;
      }
      continue;
    }
    return token;
  }
  return null;
}

/**
 * Builds the configuration document from defaults, the optional YAML file,
 * environment variables and command-line arguments, later sources winning.
 */
export function loadConfigDocument(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): AnalyzerConfigDocument {
  try {
    const config = convict(CONVICT_SCHEMA, {args: [...argv], env});
    const configFile = config.get("config_file");
    if (configFile) {
      config.loadFile(configFile);
    }
    if (!config.get("input.file")) {
      const positional = positionalInput(argv);
      if (positional) {
        config.set("input.file", positional);
      }
    }
    config.validate({allowed: "strict"});
    return config.getProperties();
  } catch (error) {
    throw new ConfigurationError(`Invalid configuration: ${describeError(error)}`);
  }
}

/** Every option with its flag, environment variable and default, for `--help`. */
export function describeOptions(): string {
  const lines: string[] = [];
  const visit = (node: Record<string, unknown>): void => {
    for (const value of Object.values(node)) {
      if (!isRecord(value)) {
        continue;
      }
      if (typeof value.doc === "string" && "default" in value) {
        const arg = typeof value.arg === "string" ? `--${value.arg}` : "";
        const env = typeof value.env === "string" ? value.env : "";
        lines.push(`  ${arg.padEnd(22)} ${env.padEnd(28)} ${value.doc} (default: ${JSON.stringify(value.default)})`);
      } else {
        visit(value);
      }
    }
  };
  visit(toRecord(CONVICT_SCHEMA));
  return lines.join("\n");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}
