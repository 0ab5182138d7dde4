import type { LogLevel } from "@nestjs/common";

/** Nest levels from most to least severe; a threshold enables itself and everything before it. */
const SEVERITY_ORDER: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

const LEVEL_NAMES = new Map<string, LogLevel>([
  ["fatal", "fatal"],
  ["error", "error"],
  ["warn", "warn"],
  ["warning", "warn"],
  ["info", "log"],
  ["log", "log"],
  ["debug", "debug"],
  ["verbose", "verbose"],
]);

const DEFAULT_THRESHOLD: LogLevel = "log";

export interface ResolvedLogLevels {
  levels: LogLevel[];
  threshold: LogLevel;
  /** The configured name was not recognised and the default threshold applies. */
  fallbackUsed: boolean;
}

/** Maps `--log-level` (fatal, error, warn, info, debug, verbose) to the levels Nest should print. */
export function resolveLogLevels(name: string): ResolvedLogLevels {
  const requested = LEVEL_NAMES.get(name.trim().toLowerCase());
  const threshold = requested ?? DEFAULT_THRESHOLD;
  return {
    levels: SEVERITY_ORDER.slice(0, SEVERITY_ORDER.indexOf(threshold) + 1),
    threshold,
    fallbackUsed: requested === undefined,
  };
}
