export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Invalid user configuration; raised before any simulation work starts. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Unreadable or malformed input data. */
export class InputDataError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "InputDataError";
  }
}

export interface InvariantContext {
  windowIndex: number;
  timestamp: string;
  quantity: string;
  expected: number;
  observed: number;
}

/**
 * An internal defect: the simulator produced a state that breaks an energy or
 * bounds invariant. Never caught by the simulation code itself.
 */
export class InvariantViolationError extends Error {
  readonly context: InvariantContext;

  constructor(message: string, context: InvariantContext) {
    super(
      `${message} (window=${context.windowIndex}, step=${context.timestamp}, ${context.quantity}: ` +
      `expected=${context.expected}, observed=${context.observed})`,
    );
    this.name = "InvariantViolationError";
    this.context = context;
  }
}
