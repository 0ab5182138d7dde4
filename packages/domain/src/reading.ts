import { z } from "zod";

import { Duration } from "./duration";
import { InputDataError } from "./errors";
import { parseTemporal } from "./parsing";
import { TimeSlot } from "./time-slot";

const DEFAULT_STEP_MINUTES = 1;

export const readingRecordSchema = z.object({
  Wh: z.number().finite(),
  importPrice: z.number().finite(),
  exportPrice: z.number().finite(),
});

export const readingDocumentSchema = z.record(z.string(), readingRecordSchema);

export type ReadingRecord = z.infer<typeof readingRecordSchema>;
export type ReadingDocument = z.infer<typeof readingDocumentSchema>;

export interface ReadingInput {
  timestampMs: number;
  netEnergyWh: number;
  importPrice: number;
  exportPrice: number;
}

/** One time step. Positive `netEnergyWh` is surplus, negative is deficit. */
export interface Reading {
  readonly timestamp: string;
  readonly timestampMs: number;
  readonly netEnergyWh: number;
  readonly importPrice: number;
  readonly exportPrice: number;
  readonly durationMinutes: number;
}

/**
 * Time-ordered, validated readings. Instances are immutable; clipping returns a
 * view over the same reading objects so step durations stay those of the full
 * series.
 */
export class ReadingSeries implements Iterable<Reading> {
  private constructor(private readonly readings: readonly Reading[]) {
  }

  static fromInputs(inputs: ReadingInput[]): ReadingSeries {
    const sorted = [...inputs].sort((a, b) => a.timestampMs - b.timestampMs);
    for (let idx = 1; idx < sorted.length; idx += 1) {
      if (sorted[idx].timestampMs === sorted[idx - 1].timestampMs) {
        throw new InputDataError(
          `duplicate timestamp ${new Date(sorted[idx].timestampMs).toISOString()}`,
        );
      }
    }

    const readings = sorted.map<Reading>((input, idx) => {
      const next = sorted[idx + 1];
      const previous = sorted[idx - 1];
      let gapMs: number | null = null;
      if (next) {
        gapMs = next.timestampMs - input.timestampMs;
      } else if (previous) {
        gapMs = input.timestampMs - previous.timestampMs;
      }
      const durationMinutes = gapMs === null
        ? DEFAULT_STEP_MINUTES
        : Duration.fromMilliseconds(gapMs).minutes;
      return Object.freeze({
        timestamp: new Date(input.timestampMs).toISOString(),
        timestampMs: input.timestampMs,
        netEnergyWh: input.netEnergyWh,
        importPrice: input.importPrice,
        exportPrice: input.exportPrice,
        durationMinutes,
      });
    });
    return new ReadingSeries(Object.freeze(readings));
  }

  get length(): number {
    return this.readings.length;
  }

  isEmpty(): boolean {
    return this.readings.length === 0;
  }

  at(index: number): Reading {
    const reading = this.readings[index];
    if (!reading) {
      throw new RangeError(`Reading index ${index} out of range (length=${this.readings.length})`);
    }
    return reading;
  }

  slice(start: number, end: number): readonly Reading[] {
    return this.readings.slice(start, end);
  }

  /** Index of the first reading at or after `timestampMs`, or `length` when none. */
  indexAtOrAfter(timestampMs: number): number {
    let low = 0;
    let high = this.readings.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.readings[mid].timestampMs < timestampMs) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  /** Readings within `[start, end]`, both bounds inclusive and optional. */
  clip(start: Date | null, end: Date | null): ReadingSeries {
    const from = start ? this.indexAtOrAfter(start.getTime()) : 0;
    const to = end ? this.indexAtOrAfter(end.getTime() + 1) : this.readings.length;
    if (from === 0 && to === this.readings.length) {
      return this;
    }
    return new ReadingSeries(this.readings.slice(from, Math.max(from, to)));
  }

  /** From the first timestamp to the end of the last step. */
  span(): TimeSlot {
    const first = this.at(0);
    const last = this.at(this.readings.length - 1);
    return TimeSlot.fromTimestamps(
      first.timestampMs,
      last.timestampMs + Duration.fromMinutes(last.durationMinutes).milliseconds,
    );
  }

  [Symbol.iterator](): Iterator<Reading> {
    return this.readings[Symbol.iterator]();
  }
}

/** Validates a raw input document and turns it into a sorted series. */
export function parseReadingDocument(raw: unknown, source?: string): ReadingSeries {
  const result = readingDocumentSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new InputDataError(`invalid reading data (${details})`, source);
  }

  const inputs: ReadingInput[] = [];
  for (const [key, record] of Object.entries(result.data)) {
    const timestamp = parseTemporal(key);
    if (!timestamp) {
      throw new InputDataError(`invalid timestamp key '${key}'`, source);
    }
    inputs.push({
      timestampMs: timestamp.getTime(),
      netEnergyWh: record.Wh,
      importPrice: record.importPrice,
      exportPrice: record.exportPrice,
    });
  }
  if (inputs.length === 0) {
    throw new InputDataError("input contains no readings", source);
  }

  try {
    return ReadingSeries.fromInputs(inputs);
  } catch (error) {
    if (error instanceof InputDataError && source) {
      throw new InputDataError(error.message, source);
    }
    throw error;
  }
}
