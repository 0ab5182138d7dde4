export { EnergyPrice } from "./price";
export { Power } from "./power";
export { Energy } from "./energy";
export { Duration } from "./duration";
export { TimeSlot } from "./time-slot";
export { Scalar } from "./scalar";
export { Percentage } from "./percentage";
export { parseTemporal, monthKey, hourKey } from "./parsing";
export {
  ReadingSeries,
  parseReadingDocument,
  readingDocumentSchema,
  readingRecordSchema,
} from "./reading";
export type { Reading, ReadingDocument, ReadingInput, ReadingRecord } from "./reading";
export {
  describeError,
  ConfigurationError,
  InputDataError,
  InvariantViolationError,
} from "./errors";
export type { InvariantContext } from "./errors";
export * from "./battery";
export * from "./simulation";
