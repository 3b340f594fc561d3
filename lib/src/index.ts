export type { ISpeedRecord } from "./types/ISpeedRecord";
export type { ILogEntry } from "./types/ILogEntry";
export type { IAppendOnlyStore } from "./types/IAppendOnlyStore";
export {
  SchemaError,
  MalformedPayloadError,
  InvalidRecordError,
  TransportFailure,
} from "./errors";
export {
  BITS_PER_BYTE,
  BITS_PER_MEGABIT,
  bitsPerSecondToMbps,
  bytesPerSecondToMbps,
  createSpeedRecord,
  isIsoTimestamp,
  parseDecimal,
  toUtcTimestamp,
} from "./record";
export {
  LEGACY_FIELD_COUNT,
  SpeedPayloadSchema,
  LegacyPayloadSchema,
  wireProtocols,
  toSpeedPayload,
  toLegacyPayload,
  toWirePayload,
} from "./wire";
export type { SpeedPayload, LegacyPayload, WireProtocol } from "./wire";
export { requireOption, numberOption, choiceOption } from "./options";
