import moment from "moment-timezone";
import { InvalidRecordError } from "./errors";
import type { ISpeedRecord } from "./types/ISpeedRecord";

export const BITS_PER_BYTE = 8;
export const BITS_PER_MEGABIT = 1_000_000;

export const bitsPerSecondToMbps = (bps: number) => bps / BITS_PER_MEGABIT;
export const bytesPerSecondToMbps = (bytesPerSecond: number) =>
  (bytesPerSecond * BITS_PER_BYTE) / BITS_PER_MEGABIT;

// A full date-time with a zone designator. moment.ISO_8601 alone also takes
// bare dates, years and week dates.
const TIMESTAMP_FORMATS = ["YYYY-MM-DDTHH:mm:ssZ", "YYYY-MM-DDTHH:mm:ss.SSSSZ"];

function parseIsoTimestamp(value: string): moment.Moment {
  return moment.utc(value, TIMESTAMP_FORMATS, true);
}

export function isIsoTimestamp(value: string): boolean {
  return parseIsoTimestamp(value).isValid();
}

/**
 * Returns the timestamp in UTC. Strings already in UTC designator form are
 * returned unchanged so no sub-millisecond digits are lost.
 */
export function toUtcTimestamp(value: string): string {
  const parsed = parseIsoTimestamp(value);
  if (!parsed.isValid()) {
    throw new InvalidRecordError(`Timestamp "${value}" is not an ISO-8601 date-time.`);
  }
  return value.endsWith("Z") ? value : parsed.toISOString();
}

function checkMetric(name: keyof ISpeedRecord, value: number) {
  if (!Number.isFinite(value)) {
    throw new InvalidRecordError(`${name} must be a finite number, got ${value}.`);
  }
  if (value < 0) {
    throw new InvalidRecordError(`${name} must not be negative, got ${value}.`);
  }
}

/**
 * Parses a decimal number such as `23` or `78.08`. Anything else, including
 * hex, exponent notation and blank text, gives NaN.
 */
export function parseDecimal(text: string): number {
  const trimmed = text.trim();
  return /^\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

/** Validates the fields and returns a frozen record with a UTC timestamp. */
export function createSpeedRecord(fields: ISpeedRecord): ISpeedRecord {
  const timestamp = toUtcTimestamp(fields.timestamp);
  checkMetric("ping_ms", fields.ping_ms);
  checkMetric("download_mbps", fields.download_mbps);
  checkMetric("upload_mbps", fields.upload_mbps);
  return Object.freeze({
    timestamp,
    ping_ms: fields.ping_ms,
    download_mbps: fields.download_mbps,
    upload_mbps: fields.upload_mbps,
  });
}
