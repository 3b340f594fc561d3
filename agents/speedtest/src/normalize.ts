import { z } from "zod";
import {
  bitsPerSecondToMbps,
  bytesPerSecondToMbps,
  createSpeedRecord,
  InvalidRecordError,
  type ISpeedRecord,
  LEGACY_FIELD_COUNT,
  parseDecimal,
  SchemaError,
} from "@speedlog/lib";

const metric = z.number().finite();

/** Error report printed by the Ookla CLI in place of a result. */
const ProducerErrorSchema = z.object({
  type: z.literal("log"),
  level: z.literal("error"),
  message: z.string(),
});

/** Ookla `speedtest --format=json`: bandwidth in bytes per second. */
const CurrentSampleSchema = z.object({
  timestamp: z.string(),
  ping: z.object({ latency: metric }),
  download: z.object({ bandwidth: metric }),
  upload: z.object({ bandwidth: metric }),
});

/** `speedtest-cli --json`: flat values in bits per second. */
const LegacySampleSchema = z.object({
  timestamp: z.string(),
  ping: metric,
  download: metric,
  upload: metric,
});

export type CurrentSample = z.infer<typeof CurrentSampleSchema>;
export type LegacySample = z.infer<typeof LegacySampleSchema>;

export type RawSample =
  | { schema: "current"; sample: CurrentSample }
  | { schema: "legacy"; sample: LegacySample }
  | { schema: "legacy-text"; sample: LegacySample };

const metricFields = ["ping", "download", "upload"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "sample"}: ${issue.message}`)
    .join("; ");
}

function parseWith<T>(
  schema: z.ZodType<T>,
  raw: Record<string, unknown>,
  name: string
): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SchemaError(`Invalid ${name} sample: ${describeIssues(result.error)}.`);
  }
  return result.data;
}

function parseTextNumber(name: string, value: string): number {
  const parsed = parseDecimal(value);
  if (Number.isNaN(parsed)) {
    throw new SchemaError(`Invalid legacy text sample: ${name} "${value}" is not numeric.`);
  }
  return parsed;
}

function parseLegacyText(text: string): LegacySample {
  const fields = text.split(",");
  if (fields.length !== LEGACY_FIELD_COUNT) {
    throw new SchemaError(
      `Invalid legacy text sample: expected ${LEGACY_FIELD_COUNT} comma-separated fields ` +
        `(timestamp,ping,download,upload), got ${fields.length}.`
    );
  }
  const [timestamp, ping, download, upload] = fields;
  return {
    timestamp: timestamp.trim(),
    ping: parseTextNumber("ping", ping),
    download: parseTextNumber("download", download),
    upload: parseTextNumber("upload", upload),
  };
}

function isEmpty(raw: unknown): boolean {
  return (
    raw === undefined ||
    raw === null ||
    (typeof raw === "string" && raw.trim() === "") ||
    (isRecord(raw) && Object.keys(raw).length === 0)
  );
}

/**
 * Works out which producer schema `raw` follows from its structure: metrics
 * that are all objects are the current schema, metrics that are all plain
 * values the legacy one. Anything in between is rejected rather than guessed.
 */
export function detectSchema(raw: unknown): RawSample {
  if (isEmpty(raw)) {
    throw new SchemaError("Measurement produced no data.");
  }
  if (typeof raw === "string") {
    return { schema: "legacy-text", sample: parseLegacyText(raw) };
  }
  if (!isRecord(raw)) {
    throw new SchemaError(
      `Unrecognised sample: expected an object or text, got ${Array.isArray(raw) ? "array" : typeof raw}.`
    );
  }

  const producerError = ProducerErrorSchema.safeParse(raw);
  if (producerError.success) {
    throw new SchemaError(`Measurement failed: ${producerError.data.message}`);
  }

  const nested = metricFields.filter((field) => isRecord(raw[field]));
  if (nested.length === metricFields.length) {
    return { schema: "current", sample: parseWith(CurrentSampleSchema, raw, "current") };
  }
  if (nested.length === 0) {
    return { schema: "legacy", sample: parseWith(LegacySampleSchema, raw, "legacy") };
  }
  throw new SchemaError(
    `Unrecognised sample: ${nested.join(", ")} nested but ` +
      `${metricFields.filter((field) => !nested.includes(field)).join(", ")} flat.`
  );
}

function toRecord(raw: RawSample): ISpeedRecord {
  switch (raw.schema) {
    case "current":
      return createSpeedRecord({
        timestamp: raw.sample.timestamp,
        ping_ms: raw.sample.ping.latency,
        download_mbps: bytesPerSecondToMbps(raw.sample.download.bandwidth),
        upload_mbps: bytesPerSecondToMbps(raw.sample.upload.bandwidth),
      });
    case "legacy":
    case "legacy-text":
      return createSpeedRecord({
        timestamp: raw.sample.timestamp,
        ping_ms: raw.sample.ping,
        download_mbps: bitsPerSecondToMbps(raw.sample.download),
        upload_mbps: bitsPerSecondToMbps(raw.sample.upload),
      });
  }
}

export function normalize(raw: unknown): ISpeedRecord {
  const detected = detectSchema(raw);
  try {
    return toRecord(detected);
  } catch (err) {
    if (err instanceof InvalidRecordError) {
      throw new SchemaError(`Invalid ${detected.schema} sample: ${err.message}`);
    }
    throw err;
  }
}
