import {
  createSpeedRecord,
  type IAppendOnlyStore,
  InvalidRecordError,
  type ISpeedRecord,
  LEGACY_FIELD_COUNT,
  LegacyPayloadSchema,
  MalformedPayloadError,
  parseDecimal,
  SpeedPayloadSchema,
} from "@speedlog/lib";

export const SUCCESS_TOKEN = "success";
export const INVALID_LEGACY_DATA = "Posted data is invalid.";

export interface IngestResponse {
  status: number;
  body: string;
}

export type ParsedPayload =
  | { protocol: "current"; record: ISpeedRecord }
  | { protocol: "legacy"; record: ISpeedRecord; fields: string[] };

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new MalformedPayloadError("Payload is not valid JSON.");
    }
    throw err;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseLegacy(json: Record<string, unknown>): ParsedPayload {
  const payload = LegacyPayloadSchema.safeParse(json);
  if (!payload.success) {
    throw new MalformedPayloadError(INVALID_LEGACY_DATA);
  }
  const fields = payload.data.data.split(",");
  if (fields.length !== LEGACY_FIELD_COUNT) {
    throw new MalformedPayloadError(INVALID_LEGACY_DATA);
  }
  const [timestamp, ping, download, upload] = fields;
  try {
    const record = createSpeedRecord({
      timestamp,
      ping_ms: parseDecimal(ping),
      download_mbps: parseDecimal(download),
      upload_mbps: parseDecimal(upload),
    });
    return { protocol: "legacy", record, fields };
  } catch (err) {
    if (err instanceof InvalidRecordError) {
      throw new MalformedPayloadError(INVALID_LEGACY_DATA);
    }
    throw err;
  }
}

function parseCurrent(json: Record<string, unknown>): ParsedPayload {
  const payload = SpeedPayloadSchema.safeParse(json);
  if (!payload.success) {
    const issues = payload.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new MalformedPayloadError(`Invalid payload: ${issues}.`);
  }
  try {
    const record = createSpeedRecord({
      timestamp: payload.data.timestamp,
      ping_ms: payload.data.ping,
      download_mbps: payload.data.download,
      upload_mbps: payload.data.upload,
    });
    return { protocol: "current", record };
  } catch (err) {
    if (err instanceof InvalidRecordError) {
      throw new MalformedPayloadError(`Invalid payload: ${err.message}`);
    }
    throw err;
  }
}

/** Objects with a `data` member are legacy payloads, any other object is current. */
export function parsePayload(payload: string | Buffer): ParsedPayload {
  const text = typeof payload === "string" ? payload : payload.toString("utf8");
  if (text.trim() === "") {
    throw new MalformedPayloadError("Payload is empty.");
  }
  const json = parseJson(text);
  if (!isRecord(json)) {
    throw new MalformedPayloadError("Payload must be a JSON object.");
  }
  return "data" in json ? parseLegacy(json) : parseCurrent(json);
}

export function formatConfirmation([timestamp, ping, download, upload]: string[]): string {
  return `timestamp: ${timestamp}, ping: ${ping}, download: ${download}, upload: ${upload}\n`;
}

/**
 * Validates one posted payload and appends it to the store. Nothing is
 * written unless the whole payload is valid.
 */
export class IngestHandler {
  constructor(
    private readonly store: IAppendOnlyStore,
    private readonly now: () => number = Date.now
  ) {}

  async handle(payload: string | Buffer): Promise<IngestResponse> {
    let parsed: ParsedPayload;
    try {
      parsed = parsePayload(payload);
    } catch (err) {
      if (err instanceof MalformedPayloadError) {
        console.warn(`Rejected payload: ${err.message}`);
        return { status: 400, body: `${err.message}\n` };
      }
      throw err;
    }
    await this.store.insertAtTop({ record: parsed.record, ingestTime: this.now() });
    console.log(`Inserted entry ${parsed.record.timestamp} (${parsed.protocol} protocol).`);
    return {
      status: 200,
      body: parsed.protocol === "legacy" ? formatConfirmation(parsed.fields) : SUCCESS_TOKEN,
    };
  }
}
