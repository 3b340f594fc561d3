import { z } from "zod";
import type { ISpeedRecord } from "./types/ISpeedRecord";

export const LEGACY_FIELD_COUNT = 4;

/** Payload of the current protocol. Throughput values are in Mbps. */
export const SpeedPayloadSchema = z.object({
  timestamp: z.string(),
  ping: z.number(),
  download: z.number(),
  upload: z.number(),
});

/** Payload of the legacy protocol: `"<timestamp>,<ping>,<download>,<upload>"`. */
export const LegacyPayloadSchema = z.object({
  data: z.string(),
});

export type SpeedPayload = z.infer<typeof SpeedPayloadSchema>;
export type LegacyPayload = z.infer<typeof LegacyPayloadSchema>;

export type WireProtocol = "current" | "legacy";
export const wireProtocols: readonly WireProtocol[] = ["current", "legacy"];

export function toSpeedPayload(record: ISpeedRecord): SpeedPayload {
  return {
    timestamp: record.timestamp,
    ping: record.ping_ms,
    download: record.download_mbps,
    upload: record.upload_mbps,
  };
}

export function toLegacyPayload(record: ISpeedRecord): LegacyPayload {
  return {
    data: [
      record.timestamp,
      record.ping_ms,
      record.download_mbps,
      record.upload_mbps,
    ].join(","),
  };
}

export function toWirePayload(
  record: ISpeedRecord,
  protocol: WireProtocol
): SpeedPayload | LegacyPayload {
  return protocol === "legacy" ? toLegacyPayload(record) : toSpeedPayload(record);
}
