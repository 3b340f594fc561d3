import moment from "moment-timezone";
import type { ISpeedRecord } from "@speedlog/lib";
import { normalize } from "./normalize";
import type { TransportResult } from "./transport";

export interface CollectorDependencies {
  measure(): Promise<unknown>;
  send(record: ISpeedRecord): Promise<TransportResult>;
}

export interface CollectionResult {
  record: ISpeedRecord;
  response: TransportResult;
}

/** One scheduled tick: measure, normalize, send. */
export async function collect(
  deps: CollectorDependencies,
  options: { timezone?: string } = {}
): Promise<CollectionResult> {
  const raw = await deps.measure();
  const record = normalize(raw);
  const localTime = moment
    .tz(record.timestamp, options.timezone ?? "UTC")
    .format("YYYY-MM-DD HH:mm:ss z");
  console.log(
    `Measured at ${localTime}: ping ${record.ping_ms} ms, download ${record.download_mbps} Mbps, upload ${record.upload_mbps} Mbps.`
  );
  const response = await deps.send(record);
  console.log(`Sent sample ${record.timestamp}: ${response.status} ${response.body.trim()}`);
  return { record, response };
}
