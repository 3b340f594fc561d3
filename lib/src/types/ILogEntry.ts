import type { ISpeedRecord } from "./ISpeedRecord";

export interface ILogEntry {
  readonly record: ISpeedRecord;
  /** Epoch timestamp (milliseconds) at which the endpoint accepted the record. */
  readonly ingestTime: number;
}
