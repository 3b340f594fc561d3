import type { IAppendOnlyStore, ILogEntry, ISpeedRecord } from "@speedlog/lib";
import type { CellValue, ISheet } from "./ISheet";
import { SerialQueue } from "./SerialQueue";

export type { CellValue, ISheet } from "./ISheet";
export { MemorySheet } from "./MemorySheet";
export { CsvSheet } from "./CsvSheet";
export { SerialQueue } from "./SerialQueue";

export const HEADER: readonly CellValue[] = [
  "timestamp",
  "ping_ms",
  "download_mbps",
  "upload_mbps",
];
export const HEADER_ROW = 1;
export const TOP_ROW = HEADER_ROW + 1;

export function toRow(record: ISpeedRecord): CellValue[] {
  return [
    record.timestamp,
    record.ping_ms,
    record.download_mbps,
    record.upload_mbps,
  ];
}

/**
 * Newest-first log kept in a sheet. Inserting is two sheet operations (open a
 * row under the header, then fill it), so insertions on one store are queued
 * and never interleave. Separate processes writing the same sheet are not
 * coordinated.
 */
export class SheetStore implements IAppendOnlyStore {
  private readonly queue = new SerialQueue();

  constructor(public readonly sheet: ISheet) {}

  insertAtTop(entry: ILogEntry): Promise<void> {
    return this.queue.run(async () => {
      await this.sheet.insertRowBefore(TOP_ROW);
      await this.sheet.setValues(TOP_ROW, toRow(entry.record));
    });
  }
}
