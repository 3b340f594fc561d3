import type { CellValue, ISheet } from "./ISheet";

export class MemorySheet implements ISheet {
  private readonly data: CellValue[][];

  constructor(header: readonly CellValue[]) {
    this.data = [[...header]];
  }

  async insertRowBefore(row: number): Promise<void> {
    checkRow(row, this.data.length + 1);
    this.data.splice(row - 1, 0, []);
  }

  async setValues(row: number, values: readonly CellValue[]): Promise<void> {
    checkRow(row, this.data.length);
    this.data[row - 1] = [...values];
  }

  /** Copy of every row, header included. */
  rows(): CellValue[][] {
    return this.data.map((row) => [...row]);
  }
}

export function checkRow(row: number, lastRow: number) {
  if (!Number.isInteger(row) || row < 2 || row > lastRow) {
    throw new RangeError(`Row ${row} is outside rows 2 to ${lastRow}.`);
  }
}
