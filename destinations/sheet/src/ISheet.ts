export type CellValue = string | number;

/** A table addressed by 1-based row numbers, row 1 being the header. */
export interface ISheet {
  /** Insert an empty row so that it becomes row `row`, shifting later rows down. */
  insertRowBefore(row: number): Promise<void>;
  /** Overwrite the cells of row `row` starting from the first column. */
  setValues(row: number, values: readonly CellValue[]): Promise<void>;
}
