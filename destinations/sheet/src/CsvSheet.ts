import { promises as fs } from "fs";
import type { CellValue, ISheet } from "./ISheet";
import { checkRow } from "./MemorySheet";

function formatCell(value: CellValue): string {
  if (typeof value === "number") {
    return String(value);
  }
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatRow(values: readonly CellValue[]): string {
  return values.map(formatCell).join(",");
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * A sheet kept as a CSV file, one line per row. Every operation reads and
 * rewrites the whole file.
 */
export class CsvSheet implements ISheet {
  private constructor(public readonly path: string) {}

  /**
   * Open the sheet at `path`, creating it with `header` if it does not exist
   * or is empty. An existing sheet must start with the same header.
   */
  static async open(path: string, header: readonly CellValue[]): Promise<CsvSheet> {
    const headerLine = formatRow(header);
    try {
      await fs.writeFile(path, `${headerLine}\n`, { encoding: "utf8", flag: "wx" });
      console.log(`Created sheet ${path}`);
      return new CsvSheet(path);
    } catch (err) {
      if (!hasErrorCode(err, "EEXIST")) {
        throw err;
      }
    }

    const sheet = new CsvSheet(path);
    const lines = await sheet.readLines();
    if (lines.length === 0) {
      await sheet.writeLines([headerLine]);
      console.log(`Wrote header to empty sheet ${path}`);
    } else if (lines[0] !== headerLine) {
      throw new Error(`Sheet ${path} does not start with the header "${headerLine}".`);
    }
    return sheet;
  }

  async insertRowBefore(row: number): Promise<void> {
    const lines = await this.readLines();
    checkRow(row, lines.length + 1);
    lines.splice(row - 1, 0, "");
    await this.writeLines(lines);
  }

  async setValues(row: number, values: readonly CellValue[]): Promise<void> {
    const lines = await this.readLines();
    checkRow(row, lines.length);
    lines[row - 1] = formatRow(values);
    await this.writeLines(lines);
  }

  private async readLines(): Promise<string[]> {
    let text: string;
    try {
      text = await fs.readFile(this.path, { encoding: "utf8" });
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) {
        throw new Error(`Sheet ${this.path} no longer exists.`, { cause: err });
      }
      throw err;
    }
    const lines = text.split("\n");
    if (lines[lines.length - 1] === "") {
      lines.pop();
    }
    return lines;
  }

  // Written beside the sheet and renamed over it, so a failed write leaves
  // the previous contents in place.
  private async writeLines(lines: string[]): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, `${lines.join("\n")}\n`, { encoding: "utf8" });
      await fs.rename(tempPath, this.path);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }
  }
}
