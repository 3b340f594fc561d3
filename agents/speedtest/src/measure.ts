import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export const DEFAULT_SPEEDTEST_COMMAND = [
  "speedtest",
  "--format=json",
  "--accept-license",
  "--accept-gdpr",
];
export const DEFAULT_MEASURE_TIMEOUT_MS = 120_000;

/**
 * JSON output is returned parsed, any other output as trimmed text and no
 * output as `undefined`. The normalizer decides what to make of each.
 */
export function parseMeasurementOutput(stdout: string): unknown {
  const text = stdout.trim();
  if (text === "") {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) {
      return text;
    }
    throw err;
  }
}

export async function runMeasurement(
  command: readonly string[],
  timeoutMs = DEFAULT_MEASURE_TIMEOUT_MS
): Promise<unknown> {
  const [file, ...args] = command;
  if (!file) {
    throw new Error("Measurement command is empty.");
  }
  let stdout: string;
  try {
    ({ stdout } = await execFileAsync(file, args, {
      encoding: "utf8",
      timeout: timeoutMs,
    }));
  } catch (err) {
    throw new Error(
      `Measurement command ${file} failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  console.debug("speedtest output", stdout.trim());
  return parseMeasurementOutput(stdout);
}
