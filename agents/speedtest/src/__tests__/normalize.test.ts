import { describe, test, expect } from "vitest";
import { SchemaError } from "@speedlog/lib";
import { detectSchema, normalize } from "../normalize";

const timestamp = "2025-08-22T00:05:00Z";

const legacyRaw = {
  timestamp,
  ping: 4.0,
  download: 80_000_000,
  upload: 40_000_000,
  server: { name: "Tokyo" },
  bytes_sent: 51_380_224,
};

const currentRaw = {
  type: "result",
  timestamp,
  ping: { jitter: 0.2, latency: 4.0 },
  download: { bandwidth: 10_000_000, bytes: 120_000_000, elapsed: 12_000 },
  upload: { bandwidth: 5_000_000, bytes: 60_000_000, elapsed: 12_000 },
  isp: "Example ISP",
};

describe("detectSchema", () => {
  test("nested metrics are the current schema", () => {
    expect(detectSchema(currentRaw).schema).toBe("current");
  });

  test("flat metrics are the legacy schema", () => {
    expect(detectSchema(legacyRaw).schema).toBe("legacy");
  });

  test("text is the legacy text schema", () => {
    expect(detectSchema(`${timestamp},4,80000000,40000000`).schema).toBe(
      "legacy-text"
    );
  });
});

describe("normalize", () => {
  test("legacy and current samples of one measurement agree", () => {
    const expected = {
      timestamp,
      ping_ms: 4,
      download_mbps: 80,
      upload_mbps: 40,
    };
    expect(normalize(legacyRaw)).toEqual(expected);
    expect(normalize(currentRaw)).toEqual(expected);
    expect(normalize(`${timestamp},4,80000000,40000000`)).toEqual(expected);
  });

  test("converts fractional bandwidths", () => {
    const record = normalize({
      timestamp,
      ping: { latency: 23 },
      download: { bandwidth: 9_760_000 },
      upload: { bandwidth: 17_893_750 },
    });
    expect(record.download_mbps).toBeCloseTo(78.08, 10);
    expect(record.upload_mbps).toBeCloseTo(143.15, 10);
  });

  test("converts timestamps with offsets to UTC", () => {
    expect(
      normalize({ ...legacyRaw, timestamp: "2025-08-22T09:05:00+09:00" }).timestamp
    ).toBe("2025-08-22T00:05:00.000Z");
  });

  test("returns a frozen record", () => {
    expect(Object.isFrozen(normalize(legacyRaw))).toBe(true);
  });

  test.each([undefined, null, "", "   ", {}])("rejects empty sample %j", (raw) => {
    expect(() => normalize(raw)).toThrow(
      new SchemaError("Measurement produced no data.")
    );
  });

  test("rejects missing fields", () => {
    const { upload: _upload, ...raw } = legacyRaw;
    expect(() => normalize(raw)).toThrow("Invalid legacy sample: upload: Required.");
  });

  test("rejects non-numeric fields", () => {
    expect(() => normalize({ ...legacyRaw, download: "80000000" })).toThrow(
      "Invalid legacy sample: download: Expected number, received string."
    );
    expect(() =>
      normalize({ ...currentRaw, ping: { latency: "4" } })
    ).toThrow("Invalid current sample: ping.latency: Expected number, received string.");
  });

  test("rejects a mix of nested and flat metrics", () => {
    expect(() =>
      normalize({ ...currentRaw, download: 80_000_000 })
    ).toThrow("Unrecognised sample: ping, upload nested but download flat.");
  });

  test("rejects values that are not samples", () => {
    expect(() => normalize(42)).toThrow(
      "Unrecognised sample: expected an object or text, got number."
    );
    expect(() => normalize([legacyRaw])).toThrow(
      "Unrecognised sample: expected an object or text, got array."
    );
  });

  test("rejects negative values", () => {
    expect(() => normalize({ ...legacyRaw, ping: -1 })).toThrow(
      "Invalid legacy sample: ping_ms must not be negative, got -1."
    );
  });

  test("rejects invalid timestamps", () => {
    expect(() => normalize({ ...legacyRaw, timestamp: "T" })).toThrow(
      'Invalid legacy sample: Timestamp "T" is not an ISO-8601 date-time.'
    );
  });

  test("reports producer errors", () => {
    expect(() =>
      normalize({
        type: "log",
        level: "error",
        message: "Configuration - Couldn't resolve host name",
        timestamp,
      })
    ).toThrow("Measurement failed: Configuration - Couldn't resolve host name");
  });

  test.each([
    [`${timestamp},4,80000000`, 3],
    [`${timestamp},4,80000000,40000000,extra`, 5],
    ["a,b,c", 3],
  ])("rejects legacy text %j with the wrong field count", (raw, count) => {
    expect(() => normalize(raw)).toThrow(
      `Invalid legacy text sample: expected 4 comma-separated fields (timestamp,ping,download,upload), got ${count}.`
    );
  });

  test("rejects legacy text with non-numeric fields", () => {
    expect(() => normalize(`${timestamp},4,fast,40000000`)).toThrow(
      'Invalid legacy text sample: download "fast" is not numeric.'
    );
  });

  test.each([
    ["0x50", "ping"],
    ["1e2", "ping"],
    ["-4", "ping"],
  ])("rejects legacy text ping %j", (ping, name) => {
    expect(() => normalize(`${timestamp},${ping},80000000,40000000`)).toThrow(
      `Invalid legacy text sample: ${name} "${ping}" is not numeric.`
    );
  });

  test("rejects date-only timestamps", () => {
    expect(() => normalize({ ...legacyRaw, timestamp: "2025-08-22" })).toThrow(
      'Invalid legacy sample: Timestamp "2025-08-22" is not an ISO-8601 date-time.'
    );
  });
});
