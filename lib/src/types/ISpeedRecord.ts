export interface ISpeedRecord {
  /** ISO-8601 UTC timestamp of the measurement. */
  readonly timestamp: string;
  /** Latency in milliseconds. */
  readonly ping_ms: number;
  /** Download throughput in megabits per second. */
  readonly download_mbps: number;
  /** Upload throughput in megabits per second. */
  readonly upload_mbps: number;
}
