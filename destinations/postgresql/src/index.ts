import type { IAppendOnlyStore, ILogEntry } from "@speedlog/lib";
import pg from "pg";

/** The part of `pg.Client` the store uses. */
export interface IQueryClient {
  connect(): Promise<void>;
  query(text: string, values: unknown[]): Promise<unknown>;
  end(): Promise<void>;
}

const createPgClient = (config?: pg.ClientConfig): IQueryClient =>
  new pg.Client(config);

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Appends entries to a table with one column per record field plus the ingest
 * time. Rows have no position in a table, so the table's `id BIGSERIAL`
 * column (see schema.sql) gives insertion order and newest-first is
 * `ORDER BY id DESC` on the reading side.
 */
export class PostgresqlStore implements IAppendOnlyStore {
  constructor(
    public readonly options: {
      table: string;
      pg?: pg.ClientConfig;
      createClient?: (config?: pg.ClientConfig) => IQueryClient;
    }
  ) {
    if (!TABLE_NAME.test(options.table)) {
      throw new Error(`Invalid table name "${options.table}".`);
    }
  }

  async insertAtTop(entry: ILogEntry): Promise<void> {
    const { record, ingestTime } = entry;
    const client = (this.options.createClient ?? createPgClient)(this.options.pg);
    await client.connect();
    try {
      await client.query(
        `INSERT INTO ${this.options.table} (time, ping_ms, download_mbps, upload_mbps, ingest_time)
          VALUES ($1::TIMESTAMPTZ AT TIME ZONE 'UTC', $2, $3, $4, to_timestamp($5) AT TIME ZONE 'UTC');`,
        [
          record.timestamp,
          record.ping_ms,
          record.download_mbps,
          record.upload_mbps,
          ingestTime / 1000,
        ]
      );
    } finally {
      await client.end();
    }
  }
}
