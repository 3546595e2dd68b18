import { Pool, type PoolClient } from "pg";
import type { Logger } from "../config/logger";
import { withDeadline, withRetry } from "../connectivity/retry";
import type { StorageConnection, StorageConnector, StorageHealth, StoredRecord } from "./types";

export type PgStorageConfig = {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  sslMode: "disable" | "prefer" | "require";
  poolMax: number;
  idleTimeoutMs: number;
  connectionTimeoutMs: number;
  queryTimeoutMs: number;
  table: string;
};

type RecordRow = {
  type: string;
  id: string;
  data: Record<string, unknown>;
};

const IDENTIFIER = /^[a-z_][a-z0-9_]{0,62}$/;

export function assertTableName(table: string): string {
  if (!IDENTIFIER.test(table)) {
    throw new Error(`invalid record table name "${table}"`);
  }
  return table;
}

function toRecord(row: RecordRow): StoredRecord {
  return { type: row.type, id: row.id, data: row.data };
}

class PgStorageConnection implements StorageConnection {
  private released = false;

  constructor(
    private readonly client: PoolClient,
    private readonly table: string,
    private readonly queryTimeoutMs: number
  ) {}

  private query(label: string, text: string, values: unknown[]) {
    if (this.released) {
      throw new Error("storage connection is closed");
    }
    return withDeadline(`postgres ${label} query`, this.queryTimeoutMs, () =>
      this.client.query<RecordRow>(text, values)
    );
  }

  async fetch(type: string, id: string): Promise<StoredRecord | null> {
    const result = await this.query(
      "fetch",
      `SELECT type, id, data FROM ${this.table} WHERE type = $1 AND id = $2`,
      [type, id]
    );
    const row = result.rows[0];
    return row ? toRecord(row) : null;
  }

  async save(record: StoredRecord): Promise<StoredRecord> {
    const result = await this.query(
      "save",
      `INSERT INTO ${this.table} (type, id, data, updated_at)
       VALUES ($1, $2, $3::jsonb, now())
       ON CONFLICT (type, id) DO UPDATE SET data = EXCLUDED.data, updated_at = now()
       RETURNING type, id, data`,
      [record.type, record.id, JSON.stringify(record.data)]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`save of ${record.type}/${record.id} returned no row`);
    }
    return toRecord(row);
  }

  async remove(type: string, id: string): Promise<StoredRecord | null> {
    const result = await this.query(
      "remove",
      `DELETE FROM ${this.table} WHERE type = $1 AND id = $2 RETURNING type, id, data`,
      [type, id]
    );
    const row = result.rows[0];
    return row ? toRecord(row) : null;
  }

  async close(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.client.release();
  }
}

export class PgStorageConnector implements StorageConnector {
  readonly impl = "pg";
  private readonly pool: Pool;
  private readonly table: string;

  constructor(
    private readonly config: PgStorageConfig,
    private readonly logger: Logger
  ) {
    this.table = assertTableName(config.table);
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.sslMode === "require" ? { rejectUnauthorized: false } : false,
      max: config.poolMax,
      idleTimeoutMillis: config.idleTimeoutMs,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    });
    this.pool.on("error", (error) => {
      this.logger.error("postgres_pool_error", { message: error.message });
    });
  }

  async migrate(): Promise<void> {
    await withRetry(
      "postgres_migrate",
      async () => {
        await this.pool.query(
          `CREATE TABLE IF NOT EXISTS ${this.table} (
             type text NOT NULL,
             id text NOT NULL,
             data jsonb NOT NULL DEFAULT '{}'::jsonb,
             updated_at timestamptz NOT NULL DEFAULT now(),
             PRIMARY KEY (type, id)
           )`
        );
      },
      this.logger
    );
    this.logger.info("postgres_record_table_ready", { table: this.table });
  }

  async open(): Promise<StorageConnection> {
    const client = await withRetry("postgres_connect", () => this.pool.connect(), this.logger, { attempts: 2 });
    return new PgStorageConnection(client, this.table, this.config.queryTimeoutMs);
  }

  async healthcheck(): Promise<StorageHealth> {
    const startedAt = Date.now();
    try {
      await withDeadline("postgres health query", this.config.queryTimeoutMs, () => this.pool.query("SELECT 1 AS ok"));
      return { ok: true, latencyMs: Date.now() - startedAt };
    } catch (error) {
      return {
        ok: false,
        latencyMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
