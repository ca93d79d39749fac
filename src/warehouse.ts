import { setTimeout as sleep } from "node:timers/promises";
import type { SnowflakeSettings, TableNames } from "./config.ts";
import { WarehouseError, errorMessage } from "./errors.ts";
import type { RunLogger } from "./logger.ts";
import type { Row, Warehouse } from "./types.ts";
import { isDate, isPlainObject, isoDate } from "./util.ts";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type SnowflakeSqlApiOptions = {
  /** Server-side statement timeout in seconds. */
  statementTimeoutSec?: number;
  pollIntervalMs?: number;
  /** Give up polling an asynchronous statement after this long. */
  deadlineMs?: number;
  /** Abort any single HTTP request that takes longer than this. */
  requestTimeoutMs?: number;
  baseUrl?: string;
  fetchImpl?: FetchLike;
};

type ApiReply = { status: number; body: Record<string, unknown> };

/**
 * Warehouse client over the Snowflake SQL API v2. Values come back as
 * strings (or null) exactly as the API renders them; column names are
 * lowercased.
 */
export class SnowflakeSqlApi implements Warehouse {
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;
  private readonly statementTimeoutSec: number;
  private readonly pollIntervalMs: number;
  private readonly deadlineMs: number;
  private readonly requestTimeoutMs: number;

  constructor(private readonly settings: SnowflakeSettings, options: SnowflakeSqlApiOptions = {}) {
    const base = options.baseUrl ?? `https://${settings.account}.snowflakecomputing.com`;
    this.endpoint = `${base.replace(/\/+$/, "")}/api/v2/statements`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.statementTimeoutSec = options.statementTimeoutSec ?? 60;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.deadlineMs = options.deadlineMs ?? 120_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  }

  async query(sql: string, binds: readonly string[] = []): Promise<Row[]> {
    const bindings = Object.fromEntries(binds.map((value, i) => [String(i + 1), { type: "TEXT", value }]));
    let reply = await this.request("POST", this.endpoint, {
      statement: sql,
      timeout: this.statementTimeoutSec,
      warehouse: this.settings.warehouse,
      database: this.settings.database,
      schema: this.settings.schema,
      role: this.settings.role,
      bindings: binds.length ? bindings : undefined,
    });

    const deadline = Date.now() + this.deadlineMs;
    while (reply.status === 202) {
      const handle = reply.body.statementHandle;
      if (typeof handle !== "string") throw new WarehouseError("statement accepted without a statement handle", { status: 202 });
      if (Date.now() >= deadline) {
        throw new WarehouseError(`statement ${handle} still running after ${this.deadlineMs} ms`, { status: 202 });
      }
      await sleep(this.pollIntervalMs);
      reply = await this.request("GET", `${this.endpoint}/${encodeURIComponent(handle)}`);
    }

    const columns = readColumns(reply.body);
    const rows = readRows(reply.body.data, columns);
    const partitions = readPartitionCount(reply.body);
    const handle = reply.body.statementHandle;
    if (partitions > 1 && typeof handle === "string") {
      for (let partition = 1; partition < partitions; partition++) {
        const next = await this.request("GET", `${this.endpoint}/${encodeURIComponent(handle)}?partition=${partition}`);
        rows.push(...readRows(next.body.data, columns));
      }
    }
    return rows;
  }

  private async request(method: "GET" | "POST", url: string, body?: Record<string, unknown>): Promise<ApiReply> {
    const signal = AbortSignal.timeout(this.requestTimeoutMs);
    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(url, {
        method,
        signal,
        headers: {
          Authorization: `Bearer ${this.settings.token}`,
          "X-Snowflake-Authorization-Token-Type": this.settings.tokenType,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: body ? JSON.stringify(body) : undefined,
      });
      text = await res.text();
    } catch (err) {
      if (signal.aborted) {
        throw new WarehouseError(`Snowflake request timed out after ${this.requestTimeoutMs} ms`, { cause: err });
      }
      throw new WarehouseError(`Snowflake request failed: ${errorMessage(err)}`, { cause: err });
    }

    let parsed: unknown = {};
    if (text.trim()) {
      try {
        parsed = JSON.parse(text);
      } catch (err) {
        throw new WarehouseError(`Snowflake returned invalid JSON (HTTP ${res.status})`, { status: res.status, cause: err });
      }
    }
    const payload = isPlainObject(parsed) ? parsed : {};
    if (!res.ok) {
      const message = typeof payload.message === "string" ? payload.message : res.statusText || "request failed";
      const sqlState = typeof payload.sqlState === "string" ? payload.sqlState : undefined;
      throw new WarehouseError(`Snowflake error (HTTP ${res.status}): ${message}`, { status: res.status, sqlState });
    }
    return { status: res.status, body: payload };
  }
}

function readColumns(body: Record<string, unknown>): string[] {
  const meta = body.resultSetMetaData;
  if (!isPlainObject(meta) || !Array.isArray(meta.rowType)) {
    throw new WarehouseError("Snowflake response is missing resultSetMetaData.rowType");
  }
  return meta.rowType.map((col, i) => (isPlainObject(col) && typeof col.name === "string" ? col.name.toLowerCase() : `column_${i + 1}`));
}

function readPartitionCount(body: Record<string, unknown>) {
  const meta = body.resultSetMetaData;
  return isPlainObject(meta) && Array.isArray(meta.partitionInfo) ? meta.partitionInfo.length : 1;
}

function readRows(data: unknown, columns: readonly string[]): Row[] {
  if (!Array.isArray(data)) return [];
  return data.map((values) => {
    const row: Row = {};
    columns.forEach((name, i) => {
      const value: unknown = Array.isArray(values) ? values[i] : undefined;
      row[name] = value === null || value === undefined ? null : String(value);
    });
    return row;
  });
}

/** Stand-in used when no warehouse credentials are configured; every query fails with a hint. */
export class UnconfiguredWarehouse implements Warehouse {
  async query(): Promise<Row[]> {
    throw new WarehouseError("warehouse is not configured: set TRIALSCRIBE_SNOWFLAKE_ACCOUNT and TRIALSCRIBE_SNOWFLAKE_TOKEN");
  }
}

export function createWarehouse(settings: SnowflakeSettings | null, options?: SnowflakeSqlApiOptions): Warehouse {
  return settings ? new SnowflakeSqlApi(settings, options) : new UnconfiguredWarehouse();
}

/**
 * Latest date with a live-experiments snapshot in the catalog. Falls back
 * to `today` when the catalog is empty or unreachable.
 */
export async function mostRecentDataDate(
  warehouse: Warehouse,
  tables: TableNames,
  today: () => string = () => isoDate(),
  logger?: RunLogger,
): Promise<string> {
  try {
    const rows = await warehouse.query(
      `SELECT TO_CHAR(MAX(DATE(fetched_at)), 'YYYY-MM-DD') AS latest_date
       FROM ${tables.experiments}
       WHERE view_name = 'Live Experiments'`,
    );
    const latest = rows[0]?.latest_date;
    return latest && isDate(latest) ? latest : today();
  } catch (err) {
    logger?.human({ title: "warehouse", body: `could not find the most recent date (${errorMessage(err)}); using today`, variant: "warn" });
    return today();
  }
}
