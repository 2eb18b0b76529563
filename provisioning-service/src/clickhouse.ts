import { z } from 'zod';
import { SERVICE, type ClickHouseConfig, type KafkaConfig } from './config.js';
import type { ResourceLedger } from './ensure.js';
import { RequestError } from './errors.js';
import { HttpClient, type FetchLike } from './http.js';
import { waitFor, type RetryPolicy, type WaitOptions } from './retry.js';
import { TELEMETRY_COLUMNS, type ColumnDef } from './telemetry.js';

const ColumnsResponse = z.object({
  data: z.array(z.object({ name: z.string(), type: z.string() })),
});

const EngineResponse = z.object({
  data: z.array(z.object({ engine_full: z.string() })),
});

const CountResponse = z.object({
  data: z.array(z.object({ rows: z.union([z.string(), z.number()]) })),
});

export interface Column {
  name: string;
  type: string;
}

/** Statements and lookups the schema provisioner issues against ClickHouse. */
export interface SchemaStore {
  ping(): Promise<void>;
  exec(sql: string): Promise<void>;
  databaseExists(database: string): Promise<boolean>;
  tableExists(database: string, table: string): Promise<boolean>;
  columns(database: string, table: string): Promise<Column[]>;
  /** Full engine clause of a table, as ClickHouse reports it in `system.tables`. */
  engine(database: string, table: string): Promise<string>;
  countRows(database: string, table: string): Promise<number>;
}

export function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/** ClickHouse over its HTTP interface: statements are POSTed as the request body. */
export class ClickHouseClient implements SchemaStore {
  private readonly http: HttpClient;

  constructor(cfg: ClickHouseConfig, timeoutMs: number, fetchImpl?: FetchLike) {
    this.http = new HttpClient({
      baseUrl: cfg.url,
      timeoutMs,
      fetch: fetchImpl,
      headers: { 'X-ClickHouse-User': cfg.user, 'X-ClickHouse-Key': cfg.password },
    });
  }

  async ping(): Promise<void> {
    const body = await this.http.text('/ping');
    if (body.trim() !== 'Ok.') throw new RequestError(`unexpected ping response: ${body.trim()}`);
  }

  async exec(sql: string): Promise<void> {
    await this.http.text('/', { method: 'POST', text: sql });
  }

  async query(sql: string): Promise<unknown> {
    return await this.http.json('/', { method: 'POST', text: `${sql} FORMAT JSON` });
  }

  async databaseExists(database: string): Promise<boolean> {
    const out = await this.http.text('/', { method: 'POST', text: `EXISTS DATABASE ${database}` });
    return out.trim() === '1';
  }

  async tableExists(database: string, table: string): Promise<boolean> {
    const out = await this.http.text('/', { method: 'POST', text: `EXISTS TABLE ${database}.${table}` });
    return out.trim() === '1';
  }

  async columns(database: string, table: string): Promise<Column[]> {
    const res = ColumnsResponse.parse(
      await this.query(
        `SELECT name, type FROM system.columns WHERE database = ${quoteString(database)} AND table = ${quoteString(table)} ORDER BY position`,
      ),
    );
    return res.data;
  }

  async engine(database: string, table: string): Promise<string> {
    const res = EngineResponse.parse(
      await this.query(`SELECT engine_full FROM system.tables WHERE database = ${quoteString(database)} AND name = ${quoteString(table)}`),
    );
    return res.data[0]?.engine_full ?? '';
  }

  async countRows(database: string, table: string): Promise<number> {
    const res = CountResponse.parse(await this.query(`SELECT count() AS rows FROM ${database}.${table}`));
    const first = res.data[0];
    return first ? Number(first.rows) : 0;
  }
}

function columnLines(columns: readonly ColumnDef[]): string {
  return columns.map((c) => `    ${c.name} ${c.type}`).join(',\n');
}

export function databaseDdl(cfg: ClickHouseConfig): string {
  return `CREATE DATABASE IF NOT EXISTS ${cfg.database}`;
}

export function targetTableDdl(cfg: ClickHouseConfig): string {
  return [
    `CREATE TABLE IF NOT EXISTS ${cfg.database}.${cfg.targetTable}`,
    '(',
    columnLines(TELEMETRY_COLUMNS),
    ')',
    'ENGINE = MergeTree',
    'ORDER BY (drone_id, timestamp_ms)',
  ].join('\n');
}

export function queueTableDdl(cfg: ClickHouseConfig, kafka: KafkaConfig): string {
  return [
    `CREATE TABLE IF NOT EXISTS ${cfg.database}.${cfg.queueTable}`,
    '(',
    columnLines(TELEMETRY_COLUMNS),
    ')',
    'ENGINE = Kafka',
    'SETTINGS',
    `    kafka_broker_list = ${quoteString(kafka.internalBootstrap)},`,
    `    kafka_topic_list = ${quoteString(kafka.topic)},`,
    `    kafka_group_name = ${quoteString(cfg.consumerGroup)},`,
    `    kafka_format = 'JSONEachRow',`,
    `    kafka_num_consumers = ${cfg.numConsumers},`,
    `    kafka_skip_broken_messages = ${cfg.skipBrokenMessages}`,
  ].join('\n');
}

export function viewDdl(cfg: ClickHouseConfig): string {
  const cols = TELEMETRY_COLUMNS.map((c) => c.name).join(', ');
  return [
    `CREATE MATERIALIZED VIEW IF NOT EXISTS ${cfg.database}.${cfg.view}`,
    `TO ${cfg.database}.${cfg.targetTable}`,
    `AS SELECT ${cols}`,
    `FROM ${cfg.database}.${cfg.queueTable}`,
  ].join('\n');
}

function describeColumns(columns: readonly Column[]): string {
  return columns.map((c) => `${c.name} ${c.type}`).join(', ');
}

/** Null when the columns match the telemetry schema name for name, type for type, in order. */
export function schemaDrift(actual: readonly Column[]): string | null {
  const same =
    actual.length === TELEMETRY_COLUMNS.length &&
    TELEMETRY_COLUMNS.every((c, i) => actual[i].name === c.name && actual[i].type === c.type);
  if (same) return null;
  return `columns [${describeColumns(actual)}] differ from [${describeColumns(TELEMETRY_COLUMNS)}]`;
}

async function ensureTable(store: SchemaStore, cfg: ClickHouseConfig, table: string, ddl: string, ledger: ResourceLedger) {
  await ledger.ensure<Column[]>({
    kind: 'table',
    name: `${cfg.database}.${table}`,
    find: async () => ((await store.tableExists(cfg.database, table)) ? await store.columns(cfg.database, table) : null),
    create: async () => {
      await store.exec(ddl);
      console.log(`[${SERVICE}] created table ${cfg.database}.${table}`);
      return [...TELEMETRY_COLUMNS];
    },
    diff: schemaDrift,
  });
}

/** `name = 'value'` and `name = 123` pairs of an engine clause; quoted values are unescaped. */
export function engineSettings(engineFull: string): Record<string, string> {
  const settings: Record<string, string> = {};
  for (const m of engineFull.matchAll(/(\w+)\s*=\s*(?:'((?:[^'\\]|\\.)*)'|([^,\s]+))/g)) {
    settings[m[1]] = m[2] !== undefined ? m[2].replace(/\\(.)/g, '$1') : m[3];
  }
  return settings;
}

/** The settings that bind the ingestion table to a topic on a broker. */
export function kafkaBinding(cfg: ClickHouseConfig, kafka: KafkaConfig): Record<string, string> {
  return {
    kafka_broker_list: kafka.internalBootstrap,
    kafka_topic_list: kafka.topic,
    kafka_group_name: cfg.consumerGroup,
  };
}

export function bindingDrift(engineFull: string, wanted: Record<string, string>): string | null {
  const actual = engineSettings(engineFull);
  const drift = Object.entries(wanted)
    .filter(([key, value]) => actual[key] !== value)
    .map(([key, value]) => `${key} ${actual[key] === undefined ? 'unset' : quoteString(actual[key])} instead of ${quoteString(value)}`);
  return drift.length ? drift.join(', ') : null;
}

interface QueueTable {
  columns: Column[];
  engine: string;
}

/** Same columns as the target table, and still bound to the configured topic, broker and group. */
async function ensureQueueTable(store: SchemaStore, cfg: ClickHouseConfig, kafka: KafkaConfig, ledger: ResourceLedger) {
  const wanted = kafkaBinding(cfg, kafka);
  await ledger.ensure<QueueTable>({
    kind: 'table',
    name: `${cfg.database}.${cfg.queueTable}`,
    find: async () => {
      if (!(await store.tableExists(cfg.database, cfg.queueTable))) return null;
      return { columns: await store.columns(cfg.database, cfg.queueTable), engine: await store.engine(cfg.database, cfg.queueTable) };
    },
    create: async () => {
      await store.exec(queueTableDdl(cfg, kafka));
      console.log(`[${SERVICE}] created table ${cfg.database}.${cfg.queueTable} on topic ${kafka.topic}`);
      return { columns: [...TELEMETRY_COLUMNS], engine: '' };
    },
    diff: (existing) => schemaDrift(existing.columns) ?? bindingDrift(existing.engine, wanted),
  });
}

/**
 * Database, persisted target table, Kafka ingestion table, then the view that
 * copies one into the other. The view references both tables so it goes last.
 */
export async function provisionSchema(
  store: SchemaStore,
  cfg: ClickHouseConfig,
  kafka: KafkaConfig,
  policy: RetryPolicy,
  ledger: ResourceLedger,
  wait?: WaitOptions,
): Promise<void> {
  await waitFor(`clickhouse ${cfg.url}`, () => store.ping(), policy, wait);

  await ledger.ensure<string>({
    kind: 'database',
    name: cfg.database,
    find: async () => ((await store.databaseExists(cfg.database)) ? cfg.database : null),
    create: async () => {
      await store.exec(databaseDdl(cfg));
      console.log(`[${SERVICE}] created database ${cfg.database}`);
      return cfg.database;
    },
  });

  await ensureTable(store, cfg, cfg.targetTable, targetTableDdl(cfg), ledger);
  await ensureQueueTable(store, cfg, kafka, ledger);

  await ledger.ensure<string>({
    kind: 'view',
    name: `${cfg.database}.${cfg.view}`,
    find: async () => ((await store.tableExists(cfg.database, cfg.view)) ? cfg.view : null),
    create: async () => {
      await store.exec(viewDdl(cfg));
      console.log(`[${SERVICE}] created materialized view ${cfg.database}.${cfg.view}`);
      return cfg.view;
    },
  });

  const rows = await store.countRows(cfg.database, cfg.targetTable);
  ledger.annotate({ kind: 'table', name: `${cfg.database}.${cfg.targetTable}` }, `rows=${rows}`);
}
