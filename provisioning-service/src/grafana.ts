import { createHash } from 'crypto';
import { z } from 'zod';
import { SERVICE, type AlertRuleSpec, type ClickHouseConfig, type GrafanaConfig } from './config.js';
import type { ResourceLedger } from './ensure.js';
import { RequestError, isNotFound } from './errors.js';
import { HttpClient, basicAuth, type FetchLike } from './http.js';
import { waitFor, type RetryPolicy, type WaitOptions } from './retry.js';

export const DATASOURCE_TYPE = 'grafana-clickhouse-datasource';
const RULE_GROUP = 'drone-telemetry';
// Query result formats of the ClickHouse datasource plugin
const FORMAT_TIMESERIES = 0;
const FORMAT_TABLE = 1;
const HASH_KEY = 'provisioningHash';

const Folder = z.object({ uid: z.string(), title: z.string() }).passthrough();
type Folder = z.infer<typeof Folder>;

const Datasource = z
  .object({
    uid: z.string(),
    name: z.string(),
    type: z.string(),
    jsonData: z.record(z.unknown()).default({}),
  })
  .passthrough();
type Datasource = z.infer<typeof Datasource>;

const DatasourceSaved = z.object({ datasource: Datasource }).passthrough();

export interface DatasourceDefinition {
  uid: string;
  name: string;
  type: string;
  access: 'proxy';
  jsonData: Record<string, string | number>;
  secureJsonData: Record<string, string>;
}

const DashboardEnvelope = z.object({
  dashboard: z.object({ uid: z.string() }).passthrough(),
  meta: z.object({ folderUid: z.string().optional() }).passthrough().default({}),
});
type DashboardEnvelope = z.infer<typeof DashboardEnvelope>;

const SaveDashboardResponse = z.object({ uid: z.string(), version: z.number().optional() }).passthrough();

const Health = z.object({ database: z.string().optional() }).passthrough();

/** The parts of an alert rule we own; anything else Grafana adds is ignored when comparing. */
const RuleSignature = z.object({
  title: z.string(),
  folderUID: z.string(),
  ruleGroup: z.string(),
  condition: z.string(),
  for: z.string().optional(),
  data: z.array(
    z.object({
      refId: z.string(),
      datasourceUid: z.string(),
      relativeTimeRange: z.object({ from: z.number(), to: z.number() }).optional(),
      model: z
        .object({
          rawSql: z.string().optional(),
          editorType: z.string().optional(),
          queryType: z.string().optional(),
          format: z.number().optional(),
          type: z.string().optional(),
          expression: z.string().optional(),
          reducer: z.string().optional(),
          conditions: z.array(z.object({ evaluator: z.object({ type: z.string(), params: z.array(z.number()) }) })).optional(),
        }),
    }),
  ),
});
type RuleSignature = z.infer<typeof RuleSignature>;

export interface AlertRule extends RuleSignature {
  uid: string;
  noDataState: string;
  execErrState: string;
  labels: Record<string, string>;
  annotations: Record<string, string>;
}

export class GrafanaClient {
  private readonly http: HttpClient;

  constructor(cfg: GrafanaConfig, timeoutMs: number, fetchImpl?: FetchLike) {
    this.http = new HttpClient({
      baseUrl: cfg.url,
      timeoutMs,
      fetch: fetchImpl,
      headers: { Authorization: basicAuth(cfg.username, cfg.password) },
    });
  }

  async health(): Promise<void> {
    const res = Health.parse(await this.http.json('/api/health'));
    if (res.database !== undefined && res.database !== 'ok') throw new RequestError(`grafana database ${res.database}`);
  }

  /** GET that maps 404 to null. */
  private async lookup(path: string): Promise<unknown> {
    try {
      return await this.http.json(path);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async getFolder(uid: string): Promise<Folder | null> {
    const body = await this.lookup(`/api/folders/${uid}`);
    return body === null ? null : Folder.parse(body);
  }

  async createFolder(uid: string, title: string): Promise<Folder> {
    return Folder.parse(await this.http.json('/api/folders', { method: 'POST', json: { uid, title } }));
  }

  async updateFolder(uid: string, title: string): Promise<Folder> {
    return Folder.parse(await this.http.json(`/api/folders/${uid}`, { method: 'PUT', json: { title, overwrite: true } }));
  }

  async getDatasource(uid: string): Promise<Datasource | null> {
    const body = await this.lookup(`/api/datasources/uid/${uid}`);
    return body === null ? null : Datasource.parse(body);
  }

  async createDatasource(ds: DatasourceDefinition): Promise<Datasource> {
    return DatasourceSaved.parse(await this.http.json('/api/datasources', { method: 'POST', json: ds })).datasource;
  }

  async updateDatasource(ds: DatasourceDefinition): Promise<Datasource> {
    return DatasourceSaved.parse(await this.http.json(`/api/datasources/uid/${ds.uid}`, { method: 'PUT', json: ds })).datasource;
  }

  async getDashboard(uid: string): Promise<DashboardEnvelope | null> {
    const body = await this.lookup(`/api/dashboards/uid/${uid}`);
    return body === null ? null : DashboardEnvelope.parse(body);
  }

  async saveDashboard(dashboard: Record<string, unknown>, folderUid: string): Promise<string> {
    const res = SaveDashboardResponse.parse(
      await this.http.json('/api/dashboards/db', {
        method: 'POST',
        json: { dashboard, folderUid, overwrite: true, message: `provisioned by ${SERVICE}` },
      }),
    );
    return res.uid;
  }

  async getAlertRule(uid: string): Promise<unknown> {
    return await this.lookup(`/api/v1/provisioning/alert-rules/${uid}`);
  }

  async createAlertRule(rule: AlertRule): Promise<void> {
    await this.http.json('/api/v1/provisioning/alert-rules', { method: 'POST', json: rule, headers: { 'X-Disable-Provenance': 'true' } });
  }

  async updateAlertRule(rule: AlertRule): Promise<void> {
    await this.http.json(`/api/v1/provisioning/alert-rules/${rule.uid}`, {
      method: 'PUT',
      json: rule,
      headers: { 'X-Disable-Provenance': 'true' },
    });
  }
}

export function buildDatasource(cfg: GrafanaConfig, ch: ClickHouseConfig): DatasourceDefinition {
  return {
    uid: cfg.datasource.uid,
    name: cfg.datasource.name,
    type: DATASOURCE_TYPE,
    access: 'proxy',
    jsonData: {
      host: cfg.datasource.clickhouseHost,
      port: cfg.datasource.clickhousePort,
      protocol: 'http',
      defaultDatabase: ch.database,
      username: ch.user,
    },
    secureJsonData: { password: ch.password },
  };
}

export function datasourceDrift(existing: Datasource, desired: DatasourceDefinition): string | null {
  const drift: string[] = [];
  if (existing.name !== desired.name) drift.push('name');
  if (existing.type !== desired.type) drift.push('type');
  for (const [key, value] of Object.entries(desired.jsonData)) {
    if (existing.jsonData[key] !== value) drift.push(`jsonData.${key}`);
  }
  return drift.length ? `${drift.join(', ')} changed` : null;
}

function timeSeriesPanel(id: number, title: string, metric: string, unit: string, datasourceUid: string, table: string, y: number) {
  return {
    id,
    type: 'timeseries',
    title,
    gridPos: { h: 8, w: 12, x: (id - 1) % 2 === 0 ? 0 : 12, y },
    datasource: { type: DATASOURCE_TYPE, uid: datasourceUid },
    fieldConfig: { defaults: { unit }, overrides: [] },
    targets: [
      {
        refId: 'A',
        datasource: { type: DATASOURCE_TYPE, uid: datasourceUid },
        editorType: 'sql',
        queryType: 'timeseries',
        format: FORMAT_TIMESERIES,
        rawSql: `SELECT toDateTime64(timestamp_ms / 1000, 3) AS time, drone_id, ${metric} FROM ${table} WHERE $__timeFilter(time) ORDER BY time`,
      },
    ],
  };
}

/** Dashboard model without Grafana-managed fields (id, version). */
export function buildDashboard(cfg: GrafanaConfig, ch: ClickHouseConfig): Record<string, unknown> {
  const ds = cfg.datasource.uid;
  const table = `${ch.database}.${ch.targetTable}`;
  const panels = [
    timeSeriesPanel(1, 'Battery', 'battery', 'percent', ds, table, 0),
    timeSeriesPanel(2, 'Altitude', 'altitude', 'lengthm', ds, table, 0),
    timeSeriesPanel(3, 'Speed', 'speed', 'velocityms', ds, table, 8),
    {
      id: 4,
      type: 'table',
      title: 'Last known position',
      gridPos: { h: 8, w: 12, x: 12, y: 8 },
      datasource: { type: DATASOURCE_TYPE, uid: ds },
      targets: [
        {
          refId: 'A',
          datasource: { type: DATASOURCE_TYPE, uid: ds },
          editorType: 'sql',
          queryType: 'table',
          format: FORMAT_TABLE,
          rawSql:
            `SELECT drone_id, argMax(latitude, timestamp_ms) AS latitude, argMax(longitude, timestamp_ms) AS longitude, ` +
            `argMax(battery, timestamp_ms) AS battery, max(timestamp_ms) AS last_seen_ms FROM ${table} GROUP BY drone_id ORDER BY drone_id`,
        },
      ],
    },
  ];
  return {
    uid: cfg.dashboard.uid,
    title: cfg.dashboard.title,
    tags: ['drones', 'telemetry'],
    timezone: 'browser',
    schemaVersion: 39,
    refresh: '10s',
    time: { from: 'now-1h', to: 'now' },
    panels,
  };
}

export function dashboardHash(dashboard: Record<string, unknown>): string {
  return createHash('sha256').update(JSON.stringify(dashboard)).digest('hex').slice(0, 16);
}

export function windowSeconds(window: string): number {
  const m = /^(\d+)([smh])$/.exec(window);
  if (!m) throw new RequestError(`invalid alert window ${window}`);
  const n = Number(m[1]);
  return m[2] === 'h' ? n * 3600 : m[2] === 'm' ? n * 60 : n;
}

export function alertRuleUid(folderUid: string, rule: AlertRuleSpec): string {
  return `${folderUid}-${rule.metric}-${rule.operator === '<' ? 'lt' : 'gt'}`.slice(0, 40);
}

/** `metric op threshold over window`, evaluated per drone on the window average. */
export function buildAlertRule(rule: AlertRuleSpec, cfg: GrafanaConfig, ch: ClickHouseConfig): AlertRule {
  const seconds = windowSeconds(rule.window);
  const table = `${ch.database}.${ch.targetTable}`;
  return {
    uid: alertRuleUid(cfg.folder.uid, rule),
    title: `Drone ${rule.metric} ${rule.operator} ${rule.threshold} over ${rule.window}`,
    folderUID: cfg.folder.uid,
    ruleGroup: RULE_GROUP,
    condition: 'C',
    for: '0s',
    noDataState: 'NoData',
    execErrState: 'Error',
    labels: { metric: rule.metric },
    annotations: { summary: `${rule.metric} ${rule.operator} ${rule.threshold} (average over ${rule.window})` },
    data: [
      {
        refId: 'A',
        datasourceUid: cfg.datasource.uid,
        relativeTimeRange: { from: seconds, to: 0 },
        model: {
          editorType: 'sql',
          queryType: 'table',
          format: FORMAT_TABLE,
          rawSql:
            `SELECT drone_id, avg(${rule.metric}) AS value FROM ${table} ` +
            `WHERE timestamp_ms >= toUnixTimestamp(now() - INTERVAL ${seconds} SECOND) * 1000 GROUP BY drone_id`,
        },
      },
      // The query already averages over the window, one row per drone
      { refId: 'B', datasourceUid: '__expr__', model: { type: 'reduce', expression: 'A', reducer: 'last' } },
      {
        refId: 'C',
        datasourceUid: '__expr__',
        model: {
          type: 'threshold',
          expression: 'B',
          conditions: [{ evaluator: { type: rule.operator === '<' ? 'lt' : 'gt', params: [rule.threshold] } }],
        },
      },
    ],
  };
}

/** Canonical JSON of the fields we manage, for existing and desired rules alike. */
export function ruleSignature(rule: unknown): string | null {
  const parsed = RuleSignature.safeParse(rule);
  if (!parsed.success) return null;
  const r = parsed.data;
  return JSON.stringify({
    title: r.title,
    folderUID: r.folderUID,
    ruleGroup: r.ruleGroup,
    condition: r.condition,
    for: r.for ?? '0s',
    data: r.data.map((d) => ({
      refId: d.refId,
      datasourceUid: d.datasourceUid,
      from: d.relativeTimeRange?.from ?? 0,
      rawSql: d.model.rawSql ?? null,
      editorType: d.model.editorType ?? null,
      queryType: d.model.queryType ?? null,
      format: d.model.format ?? null,
      type: d.model.type ?? null,
      expression: d.model.expression ?? null,
      reducer: d.model.reducer ?? null,
      conditions: d.model.conditions ?? null,
    })),
  });
}

export async function provisionGrafana(
  client: GrafanaClient,
  cfg: GrafanaConfig,
  ch: ClickHouseConfig,
  policy: RetryPolicy,
  ledger: ResourceLedger,
  wait?: WaitOptions,
): Promise<void> {
  await waitFor(`grafana ${cfg.url}`, () => client.health(), policy, wait);

  await ledger.ensure<Folder>({
    kind: 'folder',
    name: cfg.folder.uid,
    find: () => client.getFolder(cfg.folder.uid),
    create: () => client.createFolder(cfg.folder.uid, cfg.folder.title),
    diff: (f) => (f.title === cfg.folder.title ? null : `title "${f.title}"`),
    update: () => client.updateFolder(cfg.folder.uid, cfg.folder.title),
  });

  const desiredDs = buildDatasource(cfg, ch);
  await ledger.ensure<Datasource>({
    kind: 'datasource',
    name: cfg.datasource.uid,
    find: () => client.getDatasource(cfg.datasource.uid),
    create: async () => {
      const ds = await client.createDatasource(desiredDs);
      console.log(`[${SERVICE}] created datasource ${cfg.datasource.name}`);
      return ds;
    },
    diff: (existing) => datasourceDrift(existing, desiredDs),
    update: async () => {
      const ds = await client.updateDatasource(desiredDs);
      console.log(`[${SERVICE}] updated datasource ${cfg.datasource.name}`);
      return ds;
    },
  });

  // The content hash travels inside the dashboard JSON so re-runs can skip unchanged definitions
  const dashboard = buildDashboard(cfg, ch);
  const hash = dashboardHash(dashboard);
  const save = async (): Promise<DashboardEnvelope> => {
    const uid = await client.saveDashboard({ ...dashboard, [HASH_KEY]: hash }, cfg.folder.uid);
    return { dashboard: { ...dashboard, uid, [HASH_KEY]: hash }, meta: { folderUid: cfg.folder.uid } };
  };
  await ledger.ensure<DashboardEnvelope>({
    kind: 'dashboard',
    name: cfg.dashboard.uid,
    find: () => client.getDashboard(cfg.dashboard.uid),
    create: save,
    diff: (existing) => {
      if (existing.dashboard[HASH_KEY] !== hash) return 'definition changed';
      if (existing.meta.folderUid !== undefined && existing.meta.folderUid !== cfg.folder.uid) return `in folder ${existing.meta.folderUid}`;
      return null;
    },
    update: save,
  });

  for (const spec of cfg.alertRules) {
    const rule = buildAlertRule(spec, cfg, ch);
    const wanted = ruleSignature(rule);
    await ledger.ensure<unknown>({
      kind: 'alert-rule',
      name: rule.uid,
      find: () => client.getAlertRule(rule.uid),
      create: async () => {
        await client.createAlertRule(rule);
        return rule;
      },
      diff: (existing) => (ruleSignature(existing) === wanted ? null : 'rule definition changed'),
      update: async () => {
        await client.updateAlertRule(rule);
        return rule;
      },
    });
  }
  console.log(`[${SERVICE}] grafana provisioned: dashboard ${cfg.dashboard.uid}, ${cfg.alertRules.length} alert rule(s)`);
}
