import { beforeEach, describe, expect, test } from 'vitest';
import { ResourceLedger } from '../ensure.js';
import { GrafanaClient, alertRuleUid, buildAlertRule, provisionGrafana, ruleSignature, windowSeconds } from '../grafana.js';
import { FakeGrafana, fastRetry, noSleep, testConfig } from './fakes.js';

const config = testConfig();

describe('alert rules', () => {
  const battery = config.grafana.alertRules[0];

  test('derive a stable uid from folder, metric and direction', () => {
    expect(alertRuleUid('drone-telemetry', battery)).toBe('drone-telemetry-battery-lt');
    expect(alertRuleUid('drone-telemetry', { ...battery, operator: '>' })).toBe('drone-telemetry-battery-gt');
  });

  test('evaluate the window average against the threshold', () => {
    const rule = buildAlertRule(battery, config.grafana, config.clickhouse);

    expect(rule.title).toBe('Drone battery < 20 over 5m');
    expect(rule.folderUID).toBe('drone-telemetry');
    expect(rule.condition).toBe('C');
    expect(rule.data.map((d) => d.refId)).toEqual(['A', 'B', 'C']);
    expect(rule.data[0].datasourceUid).toBe('clickhouse-telemetry');
    expect(rule.data[0].relativeTimeRange).toEqual({ from: 300, to: 0 });
    expect(rule.data[0].model.rawSql).toContain('avg(battery) AS value FROM telemetry.drone_telemetry');
    expect(rule.data[2].model.conditions).toEqual([{ evaluator: { type: 'lt', params: [20] } }]);
  });

  test('query rows as a table and reduce each drone to its last value', () => {
    const rule = buildAlertRule(battery, config.grafana, config.clickhouse);

    expect(rule.data[0].model).toMatchObject({ editorType: 'sql', queryType: 'table', format: 1 });
    expect(rule.data[1]).toEqual({ refId: 'B', datasourceUid: '__expr__', model: { type: 'reduce', expression: 'A', reducer: 'last' } });
  });

  test('signature tells rules apart by reducer', () => {
    const rule = buildAlertRule(battery, config.grafana, config.clickhouse);
    const data = rule.data.map((d) => (d.refId === 'B' ? { ...d, model: { ...d.model, reducer: 'mean' } } : d));

    expect(ruleSignature({ ...rule, data })).not.toBe(ruleSignature(rule));
  });

  test('signature ignores fields the server adds', () => {
    const rule = buildAlertRule(battery, config.grafana, config.clickhouse);

    expect(ruleSignature({ ...rule, id: 7, orgID: 1, updated: '2026-01-01T00:00:00Z' })).toBe(ruleSignature(rule));
    expect(ruleSignature({ title: 'not a rule' })).toBeNull();
  });

  test('windowSeconds understands s, m and h', () => {
    expect([windowSeconds('30s'), windowSeconds('5m'), windowSeconds('1h')]).toEqual([30, 300, 3600]);
  });
});

describe('provisionGrafana', () => {
  let grafana: FakeGrafana;
  let ledger: ResourceLedger;
  const provision = (cfg = config) =>
    provisionGrafana(new GrafanaClient(cfg.grafana, 1000, grafana.fetch), cfg.grafana, cfg.clickhouse, fastRetry, ledger, { sleep: noSleep });

  beforeEach(() => {
    grafana = new FakeGrafana();
    ledger = new ResourceLedger();
  });

  test('creates folder, datasource, dashboard and alert rules', async () => {
    await provision();

    expect(ledger.outcomes).toEqual([
      { kind: 'folder', name: 'drone-telemetry', status: 'created' },
      { kind: 'datasource', name: 'clickhouse-telemetry', status: 'created' },
      { kind: 'dashboard', name: 'drone-fleet', status: 'created' },
      { kind: 'alert-rule', name: 'drone-telemetry-battery-lt', status: 'created' },
      { kind: 'alert-rule', name: 'drone-telemetry-altitude-lt', status: 'created' },
    ]);
    expect(grafana.datasources.get('clickhouse-telemetry')).toMatchObject({
      name: 'ClickHouse Telemetry',
      type: 'grafana-clickhouse-datasource',
      jsonData: { host: 'clickhouse', port: 8123, protocol: 'http', defaultDatabase: 'telemetry', username: 'default' },
      secureJsonFields: { password: true },
    });
    expect(grafana.dashboards.get('drone-fleet')?.folderUid).toBe('drone-telemetry');
  });

  test('a second run writes nothing', async () => {
    await provision();
    const writes = grafana.writes.length;
    ledger = new ResourceLedger();

    await provision();

    expect(ledger.outcomes.every((o) => o.status === 'already-present')).toBe(true);
    expect(ledger.outcomes).toHaveLength(5);
    expect(grafana.writes).toHaveLength(writes);
  });

  test('renames a folder whose title was changed', async () => {
    grafana.folders.set('drone-telemetry', { id: 1, uid: 'drone-telemetry', title: 'Old' });

    await provision();

    expect(ledger.outcomes[0]).toEqual({ kind: 'folder', name: 'drone-telemetry', status: 'updated', detail: 'title "Old"' });
    expect(grafana.folders.get('drone-telemetry')?.title).toBe('Drone Telemetry');
  });

  test('repoints a datasource at the configured host', async () => {
    await provision();
    const stored = grafana.datasources.get('clickhouse-telemetry');
    if (stored) stored.jsonData.host = 'elsewhere';
    ledger = new ResourceLedger();

    await provision();

    expect(ledger.outcomes[1]).toEqual({ kind: 'datasource', name: 'clickhouse-telemetry', status: 'updated', detail: 'jsonData.host changed' });
    expect(grafana.datasources.get('clickhouse-telemetry')?.jsonData.host).toBe('clickhouse');
  });

  test('overwrites a dashboard edited by hand', async () => {
    await provision();
    const stored = grafana.dashboards.get('drone-fleet');
    if (stored) stored.dashboard = { ...stored.dashboard, provisioningHash: 'edited' };
    ledger = new ResourceLedger();

    await provision();

    expect(ledger.outcomes[2]).toEqual({ kind: 'dashboard', name: 'drone-fleet', status: 'updated', detail: 'definition changed' });
    expect(grafana.dashboards.get('drone-fleet')?.version).toBe(2);
  });

  test('updates an alert rule when its threshold changes', async () => {
    await provision();
    ledger = new ResourceLedger();
    const rules = JSON.stringify([
      { metric: 'battery', operator: '<', threshold: 15, window: '5m' },
      { metric: 'altitude', operator: '<', threshold: 30, window: '1m' },
    ]);

    await provision(testConfig({ GRAFANA_ALERT_RULES: rules }));

    expect(ledger.outcomes.slice(3)).toEqual([
      { kind: 'alert-rule', name: 'drone-telemetry-battery-lt', status: 'updated', detail: 'rule definition changed' },
      { kind: 'alert-rule', name: 'drone-telemetry-altitude-lt', status: 'already-present' },
    ]);
  });

  test('replaces a stored rule whose reduce expression has no reducer', async () => {
    await provision();
    const rule = buildAlertRule(config.grafana.alertRules[0], config.grafana, config.clickhouse);
    const data = rule.data.map((d) => (d.refId === 'B' ? { ...d, model: { type: 'reduce', expression: 'A' } } : d));
    grafana.alertRules.set(rule.uid, { ...rule, data });
    ledger = new ResourceLedger();

    await provision();

    expect(ledger.outcomes[3]).toEqual({ kind: 'alert-rule', name: 'drone-telemetry-battery-lt', status: 'updated', detail: 'rule definition changed' });
    expect(grafana.writes.at(-1)).toBe('PUT /api/v1/provisioning/alert-rules/drone-telemetry-battery-lt');
    expect(ruleSignature(grafana.alertRules.get(rule.uid))).toBe(ruleSignature(rule));
  });

  test('the server refuses a reduce expression without a reducer', async () => {
    const client = new GrafanaClient(config.grafana, 1000, grafana.fetch);
    const rule = buildAlertRule(config.grafana.alertRules[0], config.grafana, config.clickhouse);
    const data = rule.data.map((d) => (d.refId === 'B' ? { ...d, model: { type: 'reduce', expression: 'A' } } : d));

    await expect(client.createAlertRule({ ...rule, data })).rejects.toMatchObject({ kind: 'request', status: 400 });
    expect(grafana.alertRules.size).toBe(0);
  });

  test('rejects wrong credentials on the first lookup', async () => {
    const cfg = testConfig({ GRAFANA_PASSWORD: 'wrong-password' });

    await expect(provision(cfg)).rejects.toMatchObject({
      kind: 'request',
      status: 401,
      resource: 'folder drone-telemetry',
      message: 'HTTP 401 for GET /api/folders/drone-telemetry: {"message":"Unauthorized"}',
    });
  });

  test('waits for a healthy database', async () => {
    grafana.databaseHealth = 'failing';

    await expect(provision()).rejects.toMatchObject({
      kind: 'unreachable',
      message: 'grafana http://localhost:3000 did not become ready after 3 attempts: grafana database failing',
    });
  });
});
