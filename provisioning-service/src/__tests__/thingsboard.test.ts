import { beforeEach, describe, expect, test, vi } from 'vitest';
import { ResourceLedger } from '../ensure.js';
import { PartialSuccessError } from '../errors.js';
import { ThingsBoardClient, kafkaNodeConfiguration, provisionDevices, provisionKafkaSink } from '../thingsboard.js';
import { FakeThingsBoard, fastRetry, noSleep, testConfig } from './fakes.js';

const mqtt = vi.hoisted(() => ({ verifyDeviceToken: vi.fn(async (_url: string, _token: string): Promise<void> => {}) }));
vi.mock('../mqtt.js', () => ({ verifyDeviceToken: mqtt.verifyDeviceToken }));

const twoDrones = JSON.stringify([
  { name: 'drone-1', token: 'drone-1-token' },
  { name: 'drone-2', token: 'drone-2-token' },
]);
const config = testConfig({ TB_DEVICES: twoDrones });
const wait = { sleep: noSleep };

describe('provisionDevices', () => {
  let tb: FakeThingsBoard;
  let ledger: ResourceLedger;
  const provision = (cfg = config.thingsboard) => provisionDevices(new ThingsBoardClient(cfg, 1000, tb.fetch), cfg, fastRetry, ledger, wait);

  beforeEach(() => {
    tb = new FakeThingsBoard();
    ledger = new ResourceLedger();
    mqtt.verifyDeviceToken.mockReset();
    mqtt.verifyDeviceToken.mockResolvedValue(undefined);
  });

  test('creates devices and replaces the generated tokens with the configured ones', async () => {
    await provision();

    expect(ledger.outcomes).toEqual([
      { kind: 'device', name: 'drone-1', status: 'created' },
      { kind: 'credentials', name: 'drone-1', status: 'updated', detail: 'access token differs from configured token' },
      { kind: 'device', name: 'drone-2', status: 'created' },
      { kind: 'credentials', name: 'drone-2', status: 'updated', detail: 'access token differs from configured token' },
    ]);
    expect(tb.credentials.get('device-1')?.credentialsId).toBe('drone-1-token');
    expect(tb.credentials.get('device-2')?.credentialsId).toBe('drone-2-token');
    expect(mqtt.verifyDeviceToken).not.toHaveBeenCalled();
  });

  test('a second run creates nothing', async () => {
    await provision();
    ledger = new ResourceLedger();

    await provision();

    expect(ledger.outcomes.map((o) => o.status)).toEqual(['already-present', 'already-present', 'already-present', 'already-present']);
    expect(tb.deviceCreates).toBe(2);
  });

  test('matches device names exactly', async () => {
    tb.seedDevice('drone-10', 'other-token');

    await provision();

    expect(ledger.outcomes[0]).toEqual({ kind: 'device', name: 'drone-1', status: 'created' });
    expect([...tb.devices.keys()]).toEqual(['drone-10', 'drone-1', 'drone-2']);
  });

  test('finds an existing device past the first page of name matches', async () => {
    for (let n = 110; n < 160; n++) tb.seedDevice(`drone-${n}`, `drone-${n}-token`);
    tb.seedDevice('drone-1', 'drone-1-token');

    await provision();

    expect(ledger.outcomes.slice(0, 2)).toEqual([
      { kind: 'device', name: 'drone-1', status: 'already-present' },
      { kind: 'credentials', name: 'drone-1', status: 'already-present' },
    ]);
    expect(tb.deviceCreates).toBe(1);
    expect(tb.listings).toEqual(['/api/tenant/devices page=0', '/api/tenant/devices page=1', '/api/tenant/devices page=0']);
  });

  test('treats an unauthenticated health check as reachable', async () => {
    tb.healthStatus = 401;

    await provision();

    expect(ledger.outcomes).toHaveLength(4);
  });

  test('reports a device created without its token as partial success', async () => {
    tb.credentialsSaveStatus = 500;

    const err = await provision().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PartialSuccessError);
    expect(err).toMatchObject({ kind: 'partial', resource: 'device drone-1' });
    expect(ledger.outcomes[0]).toEqual({ kind: 'device', name: 'drone-1', status: 'created' });
    expect(ledger.outcomes[1].status).toBe('failed');
    expect(ledger.outcomes[1].detail).toMatch(/^device drone-1 was created but its token could not be assigned: HTTP 500 for POST \/api\/device\/credentials/);
    expect(tb.devices.has('drone-2')).toBe(false);
  });

  test('a token failure on an existing device is a plain request failure', async () => {
    tb.seedDevice('drone-1', 'stale-token');
    tb.credentialsSaveStatus = 500;

    await expect(provision()).rejects.toMatchObject({ kind: 'request', resource: 'credentials drone-1' });
    expect(ledger.outcomes[0]).toEqual({ kind: 'device', name: 'drone-1', status: 'already-present' });
  });

  test('verifies the token did persist', async () => {
    tb.seedDevice('drone-1', 'stale-token');
    tb.ignoreCredentialSaves = true;

    await expect(provision()).rejects.toThrow('credentials of drone-1 did not persist the configured token');
  });

  test('reports a created device whose token works but fails the MQTT login as partial success', async () => {
    const cfg = testConfig({ TB_DEVICES: twoDrones, TB_MQTT_URL: 'mqtt://localhost:1883' }).thingsboard;
    mqtt.verifyDeviceToken.mockRejectedValueOnce(new Error('Not authorized (5)'));

    const err = await provision(cfg).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PartialSuccessError);
    expect(err).toMatchObject({
      resource: 'device drone-1',
      message: 'device drone-1 was created with the configured token, but MQTT login with the configured token of drone-1 was rejected: Not authorized (5)',
    });
    expect(tb.credentials.get('device-1')?.credentialsId).toBe('drone-1-token');
  });

  test('optionally proves each token over MQTT', async () => {
    const cfg = testConfig({ TB_DEVICES: twoDrones, TB_MQTT_URL: 'mqtt://localhost:1883' }).thingsboard;
    tb.seedDevice('drone-1', 'drone-1-token');
    mqtt.verifyDeviceToken.mockRejectedValueOnce(new Error('Not authorized (5)'));

    await expect(provision(cfg)).rejects.toMatchObject({
      kind: 'request',
      message: 'MQTT login with the configured token of drone-1 was rejected: Not authorized (5)',
    });
    expect(mqtt.verifyDeviceToken).toHaveBeenCalledWith('mqtt://localhost:1883', 'drone-1-token');
    expect(ledger.outcomes[1]).toMatchObject({ kind: 'credentials', name: 'drone-1', status: 'failed' });
  });

  test('keeps retrying a login that is rejected', async () => {
    const cfg = testConfig({ TB_DEVICES: twoDrones, TB_PASSWORD: 'wrong-password' }).thingsboard;

    await expect(provision(cfg)).rejects.toMatchObject({
      kind: 'unreachable',
      message: 'thingsboard login did not become ready after 3 attempts: HTTP 401 for POST /api/auth/login: {"message":"Invalid username or password"}',
    });
  });
});

describe('provisionKafkaSink', () => {
  let tb: FakeThingsBoard;
  let ledger: ResourceLedger;
  const provision = () =>
    provisionKafkaSink(new ThingsBoardClient(config.thingsboard, 1000, tb.fetch), config.thingsboard, config.kafka, fastRetry, ledger, wait);

  beforeEach(() => {
    tb = new FakeThingsBoard();
    ledger = new ResourceLedger();
  });

  test('adds a Kafka node wired to post telemetry', async () => {
    await provision();

    expect(ledger.outcomes).toEqual([
      { kind: 'rule-node', name: 'Root Rule Chain/Kafka sink', status: 'created' },
      { kind: 'rule-connection', name: 'Root Rule Chain/Post telemetry -> Kafka sink', status: 'created' },
    ]);
    expect(tb.metadataSaves).toBe(1);
    expect(tb.metadata.nodes).toHaveLength(4);
    expect(tb.metadata.nodes[3]).toMatchObject({
      type: 'org.thingsboard.rule.engine.kafka.TbKafkaNode',
      name: 'Kafka sink',
      configuration: kafkaNodeConfiguration(config.kafka),
    });
    expect(tb.metadata.nodes[3].configuration).toMatchObject({ topic: 'tb-telemetry', bootstrapServers: 'kafka:9092' });
    expect(tb.metadata.connections).toContainEqual({ fromIndex: 2, toIndex: 3, type: 'Post telemetry' });
  });

  test('does not save the chain when it is already wired', async () => {
    await provision();
    ledger = new ResourceLedger();

    await provision();

    expect(ledger.outcomes.map((o) => o.status)).toEqual(['already-present', 'already-present']);
    expect(tb.metadataSaves).toBe(1);
  });

  test('points a drifted node back at the configured topic', async () => {
    await provision();
    tb.patchNodeConfiguration(3, { topic: 'old-topic' });
    ledger = new ResourceLedger();

    await provision();

    expect(ledger.outcomes[0]).toEqual({ kind: 'rule-node', name: 'Root Rule Chain/Kafka sink', status: 'updated', detail: 'topic old-topic' });
    expect(tb.metadata.nodes[3].configuration).toMatchObject({ topic: 'tb-telemetry' });
    expect(tb.metadata.nodes).toHaveLength(4);
    expect(tb.metadataSaves).toBe(2);
  });

  test('finds the root chain past the first page of name matches', async () => {
    const copies = Array.from({ length: 60 }, (_, i) => ({
      id: { entityType: 'RULE_CHAIN', id: `chain-copy-${i}` },
      name: `Root Rule Chain copy ${i}`,
      root: false,
    }));
    tb.ruleChains.unshift(...copies);

    await provision();

    expect(ledger.outcomes.map((o) => o.status)).toEqual(['created', 'created']);
    expect(tb.listings).toEqual(['/api/ruleChains page=0', '/api/ruleChains page=1']);
  });

  test('fails when the chain has no message type switch', async () => {
    tb.metadata.nodes = tb.metadata.nodes.filter((n) => !n.type.endsWith('TbMsgTypeSwitchNode'));

    await expect(provision()).rejects.toThrow('Message Type Switch node not found in "Root Rule Chain"');
    expect(tb.metadataSaves).toBe(0);
  });

  test('marks staged changes failed when the save is rejected', async () => {
    tb.metadataSaveStatus = 500;

    await expect(provision()).rejects.toMatchObject({ kind: 'request', status: 500 });
    expect(ledger.outcomes.map((o) => o.status)).toEqual(['failed', 'failed']);
  });
});
