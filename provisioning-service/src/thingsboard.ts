import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { SERVICE, type DeviceSpec, type KafkaConfig, type ThingsBoardConfig } from './config.js';
import { ensure, type EnsureResult, type ResourceLedger } from './ensure.js';
import { PartialSuccessError, RequestError, describeError } from './errors.js';
import { HttpClient, type FetchLike } from './http.js';
import { verifyDeviceToken } from './mqtt.js';
import { waitFor, type RetryPolicy, type WaitOptions } from './retry.js';

const KAFKA_NODE_TYPE = 'org.thingsboard.rule.engine.kafka.TbKafkaNode';
const MSG_TYPE_SWITCH = 'TbMsgTypeSwitchNode';
const PAGE_SIZE = 50;

const EntityId = z.object({ id: z.string(), entityType: z.string().optional() }).passthrough();

const Device = z.object({ id: EntityId, name: z.string(), type: z.string().optional() }).passthrough();
export type TbDevice = z.infer<typeof Device>;

const Credentials = z
  .object({
    id: EntityId.optional(),
    deviceId: EntityId,
    credentialsType: z.string(),
    credentialsId: z.string().nullable(),
  })
  .passthrough();
export type TbCredentials = z.infer<typeof Credentials>;

const RuleChain = z.object({ id: EntityId, name: z.string() }).passthrough();
export type TbRuleChain = z.infer<typeof RuleChain>;

const RuleNode = z.object({ type: z.string(), name: z.string().optional(), configuration: z.record(z.unknown()).optional() }).passthrough();
export type TbRuleNode = z.infer<typeof RuleNode>;

const Connection = z.object({ fromIndex: z.number(), toIndex: z.number(), type: z.string() }).passthrough();
export type TbConnection = z.infer<typeof Connection>;

const RuleChainMetadata = z
  .object({
    ruleChainId: EntityId.optional(),
    nodes: z.array(RuleNode).default([]),
    connections: z.array(Connection).nullable().default([]),
  })
  .passthrough();
export type TbRuleChainMetadata = z.infer<typeof RuleChainMetadata>;

const page = <T extends z.ZodTypeAny>(item: T) => z.object({ data: z.array(item), hasNext: z.boolean().optional() });
const DevicePage = page(Device);
const RuleChainPage = page(RuleChain);

const LoginResponse = z.object({ token: z.string() });

/** REST client for the ThingsBoard tenant API. */
export class ThingsBoardClient {
  private readonly http: HttpClient;

  constructor(private readonly cfg: ThingsBoardConfig, timeoutMs: number, fetchImpl?: FetchLike) {
    this.http = new HttpClient({ baseUrl: cfg.url, timeoutMs, fetch: fetchImpl });
  }

  /** 200, 401 and 403 all mean the API is up. */
  async health(): Promise<void> {
    try {
      await this.http.send('/api/health');
    } catch (err) {
      if (err instanceof RequestError && (err.status === 401 || err.status === 403)) return;
      throw err;
    }
  }

  async login(): Promise<void> {
    const res = LoginResponse.safeParse(
      await this.http.json('/api/auth/login', { method: 'POST', json: { username: this.cfg.username, password: this.cfg.password } }),
    );
    if (!res.success) throw new RequestError('ThingsBoard login returned no token');
    this.http.setHeader('X-Authorization', `Bearer ${res.data.token}`);
  }

  /**
   * `textSearch` matches substrings, so `drone-1` also lists `drone-10` and up;
   * pages are read until the exact name turns up or the listing ends.
   */
  private async findByName<T extends { name: string }>(
    path: string,
    name: string,
    parse: (body: unknown) => { data: T[]; hasNext?: boolean },
  ): Promise<T | null> {
    for (let p = 0; ; p++) {
      const body = await this.http.json(`${path}?pageSize=${PAGE_SIZE}&page=${p}&textSearch=${encodeURIComponent(name)}`);
      const res = parse(body ?? { data: [] });
      const hit = res.data.find((item) => item.name === name);
      if (hit) return hit;
      if (!res.hasNext) return null;
    }
  }

  async findDevice(name: string): Promise<TbDevice | null> {
    return await this.findByName('/api/tenant/devices', name, (body) => DevicePage.parse(body));
  }

  async createDevice(name: string): Promise<TbDevice> {
    return Device.parse(await this.http.json('/api/device', { method: 'POST', json: { name, type: this.cfg.deviceType } }));
  }

  async getCredentials(deviceId: string): Promise<TbCredentials | null> {
    const body = await this.http.json(`/api/device/${deviceId}/credentials`);
    return body === null ? null : Credentials.parse(body);
  }

  async saveCredentials(creds: TbCredentials): Promise<TbCredentials> {
    return Credentials.parse(await this.http.json('/api/device/credentials', { method: 'POST', json: creds }));
  }

  async findRuleChain(name: string): Promise<TbRuleChain | null> {
    return await this.findByName('/api/ruleChains', name, (body) => RuleChainPage.parse(body));
  }

  async getRuleChainMetadata(chainId: string): Promise<TbRuleChainMetadata> {
    return RuleChainMetadata.parse((await this.http.json(`/api/ruleChain/${chainId}/metadata`)) ?? {});
  }

  async saveRuleChainMetadata(metadata: TbRuleChainMetadata): Promise<TbRuleChainMetadata> {
    return RuleChainMetadata.parse(await this.http.json('/api/ruleChain/metadata', { method: 'POST', json: metadata }));
  }
}

export interface DeviceProvisionOptions {
  verifyMqttUrl?: string;
}

function desiredCredentials(deviceId: string, token: string, current: TbCredentials | null): TbCredentials {
  const base: TbCredentials = {
    deviceId: { entityType: 'DEVICE', id: deviceId },
    credentialsType: 'ACCESS_TOKEN',
    credentialsId: token,
  };
  // Keep the record id so ThingsBoard updates the existing credentials instead of rejecting a second set
  return current ? { ...current, ...base, deviceId: current.deviceId } : base;
}

function tokenDrift(creds: TbCredentials, token: string): string | null {
  if (creds.credentialsType !== 'ACCESS_TOKEN') return `credentials type ${creds.credentialsType}`;
  if (creds.credentialsId !== token) return 'access token differs from configured token';
  return null;
}

interface TokenOutcome {
  result: EnsureResult<TbCredentials>;
  /** The token was stored and read back; only the MQTT login with it failed. */
  mqttRejected: boolean;
}

/**
 * Bind a device's credentials to the configured token, then read them back.
 * ThingsBoard assigns a random token on device creation, so this always
 * runs after the device itself is ensured.
 */
async function assignToken(
  client: ThingsBoardClient,
  device: TbDevice,
  spec: DeviceSpec,
  opts: DeviceProvisionOptions,
): Promise<TokenOutcome> {
  const save = async (current: TbCredentials | null) => {
    await client.saveCredentials(desiredCredentials(device.id.id, spec.token, current));
    const readBack = await client.getCredentials(device.id.id);
    if (!readBack || tokenDrift(readBack, spec.token) !== null) {
      throw new RequestError(`credentials of ${spec.name} did not persist the configured token`);
    }
    return readBack;
  };
  const result = await ensure<TbCredentials>({
    kind: 'credentials',
    name: spec.name,
    find: () => client.getCredentials(device.id.id),
    create: () => save(null),
    diff: (existing) => tokenDrift(existing, spec.token),
    update: (existing) => save(existing),
  });
  if (result.status !== 'failed' && opts.verifyMqttUrl) {
    try {
      await verifyDeviceToken(opts.verifyMqttUrl, spec.token);
    } catch (err) {
      const error = new RequestError(`MQTT login with the configured token of ${spec.name} was rejected: ${describeError(err)}`, { cause: err });
      return { result: { status: 'failed', resource: result.resource, error }, mqttRejected: true };
    }
  }
  return { result, mqttRejected: false };
}

export async function ensureDevice(
  client: ThingsBoardClient,
  spec: DeviceSpec,
  ledger: ResourceLedger,
  opts: DeviceProvisionOptions = {},
): Promise<TbDevice> {
  const deviceResult = await ensure<TbDevice>({
    kind: 'device',
    name: spec.name,
    find: () => client.findDevice(spec.name),
    create: async () => {
      const created = await client.createDevice(spec.name);
      console.log(`[${SERVICE}] created device ${spec.name}`);
      return created;
    },
  });
  const device = ledger.settle(deviceResult);

  const { result: credResult, mqttRejected } = await assignToken(client, device, spec, opts);
  if (credResult.status === 'failed' && deviceResult.status === 'created') {
    // The device now exists but cannot be used as configured; surface it distinctly
    const message = mqttRejected
      ? `device ${spec.name} was created with the configured token, but ${credResult.error.message}`
      : `device ${spec.name} was created but its token could not be assigned: ${credResult.error.message}`;
    ledger.settle({
      status: 'failed',
      resource: credResult.resource,
      error: new PartialSuccessError(message, {
        resource: `device ${spec.name}`,
        cause: credResult.error,
      }),
    });
  }
  ledger.settle(credResult);
  console.log(`[${SERVICE}] ensured device ${spec.name} (${deviceResult.status}, token ${credResult.status})`);
  return device;
}

export async function provisionDevices(
  client: ThingsBoardClient,
  cfg: ThingsBoardConfig,
  policy: RetryPolicy,
  ledger: ResourceLedger,
  wait?: WaitOptions,
): Promise<void> {
  await waitFor(`thingsboard ${cfg.url}`, () => client.health(), policy, wait);
  // Login can fail for a while after the API answers, until the demo tenant is loaded
  await waitFor('thingsboard login', () => client.login(), policy, wait);
  console.log(`[${SERVICE}] authenticated against ThingsBoard`);
  for (const spec of cfg.devices) {
    await ensureDevice(client, spec, ledger, { verifyMqttUrl: cfg.mqttUrl });
  }
}

export function kafkaNodeConfiguration(kafka: KafkaConfig): Record<string, unknown> {
  return {
    topic: kafka.topic,
    bootstrapServers: kafka.internalBootstrap,
    sync: false,
    timeout: 3000,
    retries: 1,
    acks: '1',
    batchSize: 16384,
    linger: 1,
    maxRequestSize: 1048576,
    key: '${deviceName}',
    addMetadata: false,
  };
}

function kafkaNode(chainId: string, kafka: KafkaConfig): TbRuleNode {
  return {
    id: { entityType: 'RULE_NODE', id: uuidv4() },
    createdTime: Date.now(),
    ruleChainId: { entityType: 'RULE_CHAIN', id: chainId },
    type: KAFKA_NODE_TYPE,
    name: 'Kafka sink',
    debugSettings: null,
    singletonMode: false,
    queueName: null,
    configurationVersion: 0,
    configuration: kafkaNodeConfiguration(kafka),
    externalId: null,
    additionalInfo: { layoutX: 1000, layoutY: 320 },
  };
}

function sinkDrift(node: TbRuleNode, kafka: KafkaConfig): string | null {
  const conf = node.configuration ?? {};
  const drift: string[] = [];
  if (conf.topic !== kafka.topic) drift.push(`topic ${String(conf.topic)}`);
  if (conf.bootstrapServers !== kafka.internalBootstrap) drift.push(`bootstrapServers ${String(conf.bootstrapServers)}`);
  return drift.length ? drift.join(', ') : null;
}

/**
 * Make the root rule chain forward "Post telemetry" messages to Kafka:
 * a TbKafkaNode for the topic plus a connection from the message type switch.
 * Metadata is saved once, and only when something changed.
 */
export async function provisionKafkaSink(
  client: ThingsBoardClient,
  cfg: ThingsBoardConfig,
  kafka: KafkaConfig,
  policy: RetryPolicy,
  ledger: ResourceLedger,
  wait?: WaitOptions,
): Promise<void> {
  await waitFor(`thingsboard ${cfg.url}`, () => client.health(), policy, wait);
  await waitFor('thingsboard login', () => client.login(), policy, wait);

  const chain = await client.findRuleChain(cfg.rootRuleChain);
  if (!chain) throw new RequestError(`rule chain "${cfg.rootRuleChain}" not found`, { resource: `rule chain ${cfg.rootRuleChain}` });
  const metadata = await client.getRuleChainMetadata(chain.id.id);
  const nodes = [...metadata.nodes];
  const connections = [...(metadata.connections ?? [])];
  const switchIndex = nodes.findIndex((n) => n.type.includes(MSG_TYPE_SWITCH));
  if (switchIndex < 0) {
    throw new RequestError(`Message Type Switch node not found in "${cfg.rootRuleChain}"`, { resource: `rule chain ${cfg.rootRuleChain}` });
  }

  let dirty = false;
  let kafkaIndex = -1;
  await ledger.ensure<TbRuleNode>({
    kind: 'rule-node',
    name: `${cfg.rootRuleChain}/Kafka sink`,
    find: async () => {
      kafkaIndex = nodes.findIndex((n) => n.type === KAFKA_NODE_TYPE);
      return kafkaIndex >= 0 ? nodes[kafkaIndex] : null;
    },
    create: async () => {
      const node = kafkaNode(chain.id.id, kafka);
      nodes.push(node);
      kafkaIndex = nodes.length - 1;
      dirty = true;
      return node;
    },
    diff: (node) => sinkDrift(node, kafka),
    update: async (node) => {
      const updated = { ...node, configuration: { ...(node.configuration ?? {}), ...kafkaNodeConfiguration(kafka) } };
      nodes[kafkaIndex] = updated;
      dirty = true;
      return updated;
    },
  });

  await ledger.ensure<TbConnection>({
    kind: 'rule-connection',
    name: `${cfg.rootRuleChain}/Post telemetry -> Kafka sink`,
    find: async () => connections.find((c) => c.fromIndex === switchIndex && c.toIndex === kafkaIndex && c.type === 'Post telemetry') ?? null,
    create: async () => {
      const conn: TbConnection = { fromIndex: switchIndex, toIndex: kafkaIndex, type: 'Post telemetry' };
      connections.push(conn);
      dirty = true;
      return conn;
    },
  });

  if (!dirty) return;
  try {
    await client.saveRuleChainMetadata({ ...metadata, nodes, connections });
  } catch (err) {
    // Nodes and connections above were only staged locally; mark them failed
    for (const o of ledger.outcomes) {
      if ((o.kind === 'rule-node' || o.kind === 'rule-connection') && o.status !== 'already-present') o.status = 'failed';
    }
    throw err;
  }
  console.log(`[${SERVICE}] root rule chain updated with Kafka forwarding to ${kafka.topic}`);
}
