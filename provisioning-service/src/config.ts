// Service configuration and typed environment access
import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import type { RetryPolicy } from './retry.js';

export const SERVICE = 'provisioning-service';

// Default to repo-level config/services.json resolved relative to this file
const DEFAULT_SERVICES_FILE = new URL('../../config/services.json', import.meta.url).pathname;

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');
const flag = (fallback: 'true' | 'false') => z.string().default(fallback).transform((v) => v.toLowerCase() === 'true');
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const list = (fallback: string) => z.string().default(fallback).transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean));

/** Parse a JSON-valued environment variable before validating its shape. */
function jsonText<T extends z.ZodTypeAny>(schema: T, fallback: string) {
  return z
    .string()
    .default(fallback)
    .transform((text, ctx) => {
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid JSON: ${describeError(err)}` });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

export const DeviceSpecSchema = z.object({
  name: z.string().min(1),
  token: z.string().min(1),
});
export type DeviceSpec = z.infer<typeof DeviceSpecSchema>;

export const AlertRuleSpecSchema = z.object({
  metric: z.enum(['battery', 'altitude', 'speed', 'latitude', 'longitude']),
  operator: z.enum(['<', '>']),
  threshold: z.number(),
  window: z.string().regex(/^\d+[smh]$/, 'window must look like 30s, 5m or 1h'),
});
export type AlertRuleSpec = z.infer<typeof AlertRuleSpecSchema>;

export const ContainerSpecSchema = z.object({
  name: z.string().min(1),
  image: z.string().min(1),
  ports: z.array(z.string().regex(/^\d+:\d+$/)).default([]),
  volumes: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  command: z.array(z.string()).default([]),
  ready: z.object({ host: z.string().default('127.0.0.1'), port: z.number().int().positive() }),
});
export type ContainerSpec = z.infer<typeof ContainerSpecSchema>;

const ServicesFileSchema = z.object({ services: z.array(ContainerSpecSchema) });

const DEFAULT_DEVICES = JSON.stringify([
  { name: 'drone-1', token: 'drone-1-token' },
  { name: 'drone-2', token: 'drone-2-token' },
  { name: 'drone-3', token: 'drone-3-token' },
]);

const DEFAULT_ALERT_RULES = JSON.stringify([
  { metric: 'battery', operator: '<', threshold: 20, window: '5m' },
  { metric: 'altitude', operator: '<', threshold: 30, window: '1m' },
]);

const EnvSchema = z.object({
  RETRY_ATTEMPTS: positiveInt(30),
  RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  RETRY_BACKOFF: z.enum(['fixed', 'exponential']).default('fixed'),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(15000),
  HTTP_TIMEOUT_MS: positiveInt(30000),

  CONTAINERS_ENABLED: flag('true'),
  CONTAINER_RUNTIME: z.string().min(1).default('docker'),
  CONTAINER_NETWORK: z.string().min(1).default('telemetry-net'),
  SERVICES_FILE: z.string().min(1).default(DEFAULT_SERVICES_FILE),

  KAFKA_BROKERS: list('localhost:9094'),
  KAFKA_CLIENT_ID: z.string().min(1).default(SERVICE),
  KAFKA_TOPIC: z.string().min(1).default('tb-telemetry'),
  KAFKA_PARTITIONS: positiveInt(1),
  KAFKA_REPLICATION_FACTOR: positiveInt(1),
  // Broker address as seen from inside the container network (ClickHouse, ThingsBoard)
  KAFKA_INTERNAL_BOOTSTRAP: z.string().min(1).default('kafka:9092'),

  CLICKHOUSE_URL: z.string().url().default('http://localhost:8123'),
  CLICKHOUSE_USER: z.string().default('default'),
  CLICKHOUSE_PASSWORD: z.string().default(''),
  CLICKHOUSE_DATABASE: identifier.default('telemetry'),
  CLICKHOUSE_QUEUE_TABLE: identifier.default('drone_telemetry_queue'),
  CLICKHOUSE_TARGET_TABLE: identifier.default('drone_telemetry'),
  CLICKHOUSE_VIEW: identifier.default('drone_telemetry_mv'),
  CLICKHOUSE_CONSUMER_GROUP: z.string().min(1).default('clickhouse-drone-telemetry'),
  CLICKHOUSE_NUM_CONSUMERS: positiveInt(1),
  CLICKHOUSE_SKIP_BROKEN_MESSAGES: z.coerce.number().int().nonnegative().default(10),

  TB_URL: z.string().url().default('http://localhost:8080'),
  TB_USERNAME: z.string().min(1).default('tenant@thingsboard.org'),
  TB_PASSWORD: z.string().default('tenant'),
  TB_DEVICE_TYPE: z.string().min(1).default('drone'),
  TB_DEVICES: jsonText(z.array(DeviceSpecSchema), DEFAULT_DEVICES),
  TB_KAFKA_SINK: flag('true'),
  TB_ROOT_RULE_CHAIN: z.string().min(1).default('Root Rule Chain'),
  TB_MQTT_URL: z.string().optional().transform((v) => (v ? v : undefined)),

  GRAFANA_URL: z.string().url().default('http://localhost:3000'),
  GRAFANA_USER: z.string().min(1).default('admin'),
  GRAFANA_PASSWORD: z.string().default('admin'),
  GRAFANA_FOLDER_UID: z.string().min(1).default('drone-telemetry'),
  GRAFANA_FOLDER_TITLE: z.string().min(1).default('Drone Telemetry'),
  GRAFANA_DATASOURCE_UID: z.string().min(1).default('clickhouse-telemetry'),
  GRAFANA_DATASOURCE_NAME: z.string().min(1).default('ClickHouse Telemetry'),
  GRAFANA_CLICKHOUSE_HOST: z.string().min(1).default('clickhouse'),
  GRAFANA_CLICKHOUSE_PORT: positiveInt(8123),
  GRAFANA_DASHBOARD_UID: z.string().min(1).default('drone-fleet'),
  GRAFANA_DASHBOARD_TITLE: z.string().min(1).default('Drone Fleet'),
  GRAFANA_ALERT_RULES: jsonText(z.array(AlertRuleSpecSchema), DEFAULT_ALERT_RULES),
});

export interface ContainerConfig {
  enabled: boolean;
  runtime: string;
  network: string;
  services: ContainerSpec[];
}

export interface KafkaConfig {
  brokers: string[];
  clientId: string;
  topic: string;
  partitions: number;
  replicationFactor: number;
  internalBootstrap: string;
}

export interface ClickHouseConfig {
  url: string;
  user: string;
  password: string;
  database: string;
  queueTable: string;
  targetTable: string;
  view: string;
  consumerGroup: string;
  numConsumers: number;
  skipBrokenMessages: number;
}

export interface ThingsBoardConfig {
  url: string;
  username: string;
  password: string;
  deviceType: string;
  devices: DeviceSpec[];
  kafkaSink: boolean;
  rootRuleChain: string;
  mqttUrl?: string;
}

export interface GrafanaConfig {
  url: string;
  username: string;
  password: string;
  folder: { uid: string; title: string };
  datasource: { uid: string; name: string; clickhouseHost: string; clickhousePort: number };
  dashboard: { uid: string; title: string };
  alertRules: AlertRuleSpec[];
}

/** Everything a provisioning run needs; passed explicitly to each step. */
export interface ProvisionerConfig {
  retry: RetryPolicy;
  httpTimeoutMs: number;
  containers: ContainerConfig;
  kafka: KafkaConfig;
  clickhouse: ClickHouseConfig;
  thingsboard: ThingsBoardConfig;
  grafana: GrafanaConfig;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function loadServices(file: string): ContainerSpec[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`failed to read services file ${file}: ${describeError(err)}`, { cause: err });
  }
  const parsed = ServicesFileSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`invalid services file ${file}: ${formatIssues(parsed.error)}`);
  return parsed.data.services;
}

function uniqueNames(devices: DeviceSpec[]): void {
  const seen = new Set<string>();
  for (const d of devices) {
    if (seen.has(d.name)) throw new ConfigError(`TB_DEVICES: duplicate device name ${d.name}`);
    seen.add(d.name);
  }
}

/** Validate the environment into a ProvisionerConfig. Throws ConfigError on invalid input. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProvisionerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(`invalid configuration: ${formatIssues(parsed.error)}`);
  const e = parsed.data;
  uniqueNames(e.TB_DEVICES);

  return {
    retry: {
      attempts: e.RETRY_ATTEMPTS,
      delayMs: e.RETRY_DELAY_MS,
      backoff: e.RETRY_BACKOFF,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    containers: {
      enabled: e.CONTAINERS_ENABLED,
      runtime: e.CONTAINER_RUNTIME,
      network: e.CONTAINER_NETWORK,
      // The services file is only required when containers are managed here
      services: e.CONTAINERS_ENABLED ? loadServices(e.SERVICES_FILE) : [],
    },
    kafka: {
      brokers: e.KAFKA_BROKERS,
      clientId: e.KAFKA_CLIENT_ID,
      topic: e.KAFKA_TOPIC,
      partitions: e.KAFKA_PARTITIONS,
      replicationFactor: e.KAFKA_REPLICATION_FACTOR,
      internalBootstrap: e.KAFKA_INTERNAL_BOOTSTRAP,
    },
    clickhouse: {
      url: e.CLICKHOUSE_URL,
      user: e.CLICKHOUSE_USER,
      password: e.CLICKHOUSE_PASSWORD,
      database: e.CLICKHOUSE_DATABASE,
      queueTable: e.CLICKHOUSE_QUEUE_TABLE,
      targetTable: e.CLICKHOUSE_TARGET_TABLE,
      view: e.CLICKHOUSE_VIEW,
      consumerGroup: e.CLICKHOUSE_CONSUMER_GROUP,
      numConsumers: e.CLICKHOUSE_NUM_CONSUMERS,
      skipBrokenMessages: e.CLICKHOUSE_SKIP_BROKEN_MESSAGES,
    },
    thingsboard: {
      url: e.TB_URL,
      username: e.TB_USERNAME,
      password: e.TB_PASSWORD,
      deviceType: e.TB_DEVICE_TYPE,
      devices: e.TB_DEVICES,
      kafkaSink: e.TB_KAFKA_SINK,
      rootRuleChain: e.TB_ROOT_RULE_CHAIN,
      mqttUrl: e.TB_MQTT_URL,
    },
    grafana: {
      url: e.GRAFANA_URL,
      username: e.GRAFANA_USER,
      password: e.GRAFANA_PASSWORD,
      folder: { uid: e.GRAFANA_FOLDER_UID, title: e.GRAFANA_FOLDER_TITLE },
      datasource: {
        uid: e.GRAFANA_DATASOURCE_UID,
        name: e.GRAFANA_DATASOURCE_NAME,
        clickhouseHost: e.GRAFANA_CLICKHOUSE_HOST,
        clickhousePort: e.GRAFANA_CLICKHOUSE_PORT,
      },
      dashboard: { uid: e.GRAFANA_DASHBOARD_UID, title: e.GRAFANA_DASHBOARD_TITLE },
      alertRules: e.GRAFANA_ALERT_RULES,
    },
  };
}
