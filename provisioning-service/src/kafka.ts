import { Kafka } from 'kafkajs';
import type { ITopicConfig, ITopicMetadata } from 'kafkajs';
import { SERVICE, type KafkaConfig } from './config.js';
import type { ResourceLedger } from './ensure.js';
import { ConfigError, describeError } from './errors.js';
import { waitFor, type RetryPolicy, type WaitOptions } from './retry.js';

/** The part of the kafkajs admin client the topic provisioner relies on. */
export interface TopicAdmin {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  listTopics(): Promise<string[]>;
  fetchTopicMetadata(options: { topics: string[] }): Promise<{ topics: ITopicMetadata[] }>;
  createTopics(options: { topics: ITopicConfig[]; waitForLeaders?: boolean; timeout?: number }): Promise<boolean>;
}

export interface TopicSpec {
  name: string;
  partitions: number;
  replicationFactor: number;
}

interface TopicLayout {
  partitions: number;
  replicationFactor: number;
}

export function createTopicAdmin(cfg: KafkaConfig): TopicAdmin {
  const kafka = new Kafka({
    clientId: cfg.clientId,
    brokers: cfg.brokers,
    connectionTimeout: 5000,
    requestTimeout: 10000,
    // Retries are driven by waitFor so the attempt budget stays in one place
    retry: { retries: 0 },
  });
  return kafka.admin();
}

export function validateTopic(spec: TopicSpec): void {
  if (!spec.name.trim()) throw new ConfigError('topic name must not be empty');
  if (!Number.isInteger(spec.partitions) || spec.partitions < 1) {
    throw new ConfigError(`topic ${spec.name}: partitions must be a positive integer, got ${spec.partitions}`);
  }
  if (!Number.isInteger(spec.replicationFactor) || spec.replicationFactor < 1) {
    throw new ConfigError(`topic ${spec.name}: replication factor must be a positive integer, got ${spec.replicationFactor}`);
  }
}

function layoutOf(meta: ITopicMetadata): TopicLayout {
  const first = meta.partitions[0];
  return { partitions: meta.partitions.length, replicationFactor: first ? first.replicas.length : 0 };
}

async function describeTopic(admin: TopicAdmin, name: string): Promise<TopicLayout | null> {
  const names = await admin.listTopics();
  if (!names.includes(name)) return null;
  const { topics } = await admin.fetchTopicMetadata({ topics: [name] });
  const meta = topics.find((t) => t.name === name);
  return meta ? layoutOf(meta) : null;
}

/**
 * Ensure a topic exists with exactly the requested partition count and
 * replication factor. A different layout on an existing topic is a conflict.
 */
export async function ensureTopic(admin: TopicAdmin, spec: TopicSpec, ledger: ResourceLedger): Promise<void> {
  validateTopic(spec);
  await ledger.ensure<TopicLayout>({
    kind: 'topic',
    name: spec.name,
    find: () => describeTopic(admin, spec.name),
    create: async () => {
      await admin.createTopics({
        topics: [{ topic: spec.name, numPartitions: spec.partitions, replicationFactor: spec.replicationFactor }],
        waitForLeaders: true,
      });
      console.log(`[${SERVICE}] created topic ${spec.name} partitions=${spec.partitions} replication=${spec.replicationFactor}`);
      return { partitions: spec.partitions, replicationFactor: spec.replicationFactor };
    },
    diff: (existing) => {
      const problems: string[] = [];
      if (existing.partitions !== spec.partitions) {
        problems.push(`partitions ${existing.partitions} (wanted ${spec.partitions})`);
      }
      if (existing.replicationFactor !== spec.replicationFactor) {
        problems.push(`replication factor ${existing.replicationFactor} (wanted ${spec.replicationFactor})`);
      }
      return problems.length ? problems.join(', ') : null;
    },
  });
}

/** Connect with the bounded retry policy, provision the topic, always disconnect. */
export async function provisionTopic(admin: TopicAdmin, cfg: KafkaConfig, policy: RetryPolicy, ledger: ResourceLedger, wait?: WaitOptions): Promise<void> {
  const spec: TopicSpec = { name: cfg.topic, partitions: cfg.partitions, replicationFactor: cfg.replicationFactor };
  validateTopic(spec);
  await waitFor(`kafka broker ${cfg.brokers.join(',')}`, () => admin.connect(), policy, wait);
  try {
    await ensureTopic(admin, spec, ledger);
  } finally {
    try {
      await admin.disconnect();
    } catch (err) {
      console.warn(`[${SERVICE}] kafka admin disconnect failed: ${describeError(err)}`);
    }
  }
}
