import type { ProvisionerConfig } from './config.js';
import { ClickHouseClient, provisionSchema, type SchemaStore } from './clickhouse.js';
import { probeTcp, provisionContainers, spawnCommand, type CommandRunner, type PortProbe } from './container.js';
import { GrafanaClient, provisionGrafana } from './grafana.js';
import type { FetchLike } from './http.js';
import { createTopicAdmin, provisionTopic, type TopicAdmin } from './kafka.js';
import type { WaitOptions } from './retry.js';
import { ThingsBoardClient, provisionDevices, provisionKafkaSink } from './thingsboard.js';
import type { StepContext, WorkflowStep } from './workflow.js';

/** Seams to the outside world; tests swap these for in-process fakes. */
export interface ServiceDeps {
  run: CommandRunner;
  probe: PortProbe;
  fetch?: FetchLike;
  topicAdmin(config: ProvisionerConfig): TopicAdmin;
  schemaStore?(config: ProvisionerConfig): SchemaStore;
  sleep?: (ms: number) => Promise<void>;
}

export const defaultDeps: ServiceDeps = {
  run: spawnCommand,
  probe: probeTcp,
  topicAdmin: (config) => createTopicAdmin(config.kafka),
};

function waitOptions(deps: ServiceDeps, ctx: StepContext): WaitOptions {
  return deps.sleep ? { signal: ctx.signal, sleep: deps.sleep } : { signal: ctx.signal };
}

/** The provisioning steps in dependency order. */
export function buildSteps(deps: ServiceDeps = defaultDeps): WorkflowStep[] {
  const thingsboard = (c: ProvisionerConfig) => new ThingsBoardClient(c.thingsboard, c.httpTimeoutMs, deps.fetch);

  return [
    {
      id: 'containers',
      title: 'container runtime and service containers',
      enabled: (c) => c.containers.enabled,
      run: (ctx) =>
        provisionContainers(ctx.config.containers, { run: deps.run, probe: deps.probe, wait: waitOptions(deps, ctx) }, ctx.config.retry, ctx.ledger),
    },
    {
      id: 'kafka-topic',
      title: 'broker topic',
      enabled: () => true,
      run: (ctx) => provisionTopic(deps.topicAdmin(ctx.config), ctx.config.kafka, ctx.config.retry, ctx.ledger, waitOptions(deps, ctx)),
    },
    {
      id: 'clickhouse-schema',
      title: 'columnar store ingestion table and materialized view',
      enabled: () => true,
      run: (ctx) => {
        const store = deps.schemaStore
          ? deps.schemaStore(ctx.config)
          : new ClickHouseClient(ctx.config.clickhouse, ctx.config.httpTimeoutMs, deps.fetch);
        return provisionSchema(store, ctx.config.clickhouse, ctx.config.kafka, ctx.config.retry, ctx.ledger, waitOptions(deps, ctx));
      },
    },
    {
      id: 'thingsboard-devices',
      title: 'telemetry platform devices and access tokens',
      enabled: () => true,
      run: (ctx) => provisionDevices(thingsboard(ctx.config), ctx.config.thingsboard, ctx.config.retry, ctx.ledger, waitOptions(deps, ctx)),
    },
    {
      id: 'thingsboard-kafka-sink',
      title: 'telemetry platform rule chain forwarding to the broker',
      enabled: (c) => c.thingsboard.kafkaSink,
      run: (ctx) =>
        provisionKafkaSink(thingsboard(ctx.config), ctx.config.thingsboard, ctx.config.kafka, ctx.config.retry, ctx.ledger, waitOptions(deps, ctx)),
    },
    {
      id: 'grafana',
      title: 'dashboard datasource, dashboard and alert rules',
      enabled: () => true,
      run: (ctx) =>
        provisionGrafana(
          new GrafanaClient(ctx.config.grafana, ctx.config.httpTimeoutMs, deps.fetch),
          ctx.config.grafana,
          ctx.config.clickhouse,
          ctx.config.retry,
          ctx.ledger,
          waitOptions(deps, ctx),
        ),
    },
  ];
}
