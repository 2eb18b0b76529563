#!/usr/bin/env node
/**
 * Provisioning Service
 * ---------------------------------------------
 * Purpose
 * - Bring the drone telemetry stack (ThingsBoard, Kafka, ClickHouse, Grafana)
 *   into its target configuration, idempotently, in one run-to-completion pass.
 *
 * Steps (in order)
 * - containers: engine running, network present, service containers up and reachable.
 * - kafka-topic: telemetry topic with the configured partition count.
 * - clickhouse-schema: Kafka ingestion table, persisted table, materialized view.
 * - thingsboard-devices: one device per configured name, bound to its fixed access token.
 * - thingsboard-kafka-sink: root rule chain forwards "Post telemetry" to Kafka.
 * - grafana: ClickHouse datasource, dashboard and alert rules.
 *
 * Environment & Dependencies
 * - See src/config.ts; values can also come from a `.env` file in the working directory.
 * - Services are only reached over their public APIs; nothing is persisted locally.
 *
 * Operational Notes
 * - Waiting for services is a bounded poll (RETRY_ATTEMPTS x RETRY_DELAY_MS, fixed or exponential).
 * - A failed step stops the run; earlier steps stay applied. Re-running is the recovery path.
 * - Two runs against the same services at the same time are not coordinated.
 *
 * Security Notes
 * - Passwords and device tokens are never logged.
 */
import dotenv from 'dotenv';
import { SERVICE, loadConfig } from './config.js';
import { describeError } from './errors.js';
import { countByStatus, formatReport } from './report.js';
import { registerShutdown } from './shutdown.js';
import { buildSteps } from './steps.js';
import { runWorkflow } from './workflow.js';

dotenv.config();

async function main() {
  console.log(`[${SERVICE}] starting...`);
  const config = loadConfig();
  console.log(
    `[${SERVICE}] targets: kafka=${config.kafka.brokers.join(',')} clickhouse=${config.clickhouse.url} thingsboard=${config.thingsboard.url} grafana=${config.grafana.url} devices=${config.thingsboard.devices.length}`,
  );
  const controller = new AbortController();
  registerShutdown(controller);

  const report = await runWorkflow(buildSteps(), config, controller.signal);
  for (const line of formatReport(report)) console.log(`[${SERVICE}] ${line}`);
  const counts = countByStatus(report);
  console.log(`[${SERVICE}] resources: ${Object.entries(counts).map(([k, v]) => `${k}=${v}`).join(' ') || 'none'}`);
  if (!report.ok) process.exitCode = 1;
}

main().catch((e) => {
  console.error(`[${SERVICE}] ${describeError(e)}`);
  process.exitCode = 1;
});
