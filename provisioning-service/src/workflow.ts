import { SERVICE, type ProvisionerConfig } from './config.js';
import { ResourceLedger } from './ensure.js';
import { ProvisioningError, toProvisioningError, type ErrorKind } from './errors.js';
import type { ResourceOutcome } from './types.js';

export type StepId =
  | 'containers'
  | 'kafka-topic'
  | 'clickhouse-schema'
  | 'thingsboard-devices'
  | 'thingsboard-kafka-sink'
  | 'grafana';

export type StepStatus = 'succeeded' | 'failed' | 'skipped' | 'disabled';

export interface StepContext {
  config: ProvisionerConfig;
  ledger: ResourceLedger;
  signal: AbortSignal;
}

export interface WorkflowStep {
  id: StepId;
  title: string;
  enabled(config: ProvisionerConfig): boolean;
  run(ctx: StepContext): Promise<void>;
}

export interface StepReport {
  id: StepId;
  title: string;
  status: StepStatus;
  resources: ResourceOutcome[];
  error?: { kind: ErrorKind; message: string; resource?: string };
  durationMs: number;
}

export interface WorkflowReport {
  ok: boolean;
  failedStep?: StepId;
  steps: StepReport[];
}

/**
 * Run steps strictly in order. The first failing step stops the run; the
 * steps after it are reported as skipped and nothing already applied is
 * rolled back.
 */
export async function runWorkflow(steps: WorkflowStep[], config: ProvisionerConfig, signal: AbortSignal): Promise<WorkflowReport> {
  const reports: StepReport[] = [];
  let failedStep: StepId | undefined;

  for (const step of steps) {
    if (failedStep !== undefined) {
      reports.push({ id: step.id, title: step.title, status: 'skipped', resources: [], durationMs: 0 });
      continue;
    }
    if (!step.enabled(config)) {
      console.log(`[${SERVICE}] step ${step.id} disabled by configuration`);
      reports.push({ id: step.id, title: step.title, status: 'disabled', resources: [], durationMs: 0 });
      continue;
    }
    const ledger = new ResourceLedger();
    const started = Date.now();
    console.log(`[${SERVICE}] step ${step.id}: ${step.title}`);
    try {
      if (signal.aborted) throw new ProvisioningError('aborted', 'run aborted before step started');
      await step.run({ config, ledger, signal });
      reports.push({ id: step.id, title: step.title, status: 'succeeded', resources: ledger.outcomes, durationMs: Date.now() - started });
    } catch (err) {
      const e = toProvisioningError(err);
      console.error(`[${SERVICE}] step ${step.id} failed (${e.kind}): ${e.message}`);
      failedStep = step.id;
      reports.push({
        id: step.id,
        title: step.title,
        status: 'failed',
        resources: ledger.outcomes,
        error: e.resource === undefined ? { kind: e.kind, message: e.message } : { kind: e.kind, message: e.message, resource: e.resource },
        durationMs: Date.now() - started,
      });
    }
  }

  return failedStep === undefined ? { ok: true, steps: reports } : { ok: false, failedStep, steps: reports };
}
