import type { WorkflowReport } from './workflow.js';

/** Human-readable status lines: one per step, one per resource under it. */
export function formatReport(report: WorkflowReport): string[] {
  const lines: string[] = [];
  for (const step of report.steps) {
    lines.push(`${step.id}: ${step.status}`);
    for (const r of step.resources) {
      lines.push(`  ${r.kind} ${r.name}: ${r.status}${r.detail ? ` (${r.detail})` : ''}`);
    }
    if (step.error) {
      lines.push(`  error [${step.error.kind}]${step.error.resource ? ` ${step.error.resource}` : ''}: ${step.error.message}`);
    }
  }
  lines.push(report.ok ? 'result: ok' : `result: failed at ${report.failedStep}`);
  return lines;
}

export function countByStatus(report: WorkflowReport): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const step of report.steps) {
    for (const r of step.resources) counts[r.status] = (counts[r.status] ?? 0) + 1;
  }
  return counts;
}
