import { ConflictError, ProvisioningError, toProvisioningError } from './errors.js';
import type { ResourceKind, ResourceOutcome, ResourceRef } from './types.js';

/**
 * Declarative description of one external resource.
 *
 * `find` returns null when the resource is absent. `diff` returns a short
 * description of how an existing resource diverges from the desired state, or
 * null when it matches. Divergent resources are updated through `update` when
 * given, otherwise they are reported as conflicts.
 */
export interface EnsureSpec<T> {
  kind: ResourceKind;
  name: string;
  find(): Promise<T | null>;
  create(): Promise<T>;
  diff?(existing: T): string | null;
  update?(existing: T): Promise<T>;
}

export type EnsureResult<T> =
  | { status: 'created' | 'already-present' | 'updated'; resource: ResourceRef; value: T; detail?: string }
  | { status: 'failed'; resource: ResourceRef; error: ProvisioningError };

export async function ensure<T>(spec: EnsureSpec<T>): Promise<EnsureResult<T>> {
  const resource: ResourceRef = { kind: spec.kind, name: spec.name };
  const label = `${spec.kind} ${spec.name}`;
  try {
    const existing = await spec.find();
    if (existing === null) {
      const value = await spec.create();
      return { status: 'created', resource, value };
    }
    const drift = spec.diff ? spec.diff(existing) : null;
    if (drift === null) return { status: 'already-present', resource, value: existing };
    if (!spec.update) {
      throw new ConflictError(`${label} exists with incompatible configuration: ${drift}`, { resource: label });
    }
    const value = await spec.update(existing);
    return { status: 'updated', resource, value, detail: drift };
  } catch (err) {
    return { status: 'failed', resource, error: toProvisioningError(err, label) };
  }
}

export function toOutcome<T>(result: EnsureResult<T>): ResourceOutcome {
  if (result.status === 'failed') {
    return { ...result.resource, status: 'failed', detail: result.error.message };
  }
  return result.detail === undefined
    ? { ...result.resource, status: result.status }
    : { ...result.resource, status: result.status, detail: result.detail };
}

/**
 * Collects the outcome of every resource a step touches. The first failure
 * is recorded and rethrown so the step stops there.
 */
export class ResourceLedger {
  readonly outcomes: ResourceOutcome[] = [];

  async ensure<T>(spec: EnsureSpec<T>): Promise<T> {
    const result = await ensure(spec);
    return this.settle(result);
  }

  settle<T>(result: EnsureResult<T>): T {
    this.outcomes.push(toOutcome(result));
    if (result.status === 'failed') throw result.error;
    return result.value;
  }

  /** Attach extra detail to the most recent outcome for a resource. */
  annotate(ref: ResourceRef, detail: string): void {
    for (let i = this.outcomes.length - 1; i >= 0; i--) {
      const o = this.outcomes[i];
      if (o.kind === ref.kind && o.name === ref.name) {
        o.detail = o.detail ? `${o.detail}; ${detail}` : detail;
        return;
      }
    }
  }
}
