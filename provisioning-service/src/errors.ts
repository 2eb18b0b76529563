// Error taxonomy shared by every provisioner

export type ErrorKind = 'unreachable' | 'conflict' | 'partial' | 'request' | 'config' | 'aborted';

interface ErrorOptions {
  resource?: string;
  cause?: unknown;
}

export class ProvisioningError extends Error {
  readonly kind: ErrorKind;
  resource?: string;

  constructor(kind: ErrorKind, message: string, opts: ErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'ProvisioningError';
    this.kind = kind;
    this.resource = opts.resource;
  }
}

/** Service down, connection refused, or readiness never reached. */
export class UnreachableError extends ProvisioningError {
  constructor(message: string, opts?: ErrorOptions) {
    super('unreachable', message, opts);
    this.name = 'UnreachableError';
  }
}

/** Resource exists with a configuration we will not reconcile automatically. */
export class ConflictError extends ProvisioningError {
  constructor(message: string, opts?: ErrorOptions) {
    super('conflict', message, opts);
    this.name = 'ConflictError';
  }
}

/**
 * Part of a resource was applied and the rest was not, e.g. a device created
 * whose token could not be assigned. Needs manual attention.
 */
export class PartialSuccessError extends ProvisioningError {
  constructor(message: string, opts?: ErrorOptions) {
    super('partial', message, opts);
    this.name = 'PartialSuccessError';
  }
}

export class RequestError extends ProvisioningError {
  readonly status?: number;

  constructor(message: string, opts: ErrorOptions & { status?: number } = {}) {
    super('request', message, opts);
    this.name = 'RequestError';
    this.status = opts.status;
  }
}

export class ConfigError extends ProvisioningError {
  constructor(message: string, opts?: ErrorOptions) {
    super('config', message, opts);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof RequestError && err.status === 404;
}

/** Classify anything thrown into a ProvisioningError and attach the resource if it has none. */
export function toProvisioningError(err: unknown, resource?: string): ProvisioningError {
  if (err instanceof ProvisioningError) {
    if (!err.resource && resource) err.resource = resource;
    return err;
  }
  return new RequestError(describeError(err), { resource, cause: err });
}
