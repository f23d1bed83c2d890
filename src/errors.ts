/**
 * Error taxonomy
 *
 * Every failure snapkeep records carries a `kind`, which is what ends up in the
 * run summary and in the `snapkeep_failures_total{kind}` metric.
 */

export type FailureKind = 'invalid_policy' | 'catalog' | 'subsystem' | 'safety_violation';

export class SnapkeepError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SnapkeepError';
    this.kind = kind;
  }
}

/**
 * Malformed retention policy string. The dataset carrying it is skipped.
 */
export class InvalidPolicyError extends SnapkeepError {
  readonly policy: string;

  constructor(policy: string, reason: string) {
    super('invalid_policy', `Invalid retention policy "${policy}": ${reason}`);
    this.name = 'InvalidPolicyError';
    this.policy = policy;
  }
}

export class CatalogError extends SnapkeepError {
  readonly dataset: string;

  constructor(dataset: string, message: string) {
    super('catalog', `Snapshot catalog for ${dataset}: ${message}`);
    this.name = 'CatalogError';
    this.dataset = dataset;
  }
}

/**
 * A zfs(8) invocation failed (non-zero exit or could not be spawned).
 */
export class SubsystemError extends SnapkeepError {
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | null, stderr: string, options?: ErrorOptions) {
    const detail = stderr.trim() || `exit code ${exitCode ?? 'unknown'}`;
    super('subsystem', `zfs ${args.join(' ')} failed: ${detail}`, options);
    this.name = 'SubsystemError';
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Raised when a destroy target is not provably a snapshot of the dataset being
 * collected. Never retried, never downgraded to a skip.
 */
export class SafetyViolationError extends SnapkeepError {
  readonly target: string;

  constructor(target: string, reason: string) {
    super('safety_violation', `Refusing to destroy "${target}": ${reason}`);
    this.name = 'SafetyViolationError';
    this.target = target;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function failureKindOf(error: unknown): FailureKind {
  return error instanceof SnapkeepError ? error.kind : 'subsystem';
}
