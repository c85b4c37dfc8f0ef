/**
 * Built-in reactions to a documented/actual parameter mismatch.
 */
import { VerificationFailedError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { VerificationFailureHandler } from './types.js';

/** Label used in messages, e.g. "Request parameters ..." */
export type ParameterKind = 'Request' | 'Path';

export type FailurePolicy = 'error' | 'warn';

function list(names: ReadonlySet<string>): string {
  return `[${Array.from(names).join(', ')}]`;
}

/**
 * Human-readable summary naming every offending parameter.
 */
export function describeDiscrepancy(
  kind: ParameterKind,
  undocumented: ReadonlySet<string>,
  missing: ReadonlySet<string>
): string {
  const parts: string[] = [];
  if (undocumented.size > 0) {
    parts.push(`${kind} parameters with the following names were not documented: ${list(undocumented)}`);
  }
  if (missing.size > 0) {
    parts.push(`${kind} parameters with the following names were not found in the request: ${list(missing)}`);
  }
  return parts.join('. ');
}

/**
 * Default handler: any mismatch is fatal to the documentation attempt.
 */
export class ThrowingFailureHandler implements VerificationFailureHandler {
  constructor(private readonly kind: ParameterKind) {}

  verificationFailed(undocumented: ReadonlySet<string>, missing: ReadonlySet<string>): never {
    throw new VerificationFailedError(
      describeDiscrepancy(this.kind, undocumented, missing),
      Array.from(undocumented),
      Array.from(missing)
    );
  }
}

/**
 * Logs the mismatch as a warning and lets the model be built anyway.
 */
export class LoggingFailureHandler implements VerificationFailureHandler {
  constructor(
    private readonly kind: ParameterKind,
    private readonly log: Pick<Logger, 'warn'>
  ) {}

  verificationFailed(undocumented: ReadonlySet<string>, missing: ReadonlySet<string>): void {
    this.log.warn(describeDiscrepancy(this.kind, undocumented, missing), {
      undocumented: Array.from(undocumented),
      missing: Array.from(missing),
    });
  }
}

export function createFailureHandler(
  kind: ParameterKind,
  policy: FailurePolicy,
  log: Pick<Logger, 'warn'>
): VerificationFailureHandler {
  return policy === 'warn' ? new LoggingFailureHandler(kind, log) : new ThrowingFailureHandler(kind);
}
