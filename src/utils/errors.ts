/**
 * Error types and codes for paramdoc.
 * All errors raised by the library extend ParamDocError.
 */

/**
 * Base error class for all paramdoc errors.
 */
export class ParamDocError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ParamDocError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends ParamDocError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends ParamDocError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * A descriptor with a blank name or description.
 * Raised while a registry is built; the registry is never usable afterwards.
 */
export class InvalidDescriptorError extends ParamDocError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InvalidDescriptorError';
  }
}

/**
 * Documented and actual parameter names did not correspond.
 */
export class VerificationFailedError extends ParamDocError {
  constructor(
    message: string,
    public readonly undocumented: string[],
    public readonly missing: string[]
  ) {
    super(ErrorCodes.VERIFICATION_FAILED, message, { undocumented, missing });
    this.name = 'VerificationFailedError';
  }
}

/**
 * A post-condition of the verifier itself did not hold.
 */
export class InternalConsistencyError extends ParamDocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INTERNAL_CONSISTENCY, message, details);
    this.name = 'InternalConsistencyError';
  }
}

/**
 * Path parameters were requested for an operation without a URL template.
 */
export class MissingUrlTemplateError extends ParamDocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.MISSING_URL_TEMPLATE, message, details);
    this.name = 'MissingUrlTemplateError';
  }
}

export const ErrorCodes = {
  // Descriptor errors (D001-D002)
  BLANK_NAME: 'D001',
  BLANK_DESCRIPTION: 'D002',

  // Verification errors
  VERIFICATION_FAILED: 'V001',
  INTERNAL_CONSISTENCY: 'X001',

  // Operation errors
  MISSING_URL_TEMPLATE: 'P001',

  // Config errors
  CONFIG_LOAD_ERROR: 'C001',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  INVALID_DOCUMENT: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
