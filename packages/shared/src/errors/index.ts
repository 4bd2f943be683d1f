/**
 * Custom error hierarchy for KenDB3
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'CONFIGURATION'
  | 'LOOKUP'
  | 'DATA'
  | 'DOMAIN'
  | 'DATABASE'
  | 'NETWORK'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  model?: string;
  [key: string]: unknown;
}

/**
 * Base error class for KenDB3
 */
export class KenDbError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'KenDbError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (user input, schema validation)
 */
export class ValidationError extends KenDbError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Database errors
 */
export class DatabaseError extends KenDbError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'DATABASE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'DatabaseError';
  }
}

/**
 * Configuration errors
 *
 * Raised while models are declared and assembled. They point at a
 * programming mistake and are never handled at runtime.
 */
export class ConfigurationError extends KenDbError {
  constructor(message: string, context: Partial<ErrorContext> = {}, code = 'E6001') {
    super(message, code, {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

export class AlreadyAssembledError extends ConfigurationError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, context, 'E6002');
    this.name = 'AlreadyAssembledError';
  }
}

export class AmbiguousMarkerError extends ConfigurationError {
  public readonly attributeNames: readonly string[];

  constructor(message: string, attributeNames: readonly string[], context: Partial<ErrorContext> = {}) {
    super(message, { ...context, attributeNames }, 'E6003');
    this.name = 'AmbiguousMarkerError';
    this.attributeNames = attributeNames;
  }
}

export class GroupTypeError extends ConfigurationError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, context, 'E6004');
    this.name = 'GroupTypeError';
  }
}

export class AttributeNotFoundError extends ConfigurationError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, context, 'E6005');
    this.name = 'AttributeNotFoundError';
  }
}

/**
 * Lookup errors - caused by what a client asked for
 */
export class LookupError extends KenDbError {
  constructor(message: string, code = 'E7001', context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'LOOKUP',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'LookupError';
  }
}

export class UnknownFieldGroupError extends LookupError {
  public readonly group: string;

  constructor(group: string, context: Partial<ErrorContext> = {}) {
    super(`No fields registered in group '${group}'`, 'E7002', { ...context, group });
    this.name = 'UnknownFieldGroupError';
    this.group = group;
  }
}

export class ObjectNotFoundError extends LookupError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E7003', context);
    this.name = 'ObjectNotFoundError';
  }
}

export class MultipleObjectsError extends LookupError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E7004', context);
    this.name = 'MultipleObjectsError';
  }
}

/**
 * Data errors (malformed identifiers, payload values of the wrong shape)
 */
export class DataError extends KenDbError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E8001', {
      category: 'DATA',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'DataError';
  }
}

/**
 * Domain errors (model-level invariants)
 */
export class DomainError extends KenDbError {
  constructor(message: string, code = 'E9001', context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'DOMAIN',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'DomainError';
  }
}

export class IncomparableVersionsError extends DomainError {
  constructor(left: string, right: string, context: Partial<ErrorContext> = {}) {
    super(`Attempted to compare versions of different families: ${left} and ${right}.`, 'E9002', context);
    this.name = 'IncomparableVersionsError';
  }
}

/**
 * HTTP status code an error maps to at the API boundary
 */
export function httpStatusFor(error: unknown): number {
  if (!(error instanceof KenDbError)) {
    return 500;
  }
  switch (error.context.category) {
    case 'LOOKUP':
    case 'DATA':
    case 'VALIDATION':
      return 400;
    default:
      return 500;
  }
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): KenDbError {
  if (error instanceof KenDbError) {
    return error;
  }

  if (error instanceof Error) {
    return new KenDbError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new KenDbError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
