/**
 * Error hierarchy for recordgen
 * Provides structured error handling with stable codes and context
 */

import { ErrorCode, type Severity } from '../errors/codes';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  recordName?: string; // Name of the record type being built
  field?: string; // Offending field name
  setting?: string; // Offending option name
  value?: unknown; // Problematic value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

/**
 * Base error class for all recordgen errors
 */
export abstract class RecordGenError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const {
      message,
      errorCode,
      severity = 'error',
      context,
      cause,
    } = params;
    super(message, { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }
}

/**
 * Record type construction errors (invalid names, shadowed fields,
 * undeclared type parameters, validator compilation)
 */
export class RecordConstructionError extends RecordGenError {
  constructor(params: ErrorParams<ErrorContext & { recordName: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONSTRUCTION_FAILED,
    });
  }

  get recordName(): string | undefined {
    return this.context?.recordName;
  }
}

/**
 * Raised when a constructed record type does not declare exactly the
 * requested fields.
 */
export class ConstructionMismatchError extends RecordConstructionError {
  public readonly expected: readonly string[];
  public readonly actual: readonly string[];

  constructor(params: {
    recordName: string;
    expected: readonly string[];
    actual: readonly string[];
  }) {
    const { recordName, expected, actual } = params;
    super({
      message:
        `Record type ${recordName} declares ${actual.length} field(s), ` +
        `expected ${expected.length}`,
      errorCode: ErrorCode.CONSTRUCTION_MISMATCH,
      context: {
        recordName,
        expected: [...expected],
        actual: [...actual],
      },
    });
    this.expected = expected;
    this.actual = actual;
  }

  /** Requested field names missing from the constructed type */
  get missing(): string[] {
    const present = new Set(this.actual);
    return this.expected.filter((name) => !present.has(name));
  }
}

/**
 * Generic instantiation errors (arity mismatch, unbound parameters)
 */
export class TypeArgumentError extends RecordGenError {
  constructor(
    params: ErrorParams<
      ErrorContext & { parameters: string[]; typeArguments?: string[] }
    >
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.TYPE_ARGUMENT_MISMATCH,
    });
  }
}

/**
 * Data generation errors
 */
export class GenerationError extends RecordGenError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR,
    });
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends RecordGenError {
  constructor(params: ErrorParams<ErrorContext & { setting: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

export function isRecordGenError(error: unknown): error is RecordGenError {
  return error instanceof RecordGenError;
}
