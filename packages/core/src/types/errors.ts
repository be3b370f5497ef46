/**
 * Error hierarchy for idlgen
 * Structured errors with a stable code, context and optional suggestions
 */

import { ErrorCode, type Severity, getExitCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  schema?: string; // schema (file module) the error relates to
  entity?: string; // declaration name inside the schema
  name?: string; // output module name
  reference?: string; // unresolved type or value reference
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

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  location?: string;
}

export interface IdlGenErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
  suggestions?: string[];
}

/**
 * Base error class for all idlgen errors
 */
export abstract class IdlGenError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;
  public readonly suggestions: string[];

  constructor(params: IdlGenErrorParams) {
    const {
      message,
      errorCode,
      severity = 'error',
      context,
      cause,
      suggestions = [],
    } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
    this.suggestions = suggestions;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: message, code and context only
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

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      location: formatLocation(this.context),
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return getExitCode(this.errorCode);
  }
}

function formatLocation(context?: ErrorContext): string | undefined {
  if (!context) return undefined;
  const parts = [context.schema, context.entity].filter(
    (part): part is string => typeof part === 'string' && part.length > 0
  );
  if (parts.length > 0) return parts.join('.');
  return context.name;
}

/**
 * One issue reported while validating the input document
 */
export interface DocumentIssue {
  /** JSON Pointer into the input document */
  path: string;
  message: string;
}

/**
 * The input document is not a well-formed schema document
 */
export class SchemaDocumentError extends IdlGenError {
  constructor(
    message: string,
    public readonly issues: readonly DocumentIssue[],
    errorCode:
      | ErrorCode.INVALID_SCHEMA_DOCUMENT
      | ErrorCode.SCHEMA_PARSE_FAILED
      | ErrorCode.DUPLICATE_DECLARATION = ErrorCode.INVALID_SCHEMA_DOCUMENT,
    cause?: Error
  ) {
    super({
      message,
      errorCode,
      context: { issues: issues.map((issue) => `${issue.path}: ${issue.message}`) },
      cause,
    });
  }
}

/**
 * A type or value reference does not name any declaration in the file group
 */
export class UnresolvedReferenceError extends IdlGenError {
  constructor(reference: string, schema: string) {
    super({
      message: `Cannot resolve "${reference}" from schema "${schema}"`,
      errorCode: ErrorCode.UNRESOLVED_REFERENCE,
      context: { reference, schema },
      suggestions: [
        `Declare "${reference}" or include the schema that declares it`,
      ],
    });
  }
}

function withArticle(kind: string): string {
  return `${/^[aeiou]/i.test(kind) ? 'an' : 'a'} ${kind}`;
}

/**
 * Two generated modules resolve to the same output name and cannot be merged
 */
export class NameCollisionError extends IdlGenError {
  constructor(
    public readonly moduleName: string,
    public readonly first: string,
    public readonly second: string
  ) {
    super({
      message: `Name collision: ${moduleName} is produced by both ${withArticle(first)} and ${withArticle(second)}`,
      errorCode: ErrorCode.NAME_COLLISION,
      context: { name: moduleName, kinds: [first, second] },
      suggestions: [
        `Rename one of the declarations that map to ${moduleName}; only constants can share a module with another declaration`,
      ],
    });
  }
}

/**
 * Drawing a test-data instance ran into an unbounded chain of required fields
 */
export class RecursionLimitExceededError extends IdlGenError {
  constructor(entity: string, depth: number, cause?: Error) {
    super({
      message: `Cannot draw ${entity}: required fields recurse past depth ${depth}`,
      errorCode: ErrorCode.RECURSION_LIMIT_EXCEEDED,
      context: { name: entity, depth },
      cause,
      suggestions: ['Make one field on the cycle optional or wrap it in a list'],
    });
  }
}

/**
 * Invalid generator configuration (CLI flags or API options)
 */
export class ConfigurationError extends IdlGenError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.CONFIGURATION_ERROR, context });
  }
}

/**
 * Generated output could not be written
 */
export class WriteError extends IdlGenError {
  constructor(path: string, cause: Error) {
    super({
      message: `Failed to write ${path}: ${cause.message}`,
      errorCode: ErrorCode.WRITE_FAILED,
      context: { path },
      cause,
    });
  }
}

/**
 * Wrapper for anything unexpected that reaches a process boundary
 */
export class InternalError extends IdlGenError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

/**
 * Type guard for idlgen errors
 */
export function isIdlGenError(error: unknown): error is IdlGenError {
  return error instanceof IdlGenError;
}
