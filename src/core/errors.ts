/**
 * Error Classes
 *
 * Every failure raised by the engine carries a machine-readable code and a
 * context record. `Unresolved` findings are result values, not errors.
 */

export enum ErrorCode {
  // Ingestion (1xxx)
  PARSE_FAILED = 'E1000',
  PARSE_SYNTAX_ERROR = 'E1001',
  PARSE_INVALID_STRUCTURE = 'E1002',
  PARSE_UNRESOLVED_REF = 'E1003',
  PARSE_DUPLICATE_KEY = 'E1004',
  UNSUPPORTED_FORMAT = 'E1100',

  // Analyzer inputs (2xxx)
  MISSING_INPUT = 'E2000',
  INVALID_PARAMETERS = 'E2001',
  ANALYZER_NOT_FOUND = 'E2002',

  // Storage (3xxx)
  STORAGE_READ_FAILED = 'E3000',
  STORAGE_WRITE_FAILED = 'E3001',
  STORAGE_INVALID_DOCUMENT = 'E3002',

  // Configuration (9xxx)
  CONFIGURATION_ERROR = 'E9003',
}

export class ApiGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ApiGraphError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Malformed specification input. `path` is the JSON path of the offending
 * node; `line`/`column` are set for syntax errors.
 */
export class ParseError extends ApiGraphError {
  public readonly path?: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: Record<string, unknown> & { path?: string; line?: number; column?: number }
  ) {
    super(message, code, context);
    this.name = 'ParseError';
    this.path = context?.path;
    this.line = context?.line;
    this.column = context?.column;
  }

  toString(): string {
    let location = '';
    if (this.path) location = ` at ${this.path}`;
    if (this.line !== undefined) {
      location += ` (line ${this.line}${this.column !== undefined ? `, column ${this.column}` : ''})`;
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

export class UnsupportedFormatError extends ParseError {
  public readonly detected?: string;

  constructor(message: string, context?: Record<string, unknown> & { detected?: string }) {
    super(message, ErrorCode.UNSUPPORTED_FORMAT, context);
    this.name = 'UnsupportedFormatError';
    this.detected = context?.detected;
  }
}

/**
 * A required graph or specification could not be resolved.
 */
export class MissingInputError extends ApiGraphError {
  public readonly side?: string;

  constructor(message: string, context?: Record<string, unknown> & { side?: string }) {
    super(message, ErrorCode.MISSING_INPUT, context);
    this.name = 'MissingInputError';
    this.side = context?.side;
  }
}

export class StorageError extends ApiGraphError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_READ_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = 'StorageError';
    this.filePath = context?.filePath;
  }
}

export interface ParameterIssue {
  path: string;
  message: string;
}

export class InvalidParametersError extends ApiGraphError {
  public readonly issues: ParameterIssue[];

  constructor(analyzer: string, issues: ParameterIssue[]) {
    const detail = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    super(`Invalid parameters for "${analyzer}": ${detail}`, ErrorCode.INVALID_PARAMETERS, {
      analyzer,
      issues,
    });
    this.name = 'InvalidParametersError';
    this.issues = issues;
  }
}

export class AnalyzerNotFoundError extends ApiGraphError {
  constructor(name: string, available: string[]) {
    super(`Unknown analyzer "${name}" (available: ${available.join(', ') || 'none'})`, ErrorCode.ANALYZER_NOT_FOUND, {
      name,
      available,
    });
    this.name = 'AnalyzerNotFoundError';
  }
}

export class ConfigurationError extends ApiGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = 'ConfigurationError';
  }
}

export function isApiGraphError(error: unknown): error is ApiGraphError {
  return error instanceof ApiGraphError;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
