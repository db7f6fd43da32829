/**
 * ApimetaError - Error hierarchy for apimeta
 *
 * All errors extend the native JavaScript Error class. Every error is fatal:
 * compilation aborts on the first one and no output file is written.
 *
 * Error types:
 * - GrammarError: unknown command, wrong field count, unknown keyword in a field
 * - ContextError: command issued without its required preceding declaration
 * - SemanticError: duplicate names, out-of-range numbers, conflicting attributes
 * - RenderError: model content the renderer cannot express
 * - FileAccessError: definition/output files that cannot be read or written
 * - ConfigError: invalid apimeta.config.yaml
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  [key: string]: unknown;
}

/**
 * JSON representation of ApimetaError
 */
export interface ApimetaErrorJSON {
  code: string;
  severity: 'fatal';
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Prefix a message with `file:line: ` when the context carries a location.
 */
export function locateMessage(message: string, context: ErrorContext): string {
  if (context.filePath === undefined) {
    return message;
  }
  const line = context.lineNumber !== undefined ? `:${context.lineNumber}` : '';
  return `${context.filePath}${line}: ${message}`;
}

/**
 * Abstract base class for all apimeta errors.
 */
export abstract class ApimetaError extends Error {
  abstract readonly code: string;
  readonly severity = 'fatal' as const;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(locateMessage(message, context));
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    // Capture stack trace (V8 specific)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ApimetaErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Grammar error - unknown command, wrong number of fields, unknown keyword
 *
 * Codes: ERR_UNKNOWN_COMMAND, ERR_FIELD_COUNT, ERR_UNKNOWN_DIRECTION,
 * ERR_UNKNOWN_ATTRIBUTE, ERR_UNKNOWN_CALLING_CONVENTION
 */
export class GrammarError extends ApimetaError {
  readonly code: string;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Context error - a command that needs a preceding declaration which is absent
 *
 * Code: ERR_MISSING_CONTEXT
 */
export class ContextError extends ApimetaError {
  readonly code = 'ERR_MISSING_CONTEXT';
  /** Name of the context slot that was empty (e.g. "dll", "interface") */
  readonly missingContext: string;

  constructor(message: string, missingContext: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, { ...context, missingContext }, suggestion);
    this.missingContext = missingContext;
  }
}

/**
 * Semantic error - well-formed declaration with invalid content
 *
 * Codes: ERR_DUPLICATE_HEADER, ERR_DUPLICATE_ENUM, ERR_DUPLICATE_VARIANT,
 * ERR_INVALID_NUMBER, ERR_BYTE_RANGE, ERR_INVALID_DEPTH, ERR_ENUM_BASE_POINTER,
 * ERR_ARRAY_SIZE_CONFLICT, ERR_VALUE_OUT_OF_RANGE, ERR_STRING_TOO_LONG,
 * ERR_INVALID_GUID, ERR_INCLUDE_CYCLE, ERR_INCLUDE_DEPTH
 */
export class SemanticError extends ApimetaError {
  readonly code: string;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Render error - the model holds something that has no IL representation
 *
 * Codes: ERR_NO_HEADER, ERR_ENUM_BASE_TYPE, ERR_VARIANT_RANGE
 */
export class RenderError extends ApimetaError {
  readonly code: string;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable definition file, unwritable output
 *
 * Codes: ERR_FILE_UNREADABLE, ERR_FILE_UNWRITABLE
 */
export class FileAccessError extends ApimetaError {
  readonly code: string;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - apimeta.config.yaml parsing or validation
 *
 * Code: ERR_CONFIG_INVALID
 */
export class ConfigError extends ApimetaError {
  readonly code: string;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
