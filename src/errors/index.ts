import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for modsite
 * Extends native Error with additional metadata
 */
export class ModsiteError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'ModsiteError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Convert error to string representation
   */
  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends ModsiteError {
  constructor(
    message: string,
    context?: ErrorContext,
    originalError?: Error,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR
  ) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation errors (malformed module specs, bad input)
 */
export class ValidationError extends ModsiteError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, context, originalError);
    this.name = 'ValidationError';
  }
}

/**
 * A module could not be imported. The loader recovers from this one.
 */
export class ModuleImportError extends ModsiteError {
  public readonly moduleName: string;

  constructor(moduleName: string, originalError?: Error) {
    super(
      `Error importing ${moduleName}${originalError ? `: ${originalError.message}` : ''}`,
      ErrorCode.MODULE_IMPORT_ERROR,
      ErrorSeverity.LOW,
      { module: moduleName },
      originalError
    );
    this.name = 'ModuleImportError';
    this.moduleName = moduleName;
  }
}

/**
 * Cache storage errors
 */
export class CacheError extends ModsiteError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'CacheError';
  }
}

/**
 * Raised when reading a key that has no stored value
 */
export class CacheKeyNotFoundError extends CacheError {
  constructor(path: string) {
    super(`No cache entry at ${path}`, ErrorCode.CACHE_ENTRY_NOT_FOUND, { path });
    this.name = 'CacheKeyNotFoundError';
  }
}

/**
 * Rendering engine errors
 */
export class RenderError extends ModsiteError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'RenderError';
  }
}

/**
 * Search index errors
 */
export class SearchIndexError extends ModsiteError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'SearchIndexError';
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// Export types
export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
