/**
 * Error types and error codes for modsite
 * Provides structured error handling with proper categorization
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,
  OUTPUT_NOT_WRITABLE = 1003,

  // Module resolution errors (2000-2999)
  MODULE_IMPORT_ERROR = 2000,
  MODULE_INTROSPECTION_ERROR = 2001,

  // Cache errors (3000-3999)
  CACHE_READ_ERROR = 3000,
  CACHE_WRITE_ERROR = 3001,
  CACHE_ENTRY_NOT_FOUND = 3002,
  CACHE_INVALID_KEY = 3003,

  // Render errors (4000-4999)
  RENDER_ERROR = 4000,
  RENDER_INDEX_ERROR = 4001,

  // Search errors (5000-5999)
  SEARCH_INDEX_ERROR = 5000,
  SEARCH_PRECOMPILE_ERROR = 5001,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  originalError?: Error;
  timestamp: number;
  stack?: string;
}
