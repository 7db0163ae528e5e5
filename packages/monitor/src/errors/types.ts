/**
 * Error Type Definitions
 *
 * Defines error categories, codes, and types for structured error handling
 */

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  NETWORK = 'network',
  VALIDATION = 'validation',
  STATE = 'state',
  SYSTEM = 'system',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * Error recovery type
 */
export enum ErrorRecoveryType {
  RECOVERABLE = 'recoverable',
  FATAL = 'fatal',
  TRANSIENT = 'transient',
  PERMANENT = 'permanent',
}

/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Network errors
  SINK_REQUEST_FAILED = 'SINK_REQUEST_FAILED',
  SINK_TIMEOUT = 'SINK_TIMEOUT',
  SINK_REJECTED = 'SINK_REJECTED',

  // Validation errors
  INVALID_INPUT = 'INVALID_INPUT',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // State errors
  DUPLICATE_SAMPLE = 'DUPLICATE_SAMPLE',
  INCOMPLETE_RECORD = 'INCOMPLETE_RECORD',

  // System errors
  SYSTEM_ERROR = 'SYSTEM_ERROR',
  OS_SNAPSHOT_FAILED = 'OS_SNAPSHOT_FAILED',
  EVENT_SOURCE_FAILED = 'EVENT_SOURCE_FAILED',
}

/**
 * Error metadata type
 */
export type ErrorMetadata = Record<string, unknown>

/**
 * Error context for debugging
 */
export interface ErrorContext {
  component?: string
  operation?: string
  blockHash?: string
  peer?: string
  [key: string]: unknown
}
