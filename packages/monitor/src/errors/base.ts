/**
 * Base Error Classes
 *
 * Structured errors with categories, codes, and recovery strategies
 */

import {
  ErrorCategory,
  type ErrorCode,
  type ErrorContext,
  type ErrorMetadata,
  ErrorRecoveryType,
  ErrorSeverity,
} from './types'

export type MonitorErrorOptions = {
  code: ErrorCode
  category: ErrorCategory
  severity?: ErrorSeverity
  recoveryType?: ErrorRecoveryType
  metadata?: ErrorMetadata
  context?: ErrorContext
  retryable?: boolean
  cause?: unknown
}

type SubclassOptions = Omit<
  MonitorErrorOptions,
  'category' | 'severity' | 'recoveryType'
>

/**
 * Base error class for all monitor errors
 */
export class MonitorError extends Error {
  public readonly code: ErrorCode
  public readonly category: ErrorCategory
  public readonly severity: ErrorSeverity
  public readonly recoveryType: ErrorRecoveryType
  public readonly metadata?: ErrorMetadata
  public readonly context?: ErrorContext
  public readonly retryable: boolean
  public readonly timestamp: number

  constructor(message: string, options: MonitorErrorOptions) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.code = options.code
    this.category = options.category
    this.severity = options.severity ?? ErrorSeverity.MEDIUM
    this.recoveryType = options.recoveryType ?? ErrorRecoveryType.RECOVERABLE
    this.metadata = options.metadata
    this.context = options.context
    this.retryable = options.retryable ?? false
    this.timestamp = Date.now()
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      recoveryType: this.recoveryType,
      retryable: this.retryable,
      metadata: this.metadata,
      context: this.context,
      timestamp: this.timestamp,
    }
  }

  /**
   * Whether the failed operation may be attempted again
   */
  shouldRetry(): boolean {
    if (!this.retryable) return false
    return (
      this.recoveryType === ErrorRecoveryType.RECOVERABLE ||
      this.recoveryType === ErrorRecoveryType.TRANSIENT
    )
  }
}

/**
 * Sink and transport errors
 */
export class NetworkError extends MonitorError {
  constructor(message: string, options: SubclassOptions) {
    super(message, {
      ...options,
      category: ErrorCategory.NETWORK,
      recoveryType:
        options.retryable !== false
          ? ErrorRecoveryType.TRANSIENT
          : ErrorRecoveryType.PERMANENT,
      severity: ErrorSeverity.MEDIUM,
    })
  }
}

/**
 * Invalid input or configuration
 */
export class ValidationError extends MonitorError {
  constructor(message: string, options: SubclassOptions) {
    super(message, {
      ...options,
      category: ErrorCategory.VALIDATION,
      recoveryType: ErrorRecoveryType.PERMANENT,
      severity: ErrorSeverity.LOW,
      retryable: false,
    })
  }
}

/**
 * Broken internal invariants. Never recoverable.
 */
export class StateError extends MonitorError {
  constructor(message: string, options: SubclassOptions) {
    super(message, {
      ...options,
      category: ErrorCategory.STATE,
      recoveryType: ErrorRecoveryType.FATAL,
      severity: ErrorSeverity.CRITICAL,
      retryable: false,
    })
  }
}

/**
 * Failures of the host: files, processes, sockets
 */
export class SystemError extends MonitorError {
  constructor(message: string, options: SubclassOptions) {
    super(message, {
      ...options,
      category: ErrorCategory.SYSTEM,
      recoveryType:
        options.retryable === true
          ? ErrorRecoveryType.TRANSIENT
          : ErrorRecoveryType.PERMANENT,
      severity: ErrorSeverity.HIGH,
    })
  }
}
