import { MonitorError, SystemError } from './base'
import { ErrorCode, type ErrorContext } from './types'

/**
 * Wrap an unknown thrown value into a MonitorError, keeping MonitorErrors
 * as they are and merging the extra context into them.
 */
export function toMonitorError(
  error: unknown,
  context?: ErrorContext,
  code: ErrorCode = ErrorCode.SYSTEM_ERROR,
): MonitorError {
  if (error instanceof MonitorError) {
    if (!context) return error
    return new MonitorError(error.message, {
      code: error.code,
      category: error.category,
      severity: error.severity,
      recoveryType: error.recoveryType,
      metadata: error.metadata,
      context: { ...error.context, ...context },
      retryable: error.retryable,
      cause: error.cause,
    })
  }

  const message =
    error instanceof Error ? error.message || 'Unknown error' : String(error)
  return new SystemError(message, {
    code,
    context,
    retryable: true,
    cause: error,
  })
}

export function isMonitorError(error: unknown): error is MonitorError {
  return error instanceof MonitorError
}
