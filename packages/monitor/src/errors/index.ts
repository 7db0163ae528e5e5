/**
 * Error Handling System
 *
 * Structured errors and classification helpers
 */

export * from './base'
export * from './classification'
export * from './types'
