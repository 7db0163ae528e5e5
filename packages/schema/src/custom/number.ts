import { z } from 'zod'
import type { SchemaOptions } from './types'

const DECIMAL = /^-?\d+$/

export interface IntegerOptions extends SchemaOptions<number> {
  min?: number
  max?: number
}

/**
 * Integer that traces render either as a JSON number or as a decimal
 * string (`"blockNo": "11745123"`).
 */
export const zFlexibleInt = (options: IntegerOptions = {}) => {
  const {
    min = 0,
    max = Number.MAX_SAFE_INTEGER,
    errorMessage,
    defaultValue,
  } = options

  const schema = z
    .union([z.number(), z.string()])
    .transform((val, ctx) => {
      const num =
        typeof val === 'number'
          ? val
          : DECIMAL.test(val.trim())
            ? Number(val.trim())
            : Number.NaN
      if (!Number.isSafeInteger(num) || num < min || num > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            errorMessage ?? `Expected an integer in [${min}, ${max}], got ${val}`,
        })
        return z.NEVER
      }
      return num
    })

  if (defaultValue !== undefined) {
    return schema.optional().transform((val) => val ?? defaultValue)
  }
  return schema
}

export const zPort = (options: SchemaOptions<number> = {}) =>
  zFlexibleInt({ ...options, min: 0, max: 65535 })
