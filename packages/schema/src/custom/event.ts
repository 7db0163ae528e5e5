import { z } from 'zod'
import { zTimestampNs } from './timestamp'

/**
 * Envelope shared by every trace message. Only `at` and `ns` are
 * mandatory; the payload is decoded later per namespace.
 */
export const zNormalizedEvent = () =>
  z
    .object({
      at: zTimestampNs(),
      ns: z.string().min(1),
      data: z.record(z.unknown()).default({}),
      sev: z.string().default('Info'),
      thread: z
        .union([z.string(), z.number()])
        .transform(String)
        .default(''),
      host: z.string().default(''),
    })
    .transform((event) => Object.freeze(event))

export type NormalizedEvent = z.output<ReturnType<typeof zNormalizedEvent>>
