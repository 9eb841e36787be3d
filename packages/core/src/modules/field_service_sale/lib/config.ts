import { z } from 'zod'
import { parseBooleanWithDefault } from '@fieldops/shared/lib/boolean'

export const fieldServiceSaleSettingsSchema = z.object({
  orderNamePrefix: z.string().trim().min(1).max(32).default('FSO'),
  recoverDuplicates: z.boolean().default(true),
  debug: z.boolean().default(false),
})

export type FieldServiceSaleSettings = z.infer<typeof fieldServiceSaleSettingsSchema>

export const DEFAULT_FIELD_SERVICE_SALE_SETTINGS: FieldServiceSaleSettings = {
  orderNamePrefix: 'FSO',
  recoverDuplicates: true,
  debug: false,
}

export function loadFieldServiceSaleSettings(env: NodeJS.ProcessEnv = process.env): FieldServiceSaleSettings {
  const prefix = env.FIELD_SERVICE_ORDER_PREFIX?.trim()
  return fieldServiceSaleSettingsSchema.parse({
    orderNamePrefix: prefix ? prefix : undefined,
    recoverDuplicates: parseBooleanWithDefault(env.FIELD_SERVICE_SALE_RECOVER_DUPLICATES, true),
    debug: parseBooleanWithDefault(env.FIELD_SERVICE_SALE_DEBUG, false),
  })
}
