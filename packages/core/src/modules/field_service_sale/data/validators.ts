import { z } from 'zod'

export const salesOrderIdsSchema = z.object({
  ids: z.array(z.string().uuid()).min(1),
})

export type SalesOrderIdsInput = z.infer<typeof salesOrderIdsSchema>
