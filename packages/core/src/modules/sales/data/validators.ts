import { z } from 'zod'

const uuid = () => z.string().uuid()

export const salesOrderIdSchema = z.object({
  id: uuid(),
})

export const salesOrderCustomerChangeSchema = z.object({
  id: uuid(),
  customerEntityId: uuid().nullable(),
})

export type SalesOrderIdInput = z.infer<typeof salesOrderIdSchema>
export type SalesOrderCustomerChangeInput = z.infer<typeof salesOrderCustomerChangeSchema>
