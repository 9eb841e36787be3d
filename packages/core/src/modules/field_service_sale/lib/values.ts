import type { FieldServiceLocation, FieldServiceOrderTemplate } from '@fieldops/core/modules/field_service/data/entities'
import {
  formatFieldServiceOrderName,
  type FieldServiceOrderValues,
} from '@fieldops/core/modules/field_service/lib/orders'
import type { SalesOrder, SalesOrderLine } from '@fieldops/core/modules/sales/data/entities'

export type TemplateAggregate = {
  notes: string
  durationHours: number
  categoryIds: string[]
}

/** Instructions concatenated in order, durations summed, categories unioned. */
export function aggregateTemplates(templates: readonly FieldServiceOrderTemplate[]): TemplateAggregate {
  const categoryIds = new Set<string>()
  let notes = ''
  let durationHours = 0
  for (const template of templates) {
    notes += template.instructions ?? ''
    durationHours += template.durationHours
    for (const categoryId of template.categoryIds) categoryIds.add(categoryId)
  }
  return { notes, durationHours, categoryIds: Array.from(categoryIds) }
}

/** One entry per distinct template, in the order of the first line using it. */
export function collectLineTemplates(
  templateIds: ReadonlyArray<string | null | undefined>,
  templates: readonly FieldServiceOrderTemplate[],
): FieldServiceOrderTemplate[] {
  const byId = new Map(templates.map((template) => [template.id, template]))
  const seen = new Set<string>()
  const ordered: FieldServiceOrderTemplate[] = []
  for (const templateId of templateIds) {
    if (!templateId || seen.has(templateId)) continue
    const template = byId.get(templateId)
    if (!template) continue
    seen.add(templateId)
    ordered.push(template)
  }
  return ordered
}

export type ServiceOrderValuesInput = {
  order: SalesOrder
  location: FieldServiceLocation | null
  templates: readonly FieldServiceOrderTemplate[]
  namePrefix: string
  line?: SalesOrderLine | null
}

export function prepareServiceOrderValues(input: ServiceOrderValuesInput): FieldServiceOrderValues {
  const { order, location, line } = input
  const aggregate = aggregateTemplates(input.templates)
  const expectedDate = order.expectedDate ?? null
  return {
    name: formatFieldServiceOrderName(input.namePrefix, order.orderNumber, line?.lineNumber ?? null),
    status: 'new',
    locationId: location?.id ?? null,
    locationDirections: location?.direction ?? null,
    requestEarly: expectedDate,
    scheduledStart: expectedDate,
    notes: aggregate.notes,
    categoryIds: aggregate.categoryIds,
    scheduledDurationHours: aggregate.durationHours,
    saleOrderId: order.id,
    saleOrderLineId: line?.id ?? null,
    organizationId: order.organizationId,
    tenantId: order.tenantId,
  }
}
