export const features = [
  { id: 'field_service.orders.view', title: 'View field service orders', module: 'field_service' },
  { id: 'field_service.orders.manage', title: 'Manage field service orders', module: 'field_service' },
  { id: 'field_service.locations.manage', title: 'Manage field service locations', module: 'field_service' },
  { id: 'field_service.templates.manage', title: 'Manage field service order templates', module: 'field_service' },
]

export const writeFeatures: Record<string, string> = {
  FieldServiceOrder: 'field_service.orders.manage',
  FieldServiceNote: 'field_service.orders.manage',
  FieldServiceLocation: 'field_service.locations.manage',
  FieldServiceCategory: 'field_service.templates.manage',
  FieldServiceOrderTemplate: 'field_service.templates.manage',
}

export default features
