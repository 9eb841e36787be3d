export const features = [
  { id: 'field_service_sale.orders.generate', title: 'Generate field service orders from sales orders', module: 'field_service_sale' },
  { id: 'field_service_sale.orders.view', title: 'View service orders linked to sales orders', module: 'field_service_sale' },
]

export default features
