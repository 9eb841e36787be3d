export const features = [
  { id: 'sales.orders.view', title: 'View sales orders', module: 'sales' },
  { id: 'sales.orders.manage', title: 'Manage sales orders', module: 'sales' },
  { id: 'sales.orders.confirm', title: 'Confirm and cancel sales orders', module: 'sales' },
]

export const writeFeatures: Record<string, string> = {
  SalesOrder: 'sales.orders.manage',
  SalesOrderLine: 'sales.orders.manage',
  SalesNote: 'sales.orders.manage',
}

export default features
