export const features = [
  { id: 'customers.view', title: 'View customers', module: 'customers' },
  { id: 'customers.manage', title: 'Manage customers', module: 'customers' },
]

export const writeFeatures: Record<string, string> = {
  CustomerEntity: 'customers.manage',
}

export default features
