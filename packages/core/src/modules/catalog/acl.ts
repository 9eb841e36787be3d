export const features = [
  { id: 'catalog.products.view', title: 'View products', module: 'catalog' },
  { id: 'catalog.products.manage', title: 'Manage products', module: 'catalog' },
]

export const writeFeatures: Record<string, string> = {
  CatalogProduct: 'catalog.products.manage',
}

export default features
