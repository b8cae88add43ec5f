export { CatalogResolver } from './catalog-resolver';
