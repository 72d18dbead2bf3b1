export { CatalogImageSource, loadImageCatalog, textOverlap } from './image-search.service.js';
export type { ImageSource, ImageSearchOptions, ImageCatalog, ContentSafety } from './image-search.service.js';
