export { loadZones, loadQueries, loadCatalog, catalogFingerprint, type Catalog } from './loader.js';
