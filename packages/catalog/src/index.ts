export { DatasetCatalog, catalogFromFile, loadCatalog, noteFor } from './catalog.js';
export { TableStore, buildTable, parseCsv, isDateColumn, toNumber } from './table-store.js';
