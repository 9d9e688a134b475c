export { SemanticIndex, DEFAULT_TOP_K } from './semantic-index.js';
export type { IndexStatus, RebuildReason, SemanticIndexOptions } from './semantic-index.js';
export { SqliteIndexStore } from './store.js';
export type { IndexStore } from './store.js';
export { buildDocuments, columnDocuments, datasetDocument, exampleValues, datasetDocId, columnDocId } from './documents.js';
export { computeSignature } from './signature.js';
export { cosineSimilarity, pickTopK } from './scorer.js';
