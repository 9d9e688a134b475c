import { Errors, createLogger } from '@tapwise/core';
import type { EmbeddedDocument, Embedder, Logger, RetrievedDocument, SemanticDocument } from '@tapwise/core';
import type { DatasetCatalog, TableStore } from '@tapwise/catalog';
import { buildDocuments } from './documents.js';
import { computeSignature } from './signature.js';
import { cosineSimilarity, pickTopK } from './scorer.js';
import type { IndexStore } from './store.js';

export type RebuildReason = 'empty' | 'no-signature' | 'stale';

export interface IndexStatus {
  signature: string;
  rebuilt: boolean;
  reason?: RebuildReason;
  documents: number;
}

export interface SemanticIndexOptions {
  logger?: Logger;
  /** texts per embedder call while building */
  batchSize?: number;
}

export const DEFAULT_TOP_K = 8;

/**
 * Embedding index over dataset and column documentation.
 *
 * `init()` is the single initialization barrier: it reuses the persisted
 * documents when the stored signature matches the catalog, and otherwise
 * re-embeds everything. `retrieve()` waits for it.
 */
export class SemanticIndex {
  private readonly logger: Logger;
  private readonly batchSize: number;
  private documents: EmbeddedDocument[] = [];
  private ready: Promise<IndexStatus> | null = null;
  private lastStatus: IndexStatus | null = null;

  constructor(
    private readonly catalog: DatasetCatalog,
    private readonly tables: TableStore,
    private readonly embedder: Embedder,
    private readonly store: IndexStore,
    opts: SemanticIndexOptions = {}
  ) {
    this.logger = opts.logger ?? createLogger('semantic-index');
    this.batchSize = Math.max(1, opts.batchSize ?? 96);
  }

  init(): Promise<IndexStatus> {
    this.ready ??= this.ensureUpToDate().catch((e: unknown) => {
      this.ready = null;
      throw e;
    });
    return this.ready;
  }

  /** Status of the last successful init, or null before it completed. */
  status(): IndexStatus | null {
    return this.lastStatus;
  }

  get size(): number {
    return this.documents.length;
  }

  async retrieve(question: string, topK: number = DEFAULT_TOP_K): Promise<RetrievedDocument[]> {
    await this.init();
    if (this.documents.length === 0 || topK <= 0) return [];

    const [queryVec] = await this.embed([question]);
    const scored = this.documents.map((d) => ({ doc: d, score: cosineSimilarity(queryVec, d.embedding) }));
    return pickTopK(scored, topK, (s) => s.score, (s) => s.doc.id).map(({ doc, score }) => ({
      id: doc.id,
      kind: doc.kind,
      dataset: doc.dataset,
      ...(doc.column !== undefined ? { column: doc.column } : {}),
      text: doc.text,
      score
    }));
  }

  private async ensureUpToDate(): Promise<IndexStatus> {
    const signature = computeSignature(this.catalog, this.embedder.id);
    const reason = await this.rebuildReason(signature);

    if (!reason) {
      this.documents = await this.store.all();
      this.logger.info({ documents: this.documents.length }, 'index-reused');
      return this.finish({ signature, rebuilt: false, documents: this.documents.length });
    }

    this.logger.info({ reason }, 'index-rebuild');
    const docs = buildDocuments(this.catalog, this.tables);
    const embedded = await this.embedDocuments(docs);
    await this.store.replaceAll(embedded, signature);
    this.documents = embedded;
    this.logger.info({ documents: embedded.length }, 'index-built');
    return this.finish({ signature, rebuilt: true, reason, documents: embedded.length });
  }

  private async rebuildReason(signature: string): Promise<RebuildReason | null> {
    if ((await this.store.count()) === 0) return 'empty';
    const stored = await this.store.getSignature();
    if (stored === '') return 'no-signature';
    return stored === signature ? null : 'stale';
  }

  private finish(status: IndexStatus): IndexStatus {
    this.lastStatus = status;
    return status;
  }

  private async embedDocuments(docs: SemanticDocument[]): Promise<EmbeddedDocument[]> {
    const out: EmbeddedDocument[] = [];
    for (let i = 0; i < docs.length; i += this.batchSize) {
      const batch = docs.slice(i, i + this.batchSize);
      const vectors = await this.embed(batch.map((d) => d.text));
      batch.forEach((d, j) => out.push({ ...d, embedding: vectors[j] }));
    }
    return out;
  }

  private async embed(texts: string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await this.embedder.embed(texts);
    } catch (e) {
      throw Errors.EMBEDDING_FAILED(e);
    }
    if (vectors.length !== texts.length) {
      throw Errors.EMBEDDING_FAILED(`expected ${texts.length} vectors, got ${vectors.length}`);
    }
    return vectors;
  }
}
