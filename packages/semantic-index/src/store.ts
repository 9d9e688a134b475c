// packages/semantic-index/src/store.ts
// Persisted documents + signature (Kysely over better-sqlite3)

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { DocumentKind, EmbeddedDocument } from '@tapwise/core';

interface DocumentTable {
  id: string;
  position: number;
  kind: string;
  dataset: string;
  column_name: string | null;
  text: string;
  embedding: string;   // JSON array
}

interface MetaTable {
  key: string;
  value: string;
}

interface IndexDatabase {
  semantic_documents: DocumentTable;
  semantic_meta: MetaTable;
}

export interface IndexStore {
  count(): Promise<number>;
  /** '' when no signature has been stored */
  getSignature(): Promise<string>;
  /** Drops every stored document and writes `docs` + `signature` atomically. */
  replaceAll(docs: EmbeddedDocument[], signature: string): Promise<void>;
  all(): Promise<EmbeddedDocument[]>;
  close(): Promise<void>;
}

const SIGNATURE_KEY = 'signature';
const INSERT_CHUNK = 100;

function toKind(k: string): DocumentKind {
  return k === 'column' ? 'column' : 'dataset';
}

function parseEmbedding(raw: string): number[] {
  const v: unknown = JSON.parse(raw);
  return Array.isArray(v) ? v.map(Number) : [];
}

export class SqliteIndexStore implements IndexStore {
  private readonly db: Kysely<IndexDatabase>;
  private migrated: Promise<void> | null = null;

  /** `filename` may be ':memory:'. */
  constructor(filename: string) {
    if (filename !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }
    this.db = new Kysely<IndexDatabase>({
      dialect: new SqliteDialect({ database: new Database(filename) })
    });
  }

  private migrate(): Promise<void> {
    this.migrated ??= (async () => {
      await this.db.schema
        .createTable('semantic_documents')
        .ifNotExists()
        .addColumn('id', 'text', (c) => c.primaryKey())
        .addColumn('position', 'integer', (c) => c.notNull())
        .addColumn('kind', 'text', (c) => c.notNull())
        .addColumn('dataset', 'text', (c) => c.notNull())
        .addColumn('column_name', 'text')
        .addColumn('text', 'text', (c) => c.notNull())
        .addColumn('embedding', 'text', (c) => c.notNull())
        .execute();
      await this.db.schema
        .createTable('semantic_meta')
        .ifNotExists()
        .addColumn('key', 'text', (c) => c.primaryKey())
        .addColumn('value', 'text', (c) => c.notNull())
        .execute();
    })();
    return this.migrated;
  }

  async count(): Promise<number> {
    await this.migrate();
    const row = await this.db
      .selectFrom('semantic_documents')
      .select((eb) => eb.fn.countAll<number>().as('n'))
      .executeTakeFirst();
    return Number(row?.n ?? 0);
  }

  async getSignature(): Promise<string> {
    await this.migrate();
    const row = await this.db
      .selectFrom('semantic_meta')
      .select('value')
      .where('key', '=', SIGNATURE_KEY)
      .executeTakeFirst();
    return row?.value ?? '';
  }

  async replaceAll(docs: EmbeddedDocument[], signature: string): Promise<void> {
    await this.migrate();
    const rows: DocumentTable[] = docs.map((d, position) => ({
      id: d.id,
      position,
      kind: d.kind,
      dataset: d.dataset,
      column_name: d.column ?? null,
      text: d.text,
      embedding: JSON.stringify(d.embedding)
    }));

    await this.db.transaction().execute(async (trx) => {
      await trx.deleteFrom('semantic_documents').execute();
      await trx.deleteFrom('semantic_meta').execute();
      for (let i = 0; i < rows.length; i += INSERT_CHUNK) {
        await trx.insertInto('semantic_documents').values(rows.slice(i, i + INSERT_CHUNK)).execute();
      }
      await trx.insertInto('semantic_meta').values({ key: SIGNATURE_KEY, value: signature }).execute();
    });
  }

  async all(): Promise<EmbeddedDocument[]> {
    await this.migrate();
    const rows = await this.db
      .selectFrom('semantic_documents')
      .selectAll()
      .orderBy('position')
      .execute();
    return rows.map((r) => ({
      id: r.id,
      kind: toKind(r.kind),
      dataset: r.dataset,
      ...(r.column_name !== null ? { column: r.column_name } : {}),
      text: r.text,
      embedding: parseEmbedding(r.embedding)
    }));
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
