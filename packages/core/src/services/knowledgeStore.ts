/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile } from 'node:fs/promises';
import { compileValidator, formatErrors } from '../utils/jsonValidator.js';

export interface KnowledgeHit {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

/** Vector search over named collections. */
export interface KnowledgeStore {
  search(collection: string, vector: readonly number[], limit: number): Promise<KnowledgeHit[]>;
}

export interface KnowledgeRecord {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Brute-force cosine search. Fine for local runs and tests. */
export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly collections = new Map<string, KnowledgeRecord[]>();

  upsert(collection: string, records: readonly KnowledgeRecord[]): void {
    const existing = this.collections.get(collection) ?? [];
    const byId = new Map(existing.map((r) => [r.id, r]));
    for (const record of records) {
      byId.set(record.id, record);
    }
    this.collections.set(collection, [...byId.values()]);
  }

  /** Embed each text and store it with the text as payload. */
  async index(
    collection: string,
    documents: readonly { id: string; text: string; metadata?: Record<string, unknown> }[],
    embed: (text: string) => Promise<number[]>,
  ): Promise<void> {
    const records: KnowledgeRecord[] = [];
    for (const doc of documents) {
      records.push({
        id: doc.id,
        vector: await embed(doc.text),
        payload: { ...doc.metadata, text: doc.text },
      });
    }
    this.upsert(collection, records);
  }

  async search(collection: string, vector: readonly number[], limit: number): Promise<KnowledgeHit[]> {
    const records = this.collections.get(collection);
    if (!records) {
      throw new Error(`Collection "${collection}" does not exist`);
    }
    return records
      .map((r) => ({ id: r.id, score: cosineSimilarity(vector, r.vector), payload: r.payload }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }
}

export interface KnowledgeSeed {
  collections: Record<string, { id: string; text: string; metadata?: Record<string, unknown> }[]>;
}

/** Read a seed file and embed every document into `store`. Returns the number indexed. */
export async function seedKnowledgeStore(
  store: InMemoryKnowledgeStore,
  file: string,
  embed: (text: string) => Promise<number[]>,
): Promise<number> {
  const parsed: unknown = JSON.parse(await readFile(file, 'utf-8'));
  const validate = compileValidator<KnowledgeSeed>('knowledge.schema.json');
  if (!validate(parsed)) {
    throw new Error(`Invalid knowledge seed ${file}: ${formatErrors(validate.errors).join('; ')}`);
  }
  let count = 0;
  for (const [collection, documents] of Object.entries(parsed.collections)) {
    await store.index(collection, documents, embed);
    count += documents.length;
  }
  return count;
}
