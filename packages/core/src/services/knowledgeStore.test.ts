/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { InMemoryKnowledgeStore, cosineSimilarity, seedKnowledgeStore } from './knowledgeStore.js';

describe('cosineSimilarity', () => {
  it('scores direction, not length', () => {
    expect(cosineSimilarity([1, 0], [3, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('scores a zero vector as 0', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('refuses vectors of different dimensions', () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow('Vector dimension mismatch: 2 vs 3');
  });
});

describe('InMemoryKnowledgeStore', () => {
  let store: InMemoryKnowledgeStore;

  beforeEach(() => {
    store = new InMemoryKnowledgeStore();
    store.upsert('faq', [
      { id: 'a', vector: [1, 0], payload: { text: 'a' } },
      { id: 'b', vector: [1, 1], payload: { text: 'b' } },
      { id: 'c', vector: [0, 1], payload: { text: 'c' } },
    ]);
  });

  it('returns the closest records first, up to the limit', async () => {
    const hits = await store.search('faq', [1, 0], 2);

    expect(hits.map((h) => h.id)).toEqual(['a', 'b']);
    expect(hits[0]).toEqual({ id: 'a', score: 1, payload: { text: 'a' } });
  });

  it('replaces records by id on upsert', async () => {
    store.upsert('faq', [{ id: 'c', vector: [1, 0], payload: { text: 'c2' } }]);

    const hits = await store.search('faq', [1, 0], 10);
    expect(hits).toHaveLength(3);
    expect(hits.find((h) => h.id === 'c')?.payload).toEqual({ text: 'c2' });
  });

  it('fails for a collection that does not exist', async () => {
    await expect(store.search('nope', [1, 0], 3)).rejects.toThrow('Collection "nope" does not exist');
  });

  it('embeds documents when indexing', async () => {
    const embed = vi.fn(async (text: string) => (text === 'tides' ? [1, 0] : [0, 1]));

    await store.index('notes', [{ id: 'n1', text: 'tides', metadata: { source: 'almanac' } }], embed);

    expect(embed).toHaveBeenCalledWith('tides');
    expect(await store.search('notes', [1, 0], 1)).toEqual([
      { id: 'n1', score: 1, payload: { source: 'almanac', text: 'tides' } },
    ]);
  });
});

describe('seedKnowledgeStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'knowledge-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('indexes every document in the seed file', async () => {
    const file = path.join(dir, 'seed.json');
    await writeFile(
      file,
      JSON.stringify({
        collections: {
          documents: [
            { id: 'd1', text: 'refunds take five days' },
            { id: 'd2', text: 'shipping is free' },
          ],
          faq: [{ id: 'f1', text: 'open on weekdays' }],
        },
      }),
    );
    const store = new InMemoryKnowledgeStore();

    const count = await seedKnowledgeStore(store, file, async () => [1, 0]);

    expect(count).toBe(3);
    expect((await store.search('documents', [1, 0], 10)).map((h) => h.id)).toEqual(['d1', 'd2']);
    expect((await store.search('faq', [1, 0], 10)).map((h) => h.id)).toEqual(['f1']);
  });

  it('rejects a seed that does not match the schema', async () => {
    const file = path.join(dir, 'bad.json');
    await writeFile(file, JSON.stringify({ collections: { documents: [{ id: 'd1' }] } }));

    await expect(seedKnowledgeStore(new InMemoryKnowledgeStore(), file, async () => [1, 0])).rejects.toThrow(
      `Invalid knowledge seed ${file}: /collections/documents/0 must have required property 'text'`,
    );
  });
});
