/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { StepKind } from '../interfaces/plan.js';
import type { ContentFetcher } from '../services/contentFetcher.js';
import { createMockInference, createMockLogger, recordingReporter } from '../utils/testHelpers.js';
import { DOCUMENT_CONFIDENCE, DocumentAnalysisExecutor, detectDocumentType } from './documentAnalysis.js';

describe('DocumentAnalysisExecutor', () => {
  let inference: ReturnType<typeof createMockInference>;
  let fetch: Mock<ContentFetcher['fetch']>;
  let executor: DocumentAnalysisExecutor;

  beforeEach(() => {
    inference = createMockInference();
    inference.generate.mockResolvedValue('Document Type: invoice\nConfidence: 0.9');
    fetch = vi.fn<ContentFetcher['fetch']>().mockResolvedValue({ items: [], failures: [] });
    executor = new DocumentAnalysisExecutor(
      { model: 'doc-model', systemPrompt: 'doc prompt' },
      inference.backend,
      { fetch },
      createMockLogger(),
    );
  });

  it('analyzes the supplied text', async () => {
    const reporter = recordingReporter(StepKind.DOCUMENT_ANALYSIS);

    const result = await executor.execute('Read this', { text: 'INVOICE #12 total 40' }, reporter);

    expect(result.kind).toBe(StepKind.DOCUMENT_ANALYSIS);
    expect(result.model).toBe('doc-model');
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
    expect(result.payload).toEqual({
      text: 'INVOICE #12 total 40',
      analysis: 'Document Type: invoice\nConfidence: 0.9',
      documentType: 'invoice',
      confidence: DOCUMENT_CONFIDENCE,
    });
    expect(inference.generate).toHaveBeenCalledWith(
      expect.stringContaining('Document Text: "INVOICE #12 total 40"'),
      'doc prompt',
      'doc-model',
      [],
    );
    expect(inference.generate.mock.calls[0][0]).toContain('based on the user\'s query: "Read this"');
    expect(fetch).not.toHaveBeenCalled();
    expect(reporter.events).toEqual([]);
  });

  it('falls back to the query when nothing was supplied', async () => {
    const reporter = recordingReporter(StepKind.DOCUMENT_ANALYSIS);

    const result = await executor.execute('scan my receipt', {}, reporter);

    expect(result.payload.text).toBe('scan my receipt');
    expect(result.payload.documentType).toBe('receipt');
    expect(reporter.events.map((e) => e.message)).toEqual([
      'No text or image content found, using query as text to analyze.',
    ]);
  });

  it('sends images along without falling back to the query', async () => {
    const reporter = recordingReporter(StepKind.DOCUMENT_ANALYSIS);

    const result = await executor.execute('What is this?', { images: ['iVBORw0KGgoAAAA'] }, reporter);

    expect(result.payload.text).toBe('');
    expect(result.payload.documentType).toBe('general document');
    expect(inference.generate).toHaveBeenCalledWith(expect.any(String), 'doc prompt', 'doc-model', [
      'iVBORw0KGgoAAAA',
    ]);
    expect(reporter.events).toEqual([]);
  });

  it('merges fetched URL content and reports failed URLs', async () => {
    fetch.mockResolvedValue({
      items: [
        { url: 'https://example.com/terms.txt', filename: 'terms.txt', kind: 'text', content: 'contract terms' },
        { url: 'https://example.com/scan.png', filename: 'scan.png', kind: 'image', content: 'iVBORw0KGgoBBBB' },
      ],
      failures: [{ url: 'https://example.com/missing', error: 'HTTP 404' }],
    });
    const reporter = recordingReporter(StepKind.DOCUMENT_ANALYSIS);
    const urls = ['https://example.com/terms.txt', 'https://example.com/scan.png', 'https://example.com/missing'];

    const result = await executor.execute('Summarize', { text: 'cover note', urls, images: ['/9j/AAAA'] }, reporter);

    expect(fetch).toHaveBeenCalledWith(urls);
    expect(result.payload.text).toBe('cover note\n\ncontract terms');
    expect(result.payload.documentType).toBe('contract');
    expect(inference.generate).toHaveBeenCalledWith(expect.any(String), 'doc prompt', 'doc-model', [
      '/9j/AAAA',
      'iVBORw0KGgoBBBB',
    ]);
    expect(reporter.events).toEqual([
      { agent: StepKind.DOCUMENT_ANALYSIS, message: 'Fetching content from 3 URLs...', isError: false },
      {
        agent: StepKind.DOCUMENT_ANALYSIS,
        message: 'Error fetching https://example.com/missing: HTTP 404',
        isError: true,
      },
      { agent: StepKind.DOCUMENT_ANALYSIS, message: 'URL content fetched successfully.', isError: false },
    ]);
  });

  it('carries on when the fetcher itself fails', async () => {
    fetch.mockRejectedValue(new Error('network down'));
    const reporter = recordingReporter(StepKind.DOCUMENT_ANALYSIS);

    const result = await executor.execute('Read it', { urls: ['https://example.com/a'] }, reporter);

    expect(result.payload.text).toBe('Read it');
    expect(reporter.events).toEqual([
      { agent: StepKind.DOCUMENT_ANALYSIS, message: 'Fetching content from 1 URLs...', isError: false },
      { agent: StepKind.DOCUMENT_ANALYSIS, message: 'Error fetching URL content: network down', isError: true },
      {
        agent: StepKind.DOCUMENT_ANALYSIS,
        message: 'No text or image content found, using query as text to analyze.',
        isError: false,
      },
    ]);
  });

  it('propagates inference failures', async () => {
    inference.generate.mockRejectedValue(new Error('quota exceeded'));

    await expect(executor.execute('Read it', { text: 'x' }, recordingReporter())).rejects.toThrow('quota exceeded');
  });
});

describe('detectDocumentType', () => {
  it('picks the first known type mentioned, case-insensitively', () => {
    expect(detectDocumentType('RECEIPT for the invoice')).toBe('invoice');
    expect(detectDocumentType('Quarterly Report')).toBe('report');
    expect(detectDocumentType('meeting notes')).toBe('general document');
  });
});
