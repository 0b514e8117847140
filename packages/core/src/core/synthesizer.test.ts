/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { analyzeRequest, buildPlan } from '../coordination/planner.js';
import { StepKind, type StepResults } from '../interfaces/plan.js';
import { documentResult, lookupResult, retrievalResult } from '../utils/testHelpers.js';
import { Synthesizer } from './synthesizer.js';

describe('Synthesizer', () => {
  const request = { query: 'Read the invoice and search for vendor info' };
  const plan = buildPlan(analyzeRequest(request));
  const synthesizer = new Synthesizer('orch-model');

  it('composes the fixed report layout', () => {
    const results: StepResults = {
      [StepKind.DOCUMENT_ANALYSIS]: documentResult({ documentType: 'invoice', analysis: 'Total: 42 EUR' }),
      [StepKind.INFORMATION_LOOKUP]: lookupResult({ response: 'Vendor is ACME.' }),
      [StepKind.KNOWLEDGE_RETRIEVAL]: retrievalResult({
        response: 'Pay by Friday.',
        sourceCount: 2,
        collectionsSearched: ['documents', 'invoices'],
      }),
    };

    expect(synthesizer.compose(results, plan, request)).toBe(
      [
        '=== ORCHESTRATOR SYNTHESIS ===',
        '',
        'EXECUTION SUMMARY:',
        '- Query: Read the invoice and search for vendor info',
        '- Orchestrator Model: orch-model',
        '- Total Steps: 3',
        '- Step Kinds: Document Analysis, Information Lookup, Knowledge Retrieval',
        '- Execution Mode: parallel',
        '',
        'DOCUMENT ANALYSIS RESULTS:',
        '- Model: doc-model',
        '- Document Type: invoice',
        '- Confidence: 95%',
        '- Analysis:',
        'Total: 42 EUR',
        '',
        'INFORMATION LOOKUP RESULTS:',
        '- Model: lookup-model',
        'Vendor is ACME.',
        '',
        'KNOWLEDGE RETRIEVAL RESULTS:',
        '- Model: rag-model',
        '- Embedding Model: embed-model',
        '- Vector Search Results: 2',
        '- Collections Searched: documents, invoices',
        '',
        'Response:',
        'Pay by Friday.',
        '',
        'CONCLUSION:',
        'All 3 planned steps completed successfully.',
      ].join('\n'),
    );
  });

  it('keeps section order regardless of how results were recorded', () => {
    const results: StepResults = {};
    results[StepKind.KNOWLEDGE_RETRIEVAL] = retrievalResult();
    results[StepKind.INFORMATION_LOOKUP] = lookupResult();
    results[StepKind.DOCUMENT_ANALYSIS] = documentResult();

    const report = synthesizer.compose(results, plan, request);
    const document = report.indexOf('DOCUMENT ANALYSIS RESULTS:');
    const lookup = report.indexOf('INFORMATION LOOKUP RESULTS:');
    const retrieval = report.indexOf('KNOWLEDGE RETRIEVAL RESULTS:');

    expect(document).toBeGreaterThan(-1);
    expect(lookup).toBeGreaterThan(document);
    expect(retrieval).toBeGreaterThan(lookup);
  });

  it('leaves out kinds that produced no result', () => {
    const single = buildPlan(analyzeRequest({ query: 'Hello there' }));
    const report = synthesizer.compose(
      { [StepKind.KNOWLEDGE_RETRIEVAL]: retrievalResult() },
      single,
      { query: 'Hello there' },
    );

    expect(report).not.toContain('DOCUMENT ANALYSIS RESULTS:');
    expect(report).not.toContain('INFORMATION LOOKUP RESULTS:');
    expect(report.split('\n').slice(-3)).toEqual(['', 'CONCLUSION:', 'All 1 planned steps completed successfully.']);
  });
});
