/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { toErrorMessage } from '../core/errors.js';
import type { ActivityReporter } from '../event-bus/types.js';
import { StepKind, type DocumentAnalysisResult, type DocumentType } from '../interfaces/plan.js';
import type { ContentFetcher } from '../services/contentFetcher.js';
import type { InferenceBackend } from '../services/inference.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { BaseStepExecutor, type ExecutorSettings, type StepContext } from './agent.js';

export const DOCUMENT_CONFIDENCE = 0.95;

// First match wins.
const DOCUMENT_TYPES: ReadonlyArray<Exclude<DocumentType, 'general document'>> = [
  'invoice',
  'receipt',
  'contract',
  'report',
];

export function detectDocumentType(text: string): DocumentType {
  const lower = text.toLowerCase();
  return DOCUMENT_TYPES.find((type) => lower.includes(type)) ?? 'general document';
}

export class DocumentAnalysisExecutor extends BaseStepExecutor<StepKind.DOCUMENT_ANALYSIS> {
  readonly kind = StepKind.DOCUMENT_ANALYSIS;

  constructor(
    settings: ExecutorSettings,
    private readonly inference: InferenceBackend,
    private readonly fetcher: ContentFetcher,
    logger: Logger = createLogger('document-analysis'),
  ) {
    super(settings, logger);
  }

  async execute(query: string, context: StepContext, reporter: ActivityReporter): Promise<DocumentAnalysisResult> {
    const startedAt = performance.now();
    const textParts = [context.text ?? ''];
    const images = [...(context.images ?? [])];

    const urls = context.urls ?? [];
    if (urls.length > 0) {
      reporter.report(`Fetching content from ${urls.length} URLs...`);
      try {
        const { items, failures } = await this.fetcher.fetch(urls);
        for (const item of items) {
          if (item.kind === 'text') textParts.push(item.content);
          else images.push(item.content);
        }
        for (const failure of failures) {
          reporter.report(`Error fetching ${failure.url}: ${failure.error}`, true);
        }
        if (items.length > 0) {
          reporter.report('URL content fetched successfully.');
        }
      } catch (error) {
        reporter.report(`Error fetching URL content: ${toErrorMessage(error)}`, true);
      }
    }

    let text = textParts.filter((part) => part.trim().length > 0).join('\n\n');
    if (!text.trim() && images.length === 0) {
      text = query;
      reporter.report('No text or image content found, using query as text to analyze.');
    }

    const prompt = `Analyze the following text and images based on the user's query: "${query}".
Document Text: "${text}"

Provide your analysis in the following format:
Document Type: [type]
Confidence: [0-1]
Key Information: [bullet points of extracted data]`;

    const analysis = await this.inference.generate(prompt, this.systemPrompt, this.model, images);

    return {
      kind: this.kind,
      model: this.model,
      durationMs: this.elapsedSince(startedAt),
      payload: {
        text,
        analysis,
        documentType: detectDocumentType(text),
        confidence: DOCUMENT_CONFIDENCE,
      },
    };
  }
}
