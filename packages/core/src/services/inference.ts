/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { GoogleGenAI, type Part } from '@google/genai';
import { withRetries } from '../coordination/recovery.js';

/** Text generation and embedding, the only model calls the executors make. */
export interface InferenceBackend {
  generate(prompt: string, systemPrompt: string, model: string, images?: readonly string[]): Promise<string>;
  embed(text: string, model: string): Promise<number[]>;
}

const IMAGE_SIGNATURES: ReadonlyArray<readonly [string, string]> = [
  ['/9j/', 'image/jpeg'],
  ['iVBORw0KGgo', 'image/png'],
  ['R0lGOD', 'image/gif'],
  ['UklGR', 'image/webp'],
];

/**
 * Accepts raw base64 or a `data:` URL and returns the bare payload with its
 * MIME type, sniffed from the leading bytes when the URL does not say.
 */
export function toInlineImage(image: string): { mimeType: string; data: string } {
  const dataUrl = /^data:([^;,]+);base64,(.*)$/s.exec(image);
  if (dataUrl) {
    return { mimeType: dataUrl[1], data: dataUrl[2] };
  }
  const signature = IMAGE_SIGNATURES.find(([prefix]) => image.startsWith(prefix));
  return { mimeType: signature ? signature[1] : 'image/png', data: image };
}

export interface GenAiBackendOptions {
  apiKey: string;
  retries?: number;
  retryDelayMs?: number;
}

export class GenAiInferenceBackend implements InferenceBackend {
  private readonly ai: GoogleGenAI;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(options: GenAiBackendOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  async generate(
    prompt: string,
    systemPrompt: string,
    model: string,
    images: readonly string[] = [],
  ): Promise<string> {
    const parts: Part[] = [
      { text: prompt },
      ...images.map((image) => ({ inlineData: toInlineImage(image) })),
    ];
    const response = await withRetries(
      () =>
        this.ai.models.generateContent({
          model,
          contents: { role: 'user', parts },
          config: { systemInstruction: systemPrompt },
        }),
      this.retries,
      this.retryDelayMs,
    );
    return response.text ?? '';
  }

  async embed(text: string, model: string): Promise<number[]> {
    const response = await withRetries(
      () => this.ai.models.embedContent({ model, contents: text }),
      this.retries,
      this.retryDelayMs,
    );
    const values = response.embeddings?.[0]?.values;
    if (!values || values.length === 0) {
      throw new Error(`Embedding model ${model} returned no vector`);
    }
    return values;
  }
}
