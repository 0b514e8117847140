/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { toErrorMessage } from '../core/errors.js';

export type FetchedContent =
  | { url: string; filename: string; kind: 'text'; content: string }
  | { url: string; filename: string; kind: 'image'; content: string };   // base64

export interface FetchFailure {
  url: string;
  error: string;
}

export interface FetchReport {
  items: FetchedContent[];
  failures: FetchFailure[];
}

export interface ContentFetcher {
  fetch(urls: readonly string[]): Promise<FetchReport>;
}

const TEXTUAL = /^(text\/|application\/(json|xml|xhtml\+xml|javascript)|[^;]*\+json|[^;]*\+xml)/;

function filenameOf(url: string): string {
  try {
    const segments = new URL(url).pathname.split('/').filter(Boolean);
    return segments.at(-1) ?? url;
  } catch {
    return url;
  }
}

/**
 * Fetches URLs one at a time with a per-request timeout. A URL that fails
 * does not stop the others; it is listed in `failures`.
 */
export class HttpContentFetcher implements ContentFetcher {
  constructor(
    private readonly timeoutMs = 30_000,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async fetch(urls: readonly string[]): Promise<FetchReport> {
    const report: FetchReport = { items: [], failures: [] };
    for (const url of urls) {
      try {
        report.items.push(await this.fetchOne(url));
      } catch (error) {
        report.failures.push({ url, error: toErrorMessage(error) });
      }
    }
    return report;
  }

  private async fetchOne(url: string): Promise<FetchedContent> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await this.fetchImpl(url, { signal: controller.signal });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}`);
      }
      const contentType = (res.headers.get('content-type') ?? '').toLowerCase();
      const filename = filenameOf(url);
      if (contentType.startsWith('image/')) {
        const bytes = Buffer.from(await res.arrayBuffer());
        return { url, filename, kind: 'image', content: bytes.toString('base64') };
      }
      if (contentType === '' || TEXTUAL.test(contentType)) {
        return { url, filename, kind: 'text', content: await res.text() };
      }
      throw new Error(`Unsupported content type: ${contentType}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}
