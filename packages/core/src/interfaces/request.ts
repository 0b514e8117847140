/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { deepFreeze } from '../utils/deepFreeze.js';

/** A document whose text has already been extracted upstream. */
export interface DocumentPayload {
  readonly filename: string;
  readonly text: string;
}

/** Optional material supplied alongside the query. */
export interface RequestContext {
  readonly text?: string;
  readonly images?: readonly string[];        // base64 payloads
  readonly documents?: readonly DocumentPayload[];
  readonly collections?: readonly string[];   // knowledge collections to search
  readonly urls?: readonly string[];
}

export interface AgentRequest {
  readonly query: string;
  readonly context?: RequestContext;
}

/** Flatten free text and document text into one block, blank-line separated. */
export function combinedContextText(context: RequestContext | undefined): string {
  if (!context) return '';
  const parts = [context.text ?? '', ...(context.documents ?? []).map((d) => d.text)];
  return parts.filter((part) => part.trim().length > 0).join('\n\n');
}

/** Detach the request from the caller and freeze it all the way down. */
export function freezeRequest(request: AgentRequest): AgentRequest {
  return deepFreeze(structuredClone(request));
}
