/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { combinedContextText, freezeRequest } from './request.js';

describe('combinedContextText', () => {
  it('joins free text and document text, skipping blanks', () => {
    expect(
      combinedContextText({
        text: 'intro',
        documents: [
          { filename: 'a.txt', text: 'first' },
          { filename: 'b.txt', text: '  ' },
          { filename: 'c.txt', text: 'second' },
        ],
      }),
    ).toBe('intro\n\nfirst\n\nsecond');
  });

  it('is empty without context', () => {
    expect(combinedContextText(undefined)).toBe('');
    expect(combinedContextText({ images: ['AAAA'] })).toBe('');
  });
});

describe('freezeRequest', () => {
  it('copies and freezes the whole request', () => {
    const original = { query: 'q', context: { urls: ['https://example.com'] } };

    const frozen = freezeRequest(original);

    expect(frozen).toEqual(original);
    expect(frozen).not.toBe(original);
    expect(Object.isFrozen(frozen.context?.urls)).toBe(true);
    expect(Object.isFrozen(original)).toBe(false);
  });
});
