/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Loader for system prompt overrides kept outside the source tree.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Read a markdown prompt file. YAML front matter, if any, is dropped.
 * @returns The prompt text, or null when the file does not exist or is blank
 */
export async function loadPrompt(promptPath: string): Promise<string | null> {
  let content: string;
  try {
    content = await fs.readFile(path.resolve(process.cwd(), promptPath), 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  const body = content.replace(/^---\r?\n[\s\S]*?\r?\n---\r?\n/, '').trim();
  return body.length > 0 ? body : null;
}

/** Load `<role>.prompt.md` from `dir` for every role that has one. */
export async function loadPromptOverrides<R extends string>(
  dir: string,
  roles: readonly R[],
): Promise<Partial<Record<R, string>>> {
  const overrides: Partial<Record<R, string>> = {};
  for (const role of roles) {
    const prompt = await loadPrompt(path.join(dir, `${role}.prompt.md`));
    if (prompt !== null) {
      overrides[role] = prompt;
    }
  }
  return overrides;
}
