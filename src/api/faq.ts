/**
 * @fileoverview Canned answers for frequently asked questions
 *
 * A question that matches an entry (ignoring case and runs of whitespace) is
 * answered from the catalog without retrieval or generation.
 */

import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

const faqFileSchema = z.object({
  entries: z.array(
    z.object({
      question: z.string().trim().min(1),
      answer: z.string().trim().min(1),
    })
  ),
});

export type FaqEntry = z.infer<typeof faqFileSchema>['entries'][number];

/** The catalog bundled with the package (data/faq.json). */
export const DEFAULT_FAQ_PATH = fileURLToPath(new URL('../../data/faq.json', import.meta.url));

export function normalizeQuestion(question: string): string {
  return question.trim().replace(/\s+/g, ' ').toLowerCase();
}

export class FaqCatalog {
  private readonly byQuestion = new Map<string, FaqEntry>();

  constructor(entries: FaqEntry[]) {
    for (const entry of entries) {
      const key = normalizeQuestion(entry.question);
      if (!this.byQuestion.has(key)) this.byQuestion.set(key, entry);
    }
  }

  lookup(question: string): FaqEntry | null {
    return this.byQuestion.get(normalizeQuestion(question)) ?? null;
  }

  questions(): string[] {
    return [...this.byQuestion.values()].map((entry) => entry.question);
  }

  size(): number {
    return this.byQuestion.size;
  }
}

export async function loadFaqCatalog(filePath: string = DEFAULT_FAQ_PATH): Promise<FaqCatalog> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError('faq.path', `cannot read ${filePath} (${getErrorMessage(error)})`);
  }
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new ConfigurationError('faq.path', `${filePath} is not valid JSON`);
  }
  const parsed = faqFileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ConfigurationError('faq.path', `${filePath}: ${parsed.error.issues[0]?.message ?? 'invalid FAQ file'}`);
  }
  return new FaqCatalog(parsed.data.entries);
}
