/**
 * Querywise - Intent Pattern Lists
 * Phrase lists for the classifier's pattern stage and the rewriter trigger
 */

import { readFileSync } from 'fs';

import { z } from 'zod';

import { formatValidationErrors } from '../config/schema.js';
import { ConfigurationError } from '../utils/types.js';

const IntentPatternFileSchema = z.object({
  general: z.array(z.string().min(1)).default([]),
  dataVerbs: z.array(z.string().min(1)).default([]),
  dataNouns: z.array(z.string().min(1)).default([]),
  referentialMarkers: z.array(z.string().min(1)).default([]),
});

export type IntentPatterns = z.infer<typeof IntentPatternFileSchema>;

export function loadIntentPatterns(filePath: string): IntentPatterns {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read intent pattern file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = IntentPatternFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Intent pattern file ${filePath} is invalid: ${formatValidationErrors(parsed.error).join('; ')}`
    );
  }
  return parsed.data;
}

/**
 * Lowercase, collapse whitespace and drop trailing punctuation
 */
export function normalizeUtterance(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[\s!?.,;:]+$/, '');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches any phrase as whole words, optionally pluralised
 */
export function phraseMatcher(phrases: readonly string[], allowPlural = false): RegExp | null {
  const alternatives = phrases
    .map((phrase) => normalizeUtterance(phrase))
    .filter((phrase) => phrase.length > 0)
    .sort((a, b) => b.length - a.length)
    .map((phrase) => escapeRegExp(phrase).replace(/ /g, '\\s+'));
  if (alternatives.length === 0) {
    return null;
  }
  const suffix = allowPlural ? '(?:s|es)?' : '';
  return new RegExp(`\\b(?:${alternatives.join('|')})${suffix}\\b`, 'i');
}
