// Reference vocabulary
//
// Recency phrases, the keyword → entity type table and plural quantifiers,
// loaded from vocabulary.json beside this module.

import { readFileSync } from 'node:fs';

export type ReferenceVocabulary = {
  /** Whole hints that mean "the most recent entity" */
  recencyPhrases?: string[];

  /** Words that ask for more than one entity */
  pluralQuantifiers: string[];

  /** Keyword or phrase → entity types it refers to */
  typeKeywords: Record<string, string[]>;
};

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isVocabulary(value: unknown): value is ReferenceVocabulary {
  if (typeof value !== 'object' || value === null) return false;
  if (!('pluralQuantifiers' in value) || !isStringArray(value.pluralQuantifiers)) return false;
  if ('recencyPhrases' in value && !isStringArray(value.recencyPhrases)) return false;
  if (!('typeKeywords' in value)) return false;

  const keywords = value.typeKeywords;
  return (
    typeof keywords === 'object' &&
    keywords !== null &&
    Object.values(keywords).every(isStringArray)
  );
}

/**
 * Parse and check a vocabulary document.
 */
export function parseVocabulary(content: string): ReferenceVocabulary {
  const parsed: unknown = JSON.parse(content);
  if (!isVocabulary(parsed)) {
    throw new Error('Invalid reference vocabulary');
  }
  return parsed;
}

export const defaultVocabulary: ReferenceVocabulary = parseVocabulary(
  readFileSync(new URL('./vocabulary.json', import.meta.url), 'utf-8')
);
