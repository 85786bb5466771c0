// Reference resolver - maps vague references to entity ids
//
// Stateless: every call is a pure function of the registry at call time,
// so resolving the same hint twice with no write in between returns the
// same entity.

import type { Entity, ResolveOutcome } from '@cmdbridge/protocol';
import type { EntityIndexReader } from '../registry/entity-registry.js';
import { defaultVocabulary, type ReferenceVocabulary } from './vocabulary.js';

export const DEFAULT_MAX_CANDIDATES = 5;

export type ReferenceResolverOptions = {
  vocabulary?: ReferenceVocabulary;

  /** Candidates listed in an ambiguous outcome (default 5) */
  maxCandidates?: number;
};

/**
 * A keyword found in a hint and the entity types it stands for.
 */
export type TypeKeywordMatch = {
  keyword: string;
  types: string[];
};

export class ReferenceResolver {
  private readonly vocabulary: ReferenceVocabulary;
  private readonly maxCandidates: number;
  private readonly keywords: Array<{ keyword: string; words: string[]; types: string[] }>;
  private readonly quantifiers: Set<string>;
  private readonly recencyPhrases: Set<string>;

  constructor(
    private registry: EntityIndexReader,
    options: ReferenceResolverOptions = {}
  ) {
    this.vocabulary = options.vocabulary ?? defaultVocabulary;
    this.maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
    this.quantifiers = new Set(this.vocabulary.pluralQuantifiers);
    this.recencyPhrases = new Set(
      (this.vocabulary.recencyPhrases ?? []).map((phrase) => tokenize(phrase).join(' '))
    );

    // Longest phrases first so "python script" wins over "script"
    this.keywords = Object.entries(this.vocabulary.typeKeywords)
      .map(([keyword, types]) => ({ keyword, words: keyword.split(' '), types }))
      .sort((a, b) => b.words.length - a.words.length);
  }

  /**
   * Resolve a hint to an entity.
   *
   * 1. A token naming a registered entity id resolves to it.
   * 2. Without an explicit filter, a hint that is a recency phrase
   *    ("it", "what i just made") resolves to the most recent entity.
   * 3. Keywords for different kinds of entity in one hint are ambiguous
   *    when each kind has an entity.
   * 4. A plural quantifier ("all", "both", ...) is ambiguous.
   * 5. With a type filter (given, or inferred from keywords), the most
   *    recent matching entity.
   * 6. Otherwise the most recent entity overall.
   *
   * @param typeFilter - Explicit filter; replaces keyword inference
   */
  resolve(hint: string, typeFilter?: string | string[]): ResolveOutcome {
    const tokens = tokenize(hint);

    for (const token of rawTokens(hint)) {
      const entity = this.registry.peek(token);
      if (entity) {
        return {
          status: 'resolved',
          entityId: entity.entityId,
          entity,
          method: 'id',
          typeFilter: null,
        };
      }
    }

    const explicit = normalizeFilter(typeFilter);
    const recencyPhrase = !explicit && this.recencyPhrases.has(tokens.join(' '));
    const inferred = explicit || recencyPhrase ? [] : this.inferTypes(tokens);

    if (!explicit && inferred.length > 1) {
      const candidates = dedupe(
        inferred
          .map((match) => this.registry.mostRecent(match.types))
          .filter((entity): entity is Entity => entity !== null)
      );

      if (candidates.length > 1) {
        return {
          status: 'ambiguous',
          reason: `Hint mentions several kinds of entity: ${inferred
            .map((match) => match.keyword)
            .join(', ')}`,
          candidates,
        };
      }
    }

    const filter = explicit ?? mergeTypes(inferred);

    const quantifier = recencyPhrase
      ? undefined
      : tokens.find((token) => this.quantifiers.has(token));
    if (quantifier) {
      const candidates = this.registry.recent(this.maxCandidates, filter ?? undefined);
      return {
        status: 'ambiguous',
        reason: `"${quantifier}" refers to more than one entity`,
        candidates,
      };
    }

    const entity = this.registry.mostRecent(filter ?? undefined);
    if (!entity) {
      return {
        status: 'not_found',
        reason: filter
          ? `No entities of type ${filter.join(' or ')} have been recorded`
          : 'No entities have been recorded in this session',
        typeFilter: filter,
      };
    }

    return {
      status: 'resolved',
      entityId: entity.entityId,
      entity,
      method: filter ? 'type' : recencyPhrase ? 'recency' : 'fallback',
      typeFilter: filter,
    };
  }

  /**
   * Keywords in a hint that name entity types, in order of appearance.
   * Overlapping shorter keywords are not reported.
   */
  inferTypeKeywords(hint: string): TypeKeywordMatch[] {
    return this.inferTypes(tokenize(hint));
  }

  private inferTypes(tokens: string[]): TypeKeywordMatch[] {
    const claimed = new Array<boolean>(tokens.length).fill(false);
    const found: Array<TypeKeywordMatch & { position: number }> = [];

    for (const { keyword, words, types } of this.keywords) {
      for (let i = 0; i + words.length <= tokens.length; i++) {
        const span = tokens.slice(i, i + words.length);
        if (span.join(' ') !== keyword) continue;
        if (claimed.slice(i, i + words.length).some(Boolean)) continue;

        claimed.fill(true, i, i + words.length);
        found.push({ keyword, types, position: i });
      }
    }

    // Keywords standing for the same types count once
    const seen = new Set<string>();
    return found
      .sort((a, b) => a.position - b.position)
      .filter((match) => {
        const key = [...match.types].sort().join('|');
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      })
      .map(({ keyword, types }) => ({ keyword, types }));
  }
}

/**
 * Lower-case words with punctuation removed.
 */
function tokenize(hint: string): string[] {
  return hint
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((token) => token.length > 0);
}

/**
 * Whitespace-separated tokens with surrounding quotes and punctuation
 * stripped, case preserved. Entity ids are matched against these.
 */
function rawTokens(hint: string): string[] {
  const trimmed = hint.trim();
  const tokens = trimmed
    .split(/\s+/)
    .map((token) => token.replace(/^["'`(<[{]+|["'`)>\]},.;:!?]+$/g, ''))
    .filter((token) => token.length > 0);
  return trimmed.length > 0 ? [trimmed, ...tokens] : tokens;
}

function normalizeFilter(typeFilter?: string | string[]): string[] | null {
  if (typeFilter === undefined) return null;
  const list = (typeof typeFilter === 'string' ? [typeFilter] : typeFilter).filter(
    (type) => type.trim().length > 0
  );
  return list.length > 0 ? list : null;
}

function mergeTypes(matches: TypeKeywordMatch[]): string[] | null {
  if (matches.length === 0) return null;
  return Array.from(new Set(matches.flatMap((match) => match.types)));
}

function dedupe(entities: Entity[]): Entity[] {
  const seen = new Set<string>();
  return entities.filter((entity) => {
    if (seen.has(entity.entityId)) return false;
    seen.add(entity.entityId);
    return true;
  });
}
