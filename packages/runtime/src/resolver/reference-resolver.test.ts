// Tests for the reference resolver
// Runs against a real registry backed by the in-memory store.

import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryEntityLogStore } from '@cmdbridge/repositories';
import { EntityRegistry } from '../registry/entity-registry.js';
import { ReferenceResolver } from './reference-resolver.js';
import { parseVocabulary } from './vocabulary.js';

// --- Test Fixtures ---

let registry: EntityRegistry;
let resolver: ReferenceResolver;

beforeEach(async () => {
  registry = await EntityRegistry.open({ store: createInMemoryEntityLogStore() });
  resolver = new ReferenceResolver(registry);
});

async function seed(entities: Array<[string, string]>): Promise<void> {
  for (const [id, type] of entities) {
    await registry.record(id, type, `cmd-${id}`);
  }
}

// --- Tests ---

describe('ReferenceResolver.resolve', () => {
  it('should report not_found on an empty registry', () => {
    expect(resolver.resolve('it')).toEqual({
      status: 'not_found',
      reason: 'No entities have been recorded in this session',
      typeFilter: null,
    });
  });

  it('should resolve a vague hint to the most recent entity', async () => {
    await seed([
      ['c1', 'curve'],
      ['p1', 'point'],
    ]);

    const outcome = resolver.resolve('the last thing');

    expect(outcome.status).toBe('resolved');
    if (outcome.status !== 'resolved') return;
    expect(outcome.entityId).toBe('p1');
    expect(outcome.method).toBe('recency');
    expect(outcome.typeFilter).toBeNull();
  });

  it('should recognize recency phrases regardless of case and punctuation', async () => {
    await seed([
      ['c1', 'curve'],
      ['p1', 'point'],
    ]);

    for (const hint of ['it', 'That!', 'What I just made', 'my last creation.']) {
      expect(resolver.resolve(hint)).toMatchObject({
        status: 'resolved',
        entityId: 'p1',
        method: 'recency',
        typeFilter: null,
      });
    }
  });

  it('should fall back to the most recent entity for an unrecognized hint', async () => {
    await seed([
      ['c1', 'curve'],
      ['p1', 'point'],
    ]);

    expect(resolver.resolve('the blue thing over there')).toMatchObject({
      status: 'resolved',
      entityId: 'p1',
      method: 'fallback',
    });
  });

  it('should narrow by a type keyword in the hint', async () => {
    await seed([
      ['c1', 'curve'],
      ['p1', 'point'],
    ]);

    const outcome = resolver.resolve('the curve you just drew');

    expect(outcome.status).toBe('resolved');
    if (outcome.status !== 'resolved') return;
    expect(outcome.entityId).toBe('c1');
    expect(outcome.method).toBe('type');
    expect(outcome.typeFilter).toEqual(['curve', 'polyline', 'line', 'arc', 'circle', 'spline']);
  });

  it('should prefer a longer phrase over a shorter keyword', async () => {
    await seed([
      ['s1', 'python_script'],
      ['s2', 'script'],
    ]);

    expect(resolver.inferTypeKeywords('the python script')).toEqual([
      { keyword: 'python script', types: ['python_script'] },
    ]);
    const outcome = resolver.resolve('the python script');
    expect(outcome.status === 'resolved' && outcome.entityId).toBe('s1');
  });

  it('should resolve an entity id mentioned in the hint', async () => {
    await seed([
      ['curve-1', 'curve'],
      ['curve-2', 'curve'],
    ]);

    const outcome = resolver.resolve('move "curve-1" up');

    expect(outcome.status).toBe('resolved');
    if (outcome.status !== 'resolved') return;
    expect(outcome.entityId).toBe('curve-1');
    expect(outcome.method).toBe('id');
  });

  it('should use an explicit type filter instead of keywords', async () => {
    await seed([
      ['p1', 'point'],
      ['c1', 'circle'],
    ]);

    const outcome = resolver.resolve('the circle', 'point');

    expect(outcome.status === 'resolved' && outcome.entityId).toBe('p1');
  });

  it('should report not_found when no entity matches the filter', async () => {
    await seed([['p1', 'point']]);

    expect(resolver.resolve('that beam')).toEqual({
      status: 'not_found',
      reason: 'No entities of type beam have been recorded',
      typeFilter: ['beam'],
    });
  });

  it('should report ambiguity for a plural quantifier', async () => {
    await seed([
      ['b1', 'beam'],
      ['b2', 'beam'],
      ['p1', 'post'],
    ]);

    const outcome = resolver.resolve('both beams');

    expect(outcome.status).toBe('ambiguous');
    if (outcome.status !== 'ambiguous') return;
    expect(outcome.reason).toBe('"both" refers to more than one entity');
    expect(outcome.candidates.map((e) => e.entityId)).toEqual(['b2', 'b1']);
  });

  it('should report ambiguity when the hint names several kinds of entity', async () => {
    await seed([
      ['b1', 'beam'],
      ['p1', 'post'],
    ]);

    const outcome = resolver.resolve('the beam on the post');

    expect(outcome.status).toBe('ambiguous');
    if (outcome.status !== 'ambiguous') return;
    expect(outcome.reason).toBe('Hint mentions several kinds of entity: beam, post');
    expect(outcome.candidates.map((e) => e.entityId)).toEqual(['b1', 'p1']);
  });

  it('should resolve when only one named kind has entities', async () => {
    await seed([['b1', 'beam']]);

    const outcome = resolver.resolve('the beam on the post');

    expect(outcome.status === 'resolved' && outcome.entityId).toBe('b1');
  });

  it('should return the same entity for the same hint with no write between', async () => {
    await seed([
      ['c1', 'curve'],
      ['c2', 'curve'],
    ]);

    const first = resolver.resolve('the curve');
    const second = resolver.resolve('the curve');

    expect(second).toEqual(first);
  });

  it('should follow the registry after a touch', async () => {
    await seed([
      ['c1', 'curve'],
      ['c2', 'curve'],
    ]);
    await registry.touch('c1', 'cmd-edit');

    const outcome = resolver.resolve('the curve');

    expect(outcome.status === 'resolved' && outcome.entityId).toBe('c1');
  });

  it('should accept a custom vocabulary', async () => {
    await seed([
      ['w1', 'wall'],
      ['d1', 'door'],
    ]);
    const custom = new ReferenceResolver(registry, {
      vocabulary: parseVocabulary('{"pluralQuantifiers":[],"typeKeywords":{"wall":["wall"]}}'),
    });

    expect(custom.resolve('the wall')).toMatchObject({
      status: 'resolved',
      entityId: 'w1',
      method: 'type',
    });
    expect(custom.resolve('the door')).toMatchObject({
      status: 'resolved',
      entityId: 'd1',
      method: 'fallback',
    });
  });
});

describe('parseVocabulary', () => {
  it('should reject a malformed document', () => {
    expect(() => parseVocabulary('{"pluralQuantifiers":"all"}')).toThrow(
      'Invalid reference vocabulary'
    );
  });
});
