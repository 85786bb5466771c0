// Reference resolution outcomes

import type { Entity } from './entities.js';

/**
 * How a resolved reference was matched.
 *
 * - id: the hint named an entity id directly
 * - type: most recent entity of the filtered types
 * - recency: the hint is a recency phrase ("it", "what i just made")
 * - fallback: nothing in the hint was recognized; most recent entity overall
 */
export type ResolutionMethod = 'id' | 'type' | 'recency' | 'fallback';

export type ResolveOutcome =
  | {
      status: 'resolved';
      entityId: string;
      entity: Entity;
      method: ResolutionMethod;
      typeFilter: string[] | null;
    }
  | {
      status: 'ambiguous';
      reason: string;
      candidates: Entity[];
    }
  | {
      status: 'not_found';
      reason: string;
      typeFilter: string[] | null;
    };
