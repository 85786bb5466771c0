// Entity changes reported in a successful result's data
//
// Recognized shapes, merged in this order:
//   entities: [{ id, type }]            created, in order of appearance
//   entity_id + entity_type             created
//   component_id + component_type       created
//   modified: [id | { id }]             modified

import type { ReportedEntity } from '@cmdbridge/protocol';

export type EntityChanges = {
  created: ReportedEntity[];
  modified: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readEntity(value: unknown): ReportedEntity | null {
  if (!isRecord(value)) return null;

  const id = value.id ?? value.entity_id;
  const type = value.type ?? value.entity_type;
  if (typeof id !== 'string' || id === '' || typeof type !== 'string' || type === '') {
    return null;
  }
  return { id, type };
}

function readPair(data: Record<string, unknown>, idKey: string, typeKey: string): ReportedEntity | null {
  const id = data[idKey];
  const type = data[typeKey];
  if (typeof id !== 'string' || id === '' || typeof type !== 'string' || type === '') {
    return null;
  }
  return { id, type };
}

/**
 * Pull created and modified entities out of result data.
 * A created id appears once, at its first position.
 */
export function extractEntityChanges(data: unknown): EntityChanges {
  if (!isRecord(data)) {
    return { created: [], modified: [] };
  }

  const reported: ReportedEntity[] = [];

  if (Array.isArray(data.entities)) {
    for (const item of data.entities) {
      const entity = readEntity(item);
      if (entity) reported.push(entity);
    }
  }

  const single = readPair(data, 'entity_id', 'entity_type');
  if (single) reported.push(single);

  const component = readPair(data, 'component_id', 'component_type');
  if (component) reported.push(component);

  const created: ReportedEntity[] = [];
  const createdIds = new Set<string>();
  for (const entity of reported) {
    if (createdIds.has(entity.id)) continue;
    createdIds.add(entity.id);
    created.push(entity);
  }

  const modified: string[] = [];
  if (Array.isArray(data.modified)) {
    for (const item of data.modified) {
      const id = typeof item === 'string' ? item : isRecord(item) ? item.id : undefined;
      if (typeof id === 'string' && id !== '' && !createdIds.has(id) && !modified.includes(id)) {
        modified.push(id);
      }
    }
  }

  return { created, modified };
}
