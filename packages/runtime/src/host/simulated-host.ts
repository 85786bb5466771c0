// Simulated modeling host
//
// An in-memory document with a handful of handlers shaped like a real
// host's operations. Used to run the bridge end to end without the
// modeling application, and by tests.

import type { CommandParameters } from '@cmdbridge/protocol';
import type { CommandHandler } from '../dispatch/types.js';
import {
  optionalNumber,
  optionalString,
  requireArray,
  requireNumber,
  requireString,
} from '../dispatch/parameters.js';
import { ArgumentError, OperationError } from '../errors.js';

export type SimulatedObject = {
  id: string;
  type: string;
  properties: Record<string, unknown>;
};

/**
 * Upper bound for the `wait` handler.
 */
export const MAX_SIMULATED_WAIT_MS = 120_000;

export class SimulatedDocument {
  private objects = new Map<string, SimulatedObject>();
  private counter = 0;

  add(type: string, properties: Record<string, unknown>): SimulatedObject {
    this.counter++;
    const object = { id: `${type}-${this.counter}`, type, properties };
    this.objects.set(object.id, object);
    return object;
  }

  get(id: string): SimulatedObject | null {
    return this.objects.get(id) ?? null;
  }

  /**
   * @throws OperationError if the object does not exist
   */
  update(id: string, properties: Record<string, unknown>): SimulatedObject {
    const existing = this.objects.get(id);
    if (!existing) {
      throw new OperationError(`Object ${id} does not exist in the document`);
    }
    const updated = { ...existing, properties: { ...existing.properties, ...properties } };
    this.objects.set(id, updated);
    return updated;
  }

  remove(id: string): boolean {
    return this.objects.delete(id);
  }

  list(): SimulatedObject[] {
    return Array.from(this.objects.values());
  }

  clear(): number {
    const count = this.objects.size;
    this.objects.clear();
    return count;
  }

  get size(): number {
    return this.objects.size;
  }
}

function isNumberList(value: unknown): value is number[] {
  return (
    Array.isArray(value) && value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPoint(value: unknown, name: string): [number, number, number] {
  if (!isNumberList(value) || value.length < 2 || value.length > 3) {
    throw new ArgumentError(`${name} must be [x, y] or [x, y, z]`, name);
  }
  return [value[0], value[1], value[2] ?? 0];
}

function readProperties(parameters: Readonly<CommandParameters>): Record<string, unknown> {
  const value = parameters.properties;
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ArgumentError("Parameter 'properties' must be an object", 'properties');
  }
  return { ...value };
}

function created(object: SimulatedObject): Record<string, unknown> {
  return { entity_id: object.id, entity_type: object.type, properties: object.properties };
}

/**
 * Handlers operating on a simulated document.
 */
export function createSimulatedHandlers(document: SimulatedDocument): Record<string, CommandHandler> {
  return {
    create_point(parameters, ctx) {
      ctx.ownerThread.assertCurrent('create_point');
      const x = requireNumber(parameters, 'x');
      const y = requireNumber(parameters, 'y');
      const z = optionalNumber(parameters, 'z', 0);
      return created(document.add('point', { x, y, z }));
    },

    create_curve(parameters, ctx) {
      ctx.ownerThread.assertCurrent('create_curve');
      const points = requireArray(parameters, 'points').map((p, i) => readPoint(p, `points[${i}]`));
      if (points.length < 2) {
        throw new ArgumentError('A curve needs at least two points', 'points');
      }
      const degree = optionalNumber(parameters, 'degree', Math.min(3, points.length - 1));
      return created(document.add('curve', { points, degree }));
    },

    create_circle(parameters, ctx) {
      ctx.ownerThread.assertCurrent('create_circle');
      const radius = requireNumber(parameters, 'radius');
      if (radius <= 0) {
        throw new ArgumentError('Radius must be positive', 'radius');
      }
      const center =
        parameters.center === undefined ? [0, 0, 0] : readPoint(parameters.center, 'center');
      return created(document.add('circle', { radius, center }));
    },

    modify(parameters, ctx) {
      ctx.ownerThread.assertCurrent('modify');
      const id = requireString(parameters, 'entity_id');
      const updated = document.update(id, readProperties(parameters));
      return { modified: [updated.id], properties: updated.properties };
    },

    delete_object(parameters, ctx) {
      ctx.ownerThread.assertCurrent('delete_object');
      const id = requireString(parameters, 'entity_id');
      if (!document.remove(id)) {
        throw new OperationError(`Object ${id} does not exist in the document`);
      }
      return { deleted: id };
    },

    run_script(parameters, ctx) {
      ctx.ownerThread.assertCurrent('run_script');
      const creates = requireArray(parameters, 'creates');
      const objects = creates.map((item, i) => {
        if (typeof item !== 'string' || item === '') {
          throw new ArgumentError(`creates[${i}] must be a type name`, 'creates');
        }
        return document.add(item, {});
      });
      return {
        entities: objects.map((object) => ({ id: object.id, type: object.type })),
        output: optionalString(parameters, 'label') ?? null,
      };
    },

    get_document_info(_parameters, ctx) {
      ctx.ownerThread.assertCurrent('get_document_info');
      const objects = document.list();
      return {
        object_count: objects.length,
        types: Array.from(new Set(objects.map((o) => o.type))).sort(),
      };
    },

    clear_document(_parameters, ctx) {
      ctx.ownerThread.assertCurrent('clear_document');
      return { removed: document.clear() };
    },

    async wait(parameters, ctx) {
      const ms = requireNumber(parameters, 'ms');
      if (ms < 0 || ms > MAX_SIMULATED_WAIT_MS) {
        throw new ArgumentError(`ms must be between 0 and ${MAX_SIMULATED_WAIT_MS}`, 'ms');
      }
      await new Promise((resolve) => setTimeout(resolve, ms));
      ctx.ownerThread.assertCurrent('wait');
      return { waited: ms };
    },
  };
}
