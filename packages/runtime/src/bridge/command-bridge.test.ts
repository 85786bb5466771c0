// Tests for the command bridge
// Producers, an in-process host and the entity registry wired together.

import { describe, it, expect, vi } from 'vitest';
import type { AwaitOutcome, CommandResult } from '@cmdbridge/protocol';
import { createInMemoryEntityLogStore } from '@cmdbridge/repositories';
import { CommandBridge, type CommandBridgeOptions } from './command-bridge.js';
import { EntityRegistry } from '../registry/entity-registry.js';
import { DispatchTable } from '../dispatch/dispatch-table.js';
import { HostExecutor } from '../host/host-executor.js';
import { SimulatedDocument, createSimulatedHandlers } from '../host/simulated-host.js';
import {
  CommandNotFoundError,
  DuplicateResultError,
  InvalidCommandError,
  InvalidStatusTransitionError,
  ReferenceAmbiguousError,
  ReferenceNotFoundError,
} from '../errors.js';

// --- Test Fixtures ---

const T0 = Date.parse('2024-01-01T00:00:00.000Z');

function createManualClock() {
  const clock = { now: T0, read: () => new Date(clock.now) };
  return clock;
}

async function createBridge(options: Partial<CommandBridgeOptions> = {}) {
  const store = createInMemoryEntityLogStore();
  const registry = await EntityRegistry.open({ store });
  const bridge = new CommandBridge({ registry, ...options });
  return { bridge, registry, store };
}

function createHost(bridge: CommandBridge, table = new DispatchTable()) {
  const document = new SimulatedDocument();
  table.registerAll(createSimulatedHandlers(document));
  const executor = new HostExecutor({ source: bridge, sink: bridge, dispatch: table });
  return { document, table, executor };
}

function expectCompleted(outcome: AwaitOutcome): CommandResult {
  if (outcome.status !== 'completed') {
    throw new Error(`Expected a completed outcome, got ${outcome.status}`);
  }
  return outcome.result;
}

const SIMULATED_COMMANDS = [
  'clear_document',
  'create_circle',
  'create_curve',
  'create_point',
  'delete_object',
  'get_document_info',
  'modify',
  'run_script',
  'wait',
];

// --- Tests ---

describe('CommandBridge.submit', () => {
  it('should enqueue a pending command and return a receipt', async () => {
    const { bridge } = await createBridge({ idFactory: () => 'cmd-1' });

    const receipt = bridge.submit('create_point', { x: 1, y: 2 });

    expect(receipt.commandId).toBe('cmd-1');
    expect(receipt.resolvedReference).toBeNull();
    expect(bridge.poll('cmd-1')).toMatchObject({
      command: { id: 'cmd-1', type: 'create_point', parameters: { x: 1, y: 2 }, status: 'pending' },
      result: null,
    });
  });

  it('should reject an invalid command type', async () => {
    const { bridge } = await createBridge();

    expect(() => bridge.submit('not a type')).toThrow(InvalidCommandError);
    expect(bridge.queue.size).toBe(0);
  });

  it('should refuse a reference that matches nothing', async () => {
    const { bridge } = await createBridge();

    expect(() => bridge.submit('modify', { reference: 'that beam' })).toThrow(
      ReferenceNotFoundError
    );
    expect(bridge.queue.size).toBe(0);
  });

  it('should refuse an ambiguous reference', async () => {
    const { bridge, registry } = await createBridge();
    await registry.record('b1', 'beam', 'cmd-0');
    await registry.record('b2', 'beam', 'cmd-0');

    expect(() => bridge.submit('delete_object', { reference: 'all beams' })).toThrow(
      ReferenceAmbiguousError
    );
  });

  it('should narrow a reference by reference_type', async () => {
    const { bridge, registry } = await createBridge();
    await registry.record('b1', 'beam', 'cmd-0');
    await registry.record('p1', 'post', 'cmd-0');

    const receipt = bridge.submit('modify', { reference: 'that one', reference_type: 'beam' });

    expect(receipt.resolvedReference).toEqual({ hint: 'that one', entityId: 'b1', method: 'type' });
    expect(bridge.poll(receipt.commandId).command.parameters.entity_id).toBe('b1');
  });

  it('should not resolve a reference when entity_id is given', async () => {
    const { bridge } = await createBridge();

    const receipt = bridge.submit('modify', { reference: 'the curve', entity_id: 'curve-7' });

    expect(receipt.resolvedReference).toBeNull();
    expect(bridge.poll(receipt.commandId).command.parameters.entity_id).toBe('curve-7');
  });
});

describe('CommandBridge delivery', () => {
  it('should deliver in submission order across drains', async () => {
    const { bridge } = await createBridge();
    const a = bridge.submit('create_point', { x: 0, y: 0 }).commandId;
    const b = bridge.submit('create_point', { x: 1, y: 0 }).commandId;
    const c = bridge.submit('create_point', { x: 2, y: 0 }).commandId;

    expect((await bridge.drain(2)).map((cmd) => cmd.id)).toEqual([a, b]);
    expect((await bridge.drain(5)).map((cmd) => cmd.id)).toEqual([c]);
    expect(await bridge.drain(5)).toEqual([]);
  });

  it('should not lose or duplicate commands from concurrent producers', async () => {
    const { bridge } = await createBridge();

    const producers = Array.from({ length: 8 }, (_, producer) =>
      (async () => {
        const ids: string[] = [];
        for (let i = 0; i < 25; i++) {
          await Promise.resolve();
          ids.push(bridge.submit('create_point', { x: producer, y: i }).commandId);
        }
        return ids;
      })()
    );
    const submitted = await Promise.all(producers);

    const drained = await bridge.drain(1000);

    expect(drained).toHaveLength(200);
    expect(new Set(drained.map((cmd) => cmd.id)).size).toBe(200);
    for (const ids of submitted) {
      expect(drained.filter((cmd) => ids.includes(cmd.id)).map((cmd) => cmd.id)).toEqual(ids);
    }
  });

  it('should execute every command exactly once', async () => {
    const { bridge } = await createBridge();
    const executions = new Map<string, number>();
    const table = new DispatchTable();
    table.register('count', (_parameters, ctx) => {
      executions.set(ctx.command.id, (executions.get(ctx.command.id) ?? 0) + 1);
      return null;
    });
    const executor = new HostExecutor({ source: bridge, sink: bridge, dispatch: table, batchSize: 7 });

    const ids = Array.from({ length: 50 }, () => bridge.submit('count').commandId);
    while ((await executor.runOnce()) > 0) {
      // drain until empty
    }

    expect(executions.size).toBe(50);
    expect([...executions.values()].every((count) => count === 1)).toBe(true);
    expect(ids.every((id) => bridge.poll(id).command.status === 'completed')).toBe(true);
  });
});

describe('CommandBridge.complete', () => {
  it('should treat a different second result for a command as a protocol violation', async () => {
    const onProtocolViolation = vi.fn();
    const { bridge } = await createBridge({ onProtocolViolation });
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });
    await bridge.drain(1);

    await bridge.complete(commandId, { success: true, data: null });
    await expect(bridge.complete(commandId, { success: true, data: { x: 1 } })).rejects.toBeInstanceOf(
      DuplicateResultError
    );

    expect(onProtocolViolation).toHaveBeenCalledTimes(1);
    expect(onProtocolViolation.mock.calls[0][0]).toBeInstanceOf(DuplicateResultError);
  });

  it('should acknowledge a redelivered identical result', async () => {
    const onProtocolViolation = vi.fn();
    const { bridge, registry } = await createBridge({ onProtocolViolation });
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });
    await bridge.drain(1);
    const data = { entity_id: 'point-1', entity_type: 'point' };

    const first = await bridge.complete(commandId, { success: true, data });
    const again = await bridge.complete(commandId, { success: true, data, debugInfo: undefined });

    expect(again).toBe(first);
    expect(registry.size).toBe(1);
    expect(registry.get('point-1')?.sequence).toBe(1);
    expect(onProtocolViolation).not.toHaveBeenCalled();
  });

  it('should let a concurrent identical redelivery wait for the first', async () => {
    const onProtocolViolation = vi.fn();
    const { bridge, registry } = await createBridge({ onProtocolViolation });
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });
    await bridge.drain(1);
    const data = { entity_id: 'point-1', entity_type: 'point' };

    const [first, second] = await Promise.all([
      bridge.complete(commandId, { success: true, data }),
      bridge.complete(commandId, { success: true, data }),
    ]);

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
    expect(onProtocolViolation).not.toHaveBeenCalled();
  });

  it('should reject a concurrent different completion while the first is recording', async () => {
    const onProtocolViolation = vi.fn();
    const { bridge, registry } = await createBridge({ onProtocolViolation });
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });
    await bridge.drain(1);
    const data = { entity_id: 'point-1', entity_type: 'point' };

    const first = bridge.complete(commandId, { success: true, data });
    const second = bridge.complete(commandId, {
      success: false,
      error: { kind: 'OperationError', message: 'document is read-only' },
    });

    await expect(second).rejects.toBeInstanceOf(DuplicateResultError);
    expect((await first).success).toBe(true);
    expect(registry.size).toBe(1);
    expect(onProtocolViolation).toHaveBeenCalledTimes(1);
  });

  it('should refuse a result for a command that was never drained', async () => {
    const { bridge } = await createBridge();
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });

    await expect(bridge.complete(commandId, { success: true, data: null })).rejects.toBeInstanceOf(
      InvalidStatusTransitionError
    );
  });

  it('should refuse a result for an unknown command', async () => {
    const { bridge } = await createBridge();

    await expect(bridge.complete('nope', { success: true, data: null })).rejects.toThrow(
      'Command not found: nope'
    );
  });

  it('should publish the result even when the registry write fails', async () => {
    const { bridge, registry, store } = await createBridge();
    const { executor } = createHost(bridge);
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });
    store.failNextAppend(new Error('disk full'));

    await executor.runOnce();

    const result = expectCompleted(await bridge.await(commandId, 100));
    expect(result.success).toBe(true);
    expect(registry.size).toBe(0);
  });
});

describe('CommandBridge end to end with a simulated host', () => {
  it('should resolve "the curve you just drew" to the curve, not the later point', async () => {
    const { bridge, registry } = await createBridge();
    const { executor } = createHost(bridge);

    const curve = bridge.submit('create_curve', { points: [[0, 0], [5, 0], [5, 5]] });
    await executor.runOnce();
    const curveResult = expectCompleted(await bridge.await(curve.commandId, 1000));
    expect(curveResult.data).toMatchObject({ entity_id: 'curve-1', entity_type: 'curve' });

    bridge.submit('create_point', { x: 1, y: 1 });
    await executor.runOnce();
    expect(registry.mostRecent()?.entityId).toBe('point-2');

    const modify = bridge.submit('modify', {
      reference: 'the curve you just drew',
      properties: { color: 'red' },
    });
    expect(modify.resolvedReference).toEqual({
      hint: 'the curve you just drew',
      entityId: 'curve-1',
      method: 'type',
    });

    await executor.runOnce();
    const modifyResult = expectCompleted(await bridge.await(modify.commandId, 1000));

    expect(modifyResult.success).toBe(true);
    expect(modifyResult.data).toMatchObject({ modified: ['curve-1'] });
    expect(registry.mostRecent()?.entityId).toBe('curve-1');
    expect(registry.get('curve-1')?.owningCommandId).toBe(modify.commandId);
    expect(registry.stats().totalTouches).toBe(1);
  });

  it('should return a failed result listing available commands for an unknown type', async () => {
    const { bridge } = await createBridge();
    const { executor } = createHost(bridge);

    const { commandId } = bridge.submit('nonexistent_op', { anything: true });
    await executor.runOnce();
    const result = expectCompleted(await bridge.await(commandId, 1000));

    expect(result.success).toBe(false);
    expect(result.error).toBe(
      `No handler registered for command type 'nonexistent_op'. Available commands: ${SIMULATED_COMMANDS.join(', ')}`
    );
    expect(result.errorDetails?.kind).toBe('NotRegistered');
    expect(result.errorDetails?.availableCommands).toEqual(SIMULATED_COMMANDS);
    expect(bridge.poll(commandId).command.status).toBe('failed');
  });

  it('should record several created entities in the order reported', async () => {
    const { bridge, registry } = await createBridge();
    const { executor } = createHost(bridge);

    bridge.submit('run_script', { creates: ['beam', 'beam', 'post'] });
    await executor.runOnce();

    expect(registry.mostRecent()?.entityId).toBe('post-3');
    expect(registry.mostRecent('beam')?.entityId).toBe('beam-2');
  });

  it('should report a timeout, then keep the late result retrievable', async () => {
    const { bridge } = await createBridge();
    const { executor } = createHost(bridge);
    const { commandId } = bridge.submit('wait', { ms: 60 });

    const running = executor.runOnce();
    const outcome = await bridge.await(commandId, 10);

    expect(outcome).toEqual({ status: 'timed_out', commandId, timeoutMs: 10 });

    await running;
    const late = bridge.poll(commandId);
    expect(late.command.status).toBe('completed');
    expect(late.result?.data).toEqual({ waited: 60 });
    expect(expectCompleted(await bridge.await(commandId, 10)).data).toEqual({ waited: 60 });
  });
});

describe('CommandBridge host availability', () => {
  it('should report host_unavailable when no host has ever polled', async () => {
    const clock = createManualClock();
    const { bridge } = await createBridge({ clock: clock.read, hostStaleAfterMs: 1000 });
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });
    clock.now += 2000;

    expect(await bridge.await(commandId, 50)).toEqual({
      status: 'host_unavailable',
      commandId,
      lastHostSeenAt: null,
    });
    expect(bridge.hostStatus().state).toBe('never_seen');
  });

  it('should time out normally while the host is polling, then report it stale', async () => {
    const clock = createManualClock();
    const { bridge } = await createBridge({ clock: clock.read, hostStaleAfterMs: 1000 });
    await bridge.drain(10);
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });

    clock.now += 500;
    expect(bridge.hostStatus().state).toBe('connected');
    expect(await bridge.await(commandId, 10)).toEqual({
      status: 'timed_out',
      commandId,
      timeoutMs: 10,
    });

    clock.now += 1000;
    expect(bridge.hostStatus().state).toBe('stale');
    expect(await bridge.await(commandId, 10)).toEqual({
      status: 'host_unavailable',
      commandId,
      lastHostSeenAt: '2024-01-01T00:00:00.000Z',
    });
  });

  it('should clamp await timeouts to the configured maximum', async () => {
    const { bridge } = await createBridge({ maxAwaitTimeoutMs: 20 });
    await bridge.drain(1);
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });

    expect(await bridge.await(commandId, 60_000)).toEqual({
      status: 'timed_out',
      commandId,
      timeoutMs: 20,
    });
  });

  it('should throw for an unknown command id', async () => {
    const { bridge } = await createBridge();

    await expect(bridge.await('missing', 10)).rejects.toBeInstanceOf(CommandNotFoundError);
  });
});

describe('CommandBridge.reset', () => {
  it('should clear commands, results and entities and release waiters', async () => {
    const { bridge, registry } = await createBridge();
    const { executor } = createHost(bridge);
    bridge.submit('create_point', { x: 0, y: 0 });
    await executor.runOnce();
    const pending = bridge.submit('create_circle', { radius: 1 }).commandId;
    const previousSession = bridge.sessionId;

    const waiting = bridge.await(pending, 5000);
    const summary = await bridge.reset();

    expect(summary).toEqual({
      sessionId: bridge.sessionId,
      droppedCommands: 2,
      droppedResults: 1,
      clearedEntities: 1,
    });
    expect(bridge.sessionId).not.toBe(previousSession);
    expect(await waiting).toEqual({ status: 'session_reset', commandId: pending });
    expect(registry.size).toBe(0);
    expect(bridge.status().commands).toEqual({ pending: 0, executing: 0, completed: 0, failed: 0 });
    expect(bridge.resolveReference('it').status).toBe('not_found');
  });

  it('should refuse results for commands dropped by a reset', async () => {
    const onProtocolViolation = vi.fn();
    const { bridge } = await createBridge({ onProtocolViolation });
    const { commandId } = bridge.submit('create_point', { x: 0, y: 0 });
    await bridge.drain(1);

    await bridge.reset();

    await expect(
      bridge.complete(commandId, { success: true, data: { entity_id: 'point-1', entity_type: 'point' } })
    ).rejects.toBeInstanceOf(CommandNotFoundError);
    expect(onProtocolViolation).not.toHaveBeenCalled();
  });
});

describe('CommandBridge retention and status', () => {
  it('should sweep results retrieved longer ago than the retention window', async () => {
    const clock = createManualClock();
    const { bridge } = await createBridge({ clock: clock.read, resultRetentionMs: 1000 });
    const { executor } = createHost(bridge);
    const read = bridge.submit('create_point', { x: 0, y: 0 }).commandId;
    const unread = bridge.submit('create_point', { x: 1, y: 0 }).commandId;
    await executor.runOnce();

    bridge.poll(read);
    expect(bridge.sweep()).toBe(0);

    clock.now += 1500;
    expect(bridge.sweep()).toBe(1);
    expect(() => bridge.poll(read)).toThrow(CommandNotFoundError);
    expect(bridge.poll(unread).result?.success).toBe(true);
  });

  it('should report counts, registry stats and recent completions', async () => {
    const { bridge } = await createBridge({ historyLimit: 2 });
    const { executor } = createHost(bridge);
    bridge.submit('create_point', { x: 0, y: 0 });
    bridge.submit('create_circle', { radius: -1 });
    const last = bridge.submit('get_document_info').commandId;
    bridge.submit('create_point', { x: 2, y: 2 });
    await executor.runOnce();

    const status = bridge.status();

    expect(status.commands).toEqual({ pending: 0, executing: 0, completed: 3, failed: 1 });
    expect(status.registry.entityCount).toBe(2);
    expect(status.recentCommands.map((entry) => entry.type)).toEqual(['create_point', 'get_document_info']);
    expect(status.recentCommands[1].commandId).toBe(last);
    expect(status.host.state).toBe('connected');
  });

  it('should list advertised commands once, sorted', async () => {
    const { bridge } = await createBridge();

    bridge.advertiseCommands(['modify', 'create_point', 'modify']);

    expect(bridge.hostStatus().availableCommands).toEqual(['create_point', 'modify']);
  });
});
