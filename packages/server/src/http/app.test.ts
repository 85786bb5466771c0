// Tests for the HTTP transport

import { afterEach, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createInMemoryEntityLogStore } from '@cmdbridge/repositories';
import {
  CommandBridge,
  DuplicateResultError,
  EntityRegistry,
  createCapturingLogger,
  type ProtocolViolation,
} from '@cmdbridge/runtime';
import { createBridgeApp } from './app.js';
import type { ErrorResponse, HealthResponse, StatusResponse } from './schemas.js';

// --- Test Fixtures ---

const apps: FastifyInstance[] = [];

afterEach(async () => {
  await Promise.all(apps.splice(0).map((app) => app.close()));
});

async function createTestApp(drainBatchSize?: number) {
  const registry = await EntityRegistry.open({ store: createInMemoryEntityLogStore() });
  const violations: ProtocolViolation[] = [];
  const logger = createCapturingLogger();
  let counter = 0;
  const bridge = new CommandBridge({
    registry,
    logger,
    idFactory: () => `cmd-${++counter}`,
    onProtocolViolation: (error) => violations.push(error),
  });
  const app = createBridgeApp({ bridge, logger, drainBatchSize });
  apps.push(app);
  return { app, bridge, violations, logger };
}

async function postResult(app: FastifyInstance, payload: unknown, prefix = '') {
  return app.inject({
    method: 'POST',
    url: `${prefix}/command_result`,
    payload: JSON.stringify(payload),
    headers: { 'content-type': 'application/json' },
  });
}

// --- Tests ---

describe('GET /health', () => {
  it('reports the session and a host that never polled', async () => {
    const { app, bridge } = await createTestApp();

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body: HealthResponse = response.json();
    expect(body.status).toBe('healthy');
    expect(body.session_id).toBe(bridge.sessionId);
    expect(body.host).toBe('never_seen');
  });
});

describe('GET /pending_commands', () => {
  it('drains pending commands in submission order in wire form', async () => {
    const { app, bridge } = await createTestApp();
    const first = bridge.submit('create_point', { x: 1, y: 2 });
    bridge.submit('create_circle', { radius: 3 });

    const response = await app.inject({ method: 'GET', url: '/pending_commands' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual([
      { id: 'cmd-1', type: 'create_point', parameters: { x: 1, y: 2 }, timestamp: first.createdAt },
      { id: 'cmd-2', type: 'create_circle', parameters: { radius: 3 }, timestamp: expect.any(String) },
    ]);
    expect(bridge.poll('cmd-1').command.status).toBe('executing');

    const again = await app.inject({ method: 'GET', url: '/pending_commands' });
    expect(again.json()).toEqual([]);
  });

  it('serves the same endpoint under /grasshopper and records advertised commands', async () => {
    const { app, bridge } = await createTestApp();
    bridge.submit('modify', { entity_id: 'point-1' });

    const response = await app.inject({
      method: 'GET',
      url: '/grasshopper/pending_commands',
      headers: { 'x-available-commands': 'modify, create_point,modify' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toHaveLength(1);
    expect(bridge.hostStatus().availableCommands).toEqual(['create_point', 'modify']);
    expect(bridge.hostStatus().state).toBe('connected');
  });

  it('never returns more than the configured batch size', async () => {
    const { app, bridge } = await createTestApp(2);
    bridge.submit('wait', {});
    bridge.submit('wait', {});
    bridge.submit('wait', {});

    const large = await app.inject({ method: 'GET', url: '/pending_commands?limit=10' });
    expect(large.json()).toHaveLength(2);

    const small = await app.inject({ method: 'GET', url: '/pending_commands?limit=1' });
    expect(small.json()).toHaveLength(1);
  });

  it('rejects a non-numeric limit', async () => {
    const { app } = await createTestApp();

    const response = await app.inject({ method: 'GET', url: '/pending_commands?limit=abc' });

    expect(response.statusCode).toBe(400);
    const body: ErrorResponse = response.json();
    expect(body.error.code).toBe('INVALID_REQUEST');
  });
});

describe('POST /command_result', () => {
  it('publishes the result and records reported entities', async () => {
    const { app, bridge } = await createTestApp();
    bridge.submit('create_point', { x: 1, y: 2 });
    await app.inject({ method: 'GET', url: '/pending_commands' });

    const response = await postResult(app, {
      command_id: 'cmd-1',
      success: true,
      data: { entity_id: 'point-1', entity_type: 'point' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'received', command_id: 'cmd-1' });

    const outcome = await bridge.await('cmd-1', 100);
    expect(outcome.status).toBe('completed');
    expect(bridge.lookup('point-1')).toMatchObject({
      entityType: 'point',
      owningCommandId: 'cmd-1',
    });
  });

  it('accepts `result` in place of `data` under /grasshopper', async () => {
    const { app, bridge } = await createTestApp();
    bridge.submit('get_document_info', {});
    await app.inject({ method: 'GET', url: '/grasshopper/pending_commands' });

    const response = await postResult(
      app,
      { command_id: 'cmd-1', success: true, result: { object_count: 0 } },
      '/grasshopper'
    );

    expect(response.statusCode).toBe(200);
    expect(bridge.poll('cmd-1').result?.data).toEqual({ object_count: 0 });
  });

  it('turns a plain string error into an UnexpectedError', async () => {
    const { app, bridge } = await createTestApp();
    bridge.submit('wait', {});
    await app.inject({ method: 'GET', url: '/pending_commands' });

    await postResult(app, { command_id: 'cmd-1', success: false, error: 'boom' });

    const { result } = bridge.poll('cmd-1');
    expect(result?.success).toBe(false);
    expect(result?.error).toBe('boom');
    expect(result?.errorDetails).toEqual({ kind: 'UnexpectedError', message: 'boom' });
    expect(bridge.poll('cmd-1').command.status).toBe('failed');
  });

  it('rejects a malformed report with the validation issues', async () => {
    const { app } = await createTestApp();

    const response = await postResult(app, { success: 'yes' });

    expect(response.statusCode).toBe(400);
    const body: ErrorResponse = response.json();
    expect(body.error.code).toBe('INVALID_RESULT');
    expect(body.error.message).toBe(
      'Invalid command result: command_id is required; success must be a boolean'
    );
    expect(body.error.details).toEqual({
      issues: [
        { path: 'command_id', message: 'command_id is required' },
        { path: 'success', message: 'success must be a boolean' },
      ],
    });
  });

  it('rejects a body that is not JSON', async () => {
    const { app } = await createTestApp();

    const response = await app.inject({
      method: 'POST',
      url: '/command_result',
      payload: '{"command_id":',
      headers: { 'content-type': 'application/json' },
    });

    expect(response.statusCode).toBe(400);
  });

  it('answers 404 for an unknown command', async () => {
    const { app } = await createTestApp();

    const response = await postResult(app, { command_id: 'nope', success: true });

    expect(response.statusCode).toBe(404);
    const body: ErrorResponse = response.json();
    expect(body.error).toEqual({ code: 'COMMAND_NOT_FOUND', message: 'Command not found: nope' });
  });

  it('answers 409 for a command that was never drained', async () => {
    const { app, bridge, violations } = await createTestApp();
    bridge.submit('wait', {});

    const response = await postResult(app, { command_id: 'cmd-1', success: true });

    expect(response.statusCode).toBe(409);
    const body: ErrorResponse = response.json();
    expect(body.error.code).toBe('INVALID_STATUS_TRANSITION');
    expect(violations).toEqual([]);
  });

  it('acknowledges a redelivered identical result', async () => {
    const { app, bridge, violations } = await createTestApp();
    bridge.submit('wait', {});
    await app.inject({ method: 'GET', url: '/pending_commands' });
    await postResult(app, { command_id: 'cmd-1', success: true, data: { waited: 1 } });

    const response = await postResult(app, {
      command_id: 'cmd-1',
      success: true,
      data: { waited: 1 },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'received', command_id: 'cmd-1' });
    expect(violations).toEqual([]);
  });

  it('answers 409 for a different duplicate result and reports the violation', async () => {
    const { app, bridge, violations, logger } = await createTestApp();
    bridge.submit('wait', {});
    await app.inject({ method: 'GET', url: '/pending_commands' });
    await postResult(app, { command_id: 'cmd-1', success: true });

    const response = await postResult(app, { command_id: 'cmd-1', success: false, error: 'boom' });

    expect(response.statusCode).toBe(409);
    const body: ErrorResponse = response.json();
    expect(body.error).toEqual({
      code: 'DUPLICATE_RESULT',
      message: 'A result was already published for command cmd-1',
    });
    expect(violations).toHaveLength(1);
    expect(violations[0]).toBeInstanceOf(DuplicateResultError);
    expect(logger.entries.some((entry) => entry.message === 'Request rejected')).toBe(true);
  });
});

describe('GET /status', () => {
  it('summarizes queue, registry and host in snake_case', async () => {
    const { app, bridge } = await createTestApp();
    bridge.submit('create_point', { x: 0, y: 0 });
    bridge.submit('wait', {});
    await app.inject({ method: 'GET', url: '/pending_commands?limit=1' });
    await postResult(app, {
      command_id: 'cmd-1',
      success: true,
      data: { entity_id: 'point-1', entity_type: 'point' },
    });

    const response = await app.inject({ method: 'GET', url: '/status' });

    expect(response.statusCode).toBe(200);
    const body: StatusResponse = response.json();
    expect(body.session_id).toBe(bridge.sessionId);
    expect(body.pending_commands).toBe(1);
    expect(body.executing_commands).toBe(0);
    expect(body.completed_commands).toBe(1);
    expect(body.failed_commands).toBe(0);
    expect(body.waiting_producers).toBe(0);
    expect(body.command_history).toEqual([
      { command_id: 'cmd-1', type: 'create_point', success: true, completed_at: expect.any(String) },
    ]);
    expect(body.registry.entity_count).toBe(1);
    expect(body.registry.counts_by_type).toEqual({ point: 1 });
    expect(body.host.state).toBe('connected');
  });
});
