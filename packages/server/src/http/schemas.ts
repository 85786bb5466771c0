// HTTP request schemas and response shapes for the host polling endpoints
//
// The host side speaks snake_case JSON.

import { z } from 'zod';
import type { BridgeStatus, HostStatus } from '@cmdbridge/runtime';

export const pendingCommandsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

/**
 * `X-Available-Commands: create_point, modify, ...`
 */
export const AVAILABLE_COMMANDS_HEADER = 'x-available-commands';

export function parseAvailableCommandsHeader(value: string | string[] | undefined): string[] | null {
  if (value === undefined) return null;
  const joined = Array.isArray(value) ? value.join(',') : value;
  return joined
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export type ErrorResponse = {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
};

export type HealthResponse = {
  status: 'healthy';
  session_id: string;
  host: HostStatus['state'];
  server_time: string;
};

export type StatusResponse = {
  session_id: string;
  started_at: string;
  server_time: string;
  pending_commands: number;
  executing_commands: number;
  completed_commands: number;
  failed_commands: number;
  waiting_producers: number;
  command_history: Array<{
    command_id: string;
    type: string;
    success: boolean;
    completed_at: string;
  }>;
  registry: {
    entity_count: number;
    counts_by_type: Record<string, number>;
    last_sequence: number;
  };
  host: {
    state: HostStatus['state'];
    last_seen_at: string | null;
    available_commands: string[];
  };
};

export function toStatusResponse(status: BridgeStatus): StatusResponse {
  return {
    session_id: status.sessionId,
    started_at: status.startedAt,
    server_time: status.serverTime,
    pending_commands: status.commands.pending,
    executing_commands: status.commands.executing,
    completed_commands: status.commands.completed,
    failed_commands: status.commands.failed,
    waiting_producers: status.waiting,
    command_history: status.recentCommands.map((entry) => ({
      command_id: entry.commandId,
      type: entry.type,
      success: entry.success,
      completed_at: entry.completedAt,
    })),
    registry: {
      entity_count: status.registry.entityCount,
      counts_by_type: status.registry.countsByType,
      last_sequence: status.registry.lastSequence,
    },
    host: {
      state: status.host.state,
      last_seen_at: status.host.lastSeenAt,
      available_commands: status.host.availableCommands,
    },
  };
}
