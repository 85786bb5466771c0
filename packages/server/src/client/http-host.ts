// Host side of the HTTP polling transport
//
// HttpCommandSource and HttpResultSink let a HostExecutor run against a
// remote bridge. Result reports are retried on network failures and
// gateway errors only; a retried report that comes back as a duplicate
// was delivered by an earlier attempt.

import {
  fromWireCommand,
  isWireCommand,
  toWireResult,
  type Command,
  type ExecutionOutcome,
} from '@cmdbridge/protocol';
import {
  BridgeError,
  CommandNotFoundError,
  DuplicateResultError,
  describeError,
  silentLogger,
  type BridgeLogger,
  type CommandSource,
  type ResultSink,
} from '@cmdbridge/runtime';
import { AVAILABLE_COMMANDS_HEADER } from '../http/schemas.js';

export const DEFAULT_RESULT_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 250;

const RETRYABLE_STATUSES = new Set([502, 503, 504]);

export class HttpTransportError extends BridgeError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, options);
    this.name = 'HttpTransportError';
    this.status = status;
  }
}

export type HttpHostOptions = {
  /** Bridge base URL, e.g. http://127.0.0.1:8001 */
  baseUrl: string;

  /** '' for the root paths, '/grasshopper' for the legacy ones */
  pathPrefix?: string;

  fetch?: typeof fetch;
  logger?: BridgeLogger;
};

function endpoint(options: HttpHostOptions, path: string): string {
  return `${options.baseUrl.replace(/\/+$/, '')}${options.pathPrefix ?? ''}${path}`;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readErrorCode(response: Response): Promise<string | null> {
  const body: unknown = await response.json().catch(() => null);
  if (typeof body !== 'object' || body === null || !('error' in body)) return null;
  const error = body.error;
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  return typeof error.code === 'string' ? error.code : null;
}

/**
 * Polls `GET /pending_commands`.
 */
export class HttpCommandSource implements CommandSource {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly options: HttpHostOptions & {
      /** Advertised to the bridge on every poll */
      availableCommands?: () => string[];
    }
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async drain(maxCount: number): Promise<Command[]> {
    const headers: Record<string, string> = { accept: 'application/json' };
    const available = this.options.availableCommands?.();
    if (available && available.length > 0) {
      headers[AVAILABLE_COMMANDS_HEADER] = available.join(',');
    }

    const url = `${endpoint(this.options, '/pending_commands')}?limit=${maxCount}`;
    const response = await this.fetchImpl(url, { method: 'GET', headers }).catch(
      (error: unknown) => {
        throw new HttpTransportError(`Poll failed: ${messageOf(error)}`, null, {
          cause: error,
        });
      }
    );

    if (!response.ok) {
      throw new HttpTransportError(`Poll failed with status ${response.status}`, response.status);
    }

    const body: unknown = await response.json();
    if (!Array.isArray(body) || !body.every(isWireCommand)) {
      throw new HttpTransportError('Malformed poll response', response.status);
    }
    return body.map(fromWireCommand);
  }
}

/**
 * Reports outcomes to `POST /command_result`.
 */
export class HttpResultSink implements ResultSink {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: BridgeLogger;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly options: HttpHostOptions & {
      retries?: number;
      retryDelayMs?: number;
      clock?: () => Date;
    }
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;
    this.retries = options.retries ?? DEFAULT_RESULT_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  /**
   * A retry after a lost response resends the same report, which the
   * bridge acknowledges like the first.
   *
   * @throws DuplicateResultError if the bridge holds a different result
   * @throws CommandNotFoundError if the bridge no longer knows the command
   * @throws HttpTransportError for other failures
   */
  async complete(commandId: string, outcome: ExecutionOutcome): Promise<void> {
    const timestamp = (this.options.clock?.() ?? new Date()).toISOString();
    const body = JSON.stringify(toWireResult(commandId, outcome, timestamp));
    const url = endpoint(this.options, '/command_result');

    for (let attempt = 0; ; attempt++) {
      const retry = attempt < this.retries;
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          body,
        });
      } catch (error) {
        if (!retry) {
          throw new HttpTransportError(
            `Result report failed: ${messageOf(error)}`,
            null,
            { cause: error }
          );
        }
        await this.backoff(commandId, attempt, describeError(error));
        continue;
      }

      if (response.ok) {
        return;
      }

      if (RETRYABLE_STATUSES.has(response.status) && retry) {
        await this.backoff(commandId, attempt, { status: response.status });
        continue;
      }

      const code = await readErrorCode(response);
      if (code === 'DUPLICATE_RESULT') {
        throw new DuplicateResultError(commandId);
      }
      if (code === 'COMMAND_NOT_FOUND') {
        throw new CommandNotFoundError(commandId);
      }
      throw new HttpTransportError(
        `Result report failed with status ${response.status}${code ? ` (${code})` : ''}`,
        response.status
      );
    }
  }

  private async backoff(commandId: string, attempt: number, reason: Record<string, unknown>) {
    const delay = this.retryDelayMs * 2 ** attempt;
    this.logger.warn('Retrying result report', { commandId, attempt: attempt + 1, delay, ...reason });
    await new Promise((resolve) => setTimeout(resolve, delay));
  }
}
