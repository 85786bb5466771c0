// @cmdbridge/runtime
// Command queue, result store, dispatch, host execution and entity registry

// Error types
export {
  BridgeError,
  InvalidCommandError,
  NotRegisteredError,
  DuplicateResultError,
  QueueCorruptionError,
  CommandNotFoundError,
  InvalidStatusTransitionError,
  OwnerThreadTimeoutError,
  ArgumentError,
  OperationError,
  EntityNotFoundError,
  ReferenceNotFoundError,
  ReferenceAmbiguousError,
  RegistryStoreError,
  isProtocolViolation,
  type ProtocolViolation,
} from './errors.js';

// Logging
export {
  silentLogger,
  createCapturingLogger,
  describeError,
  type BridgeLogger,
  type BridgeLogLevel,
  type LogEntry,
  type LogMethod,
} from './logger.js';

// Concurrency
export { SerialLane } from './concurrency/serial-lane.js';

// Commands
export { createCommand, transitionCommand, type EnvelopeOptions } from './commands/envelope.js';
export { CommandQueue, type CommandQueueOptions } from './commands/queue.js';

// Results
export { ResultStore, type ResultStoreOptions } from './results/result-store.js';

// Dispatch
export { DispatchTable, type DispatchOutcome } from './dispatch/dispatch-table.js';
export type { CommandHandler, HandlerContext } from './dispatch/types.js';
export {
  requireString,
  requireNumber,
  requireArray,
  optionalNumber,
  optionalString,
} from './dispatch/parameters.js';

// Host execution
export {
  OwnerThread,
  DEFAULT_OWNER_THREAD_TIMEOUT_MS,
  type OwnerThreadOptions,
  type InvokeOptions,
} from './host/owner-thread.js';
export { classifyError, truncateStack, notRegisteredDetails, MAX_STACK_FRAMES } from './host/classify.js';
export {
  HostExecutor,
  DEFAULT_BATCH_SIZE,
  DEFAULT_POLL_INTERVAL_MS,
  type HostExecutorOptions,
} from './host/host-executor.js';
export type { CommandSource, ResultSink, ExecutionStage } from './host/types.js';
export {
  SimulatedDocument,
  createSimulatedHandlers,
  type SimulatedObject,
} from './host/simulated-host.js';

// Entity registry
export {
  EntityRegistry,
  DEFAULT_COMPACT_EVERY,
  type EntityRegistryOptions,
  type EntityIndexReader,
} from './registry/entity-registry.js';
export { typeMatches, typeMatchesAny, normalizeTypeName } from './registry/type-match.js';

// Reference resolution
export {
  ReferenceResolver,
  type ReferenceResolverOptions,
  type TypeKeywordMatch,
} from './resolver/reference-resolver.js';
export { defaultVocabulary, parseVocabulary, type ReferenceVocabulary } from './resolver/vocabulary.js';

// Bridge session
export {
  CommandBridge,
  DEFAULT_AWAIT_TIMEOUT_MS,
  DEFAULT_MAX_AWAIT_TIMEOUT_MS,
  DEFAULT_RESULT_RETENTION_MS,
  DEFAULT_HOST_STALE_AFTER_MS,
  type CommandBridgeOptions,
  type SubmitReceipt,
  type HostStatus,
  type HostConnectionState,
  type BridgeStatus,
  type ResetSummary,
} from './bridge/command-bridge.js';
export { extractEntityChanges, type EntityChanges } from './bridge/extract-entities.js';
