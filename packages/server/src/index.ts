// @cmdbridge/server
// HTTP host transport, tRPC producer API, configuration and logging.

export {
  loadConfig,
  envSchema,
  ConfigError,
  type BridgeConfig,
  type LogLevel,
  type RegistryBackend,
} from './config/config.js';
export {
  createLogger,
  toBridgeLogger,
  resolveTransportTargets,
  type LoggerOptions,
} from './logging/logger.js';
export { InvalidResultError, mappingFor, errorDetails } from './errors.js';
export {
  createBridgeApp,
  HOST_ROUTE_PREFIXES,
  type BridgeAppDependencies,
} from './http/app.js';
export {
  AVAILABLE_COMMANDS_HEADER,
  toStatusResponse,
  type ErrorResponse,
  type HealthResponse,
  type StatusResponse,
} from './http/schemas.js';
export { appRouter, type AppRouter } from './trpc/routers/index.js';
export {
  createBridgeServer,
  createEntityLogStore,
  type BridgeServer,
  type BridgeServerOptions,
} from './server.js';
export {
  createBridgeClient,
  createBridgeTRPCClient,
  type BridgeClient,
  type BridgeClientOptions,
} from './client/bridge-client.js';
export {
  HttpCommandSource,
  HttpResultSink,
  HttpTransportError,
  type HttpHostOptions,
} from './client/http-host.js';
