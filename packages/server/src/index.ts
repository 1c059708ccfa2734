/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  createCableServer,
  type CableServer,
  type CableServerOptions,
  type ListenOptions,
} from './server.js';

export { createApp, type AppConfig } from './app.js';

export * from './application/index.js';
export * from './domain/index.js';
export * from './protocol/index.js';

export { InMemorySubscriptionRegistry } from './infrastructure/persistence/in-memory-registry.js';
export * from './infrastructure/websocket/index.js';
export { isLoopbackAddress, createLoopbackGuard } from './infrastructure/http/ingress-guard.js';
export { createLogger, type LoggerConfig, type Logger } from './infrastructure/logging/pino-logger.js';

export { EnvSchema, loadEnv, getEnv, resolveBroadcastUrl, type Env } from './config/env.js';
export {
  CABLE_CONFIG,
  CLOSE_CODES,
  CONNECTION_TIMING,
  WEBSOCKET_PROTOCOL,
  getProtocolVersion,
} from './config/constants.js';

export {
  BroadcastClient,
  type BroadcastClientConfig,
  type BroadcastClientDeps,
} from './producer/broadcast-client.js';
export {
  TurboStreamBroadcaster,
  turboStream,
  streamMarker,
  escapeAttribute,
  type TurboStreamAction,
} from './producer/turbo-stream.js';
