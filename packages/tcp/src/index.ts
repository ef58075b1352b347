// @fanout/tcp - TCP transport for the fanout relay (Node.js only)
//
// Provides TCP-specific I/O: socket framing, the relay server and a client.

export {
  LengthPrefixedFramed,
  DEFAULT_HIGH_WATER_MARK,
  DEFAULT_MAX_FRAME_LENGTH,
  type FramingOptions,
} from "./framing.ts";
export { RelayServer, type RelayServerOptions } from "./server.ts";
export { RelayClient, type ConnectOptions, type MessageSink } from "./client.ts";
export {
  DEFAULT_PORT,
  ConfigError,
  defaultServerConfig,
  loadServerConfig,
  loadClientConfig,
  type ServerConfig,
  type ClientConfig,
} from "./config.ts";

// Re-export core types for convenience
export {
  ConnectionError,
  type ConnectionErrorKind,
  type SessionHooks,
  type BroadcastReport,
  loggingHooks,
  Inbox,
} from "@fanout/core";
