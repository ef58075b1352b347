// @fanout/core - transport-agnostic relay core.
//
// Sessions, the session registry and the broadcast dispatcher. Transports
// plug in through FrameTransport.

// Errors
export { ConnectionError, type ConnectionErrorKind } from "./errors.ts";

// Transport abstraction
export { type FrameTransport } from "./transport.ts";

// Sessions
export {
  ClientSession,
  type SessionState,
  type SessionOptions,
  type MessageHandler,
} from "./session.ts";

// Registry and dispatch
export { SessionRegistry, type RegistryOptions } from "./registry.ts";
export { BroadcastDispatcher, type BroadcastReport } from "./dispatcher.ts";
export { Relay, type RelayOptions } from "./relay.ts";

// Hooks and logging
export { type SessionHooks, composeHooks } from "./hooks.ts";
export { loggingHooks, createLogger, type LoggingOptions, type LogSink } from "./logging.ts";

// Client-side inbox
export { Inbox, type InboxContents } from "./inbox.ts";
