// Logging for relay sessions.
//
// Backed by the `debug` package: nothing is printed unless the namespace is
// enabled, e.g. `DEBUG=fanout:*` or `DEBUG=fanout:session`.

import createDebug from "debug";
import type { Message } from "@fanout/wire";
import type { SessionHooks } from "./hooks.ts";

/** Create a debug logger under the `fanout:` prefix. */
export function createLogger(scope: string): createDebug.Debugger {
  return createDebug(`fanout:${scope}`);
}

/** Receives one log line and its structured data. */
export type LogSink = (message: string, data: Record<string, unknown>) => void;

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "fanout:session".
   */
  namespace?: string;

  /**
   * Include a hex preview of message bodies. Defaults to false: bodies are
   * opaque to the relay and only their size is logged.
   */
  logPayloads?: boolean;

  /**
   * Maximum number of body bytes in the preview. Defaults to 32.
   */
  previewBytes?: number;

  /**
   * Custom sink. Defaults to a `debug` logger for `namespace`.
   */
  logger?: LogSink;
}

/**
 * Session hooks that log every lifecycle event with structured data:
 * - open: { type: "open", id }
 * - message: { type: "message", id, kind, bytes, preview? }
 * - broadcast: { type: "broadcast", sender, kind, frameLength, delivered, failed }
 * - close: { type: "close", id, reason, error }
 *
 * @example
 * ```typescript
 * const relay = new Relay({ hooks: loggingHooks({ logPayloads: true }) });
 * ```
 */
export function loggingHooks(options: LoggingOptions = {}): SessionHooks {
  const namespace = options.namespace ?? "fanout:session";
  const logPayloads = options.logPayloads ?? false;
  const previewBytes = options.previewBytes ?? 32;
  const log = options.logger ?? debugSink(namespace);

  return {
    onOpen(session) {
      log(`+ client ${session.id}`, { type: "open", id: session.id });
    },

    onMessage(session, message) {
      const logObj: Record<string, unknown> = {
        type: "message",
        id: session.id,
        kind: message.kind,
        bytes: message.payload.length,
      };
      if (logPayloads) {
        logObj.preview = hexPreview(message, previewBytes);
      }
      log(`→ ${message.kind} from client ${session.id}`, logObj);
    },

    onBroadcast(message, report) {
      log(
        `⇉ ${message.kind} from client ${message.senderId}: ${report.delivered.length} delivered, ${report.failed.length} failed`,
        {
          type: "broadcast",
          sender: message.senderId,
          kind: message.kind,
          frameLength: report.frameLength,
          delivered: report.delivered,
          failed: report.failed,
        },
      );
    },

    onClose(session, reason) {
      log(`- client ${session.id} (${reason.kind})`, {
        type: "close",
        id: session.id,
        reason: reason.kind,
        error: reason.message,
      });
    },
  };
}

function debugSink(namespace: string): LogSink {
  const debug = createDebug(namespace);
  return (message, data) => {
    debug("%s %O", message, data);
  };
}

function hexPreview(message: Message, maxBytes: number): string {
  const shown = message.payload.subarray(0, maxBytes);
  const hex = Array.from(shown, (b) => b.toString(16).padStart(2, "0")).join(" ");
  return message.payload.length > maxBytes ? `${hex} …` : hex;
}
