// Observation points on the session lifecycle.

import type { Message } from "@fanout/wire";
import type { ConnectionError } from "./errors.ts";
import type { BroadcastReport } from "./dispatcher.ts";
import type { ClientSession } from "./session.ts";

/**
 * Hooks invoked by the registry, sessions and dispatcher.
 *
 * Hooks observe; they cannot veto or alter a message.
 */
export interface SessionHooks {
  /** A session was registered and is active. */
  onOpen?(session: ClientSession): void;

  /** A session decoded a message (sender id already attributed). */
  onMessage?(session: ClientSession, message: Message): void;

  /** A broadcast finished delivering to every peer in its snapshot. */
  onBroadcast?(message: Message, report: BroadcastReport): void;

  /** A session reached `closed`. */
  onClose?(session: ClientSession, reason: ConnectionError): void;
}

/**
 * Combine several hook sets; each event is passed to every set in order.
 */
export function composeHooks(...sets: SessionHooks[]): SessionHooks {
  return {
    onOpen(session) {
      for (const hooks of sets) hooks.onOpen?.(session);
    },
    onMessage(session, message) {
      for (const hooks of sets) hooks.onMessage?.(session, message);
    },
    onBroadcast(message, report) {
      for (const hooks of sets) hooks.onBroadcast?.(message, report);
    },
    onClose(session, reason) {
      for (const hooks of sets) hooks.onClose?.(session, reason);
    },
  };
}
