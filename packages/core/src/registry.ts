// Registry of active sessions, keyed by client id.
//
// Every method runs to completion without yielding, so on Node's single thread
// each one is its own critical section: register/remove can never interleave
// with a snapshot being built, and no lock is held across a network write
// because writes only start after lookupAllExcept has returned its array.

import { type ClientId, MAX_CLIENT_ID, NO_CLIENT } from "@fanout/wire";
import { ConnectionError } from "./errors.ts";
import type { SessionHooks } from "./hooks.ts";
import { ClientSession, type MessageHandler } from "./session.ts";
import type { FrameTransport } from "./transport.ts";

export interface RegistryOptions {
  /** Handler every registered session hands its decoded messages to. */
  onMessage: MessageHandler;
  hooks?: SessionHooks;
}

/**
 * Registry of active sessions.
 *
 * Ids are assigned from a counter that starts at 1 and wraps from 255 back to
 * 1. An id is reused only after wraparound and only if no active session holds
 * it. 0 is never assigned.
 */
export class SessionRegistry {
  private sessions = new Map<ClientId, ClientSession>();
  private nextId: ClientId = 1;

  constructor(private readonly options: RegistryOptions) {}

  /**
   * Create and insert a new active session for a transport.
   *
   * @throws ConnectionError with kind `registry-full` when all ids are taken.
   */
  register(io: FrameTransport): ClientSession {
    const id = this.allocateId();
    const session = new ClientSession(id, io, {
      onMessage: this.options.onMessage,
      onClosing: (closing) => {
        this.remove(closing.id);
      },
      hooks: this.options.hooks,
    });
    this.sessions.set(id, session);
    this.options.hooks?.onOpen?.(session);
    return session;
  }

  /**
   * Snapshot of every active session except `excludeId`.
   *
   * Pass `NO_CLIENT` (0) to include everyone.
   */
  lookupAllExcept(excludeId: ClientId = NO_CLIENT): readonly ClientSession[] {
    const snapshot: ClientSession[] = [];
    for (const [id, session] of this.sessions) {
      if (id !== excludeId && session.isActive()) {
        snapshot.push(session);
      }
    }
    return snapshot;
  }

  /** Remove a session. Returns false if it was already gone. */
  remove(id: ClientId): boolean {
    return this.sessions.delete(id);
  }

  get(id: ClientId): ClientSession | undefined {
    return this.sessions.get(id);
  }

  has(id: ClientId): boolean {
    return this.sessions.has(id);
  }

  /** Ids of the registered sessions, ascending. */
  ids(): ClientId[] {
    return [...this.sessions.keys()].sort((a, b) => a - b);
  }

  get size(): number {
    return this.sessions.size;
  }

  private allocateId(): ClientId {
    for (let attempt = 0; attempt < MAX_CLIENT_ID; attempt++) {
      const candidate = this.nextId;
      this.nextId = candidate === MAX_CLIENT_ID ? 1 : candidate + 1;
      if (!this.sessions.has(candidate)) {
        return candidate;
      }
    }
    throw ConnectionError.registryFull();
  }
}
