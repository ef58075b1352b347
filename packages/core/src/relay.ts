// Relay: registry + dispatcher + supervision of session tasks.
//
// Transport-agnostic. @fanout/tcp feeds it accepted sockets; tests feed it
// in-memory transports.

import { NO_CLIENT } from "@fanout/wire";
import { BroadcastDispatcher } from "./dispatcher.ts";
import type { ConnectionError } from "./errors.ts";
import type { SessionHooks } from "./hooks.ts";
import { SessionRegistry } from "./registry.ts";
import type { ClientSession } from "./session.ts";
import type { FrameTransport } from "./transport.ts";

export interface RelayOptions {
  hooks?: SessionHooks;
}

export class Relay {
  readonly registry: SessionRegistry;
  readonly dispatcher: BroadcastDispatcher;
  private tasks = new Set<Promise<ConnectionError>>();

  constructor(options: RelayOptions = {}) {
    this.registry = new SessionRegistry({
      onMessage: (message, session) => this.dispatcher.broadcast(message, session.id),
      hooks: options.hooks,
    });
    this.dispatcher = new BroadcastDispatcher(this.registry, options.hooks);
  }

  /**
   * Register a transport and start its session's read loop.
   *
   * @throws ConnectionError with kind `registry-full`; the transport is left
   * open for the caller to dispose of.
   */
  admit(io: FrameTransport): ClientSession {
    const session = this.registry.register(io);
    const task = session.run();
    this.tasks.add(task);
    void task.then(() => this.tasks.delete(task));
    return session;
  }

  /** Close every active session. Their tasks finish shortly after. */
  closeAll(): void {
    for (const session of this.registry.lookupAllExcept(NO_CLIENT)) {
      session.close();
    }
  }

  /** Number of session tasks that have not finished yet. */
  get runningTasks(): number {
    return this.tasks.size;
  }

  /** Resolves once every session task started so far (and any started meanwhile) has finished. */
  async settled(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }
}
