// Client session: one accepted connection and its read loop.
//
// State machine:
//   active  -> closing   on EOF, reset, truncated frame, malformed frame,
//                        a failed write reported by the dispatcher, or close()
//   closing -> closed    registry entry removed once, transport closed once
//
// There is no way back to active. A client that reconnects gets a new session.

import { type ClientId, type Message, tryDecodeMessage, withSender } from "@fanout/wire";
import { ConnectionError } from "./errors.ts";
import type { SessionHooks } from "./hooks.ts";
import type { FrameTransport } from "./transport.ts";

export type SessionState = "active" | "closing" | "closed";

/**
 * Receives every message a session decodes, in decode order.
 *
 * The session awaits the returned promise before reading its next frame, which
 * keeps delivery FIFO per sender.
 */
export type MessageHandler = (message: Message, session: ClientSession) => Promise<unknown>;

export interface SessionOptions {
  onMessage: MessageHandler;
  /** Called once, synchronously, when the session leaves `active`. */
  onClosing?: (session: ClientSession) => void;
  hooks?: SessionHooks;
}

export class ClientSession {
  private _state: SessionState = "active";
  private _closeReason: ConnectionError | null = null;
  private running = false;
  private writeChain: Promise<void> = Promise.resolve();
  private readonly closedSignal = deferred<ConnectionError>();

  constructor(
    readonly id: ClientId,
    private readonly io: FrameTransport,
    private readonly options: SessionOptions,
  ) {}

  /** Settles with the close reason once the session reaches `closed`. */
  get closed(): Promise<ConnectionError> {
    return this.closedSignal.promise;
  }

  get state(): SessionState {
    return this._state;
  }

  get closeReason(): ConnectionError | null {
    return this._closeReason;
  }

  isActive(): boolean {
    return this._state === "active";
  }

  /**
   * Run the read loop until the session closes.
   *
   * Never rejects: every failure becomes the close reason.
   */
  async run(): Promise<ConnectionError> {
    if (this.running) {
      throw new Error(`session ${this.id} is already running`);
    }
    this.running = true;

    try {
      while (this._state === "active") {
        const frame = await this.io.recv();
        if (this._state !== "active") break;

        if (frame === null) {
          this.teardown(ConnectionError.closed("peer closed the connection"));
          break;
        }

        const outcome = tryDecodeMessage(frame);
        if (!outcome.ok) {
          this.teardown(ConnectionError.malformed(outcome.error));
          break;
        }

        const message = withSender(outcome.message, this.id);
        this.options.hooks?.onMessage?.(this, message);
        // A closed session stops waiting on a broadcast stuck behind a slow peer.
        await Promise.race([this.options.onMessage(message, this), this.closedSignal.promise]);
      }
    } catch (e) {
      this.teardown(ConnectionError.from(e));
    }

    return this.closed;
  }

  /**
   * Write a complete frame to this client.
   *
   * Writes are chained so that concurrent broadcasts never interleave bytes of
   * two frames on the same connection.
   */
  deliver(frame: Uint8Array): Promise<void> {
    if (this._state !== "active") {
      return Promise.reject(ConnectionError.closed(`session ${this.id} is ${this._state}`));
    }
    const write = this.writeChain.then(() => this.io.send(frame));
    // The caller observes failures through `write`; the chain only orders writes.
    this.writeChain = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  /** Close the session from outside (relay shutdown). Idempotent. */
  close(): void {
    this.teardown(ConnectionError.shutdown());
  }

  /** Close the session because of an error seen elsewhere (a failed write). Idempotent. */
  fail(error: unknown): void {
    this.teardown(ConnectionError.from(error));
  }

  private teardown(reason: ConnectionError): void {
    if (this._state !== "active") return;

    this._state = "closing";
    this._closeReason = reason;
    this.options.onClosing?.(this);
    this.io.close();

    this._state = "closed";
    this.options.hooks?.onClose?.(this, reason);
    this.closedSignal.resolve(reason);
  }
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
