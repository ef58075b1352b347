// TCP client for the relay.

import net from "node:net";
import { ConnectionError, createLogger } from "@fanout/core";
import {
  type Message,
  NO_CLIENT,
  encodeFrame,
  tryDecodeMessage,
  withSender,
} from "@fanout/wire";
import { type FramingOptions, LengthPrefixedFramed } from "./framing.ts";

const log = createLogger("client");

/** Receives messages relayed from other clients. */
export type MessageSink = (message: Message) => void;

/** Options for connecting to a relay. */
export interface ConnectOptions extends FramingOptions {
  host: string;
  port: number;
}

/**
 * A connection to a relay.
 *
 * Inbound messages go to every `onMessage` sink. While no sink is registered
 * they are buffered for `next()` / `messages()` instead.
 */
export class RelayClient {
  private sinks = new Set<MessageSink>();
  private buffered: Message[] = [];
  private waiters: Array<(message: Message | null) => void> = [];
  private done = false;
  private disconnecting = false;

  /** Settles with the reason once the connection has ended. Never rejects. */
  readonly closed: Promise<ConnectionError>;

  private constructor(private readonly io: LengthPrefixedFramed) {
    this.closed = this.readLoop();
  }

  /**
   * Connect to a relay.
   *
   * @throws ConnectionError with kind `connect` if the connection fails.
   */
  static connect(options: ConnectOptions): Promise<RelayClient> {
    const { host, port, ...framing } = options;
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const onError = (err: Error) => {
        reject(ConnectionError.connect(`cannot connect to ${host}:${port}: ${err.message}`, err));
      };
      socket.once("error", onError);

      socket.once("connect", () => {
        socket.off("error", onError);
        log("connected to %s:%d", host, port);
        resolve(new RelayClient(new LengthPrefixedFramed(socket, framing)));
      });
    });
  }

  get isConnected(): boolean {
    return !this.done;
  }

  /**
   * Send a message to every other client.
   *
   * The sender id is cleared; the relay fills in this client's id.
   */
  send(message: Message): Promise<void> {
    if (this.done) {
      return Promise.reject(ConnectionError.closed("client is disconnected"));
    }
    return this.io.send(encodeFrame(withSender(message, NO_CLIENT)));
  }

  /**
   * Subscribe to inbound messages. Returns an unsubscribe function.
   */
  onMessage(sink: MessageSink): () => void {
    this.sinks.add(sink);
    for (const message of this.buffered.splice(0)) {
      sink(message);
    }
    return () => {
      this.sinks.delete(sink);
    };
  }

  /**
   * Next buffered message, or `null` once the connection has ended.
   */
  next(): Promise<Message | null> {
    const message = this.buffered.shift();
    if (message) return Promise.resolve(message);
    if (this.done) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Iterate inbound messages until the connection ends. */
  async *messages(): AsyncGenerator<Message, void, undefined> {
    for (;;) {
      const message = await this.next();
      if (message === null) return;
      yield message;
    }
  }

  /** Close the connection. Idempotent. */
  disconnect(): void {
    if (this.done) return;
    this.disconnecting = true;
    this.io.close();
  }

  private async readLoop(): Promise<ConnectionError> {
    try {
      for (;;) {
        const frame = await this.io.recv();
        if (frame === null) {
          return this.finish(
            this.disconnecting
              ? ConnectionError.closed("disconnected")
              : ConnectionError.closed("relay closed the connection"),
          );
        }

        const outcome = tryDecodeMessage(frame);
        if (!outcome.ok) {
          this.io.close();
          return this.finish(ConnectionError.malformed(outcome.error));
        }
        this.dispatch(outcome.message);
      }
    } catch (e) {
      return this.finish(ConnectionError.from(e));
    }
  }

  private dispatch(message: Message) {
    if (this.sinks.size > 0) {
      for (const sink of this.sinks) sink(message);
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) waiter(message);
    else this.buffered.push(message);
  }

  private finish(reason: ConnectionError): ConnectionError {
    this.done = true;
    this.io.close();
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    log("connection ended (%s): %s", reason.kind, reason.message);
    return reason;
  }
}
