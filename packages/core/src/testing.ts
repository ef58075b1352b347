// In-memory transport for exercising sessions without sockets.

import { FRAME_HEADER_SIZE, type Message, decodeMessage, encodeMessage, readFrameLength } from "@fanout/wire";
import { ConnectionError } from "./errors.ts";
import type { FrameTransport } from "./transport.ts";

type Inbound = { kind: "frame"; body: Uint8Array } | { kind: "end" } | { kind: "error"; error: Error };

/**
 * A FrameTransport backed by queues.
 *
 * Tests push inbound frame bodies with `feed`, end the stream with `end`, and
 * inspect written frames through `sent`.
 */
export class MemoryTransport implements FrameTransport {
  /** Frames written with `send`, length prefix included. */
  readonly sent: Uint8Array[] = [];
  /** Number of times `close` was called. */
  closeCalls = 0;
  /** When set, every `send` rejects with this error. */
  failSendsWith: Error | null = null;

  private inbound: Inbound[] = [];
  private waiter: ((item: Inbound) => void) | null = null;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Queue one inbound frame body. */
  feed(body: Uint8Array): void {
    this.push({ kind: "frame", body });
  }

  /** Queue an encoded message as an inbound frame. */
  feedMessage(message: Message): void {
    this.feed(encodeMessage(message));
  }

  /** Signal an orderly end of stream. */
  end(): void {
    this.push({ kind: "end" });
  }

  /** Make the next `recv` reject. */
  error(error: Error): void {
    this.push({ kind: "error", error });
  }

  async send(frame: Uint8Array): Promise<void> {
    if (this.closed) throw ConnectionError.closed("transport closed");
    if (this.failSendsWith) throw this.failSendsWith;
    this.sent.push(frame.slice());
  }

  async recv(): Promise<Uint8Array | null> {
    const item = this.inbound.shift() ?? (this.closed ? null : await this.wait());
    if (item === null || item.kind === "end") return null;
    if (item.kind === "error") throw item.error;
    return item.body;
  }

  close(): void {
    this.closeCalls++;
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ kind: "end" });
  }

  /** Decode every frame written so far. */
  sentMessages(): Message[] {
    return this.sent.map((frame) => {
      const length = readFrameLength(frame);
      if (length === null || frame.length !== FRAME_HEADER_SIZE + length) {
        throw new Error("not a complete frame");
      }
      return decodeMessage(frame.subarray(FRAME_HEADER_SIZE));
    });
  }

  private push(item: Inbound): void {
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(item);
    } else {
      this.inbound.push(item);
    }
  }

  private wait(): Promise<Inbound> {
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}

/** Let queued promise callbacks and I/O callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
