// Length-prefixed framing for TCP streams.
//
// Each frame is a 4-byte big-endian length followed by that many bytes. The
// length covers the frame body only, not the prefix itself.

import net from "node:net";
import { ConnectionError, type FrameTransport } from "@fanout/core";
import { FRAME_HEADER_SIZE } from "@fanout/wire";

export interface FramingOptions {
  /**
   * Largest frame body accepted from the peer. A larger declared length is a
   * protocol violation and closes the connection. Defaults to 16 MiB.
   */
  maxFrameLength?: number;

  /**
   * Close the connection after this many milliseconds without traffic.
   * 0 (the default) disables the timeout.
   */
  idleTimeoutMs?: number;

  /**
   * Stop reading from the socket once this many bytes of complete frames are
   * waiting for `recv()`. Reading resumes when they drain. Defaults to 1 MiB.
   */
  highWaterMark?: number;
}

export const DEFAULT_MAX_FRAME_LENGTH = 16 * 1024 * 1024;
export const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

interface Waiter {
  resolve: (frame: Uint8Array | null) => void;
  reject: (error: ConnectionError) => void;
}

/**
 * A length-prefixed TCP connection.
 *
 * Reassembles frames from however the stream happens to chunk them and hands
 * out only complete frame bodies. A connection that ends part-way through a
 * frame is reported as an `io` error, never as a short frame.
 */
export class LengthPrefixedFramed implements FrameTransport {
  private buf: Buffer = Buffer.alloc(0);
  private pendingFrames: Uint8Array[] = [];
  private pendingBytes = 0;
  private paused = false;
  private waiting: Waiter | null = null;
  private closed = false;
  private error: ConnectionError | null = null;
  private readonly maxFrameLength: number;
  private readonly highWaterMark: number;

  constructor(
    private readonly socket: net.Socket,
    options: FramingOptions = {},
  ) {
    this.maxFrameLength = options.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

    socket.on("data", (chunk: Buffer) => {
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      this.processBuffer();
    });

    socket.on("end", () => {
      this.onEnd();
    });

    socket.on("error", (err: Error) => {
      this.fail(ConnectionError.io(err.message, err));
    });

    socket.on("close", () => {
      this.onEnd();
    });

    const idleTimeoutMs = options.idleTimeoutMs ?? 0;
    if (idleTimeoutMs > 0) {
      socket.setTimeout(idleTimeoutMs, () => {
        this.fail(ConnectionError.io(`idle timeout after ${idleTimeoutMs}ms`));
        socket.destroy();
      });
    }
  }

  private processBuffer() {
    while (!this.error) {
      if (this.buf.length < FRAME_HEADER_SIZE) break;

      const frameLen = this.buf.readUInt32BE(0);
      if (frameLen > this.maxFrameLength) {
        this.fail(
          ConnectionError.protocol(`frame length ${frameLen} exceeds limit ${this.maxFrameLength}`),
        );
        this.socket.destroy();
        return;
      }

      const needed = FRAME_HEADER_SIZE + frameLen;
      if (this.buf.length < needed) break;

      const frame = new Uint8Array(this.buf.subarray(FRAME_HEADER_SIZE, needed));
      this.buf = this.buf.subarray(needed);

      if (this.waiting) {
        const waiter = this.waiting;
        this.waiting = null;
        waiter.resolve(frame);
      } else {
        this.pendingFrames.push(frame);
        this.pendingBytes += frame.length;
      }
    }

    if (!this.paused && this.pendingBytes >= this.highWaterMark) {
      this.paused = true;
      this.socket.pause();
    }
  }

  private onEnd() {
    if (this.buf.length > 0 && !this.error) {
      this.fail(ConnectionError.io(`connection closed mid-frame: ${this.buf.length} bytes buffered`));
      return;
    }
    this.markClosed();
  }

  private fail(error: ConnectionError) {
    if (this.error) return;
    this.error = error;
    this.buf = Buffer.alloc(0);
    this.closed = true;
    if (this.waiting) {
      const waiter = this.waiting;
      this.waiting = null;
      waiter.reject(error);
    }
  }

  private markClosed() {
    this.closed = true;
    if (this.waiting) {
      const waiter = this.waiting;
      this.waiting = null;
      waiter.resolve(null);
    }
  }

  /** Remote address as `host:port`, for logs. */
  get peer(): string {
    return `${this.socket.remoteAddress ?? "?"}:${this.socket.remotePort ?? "?"}`;
  }

  /**
   * Write one complete frame (length prefix included) in a single write.
   */
  send(frame: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed || this.socket.destroyed) {
        reject(ConnectionError.closed("socket closed"));
        return;
      }

      this.socket.write(frame, (err) => {
        if (err) reject(ConnectionError.io(err.message, err));
        else resolve();
      });
    });
  }

  /**
   * Receive the next frame body.
   *
   * Frames that arrived before the connection ended are still handed out.
   */
  recv(): Promise<Uint8Array | null> {
    const queued = this.pendingFrames.shift();
    if (queued) {
      this.pendingBytes -= queued.length;
      if (this.paused && this.pendingBytes < this.highWaterMark) {
        this.paused = false;
        this.socket.resume();
      }
      return Promise.resolve(queued);
    }

    if (this.error) {
      return Promise.reject(this.error);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  /**
   * Close the connection immediately. Writes still queued are failed, so a
   * peer that has stopped reading cannot hold the connection open. Idempotent.
   */
  close(): void {
    this.socket.destroy();
    this.markClosed();
  }
}
