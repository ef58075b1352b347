/**
 * Frame transport abstraction.
 *
 * Sessions are generic over this interface so the same read loop and
 * broadcast logic run over TCP (LengthPrefixedFramed in @fanout/tcp) or an
 * in-memory transport in tests.
 */
export interface FrameTransport {
  /**
   * Write one complete wire frame, outer length prefix included.
   *
   * Rejects with a ConnectionError when the write fails.
   */
  send(frame: Uint8Array): Promise<void>;

  /**
   * Receive the body of the next frame (outer length prefix stripped).
   *
   * Resolves `null` on an orderly close with no partial frame buffered.
   * Rejects with a ConnectionError on reset, a truncated frame, or a frame
   * that breaks a transport limit. Never hands out a partial frame.
   */
  recv(): Promise<Uint8Array | null>;

  /** Close the transport. Idempotent; a pending `recv()` resolves `null`. */
  close(): void;
}
