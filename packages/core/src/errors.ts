// Connection-level errors.
//
// Every failure on a session's read or write path ends up as one of these and
// becomes that session's close reason. None of them escape to other sessions.

import { MalformedFrame } from "@fanout/wire";

export type ConnectionErrorKind =
  /** Bind, listen or connect failed. */
  | "connect"
  /** The peer sent a frame the codec rejected. */
  | "malformed"
  /** Orderly end of stream, or a write to a session that is no longer active. */
  | "closed"
  /** Reset, broken pipe, truncated frame or idle timeout. */
  | "io"
  /** The peer broke a transport limit (oversized frame). */
  | "protocol"
  /** Every client id is in use. */
  | "registry-full"
  /** The relay closed the session. */
  | "shutdown";

/** Error during connection handling. */
export class ConnectionError extends Error {
  constructor(
    public readonly kind: ConnectionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static connect(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("connect", message, { cause });
  }

  static malformed(frameError: MalformedFrame): ConnectionError {
    return new ConnectionError("malformed", frameError.message, { cause: frameError });
  }

  static closed(message = "connection closed"): ConnectionError {
    return new ConnectionError("closed", message);
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  static protocol(message: string): ConnectionError {
    return new ConnectionError("protocol", message);
  }

  static registryFull(): ConnectionError {
    return new ConnectionError("registry-full", "no free client id");
  }

  static shutdown(): ConnectionError {
    return new ConnectionError("shutdown", "session closed by relay");
  }

  /** Normalise anything thrown on a session path into a ConnectionError. */
  static from(error: unknown): ConnectionError {
    if (error instanceof ConnectionError) return error;
    if (error instanceof MalformedFrame) return ConnectionError.malformed(error);
    if (error instanceof Error) return ConnectionError.io(error.message, error);
    return ConnectionError.io(String(error), error);
  }
}
