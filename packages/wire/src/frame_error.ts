// Decode-time structural violations.

/** Why a buffer was rejected by the decoder. */
export type MalformedFrameReason = "short-buffer" | "truncated-body" | "unknown-kind";

/**
 * A buffer that does not hold a well-formed message.
 *
 * Thrown by `decodeMessage`; a decoder that throws this never returns a
 * partially-populated message.
 */
export class MalformedFrame extends Error {
  constructor(
    public readonly reason: MalformedFrameReason,
    message: string,
  ) {
    super(message);
    this.name = "MalformedFrame";
  }

  static shortBuffer(length: number, needed: number): MalformedFrame {
    return new MalformedFrame(
      "short-buffer",
      `buffer too short: ${length} bytes, need at least ${needed}`,
    );
  }

  static truncatedBody(declared: number, available: number): MalformedFrame {
    return new MalformedFrame(
      "truncated-body",
      `declared body length ${declared} exceeds remaining ${available} bytes`,
    );
  }

  static unknownKind(tag: number): MalformedFrame {
    return new MalformedFrame("unknown-kind", `unknown message kind tag: ${tag}`);
  }
}
