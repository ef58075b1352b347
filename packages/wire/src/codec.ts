// Frame codec for fanout messages.
//
// Inner layout (what encodeMessage produces):
//   [1 byte: kind tag] [1 byte: sender id] [4 bytes: body length (BE)] [body]
//
// Outer frame (what goes on a byte stream):
//   [4 bytes: total length (BE)] [inner layout]
//
// The outer length covers the inner layout only, not itself.

import { MalformedFrame } from "./frame_error.ts";
import { MessageKindTag, kindFromTag, type Message } from "./types.ts";

/** Size of the outer length prefix. */
export const FRAME_HEADER_SIZE = 4;

/** Size of kind + sender id + body length. */
export const ENVELOPE_SIZE = 6;

/** Largest outer length representable in the 32-bit prefix. */
export const MAX_FRAME_LENGTH = 0xffff_ffff;

// ============================================================================
// Message Encoding/Decoding
// ============================================================================

function writeEnvelope(out: Uint8Array, offset: number, message: Message): void {
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);
  view.setUint8(offset, MessageKindTag[message.kind]);
  view.setUint8(offset + 1, message.senderId);
  view.setUint32(offset + 2, message.payload.length, false);
  out.set(message.payload, offset + ENVELOPE_SIZE);
}

/**
 * Encode a message without the outer length prefix.
 */
export function encodeMessage(message: Message): Uint8Array {
  const out = new Uint8Array(ENVELOPE_SIZE + message.payload.length);
  writeEnvelope(out, 0, message);
  return out;
}

/**
 * Decode a complete, already length-delimited buffer into a message.
 *
 * Bytes after the declared body are ignored.
 *
 * @throws MalformedFrame
 */
export function decodeMessage(buf: Uint8Array): Message {
  if (buf.length < ENVELOPE_SIZE) {
    throw MalformedFrame.shortBuffer(buf.length, ENVELOPE_SIZE);
  }

  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  const tag = view.getUint8(0);
  const senderId = view.getUint8(1);
  const bodyLength = view.getUint32(2, false);

  const available = buf.length - ENVELOPE_SIZE;
  if (bodyLength > available) {
    throw MalformedFrame.truncatedBody(bodyLength, available);
  }

  const kind = kindFromTag(tag);
  if (kind === null) {
    throw MalformedFrame.unknownKind(tag);
  }

  const payload = buf.slice(ENVELOPE_SIZE, ENVELOPE_SIZE + bodyLength);
  const message: Message = { kind, senderId, payload };
  return Object.freeze(message);
}

/**
 * Result of a non-throwing decode.
 */
export type DecodeOutcome =
  | { ok: true; message: Message }
  | { ok: false; error: MalformedFrame };

/**
 * Try to decode a message, returning the failure instead of throwing it.
 */
export function tryDecodeMessage(buf: Uint8Array): DecodeOutcome {
  try {
    return { ok: true, message: decodeMessage(buf) };
  } catch (e) {
    if (e instanceof MalformedFrame) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

// ============================================================================
// Outer Frames
// ============================================================================

/**
 * Encode a message as a complete wire frame, outer length prefix included.
 *
 * The result is written with a single call so that two frames can never
 * interleave on one socket.
 */
export function encodeFrame(message: Message): Uint8Array {
  const innerLength = ENVELOPE_SIZE + message.payload.length;
  const out = new Uint8Array(FRAME_HEADER_SIZE + innerLength);
  new DataView(out.buffer).setUint32(0, innerLength, false);
  writeEnvelope(out, FRAME_HEADER_SIZE, message);
  return out;
}

/**
 * Read the outer length prefix at `offset`.
 *
 * Returns `null` when fewer than 4 bytes are available.
 */
export function readFrameLength(buf: Uint8Array, offset = 0): number | null {
  if (buf.length - offset < FRAME_HEADER_SIZE) return null;
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getUint32(offset, false);
}
