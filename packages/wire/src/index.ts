// fanout wire protocol: message model and frame codec.

// ============================================================================
// Message Model
// ============================================================================

export type {
  MessageKind,
  MessageEnvelope,
  TextMessage,
  EventMessage,
  SnapshotMessage,
  Message,
  ClientId,
} from "./types.ts";

export {
  MessageKindTag,
  kindFromTag,
  NO_CLIENT,
  MAX_CLIENT_ID,
  MAX_BODY_LENGTH,
  isClientId,
  createMessage,
  textMessage,
  eventMessage,
  snapshotMessage,
  withSender,
  messageText,
} from "./types.ts";

// ============================================================================
// Errors
// ============================================================================

export { MalformedFrame, type MalformedFrameReason } from "./frame_error.ts";

// ============================================================================
// Codec
// ============================================================================

export {
  FRAME_HEADER_SIZE,
  ENVELOPE_SIZE,
  MAX_FRAME_LENGTH,
  encodeMessage,
  decodeMessage,
  tryDecodeMessage,
  encodeFrame,
  readFrameLength,
  type DecodeOutcome,
} from "./codec.ts";
