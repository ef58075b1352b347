// fanout wire protocol types.
//
// A message is a closed tagged union over three kinds that share one envelope:
// kind, sender id and an opaque body. The relay only ever looks at the envelope.

// ============================================================================
// Kinds
// ============================================================================

/** Message kinds carried by the relay. */
export type MessageKind = "Text" | "Event" | "Snapshot";

/** Wire tags for each message kind (the first byte of an encoded message). */
export const MessageKindTag = {
  Text: 0,
  Event: 1,
  Snapshot: 2,
} as const satisfies Record<MessageKind, number>;

export type MessageKindTag = (typeof MessageKindTag)[MessageKind];

/**
 * Map a wire tag back to its kind.
 *
 * Returns `null` for tags outside the closed set.
 */
export function kindFromTag(tag: number): MessageKind | null {
  switch (tag) {
    case MessageKindTag.Text:
      return "Text";
    case MessageKindTag.Event:
      return "Event";
    case MessageKindTag.Snapshot:
      return "Snapshot";
    default:
      return null;
  }
}

// ============================================================================
// Identifiers
// ============================================================================

/** 8-bit client identifier. 0 means "unassigned" / "exclude nobody". */
export type ClientId = number;

/** Reserved id: never assigned to a session. */
export const NO_CLIENT: ClientId = 0;

/** Largest id representable on the wire. */
export const MAX_CLIENT_ID: ClientId = 0xff;

export function isClientId(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_CLIENT_ID;
}

// ============================================================================
// Message
// ============================================================================

/** Envelope shared by every message kind. */
export interface MessageEnvelope<K extends MessageKind> {
  readonly kind: K;
  readonly senderId: ClientId;
  readonly payload: Uint8Array;
}

/** Free-form text, UTF-8 by convention. */
export type TextMessage = MessageEnvelope<"Text">;

/** Application event, opaque to the relay. */
export type EventMessage = MessageEnvelope<"Event">;

/** State snapshot, opaque to the relay. Receivers keep the latest per sender. */
export type SnapshotMessage = MessageEnvelope<"Snapshot">;

/** A relay message. Instances are frozen once constructed. */
export type Message = TextMessage | EventMessage | SnapshotMessage;

/** Largest body length representable in the 32-bit length field. */
export const MAX_BODY_LENGTH = 0xffff_ffff;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

function toBytes(body: Uint8Array | string): Uint8Array {
  // Copy so callers cannot mutate the message through their own buffer.
  return typeof body === "string" ? utf8Encoder.encode(body) : Uint8Array.from(body);
}

/**
 * Build a message of the given kind.
 *
 * @throws RangeError if the sender id is not an 8-bit value or the body does
 * not fit a 32-bit length.
 */
export function createMessage<K extends MessageKind>(
  kind: K,
  body: Uint8Array | string,
  senderId: ClientId = NO_CLIENT,
): MessageEnvelope<K> {
  if (!isClientId(senderId)) {
    throw new RangeError(`sender id out of range: ${senderId}`);
  }
  const payload = toBytes(body);
  if (payload.length > MAX_BODY_LENGTH) {
    throw new RangeError(`body too large for u32 length: ${payload.length}`);
  }
  return Object.freeze({ kind, senderId, payload });
}

export function textMessage(body: Uint8Array | string, senderId: ClientId = NO_CLIENT): TextMessage {
  return createMessage("Text", body, senderId);
}

export function eventMessage(body: Uint8Array | string, senderId: ClientId = NO_CLIENT): EventMessage {
  return createMessage("Event", body, senderId);
}

export function snapshotMessage(
  body: Uint8Array | string,
  senderId: ClientId = NO_CLIENT,
): SnapshotMessage {
  return createMessage("Snapshot", body, senderId);
}

/** Return a copy of the message attributed to another sender. */
export function withSender(message: Message, senderId: ClientId): Message {
  if (!isClientId(senderId)) {
    throw new RangeError(`sender id out of range: ${senderId}`);
  }
  if (message.senderId === senderId) return message;
  const attributed: Message = { ...message, senderId };
  return Object.freeze(attributed);
}

/** Decode a message body as UTF-8 for display. */
export function messageText(message: Message): string {
  return utf8Decoder.decode(message.payload);
}
