// Client-side sorting of received messages.

import type { ClientId, EventMessage, Message, SnapshotMessage, TextMessage } from "@fanout/wire";

/** Everything an inbox held at the time it was drained. */
export interface InboxContents {
  texts: TextMessage[];
  events: EventMessage[];
  /** Latest snapshot per sender, ordered by sender id. */
  snapshots: SnapshotMessage[];
}

/**
 * Sorts inbound messages by kind.
 *
 * Text and Event messages queue in arrival order. A Snapshot replaces the
 * previous snapshot from the same sender, so only the latest state is kept.
 */
export class Inbox {
  private texts: TextMessage[] = [];
  private events: EventMessage[] = [];
  private snapshots = new Map<ClientId, SnapshotMessage>();

  accept(message: Message): void {
    switch (message.kind) {
      case "Text":
        this.texts.push(message);
        break;
      case "Event":
        this.events.push(message);
        break;
      case "Snapshot":
        this.snapshots.set(message.senderId, message);
        break;
      default: {
        const unreachable: never = message;
        throw new Error(`unhandled message: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /** Latest snapshot from a sender, if any. */
  latestSnapshot(senderId: ClientId): SnapshotMessage | undefined {
    return this.snapshots.get(senderId);
  }

  get pending(): number {
    return this.texts.length + this.events.length + this.snapshots.size;
  }

  /** Return everything held and empty the inbox. */
  drain(): InboxContents {
    const contents: InboxContents = {
      texts: this.texts,
      events: this.events,
      snapshots: [...this.snapshots.values()].sort((a, b) => a.senderId - b.senderId),
    };
    this.texts = [];
    this.events = [];
    this.snapshots.clear();
    return contents;
  }
}
