// Broadcast dispatcher: fan a message out to every session but its sender.

import { type ClientId, type Message, NO_CLIENT, encodeFrame } from "@fanout/wire";
import type { SessionHooks } from "./hooks.ts";
import type { SessionRegistry } from "./registry.ts";

/** Outcome of one broadcast. */
export interface BroadcastReport {
  /** Size of the frame written to each peer, length prefix included. */
  frameLength: number;
  /** Peers the frame was written to. */
  delivered: ClientId[];
  /** Peers whose write failed; each has been closed. */
  failed: ClientId[];
}

export class BroadcastDispatcher {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly hooks: SessionHooks = {},
  ) {}

  /**
   * Encode `message` once and write it to every active session except
   * `excludeId`.
   *
   * A failed write closes only that peer's session; it is never thrown at the
   * caller.
   */
  async broadcast(message: Message, excludeId: ClientId = NO_CLIENT): Promise<BroadcastReport> {
    const frame = encodeFrame(message);
    const peers = this.registry.lookupAllExcept(excludeId);

    const results = await Promise.allSettled(peers.map((peer) => peer.deliver(frame)));

    const report: BroadcastReport = { frameLength: frame.length, delivered: [], failed: [] };
    results.forEach((result, i) => {
      const peer = peers[i];
      if (result.status === "fulfilled") {
        report.delivered.push(peer.id);
      } else {
        peer.fail(result.reason);
        report.failed.push(peer.id);
      }
    });

    this.hooks.onBroadcast?.(message, report);
    return report;
  }
}
