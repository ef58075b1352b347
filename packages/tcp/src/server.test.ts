import net from "node:net";
import { afterEach, describe, expect, it, vi } from "vitest";
import { type BroadcastReport, ConnectionError, type SessionHooks } from "@fanout/core";
import { MemoryTransport } from "@fanout/core/testing";
import { type ClientId, encodeFrame, eventMessage, messageText, textMessage } from "@fanout/wire";

import { RelayClient } from "./client.ts";
import { RelayServer, type RelayServerOptions } from "./server.ts";

const running: RelayServer[] = [];
const clients: RelayClient[] = [];
const rawSockets: net.Socket[] = [];

async function startServer(options: RelayServerOptions = {}) {
  const server = new RelayServer({ host: "127.0.0.1", port: 0, ...options });
  running.push(server);
  const { port } = await server.listen();
  return { server, port };
}

/** Connect a client and wait until the relay has registered it. */
async function join(server: RelayServer, port: number): Promise<RelayClient> {
  const before = server.relay.registry.size;
  const client = await RelayClient.connect({ host: "127.0.0.1", port });
  clients.push(client);
  await vi.waitFor(() => expect(server.relay.registry.size).toBe(before + 1));
  return client;
}

async function joinRaw(server: RelayServer, port: number): Promise<net.Socket> {
  const before = server.relay.registry.size;
  const socket = await new Promise<net.Socket>((resolve, reject) => {
    const s = net.createConnection({ host: "127.0.0.1", port }, () => resolve(s));
    s.on("error", reject);
  });
  rawSockets.push(socket);
  await vi.waitFor(() => expect(server.relay.registry.size).toBe(before + 1));
  return socket;
}

function recordCloses() {
  const closes = new Map<ClientId, ConnectionError>();
  const hooks: SessionHooks = {
    onClose(session, reason) {
      closes.set(session.id, reason);
    },
  };
  return { closes, hooks };
}

afterEach(async () => {
  for (const client of clients.splice(0)) client.disconnect();
  for (const socket of rawSockets.splice(0)) socket.destroy();
  await Promise.all(running.splice(0).map((server) => server.shutdown()));
});

describe("RelayServer", () => {
  it("relays A's text to B, attributed to A, and not back to A", async () => {
    const { server, port } = await startServer();
    const a = await join(server, port);
    const b = await join(server, port);

    await a.send(textMessage("hi"));
    const atB = await b.next();
    expect(atB?.kind).toBe("Text");
    expect(atB?.senderId).toBe(1);
    expect(atB ? messageText(atB) : null).toBe("hi");

    // Had "hi" come back to A, it would arrive before B's reply.
    await b.send(textMessage("ack"));
    const atA = await a.next();
    expect(atA?.senderId).toBe(2);
    expect(atA ? messageText(atA) : null).toBe("ack");
  });

  it("overwrites the sender id a client puts on the wire", async () => {
    const { server, port } = await startServer();
    const a = await join(server, port);
    const raw = await joinRaw(server, port);

    raw.write(encodeFrame(textMessage("spoof", 200)));

    const message = await a.next();
    expect(message?.senderId).toBe(2);
    expect(message ? messageText(message) : null).toBe("spoof");
  });

  it("keeps relaying after a peer disconnects", async () => {
    const reports: BroadcastReport[] = [];
    const { server, port } = await startServer({
      hooks: { onBroadcast: (_message, report) => reports.push(report) },
    });
    const a = await join(server, port);
    const b = await join(server, port);

    b.disconnect();
    await vi.waitFor(() => expect(server.relay.registry.ids()).toEqual([1]));

    await a.send(textMessage("anyone?"));
    await vi.waitFor(() => expect(reports).toHaveLength(1));
    expect(reports[0].delivered).toEqual([]);
    expect(reports[0].failed).toEqual([]);
    expect(a.isConnected).toBe(true);
  });

  it("closes only the client that sends a malformed frame", async () => {
    const { closes, hooks } = recordCloses();
    const { server, port } = await startServer({ hooks });
    const a = await join(server, port);
    const b = await join(server, port);
    const raw = await joinRaw(server, port);

    raw.write(Uint8Array.from([0, 0, 0, 6, 9, 0, 0, 0, 0, 0]));
    await vi.waitFor(() => expect(closes.has(3)).toBe(true));
    expect(closes.get(3)?.kind).toBe("malformed");
    expect(closes.get(3)?.message).toBe("unknown message kind tag: 9");

    await a.send(textMessage("still here"));
    const message = await b.next();
    expect(message ? messageText(message) : null).toBe("still here");
    expect(server.relay.registry.ids()).toEqual([1, 2]);
  });

  it("closes a client that declares an oversized frame", async () => {
    const { closes, hooks } = recordCloses();
    const { server, port } = await startServer({ hooks, maxFrameLength: 16 });
    const raw = await joinRaw(server, port);

    raw.write(Uint8Array.from([0, 0, 0, 17]));

    await vi.waitFor(() => expect(closes.has(1)).toBe(true));
    expect(closes.get(1)?.kind).toBe("protocol");
    expect(closes.get(1)?.message).toBe("frame length 17 exceeds limit 16");
  });

  it("closes idle sessions when a timeout is configured", async () => {
    const { closes, hooks } = recordCloses();
    const { server, port } = await startServer({ hooks, idleTimeoutMs: 50 });
    await join(server, port);

    await vi.waitFor(() => expect(closes.has(1)).toBe(true));
    expect(closes.get(1)?.kind).toBe("io");
    expect(closes.get(1)?.message).toBe("idle timeout after 50ms");
  });

  it("turns away a connection when every id is taken", async () => {
    const { closes, hooks } = recordCloses();
    const { server, port } = await startServer({ hooks });
    for (let i = 0; i < 255; i++) {
      server.relay.admit(new MemoryTransport());
    }
    expect(server.relay.registry.size).toBe(255);

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const s = net.createConnection({ host: "127.0.0.1", port }, () => resolve(s));
      s.on("error", reject);
    });
    rawSockets.push(socket);
    await new Promise<void>((resolve) => socket.once("close", () => resolve()));

    expect(server.relay.registry.size).toBe(255);
    expect(closes.size).toBe(0);
  });

  it("shuts down while a peer has stopped reading", async () => {
    let decoded = 0;
    const { server, port } = await startServer({
      hooks: {
        onMessage: () => {
          decoded++;
        },
      },
    });
    const sender = await joinRaw(server, port);
    const stalled = await joinRaw(server, port);
    stalled.pause();

    for (let i = 0; i < 4; i++) {
      sender.write(encodeFrame(eventMessage(new Uint8Array(8 * 1024 * 1024))));
    }
    await vi.waitFor(() => expect(decoded).toBeGreaterThan(0));
    await new Promise((resolve) => setTimeout(resolve, 200));

    let timer: NodeJS.Timeout | undefined;
    const outcome = await Promise.race([
      server.shutdown().then(() => "done" as const),
      new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), 3000);
      }),
    ]);
    clearTimeout(timer);

    expect(outcome).toBe("done");
    expect(server.relay.runningTasks).toBe(0);
    expect(server.relay.registry.size).toBe(0);
  });

  it("settles once every session has ended", async () => {
    const { closes, hooks } = recordCloses();
    const { server, port } = await startServer({ hooks });
    const a = await join(server, port);

    a.disconnect();
    await server.sessionsSettled();

    expect(server.relay.runningTasks).toBe(0);
    expect(closes.get(1)?.kind).toBe("closed");
    expect(closes.get(1)?.message).toBe("peer closed the connection");
  });

  it("refuses new connections after stop", async () => {
    const { server, port } = await startServer();
    server.stop();
    expect(server.isListening).toBe(false);

    const error = await RelayClient.connect({ host: "127.0.0.1", port }).then(
      () => null,
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof ConnectionError ? error.kind : null).toBe("connect");
  });

  it("closes every client on shutdown", async () => {
    const { server, port } = await startServer();
    const a = await join(server, port);
    const b = await join(server, port);

    await server.shutdown();

    const [reasonA, reasonB] = await Promise.all([a.closed, b.closed]);
    expect(reasonA.message).toBe("relay closed the connection");
    expect(reasonB.message).toBe("relay closed the connection");
    expect(server.relay.registry.size).toBe(0);
    expect(server.relay.runningTasks).toBe(0);
  });

  it("fails to listen on a port already in use", async () => {
    const { port } = await startServer();
    const second = new RelayServer({ host: "127.0.0.1", port });

    const error = await second.listen().then(
      () => null,
      (e: unknown) => e,
    );
    expect(error instanceof ConnectionError ? error.kind : null).toBe("connect");
    expect(second.isListening).toBe(false);
  });

  it("reports the bound address", async () => {
    const { server, port } = await startServer();
    expect(server.address()?.port).toBe(port);
    server.stop();
    expect(server.address()).toBeNull();
  });
});
