import net from "node:net";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ConnectionError } from "@fanout/core";

import { LengthPrefixedFramed } from "./framing.ts";

interface SocketPair {
  local: net.Socket;
  remote: net.Socket;
}

const servers: net.Server[] = [];
const sockets: net.Socket[] = [];

/** Connected loopback pair: `local` is the accepted side, `remote` the dialer. */
function socketPair(): Promise<SocketPair> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    servers.push(server);
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("no TCP address"));
        return;
      }
      server.once("connection", (local) => {
        sockets.push(local);
        resolve({ local, remote });
      });
      const remote = net.createConnection({ host: "127.0.0.1", port: address.port });
      sockets.push(remote);
    });
  });
}

function rejection(promise: Promise<unknown>): Promise<ConnectionError> {
  return promise.then(
    () => {
      throw new Error("expected a rejection");
    },
    (e: unknown) => {
      if (e instanceof ConnectionError) return e;
      throw e;
    },
  );
}

afterEach(() => {
  for (const socket of sockets.splice(0)) socket.destroy();
  for (const server of servers.splice(0)) server.close();
});

describe("LengthPrefixedFramed", () => {
  it("reassembles a frame split across writes", async () => {
    const { local, remote } = await socketPair();
    const io = new LengthPrefixedFramed(local);

    remote.write(Uint8Array.from([0, 0]));
    remote.write(Uint8Array.from([0, 3, 7]));
    remote.write(Uint8Array.from([8, 9]));

    expect(Array.from((await io.recv()) ?? [])).toEqual([7, 8, 9]);
  });

  it("splits several frames out of one chunk", async () => {
    const { local, remote } = await socketPair();
    const io = new LengthPrefixedFramed(local);

    remote.write(Uint8Array.from([0, 0, 0, 1, 0xaa, 0, 0, 0, 2, 0xbb, 0xcc, 0, 0, 0, 0]));

    expect(Array.from((await io.recv()) ?? [])).toEqual([0xaa]);
    expect(Array.from((await io.recv()) ?? [])).toEqual([0xbb, 0xcc]);
    expect(Array.from((await io.recv()) ?? [])).toEqual([]);
  });

  it("returns null after an orderly close", async () => {
    const { local, remote } = await socketPair();
    const io = new LengthPrefixedFramed(local);

    remote.end(Uint8Array.from([0, 0, 0, 1, 5]));

    expect(Array.from((await io.recv()) ?? [])).toEqual([5]);
    expect(await io.recv()).toBeNull();
  });

  it("reports a connection that ends mid-frame", async () => {
    const { local, remote } = await socketPair();
    const io = new LengthPrefixedFramed(local);

    remote.end(Uint8Array.from([0, 0, 0, 10, 1, 2, 3]));

    const error = await rejection(io.recv());
    expect(error.kind).toBe("io");
    expect(error.message).toBe("connection closed mid-frame: 7 bytes buffered");
  });

  it("rejects a declared length over the limit", async () => {
    const { local, remote } = await socketPair();
    const io = new LengthPrefixedFramed(local, { maxFrameLength: 16 });

    remote.write(Uint8Array.from([0, 0, 0, 17]));

    const error = await rejection(io.recv());
    expect(error.kind).toBe("protocol");
    expect(error.message).toBe("frame length 17 exceeds limit 16");
  });

  it("stops reading while unclaimed frames pass the high-water mark", async () => {
    const { local, remote } = await socketPair();
    const io = new LengthPrefixedFramed(local, { highWaterMark: 64 * 1024 });

    const frameCount = 256;
    const bodyLength = 16 * 1024;
    const stream = new Uint8Array(frameCount * (4 + bodyLength));
    const view = new DataView(stream.buffer);
    for (let i = 0; i < frameCount; i++) {
      view.setUint32(i * (4 + bodyLength), bodyLength, false);
    }
    remote.write(stream);

    await vi.waitFor(() => expect(local.isPaused()).toBe(true));
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(local.bytesRead).toBeLessThan(stream.length);

    for (let i = 0; i < frameCount; i++) {
      expect((await io.recv())?.length).toBe(bodyLength);
    }
    expect(local.isPaused()).toBe(false);
    expect(local.bytesRead).toBe(stream.length);
  });

  it("writes frames as given", async () => {
    const { local, remote } = await socketPair();
    const io = new LengthPrefixedFramed(local);

    const received = new Promise<number[]>((resolve) => {
      remote.once("data", (chunk: Buffer) => resolve(Array.from(chunk)));
    });
    await io.send(Uint8Array.from([0, 0, 0, 2, 0x68, 0x69]));

    expect(await received).toEqual([0, 0, 0, 2, 0x68, 0x69]);
  });

  it("refuses to send after close", async () => {
    const { local } = await socketPair();
    const io = new LengthPrefixedFramed(local);

    io.close();

    const error = await rejection(io.send(Uint8Array.from([0, 0, 0, 0])));
    expect(error.kind).toBe("closed");
    expect(await io.recv()).toBeNull();
  });

  it("times out an idle connection", async () => {
    const { local } = await socketPair();
    const io = new LengthPrefixedFramed(local, { idleTimeoutMs: 50 });

    const error = await rejection(io.recv());
    expect(error.kind).toBe("io");
    expect(error.message).toBe("idle timeout after 50ms");
  });
});
