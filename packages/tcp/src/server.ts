// TCP listener for the relay.
//
// Binds one endpoint and admits every accepted socket as a new session.
// stop() closes the listening socket; sessions already admitted keep running
// until they close on their own. shutdown() also closes them and waits.

import net from "node:net";
import {
  ConnectionError,
  Relay,
  composeHooks,
  createLogger,
  loggingHooks,
  type LoggingOptions,
  type SessionHooks,
} from "@fanout/core";
import { type ServerConfig, defaultServerConfig } from "./config.ts";
import { LengthPrefixedFramed } from "./framing.ts";

const log = createLogger("server");

export interface RelayServerOptions extends Partial<ServerConfig> {
  /** Extra lifecycle hooks, run after the logging hooks. */
  hooks?: SessionHooks;
  /** Options for the session logging hooks. */
  logging?: LoggingOptions;
}

/** A TCP server that relays every client's messages to all other clients. */
export class RelayServer {
  readonly relay: Relay;
  private config: ServerConfig;
  private server: net.Server | null = null;
  private serverClosed: Promise<void> = Promise.resolve();

  constructor(options: RelayServerOptions = {}) {
    const { hooks, logging, ...config } = options;
    this.config = { ...defaultServerConfig(), ...config };
    this.relay = new Relay({
      hooks: hooks ? composeHooks(loggingHooks(logging), hooks) : loggingHooks(logging),
    });
  }

  get isListening(): boolean {
    return this.server !== null;
  }

  /**
   * Bind and start accepting connections.
   *
   * @returns The bound address (useful with port 0).
   * @throws ConnectionError with kind `connect` if the endpoint cannot be bound.
   */
  listen(): Promise<net.AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error("relay server is already listening"));
    }
    const { host, port } = this.config;

    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        this.accept(socket);
      });

      const onListenError = (err: Error) => {
        reject(ConnectionError.connect(`cannot listen on ${host}:${port}: ${err.message}`, err));
      };
      server.once("error", onListenError);

      server.listen(port, host, () => {
        server.off("error", onListenError);
        server.on("error", (err) => {
          log("listener error: %s", err.message);
        });

        const address = server.address();
        if (address === null || typeof address === "string") {
          server.close();
          reject(ConnectionError.connect(`listener on ${host}:${port} has no TCP address`));
          return;
        }

        this.server = server;
        this.serverClosed = new Promise((resolveClosed) => {
          server.once("close", () => resolveClosed());
        });
        log("listening on %s:%d", address.address, address.port);
        resolve(address);
      });
    });
  }

  /** Bound address, or null when not listening. */
  address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== "string" ? address : null;
  }

  /**
   * Stop admitting new sessions. Active sessions continue.
   */
  stop(): void {
    const server = this.server;
    if (!server) return;
    this.server = null;
    server.close();
    log("stopped accepting connections");
  }

  /**
   * Stop admitting, close every active session, and wait until all session
   * tasks and sockets have finished.
   */
  async shutdown(): Promise<void> {
    this.stop();
    this.relay.closeAll();
    await this.relay.settled();
    await this.serverClosed;
  }

  /** Resolves when every session admitted so far has closed. */
  sessionsSettled(): Promise<void> {
    return this.relay.settled();
  }

  private accept(socket: net.Socket) {
    const io = new LengthPrefixedFramed(socket, {
      maxFrameLength: this.config.maxFrameLength,
      idleTimeoutMs: this.config.idleTimeoutMs,
    });

    try {
      const session = this.relay.admit(io);
      log("client %d connected from %s", session.id, io.peer);
    } catch (e) {
      const error = ConnectionError.from(e);
      log("rejected %s: %s", io.peer, error.message);
      io.close();
    }
  }
}
