// Start a relay from environment configuration.
//
//   FANOUT_PORT=54000 DEBUG=fanout:* npm run relay

import { ConnectionError } from "@fanout/core";
import { loadServerConfig } from "../src/config.ts";
import { RelayServer } from "../src/server.ts";

async function main() {
  const config = loadServerConfig();
  const server = new RelayServer(config);

  const address = await server.listen();
  console.error(`fanout relay listening on ${address.address}:${address.port}`);

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.error(`${signal} received, shutting down`);
    server.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));
}

main().catch((err: unknown) => {
  if (err instanceof ConnectionError && err.kind === "connect") {
    console.error(`Cannot start relay: ${err.message}`);
  } else {
    console.error("Error:", err);
  }
  process.exit(1);
});
