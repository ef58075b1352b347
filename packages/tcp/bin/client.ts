// Line-oriented relay client.
//
//   npm run client -- 127.0.0.1:54000
//
// Input lines: `t <text>`, `e <data>`, `s <data>`, or `quit`.

import readline from "node:readline";
import { ConnectionError, Inbox } from "@fanout/core";
import { type Message, eventMessage, messageText, snapshotMessage, textMessage } from "@fanout/wire";
import { RelayClient } from "../src/client.ts";
import { loadClientConfig } from "../src/config.ts";

function parseLine(line: string): Message | "quit" | null {
  const trimmed = line.trim();
  if (trimmed === "quit") return "quit";
  const [command, ...rest] = trimmed.split(" ");
  const body = rest.join(" ");
  switch (command) {
    case "t":
      return textMessage(body);
    case "e":
      return eventMessage(body);
    case "s":
      return snapshotMessage(body);
    default:
      return null;
  }
}

async function main() {
  const { host, port } = loadClientConfig(process.env, process.argv[2]);
  const client = await RelayClient.connect({ host, port });
  console.error(`Connected to ${host}:${port}`);

  const inbox = new Inbox();
  client.onMessage((message) => {
    inbox.accept(message);
    const { texts, events, snapshots } = inbox.drain();
    for (const text of texts) {
      console.log(`[client ${text.senderId}] ${messageText(text)}`);
    }
    for (const event of events) {
      console.log(`[client ${event.senderId}] event (${event.payload.length} bytes)`);
    }
    for (const snapshot of snapshots) {
      console.log(`[client ${snapshot.senderId}] snapshot (${snapshot.payload.length} bytes)`);
    }
  });

  const rl = readline.createInterface({ input: process.stdin });
  rl.on("line", (line) => {
    const parsed = parseLine(line);
    if (parsed === "quit") {
      rl.close();
      return;
    }
    if (parsed === null) {
      console.error("Usage: t <text> | e <data> | s <data> | quit");
      return;
    }
    client.send(parsed).catch((err: unknown) => {
      console.error("Send failed:", err);
    });
  });
  rl.on("close", () => client.disconnect());

  const reason = await client.closed;
  rl.close();
  console.error(`Disconnected: ${reason.message}`);
}

main().catch((err: unknown) => {
  if (err instanceof ConnectionError && err.kind === "connect") {
    console.error(`Failed to connect: ${err.message}`);
  } else {
    console.error("Error:", err);
  }
  process.exit(1);
});
