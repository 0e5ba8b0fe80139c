import { once } from "node:events";
import type { Socket } from "node:net";

import { Client } from "callpair";
import WebSocket from "ws";

import App from "./app";
import { type Environment, getConfig } from "./config";
import { type Mailbox, Store } from "./data";
import type { Relay } from "./relay";

export interface TestServer {
  base: URL;
  client: Client;
  store: Store;
  relay: Relay;
  /** The signaling WebSocket address for `room`. */
  signal(room: string): string;
  close(): Promise<void>;
}

/** Run the app on an ephemeral localhost port, in memory unless `mailbox`. */
export async function startServer(
  env: Environment = {},
  mailbox?: Mailbox
): Promise<TestServer> {
  const config = getConfig({
    LISTEN_HOST: "127.0.0.1",
    LISTEN_PORT: "0",
    ...env,
  });
  const memory = Store.memory(config.retention);
  const store = new Store(memory.rooms, mailbox ?? memory.mailbox);
  const { app, relay } = App({ config, store });
  const server = app.listen(0, "127.0.0.1");

  const sockets = new Set<Socket>();
  server.on("connection", (socket: Socket) => {
    sockets.add(socket);
    socket.once("close", () => sockets.delete(socket));
  });

  await once(server, "listening");

  const address = server.address();
  if (address == null || typeof address === "string")
    throw new Error("Test server is not listening on a port");

  const base = new URL(`http://127.0.0.1:${address.port}/api/`);
  const client = new Client(base);

  return {
    base,
    client,
    store,
    relay,
    signal: (room) => client.signalURL(room).href,
    async close() {
      await relay.close();
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
      await store.close();
    },
  };
}

export interface Received {
  type: string;
  [field: string]: unknown;
}

/** A raw relay connection which keeps every message it receives. */
export class TestSocket {
  public readonly received: Received[] = [];
  public readonly closed: Promise<{ code: number; reason: string }>;
  private readonly waiting = new Set<() => void>();

  private constructor(public readonly ws: WebSocket) {
    ws.on("message", (data) => {
      this.received.push(parseReceived(data.toString()));
      for (const check of this.waiting) check();
    });

    this.closed = new Promise((resolve) => {
      ws.once("close", (code, reason) =>
        resolve({ code, reason: reason.toString() })
      );
    });
  }

  static open(url: string): Promise<TestSocket> {
    const socket = new TestSocket(new WebSocket(url));

    return new Promise((resolve, reject) => {
      socket.ws.once("open", () => resolve(socket));
      socket.ws.once("error", reject);
    });
  }

  send(message: object | string) {
    this.ws.send(
      typeof message === "string" ? message : JSON.stringify(message)
    );
  }

  /** Remove and return the first message of `type`, waiting if needed. */
  take(type: string, timeout = 2000): Promise<Received> {
    return new Promise((resolve, reject) => {
      const check = () => {
        const index = this.received.findIndex(
          (message) => message.type === type
        );
        if (index < 0) return;

        const [message] = this.received.splice(index, 1);
        if (message === undefined) return;

        clearTimeout(timer);
        this.waiting.delete(check);
        resolve(message);
      };

      const timer = setTimeout(() => {
        this.waiting.delete(check);
        reject(new Error(`Timed out waiting for ${type}`));
      }, timeout);

      this.waiting.add(check);
      check();
    });
  }

  terminate() {
    this.ws.terminate();
  }
}

function parseReceived(data: string): Received {
  const value: unknown = JSON.parse(data);
  if (typeof value !== "object" || value === null || !("type" in value))
    throw new TypeError(`Unexpected relay message ${data}`);

  const { type } = value;
  if (typeof type !== "string")
    throw new TypeError(`Unexpected relay message ${data}`);

  return { ...value, type };
}

/** Poll until `condition` holds. */
export async function until(
  condition: () => boolean | Promise<boolean>,
  timeout = 2000
) {
  const deadline = Date.now() + timeout;
  while (!(await condition())) {
    if (Date.now() > deadline)
      throw new Error("Timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
