import { isRoomId } from "callpair";
import express, {
  json,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import websocket from "express-ws";

import type { Config } from "./config";
import { InvalidInput, ResponseError, type Store } from "./data";
import { RoomRegistry } from "./registry";
import { Relay } from "./relay";

export interface Dependencies {
  config: Config;
  store: Store;
}

/** The express app and the relay behind its signaling route. */
export default function app({ config, store }: Dependencies) {
  const { app } = websocket(express(), undefined, {
    wsOptions: { maxPayload: config.server.maxMessageSize },
  });

  const registry = new RoomRegistry(store.rooms, store.mailbox);
  const relay = new Relay(registry, store.mailbox);

  app.use(json({ limit: 1024 }));

  app.get(
    "/api/health",
    handler(async () => ({ status: "ok" }))
  );

  app.post(
    "/api/room",
    handler(async () => {
      const room = await registry.allocate();
      console.log(new Date().toISOString(), "create", `room=${room.id}`);
      return { room };
    })
  );

  app.get(
    "/api/room/:room",
    handler(async ({ req }) => {
      const { room } = req.params;
      if (!isRoomId(room)) throw new InvalidInput("Invalid room identifier.");

      return { room: await registry.status(room) };
    })
  );

  app.get(
    "/api/ice-servers",
    handler(async () => ({ iceServers: config.ice.servers }))
  );

  app.ws("/api/room/:room/signal", (ws, req) => {
    relay.accept(ws, req.params.room ?? "");
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.log(
      new Date().toISOString(),
      `[error] ${req.method} ${req.path} ${err}`
    );

    if (err instanceof ResponseError) {
      res.status(err.status).json({ error: err.name, message: err.message });
    } else {
      res
        .status(500)
        .type("text/plain; charset=utf-8")
        .send("Unexpected error");
    }
  });

  return { app, relay };
}

function handler<V>(impl: Handler<V>) {
  return (req: Request, res: Response, next: NextFunction) => {
    impl({ req, res })
      .then((result) => {
        if (result && typeof result === "object") res.json(result);
      })
      .catch(next);
  };
}

type Handler<V> = (ctx: Context) => Promise<V>;

interface Context {
  req: Request;
  res: Response;
}
