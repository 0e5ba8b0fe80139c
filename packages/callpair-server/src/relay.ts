import { CloseCode, isRoomId, type ServerMessage } from "callpair";
import { v7 as uuid } from "uuid";
import type { WebSocket } from "ws";

import { type Mailbox, RoomFull, type Subscription } from "./data";
import { type Envelope, readRequest } from "./message";
import type { RoomRegistry } from "./registry";

/**
 * Connects participants' sockets to the room registry.
 *
 * Each socket's input is handled strictly in arrival order, after its join
 * has completed; whatever lands in the participant's mailbox is written to the
 * socket verbatim.
 */
export class Relay {
  /** Open sockets, each with the promise of its teardown. */
  private readonly connections = new Map<WebSocket, Promise<void>>();

  constructor(
    private readonly registry: RoomRegistry,
    private readonly mailbox: Mailbox
  ) {}

  accept(ws: WebSocket, room: string) {
    if (!isRoomId(room)) {
      log("reject", `room=${JSON.stringify(room)}`, "reason=invalid");
      ws.close(CloseCode.InvalidRoom, "Invalid room");
      return;
    }

    const { registry, mailbox } = this;
    const participant = uuid();
    let subscription: Subscription | undefined;
    let joined = false;

    log("connect", `room=${room}`, `participant=${participant}`);

    const send = (message: ServerMessage) => {
      if (ws.readyState === ws.OPEN) ws.send(JSON.stringify(message));
    };

    const deliver = ({ type, data }: Envelope) => {
      if (ws.readyState !== ws.OPEN) return;

      ws.send(data);
      if (type === "call-ended") {
        joined = false;
        ws.close(CloseCode.CallEnded, "Call ended");
      }
    };

    async function setup() {
      const inbox = await mailbox.subscribe(participant, deliver, fail);
      subscription = inbox;

      try {
        const { joinedAs, members } = await registry.join(room, participant);
        joined = true;

        log(
          "join",
          `room=${room}`,
          `participant=${participant}`,
          `as=${joinedAs}`,
          `members=${members.length}`
        );
      } catch (err) {
        subscription = undefined;
        await inbox.close();

        if (!(err instanceof RoomFull)) throw err;

        log(
          "reject",
          `room=${room}`,
          `participant=${participant}`,
          "reason=full"
        );
        ws.close(CloseCode.RoomFull, "Room is full");
      }
    }

    async function handle(data: string | null) {
      if (!joined) return;

      if (data == null) {
        send({ type: "error", error: "unsupported message type" });
        return;
      }

      const request = readRequest(data);

      switch (request.type) {
        case "offer":
        case "answer":
        case "ice-candidate": {
          const delivered = await registry.relay(
            room,
            participant,
            request.envelope
          );
          log(
            "relay",
            `room=${room}`,
            `participant=${participant}`,
            `type=${request.type}`,
            `delivered=${delivered}`
          );
          break;
        }

        case "call-ended":
          joined = false;
          await registry.end(room, participant);
          log("end", `room=${room}`, `participant=${participant}`);
          ws.close(CloseCode.CallEnded, "Call ended");
          break;

        case "error":
          send({ type: "error", error: request.error });
      }
    }

    async function teardown() {
      log("disconnect", `room=${room}`, `participant=${participant}`);

      const inbox = subscription;
      subscription = undefined;

      try {
        if (joined) {
          joined = false;
          await registry.leave(room, participant);
        }
      } finally {
        await inbox?.close();
      }
    }

    const fail = (err: unknown) => {
      console.error(
        new Date().toISOString(),
        "[error]",
        `room=${room}`,
        `participant=${participant}`,
        err
      );
      if (ws.readyState === ws.OPEN)
        ws.close(CloseCode.InternalError, "Internal error");
    };

    let pending = setup().catch(fail);

    ws.on("message", (data, isBinary) => {
      const text = isBinary ? null : data.toString();
      pending = pending.then(() => handle(text)).catch(fail);
    });

    const closed = new Promise<void>((resolve) => {
      ws.once("close", () => {
        pending = pending
          .then(teardown)
          .catch(fail)
          .finally(() => this.connections.delete(ws));
        resolve(pending);
      });
    });
    this.connections.set(ws, closed);

    ws.on("error", fail);
  }

  /** Drop every connection and wait until each has left its room. */
  async close() {
    const closing = [...this.connections].map(([ws, closed]) => {
      ws.terminate();
      return closed;
    });
    await Promise.all(closing);
  }
}

function log(event: string, ...fields: string[]) {
  console.log(new Date().toISOString(), event, ...fields);
}
