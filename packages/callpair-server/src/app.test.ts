import { ResponseError } from "callpair";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { startServer, type TestServer } from "./testing";

describe("HTTP API", () => {
  let server: TestServer;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    server = await startServer({
      ICE_SERVERS: "stun:stun.example.com:3478,turn:turn.example.com:3478",
      TURN_USERNAME: "test-user",
      TURN_CREDENTIAL: "test-secret",
    });
  });

  afterEach(async () => {
    await server.close();
    vi.restoreAllMocks();
  });

  it("reports health", async () => {
    const response = await fetch(new URL("health", server.base));
    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ status: "ok" });
  });

  it("allocates a new room", async () => {
    const room = await server.client.createRoom();

    expect(room.state).toBe("empty");
    expect(room.participants).toBe(0);
    expect(room.id.split("-")).toHaveLength(4);
  });

  it("reports room status", async () => {
    await server.store.rooms.join("r1", "a", 2);

    await expect(server.client.getRoom("r1")).resolves.toEqual({
      id: "r1",
      state: "waiting-for-peer",
      participants: 1,
    });
    await expect(server.client.getRoom("r2")).resolves.toEqual({
      id: "r2",
      state: "empty",
      participants: 0,
    });
  });

  it("rejects invalid room identifiers", async () => {
    const error = await server.client
      .getRoom("bad room")
      .catch((err: unknown) => err);

    if (!(error instanceof ResponseError)) throw error;
    expect(error.status).toBe(422);
    expect(error.code).toBe("InvalidInput");
    expect(error.description).toBe("Invalid room identifier.");
  });

  it("lists ICE servers", async () => {
    await expect(server.client.iceServers()).resolves.toEqual([
      { urls: "stun:stun.example.com:3478" },
      {
        urls: "turn:turn.example.com:3478",
        username: "test-user",
        credential: "test-secret",
      },
    ]);
  });

  it("builds an endpoint from the ICE servers", async () => {
    const endpoint = await server.client.endpoint({
      iceTransportPolicy: "all",
    });

    expect(endpoint.configuration).toEqual({
      iceServers: [
        { urls: "stun:stun.example.com:3478" },
        {
          urls: "turn:turn.example.com:3478",
          username: "test-user",
          credential: "test-secret",
        },
      ],
      iceTransportPolicy: "all",
    });
  });

  it("points signaling at the WebSocket route", () => {
    expect(server.client.signalURL("r1").href).toBe(
      `ws://127.0.0.1:${server.base.port}/api/room/r1/signal`
    );
  });
});
