import { createPool, type Pool } from "generic-pool";
import type { Redis } from "ioredis";
import RedisMock from "ioredis-mock";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  key,
  MemoryMailbox,
  MemoryRoomStore,
  RedisMailbox,
  RedisRoomStore,
  RoomFull,
  Store,
} from "./data";
import type { Envelope } from "./message";
import { until } from "./testing";

function mockPool(prepare?: (client: Redis) => void): Pool<Redis> {
  return createPool<Redis>(
    {
      async create() {
        const client = new RedisMock();
        prepare?.(client);
        return client;
      },
      async destroy(client: Redis): Promise<void> {
        client.disconnect();
      },
    },
    { max: 8 }
  );
}

async function shutdown(pool: Pool<Redis>) {
  await pool.drain();
  await pool.clear();
}

describe("MemoryRoomStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("admits members in order up to capacity", async () => {
    const rooms = new MemoryRoomStore();

    expect(await rooms.join("r1", "a", 2)).toEqual(["a"]);
    expect(await rooms.join("r1", "b", 2)).toEqual(["a", "b"]);
    expect(await rooms.join("r1", "c", 2)).toBeNull();
    expect(await rooms.members("r1")).toEqual(["a", "b"]);
  });

  it("treats a repeated join as a no-op", async () => {
    const rooms = new MemoryRoomStore();

    await rooms.join("r1", "a", 2);
    await rooms.join("r1", "b", 2);
    expect(await rooms.join("r1", "a", 2)).toEqual(["a", "b"]);
  });

  it("removes members and forgets empty rooms", async () => {
    const rooms = new MemoryRoomStore();
    await rooms.join("r1", "a", 2);
    await rooms.join("r1", "b", 2);

    expect(await rooms.leave("r1", "a")).toEqual(["b"]);
    expect(await rooms.leave("r1", "a")).toBeNull();
    expect(await rooms.leave("r1", "b")).toEqual([]);
    expect(await rooms.members("r1")).toEqual([]);
    expect(await rooms.closed("r1")).toBe(false);
  });

  it("marks destroyed rooms closed until they are joined again", async () => {
    const rooms = new MemoryRoomStore();
    await rooms.join("r1", "a", 2);
    await rooms.join("r1", "b", 2);

    expect(await rooms.destroy("r1")).toEqual(["a", "b"]);
    expect(await rooms.members("r1")).toEqual([]);
    expect(await rooms.closed("r1")).toBe(true);

    await rooms.join("r1", "c", 2);
    expect(await rooms.closed("r1")).toBe(false);
  });

  it("expires the closed marker", async () => {
    vi.useFakeTimers();
    const rooms = new MemoryRoomStore({ rooms: 1000 });

    await rooms.destroy("r1");
    expect(await rooms.closed("r1")).toBe(true);

    vi.advanceTimersByTime(1001);
    expect(await rooms.closed("r1")).toBe(false);
  });

  it("forgets expired markers", async () => {
    vi.useFakeTimers();
    const rooms = new MemoryRoomStore({ rooms: 1000 });

    for (let i = 0; i < 100; i++) {
      await rooms.reserve(`reserved-${i}`);
      await rooms.join(`ended-${i}`, "a", 2);
      await rooms.destroy(`ended-${i}`);
    }
    expect(rooms.markers).toBe(200);

    vi.advanceTimersByTime(1001);
    await rooms.reserve("fresh");
    expect(rooms.markers).toBe(1);
  });

  it("reserves each room once", async () => {
    const rooms = new MemoryRoomStore();

    expect(await rooms.reserve("r1")).toBe(true);
    expect(await rooms.reserve("r1")).toBe(false);

    await rooms.join("r2", "a", 2);
    expect(await rooms.reserve("r2")).toBe(false);
  });
});

describe("MemoryMailbox", () => {
  const message: Envelope = {
    type: "room-status",
    data: '{"type":"room-status","count":1}',
  };

  it("delivers to the subscriber in order", async () => {
    const mailbox = new MemoryMailbox();
    const received: Envelope[] = [];
    await mailbox.subscribe("a", (envelope) => received.push(envelope));

    await mailbox.post("a", message);
    await mailbox.post("a", {
      type: "peer-disconnected",
      data: '{"type":"peer-disconnected"}',
    });

    expect(received.map(({ type }) => type)).toEqual(
      ["room-status", "peer-disconnected"]
    );
  });

  it("drops posts to nobody", async () => {
    const mailbox = new MemoryMailbox();
    const deliver = vi.fn();
    const subscription = await mailbox.subscribe("a", deliver);

    await mailbox.post("b", message);
    await subscription.close();
    await mailbox.post("a", message);

    expect(deliver).not.toHaveBeenCalled();
  });
});

describe("RedisRoomStore", () => {
  const retain = { rooms: 60_000 };
  let pool: Pool<Redis>;
  let rooms: RedisRoomStore;

  beforeEach(async () => {
    pool = mockPool();
    await pool.use((redis) => redis.flushall());
    rooms = new RedisRoomStore(pool, retain);
  });

  afterEach(async () => {
    await shutdown(pool);
  });

  it("admits members in order up to capacity", async () => {
    expect(await rooms.join("r1", "a", 2)).toEqual(["a"]);
    expect(await rooms.join("r1", "b", 2)).toEqual(["a", "b"]);
    expect(await rooms.join("r1", "a", 2)).toEqual(["a", "b"]);
    expect(await rooms.join("r1", "c", 2)).toBeNull();
    expect(await rooms.members("r1")).toEqual(["a", "b"]);
  });

  it("admits exactly two of several concurrent joins", async () => {
    const results = await Promise.all(
      ["a", "b", "c", "d", "e"].map((id) => rooms.join("r1", id, 2))
    );

    expect(results.filter((members) => members != null)).toHaveLength(2);
    expect(results.filter((members) => members == null)).toHaveLength(3);
    expect(await rooms.members("r1")).toHaveLength(2);
  });

  it("removes members", async () => {
    await rooms.join("r1", "a", 2);
    await rooms.join("r1", "b", 2);

    expect(await rooms.leave("r1", "a")).toEqual(["b"]);
    expect(await rooms.leave("r1", "a")).toBeNull();
    expect(await rooms.members("r1")).toEqual(["b"]);
  });

  it("marks destroyed rooms closed until they are joined again", async () => {
    await rooms.join("r1", "a", 2);
    await rooms.join("r1", "b", 2);

    expect(await rooms.destroy("r1")).toEqual(["a", "b"]);
    expect(await rooms.members("r1")).toEqual([]);
    expect(await rooms.closed("r1")).toBe(true);

    await rooms.join("r1", "c", 2);
    expect(await rooms.closed("r1")).toBe(false);
  });

  it("reserves each unused room once", async () => {
    expect(await rooms.reserve("r1")).toBe(true);
    expect(await rooms.reserve("r1")).toBe(false);

    await rooms.join("r2", "a", 2);
    expect(await rooms.reserve("r2")).toBe(false);
  });
});

describe("RedisMailbox", () => {
  const retain = { rooms: 60_000 };
  const entries: Envelope[] = [
    { type: "room-status", data: '{"type":"room-status","count":1}' },
    { type: "offer", data: '{"type":"offer","x":1}' },
    { type: "peer-disconnected", data: '{"type":"peer-disconnected"}' },
  ];

  it("delivers posts in order and removes the inbox on close", async () => {
    const pool = mockPool();
    await pool.use((redis) => redis.flushall());
    const mailbox = new RedisMailbox(pool, retain, 20);

    const received: Envelope[] = [];
    const subscription = await mailbox.subscribe("p1", (envelope) =>
      received.push(envelope)
    );

    for (const entry of entries) await mailbox.post("p1", entry);
    await until(() => received.length === entries.length);
    expect(received).toEqual(entries);

    await subscription.close();
    const inbox = key("participant", "p1", "inbox");
    expect(await pool.use((redis) => redis.exists(inbox))).toBe(0);

    await shutdown(pool);
  });

  it("reports a failed read once", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const pool = mockPool((client) => {
      vi.spyOn(client, "xread").mockRejectedValue(new Error("connection lost"));
    });
    const mailbox = new RedisMailbox(pool, retain, 20);

    const deliver = vi.fn();
    const fail = vi.fn();
    const subscription = await mailbox.subscribe("p1", deliver, fail);

    await until(() => fail.mock.calls.length > 0);
    expect(fail).toHaveBeenCalledTimes(1);
    expect(fail.mock.calls[0]?.[0]).toMatchObject({
      message: "connection lost",
    });

    await subscription.close();
    expect(deliver).not.toHaveBeenCalled();

    await shutdown(pool);
    vi.restoreAllMocks();
  });
});

describe("Store", () => {
  it("uses memory backends without Redis", async () => {
    const store = Store.fromConfig({
      server: { host: null, port: 0, maxMessageSize: 1024 },
      ice: { servers: [] },
      redis: null,
      retention: { rooms: 1000 },
    });

    expect(store.rooms).toBeInstanceOf(MemoryRoomStore);
    expect(store.mailbox).toBeInstanceOf(MemoryMailbox);
    await expect(store.close()).resolves.toBeUndefined();
  });
});

describe("key", () => {
  it("joins key segments", () => {
    expect(key("room", "r1", "members")).toBe("room:r1:members");
    expect(key("participant", "p1", "inbox")).toBe("participant:p1:inbox");
  });
});

describe("RoomFull", () => {
  it("is a conflict", () => {
    const err = new RoomFull();
    expect(err.status).toBe(409);
    expect(err.message).toBe("Room is full");
    expect(err.name).toBe("RoomFull");
  });
});
