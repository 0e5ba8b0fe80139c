import { createPool, type Pool } from "generic-pool";
import { Redis } from "ioredis";
import ms from "ms";

import type { Config, RedisConfig, RetentionConfig } from "./config";
import type { Envelope } from "./message";

/** Ordered room membership. A room with no members does not exist. */
export interface RoomStore {
  /**
   * Add `participant` to `room` unless it already holds `capacity` members.
   * Returns the members after the join, or `null` when the room is full.
   * Joining twice is not an error.
   */
  join(
    room: string,
    participant: string,
    capacity: number
  ): Promise<string[] | null>;
  /** Returns the remaining members, or `null` if `participant` was not one. */
  leave(room: string, participant: string): Promise<string[] | null>;
  members(room: string): Promise<string[]>;
  /** Remove every member and mark the room closed. Returns who was removed. */
  destroy(room: string): Promise<string[]>;
  /** Whether the room was destroyed (and not joined again since). */
  closed(room: string): Promise<boolean>;
  /** Claim an unused room identifier. Returns `false` if it is taken. */
  reserve(room: string): Promise<boolean>;
}

/** Per-participant delivery queue; entries arrive in the order posted. */
export interface Mailbox {
  post(participant: string, envelope: Envelope): Promise<void>;
  /**
   * Deliver everything posted to `participant` until the subscription is
   * closed. `fail` is called at most once if delivery stops on its own.
   */
  subscribe(
    participant: string,
    deliver: (envelope: Envelope) => void,
    fail?: (err: unknown) => void
  ): Promise<Subscription>;
}

export interface Subscription {
  close(): Promise<void>;
}

export const defaultRetention: RetentionConfig = { rooms: ms("30h") };

export class Store {
  constructor(
    public readonly rooms: RoomStore,
    public readonly mailbox: Mailbox,
    private readonly shutdown: () => Promise<void> = async () => {}
  ) {}

  static fromConfig(config: Config): Store {
    if (config.redis == null) return Store.memory(config.retention);

    const pool = createRedisPool(config.redis);
    return new Store(
      new RedisRoomStore(pool, config.retention),
      new RedisMailbox(pool, config.retention, config.redis.block),
      async () => {
        await pool.drain();
        await pool.clear();
      }
    );
  }

  static memory(retain: RetentionConfig = defaultRetention): Store {
    return new Store(new MemoryRoomStore(retain), new MemoryMailbox());
  }

  close(): Promise<void> {
    return this.shutdown();
  }
}

function createRedisPool(config: RedisConfig): Pool<Redis> {
  const { url, pool: poolOptions, block: _block, ...options } = config;

  return createPool<Redis>(
    {
      async create() {
        return new Redis(url, options);
      },
      async destroy(client: Redis): Promise<void> {
        await client.quit();
      },
    },
    poolOptions
  );
}

export class MemoryRoomStore implements RoomStore {
  private readonly rooms = new Map<string, string[]>();
  /** Expiry times of closed and reserved markers. */
  private readonly marks = new Map<string, number>();

  constructor(private readonly retain: RetentionConfig = defaultRetention) {}

  async join(
    room: string,
    participant: string,
    capacity: number
  ): Promise<string[] | null> {
    const members = this.rooms.get(room) ?? [];
    if (members.includes(participant)) return [...members];
    if (members.length >= capacity) return null;

    members.push(participant);
    this.rooms.set(room, members);
    this.marks.delete(key("room", room, "closed"));

    return [...members];
  }

  async leave(room: string, participant: string): Promise<string[] | null> {
    const members = this.rooms.get(room);
    if (members == null || !members.includes(participant)) return null;

    const remaining = members.filter((id) => id !== participant);
    if (remaining.length > 0) this.rooms.set(room, remaining);
    else this.rooms.delete(room);

    return [...remaining];
  }

  async members(room: string): Promise<string[]> {
    return [...(this.rooms.get(room) ?? [])];
  }

  async destroy(room: string): Promise<string[]> {
    const members = this.rooms.get(room) ?? [];
    this.rooms.delete(room);
    this.mark(key("room", room, "closed"));
    return members;
  }

  async closed(room: string): Promise<boolean> {
    return this.marked(key("room", room, "closed"));
  }

  async reserve(room: string): Promise<boolean> {
    const reserved = key("room", room, "reserved");
    if (this.rooms.has(room) || this.marked(reserved)) return false;

    this.mark(reserved);
    return true;
  }

  /** Live closed and reserved markers. */
  get markers(): number {
    this.sweep(Date.now());
    return this.marks.size;
  }

  private mark(k: string) {
    const now = Date.now();
    this.sweep(now);

    // re-inserting keeps the map in expiry order
    this.marks.delete(k);
    this.marks.set(k, now + this.retain.rooms);
  }

  private sweep(now: number) {
    for (const [k, expires] of this.marks) {
      if (expires > now) break;
      this.marks.delete(k);
    }
  }

  private marked(k: string): boolean {
    const expires = this.marks.get(k);
    if (expires == null) return false;
    if (expires > Date.now()) return true;

    this.marks.delete(k);
    return false;
  }
}

/** Delivers synchronously to the subscriber; posts to nobody are dropped. */
export class MemoryMailbox implements Mailbox {
  private readonly subscribers = new Map<
    string,
    (envelope: Envelope) => void
  >();

  async post(participant: string, envelope: Envelope): Promise<void> {
    this.subscribers.get(participant)?.(envelope);
  }

  async subscribe(
    participant: string,
    deliver: (envelope: Envelope) => void
  ): Promise<Subscription> {
    this.subscribers.set(participant, deliver);

    return {
      close: async () => {
        if (this.subscribers.get(participant) === deliver)
          this.subscribers.delete(participant);
      },
    };
  }
}

const joinScript = `
local members = redis.call("LRANGE", KEYS[1], 0, -1)
for _, member in ipairs(members) do
  if member == ARGV[1] then return members end
end
if #members >= tonumber(ARGV[2]) then return -1 end
redis.call("RPUSH", KEYS[1], ARGV[1])
redis.call("PEXPIRE", KEYS[1], ARGV[3])
redis.call("DEL", KEYS[2])
return redis.call("LRANGE", KEYS[1], 0, -1)
`;

const leaveScript = `
if redis.call("LREM", KEYS[1], 0, ARGV[1]) == 0 then return -1 end
return redis.call("LRANGE", KEYS[1], 0, -1)
`;

const destroyScript = `
local members = redis.call("LRANGE", KEYS[1], 0, -1)
redis.call("DEL", KEYS[1])
redis.call("SET", KEYS[2], "1", "PX", ARGV[1])
return members
`;

const reserveScript = `
if redis.call("EXISTS", KEYS[1]) == 1 then return 0 end
if redis.call("SET", KEYS[2], "1", "PX", ARGV[1], "NX") then return 1 end
return 0
`;

/**
 * Keeps each room's members in a Redis list. Every mutation is a Lua script,
 * so the capacity check and insert are atomic across relay instances.
 */
export class RedisRoomStore implements RoomStore {
  constructor(
    private readonly pool: Pool<Redis>,
    private readonly retain: RetentionConfig
  ) {}

  join(
    room: string,
    participant: string,
    capacity: number
  ): Promise<string[] | null> {
    return this.pool.use(async (redis) => {
      const result = await redis.eval(
        joinScript,
        2,
        key("room", room, "members"),
        key("room", room, "closed"),
        participant,
        capacity,
        this.retain.rooms
      );
      return result === -1 ? null : strings(result);
    });
  }

  leave(room: string, participant: string): Promise<string[] | null> {
    return this.pool.use(async (redis) => {
      const result = await redis.eval(
        leaveScript,
        1,
        key("room", room, "members"),
        participant
      );
      return result === -1 ? null : strings(result);
    });
  }

  members(room: string): Promise<string[]> {
    return this.pool.use((redis) =>
      redis.lrange(key("room", room, "members"), 0, -1)
    );
  }

  destroy(room: string): Promise<string[]> {
    return this.pool.use(async (redis) =>
      strings(
        await redis.eval(
          destroyScript,
          2,
          key("room", room, "members"),
          key("room", room, "closed"),
          this.retain.rooms
        )
      )
    );
  }

  closed(room: string): Promise<boolean> {
    return this.pool.use(
      async (redis) => (await redis.exists(key("room", room, "closed"))) > 0
    );
  }

  reserve(room: string): Promise<boolean> {
    return this.pool.use(async (redis) => {
      const result = await redis.eval(
        reserveScript,
        2,
        key("room", room, "members"),
        key("room", room, "reserved"),
        this.retain.rooms
      );
      return result === 1;
    });
  }
}

/**
 * Each participant's mailbox is a stream; a subscription holds one pooled
 * client in a blocking `XREAD` loop until it is closed.
 */
export class RedisMailbox implements Mailbox {
  constructor(
    private readonly pool: Pool<Redis>,
    private readonly retain: RetentionConfig,
    private readonly block: number
  ) {}

  post(participant: string, envelope: Envelope): Promise<void> {
    return this.pool.use(async (redis) => {
      const inbox = key("participant", participant, "inbox");

      await redis
        .pipeline()
        .xadd(inbox, "*", "type", envelope.type, "data", envelope.data)
        .pexpire(inbox, this.retain.rooms)
        .exec();
    });
  }

  async subscribe(
    participant: string,
    deliver: (envelope: Envelope) => void,
    fail?: (err: unknown) => void
  ): Promise<Subscription> {
    const inbox = key("participant", participant, "inbox");
    const redis = await this.pool.acquire();

    let open = true;
    let cursor = "0";

    const read = async () => {
      while (open) {
        const result = await redis.xread(
          "BLOCK",
          this.block,
          "STREAMS",
          inbox,
          cursor
        );
        if (result == null) continue;

        for (const [, entries] of result) {
          for (const [id, fields] of entries) {
            cursor = id;
            const entry = readEntry(fields);
            if (open && entry != null) deliver(entry);
          }
        }
      }
    };

    const loop = read().then(
      () => this.pool.release(redis),
      async (err: unknown) => {
        const failed = open;
        open = false;

        if (failed) {
          console.error(
            new Date().toISOString(),
            "[error] mailbox",
            `participant=${participant}`,
            err
          );
          fail?.(err);
        }

        await this.pool.destroy(redis);
      }
    );

    return {
      close: async () => {
        open = false;
        await loop;
        await this.pool.use((client) => client.del(inbox));
      },
    };
  }
}

function readEntry(fields: string[]): Envelope | null {
  let type: string | undefined;
  let data: string | undefined;

  for (let i = 0; i < fields.length - 1; i += 2) {
    const value = fields[i + 1];
    if (fields[i] === "type") type = value;
    else if (fields[i] === "data") data = value;
  }

  if (type == null || data == null || !isSignalType(type)) return null;
  return { type, data };
}

const signalTypes = new Set<string>([
  "join",
  "room-status",
  "offer",
  "answer",
  "ice-candidate",
  "peer-disconnected",
  "call-ended",
  "error",
] satisfies Envelope["type"][]);

function isSignalType(value: string): value is Envelope["type"] {
  return signalTypes.has(value);
}

function strings(value: unknown): string[] {
  if (!Array.isArray(value)) throw new TypeError("Expected a list from Redis");
  return value.map(String);
}

export function key(...segments: Key): string {
  return segments.join(":");
}

/** Defines all valid storage keys. */
type Key =
  | [root: "room", id: string, list: "members"]
  | [root: "room", id: string, flag: "closed"]
  | [root: "room", id: string, flag: "reserved"]
  | [root: "participant", id: string, stream: "inbox"];

export abstract class ResponseError extends Error {
  public abstract readonly status: number;
}

export class Conflict extends ResponseError {
  public readonly name: string = "Conflict";
  public readonly status = 409;
}

export class InvalidInput extends ResponseError {
  public readonly name: string = "InvalidInput";
  public readonly status = 422;
}

/** A third participant tried to join a two-person room. */
export class RoomFull extends ResponseError {
  public readonly name: string = "RoomFull";
  public readonly status = 409;

  constructor(message?: string) {
    super(message ?? "Room is full");
  }
}
