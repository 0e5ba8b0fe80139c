import type { JoinPosition, Room, RoomState, ServerMessage } from "callpair";
import { generateSlug } from "random-word-slugs";

import { Conflict, type Mailbox, type RoomStore, RoomFull } from "./data";
import { KeyedLock } from "./lock";
import { type Envelope, envelope } from "./message";

export const ROOM_CAPACITY = 2;

export interface Joined {
  joinedAs: JoinPosition;
  members: string[];
}

/**
 * Tracks who is in each room and tells members about each other.
 *
 * Membership changes for one room are serialized; the store's own atomicity
 * covers registries in other processes.
 */
export class RoomRegistry {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly rooms: RoomStore,
    private readonly mailbox: Mailbox
  ) {}

  /**
   * Admit `participant` to `room`, acknowledge the join to them and send the
   * new room status to every member. Throws {@link RoomFull} without changing
   * anything when the room already has two members.
   */
  join(room: string, participant: string): Promise<Joined> {
    return this.lock.run(room, async () => {
      const members = await this.rooms.join(room, participant, ROOM_CAPACITY);
      if (members == null) throw new RoomFull();

      const joinedAs: JoinPosition =
        members[0] === participant ? "first" : "second";

      await this.mailbox.post(
        participant,
        envelope({ type: "join", room, participant, joinedAs })
      );
      await this.send(members, { type: "room-status", count: members.length });

      return { joinedAs, members };
    });
  }

  /**
   * Remove `participant`. The member left behind is told the peer went away;
   * the last one out takes the room with them.
   */
  leave(room: string, participant: string): Promise<string[] | null> {
    return this.lock.run(room, async () => {
      const remaining = await this.rooms.leave(room, participant);
      if (remaining == null || remaining.length === 0) return remaining;

      await this.send(remaining, { type: "peer-disconnected" });
      await this.send(remaining, {
        type: "room-status",
        count: remaining.length,
      });

      return remaining;
    });
  }

  /** Tell the other members the call is over, then destroy the room. */
  end(room: string, sender: string): Promise<string[]> {
    return this.lock.run(room, async () => {
      const members = await this.rooms.destroy(room);
      const others = members.filter((id) => id !== sender);

      await this.send(others, { type: "call-ended" });
      return members;
    });
  }

  /**
   * Deliver `message` as-is to every member but its sender. Returns how many
   * members it was delivered to; nothing is delivered for a non-member.
   */
  async relay(
    room: string,
    sender: string,
    message: Envelope
  ): Promise<number> {
    const members = await this.rooms.members(room);
    if (!members.includes(sender)) return 0;

    const others = members.filter((id) => id !== sender);
    for (const id of others) {
      await this.mailbox.post(id, message);
    }
    return others.length;
  }

  /** Send the current member count to every member. */
  broadcastStatus(room: string): Promise<void> {
    return this.lock.run(room, async () => {
      const members = await this.rooms.members(room);
      await this.send(members, { type: "room-status", count: members.length });
    });
  }

  members(room: string): Promise<string[]> {
    return this.rooms.members(room);
  }

  async status(room: string): Promise<Room> {
    const members = await this.rooms.members(room);

    let state: RoomState;
    if (members.length >= ROOM_CAPACITY) state = "full";
    else if (members.length > 0) state = "waiting-for-peer";
    else state = (await this.rooms.closed(room)) ? "closed" : "empty";

    return { id: room, state, participants: members.length };
  }

  /** Pick an unused room identifier and hold it for the first joiner. */
  async allocate(): Promise<Room> {
    for (let i = 0; i < 4; i++) {
      const id = generateSlug(4);

      if (await this.rooms.reserve(id)) {
        return { id, state: "empty", participants: 0 };
      }
    }

    throw new Conflict("Failed to generate a room name; please try again.");
  }

  private async send(to: string[], message: ServerMessage) {
    const data = envelope(message);
    for (const id of to) {
      await this.mailbox.post(id, data);
    }
  }
}
