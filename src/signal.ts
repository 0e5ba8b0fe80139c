import { SignalError } from "./errors";

/** A message sent by the relay to a participant. */
export type ServerMessage =
  | Join
  | RoomStatus
  | Offer
  | Answer
  | ICE
  | PeerDisconnected
  | CallEnded
  | ErrorMessage;

/** A message a participant may send to the relay. */
export type ClientMessage = Offer | Answer | ICE | CallEnded;

/** Messages the relay forwards verbatim to the other member of a room. */
export type Relayed = Offer | Answer | ICE;

export type SignalType = ServerMessage["type"];

/** Acknowledges a registry join; `joinedAs` decides who initiates. */
export interface Join {
  type: "join";
  room: string;
  participant: string;
  joinedAs: JoinPosition;
}

export type JoinPosition = "first" | "second";

/** Sent to every member whenever room membership changes. */
export interface RoomStatus {
  type: "room-status";
  count: number;
}

export interface Offer {
  type: "offer";
  description: SDPDescription;
}

export interface Answer {
  type: "answer";
  description: SDPDescription;
}

/** One ICE {@link Candidate} gathered by the sending peer. */
export interface ICE {
  type: "ice-candidate";
  candidate: Candidate;
}

export interface PeerDisconnected {
  type: "peer-disconnected";
}

export interface CallEnded {
  type: "call-ended";
}

export interface ErrorMessage {
  type: "error";
  error: string;
}

/** An ICE candidate. */
export type Candidate = [attrs: string, media: CandidateMedia | null];

export type CandidateMedia = [id: string | null, index: number | null];

export interface SDPDescription {
  type: SDPDescriptionType;
  contents: string;
}

export type SDPDescriptionType = "offer" | "answer" | "pranswer" | "rollback";

/** WebSocket close codes used by the relay. */
export const CloseCode = {
  CallEnded: 1000,
  InternalError: 1011,
  RoomFull: 4000,
  InvalidRoom: 4001,
} as const;

const roomPattern = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

export function isRoomId(value: unknown): value is string {
  return typeof value === "string" && roomPattern.test(value);
}

/**
 * Parse and validate a message received from the relay.
 *
 * Throws a {@link SignalError} if `data` is not a well-formed
 * {@link ServerMessage}.
 */
export function parseServerMessage(data: string): ServerMessage {
  let value: unknown;
  try {
    value = JSON.parse(data);
  } catch {
    throw new SignalError("Relay sent invalid JSON");
  }

  if (!isRecord(value) || typeof value.type !== "string")
    throw new SignalError("Relay message has no type");

  switch (value.type) {
    case "join": {
      const { room, participant, joinedAs } = value;
      if (
        !isRoomId(room) ||
        typeof participant !== "string" ||
        (joinedAs !== "first" && joinedAs !== "second")
      )
        throw new SignalError("Malformed join message");
      return { type: "join", room, participant, joinedAs };
    }

    case "room-status": {
      const { count } = value;
      if (typeof count !== "number" || !Number.isInteger(count) || count < 0)
        throw new SignalError("Malformed room-status message");
      return { type: "room-status", count };
    }

    case "offer":
    case "answer": {
      const description = parseDescription(value.description);
      if (description == null || description.type !== value.type)
        throw new SignalError(`Malformed ${value.type} message`);
      return { type: value.type, description };
    }

    case "ice-candidate": {
      const candidate = parseCandidate(value.candidate);
      if (candidate == null)
        throw new SignalError("Malformed ice-candidate message");
      return { type: "ice-candidate", candidate };
    }

    case "peer-disconnected":
    case "call-ended":
      return { type: value.type };

    case "error":
      return {
        type: "error",
        error: typeof value.error === "string" ? value.error : "unknown error",
      };
  }

  throw new SignalError(`Unsupported message type ${value.type}`);
}

function parseDescription(value: unknown): SDPDescription | null {
  if (!isRecord(value)) return null;

  const { type, contents } = value;
  if (typeof contents !== "string") return null;

  switch (type) {
    case "offer":
    case "answer":
    case "pranswer":
    case "rollback":
      return { type, contents };
  }
  return null;
}

function parseCandidate(value: unknown): Candidate | null {
  if (!Array.isArray(value) || value.length !== 2) return null;

  const [attrs, media]: unknown[] = value;
  if (typeof attrs !== "string") return null;
  if (media === null) return [attrs, null];

  if (!Array.isArray(media) || media.length !== 2) return null;

  const [id, index]: unknown[] = media;
  if (id !== null && typeof id !== "string") return null;
  if (index !== null && typeof index !== "number") return null;

  return [attrs, [id, index]];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
