import type { Relayed, ServerMessage, SignalType } from "callpair";

export type {
  Answer,
  CallEnded,
  Candidate,
  ClientMessage,
  ErrorMessage,
  ICE,
  Join,
  JoinPosition,
  Offer,
  PeerDisconnected,
  Relayed,
  RoomStatus,
  SDPDescription,
  ServerMessage,
} from "callpair";

/**
 * A message on its way to one participant. `data` is the exact text to send;
 * relayed messages are never re-encoded.
 */
export interface Envelope {
  type: SignalType;
  data: string;
}

export function envelope(message: ServerMessage): Envelope {
  return { type: message.type, data: JSON.stringify(message) };
}

/** What a participant asked the relay to do. */
export type Request =
  | { type: Relayed["type"]; envelope: Envelope }
  | { type: "call-ended" }
  | { type: "error"; error: string };

/** Classify raw participant input by its `type`, leaving the rest untouched. */
export function readRequest(data: string): Request {
  let value: unknown;
  try {
    value = JSON.parse(data);
  } catch {
    return { type: "error", error: "invalid JSON" };
  }

  const type =
    typeof value === "object" && value !== null && "type" in value
      ? value.type
      : undefined;

  if (type === "offer" || type === "answer" || type === "ice-candidate")
    return { type, envelope: { type, data } };
  if (type === "call-ended") return { type };
  if (type === undefined)
    return { type: "error", error: "missing message type" };

  return { type: "error", error: "unsupported message type" };
}
