import type {
  Answer,
  Candidate,
  ICE,
  JoinPosition,
  Offer,
  SDPDescription,
} from "./signal";

/**
 * Where one participant is in setting up a call.
 *
 * `have-local-offer` and `have-remote-offer` are the two halves of
 * negotiation; only the initiator passes through the former, and only the
 * responder through the latter.
 */
export type Phase =
  | "idle"
  | "joining"
  | "waiting-for-peer"
  | "have-local-offer"
  | "have-remote-offer"
  | "connected"
  | "ended";

export type Role = "initiator" | "responder";

export type EndReason =
  | "hangup"
  | "peer-disconnected"
  | "call-ended"
  | "transport-failed"
  | "room-full"
  | "relay-lost"
  | "media-denied";

export interface Negotiation {
  readonly phase: Phase;
  readonly role: Role | null;
  /** Whether the last room-status reported a second member. */
  readonly peerPresent: boolean;
  readonly local: SDPDescription | null;
  readonly remote: SDPDescription | null;
  /** Local candidates waiting for a local description to be sent. */
  readonly outgoing: readonly Candidate[];
  /** Remote candidates waiting for a remote description to be applied. */
  readonly incoming: readonly Candidate[];
  readonly ended: EndReason | null;
}

export type NegotiationEvent =
  | { type: "start" }
  | { type: "joined"; joinedAs: JoinPosition }
  | { type: "room-status"; count: number }
  | { type: "offer"; description: SDPDescription }
  | { type: "answer"; description: SDPDescription }
  | { type: "remote-candidate"; candidate: Candidate }
  | { type: "local-candidate"; candidate: Candidate }
  | { type: "local-description"; description: SDPDescription }
  | { type: "end"; reason: EndReason };

export type Effect =
  | { type: "create-offer" }
  | { type: "create-answer" }
  | { type: "set-remote"; description: SDPDescription }
  | { type: "add-candidates"; candidates: readonly Candidate[] }
  | { type: "send"; message: Offer | Answer | ICE }
  | { type: "warn"; message: string }
  | { type: "close"; reason: EndReason };

export interface Transition {
  readonly state: Negotiation;
  readonly effects: readonly Effect[];
}

export const initial: Negotiation = {
  phase: "idle",
  role: null,
  peerPresent: false,
  local: null,
  remote: null,
  outgoing: [],
  incoming: [],
  ended: null,
};

/**
 * Apply one event to a negotiation, returning the next state and the side
 * effects the caller must perform, in order.
 *
 * `state` is never modified. When an event does not change anything, the same
 * state object is returned.
 */
export function apply(state: Negotiation, event: NegotiationEvent): Transition {
  if (state.phase === "ended") return unchanged(state);

  switch (event.type) {
    case "start":
      if (state.phase !== "idle") return unchanged(state);
      return next({ ...state, phase: "joining" });

    case "joined":
      return joined(state, event.joinedAs);

    case "room-status":
      return roomStatus(state, event.count);

    case "offer":
      return offer(state, event.description);

    case "answer":
      return answer(state, event.description);

    case "remote-candidate":
      if (state.remote == null)
        return next({
          ...state,
          incoming: [...state.incoming, event.candidate],
        });
      return next(state, {
        type: "add-candidates",
        candidates: [event.candidate],
      });

    case "local-candidate":
      if (state.local == null)
        return next({
          ...state,
          outgoing: [...state.outgoing, event.candidate],
        });
      return next(state, {
        type: "send",
        message: { type: "ice-candidate", candidate: event.candidate },
      });

    case "local-description":
      return localDescription(state, event.description);

    case "end":
      return next(
        {
          ...state,
          phase: "ended",
          outgoing: [],
          incoming: [],
          ended: event.reason,
        },
        { type: "close", reason: event.reason }
      );
  }
}

function joined(state: Negotiation, joinedAs: JoinPosition): Transition {
  if (state.phase !== "joining")
    return violation(state, `join acknowledged while ${state.phase}`);

  const role: Role = joinedAs === "first" ? "initiator" : "responder";
  const joinedState: Negotiation = {
    ...state,
    phase: "waiting-for-peer",
    role,
  };

  // a room-status may have raced ahead of the acknowledgement
  if (role === "initiator" && state.peerPresent)
    return next(joinedState, { type: "create-offer" });

  return next(joinedState);
}

function roomStatus(state: Negotiation, count: number): Transition {
  const present = count >= 2;
  if (present === state.peerPresent) return unchanged(state);

  const updated: Negotiation = { ...state, peerPresent: present };

  if (
    present &&
    state.phase === "waiting-for-peer" &&
    state.role === "initiator"
  ) {
    return next(updated, { type: "create-offer" });
  }

  return next(updated);
}

function offer(state: Negotiation, description: SDPDescription): Transition {
  if (state.role === "initiator")
    return violation(state, "offer received by the initiator");

  switch (state.phase) {
    case "idle":
    case "joining":
    case "waiting-for-peer":
      break;
    default:
      return violation(state, `offer received while ${state.phase}`);
  }

  const effects: Effect[] = [{ type: "set-remote", description }];
  if (state.incoming.length > 0)
    effects.push({ type: "add-candidates", candidates: state.incoming });
  effects.push({ type: "create-answer" });

  return next(
    {
      ...state,
      phase: "have-remote-offer",
      role: "responder",
      remote: description,
      incoming: [],
    },
    ...effects
  );
}

function answer(state: Negotiation, description: SDPDescription): Transition {
  if (state.phase !== "have-local-offer")
    return violation(state, `answer received while ${state.phase}`);

  const effects: Effect[] = [{ type: "set-remote", description }];
  if (state.incoming.length > 0)
    effects.push({ type: "add-candidates", candidates: state.incoming });

  return next(
    { ...state, phase: "connected", remote: description, incoming: [] },
    ...effects
  );
}

function localDescription(
  state: Negotiation,
  description: SDPDescription
): Transition {
  let phase: Phase;
  let message: Offer | Answer;

  if (
    description.type === "offer" &&
    state.phase === "waiting-for-peer" &&
    state.role === "initiator"
  ) {
    phase = "have-local-offer";
    message = { type: "offer", description };
  } else if (
    description.type === "answer" &&
    state.phase === "have-remote-offer"
  ) {
    phase = "connected";
    message = { type: "answer", description };
  } else {
    return violation(
      state,
      `local ${description.type} created while ${state.phase}`
    );
  }

  const effects: Effect[] = [{ type: "send", message }];
  for (const candidate of state.outgoing) {
    effects.push({
      type: "send",
      message: { type: "ice-candidate", candidate },
    });
  }

  return next(
    { ...state, phase, local: description, outgoing: [] },
    ...effects
  );
}

function next(state: Negotiation, ...effects: Effect[]): Transition {
  return { state, effects };
}

function unchanged(state: Negotiation): Transition {
  return { state, effects: [] };
}

function violation(state: Negotiation, message: string): Transition {
  return { state, effects: [{ type: "warn", message }] };
}
