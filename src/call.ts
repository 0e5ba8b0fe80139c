import { generateSlug } from "random-word-slugs";

import type { Channel } from "./channel";
import type { Endpoint } from "./endpoint";
import { CallError } from "./errors";
import { describeMediaError, type MediaHandle, release, toggle } from "./media";
import type { EndReason, Phase } from "./negotiation";
import {
  CloseCode,
  isRoomId,
  type JoinPosition,
  type ServerMessage,
} from "./signal";
import { type Logger, type PeerConnection, Tunnel } from "./tunnel";

export interface CallOptions<M extends MediaHandle> {
  endpoint: Endpoint;
  /** Acquire the local camera and microphone. */
  acquire(): Promise<M>;
  /** Create a peer connection which carries `media`. */
  connect(media: M, configuration: RTCConfiguration): PeerConnection<M>;
  /** Open a relay channel for `room`. */
  channel(room: string): Channel;
  logger?: Logger;
}

export interface HostOptions<M extends MediaHandle> extends CallOptions<M> {
  /** Provide a room identifier, e.g. from {@link Client.createRoom}. */
  allocate?: () => Promise<string>;
}

/** User-visible messages for the ways a call can end. */
export const notices: Readonly<Record<EndReason, string | null>> = {
  hangup: null,
  "media-denied": null,
  "peer-disconnected": "Other person has left the call",
  "call-ended": "Call has been ended",
  "transport-failed": "Connection failed. Please try again.",
  "room-full": "Room is full. Please try again later.",
  "relay-lost": "Lost connection to server.",
};

/**
 * One participant's side of a two-party call: owns the local media, the
 * {@link Tunnel} negotiating the peer connection, and the relay channel.
 */
export class Call<M extends MediaHandle = MediaStream> extends EventTarget {
  public readonly room: string;

  private readonly options: CallOptions<M>;
  private readonly tunnel: Tunnel<M>;
  private readonly logger: Logger;

  private media: M | undefined;
  private channel: Channel | undefined;
  private joining:
    | { resolve(position: JoinPosition): void; reject(err: Error): void }
    | undefined;

  constructor(room: string, options: CallOptions<M>) {
    super();

    if (!isRoomId(room))
      throw new CallError("invalid-link", `Invalid room identifier "${room}"`);

    this.room = room;
    this.options = options;
    this.logger = options.logger ?? console;
    this.tunnel = new Tunnel<M>({ logger: this.logger });

    this.tunnel.onsignal = ({ message }) => this.channel?.send(message);
    this.tunnel.ontrack = ({ media }) =>
      this.dispatchEvent(new MediaEvent(media));
    this.tunnel.onstatechange = ({ phase, previous }) =>
      this.dispatchEvent(new PhaseEvent(phase, previous));
    this.tunnel.onend = ({ reason }) => this.teardown(reason);
  }

  /** Start a call in a new room. */
  static async host<M extends MediaHandle>(
    options: HostOptions<M>
  ): Promise<Call<M>> {
    const { allocate, ...rest } = options;
    const room = allocate != null ? await allocate() : generateRoomId();
    return new Call(room, rest);
  }

  /** Join the room named by a shared link's `room` parameter. */
  static fromLink<M extends MediaHandle>(
    link: string | URL,
    options: CallOptions<M>
  ): Call<M> {
    const room = roomFromLink(link);
    if (room == null)
      throw new CallError("invalid-link", "This link does not name a call.");
    return new Call(room, options);
  }

  /** A link which others can open to join `room`. */
  static shareLink(room: string, base: string | URL): URL {
    const url = new URL(base);
    url.searchParams.set("room", room);
    return url;
  }

  get phase(): Phase {
    return this.tunnel.phase;
  }

  get local(): M | undefined {
    return this.media;
  }

  get negotiation() {
    return this.tunnel.negotiation;
  }

  /**
   * Acquire media, join the room and wait for the relay's acknowledgement.
   *
   * Resolves with whether this participant joined first (and so will make the
   * offer) or second. Rejects with a {@link CallError} when media access is
   * denied or the room is full.
   */
  async start(): Promise<JoinPosition> {
    if (this.phase !== "idle")
      throw new CallError("invalid-state", "This call has already started.");

    this.tunnel.dispatch({ type: "start" });

    let media: M;
    try {
      media = await this.options.acquire();
    } catch (err) {
      this.logger.error("Error accessing media devices:", err);
      const error = new CallError(
        "permission-denied",
        describeMediaError(err),
        { cause: err }
      );
      this.tunnel.dispatch({ type: "end", reason: "media-denied" });
      throw error;
    }

    // hung up while waiting for media
    if (this.tunnel.ended) {
      release(media);
      throw new CallError("aborted", "The call ended before it started.");
    }

    this.media = media;
    this.tunnel.attach(
      this.options.connect(media, this.options.endpoint.configuration)
    );

    const joined = new Promise<JoinPosition>((resolve, reject) => {
      this.joining = { resolve, reject };
    });

    const channel = this.options.channel(this.room);
    this.channel = channel;

    channel.onmessage = (message) => this.receive(message);
    channel.onclose = (code, reason) => this.disconnected(code, reason);

    return joined;
  }

  /** Hang up. Safe to call at any time, any number of times. */
  end() {
    this.tunnel.dispatch({ type: "end", reason: "hangup" });
  }

  /**
   * Mute or unmute the microphone; flips the current state when `muted` is
   * omitted. Returns whether audio is now muted.
   */
  muteAudio(muted?: boolean): boolean {
    const tracks = this.media?.getAudioTracks() ?? [];
    return !toggle(tracks, muted == null ? undefined : !muted);
  }

  /**
   * Turn the camera off or on; flips the current state when `disabled` is
   * omitted. Returns whether video is now disabled.
   */
  disableVideo(disabled?: boolean): boolean {
    const tracks = this.media?.getVideoTracks() ?? [];
    return !toggle(tracks, disabled == null ? undefined : !disabled);
  }

  private receive(message: ServerMessage) {
    switch (message.type) {
      case "join":
        this.tunnel.dispatch({ type: "joined", joinedAs: message.joinedAs });
        this.joining?.resolve(message.joinedAs);
        this.joining = undefined;
        break;

      case "room-status":
        this.tunnel.dispatch(message);
        break;

      case "offer":
      case "answer":
        this.tunnel.dispatch(message);
        break;

      case "ice-candidate":
        this.tunnel.dispatch({
          type: "remote-candidate",
          candidate: message.candidate,
        });
        break;

      case "peer-disconnected":
      case "call-ended":
        this.tunnel.dispatch({ type: "end", reason: message.type });
        break;

      case "error":
        this.logger.warn("Relay reported an error:", message.error);
    }
  }

  private disconnected(code: number, reason: string) {
    this.logger.debug("relay closed", code, reason);

    if (code === CloseCode.RoomFull) {
      this.tunnel.dispatch({ type: "end", reason: "room-full" });
    } else {
      this.tunnel.dispatch({ type: "end", reason: "relay-lost" });
    }
  }

  private teardown(reason: EndReason) {
    const channel = this.channel;
    if (channel != null) {
      if (reason === "hangup" && channel.open)
        channel.send({ type: "call-ended" });
      channel.onclose = undefined;
      channel.close(CloseCode.CallEnded, "Call ended");
    }

    if (this.media != null) release(this.media);

    const joining = this.joining;
    this.joining = undefined;
    joining?.reject(joinFailure(reason));

    const notice = notices[reason];
    if (notice != null) this.dispatchEvent(new NoticeEvent(reason, notice));

    this.dispatchEvent(new EndedEvent(reason));
  }

  private readonly handlers: Partial<
    Record<keyof CallHandlers, EventListener>
  > = {};

  set onstatechange(handler: CallHandlers["statechange"] | null | undefined) {
    this.setHandler("statechange", handler, (event) => {
      if (event instanceof PhaseEvent) handler?.(event);
    });
  }

  set ontrack(handler: CallHandlers<M>["track"] | null | undefined) {
    this.setHandler("track", handler, (event) => {
      if (event instanceof MediaEvent) handler?.(event);
    });
  }

  set onnotice(handler: CallHandlers["notice"] | null | undefined) {
    this.setHandler("notice", handler, (event) => {
      if (event instanceof NoticeEvent) handler?.(event);
    });
  }

  set onended(handler: CallHandlers["ended"] | null | undefined) {
    this.setHandler("ended", handler, (event) => {
      if (event instanceof EndedEvent) handler?.(event);
    });
  }

  private setHandler(
    event: keyof CallHandlers,
    handler: unknown,
    listener: EventListener
  ) {
    const current = this.handlers[event];
    if (current) this.removeEventListener(event, current);

    if (handler) {
      this.addEventListener(event, listener);
      this.handlers[event] = listener;
    } else {
      delete this.handlers[event];
    }
  }
}

interface CallHandlers<M extends MediaHandle = MediaHandle> {
  statechange: (event: PhaseEvent) => void;
  track: (event: MediaEvent<M>) => void;
  notice: (event: NoticeEvent) => void;
  ended: (event: EndedEvent) => void;
}

export class PhaseEvent extends CustomEvent<{
  readonly phase: Phase;
  readonly previous: Phase;
}> {
  constructor(phase: Phase, previous: Phase) {
    super("statechange", { detail: { phase, previous } });
  }

  get phase(): Phase {
    return this.detail.phase;
  }

  get previous(): Phase {
    return this.detail.previous;
  }
}

/** Remote media arrived from the other participant. */
export class MediaEvent<
  M extends MediaHandle = MediaHandle,
> extends CustomEvent<{ readonly media: M }> {
  constructor(media: M) {
    super("track", { detail: { media } });
  }

  get media(): M {
    return this.detail.media;
  }
}

/** Something the user should be told about. */
export class NoticeEvent extends CustomEvent<{
  readonly reason: EndReason;
  readonly message: string;
}> {
  constructor(reason: EndReason, message: string) {
    super("notice", { detail: { reason, message } });
  }

  get reason(): EndReason {
    return this.detail.reason;
  }

  get message(): string {
    return this.detail.message;
  }
}

export class EndedEvent extends CustomEvent<{ readonly reason: EndReason }> {
  constructor(reason: EndReason) {
    super("ended", { detail: { reason } });
  }

  get reason(): EndReason {
    return this.detail.reason;
  }
}

/** Read the room identifier from a shared link. */
export function roomFromLink(link: string | URL): string | null {
  let url: URL;
  try {
    url = new URL(link);
  } catch {
    return null;
  }

  const room = url.searchParams.get("room");
  return isRoomId(room) ? room : null;
}

export function generateRoomId(): string {
  return generateSlug(4);
}

function joinFailure(reason: EndReason): CallError {
  switch (reason) {
    case "room-full":
      return new CallError("room-full", notices["room-full"] ?? reason);
    case "relay-lost":
      return new CallError(
        "relay-unavailable",
        "Could not connect to the call server."
      );
    default:
      return new CallError("aborted", "The call ended before it started.");
  }
}
