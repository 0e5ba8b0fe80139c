import type { MediaHandle } from "./media";
import {
  apply,
  type Effect,
  type EndReason,
  initial,
  type Negotiation,
  type NegotiationEvent,
  type Phase,
} from "./negotiation";
import type { Candidate, ClientMessage, SDPDescription } from "./signal";

/**
 * The operations a {@link Tunnel} needs from the underlying real-time
 * transport. {@link browserConnection} adapts an `RTCPeerConnection`.
 */
export interface PeerConnection<M extends MediaHandle = MediaHandle> {
  createOffer(): Promise<SDPDescription>;
  createAnswer(): Promise<SDPDescription>;
  setLocalDescription(description: SDPDescription): Promise<void>;
  setRemoteDescription(description: SDPDescription): Promise<void>;
  addIceCandidate(candidate: Candidate): Promise<void>;
  close(): void;

  onicecandidate: ((candidate: Candidate) => void) | null;
  onstatechange: ((state: RTCPeerConnectionState) => void) | null;
  ontrack: ((media: M) => void) | null;
}

export interface Logger {
  debug(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

export interface TunnelOptions {
  logger?: Logger;
}

/**
 * Drives one participant's {@link Negotiation} against a peer connection.
 *
 * Events go through {@link apply}; the resulting effects that touch the peer
 * connection run one at a time, in the order they were produced.
 */
export class Tunnel<M extends MediaHandle = MediaHandle> extends EventTarget {
  private state: Negotiation = initial;
  private impl: PeerConnection<M> | undefined;
  private pending: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(options?: TunnelOptions) {
    super();
    this.logger = options?.logger ?? console;
  }

  get negotiation(): Negotiation {
    return this.state;
  }

  get phase(): Phase {
    return this.state.phase;
  }

  /** Whether the call has ended; later effects and events are ignored. */
  get ended(): boolean {
    return this.state.phase === "ended";
  }

  /** Attach the peer connection that negotiation effects will run against. */
  attach(connection: PeerConnection<M>) {
    if (this.impl != null) throw new Error("Tunnel already has a connection");
    this.impl = connection;

    if (this.state.phase === "ended") {
      connection.close();
      return;
    }

    connection.onicecandidate = (candidate) => {
      this.dispatch({ type: "local-candidate", candidate });
    };

    connection.onstatechange = (state) => {
      this.logger.debug("transport", state);
      if (state === "failed") {
        this.dispatch({ type: "end", reason: "transport-failed" });
      }
    };

    connection.ontrack = (media) => {
      this.dispatchEvent(new TrackEvent(media));
    };
  }

  /** Apply an event and perform its effects. */
  dispatch(event: NegotiationEvent) {
    const before = this.state.phase;
    const { state, effects } = apply(this.state, event);
    this.state = state;

    if (state.phase !== before) {
      this.dispatchEvent(new StateEvent(state.phase, before));
    }

    for (const effect of effects) this.perform(effect);
  }

  /** Resolves once every queued negotiation effect has finished. */
  async settled(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.pending;
      await current;
    } while (current !== this.pending);
  }

  private perform(effect: Effect) {
    switch (effect.type) {
      case "send":
        this.dispatchEvent(new SignalEvent(effect.message));
        break;

      case "warn":
        this.logger.warn("protocol violation:", effect.message);
        break;

      case "close":
        this.close(effect.reason);
        break;

      default:
        this.schedule(effect);
    }
  }

  private schedule(effect: Effect) {
    this.pending = this.pending.then(async () => {
      if (this.ended) return;

      try {
        await this.run(effect);
      } catch (err) {
        // the connection was closed underneath us
        if (this.ended) return;

        this.logger.error(`negotiation ${effect.type} failed:`, err);
        this.dispatch({ type: "end", reason: "transport-failed" });
      }
    });
  }

  private async run(effect: Effect) {
    const impl = this.impl;
    if (impl == null) throw new Error("Tunnel has no connection");

    switch (effect.type) {
      case "create-offer":
      case "create-answer": {
        const description = await (effect.type === "create-offer"
          ? impl.createOffer()
          : impl.createAnswer());
        await impl.setLocalDescription(description);
        this.dispatch({ type: "local-description", description });
        break;
      }

      case "set-remote":
        await impl.setRemoteDescription(effect.description);
        break;

      case "add-candidates":
        for (const candidate of effect.candidates) {
          try {
            await impl.addIceCandidate(candidate);
          } catch (err) {
            this.logger.warn("Error adding ICE candidate:", err);
          }
        }
        break;
    }
  }

  private close(reason: EndReason) {
    if (this.impl != null) {
      this.impl.onicecandidate = null;
      this.impl.onstatechange = null;
      this.impl.ontrack = null;
      this.impl.close();
    }

    this.dispatchEvent(new EndEvent(reason));
  }

  private readonly handlers: Partial<
    Record<keyof TunnelHandlers, EventListener>
  > = {};

  set onsignal(handler: TunnelHandlers["signal"] | null | undefined) {
    this.setHandler("signal", handler, (event) => {
      if (event instanceof SignalEvent) handler?.(event);
    });
  }

  set ontrack(handler: TunnelHandlers<M>["track"] | null | undefined) {
    this.setHandler("track", handler, (event) => {
      if (event instanceof TrackEvent) handler?.(event);
    });
  }

  set onstatechange(handler: TunnelHandlers["statechange"] | null | undefined) {
    this.setHandler("statechange", handler, (event) => {
      if (event instanceof StateEvent) handler?.(event);
    });
  }

  set onend(handler: TunnelHandlers["end"] | null | undefined) {
    this.setHandler("end", handler, (event) => {
      if (event instanceof EndEvent) handler?.(event);
    });
  }

  private setHandler(
    event: keyof TunnelHandlers,
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

interface TunnelHandlers<M extends MediaHandle = MediaHandle> {
  signal: (event: SignalEvent) => void;
  track: (event: TrackEvent<M>) => void;
  statechange: (event: StateEvent) => void;
  end: (event: EndEvent) => void;
}

/** A message the tunnel needs delivered to the other participant. */
export class SignalEvent extends CustomEvent<{
  readonly message: ClientMessage;
}> {
  constructor(message: ClientMessage) {
    super("signal", { detail: { message } });
  }

  get message(): ClientMessage {
    return this.detail.message;
  }
}

export class TrackEvent<
  M extends MediaHandle = MediaHandle,
> extends CustomEvent<{ readonly media: M }> {
  constructor(media: M) {
    super("track", { detail: { media } });
  }

  get media(): M {
    return this.detail.media;
  }
}

export class StateEvent extends CustomEvent<{
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

/** The negotiation reached `ended`; the peer connection is closed. */
export class EndEvent extends CustomEvent<{ readonly reason: EndReason }> {
  constructor(reason: EndReason) {
    super("end", { detail: { reason } });
  }

  get reason(): EndReason {
    return this.detail.reason;
  }
}
