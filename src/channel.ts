import WebSocket from "ws";

import { SignalError } from "./errors";
import {
  type ClientMessage,
  parseServerMessage,
  type ServerMessage,
} from "./signal";
import type { Logger } from "./tunnel";

/**
 * A persistent text connection to the relay. {@link nodeSocket} and
 * {@link browserSocket} adapt the `ws` package and the browser `WebSocket`.
 */
export interface Socket {
  readonly state: ChannelState;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  listen(listener: SocketListener): void;
}

export interface SocketListener {
  open(): void;
  message(data: string): void;
  close(code: number, reason: string): void;
}

export type ChannelState = "connecting" | "open" | "closing" | "closed";

/** A participant's connection to the signaling relay. */
export class Channel {
  public onopen?: () => void;
  public onclose?: (code: number, reason: string) => void;
  private _onmessage?: (message: ServerMessage) => void;

  private queue: ServerMessage[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly socket: Socket,
    options?: { logger?: Logger }
  ) {
    this.logger = options?.logger ?? console;

    socket.listen({
      open: () => this.onopen?.(),
      message: (data) => this.receive(data),
      close: (code, reason) => this.onclose?.(code, reason),
    });
  }

  get open(): boolean {
    return this.socket.state === "open";
  }

  get state(): ChannelState {
    return this.socket.state;
  }

  public close(code?: number, reason?: string) {
    if (this.socket.state === "closing" || this.socket.state === "closed")
      return;
    this.socket.close(code, reason);
  }

  public send(message: ClientMessage) {
    if (!this.open) {
      this.logger.warn(
        `Dropping ${message.type}; relay channel is ${this.state}`
      );
      return;
    }
    this.socket.send(JSON.stringify(message));
  }

  get onmessage(): ((message: ServerMessage) => void) | undefined {
    return this._onmessage;
  }

  /** Messages received before a handler is set are delivered to it later. */
  set onmessage(handler: ((message: ServerMessage) => void) | undefined) {
    const trigger = this._onmessage == null && handler != null;
    this._onmessage = handler;
    if (trigger) setTimeout(this.deliverQueued.bind(this), 0);
  }

  private receive(data: string) {
    let message: ServerMessage;
    try {
      message = parseServerMessage(data);
    } catch (err) {
      if (!(err instanceof SignalError)) throw err;
      this.logger.warn("Ignoring relay message:", err.message);
      return;
    }

    this.deliver(message);
  }

  private deliver(message: ServerMessage) {
    if (this._onmessage && this.queue.length === 0) this._onmessage(message);
    else this.queue.push(message);
  }

  private deliverQueued() {
    const pending = this.queue;
    this.queue = [];

    for (const message of pending) {
      if (this._onmessage) this._onmessage(message);
      else this.queue.push(message);
    }
  }
}

/** A {@link Socket} over the `ws` package, for Node.js participants. */
export function nodeSocket(url: string | URL): Socket {
  const ws = new WebSocket(url);

  return {
    get state() {
      return socketState(ws.readyState);
    },
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    listen(listener) {
      ws.on("open", () => listener.open());
      ws.on("message", (data, isBinary) => {
        if (!isBinary) listener.message(data.toString());
      });
      ws.on("close", (code, reason) => listener.close(code, reason.toString()));
      ws.on("error", (err) =>
        console.error("relay socket error:", err.message)
      );
    },
  };
}

export function socketState(readyState: number): ChannelState {
  switch (readyState) {
    case 0:
      return "connecting";
    case 1:
      return "open";
    case 2:
      return "closing";
    case 3:
      return "closed";
  }

  throw new TypeError("unreachable");
}
