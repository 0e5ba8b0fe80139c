import type { ChannelState, Socket, SocketListener } from "./channel";
import type { MediaHandle, MediaTrack } from "./media";
import type { Candidate, SDPDescription } from "./signal";
import type { PeerConnection } from "./tunnel";

/** In-memory stand-ins for the platform objects a call drives. */

export class FakeTrack implements MediaTrack {
  public enabled = true;
  public stopped = false;

  constructor(public readonly kind: "audio" | "video") {}

  stop() {
    this.stopped = true;
  }
}

export class FakeMedia implements MediaHandle {
  public readonly audio = new FakeTrack("audio");
  public readonly video = new FakeTrack("video");

  getTracks(): FakeTrack[] {
    return [this.audio, this.video];
  }

  getAudioTracks(): FakeTrack[] {
    return [this.audio];
  }

  getVideoTracks(): FakeTrack[] {
    return [this.video];
  }
}

export type PeerCall =
  | { method: "createOffer" | "createAnswer" | "close" }
  | {
      method: "setLocalDescription" | "setRemoteDescription";
      description: SDPDescription;
    }
  | { method: "addIceCandidate"; candidate: Candidate };

export class FakePeerConnection implements PeerConnection<FakeMedia> {
  public onicecandidate: ((candidate: Candidate) => void) | null = null;
  public onstatechange: ((state: RTCPeerConnectionState) => void) | null = null;
  public ontrack: ((media: FakeMedia) => void) | null = null;

  public readonly calls: PeerCall[] = [];
  public closed = false;

  /** Make the next call to this method reject. */
  public failing = new Set<
    "createOffer" | "setRemoteDescription" | "addIceCandidate"
  >();

  constructor(public readonly label = "peer") {}

  async createOffer(): Promise<SDPDescription> {
    this.calls.push({ method: "createOffer" });
    if (this.failing.delete("createOffer"))
      throw new Error("createOffer failed");
    return { type: "offer", contents: `offer from ${this.label}` };
  }

  async createAnswer(): Promise<SDPDescription> {
    this.calls.push({ method: "createAnswer" });
    return { type: "answer", contents: `answer from ${this.label}` };
  }

  async setLocalDescription(description: SDPDescription): Promise<void> {
    this.calls.push({ method: "setLocalDescription", description });
  }

  async setRemoteDescription(description: SDPDescription): Promise<void> {
    this.calls.push({ method: "setRemoteDescription", description });
    if (this.failing.delete("setRemoteDescription"))
      throw new Error("setRemoteDescription failed");
  }

  async addIceCandidate(candidate: Candidate): Promise<void> {
    this.calls.push({ method: "addIceCandidate", candidate });
    if (this.failing.delete("addIceCandidate"))
      throw new Error("addIceCandidate failed");
  }

  close() {
    this.calls.push({ method: "close" });
    this.closed = true;
  }

  get methods(): string[] {
    return this.calls.map(({ method }) => method);
  }

  emitCandidate(candidate: Candidate) {
    this.onicecandidate?.(candidate);
  }

  emitState(state: RTCPeerConnectionState) {
    this.onstatechange?.(state);
  }

  emitTrack(media: FakeMedia) {
    this.ontrack?.(media);
  }
}

export class FakeSocket implements Socket {
  public state: ChannelState = "connecting";
  public readonly sent: string[] = [];
  public closedWith: { code?: number; reason?: string } | undefined;

  private listener: SocketListener | undefined;

  send(data: string) {
    this.sent.push(data);
  }

  close(code?: number, reason?: string) {
    this.state = "closing";
    this.closedWith = { code, reason };
  }

  listen(listener: SocketListener) {
    this.listener = listener;
  }

  /** Messages sent so far, parsed. */
  get messages(): unknown[] {
    return this.sent.map((data): unknown => JSON.parse(data));
  }

  open() {
    this.state = "open";
    this.listener?.open();
  }

  receive(message: object | string) {
    this.listener?.message(
      typeof message === "string" ? message : JSON.stringify(message)
    );
  }

  closed(code: number, reason = "") {
    this.state = "closed";
    this.listener?.close(code, reason);
  }
}

/** A logger which records what it was given. */
export function recordingLogger() {
  const lines: { level: "debug" | "warn" | "error"; data: unknown[] }[] = [];
  return {
    lines,
    debug: (...data: unknown[]) => lines.push({ level: "debug", data }),
    warn: (...data: unknown[]) => lines.push({ level: "warn", data }),
    error: (...data: unknown[]) => lines.push({ level: "error", data }),
  };
}

/** Wait for queued timers and microtasks to run. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
