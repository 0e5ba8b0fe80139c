import { describe, expect, it, vi } from "vitest";

import type { Candidate, ClientMessage } from "./signal";
import { FakeMedia, FakePeerConnection, recordingLogger } from "./testing";
import { type EndEvent, type StateEvent, Tunnel } from "./tunnel";

const candidate: Candidate = [
  "candidate:1 1 udp 1 10.0.0.1 5000 typ host",
  ["0", 0],
];

function setup() {
  const logger = recordingLogger();
  const tunnel = new Tunnel<FakeMedia>({ logger });
  const peer = new FakePeerConnection("alice");
  const sent: ClientMessage[] = [];

  tunnel.onsignal = ({ message }) => sent.push(message);
  tunnel.attach(peer);

  return { tunnel, peer, sent, logger };
}

describe("Tunnel", () => {
  it("creates and sends an offer as the initiator", async () => {
    const { tunnel, peer, sent } = setup();

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "first" });
    tunnel.dispatch({ type: "room-status", count: 2 });
    await tunnel.settled();

    expect(peer.methods).toEqual(["createOffer", "setLocalDescription"]);
    expect(tunnel.phase).toBe("have-local-offer");
    expect(sent).toEqual([
      {
        type: "offer",
        description: { type: "offer", contents: "offer from alice" },
      },
    ]);
  });

  it("answers an offer as the responder", async () => {
    const { tunnel, peer, sent } = setup();

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "second" });
    tunnel.dispatch({ type: "remote-candidate", candidate });
    tunnel.dispatch({
      type: "offer",
      description: { type: "offer", contents: "offer from bob" },
    });
    await tunnel.settled();

    expect(peer.methods).toEqual([
      "setRemoteDescription",
      "addIceCandidate",
      "createAnswer",
      "setLocalDescription",
    ]);
    expect(tunnel.phase).toBe("connected");
    expect(sent).toEqual([
      {
        type: "answer",
        description: { type: "answer", contents: "answer from alice" },
      },
    ]);
  });

  it("forwards local candidates after the local description", async () => {
    const { tunnel, peer, sent } = setup();

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "first" });
    peer.emitCandidate(candidate);
    expect(sent).toEqual([]);

    tunnel.dispatch({ type: "room-status", count: 2 });
    await tunnel.settled();

    expect(sent.map(({ type }) => type)).toEqual(["offer", "ice-candidate"]);
    expect(sent[1]).toEqual({ type: "ice-candidate", candidate });
  });

  it("emits statechange for every phase change", async () => {
    const { tunnel } = setup();
    const phases: string[] = [];
    tunnel.onstatechange = (event: StateEvent) =>
      phases.push(`${event.previous}->${event.phase}`);

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "first" });
    tunnel.dispatch({ type: "room-status", count: 2 });
    await tunnel.settled();

    expect(phases).toEqual([
      "idle->joining",
      "joining->waiting-for-peer",
      "waiting-for-peer->have-local-offer",
    ]);
  });

  it("emits remote media as track events", () => {
    const { tunnel, peer } = setup();
    const ontrack = vi.fn();
    tunnel.ontrack = ontrack;

    const remote = new FakeMedia();
    peer.emitTrack(remote);

    expect(ontrack).toHaveBeenCalledOnce();
    expect(ontrack.mock.calls[0]?.[0].media).toBe(remote);
  });

  it("logs protocol violations", () => {
    const { tunnel, logger } = setup();

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "first" });
    tunnel.dispatch({
      type: "answer",
      description: { type: "answer", contents: "stray" },
    });

    expect(tunnel.phase).toBe("waiting-for-peer");
    expect(logger.lines).toContainEqual({
      level: "warn",
      data: ["protocol violation:", "answer received while waiting-for-peer"],
    });
  });

  it("ends with transport-failed when a description cannot be applied", async () => {
    const { tunnel, peer } = setup();
    const reasons: string[] = [];
    tunnel.onend = (event: EndEvent) => reasons.push(event.reason);
    peer.failing.add("setRemoteDescription");

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "second" });
    tunnel.dispatch({
      type: "offer",
      description: { type: "offer", contents: "garbled" },
    });
    await tunnel.settled();

    expect(tunnel.phase).toBe("ended");
    expect(tunnel.negotiation.ended).toBe("transport-failed");
    expect(reasons).toEqual(["transport-failed"]);
    expect(peer.methods).toEqual(["setRemoteDescription", "close"]);
  });

  it("skips a candidate which cannot be added", async () => {
    const { tunnel, peer, logger } = setup();
    peer.failing.add("addIceCandidate");

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "second" });
    tunnel.dispatch({
      type: "offer",
      description: { type: "offer", contents: "offer from bob" },
    });
    tunnel.dispatch({ type: "remote-candidate", candidate });
    tunnel.dispatch({ type: "remote-candidate", candidate });
    await tunnel.settled();

    expect(tunnel.phase).toBe("connected");
    expect(peer.methods.filter((m) => m === "addIceCandidate")).toHaveLength(2);
    const warnings = logger.lines.filter(({ level }) => level === "warn");
    expect(warnings).toHaveLength(1);
  });

  it("ends when the transport fails", () => {
    const { tunnel, peer } = setup();

    tunnel.dispatch({ type: "start" });
    peer.emitState("failed");

    expect(tunnel.negotiation.ended).toBe("transport-failed");
    expect(peer.closed).toBe(true);
    expect(peer.onstatechange).toBeNull();
  });

  it("drops queued effects once ended", async () => {
    const { tunnel, peer } = setup();

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "first" });
    tunnel.dispatch({ type: "room-status", count: 2 });
    tunnel.dispatch({ type: "end", reason: "hangup" });
    await tunnel.settled();

    expect(peer.methods).toEqual(["close"]);
  });

  it("does not report an effect interrupted by a hangup", async () => {
    const { tunnel, peer, logger } = setup();
    vi.spyOn(peer, "createOffer").mockImplementation(async () => {
      tunnel.dispatch({ type: "end", reason: "hangup" });
      throw new Error("connection closed");
    });

    tunnel.dispatch({ type: "start" });
    tunnel.dispatch({ type: "joined", joinedAs: "first" });
    tunnel.dispatch({ type: "room-status", count: 2 });
    expect(tunnel.ended).toBe(false);
    await tunnel.settled();

    expect(tunnel.ended).toBe(true);
    expect(tunnel.negotiation.ended).toBe("hangup");
    expect(logger.lines.filter(({ level }) => level === "error")).toEqual([]);
  });

  it("closes a connection attached after the end", () => {
    const tunnel = new Tunnel<FakeMedia>({ logger: recordingLogger() });
    tunnel.dispatch({ type: "end", reason: "media-denied" });

    const peer = new FakePeerConnection();
    tunnel.attach(peer);
    expect(peer.closed).toBe(true);
  });

  it("refuses a second connection", () => {
    const { tunnel } = setup();
    expect(() => tunnel.attach(new FakePeerConnection())).toThrow(
      "Tunnel already has a connection"
    );
  });
});
