import { type Socket, socketState } from "./channel";
import { defaultConstraints } from "./media";
import type { Candidate, CandidateMedia, SDPDescription } from "./signal";
import type { PeerConnection } from "./tunnel";

/** A {@link Socket} over the browser's `WebSocket`. */
export function browserSocket(url: string | URL): Socket {
  const ws = new WebSocket(url);

  return {
    get state() {
      return socketState(ws.readyState);
    },
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    listen(listener) {
      ws.onopen = () => listener.open();
      ws.onmessage = (event) => {
        if (typeof event.data === "string") listener.message(event.data);
      };
      ws.onclose = (event) => listener.close(event.code, event.reason);
    },
  };
}

/** Ask for the camera and microphone. */
export function capture(
  constraints: MediaStreamConstraints = defaultConstraints
): Promise<MediaStream> {
  if (!navigator.mediaDevices?.getUserMedia) {
    return Promise.reject(
      new DOMException("Media devices are unavailable", "NotFoundError")
    );
  }
  return navigator.mediaDevices.getUserMedia(constraints);
}

/**
 * Create an `RTCPeerConnection` carrying `media`, adapted to the
 * {@link PeerConnection} a tunnel drives.
 */
export function browserConnection(
  media: MediaStream,
  configuration: RTCConfiguration
): PeerConnection<MediaStream> {
  const impl = new RTCPeerConnection(configuration);

  for (const track of media.getTracks()) {
    impl.addTrack(track, media);
  }

  const connection: PeerConnection<MediaStream> = {
    onicecandidate: null,
    onstatechange: null,
    ontrack: null,

    createOffer: async () => fromRTC(await impl.createOffer()),
    createAnswer: async () => fromRTC(await impl.createAnswer()),

    setLocalDescription: (description) =>
      impl.setLocalDescription(toRTC(description)),
    setRemoteDescription: (description) =>
      impl.setRemoteDescription(toRTC(description)),

    async addIceCandidate([candidate, location]) {
      const [sdpMid, sdpMLineIndex] = location ?? [null, null];
      await impl.addIceCandidate({ candidate, sdpMid, sdpMLineIndex });
    },

    close: () => impl.close(),
  };

  impl.onicecandidate = ({ candidate }) => {
    // a null candidate marks the end of gathering
    if (candidate != null)
      connection.onicecandidate?.(fromCandidate(candidate));
  };

  impl.onconnectionstatechange = () => {
    connection.onstatechange?.(impl.connectionState);
  };

  impl.ontrack = ({ streams }) => {
    const [stream] = streams;
    if (stream != null) connection.ontrack?.(stream);
  };

  return connection;
}

function fromRTC({ type, sdp }: RTCSessionDescriptionInit): SDPDescription {
  if (!sdp) throw new TypeError(`Session description ${type} has no SDP`);
  return { type, contents: sdp };
}

function toRTC({ type, contents }: SDPDescription): RTCSessionDescriptionInit {
  return { type, sdp: contents };
}

function fromCandidate(c: RTCIceCandidate): Candidate {
  const media: CandidateMedia | null =
    c.sdpMid != null || c.sdpMLineIndex != null
      ? [c.sdpMid, c.sdpMLineIndex]
      : null;
  return [c.candidate, media];
}
