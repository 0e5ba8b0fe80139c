/** The parts of a `MediaStreamTrack` a call needs. */
export interface MediaTrack {
  readonly kind: string;
  enabled: boolean;
  stop(): void;
}

/** The parts of a `MediaStream` a call needs. */
export interface MediaHandle {
  getTracks(): MediaTrack[];
  getAudioTracks(): MediaTrack[];
  getVideoTracks(): MediaTrack[];
}

export const defaultConstraints: MediaStreamConstraints = {
  video: {
    width: { ideal: 1280 },
    height: { ideal: 720 },
    facingMode: "user",
  },
  audio: {
    echoCancellation: true,
    noiseSuppression: true,
    autoGainControl: true,
  },
};

/**
 * Flip every track to the opposite of the first track's state, or set them
 * all to `enabled`. Returns whether the tracks are now enabled; `false` when
 * there are none.
 */
export function toggle(tracks: MediaTrack[], enabled?: boolean): boolean {
  let target = enabled;
  for (const track of tracks) {
    if (target == null) target = !track.enabled;
    track.enabled = target;
  }
  return tracks.length > 0 ? (target ?? false) : false;
}

/** Stop every track so the camera and microphone are released. */
export function release(media: MediaHandle): void {
  for (const track of media.getTracks()) track.stop();
}

/** A user-facing explanation of a `getUserMedia` failure. */
export function describeMediaError(err: unknown): string {
  const name = err instanceof Error || isNamed(err) ? err.name : undefined;

  switch (name) {
    case "NotAllowedError":
      return "Camera or microphone access denied. Please check permissions.";
    case "NotFoundError":
      return "Camera or microphone not found. Please check your devices.";
    case "NotReadableError":
      return "Camera or microphone is already in use by another application.";
    case "AbortError":
      return "Media capture was aborted.";
    case "SecurityError":
      return "Media access is not allowed in this context.";
  }

  if (err instanceof Error && err.message) return err.message;
  return "Could not start your camera and/or microphone.";
}

// DOMException is not an Error subclass everywhere
function isNamed(err: unknown): err is { name: string } {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    typeof err.name === "string"
  );
}
