export type CallErrorCode =
  | "room-full"
  | "permission-denied"
  | "relay-unavailable"
  | "invalid-link"
  | "invalid-state"
  | "aborted";

/** A failure surfaced to the caller of a {@link Call} operation. */
export class CallError extends Error {
  public readonly name: string = "CallError";
  public readonly code: CallErrorCode;

  constructor(code: CallErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }
}

/** The relay sent something that is not a valid signaling message. */
export class SignalError extends Error {
  public readonly name: string = "SignalError";
}
