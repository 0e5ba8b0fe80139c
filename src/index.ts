export {
  Call,
  type CallOptions,
  type HostOptions,
  PhaseEvent,
  MediaEvent,
  NoticeEvent,
  EndedEvent,
  notices,
  roomFromLink,
  generateRoomId,
} from "./call";

export {
  Tunnel,
  type TunnelOptions,
  type PeerConnection,
  type Logger,
  SignalEvent,
  TrackEvent,
  StateEvent,
  EndEvent,
} from "./tunnel";

export {
  apply,
  initial,
  type Negotiation,
  type NegotiationEvent,
  type Effect,
  type Transition,
  type Phase,
  type Role,
  type EndReason,
} from "./negotiation";

export {
  Channel,
  type ChannelState,
  type Socket,
  type SocketListener,
  nodeSocket,
  socketState,
} from "./channel";

export { browserSocket, browserConnection, capture } from "./browser";

export {
  Endpoint,
  type EndpointOptions,
  type ICEDiscoveryOptions,
  type IceServer,
  defaultIceServers,
  parseIceServers,
} from "./endpoint";

export {
  Client,
  ResponseError,
  type ErrorResponse,
  type Room,
  type RoomState,
  type RoomResponse,
  type IceServersResponse,
} from "./api";

export {
  type MediaHandle,
  type MediaTrack,
  defaultConstraints,
  describeMediaError,
  release,
  toggle,
} from "./media";

export { CallError, type CallErrorCode, SignalError } from "./errors";

export { CloseCode, isRoomId, parseServerMessage } from "./signal";
export type * from "./signal";
