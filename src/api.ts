import { Endpoint, type EndpointOptions, type IceServer } from "./endpoint";

/** Client for the relay server's HTTP API. */
export class Client {
  public readonly base: URL;
  private readonly fetch: typeof fetch;

  constructor(
    base: string | URL = "/api/",
    options?: { fetch?: typeof fetch }
  ) {
    this.base = new URL(base, globalThis.location?.href);
    this.fetch = options?.fetch ?? globalThis.fetch.bind(globalThis);
  }

  /** Allocate an unused room identifier. */
  async createRoom(): Promise<Room> {
    const { room }: RoomResponse = await this.post("/room", {});
    return room;
  }

  async getRoom(id: string): Promise<Room> {
    const { room } = await this.get<RoomResponse>(
      `/room/${encodeURIComponent(id)}`
    );
    return room;
  }

  async iceServers(): Promise<IceServer[]> {
    const { iceServers } = await this.get<IceServersResponse>("/ice-servers");
    return iceServers;
  }

  /** An {@link Endpoint} configured with the server's ICE servers. */
  endpoint(options?: Omit<EndpointOptions, "iceServers">): Promise<Endpoint> {
    return Endpoint.fromICEDiscovery<IceServersResponse>(
      this.url("/ice-servers"),
      { ...options, fetch: this.fetch, parse: ({ iceServers }) => iceServers }
    );
  }

  /** The WebSocket address of a room's signaling relay. */
  signalURL(room: string): URL {
    const url = this.url(`/room/${encodeURIComponent(room)}/signal`);

    if (url.protocol === "http:") url.protocol = "ws:";
    else if (url.protocol === "https:") url.protocol = "wss:";

    return url;
  }

  private async get<T>(path: string): Promise<T> {
    const response = await this.fetch(this.url(path), {
      method: "GET",
      headers: {
        Accept: "application/json",
      },
    });

    return this.receive<T>(response);
  }

  private async post<T, V extends object>(path: string, input: V): Promise<T> {
    const response = await this.fetch(this.url(path), {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify(input),
    });

    return this.receive<T>(response);
  }

  private url(path: string): URL {
    return new URL(path.replace(/^\//, ""), this.base);
  }

  private async receive<T>(response: Response): Promise<T> {
    const contentType = response.headers.get("Content-Type");
    const isJSON =
      contentType === "application/json" ||
      contentType === "application/json; charset=utf-8";

    if (response.status >= 400) {
      const details: ErrorResponse | null = isJSON
        ? await response.json()
        : null;

      throw new ResponseError(response, details);
    }
    if (!isJSON) {
      throw new TypeError(
        `Server returned ${contentType || "unknown content"}`
      );
    }

    const data: T = await response.json();
    return data;
  }
}

export class ResponseError extends Error {
  public readonly name: string = "ResponseError";
  public readonly response: Response;
  private readonly details: ErrorResponse | null;

  constructor(response: Response, details?: ErrorResponse | null) {
    super(`HTTP ${response.status} ${response.statusText}`);
    this.response = response;
    this.details = details ?? null;
  }

  get description(): string {
    return this.details?.message ?? "An unexpected server error occurred.";
  }

  get status(): number {
    return this.response.status;
  }

  get code(): string | undefined {
    return this.details?.error;
  }
}

export interface ErrorResponse {
  error?: string;
  message: string;
}

export type RoomState = "empty" | "waiting-for-peer" | "full" | "closed";

export interface Room {
  id: string;
  state: RoomState;
  participants: number;
}

export interface RoomResponse {
  room: Room;
}

export interface IceServersResponse {
  iceServers: IceServer[];
}
