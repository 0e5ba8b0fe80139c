/** A STUN or TURN server, in the shape `RTCPeerConnection` accepts. */
export interface IceServer {
  urls: string | string[];
  username?: string;
  credential?: string;
}

export interface EndpointOptions {
  iceServers?: IceServer[];
  iceTransportPolicy?: RTCIceTransportPolicy;
  iceCandidatePoolSize?: number;
}

export interface ICEDiscoveryOptions<T>
  extends Omit<EndpointOptions, "iceServers"> {
  parse?: (response: T) => IceServer[];
  fetch?: typeof fetch;
}

/** NAT traversal settings handed to each new peer connection. */
export class Endpoint implements EndpointOptions {
  iceServers?: IceServer[];
  iceTransportPolicy?: RTCIceTransportPolicy;
  iceCandidatePoolSize?: number;

  constructor(options?: EndpointOptions) {
    Object.assign(this, options);
  }

  get configuration(): RTCConfiguration {
    return {
      ...(this.iceServers != null ? { iceServers: this.iceServers } : null),
      ...(this.iceTransportPolicy != null
        ? { iceTransportPolicy: this.iceTransportPolicy }
        : null),
      ...(this.iceCandidatePoolSize != null
        ? { iceCandidatePoolSize: this.iceCandidatePoolSize }
        : null),
    };
  }

  /**
   * Returns an {@link Endpoint} which uses public STUN servers.
   *
   * No TURN servers are included; peers who cannot connect directly to one
   * another will be unable to call.
   */
  static publicSTUN(options?: Omit<EndpointOptions, "iceServers">): Endpoint {
    return new Endpoint({
      iceServers: defaultIceServers(),
      iceCandidatePoolSize: 10,
      ...options,
    });
  }

  /**
   * Populate an `Endpoint` from an API which provides ICE servers, such as
   * the relay server's `/api/ice-servers`.
   *
   * @example
   *
   * ```ts
   * const endpoint = await Endpoint.fromICEDiscovery(
   *   "https://calls.example.com/api/ice-servers"
   * );
   * ```
   */
  static async fromICEDiscovery<T = unknown>(
    source: string | URL | Request,
    options?: ICEDiscoveryOptions<T>
  ): Promise<Endpoint> {
    const { parse, fetch: fetcher = fetch, ...rest } = options ?? {};

    const request =
      source instanceof Request
        ? source
        : new Request(source, {
            headers: { Accept: "application/json" },
          });

    const response = await fetcher(request);
    if (!response.ok)
      throw new Error(
        `ICE discovery failed: HTTP ${response.status} ${response.statusText}`
      );

    const data: T = await response.json();
    const iceServers = parse != null ? parse(data) : parseIceServers(data);

    return new Endpoint({ iceServers, ...rest });
  }
}

export function defaultIceServers(): IceServer[] {
  return [
    { urls: "stun:stun.l.google.com:19302" },
    { urls: "stun:stun1.l.google.com:19302" },
    { urls: "stun:stun2.l.google.com:19302" },
    { urls: "stun:stun3.l.google.com:19302" },
    { urls: "stun:stun4.l.google.com:19302" },
  ];
}

/** Accepts either a bare server list or `{ iceServers: [...] }`. */
export function parseIceServers(data: unknown): IceServer[] {
  const list =
    typeof data === "object" && data !== null && "iceServers" in data
      ? data.iceServers
      : data;

  if (!Array.isArray(list))
    throw new TypeError("Expected a list of ICE servers");

  return list.map((entry: unknown): IceServer => {
    if (typeof entry !== "object" || entry === null || !("urls" in entry))
      throw new TypeError("ICE server has no urls");

    const server: IceServer = { urls: parseUrls(entry.urls) };
    if ("username" in entry && typeof entry.username === "string")
      server.username = entry.username;
    if ("credential" in entry && typeof entry.credential === "string")
      server.credential = entry.credential;

    return server;
  });
}

function parseUrls(urls: unknown): string | string[] {
  if (typeof urls === "string") return urls;

  if (Array.isArray(urls)) {
    const list: string[] = [];
    for (const url of urls) {
      if (typeof url !== "string") break;
      list.push(url);
    }
    if (list.length === urls.length) return list;
  }

  throw new TypeError("ICE server urls must be strings");
}
