import { describe, expect, it, vi } from "vitest";

import { Endpoint, parseIceServers } from "./endpoint";

describe("Endpoint", () => {
  it("uses public STUN servers by default", () => {
    const endpoint = Endpoint.publicSTUN();

    expect(endpoint.iceServers).toHaveLength(5);
    expect(endpoint.iceServers?.[0]).toEqual({
      urls: "stun:stun.l.google.com:19302",
    });
    expect(endpoint.configuration.iceCandidatePoolSize).toBe(10);
  });

  it("only includes configured settings", () => {
    const endpoint = new Endpoint({ iceTransportPolicy: "relay" });
    expect(endpoint.configuration).toEqual({ iceTransportPolicy: "relay" });
  });

  it("loads ICE servers from a discovery URL", async () => {
    const fetch = vi.fn(
      async () =>
        new Response(
          JSON.stringify({
            iceServers: [
              { urls: "stun:stun.example.com:3478" },
              {
                urls: ["turn:turn.example.com:3478"],
                username: "test-user",
                credential: "test-secret",
              },
            ],
          }),
          { headers: { "Content-Type": "application/json" } }
        )
    );

    const endpoint = await Endpoint.fromICEDiscovery(
      "https://calls.example.com/api/ice-servers",
      { fetch, iceCandidatePoolSize: 4 }
    );

    expect(endpoint.configuration).toEqual({
      iceServers: [
        { urls: "stun:stun.example.com:3478" },
        {
          urls: ["turn:turn.example.com:3478"],
          username: "test-user",
          credential: "test-secret",
        },
      ],
      iceCandidatePoolSize: 4,
    });
  });

  it("fails when discovery fails", async () => {
    const fetch = vi.fn(
      async () => new Response("nope", {
        status: 503,
        statusText: "Service Unavailable",
      })
    );

    await expect(
      Endpoint.fromICEDiscovery("https://calls.example.com/api/ice-servers", {
        fetch,
      })
    ).rejects.toThrow("ICE discovery failed: HTTP 503 Service Unavailable");
  });
});

describe("parseIceServers", () => {
  it("accepts a bare list", () => {
    expect(
      parseIceServers([{ urls: "stun:a.example.com", extra: 1 }])
    ).toEqual([
      { urls: "stun:a.example.com" },
    ]);
  });

  it("rejects malformed entries", () => {
    expect(() => parseIceServers({ servers: [] })).toThrow(
      "Expected a list of ICE servers"
    );
    expect(() => parseIceServers([{}])).toThrow("ICE server has no urls");
    expect(() => parseIceServers([{ urls: ["stun:a", 3] }])).toThrow(
      "ICE server urls must be strings"
    );
  });
});
