import { createTRPCProxyClient, httpBatchLink } from "@trpc/client";
import type { FastifyInstance } from "fastify";

import type { AppRouter } from "../../src/trpc/trpc.router";

interface InitLike {
  method?: string;
  headers?: unknown;
  body?: unknown;
}

function requestUrlOf(input: unknown): string {
  if (typeof input === "string") {
    return input;
  }
  if (input instanceof URL) {
    return input.toString();
  }
  if (input instanceof Request) {
    return input.url;
  }
  throw new Error("Unsupported request input for tRPC client");
}

function headerRecord(headers: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (headers instanceof Headers) {
    headers.forEach((value, key) => {
      record[key] = value;
    });
  } else if (Array.isArray(headers)) {
    for (const pair of headers) {
      if (Array.isArray(pair) && typeof pair[0] === "string" && typeof pair[1] === "string") {
        record[pair[0]] = pair[1];
      }
    }
  } else if (typeof headers === "object" && headers !== null) {
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === "string") {
        record[key] = value;
      }
    }
  }
  return record;
}

/** tRPC client whose requests go through `fastify.inject` instead of the network. */
export function createInjectedClient(fastify: FastifyInstance) {
  const injectFetch = async (input: unknown, init?: InitLike): Promise<Response> => {
    const url = new URL(requestUrlOf(input));
    const response = await fastify.inject({
      method: init?.method === "POST" ? "POST" : "GET",
      url: `${url.pathname}${url.search}`,
      headers: headerRecord(init?.headers),
      payload: typeof init?.body === "string" ? init.body : undefined,
    });

    const headers = new Headers();
    for (const [key, value] of Object.entries(response.headers)) {
      if (Array.isArray(value)) {
        headers.set(key, value.join(","));
      } else if (value !== undefined) {
        headers.set(key, String(value));
      }
    }
    return new Response(response.payload, {status: response.statusCode, headers});
  };

  return createTRPCProxyClient<AppRouter>({
    links: [httpBatchLink({url: "http://localhost/trpc", fetch: injectFetch})],
  });
}
