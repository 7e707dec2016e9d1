/**
 * Request Builder
 *
 * Deterministic translation from an endpoint descriptor plus call-time
 * parameters into a RequestEnvelope. No I/O; safe to share between
 * concurrent callers.
 */

import type {
  EndpointDescriptor,
  HttpMethod,
  QueryParams,
  RequestEnvelope,
} from "@kennelcast/types";
import { NetworkError } from "./errors";

export interface RequestBuilderConfig {
  baseURL: string;
  /** Sent as the User-Agent header on every request */
  clientId: string;
  getAccessToken: () => string;
}

export interface BuildOptions {
  query?: QueryParams;
  /** JSON-encoded into the request body */
  body?: unknown;
}

const JSON_TYPE = "application/json";
const encoder = new TextEncoder();

function parseHttpUrl(value: string): URL | null {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:" ? url : null;
  } catch {
    return null;
  }
}

export class RequestBuilder {
  private config: RequestBuilderConfig;

  constructor(config: RequestBuilderConfig) {
    this.config = config;
  }

  build(descriptor: EndpointDescriptor, options: BuildOptions = {}): RequestEnvelope {
    const url = this.resolve(descriptor.path);

    for (const [name, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.append(name, String(value));
    }

    const headers: Record<string, string> = {};
    if (descriptor.requiresAuth) {
      headers["Authorization"] = `Bearer ${this.config.getAccessToken()}`;
    }
    headers["Accept"] = JSON_TYPE;
    headers["User-Agent"] = this.config.clientId;

    const envelope: RequestEnvelope = {
      url: url.toString(),
      method: descriptor.method,
      headers,
    };

    if (options.body !== undefined) {
      headers["Content-Type"] = JSON_TYPE;
      envelope.body = encoder.encode(JSON.stringify(options.body));
    }

    return envelope;
  }

  /**
   * Unauthenticated request for an absolute resource URL, such as a media file
   */
  buildForUrl(url: string, method: HttpMethod = "GET"): RequestEnvelope {
    const parsed = parseHttpUrl(url);
    if (!parsed) {
      throw NetworkError.invalidURL(url);
    }

    return {
      url: parsed.toString(),
      method,
      headers: {
        Accept: "*/*",
        "User-Agent": this.config.clientId,
      },
    };
  }

  private resolve(path: string): URL {
    const base = this.config.baseURL.replace(/\/+$/, "");
    const suffix = path.startsWith("/") ? path : `/${path}`;

    const url = parseHttpUrl(base + suffix);
    if (!url) {
      throw NetworkError.invalidEndpoint(this.config.baseURL, path);
    }
    return url;
  }
}

/**
 * Stable cache key for a descriptor and its query parameters.
 * Keys are sorted so parameter order never changes the key.
 */
export function cacheKeyFor(descriptor: EndpointDescriptor, query: QueryParams = {}): string {
  const base = `${descriptor.method} ${descriptor.path}`;
  const pairs = Object.keys(query)
    .sort()
    .flatMap((name) => {
      const value = query[name];
      return value === undefined
        ? []
        : [`${encodeURIComponent(name)}=${encodeURIComponent(String(value))}`];
    });

  return pairs.length > 0 ? `${base}?${pairs.join("&")}` : base;
}
