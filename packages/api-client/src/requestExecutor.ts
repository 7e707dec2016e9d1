/**
 * Request Executor
 *
 * Performs exactly one attempt of a network call and classifies the outcome
 * into a ResponseEnvelope or a NetworkError. Retrying and caching belong to
 * the caller.
 */

import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import type { z } from "zod";
import type {
  ConnectivitySource,
  RequestEnvelope,
  ResponseEnvelope,
} from "@kennelcast/types";
import { createLogger } from "@kennelcast/telemetry";
import { NetworkError } from "./errors";

const log = createLogger("RequestExecutor");

export interface RequestExecutorConfig {
  /** Checked before every call; a disconnected state fails fast */
  connectivity: Pick<ConnectivitySource, "currentState">;
  http?: AxiosInstance;
  timeoutMs?: number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const DEFAULT_TIMEOUT_MS = 30000;

// ============================================================================
// Response normalisation
// ============================================================================

function toBytes(data: unknown): Uint8Array | null {
  if (data === undefined || data === null) return new Uint8Array();
  if (data instanceof Uint8Array) return new Uint8Array(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data.slice(0));
  if (typeof data === "string") return new TextEncoder().encode(data);
  return null;
}

function toHeaderRecord(headers: AxiosResponse["headers"]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      record[name.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      record[name.toLowerCase()] = value.join(", ");
    } else if (typeof value === "number" || typeof value === "boolean") {
      record[name.toLowerCase()] = String(value);
    }
  }
  return record;
}

function isHttpStatus(status: unknown): status is number {
  return Number.isInteger(status) && Number(status) >= 100 && Number(status) <= 599;
}

// ============================================================================
// Request Executor
// ============================================================================

export class RequestExecutor {
  private connectivity: Pick<ConnectivitySource, "currentState">;
  private http: AxiosInstance;
  private timeoutMs: number;

  constructor(config: RequestExecutorConfig) {
    this.connectivity = config.connectivity;
    this.http = config.http ?? axios.create();
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Send one request. Resolves only for 2xx responses.
   */
  async execute(
    envelope: RequestEnvelope,
    options: ExecuteOptions = {},
  ): Promise<ResponseEnvelope> {
    if (!this.connectivity.currentState().isConnected) {
      throw NetworkError.noConnection();
    }
    if (options.signal?.aborted) {
      throw NetworkError.cancelled();
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        url: envelope.url,
        method: envelope.method,
        headers: { ...envelope.headers },
        data: envelope.body ? Buffer.from(envelope.body) : undefined,
        responseType: "arraybuffer",
        validateStatus: () => true,
        timeout: this.timeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      if (options.signal?.aborted || axios.isCancel(error)) {
        throw NetworkError.cancelled();
      }
      log.warn(`${envelope.method} ${envelope.url} failed`, error);
      throw NetworkError.requestFailed(error);
    }

    if (!isHttpStatus(response.status)) {
      throw NetworkError.invalidResponse(`status ${String(response.status)}`);
    }

    const body = toBytes(response.data);
    if (!body) {
      throw NetworkError.invalidResponse("body is not binary or text");
    }

    log.debug(`${envelope.method} ${envelope.url} -> ${response.status}`);

    if (response.status < 200 || response.status > 299) {
      throw NetworkError.httpError(response.status);
    }

    return {
      statusCode: response.status,
      body,
      headers: toHeaderRecord(response.headers),
    };
  }

  /**
   * Parse a response body as UTF-8 JSON validated by a schema
   */
  decode<T>(response: ResponseEnvelope, schema: ResponseSchema<T>): T {
    return decodeBody(response.body, schema);
  }

  async executeDecoded<T>(
    envelope: RequestEnvelope,
    schema: ResponseSchema<T>,
    options: ExecuteOptions = {},
  ): Promise<T> {
    const response = await this.execute(envelope, options);
    return this.decode(response, schema);
  }
}

/**
 * UTF-8 JSON body validated by a schema; any failure is DECODING_FAILED
 */
export function decodeBody<T>(body: Uint8Array, schema: ResponseSchema<T>): T {
  let parsed: unknown;
  try {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(body);
    parsed = JSON.parse(text);
  } catch (error) {
    throw NetworkError.decodingFailed(error);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw NetworkError.decodingFailed(result.error);
  }
  return result.data;
}
