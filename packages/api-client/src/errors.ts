/**
 * Network Errors
 *
 * Every failure raised by the request pipeline is a NetworkError whose
 * `code` tells callers how to react (retry, fall back to cache, give up).
 */

export type NetworkErrorCode =
  | "NO_CONNECTION"
  | "INVALID_URL"
  | "INVALID_ENDPOINT"
  | "INVALID_REQUEST"
  | "INVALID_RESPONSE"
  | "HTTP_ERROR"
  | "DECODING_FAILED"
  | "REQUEST_FAILED"
  | "CANCELLED";

export class NetworkError extends Error {
  readonly code: NetworkErrorCode;
  /** Status code for HTTP_ERROR, verbatim from the server */
  readonly statusCode?: number;

  constructor(
    code: NetworkErrorCode,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "NetworkError";
    this.code = code;
    this.statusCode = options.statusCode;
  }

  static noConnection(): NetworkError {
    return new NetworkError("NO_CONNECTION", "No network connection");
  }

  static invalidURL(url: string): NetworkError {
    return new NetworkError("INVALID_URL", `Invalid URL: ${url}`);
  }

  static invalidEndpoint(baseURL: string, path: string): NetworkError {
    return new NetworkError(
      "INVALID_ENDPOINT",
      `Cannot combine "${baseURL}" with endpoint path "${path}"`,
    );
  }

  static invalidRequest(detail: string, cause?: unknown): NetworkError {
    return new NetworkError("INVALID_REQUEST", `Invalid request body: ${detail}`, {
      cause,
    });
  }

  static invalidResponse(detail: string): NetworkError {
    return new NetworkError("INVALID_RESPONSE", `Invalid response: ${detail}`);
  }

  static httpError(statusCode: number): NetworkError {
    return new NetworkError("HTTP_ERROR", `HTTP error ${statusCode}`, {
      statusCode,
    });
  }

  static decodingFailed(cause: unknown): NetworkError {
    return new NetworkError("DECODING_FAILED", "Failed to decode response body", {
      cause,
    });
  }

  static requestFailed(cause: unknown): NetworkError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new NetworkError("REQUEST_FAILED", `Request failed: ${detail}`, {
      cause,
    });
  }

  static cancelled(): NetworkError {
    return new NetworkError("CANCELLED", "Request was cancelled");
  }
}

/**
 * Type guard for NetworkError, optionally narrowed to one code
 */
export function isNetworkError(
  value: unknown,
  code?: NetworkErrorCode,
): value is NetworkError {
  return value instanceof NetworkError && (code === undefined || value.code === code);
}
