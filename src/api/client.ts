import type {
  CanvasApiClientOptions,
  ConnectionContext,
  HttpMethod,
  QueryParams,
  FormPayload,
  RequestOptions,
} from "./types.js";
import { HTTP_METHODS } from "./types.js";
import { ApiError, NetworkError } from "./errors.js";
import { extractErrorMessage, parseJsonBody } from "./error-message.js";
import { appendQuery, encodeForm } from "./form.js";
import { UnsupportedMethodError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

/**
 * Canvas REST API client.
 *
 * - One immutable connection context (base URL, bearer token, optional timeout)
 * - Bearer token on every request
 * - Query parameters for every method, form-encoded body for POST/PUT
 * - Error bodies normalized into ApiError; no retries
 * - Raw response passthrough (no transformation)
 *
 * Holds no mutable state, so one instance can serve concurrent tool calls.
 * Connection pooling comes from the global fetch dispatcher.
 */
export class CanvasApiClient {
  readonly connection: ConnectionContext;

  constructor(options: CanvasApiClientOptions) {
    if (!options.baseUrl.trim()) {
      throw new Error("Canvas API base URL is required.");
    }
    if (!options.token.trim()) {
      throw new Error("Canvas API token is required.");
    }

    this.connection = Object.freeze({
      // Strip trailing slashes from baseUrl
      baseUrl: options.baseUrl.trim().replace(/\/+$/, ""),
      token: options.token.trim(),
      timeoutMs: options.timeoutMs,
    });

    log("DEBUG", `CanvasApiClient initialized for ${this.connection.baseUrl}`);
  }

  get baseUrl(): string {
    return this.connection.baseUrl;
  }

  /**
   * New client over the same connection settings with some overridden.
   */
  clone(overrides: Partial<CanvasApiClientOptions> = {}): CanvasApiClient {
    return new CanvasApiClient({
      baseUrl: overrides.baseUrl ?? this.connection.baseUrl,
      token: overrides.token ?? this.connection.token,
      timeoutMs: overrides.timeoutMs ?? this.connection.timeoutMs,
    });
  }

  async get(endpoint: string, params?: QueryParams): Promise<unknown> {
    return await this.request("GET", endpoint, { params });
  }

  async post(endpoint: string, data?: FormPayload): Promise<unknown> {
    return await this.request("POST", endpoint, { data });
  }

  async put(endpoint: string, data?: FormPayload): Promise<unknown> {
    return await this.request("PUT", endpoint, { data });
  }

  async delete(endpoint: string, params?: QueryParams): Promise<unknown> {
    return await this.request("DELETE", endpoint, { params });
  }

  /**
   * Perform one request against `{baseUrl}/{endpoint}`.
   *
   * @param method - GET, POST, PUT or DELETE, upper case
   * @param endpoint - Path relative to the base URL (e.g., "courses/123/modules")
   * @returns Decoded JSON body, or `{}` when the body is empty or not JSON
   * @throws UnsupportedMethodError for any other method
   * @throws ApiError on non-2xx responses
   * @throws NetworkError when no response was received
   */
  async request(
    method: string,
    endpoint: string,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const verb = HTTP_METHODS.find((m) => m === method);
    if (!verb) {
      throw new UnsupportedMethodError(method);
    }

    const path = endpoint.replace(/^\/+|\/+$/g, "");
    const url = new URL(`${this.connection.baseUrl}/${path}`);
    appendQuery(url, options.params);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.connection.token}`,
      Accept: "application/json",
    };

    let body: string | undefined;
    if ((verb === "POST" || verb === "PUT") && options.data) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      body = encodeForm(options.data).toString();
    }

    log("DEBUG", `Requesting ${verb} ${path}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: verb,
        headers,
        body,
        signal:
          this.connection.timeoutMs !== undefined
            ? AbortSignal.timeout(this.connection.timeoutMs)
            : undefined,
      });
    } catch (error) {
      // Wrap network/fetch errors
      const message = describeFetchError(error);
      log("DEBUG", `${verb} ${path} failed without a response: ${message}`);
      throw new NetworkError(message, verb, path, error instanceof Error ? error : undefined);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      // The response arrived, so its status is kept
      throw new ApiError(
        response.status,
        describeFetchError(error),
        verb,
        path,
        error instanceof Error ? error : undefined,
      );
    }

    if (!response.ok) {
      const fallback = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`;
      const message = extractErrorMessage(parseJsonBody(text), fallback);
      log("DEBUG", `${verb} ${path} returned ${response.status}: ${message}`);
      throw new ApiError(response.status, message, verb, path);
    }

    const data = parseJsonBody(text);
    return data === undefined ? {} : data;
  }
}

function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // undici reports "fetch failed" and keeps the socket error in `cause`
  if (error.cause instanceof Error && error.cause.message) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}
