import type { z } from "zod";
import type { RemoteServerConfig } from "@spatialnb/config";
import {
  ConnectionError,
  DocumentParseError,
  ExecutionFailure,
  KernelUnavailable,
  describeError,
  type RemoteError,
} from "@spatialnb/window-schema";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, string>;
}

export interface HttpTransportOptions {
  config: RemoteServerConfig;
  fetch?: FetchLike;
  /** Aborts every request made through this transport. */
  signal?: AbortSignal;
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export class HttpTransport {
  private readonly config: RemoteServerConfig;
  private readonly fetchImpl: FetchLike;
  private readonly signal?: AbortSignal;

  constructor(options: HttpTransportOptions) {
    this.config = options.config;
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.signal = options.signal;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Sends one request and validates the JSON reply against `schema`.
   * Throws {@link ConnectionError} for transport failures and non-2xx replies
   * and {@link DocumentParseError} for bodies that do not match.
   */
  async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.infer<S>> {
    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }
    const headers: Record<string, string> = { Accept: "application/json" };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.requestTimeoutMs);
    const onAbort = () => controller.abort();
    this.signal?.addEventListener("abort", onAbort, { once: true });

    let status: number;
    let text: string;
    try {
      const response = await this.fetchImpl(url.toString(), {
        method,
        headers,
        signal: controller.signal,
        ...(options.body !== undefined
          ? { body: JSON.stringify(options.body) }
          : {}),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      if (timedOut) {
        throw new ConnectionError(
          `${method} ${path} timed out after ${this.config.requestTimeoutMs}ms`,
          undefined,
          { cause: error }
        );
      }
      if (this.signal?.aborted) {
        throw new ConnectionError(`${method} ${path} was aborted`, undefined, {
          cause: error,
        });
      }
      throw new ConnectionError(
        `Could not reach ${this.config.baseUrl}: ${describeError(error)}`,
        undefined,
        { cause: error }
      );
    } finally {
      clearTimeout(timer);
      this.signal?.removeEventListener("abort", onAbort);
    }

    if (status === 401 || status === 403) {
      throw new ConnectionError("Authentication rejected", status);
    }
    if (status < 200 || status >= 300) {
      throw new ConnectionError(
        `${method} ${path} failed with status ${status}`,
        status
      );
    }
    return parseBody(schema, text, `${method} ${path}`);
  }
}

const parseBody = <S extends z.ZodTypeAny>(
  schema: S,
  text: string,
  label: string
): z.infer<S> => {
  let value: unknown;
  if (text.trim().length > 0) {
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new DocumentParseError(`${label} returned invalid JSON`, {
        cause: error,
      });
    }
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DocumentParseError(`${label} returned an unexpected body`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
};

/** Errors thrown by this package are already typed; anything else is a transport failure. */
export const toRemoteError = (error: unknown): RemoteError => {
  if (
    error instanceof ConnectionError ||
    error instanceof DocumentParseError ||
    error instanceof KernelUnavailable ||
    error instanceof ExecutionFailure
  ) {
    return error;
  }
  return new ConnectionError(describeError(error), undefined, { cause: error });
};
