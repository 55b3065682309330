import { z } from "zod";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface TransportConfig {
  baseUrl: string;
  headers?: Record<string, string>;
  timeout?: number;
}

export interface TransportRequest {
  method: HttpMethod;
  path: string;
  params?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface TransportResponse {
  data: unknown;
  status: number;
  headers: Headers;
}

export interface Transport {
  request(req: TransportRequest): Promise<TransportResponse>;
  setHeader(name: string, value: string): void;
  removeHeader(name: string): void;
}

export const TRANSPORT_ERROR_CODES = {
  TIMEOUT: "TIMEOUT",
  ABORTED: "ABORTED",
  NETWORK_ERROR: "NETWORK_ERROR",
  HTTP_ERROR: "HTTP_ERROR",
  INVALID_RESPONSE: "INVALID_RESPONSE",
} as const;

const SUCCESS_STATUSES = new Set([200, 201, 204]);

const errorBodySchema = z.object({ error_message: z.string() });

export class TransportError extends Error {
  constructor(
    message: string,
    public status: number,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = "TransportError";
  }

  isTimeout(): boolean {
    return this.code === TRANSPORT_ERROR_CODES.TIMEOUT;
  }

  isNetworkError(): boolean {
    return this.code === TRANSPORT_ERROR_CODES.NETWORK_ERROR;
  }

  isAborted(): boolean {
    return this.code === TRANSPORT_ERROR_CODES.ABORTED;
  }

  isNotFound(): boolean {
    return this.status === 404;
  }

  isUnauthorized(): boolean {
    return this.status === 401;
  }

  isForbidden(): boolean {
    return this.status === 403;
  }

  isValidationError(): boolean {
    return this.status === 400;
  }

  isServerError(): boolean {
    return this.status >= 500;
  }
}

export class FetchTransport implements Transport {
  private config: TransportConfig;
  private headers: Record<string, string>;

  constructor(config: TransportConfig) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, "") };
    this.headers = { ...config.headers };
  }

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  removeHeader(name: string): void {
    delete this.headers[name];
  }

  buildUrl(path: string, params?: TransportRequest["params"]): string {
    const url = new URL(`${this.config.baseUrl}${path.startsWith("/") ? path : `/${path}`}`);

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }

    return url.toString();
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    const url = this.buildUrl(req.path, req.params);

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = this.config.timeout
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, this.config.timeout)
      : null;

    const onExternalAbort = () => controller.abort();
    if (req.signal?.aborted) {
      controller.abort();
    } else {
      req.signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    try {
      let response: Response;
      let data: unknown;
      try {
        response = await fetch(url, {
          method: req.method,
          headers: {
            "Content-Type": "application/json",
            ...this.headers,
            ...req.headers,
          },
          body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
          signal: controller.signal,
        });
        data = await this.parseResponse(response);
      } catch (error) {
        if (timedOut) {
          throw new TransportError(
            `Request timed out after ${this.config.timeout}ms`,
            0,
            TRANSPORT_ERROR_CODES.TIMEOUT
          );
        }
        if (controller.signal.aborted) {
          throw new TransportError("Request aborted", 0, TRANSPORT_ERROR_CODES.ABORTED);
        }
        throw new TransportError(
          error instanceof Error ? error.message : "Network request failed",
          0,
          TRANSPORT_ERROR_CODES.NETWORK_ERROR
        );
      }

      if (!SUCCESS_STATUSES.has(response.status)) {
        const errorBody = errorBodySchema.safeParse(data);
        throw new TransportError(
          errorBody.success ? errorBody.data.error_message : `HTTP ${response.status}`,
          response.status,
          TRANSPORT_ERROR_CODES.HTTP_ERROR,
          data
        );
      }

      return {
        data,
        status: response.status,
        headers: response.headers,
      };
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      req.signal?.removeEventListener("abort", onExternalAbort);
    }
  }

  private async parseResponse(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    if (text.length === 0) return undefined;

    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
}

export const createTransport = (config: TransportConfig): Transport => {
  return new FetchTransport(config);
};
