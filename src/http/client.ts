/**
 * HTTP client abstraction. Allows stubbing in tests without touching ShipX logic.
 */

export interface HttpRequest {
  method: "GET" | "POST" | "PUT" | "DELETE";
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
  /** Raw payload; set by FetchHttpClient, optional for stubs */
  bytes?: Uint8Array;
}

export type HttpErrorCode = "ETIMEDOUT" | "ECONNRESET" | "ECONNREFUSED" | "ENOTFOUND" | "NETWORK";

export class HttpRequestError extends Error {
  readonly request: HttpRequest;
  readonly code: HttpErrorCode;

  constructor(message: string, request: HttpRequest, code: HttpErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = "HttpRequestError";
    this.request = request;
    this.code = code;
  }
}

/**
 * Minimal HTTP client interface. Default implementation uses global fetch.
 * Tests inject a stub that returns controlled responses.
 */
export interface IHttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/** Body bytes, falling back to the text body for stubbed responses */
export function responseBytes(res: HttpResponse): Uint8Array {
  return res.bytes ?? new TextEncoder().encode(res.body);
}

const KNOWN_CODES: readonly HttpErrorCode[] = ["ECONNRESET", "ECONNREFUSED", "ENOTFOUND"];

/** fetch wraps socket errors as TypeError("fetch failed") with the errno on cause */
function transportCode(err: unknown): HttpErrorCode {
  if (err instanceof Error && err.cause && typeof err.cause === "object" && "code" in err.cause) {
    const code = err.cause.code;
    const known = KNOWN_CODES.find((c) => c === code);
    if (known) return known;
  }
  return "NETWORK";
}

/**
 * Default implementation using fetch with timeout.
 */
export class FetchHttpClient implements IHttpClient {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      request.timeoutMs ?? 30_000
    );
    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: {
          "Content-Type": "application/json",
          ...request.headers,
        },
        body: request.body,
        signal: controller.signal,
      });
      const bytes = new Uint8Array(await res.arrayBuffer());
      const headers: Record<string, string> = {};
      res.headers.forEach((v, k) => (headers[k] = v));
      return { status: res.status, headers, body: new TextDecoder().decode(bytes), bytes };
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new HttpRequestError(`Request timed out: ${request.url}`, request, "ETIMEDOUT", err);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new HttpRequestError(`${message}: ${request.url}`, request, transportCode(err), err);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
