/**
 * Stub HTTP client for tests: record requests and return configured responses.
 */

import type { HttpRequest, HttpResponse, IHttpClient } from "./client.js";

export type StubResponse = HttpResponse | ((request: HttpRequest) => Promise<HttpResponse>);

/** JSON response with the given status */
export function jsonResponse(status: number, data: unknown): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(data),
  };
}

/** PDF response carrying the given text as its bytes */
export function pdfResponse(content: string): HttpResponse {
  const bytes = new TextEncoder().encode(content);
  return {
    status: 200,
    headers: { "content-type": "application/pdf" },
    body: content,
    bytes,
  };
}

/**
 * Stub that returns responses in order, one per request.
 * A function entry is called with the request, e.g. to throw a transport error.
 */
export class StubHttpClient implements IHttpClient {
  private responses: StubResponse[] = [];
  private readonly recordedRequests: HttpRequest[] = [];

  /** Set one response to return for the next request */
  setResponse(res: StubResponse): void {
    this.responses = [res];
  }

  /** Set a sequence of responses (one per request) */
  setResponses(res: StubResponse[]): void {
    this.responses = [...res];
  }

  getRecordedRequests(): HttpRequest[] {
    return [...this.recordedRequests];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.recordedRequests.push(request);
    const next = this.responses.shift();
    if (next === undefined) {
      return jsonResponse(500, { error: "No stub response configured" });
    }
    if (typeof next === "function") {
      return next(request);
    }
    return next;
  }
}
