/**
 * HTTP transport used by the client.
 *
 * Responses keep the status code and the body separately so callers can
 * tell a body that failed to decode apart from a non-2xx status.
 */

export type ResponseBody =
  | { kind: "json"; value: unknown }
  | { kind: "text"; text: string; parseError: string };

export interface TransportResponse {
  statusCode: number;
  body: ResponseBody;
}

export interface Transport {
  getJson(url: string, headers: Record<string, string>): Promise<TransportResponse>;
  postJson(url: string, body: unknown, headers: Record<string, string>): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  /** Abort requests that take longer than this; no limit when unset */
  timeoutMs?: number;
}

/**
 * Transport on the global `fetch`.
 */
export class FetchTransport implements Transport {
  private readonly timeoutMs?: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  async getJson(url: string, headers: Record<string, string>): Promise<TransportResponse> {
    return this.send(url, { method: "GET", headers });
  }

  async postJson(
    url: string,
    body: unknown,
    headers: Record<string, string>
  ): Promise<TransportResponse> {
    return this.send(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
  }

  private async send(url: string, init: RequestInit): Promise<TransportResponse> {
    const response = await fetch(url, {
      ...init,
      signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
    });
    const text = await response.text();
    return { statusCode: response.status, body: decodeBody(text) };
  }
}

export function decodeBody(text: string): ResponseBody {
  try {
    const value: unknown = JSON.parse(text);
    return { kind: "json", value };
  } catch (err) {
    const parseError = err instanceof Error ? err.message : String(err);
    return { kind: "text", text, parseError };
  }
}
