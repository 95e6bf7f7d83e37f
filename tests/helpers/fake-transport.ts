/**
 * In-process Transport that records requests and answers from a queue.
 */

import type { Transport, TransportResponse } from '../../src/transport/transport.js';

export interface RecordedRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: unknown;
}

export class FakeTransport implements Transport {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: Array<TransportResponse | Error> = [];

  /** Queue a JSON reply */
  reply(statusCode: number, value: unknown): this {
    this.replies.push({ statusCode, body: { kind: 'json', value } });
    return this;
  }

  /** Queue a reply whose body is not JSON */
  replyText(statusCode: number, text: string): this {
    this.replies.push({ statusCode, body: { kind: 'text', text, parseError: 'Unexpected token' } });
    return this;
  }

  /** Queue a transport failure */
  fail(error: Error): this {
    this.replies.push(error);
    return this;
  }

  get pending(): number {
    return this.replies.length;
  }

  async getJson(url: string, headers: Record<string, string>): Promise<TransportResponse> {
    return this.next({ method: 'GET', url, headers: { ...headers } });
  }

  async postJson(
    url: string,
    body: unknown,
    headers: Record<string, string>
  ): Promise<TransportResponse> {
    return this.next({ method: 'POST', url, headers: { ...headers }, body });
  }

  private async next(request: RecordedRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error(`No reply queued for ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
