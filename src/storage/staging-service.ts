/**
 * FileStagingService - where `uploadToEndpoint` puts dataset files
 *
 * The default implementation talks to the Globus Transfer REST API for
 * directory creation and endpoint lookup, and PUTs file bytes straight to
 * the endpoint's HTTPS server.
 */

import { z } from 'zod';
import type { Authorizer } from '../auth/authorizer.js';
import { UploadError } from '../core/errors.js';
import { decodeBody } from '../transport/transport.js';
import type { EndpointId } from '../types/branded.js';
import { isPlainObject } from '../types/json.js';

export interface PutFileResponse {
  statusCode: number;
  text: string;
}

export interface FileStagingService {
  /** Create one directory on the endpoint; throws when it cannot */
  createDirectory(endpointId: EndpointId, path: string): Promise<void>;
  /** Base URL of the endpoint's HTTPS server */
  resolveEndpointBaseUrl(endpointId: EndpointId): Promise<string>;
  /** Authorization header value for PUTs to the endpoint's HTTPS server */
  getUploadAuthorization(endpointId: EndpointId): Promise<string | null>;
  putFile(url: string, bytes: Uint8Array, headers: Record<string, string>): Promise<PutFileResponse>;
}

export const TRANSFER_API_URL = 'https://transfer.api.globus.org/v0.10';

const EndpointDocumentSchema = z
  .object({
    https_server: z.string().min(1),
  })
  .passthrough();

export interface TransferStagingServiceOptions {
  /** Authorizes calls to the Transfer API */
  transferAuthorizer: Authorizer;
  /** Authorizes PUTs to one endpoint's HTTPS server */
  httpsAuthorizer: (endpointId: EndpointId) => Authorizer;
  /** Transfer API base URL (default: TRANSFER_API_URL) */
  baseUrl?: string;
}

function transferErrorDetail(statusCode: number, text: string): string {
  const body = decodeBody(text);
  if (body.kind === 'json' && isPlainObject(body.value) && typeof body.value['message'] === 'string') {
    return `${statusCode} ${body.value['message']}`;
  }
  return `${statusCode} ${text}`;
}

export class TransferStagingService implements FileStagingService {
  private readonly baseUrl: string;

  constructor(private readonly options: TransferStagingServiceOptions) {
    this.baseUrl = (options.baseUrl ?? TRANSFER_API_URL).replace(/\/$/, '');
  }

  async createDirectory(endpointId: EndpointId, path: string): Promise<void> {
    const response = await fetch(
      `${this.baseUrl}/operation/endpoint/${encodeURIComponent(endpointId)}/mkdir`,
      {
        method: 'POST',
        headers: await this.transferHeaders({ 'Content-Type': 'application/json' }),
        body: JSON.stringify({ DATA_TYPE: 'mkdir', path }),
      }
    );
    if (!response.ok) {
      const text = await response.text();
      throw new UploadError(transferErrorDetail(response.status, text));
    }
  }

  async resolveEndpointBaseUrl(endpointId: EndpointId): Promise<string> {
    const response = await fetch(
      `${this.baseUrl}/endpoint/${encodeURIComponent(endpointId)}`,
      { method: 'GET', headers: await this.transferHeaders({}) }
    );
    const text = await response.text();
    if (!response.ok) {
      throw new UploadError(
        `Error looking up endpoint ${endpointId}: ${transferErrorDetail(response.status, text)}`
      );
    }

    const body = decodeBody(text);
    if (body.kind === 'text') {
      throw new UploadError(`Error decoding endpoint ${endpointId}: ${body.parseError}`);
    }
    const parsed = EndpointDocumentSchema.safeParse(body.value);
    if (!parsed.success) {
      throw new UploadError(`Endpoint ${endpointId} has no HTTPS server`);
    }
    return parsed.data.https_server;
  }

  async getUploadAuthorization(endpointId: EndpointId): Promise<string | null> {
    return this.options.httpsAuthorizer(endpointId).getAuthorizationHeader();
  }

  async putFile(
    url: string,
    bytes: Uint8Array,
    headers: Record<string, string>
  ): Promise<PutFileResponse> {
    const response = await fetch(url, { method: 'PUT', headers, body: bytes });
    return { statusCode: response.status, text: await response.text() };
  }

  private async transferHeaders(extra: Record<string, string>): Promise<Record<string, string>> {
    const authorization = await this.options.transferAuthorizer.getAuthorizationHeader();
    return authorization ? { ...extra, Authorization: authorization } : extra;
  }
}
