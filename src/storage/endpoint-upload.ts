/**
 * Upload a local file or directory tree to a staging endpoint over HTTPS.
 *
 * Layout on the endpoint: {destParent}/{destChild}/<relative path>. Files
 * are uploaded one at a time; a directory's files go before its
 * sub-directories, and each sub-directory is created before anything is
 * written into it.
 */

import { randomUUID } from 'node:crypto';
import { promises as fs, type Dirent } from 'node:fs';
import { basename, join, posix } from 'node:path';
import type { Logger } from 'pino';
import { UploadError } from '../core/errors.js';
import { EndpointId } from '../types/branded.js';
import type { FileStagingService, PutFileResponse } from './staging-service.js';

/** NCSA endpoint */
export const DEFAULT_ENDPOINT_ID = '82f1b5c6-6e9b-11e5-ba47-22000b92c6ec';
export const DEFAULT_DEST_PARENT = '/tmp';

export interface EndpointUploadOptions {
  endpointId?: string;
  /** Parent directory on the endpoint (default: /tmp) */
  destParent?: string;
  /** Directory created under destParent (default: a random UUID) */
  destChild?: string;
}

export interface EndpointUploadResult {
  /** File-manager link to the uploaded data, usable as a data source */
  dataSource: string;
  destPath: string;
  endpointId: EndpointId;
  filesUploaded: number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Percent-encode like a strict URI quote: everything but letters, digits,
 * `-_.~*` is escaped, `/` included.
 */
export function makeFileManagerLink(endpointId: string, path: string): string {
  const safePath = encodeURIComponent(path).replace(
    /[!'()]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return `https://app.globus.org/file-manager?origin_id=${endpointId}&origin_path=${safePath}`;
}

export function joinUploadUrl(baseUrl: string, destPath: string, filename: string): string {
  return [baseUrl.replace(/\/+$/, ''), destPath.replace(/^\/+|\/+$/g, ''), filename]
    .filter((segment) => segment.length > 0)
    .join('/');
}

class EndpointUploader {
  private filesUploaded = 0;

  constructor(
    private readonly staging: FileStagingService,
    private readonly endpointId: EndpointId,
    private readonly logger: Logger
  ) {}

  get count(): number {
    return this.filesUploaded;
  }

  async createDirectory(path: string, context: string): Promise<void> {
    try {
      await this.staging.createDirectory(this.endpointId, path);
    } catch (err) {
      throw new UploadError(`Error while creating ${context} ${path}: ${describe(err)}`, {
        cause: err,
      });
    }
  }

  async resolveBaseUrl(): Promise<string> {
    try {
      return await this.staging.resolveEndpointBaseUrl(this.endpointId);
    } catch (err) {
      if (err instanceof UploadError) throw err;
      throw new UploadError(`Error looking up endpoint ${this.endpointId}: ${describe(err)}`, {
        cause: err,
      });
    }
  }

  async uploadFile(filePath: string, baseUrl: string, destPath: string): Promise<void> {
    const url = joinUploadUrl(baseUrl, destPath, basename(filePath));

    let bytes: Uint8Array;
    try {
      bytes = await fs.readFile(filePath);
    } catch (err) {
      throw new UploadError(`Unable to read ${filePath}: ${describe(err)}`, { cause: err });
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/octet-stream' };
    let authorization: string | null;
    try {
      authorization = await this.staging.getUploadAuthorization(this.endpointId);
    } catch (err) {
      throw new UploadError(`Unable to authorize upload to ${url}: ${describe(err)}`, { cause: err });
    }
    if (authorization) {
      headers['Authorization'] = authorization;
    }

    let reply: PutFileResponse;
    try {
      reply = await this.staging.putFile(url, bytes, headers);
    } catch (err) {
      throw new UploadError(`Error on HTTPS PUT to ${url}: ${describe(err)}`, { cause: err });
    }
    if (reply.statusCode !== 200) {
      throw new UploadError(`Error on HTTPS PUT, got response ${reply.statusCode}: ${reply.text}`);
    }

    this.filesUploaded += 1;
    this.logger.debug({ file: filePath, url }, 'Uploaded file');
  }

  async uploadDirectory(localDir: string, baseUrl: string, destPath: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(localDir, { withFileTypes: true });
    } catch (err) {
      throw new UploadError(`Unable to list ${localDir}: ${describe(err)}`, { cause: err });
    }
    const byName = (a: { name: string }, b: { name: string }) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

    for (const entry of entries.filter((e) => e.isFile()).sort(byName)) {
      await this.uploadFile(join(localDir, entry.name), baseUrl, destPath);
    }
    for (const entry of entries.filter((e) => e.isDirectory()).sort(byName)) {
      const childDest = posix.join(destPath, entry.name);
      await this.createDirectory(childDest, 'child directory');
      await this.uploadDirectory(join(localDir, entry.name), baseUrl, childDest);
    }
  }
}

export async function uploadToEndpoint(
  staging: FileStagingService,
  localPath: string,
  options: EndpointUploadOptions,
  logger: Logger
): Promise<EndpointUploadResult> {
  const endpointId = EndpointId(options.endpointId ?? DEFAULT_ENDPOINT_ID);
  const destPath = posix.join(
    options.destParent ?? DEFAULT_DEST_PARENT,
    options.destChild ?? randomUUID()
  );
  const uploader = new EndpointUploader(staging, endpointId, logger);

  await uploader.createDirectory(destPath, 'destination folder');
  const baseUrl = await uploader.resolveBaseUrl();

  const stats = await fs.stat(localPath).catch(() => null);
  if (stats?.isDirectory()) {
    await uploader.uploadDirectory(localPath, baseUrl, destPath);
  } else if (stats?.isFile()) {
    await uploader.uploadFile(localPath, baseUrl, destPath);
  } else {
    throw new UploadError(`Data path '${localPath}' is of unknown type`);
  }

  logger.info({ endpointId, destPath, files: uploader.count }, 'Upload complete');
  return {
    dataSource: makeFileManagerLink(endpointId, destPath),
    destPath,
    endpointId,
    filesUploaded: uploader.count,
  };
}
