/**
 * ConnectClient - submits datasets to the Connect service and follows them
 * through processing and curation.
 *
 * Metadata is assembled on `client.submission` (a SubmissionBuilder) and
 * sent with `submitDataset()`. Every network operation resolves to a result
 * record; expected failures are reported in it, never thrown.
 *
 * A client holds mutable submission state and a single set of credentials.
 * Do not run its operations concurrently.
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import type { Authorizer } from './auth/authorizer.js';
import { createTerminalCurationPrompt } from './cli/curation-prompt.js';
import type { CurationPrompt } from './core/curation.js';
import {
  CurationVerdictSchema,
  DEFAULT_CURATION_REASONS,
  formatCurationSummary,
  formatCurationTaskDetail,
  formatCurationTaskJson,
} from './core/curation.js';
import type { ConnectErrorKind } from './core/errors.js';
import {
  AlreadySubmittedError,
  AuthorizationError,
  ConfigError,
  ConnectError,
  CurationCancelledError,
  InvalidVerdictError,
  NetworkError,
  NotFoundError,
  ValidationError,
} from './core/errors.js';
import { findJsonViolation } from './core/json-compliance.js';
import type { CurationTask, StatusResponse, SubmissionStatus } from './core/responses.js';
import {
  CurationTaskListResponseSchema,
  CurationTaskResponseSchema,
  MessageResponseSchema,
  StatusResponseSchema,
  SubmissionListResponseSchema,
  SubmitResponseSchema,
  interpretResponse,
} from './core/responses.js';
import type { ServiceInstance } from './core/service-location.js';
import { ROUTES, SERVICE_LOCATIONS, resolveServiceInstance } from './core/service-location.js';
import type { SubmissionFilterOptions } from './core/status-report.js';
import { activeMessage, buildStatusFilters, formatSubmissionList } from './core/status-report.js';
import { SubmissionBuilder } from './core/submission-builder.js';
import { createChildLogger } from './logging.js';
import type { EndpointUploadOptions, EndpointUploadResult } from './storage/endpoint-upload.js';
import { uploadToEndpoint } from './storage/endpoint-upload.js';
import type { FileStagingService } from './storage/staging-service.js';
import type { Transport, TransportResponse } from './transport/transport.js';
import { FetchTransport } from './transport/transport.js';
import { SourceId } from './types/branded.js';
import { isPlainObject } from './types/json.js';
import type { EnvelopeDocument } from './types/submission.js';
import { VERSION } from './version.js';

// =============================================================================
// § Options and results
// =============================================================================

export interface ConnectClientOptions {
  /** Route submissions to test resources (default: false) */
  test?: boolean;
  /** `prod` / `production` (default) or `dev` / `development` */
  serviceInstance?: string;
  authorizer?: Authorizer;
  /** Defaults to a FetchTransport */
  transport?: Transport;
  /** Only used when `transport` is not given */
  requestTimeoutMs?: number;
  /** Needed by `uploadToEndpoint()` */
  staging?: FileStagingService;
  /** Confirms curation verdicts; defaults to a terminal prompt */
  curationPrompt?: CurationPrompt;
  logger?: Logger;
}

export interface OperationResult {
  success: boolean;
  error: string | null;
  errorType: ConnectErrorKind | null;
  /** HTTP status of the last response, when one was received */
  statusCode?: number;
}

export interface SubmitResult extends OperationResult {
  sourceId: SourceId | null;
}

export interface SubmitOptions {
  /** Resubmit a dataset that was already submitted */
  update?: boolean;
  /** Send this envelope instead of the builder's */
  submission?: EnvelopeDocument;
  /** Clear the builder once the service has answered, whatever the answer */
  reset?: boolean;
}

export interface MetadataUpdateOptions {
  /** Defaults to the builder's envelope */
  metadataUpdate?: EnvelopeDocument;
  reset?: boolean;
}

export interface StatusResult extends OperationResult {
  sourceId: string | null;
  active: boolean | null;
  statusMessage: string | null;
  summary: string | null;
  status: StatusResponse | null;
}

export interface SubmissionListOptions extends SubmissionFilterOptions {
  /** Full status message per submission instead of one line each */
  verbose?: boolean;
  /** Administrator function code (e.g. "all") */
  adminCode?: string;
}

export interface SubmissionListResult extends OperationResult {
  submissions: SubmissionStatus[];
  summary: string | null;
}

export interface CurationTaskResult extends OperationResult {
  task: CurationTask | null;
  summary: string | null;
  /** The whole task as indented JSON */
  detail: string | null;
}

export interface CurationTaskListOptions {
  /** Summaries only (default) rather than every task in full */
  summary?: boolean;
  /** Administrator function code (e.g. "all") */
  adminCode?: string;
}

export interface CurationTaskListResult extends OperationResult {
  tasks: CurationTask[];
  summary: string | null;
}

export interface CurationOptions {
  /** Defaults to the standard reason for the verdict */
  reason?: string;
  /** Ask for confirmation first (default: true) */
  prompt?: boolean;
}

export interface CurationVerdictResult extends OperationResult {
  message: string | null;
}

/** Metadata the update route may not change */
const METADATA_UPDATE_EXCLUDED_KEYS = [
  'data_sources',
  'test',
  'update',
  'data_destinations',
  'index',
  'extraction_config',
  'services',
  'curation',
  'no_extract',
  'incremental_update',
  'update_metadata_only',
] as const;

const NO_CURATION_TASKS = 'You have no open curation tasks.';

type CallOutcome<T> =
  | { ok: true; statusCode: number; data: T }
  | { ok: false; statusCode?: number; error: ConnectError };

function failure(error: ConnectError, statusCode?: number): OperationResult {
  const result: OperationResult = { success: false, error: error.message, errorType: error.kind };
  if (statusCode !== undefined) {
    result.statusCode = statusCode;
  }
  return result;
}

function success(statusCode: number): OperationResult {
  return { success: true, error: null, errorType: null, statusCode };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function hasContent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

/** Local checks an envelope must pass before it is sent */
function validateEnvelope(envelope: EnvelopeDocument, label: string): ValidationError | null {
  const inheritsMetadata =
    Boolean(envelope['incremental_update']) || envelope['update_metadata_only'] === true;
  if (
    (!hasContent(envelope['dc']) || !hasContent(envelope['data_sources'])) &&
    !inheritsMetadata
  ) {
    return new ValidationError('You must populate the dc and data blocks before submission.');
  }
  const violation = findJsonViolation(envelope);
  if (violation !== null) {
    return new ValidationError(`The ${label} JSON is invalid: ${violation}`);
  }
  return null;
}

// =============================================================================
// § Client
// =============================================================================

export class ConnectClient {
  /** Metadata for the next submission */
  readonly submission: SubmissionBuilder;
  readonly serviceInstance: ServiceInstance;
  readonly serviceLocation: string;

  private authorizer: Authorizer | null;
  private readonly transport: Transport;
  private readonly staging?: FileStagingService;
  private readonly curationPrompt?: CurationPrompt;
  private readonly logger: Logger;

  /**
   * @throws {ConfigError} for an unknown service instance or a missing authorizer
   */
  constructor(options: ConnectClientOptions = {}) {
    this.serviceInstance = resolveServiceInstance(options.serviceInstance);
    this.serviceLocation = SERVICE_LOCATIONS[this.serviceInstance];
    if (!options.authorizer) {
      throw new ConfigError('Unable to authenticate: an authorizer is required');
    }
    this.authorizer = options.authorizer;
    this.transport =
      options.transport ?? new FetchTransport({ timeoutMs: options.requestTimeoutMs });
    this.staging = options.staging;
    this.curationPrompt = options.curationPrompt;
    this.logger =
      options.logger ?? createChildLogger({ component: 'ConnectClient', instance: this.serviceInstance });
    this.submission = new SubmissionBuilder({ test: options.test ?? false });
  }

  get version(): string {
    return VERSION;
  }

  /**
   * Clear the submission metadata and the recorded source id. The test
   * flag is kept.
   */
  resetSubmission(): { test: boolean; serviceLocation: string } {
    const { test } = this.submission.reset();
    return { test, serviceLocation: this.serviceLocation };
  }

  /** Forget the credentials and the submission. Later requests fail with an AuthorizationError. */
  logout(): void {
    this.submission.reset();
    this.authorizer = null;
    this.logger.info('Logged out');
  }

  // ─── Submission ────────────────────────────────────────────────────────

  async submitDataset(options: SubmitOptions = {}): Promise<SubmitResult> {
    const update = options.update ?? false;
    let envelope: EnvelopeDocument;

    if (options.submission) {
      envelope = options.submission;
    } else {
      if (!update && this.submission.sourceId) {
        return { ...failure(new AlreadySubmittedError()), sourceId: null };
      }
      this.submission.markUpdate(update);
      envelope = this.submission.toEnvelope();
    }

    const invalid = validateEnvelope(envelope, 'submission');
    if (invalid) {
      return { ...failure(invalid), sourceId: null };
    }

    const outcome = await this.call(
      'POST',
      `${this.serviceLocation}${ROUTES.submit}`,
      envelope,
      SubmitResponseSchema,
      'submitting dataset'
    );
    if (outcome.ok) {
      this.submission.recordSubmission(SourceId(outcome.data.source_id));
      this.logger.info({ sourceId: outcome.data.source_id, update }, 'Dataset submitted');
    }

    const sourceId = this.submission.sourceId;
    if (options.reset) {
      this.resetSubmission();
    }
    const status = outcome.ok ? success(outcome.statusCode) : failure(outcome.error, outcome.statusCode);
    return { ...status, sourceId };
  }

  /**
   * Change the metadata of an existing submission without resubmitting its
   * data. Keys that only make sense for a full submission are dropped.
   */
  async submitDatasetMetadataUpdate(
    sourceId: string,
    options: MetadataUpdateOptions = {}
  ): Promise<OperationResult> {
    const metadataUpdate: EnvelopeDocument = {
      ...(options.metadataUpdate ?? this.submission.toEnvelope()),
    };
    for (const key of METADATA_UPDATE_EXCLUDED_KEYS) {
      delete metadataUpdate[key];
    }

    const violation = findJsonViolation(metadataUpdate);
    if (violation !== null) {
      return failure(new ValidationError(`The metadata update JSON is invalid: ${violation}`));
    }

    const outcome = await this.call(
      'POST',
      `${this.serviceLocation}${ROUTES.metadataUpdate}${encodeURIComponent(sourceId)}`,
      metadataUpdate,
      MessageResponseSchema,
      'updating dataset metadata'
    );
    if (outcome.ok) {
      this.logger.info({ sourceId }, 'Dataset metadata updated');
    }
    if (options.reset) {
      this.resetSubmission();
    }
    return outcome.ok ? success(outcome.statusCode) : failure(outcome.error, outcome.statusCode);
  }

  // ─── Status ────────────────────────────────────────────────────────────

  /**
   * Status of one of your submissions; defaults to the last one submitted.
   *
   * @param options.short - one-line summary instead of the full status message
   */
  async checkStatus(sourceId?: string, options: { short?: boolean } = {}): Promise<StatusResult> {
    const empty = { active: null, statusMessage: null, summary: null, status: null };
    const id = sourceId ?? this.submission.sourceId;
    if (!id) {
      return { ...failure(new ValidationError('No dataset submitted')), sourceId: null, ...empty };
    }

    const outcome = await this.call(
      'GET',
      `${this.serviceLocation}${ROUTES.status}${encodeURIComponent(id)}`,
      undefined,
      StatusResponseSchema,
      'fetching status'
    );
    if (!outcome.ok) {
      return { ...failure(outcome.error, outcome.statusCode), sourceId: id, ...empty };
    }

    const { status } = outcome.data;
    const message = activeMessage(status.active);
    return {
      ...success(outcome.statusCode),
      sourceId: id,
      active: status.active ?? false,
      statusMessage: status.status_message ?? null,
      summary: options.short
        ? `${id}: ${message}`
        : `\n${status.status_message ?? ''}\n${message}\n`,
      status: outcome.data,
    };
  }

  /** Status of every submission you can see, narrowed by the given filters */
  async checkAllSubmissions(options: SubmissionListOptions = {}): Promise<SubmissionListResult> {
    const filters = buildStatusFilters(options);
    if (filters instanceof ValidationError) {
      return { ...failure(filters), submissions: [], summary: null };
    }

    const outcome = await this.call(
      'POST',
      `${this.serviceLocation}${ROUTES.allStatus}${options.adminCode ?? ''}`,
      { filters },
      SubmissionListResponseSchema,
      'fetching status'
    );
    if (!outcome.ok) {
      return { ...failure(outcome.error, outcome.statusCode), submissions: [], summary: null };
    }

    const { submissions } = outcome.data;
    return {
      ...success(outcome.statusCode),
      submissions,
      summary: formatSubmissionList(submissions, options.verbose ?? false),
    };
  }

  // ─── Curation ──────────────────────────────────────────────────────────

  async getCurationTask(sourceId: string): Promise<CurationTaskResult> {
    const outcome = await this.lookupCurationTask(sourceId);
    if (!outcome.ok) {
      return {
        ...failure(outcome.error, outcome.statusCode),
        task: null,
        summary: null,
        detail: null,
      };
    }
    return {
      ...success(outcome.statusCode),
      task: outcome.data,
      summary: formatCurationSummary(outcome.data),
      detail: formatCurationTaskJson(outcome.data),
    };
  }

  async getAvailableCurationTasks(
    options: CurationTaskListOptions = {}
  ): Promise<CurationTaskListResult> {
    const outcome = await this.call(
      'GET',
      `${this.serviceLocation}${ROUTES.allCuration}${options.adminCode ?? ''}`,
      undefined,
      CurationTaskListResponseSchema,
      'fetching curation tasks'
    );
    if (!outcome.ok) {
      return { ...failure(outcome.error, outcome.statusCode), tasks: [], summary: null };
    }

    const tasks = outcome.data.curation_tasks;
    let summary: string;
    if (tasks.length === 0) {
      summary = NO_CURATION_TASKS;
    } else if (options.summary ?? true) {
      summary = tasks.map(formatCurationSummary).join('\n');
    } else {
      summary = tasks.map(formatCurationTaskDetail).join('\n\n');
    }
    return { ...success(outcome.statusCode), tasks, summary };
  }

  /**
   * Accept or reject a submission waiting for curation. The task must
   * exist; unless `prompt` is false the curation prompt confirms the
   * verdict and, when no reason was given, asks for one.
   */
  async completeCuration(
    sourceId: string,
    verdict: string,
    options: CurationOptions = {}
  ): Promise<CurationVerdictResult> {
    const normalized = verdict.trim().toLowerCase();
    const parsedVerdict = CurationVerdictSchema.safeParse(normalized);
    if (!parsedVerdict.success) {
      return {
        ...failure(new InvalidVerdictError(normalized, CurationVerdictSchema.options)),
        message: null,
      };
    }
    const action = parsedVerdict.data;

    const task = await this.lookupCurationTask(sourceId);
    if (!task.ok) {
      return { ...failure(task.error, task.statusCode), message: null };
    }

    let reason = options.reason?.trim() ?? '';
    if (options.prompt ?? true) {
      const prompt = this.curationPrompt ?? createTerminalCurationPrompt();
      const confirmed = await prompt.confirm({
        verdict: action,
        sourceId,
        summary: formatCurationSummary(task.data),
      });
      if (!confirmed) {
        return { ...failure(new CurationCancelledError()), message: null };
      }
      if (!reason) {
        reason = (await prompt.askReason(action)).trim();
      }
    }
    if (!reason) {
      reason = DEFAULT_CURATION_REASONS[action];
    }

    const outcome = await this.call(
      'POST',
      `${this.serviceLocation}${ROUTES.curation}${encodeURIComponent(sourceId)}`,
      { action, reason },
      MessageResponseSchema,
      'submitting curation verdict'
    );
    if (!outcome.ok) {
      return { ...failure(outcome.error, outcome.statusCode), message: null };
    }
    this.logger.info({ sourceId, verdict: action }, 'Curation verdict recorded');
    return { ...success(outcome.statusCode), message: outcome.data.message ?? null };
  }

  acceptCurationSubmission(
    sourceId: string,
    options: CurationOptions = {}
  ): Promise<CurationVerdictResult> {
    return this.completeCuration(sourceId, 'accept', options);
  }

  rejectCurationSubmission(
    sourceId: string,
    options: CurationOptions = {}
  ): Promise<CurationVerdictResult> {
    return this.completeCuration(sourceId, 'reject', options);
  }

  // ─── File staging ──────────────────────────────────────────────────────

  /**
   * Upload a local file or directory to a staging endpoint. The returned
   * `dataSource` can be passed to `submission.addDataSource()`.
   *
   * @throws {UploadError} when any directory or file cannot be staged
   * @throws {ConfigError} when the client has no staging service
   */
  async uploadToEndpoint(
    localPath: string,
    options: EndpointUploadOptions = {}
  ): Promise<EndpointUploadResult> {
    if (!this.staging) {
      throw new ConfigError('File uploads need a staging service; pass `staging` to the client');
    }
    return uploadToEndpoint(this.staging, localPath, options, this.logger);
  }

  // ─── Requests ──────────────────────────────────────────────────────────

  /**
   * Send one request with the current credentials. A 401/403 gets one
   * credential refresh and one resend.
   */
  private async send(
    method: 'GET' | 'POST',
    url: string,
    body?: unknown
  ): Promise<TransportResponse | ConnectError> {
    const authorizer = this.authorizer;
    if (!authorizer) {
      return new AuthorizationError('Logged out. Create a new client to log in again.');
    }

    const attempt = async (): Promise<TransportResponse> => {
      const headers: Record<string, string> = {};
      const authorization = await authorizer.getAuthorizationHeader();
      if (authorization) {
        headers['Authorization'] = authorization;
      }
      return method === 'GET'
        ? this.transport.getJson(url, headers)
        : this.transport.postJson(url, body, headers);
    };

    this.logger.debug({ method, url }, 'Sending request');
    try {
      const first = await attempt();
      if (first.statusCode !== 401 && first.statusCode !== 403) {
        return first;
      }
      this.logger.warn({ url, statusCode: first.statusCode }, 'Refreshing credentials');
      try {
        await authorizer.handleMissingAuthorization();
      } catch (err) {
        return new AuthorizationError(
          `Unable to refresh credentials: ${describe(err)}`,
          first.statusCode
        );
      }
      return await attempt();
    } catch (err) {
      return new NetworkError(`Request to ${url} failed: ${describe(err)}`);
    }
  }

  private async call<T>(
    method: 'GET' | 'POST',
    url: string,
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    action: string
  ): Promise<CallOutcome<T>> {
    const response = await this.send(method, url, body);
    if (response instanceof ConnectError) {
      this.logger.warn({ url, errorType: response.kind }, response.message);
      return { ok: false, error: response };
    }
    const outcome = interpretResponse(response, schema, action);
    if (!outcome.ok) {
      this.logger.warn(
        { url, statusCode: outcome.statusCode, errorType: outcome.error.kind },
        outcome.error.message
      );
    }
    return outcome;
  }

  private async lookupCurationTask(sourceId: string): Promise<CallOutcome<CurationTask>> {
    const url = `${this.serviceLocation}${ROUTES.curation}${encodeURIComponent(sourceId)}`;
    const response = await this.send('GET', url);
    if (response instanceof ConnectError) {
      return { ok: false, error: response };
    }
    if (response.statusCode === 404) {
      const body = response.body;
      const detail = body.kind === 'json' && isPlainObject(body.value) ? body.value['error'] : undefined;
      return {
        ok: false,
        statusCode: 404,
        error: new NotFoundError(typeof detail === 'string' ? detail : 'Curation task not found'),
      };
    }
    const outcome = interpretResponse(response, CurationTaskResponseSchema, 'fetching curation task');
    if (!outcome.ok) {
      return outcome;
    }
    return { ok: true, statusCode: outcome.statusCode, data: outcome.data.curation_task };
  }
}
