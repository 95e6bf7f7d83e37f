/**
 * Connect client
 * Build dataset submissions and follow them through processing and curation
 */

// =============================================================================
// Client
// =============================================================================

export { ConnectClient } from './client.js';
export type {
  ConnectClientOptions,
  OperationResult,
  SubmitOptions,
  SubmitResult,
  MetadataUpdateOptions,
  StatusResult,
  SubmissionListOptions,
  SubmissionListResult,
  CurationTaskResult,
  CurationTaskListOptions,
  CurationTaskListResult,
  CurationOptions,
  CurationVerdictResult,
} from './client.js';
export { loadClientConfigFromEnv, createClientFromEnv } from './config.js';
export type { ClientConfig } from './config.js';
export { SERVICE_LOCATIONS, ROUTES, resolveServiceInstance } from './core/service-location.js';
export type { ServiceInstance } from './core/service-location.js';
export { VERSION } from './version.js';

// =============================================================================
// Submission metadata
// =============================================================================

export { SubmissionBuilder } from './core/submission-builder.js';
export {
  buildDcBlock,
  renderDcBlock,
  normalizePublicationYear,
  DEFAULT_PUBLISHER,
  DEFAULT_RESOURCE_TYPE,
} from './core/dc-block.js';
export { splitName, formatCreatorName } from './core/name-parser.js';
export type { SplitName } from './core/name-parser.js';
export { findJsonViolation } from './core/json-compliance.js';
export { mergeExtensions } from './core/deep-merge.js';
export type {
  AffiliationEntry,
  DataCiteRecord,
  DcBlock,
  DcBlockInput,
  DcCreator,
  IndexDataType,
  IndexInstruction,
  IndexOptions,
  ServiceParameters,
  DatasetLink,
  MdfBlock,
  SubmissionState,
  SubmissionEnvelope,
  EnvelopeDocument,
  ValidationResult,
} from './types/submission.js';
export { INDEX_DATA_TYPES } from './types/submission.js';
export type { JsonPrimitive, JsonValue, JsonObject } from './types/json.js';
export { SourceId, EndpointId } from './types/branded.js';

// =============================================================================
// Status and curation
// =============================================================================

export {
  buildStatusFilters,
  describeStatusCode,
  formatFilterDate,
  formatSubmissionList,
} from './core/status-report.js';
export type {
  StatusFilter,
  StatusFilterOperator,
  DateFilter,
  SubmissionFilterOptions,
  StatusWord,
} from './core/status-report.js';
export {
  CurationVerdictSchema,
  DEFAULT_CURATION_REASONS,
  formatCurationSummary,
  formatCurationTaskDetail,
} from './core/curation.js';
export type { CurationPrompt, CurationConfirmationRequest, CurationVerdict } from './core/curation.js';
export { createTerminalCurationPrompt } from './cli/curation-prompt.js';
export type { CurationTask, StatusResponse, SubmissionStatus } from './core/responses.js';

// =============================================================================
// Collaborators
// =============================================================================

export type { Authorizer } from './auth/authorizer.js';
export { StaticTokenAuthorizer, RefreshingTokenAuthorizer, NullAuthorizer } from './auth/authorizer.js';
export type { Transport, TransportResponse, ResponseBody, FetchTransportOptions } from './transport/transport.js';
export { FetchTransport } from './transport/transport.js';
export type { FileStagingService, PutFileResponse, TransferStagingServiceOptions } from './storage/staging-service.js';
export { TransferStagingService, TRANSFER_API_URL } from './storage/staging-service.js';
export { DEFAULT_ENDPOINT_ID, makeFileManagerLink } from './storage/endpoint-upload.js';
export type { EndpointUploadOptions, EndpointUploadResult } from './storage/endpoint-upload.js';

// =============================================================================
// Errors and logging
// =============================================================================

export {
  ConnectError,
  ValidationError,
  AlreadySubmittedError,
  AuthorizationError,
  RemoteError,
  DecodeError,
  NotFoundError,
  InvalidVerdictError,
  CurationCancelledError,
  NetworkError,
  ConfigError,
  MissingRequiredFieldError,
  UploadError,
} from './core/errors.js';
export type { ConnectErrorKind } from './core/errors.js';
export { createLogger, getLogger, setLogger, createChildLogger } from './logging.js';
export type { LoggerOptions, LogFormat, LogLevel } from './logging.js';
export { resolveSecret } from './secrets.js';
