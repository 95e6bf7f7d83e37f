/**
 * Submission Envelope Types
 *
 * Wire shapes of the DataCite ("dc") block and the submission envelope sent
 * to the Connect service, plus the builder's in-memory state.
 */

import type { JsonObject, JsonValue } from "./json.js";
import type { SourceId } from "./branded.js";

// =============================================================================
// § DataCite block
// =============================================================================

/** An affiliation entry: one institution, or several for a single author */
export type AffiliationEntry = string | string[];

export interface DcTitle {
  title: string;
}

export interface DcCreator {
  creatorName: string;
  familyName: string;
  givenName: string;
  /** Omitted when the author has no affiliations */
  affiliations?: AffiliationEntry[];
}

export interface DcResourceType {
  resourceTypeGeneral: "Dataset";
  resourceType: string;
}

export interface DcDescription {
  description: string;
  descriptionType: "Other";
}

export interface DcIdentifier {
  identifier: string;
  identifierType: "DOI";
}

export interface DcRelatedIdentifier {
  relatedIdentifier: string;
  relatedIdentifierType: "DOI";
  relationType: "IsPartOf";
}

export interface DcSubject {
  subject: string;
}

/**
 * The structured part of the dc block. Optional members are absent
 * (not undefined) when the caller did not supply them.
 */
export interface DataCiteRecord {
  titles: DcTitle[];
  creators: DcCreator[];
  publisher: string;
  publicationYear: string;
  resourceType: DcResourceType;
  descriptions?: DcDescription[];
  identifier?: DcIdentifier;
  relatedIdentifiers?: DcRelatedIdentifier[];
  subjects?: DcSubject[];
}

/**
 * A dc block as stored by the builder: the structured record plus the
 * caller's extra DataCite fields, merged on top when rendered.
 */
export interface DcBlock {
  record: DataCiteRecord;
  extensions: JsonObject;
}

export interface DcBlockInput {
  title: string | string[];
  authors: string | string[];
  affiliations?: string | AffiliationEntry[] | null;
  publisher?: string | null;
  publicationYear?: string | number | null;
  resourceType?: string | null;
  description?: string | null;
  datasetDoi?: string | null;
  relatedDois?: string | string[] | null;
  subjects?: string | string[] | null;
  /** Additional DataCite fields, deep-merged over the assembled record */
  extraFields?: JsonObject;
}

// =============================================================================
// § Indexing instructions
// =============================================================================

export const INDEX_DATA_TYPES = ["json", "csv", "yaml", "xml", "excel", "filename"] as const;

export type IndexDataType = (typeof INDEX_DATA_TYPES)[number];

export interface IndexInstruction {
  /** MDF field (dot notation) → field in the source data */
  mapping: JsonObject;
  delimiter?: string;
  na_values?: string[];
}

export interface IndexOptions {
  delimiter?: string;
  naValues?: string | string[];
}

// =============================================================================
// § Other blocks
// =============================================================================

/** `true` enables a service with default parameters, `false` cancels it */
export type ServiceParameters = boolean | JsonObject;

export interface DatasetLink {
  type?: string;
  doi?: string;
  url?: string;
  description?: string;
  bibtex?: string;
}

export interface MdfBlock {
  acl?: string[];
  source_name?: string;
  organizations?: string[];
  links?: DatasetLink[];
}

// =============================================================================
// § Builder state
// =============================================================================

export interface SubmissionState {
  dc: DcBlock | null;
  mdf: MdfBlock;
  datasetAcl: string[] | null;
  mrr: JsonObject;
  custom: JsonObject;
  projects: Record<string, JsonObject>;
  dataSources: string[];
  dataDestinations: string[];
  externalUri: string | null;
  index: Partial<Record<IndexDataType, IndexInstruction>>;
  extractionConfig: JsonObject;
  services: Record<string, ServiceParameters>;
  tags: string[];
  curation: boolean;
  noExtract: boolean;
  incrementalUpdate: string | null;
  updateMetadataOnly: boolean;
  test: boolean;
  update: boolean;
  sourceId: SourceId | null;
}

// =============================================================================
// § Envelope
// =============================================================================

/**
 * The canonical request document. The first five members are always
 * present; the rest only when set.
 */
export type SubmissionEnvelope = {
  dc: Record<string, unknown>;
  data_sources: string[];
  test: boolean;
  update: boolean;
  update_metadata_only: boolean;
  mdf?: MdfBlock;
  mrr?: JsonObject;
  custom?: JsonObject;
  projects?: Record<string, JsonObject>;
  data_destinations?: string[];
  external_uri?: string;
  index?: Partial<Record<IndexDataType, IndexInstruction>>;
  extraction_config?: JsonObject;
  services?: Record<string, ServiceParameters>;
  tags?: string[];
  curation?: boolean;
  no_extract?: boolean;
  dataset_acl?: string[];
  incremental_update?: string;
};

/** A caller-assembled envelope; the service defines its schema */
export type EnvelopeDocument = Record<string, unknown>;

/** Outcome of a setter that validates its argument before storing it */
export type ValidationResult = { ok: true } | { ok: false; error: string };

export type { JsonObject, JsonValue };
