/**
 * SubmissionBuilder - accumulates submission metadata and renders the envelope
 *
 * Collection setters (data sources, destinations, tags, organizations, links)
 * are cumulative until cleared. Keyed setters (index instructions, services,
 * project blocks) replace the entry for their key. Setters that take
 * free-form data check it is strict JSON first and leave the stored value
 * untouched when it is not.
 *
 * A builder is owned by one caller at a time; it is not safe to share
 * between overlapping asynchronous operations.
 */

import { z } from "zod";
import type { SourceId } from "../types/branded.js";
import type { JsonObject } from "../types/json.js";
import type {
  DatasetLink,
  DcBlockInput,
  IndexInstruction,
  IndexOptions,
  ServiceParameters,
  SubmissionEnvelope,
  SubmissionState,
  ValidationResult,
} from "../types/submission.js";
import { INDEX_DATA_TYPES } from "../types/submission.js";
import { buildDcBlock, renderDcBlock } from "./dc-block.js";
import { findJsonViolation } from "./json-compliance.js";

const IndexDataTypeSchema = z.enum(INDEX_DATA_TYPES);

function toList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? [...value] : [value];
}

function checkJson(label: string, value: unknown): ValidationResult {
  const violation = findJsonViolation(value);
  if (violation !== null) {
    return { ok: false, error: `Error: Your ${label} is invalid: ${violation}` };
  }
  return { ok: true };
}

const OK: ValidationResult = { ok: true };

function initialState(test: boolean): SubmissionState {
  return {
    dc: null,
    mdf: {},
    datasetAcl: null,
    mrr: {},
    custom: {},
    projects: {},
    dataSources: [],
    dataDestinations: [],
    externalUri: null,
    index: {},
    extractionConfig: {},
    services: {},
    tags: [],
    curation: false,
    noExtract: false,
    incrementalUpdate: null,
    updateMetadataOnly: false,
    test,
    update: false,
    sourceId: null,
  };
}

export class SubmissionBuilder {
  private state: SubmissionState;

  constructor(options: { test?: boolean } = {}) {
    this.state = initialState(options.test ?? false);
  }

  // ─── Required inputs ───────────────────────────────────────────────────

  /**
   * Create the dc (DataCite) block, replacing any previous one.
   * Extra DataCite fields go in `input.extraFields`.
   *
   * @throws {MissingRequiredFieldError} when the title or authors are empty
   */
  createDcBlock(input: DcBlockInput): ValidationResult {
    const check = checkJson("dc block", input.extraFields ?? {});
    if (!check.ok) return check;
    this.state.dc = buildDcBlock(input);
    return OK;
  }

  /** Locations of the data, with protocol (https://…, globus://…) */
  addDataSource(dataSource: string | string[]): void {
    this.state.dataSources.push(...toList(dataSource));
  }

  clearDataSources(): void {
    this.state.dataSources = [];
  }

  // ─── Recommended inputs ────────────────────────────────────────────────

  addTag(tag: string | string[]): void {
    this.state.tags.push(...toList(tag));
  }

  clearTags(): void {
    this.state.tags = [];
  }

  /**
   * Set indexing instructions for one data type. A second call for the
   * same data type replaces the first.
   */
  addIndex(dataType: string, mapping: JsonObject, options: IndexOptions = {}): ValidationResult {
    const parsedType = IndexDataTypeSchema.safeParse(dataType);
    if (!parsedType.success) {
      return {
        ok: false,
        error: `Error: Unsupported data type '${dataType}'. Supported types are: ${INDEX_DATA_TYPES.join(", ")}`,
      };
    }

    const check = checkJson("mapping", { mapping });
    if (!check.ok) return check;

    const instruction: IndexInstruction = { mapping: structuredClone(mapping) };
    if (options.delimiter !== undefined) {
      instruction.delimiter = options.delimiter;
    }
    if (options.naValues !== undefined) {
      instruction.na_values = toList(options.naValues);
    }

    this.state.index[parsedType.data] = instruction;
    return OK;
  }

  clearIndex(): void {
    this.state.index = {};
  }

  /**
   * Request an integrated service (e.g. "mdf_publish", "citrine", "mrr").
   * Without parameters the service is enabled with its defaults;
   * `false` cancels an earlier request.
   */
  addService(service: string, parameters: ServiceParameters = true): ValidationResult {
    const check = checkJson("service parameters", parameters);
    if (!check.ok) return check;
    this.state.services[service] = structuredClone(parameters);
    return OK;
  }

  clearServices(): void {
    this.state.services = {};
  }

  /** Route the dataset to test/sandbox resources. Survives `reset()`. */
  setTest(test: boolean): void {
    this.state.test = test;
  }

  addOrganization(organization: string | string[]): void {
    const existing = this.state.mdf.organizations ?? [];
    this.state.mdf.organizations = [...existing, ...toList(organization)];
  }

  clearOrganizations(): void {
    delete this.state.mdf.organizations;
  }

  addLinks(links: DatasetLink | DatasetLink[]): ValidationResult {
    const additions = toList(links);
    const check = checkJson("links", additions);
    if (!check.ok) return check;
    const existing = this.state.mdf.links ?? [];
    this.state.mdf.links = [...existing, ...structuredClone(additions)];
    return OK;
  }

  clearLinks(): void {
    delete this.state.mdf.links;
  }

  // ─── Optional inputs ───────────────────────────────────────────────────

  setCustomBlock(customFields: JsonObject): ValidationResult {
    const check = checkJson("custom block", customFields);
    if (!check.ok) return check;
    this.state.custom = structuredClone(customFields);
    return OK;
  }

  /** Describe custom fields; stored as `<field>_desc` in the custom block */
  setCustomDescriptions(descriptions: JsonObject): ValidationResult {
    const check = checkJson("custom descriptions", descriptions);
    if (!check.ok) return check;
    for (const [field, description] of Object.entries(descriptions)) {
      this.state.custom[`${field}_desc`] = structuredClone(description);
    }
    return OK;
  }

  /**
   * Identities granted read access to the whole dataset. When unset the
   * service treats the dataset as "public".
   */
  setBaseAcl(acl: string | string[]): void {
    this.state.mdf.acl = toList(acl);
  }

  clearBaseAcl(): void {
    delete this.state.mdf.acl;
  }

  /** Identities granted read access to the dataset entry only */
  setDatasetAcl(acl: string | string[]): void {
    this.state.datasetAcl = toList(acl);
  }

  clearDatasetAcl(): void {
    this.state.datasetAcl = null;
  }

  setSourceName(sourceName: string): void {
    this.state.mdf.source_name = sourceName;
  }

  clearSourceName(): void {
    delete this.state.mdf.source_name;
  }

  /**
   * Make this submission an incremental update of an earlier one: the
   * service reuses the earlier metadata for anything not set here.
   * Pass null to turn it off.
   */
  setIncrementalUpdate(sourceId: string | null): void {
    this.state.incrementalUpdate = sourceId;
  }

  setMetadataOnlyUpdate(updateMetadataOnly: boolean): void {
    this.state.updateMetadataOnly = updateMetadataOnly;
  }

  addDataDestination(dataDestination: string | string[]): void {
    this.state.dataDestinations.push(...toList(dataDestination));
  }

  clearDataDestinations(): void {
    this.state.dataDestinations = [];
  }

  /** Landing page outside MDF that also hosts the dataset */
  setExternalUri(uri: string): void {
    this.state.externalUri = uri;
  }

  clearExternalUri(): void {
    this.state.externalUri = null;
  }

  createMrrBlock(mrrData: JsonObject): ValidationResult {
    const check = checkJson("mrr block", mrrData);
    if (!check.ok) return check;
    this.state.mrr = structuredClone(mrrData);
    return OK;
  }

  // ─── Advanced inputs ───────────────────────────────────────────────────

  /** Skip metadata extraction from the dataset's files (stored as `no_extract`) */
  setPassthrough(passthrough: boolean): void {
    this.state.noExtract = passthrough;
  }

  /** Set a project block; null or an empty object removes it */
  setProjectBlock(project: string, data: JsonObject | null): ValidationResult {
    const check = checkJson("project block", data);
    if (!check.ok) return check;
    if (data && Object.keys(data).length > 0) {
      this.state.projects[project] = structuredClone(data);
    } else {
      delete this.state.projects[project];
    }
    return OK;
  }

  setCuration(curation: boolean): void {
    this.state.curation = curation;
  }

  setExtractionConfig(config: JsonObject): ValidationResult {
    const check = checkJson("extraction config", config);
    if (!check.ok) return check;
    this.state.extractionConfig = structuredClone(config);
    return OK;
  }

  // ─── Lifecycle state ───────────────────────────────────────────────────

  get sourceId(): SourceId | null {
    return this.state.sourceId;
  }

  get test(): boolean {
    return this.state.test;
  }

  /** @internal set by the client once the service accepted a submission */
  recordSubmission(sourceId: SourceId): void {
    this.state.sourceId = sourceId;
  }

  /** @internal the update flag travels with the envelope */
  markUpdate(update: boolean): void {
    this.state.update = update;
  }

  /** Deep copy of everything set so far */
  getState(): SubmissionState {
    return structuredClone(this.state);
  }

  /**
   * Render the canonical envelope. `dc`, `data_sources`, `test`, `update`
   * and `update_metadata_only` are always present; every other member only
   * when it holds something.
   */
  toEnvelope(): SubmissionEnvelope {
    const s = this.state;
    const envelope: SubmissionEnvelope = {
      dc: s.dc ? renderDcBlock(s.dc) : {},
      data_sources: s.dataSources,
      test: s.test,
      update: s.update,
      update_metadata_only: s.updateMetadataOnly,
    };

    if (Object.keys(s.mdf).length > 0) envelope.mdf = s.mdf;
    if (Object.keys(s.mrr).length > 0) envelope.mrr = s.mrr;
    if (Object.keys(s.custom).length > 0) envelope.custom = s.custom;
    if (Object.keys(s.projects).length > 0) envelope.projects = s.projects;
    if (s.dataDestinations.length > 0) envelope.data_destinations = s.dataDestinations;
    if (s.externalUri) envelope.external_uri = s.externalUri;
    if (Object.keys(s.index).length > 0) envelope.index = s.index;
    if (Object.keys(s.extractionConfig).length > 0) envelope.extraction_config = s.extractionConfig;
    if (Object.keys(s.services).length > 0) envelope.services = s.services;
    if (s.tags.length > 0) envelope.tags = s.tags;
    if (s.curation) envelope.curation = true;
    if (s.noExtract) envelope.no_extract = true;
    if (s.datasetAcl && s.datasetAcl.length > 0) envelope.dataset_acl = s.datasetAcl;
    if (s.incrementalUpdate) envelope.incremental_update = s.incrementalUpdate;

    return structuredClone(envelope);
  }

  /**
   * Clear all metadata and the recorded source id. The test flag is kept.
   * This cannot be undone.
   */
  reset(): { test: boolean } {
    this.state = initialState(this.state.test);
    return { test: this.state.test };
  }
}
