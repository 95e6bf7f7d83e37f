/**
 * DataCite ("dc") block assembly.
 *
 * Turns loosely-shaped caller input (single values or lists, nested
 * affiliation lists, extra DataCite fields) into the structured record the
 * service expects. See https://schema.datacite.org/meta/kernel-4.1/ for the
 * field vocabulary.
 */

import type {
  AffiliationEntry,
  DataCiteRecord,
  DcBlock,
  DcBlockInput,
  DcCreator,
} from "../types/submission.js";
import { MissingRequiredFieldError } from "./errors.js";
import { mergeExtensions } from "./deep-merge.js";
import { formatCreatorName, splitName } from "./name-parser.js";

export const DEFAULT_PUBLISHER = "Materials Data Facility";
export const DEFAULT_RESOURCE_TYPE = "Dataset";

type Listish<T> = T | T[] | null | undefined;

function isBlank(value: Listish<unknown>): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string" || Array.isArray(value)) return value.length === 0;
  return false;
}

function toList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? [...value] : [value];
}

/**
 * Affiliations line up with authors only when there is exactly one entry
 * per author. Any other count applies the whole list to every author.
 */
function alignAffiliations(
  authorCount: number,
  affiliations: DcBlockInput["affiliations"]
): AffiliationEntry[][] {
  const entries: AffiliationEntry[] = isBlank(affiliations)
    ? []
    : toList<AffiliationEntry>(affiliations ?? []);

  if (entries.length === authorCount) {
    return entries.map((entry) => (Array.isArray(entry) ? [...entry] : [entry]));
  }

  return Array.from({ length: authorCount }, () =>
    entries.map((entry) => (Array.isArray(entry) ? [...entry] : entry))
  );
}

function buildCreator(author: string, affiliations: AffiliationEntry[]): DcCreator {
  const name = splitName(author);
  const creator: DcCreator = {
    creatorName: formatCreatorName(name),
    familyName: name.family,
    givenName: name.given,
  };
  if (affiliations.length > 0) {
    creator.affiliations = affiliations;
  }
  return creator;
}

/** Integer-like input is kept; anything else becomes the current year */
export function normalizePublicationYear(value: DcBlockInput["publicationYear"]): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(Math.trunc(value));
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return String(parseInt(value, 10));
  }
  return String(new Date().getFullYear());
}

/**
 * Build a dc block from caller input.
 *
 * @throws {MissingRequiredFieldError} when the title, the authors, or both are empty
 */
export function buildDcBlock(input: DcBlockInput): DcBlock {
  const missingTitle = isBlank(input.title);
  const missingAuthors = isBlank(input.authors);
  if (missingTitle && missingAuthors) {
    throw new MissingRequiredFieldError("'title' and 'authors' are required arguments.");
  }
  if (missingTitle) {
    throw new MissingRequiredFieldError("'title' is a required argument.");
  }
  if (missingAuthors) {
    throw new MissingRequiredFieldError("'authors' is a required argument.");
  }

  const authors = toList(input.authors);
  const affiliations = alignAffiliations(authors.length, input.affiliations);

  const record: DataCiteRecord = {
    titles: toList(input.title).map((title) => ({ title })),
    creators: authors.map((author, i) => buildCreator(author, affiliations[i] ?? [])),
    publisher: input.publisher || DEFAULT_PUBLISHER,
    publicationYear: normalizePublicationYear(input.publicationYear),
    resourceType: {
      resourceTypeGeneral: "Dataset",
      resourceType: input.resourceType || DEFAULT_RESOURCE_TYPE,
    },
  };

  if (input.description) {
    record.descriptions = [{ description: input.description, descriptionType: "Other" }];
  }

  if (input.datasetDoi) {
    record.identifier = { identifier: input.datasetDoi, identifierType: "DOI" };
  }

  if (input.relatedDois && !isBlank(input.relatedDois)) {
    record.relatedIdentifiers = toList(input.relatedDois).map((doi) => ({
      relatedIdentifier: doi,
      relatedIdentifierType: "DOI",
      relationType: "IsPartOf",
    }));
  }

  if (input.subjects && !isBlank(input.subjects)) {
    record.subjects = toList(input.subjects).map((subject) => ({ subject }));
  }

  return {
    record,
    extensions: structuredClone(input.extraFields ?? {}),
  };
}

/** The dc block as it appears on the wire: record with extensions merged over it */
export function renderDcBlock(block: DcBlock): Record<string, unknown> {
  return mergeExtensions({ ...block.record }, block.extensions);
}
