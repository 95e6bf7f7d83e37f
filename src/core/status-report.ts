/**
 * Submission status filters and human-readable status summaries.
 */

import type { JsonValue } from "../types/json.js";
import type { SubmissionStatus } from "./responses.js";
import { ValidationError } from "./errors.js";

/**
 * Operators the status scan understands:
 *   ^   begins with          *   contains
 *   ==  equal (or field absent when value is null)
 *   !=  not equal (or field present when value is null)
 *   >  >=  <  <=            comparisons
 *   []  between, inclusive (value is a two-element list)
 *   in  one of (value is a list)
 */
export type StatusFilterOperator = "^" | "*" | "==" | "!=" | ">" | ">=" | "<" | "<=" | "[]" | "in";

export type StatusFilter = [field: string, operator: StatusFilterOperator, value: JsonValue];

/** A Date, or [year, month, day] in UTC with a 1-based month */
export type DateFilter = Date | [year: number, month: number, day: number];

export interface SubmissionFilterOptions {
  activeOnly?: boolean;
  includeTests?: boolean;
  /** Exclude submissions made before this date */
  newerThan?: DateFilter;
  /** Exclude submissions made after this date */
  olderThan?: DateFilter;
  /** Additional filters; all must match */
  filters?: StatusFilter[];
}

function toDate(value: DateFilter): Date {
  if (value instanceof Date) return value;
  const [year, month, day] = value;
  return new Date(Date.UTC(year, month - 1, day));
}

/** ISO-8601 in UTC, without milliseconds when they are zero */
export function formatFilterDate(date: Date): string {
  return date.toISOString().replace(/\.000Z$/, "Z");
}

/**
 * Combine the convenience options into the filter list sent to the service.
 * The caller's `filters` array is not modified.
 */
export function buildStatusFilters(
  options: SubmissionFilterOptions
): StatusFilter[] | ValidationError {
  const filters: StatusFilter[] = [...(options.filters ?? [])];

  if (options.activeOnly) {
    filters.push(["active", "==", true]);
  }
  if (options.includeTests === false) {
    filters.push(["test", "==", false]);
  }

  const newerThan = options.newerThan !== undefined ? toDate(options.newerThan) : undefined;
  const olderThan = options.olderThan !== undefined ? toDate(options.olderThan) : undefined;

  for (const [name, date] of [["newerThan", newerThan], ["olderThan", olderThan]] as const) {
    if (date && Number.isNaN(date.getTime())) {
      return new ValidationError(`${name} is not a valid date`);
    }
  }

  if (newerThan && olderThan) {
    if (newerThan.getTime() === olderThan.getTime()) {
      return new ValidationError(
        "Date filters cannot be identical. To see submissions made on a specific date, " +
          "set olderThan one day after the date in question, e.g. " +
          "newerThan: [2020, 2, 11], olderThan: [2020, 2, 12]."
      );
    }
    if (newerThan.getTime() > olderThan.getTime()) {
      return new ValidationError("newerThan must be before olderThan");
    }
  }

  if (newerThan) {
    filters.push(["submission_time", ">=", formatFilterDate(newerThan)]);
  }
  if (olderThan) {
    filters.push(["submission_time", "<=", formatFilterDate(olderThan)]);
  }

  return filters;
}

export type StatusWord =
  | "Failed"
  | "Processing"
  | "Succeeded"
  | "Cancelled"
  | "Not started"
  | "Retrying error"
  | "Unknown";

/**
 * Reduce a per-step status code string (one character per processing step)
 * to a single word.
 */
export function describeStatusCode(code: string): StatusWord {
  if (code.includes("F")) return "Failed";
  if (code.includes("P")) return "Processing";
  if (code.endsWith("S")) return "Succeeded";
  if (code.endsWith("X")) return "Cancelled";
  if (code.startsWith("z")) return "Not started";
  if (code.includes("R")) return "Retrying error";
  return "Unknown";
}

export function activeMessage(active: boolean | undefined): string {
  return active
    ? "This submission is still processing."
    : "This submission is no longer processing.";
}

/** One line per submission, or the full status message of each when verbose */
export function formatSubmissionList(submissions: SubmissionStatus[], verbose: boolean): string {
  if (verbose) {
    return submissions
      .map((sub) => `\n\n${sub.status_message}${activeMessage(sub.active)}`)
      .join("\n");
  }
  return submissions
    .map(
      (sub) =>
        `${sub.source_id}: ${sub.active ? "Processing" : "Not processing"} - ${describeStatusCode(sub.status_code)}`
    )
    .join("\n");
}
