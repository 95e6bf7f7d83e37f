/**
 * Curation verdicts and the confirmation hook.
 */

import { z } from "zod";
import { isPlainObject } from "../types/json.js";
import type { CurationTask } from "./responses.js";

export const CurationVerdictSchema = z.enum(["accept", "reject"]);

export type CurationVerdict = z.infer<typeof CurationVerdictSchema>;

export const DEFAULT_CURATION_REASONS: Readonly<Record<CurationVerdict, string>> = {
  accept: "This submission has been accepted because it meets the appropriate standards",
  reject: "This submission has been rejected because it does not meet the appropriate standards",
};

export interface CurationConfirmationRequest {
  verdict: CurationVerdict;
  sourceId: string;
  /** Summary of the task being decided */
  summary: string;
}

/**
 * Asks a person to confirm a verdict before it is sent.
 * Tests supply canned answers; `createTerminalCurationPrompt()` asks on a TTY.
 */
export interface CurationPrompt {
  confirm(request: CurationConfirmationRequest): Promise<boolean>;
  /** Reason to record; an empty answer falls back to the default reason */
  askReason(verdict: CurationVerdict): Promise<string>;
}

export function formatCurationSummary(task: CurationTask): string {
  return (
    `${task.source_id} by ${task.submission_info.submitter}\n` +
    `Waiting since ${task.curation_start_date}\n` +
    `${task.extraction_summary}\n`
  );
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(value[key])])
    );
  }
  return value;
}

/** Full task as indented JSON with sorted keys */
export function formatCurationTaskJson(task: CurationTask): string {
  return JSON.stringify(sortKeys(task), null, 4);
}

export function formatCurationTaskDetail(task: CurationTask): string {
  return `========== ${task.source_id} ==========\n${formatCurationTaskJson(task)}\n`;
}
