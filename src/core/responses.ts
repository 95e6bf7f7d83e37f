/**
 * Connect service response shapes and their interpretation.
 *
 * Every route answers with JSON. A response is a success only when the
 * status is below 300, the body decodes, and the payload has the shape the
 * route promises.
 */

import { z } from "zod";
import type { TransportResponse } from "../transport/transport.js";
import { isPlainObject } from "../types/json.js";
import { AuthorizationError, DecodeError, RemoteError } from "./errors.js";

// =============================================================================
// § Payload schemas
// =============================================================================

export const SubmitResponseSchema = z
  .object({
    source_id: z.string().min(1),
  })
  .passthrough();

export const MessageResponseSchema = z
  .object({
    message: z.string().optional(),
  })
  .passthrough();

export const StatusResponseSchema = z
  .object({
    status: z
      .object({
        active: z.boolean().optional(),
        status_message: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const SubmissionStatusSchema = z
  .object({
    source_id: z.string(),
    active: z.boolean(),
    status_code: z.string(),
    status_message: z.string().default(""),
  })
  .passthrough();

export const SubmissionListResponseSchema = z
  .object({
    submissions: z.array(SubmissionStatusSchema),
  })
  .passthrough();

export const CurationTaskSchema = z
  .object({
    source_id: z.string(),
    submission_info: z.object({ submitter: z.string() }).passthrough(),
    curation_start_date: z.string(),
    extraction_summary: z.string(),
  })
  .passthrough();

export const CurationTaskResponseSchema = z
  .object({
    curation_task: CurationTaskSchema,
  })
  .passthrough();

export const CurationTaskListResponseSchema = z
  .object({
    curation_tasks: z.array(CurationTaskSchema),
  })
  .passthrough();

export type StatusResponse = z.infer<typeof StatusResponseSchema>;
export type SubmissionStatus = z.infer<typeof SubmissionStatusSchema>;
export type CurationTask = z.infer<typeof CurationTaskSchema>;

// =============================================================================
// § Interpretation
// =============================================================================

export type InterpretedResponse<T> =
  | { ok: true; statusCode: number; data: T }
  | { ok: false; statusCode: number; error: RemoteError | DecodeError | AuthorizationError };

export const TECHNICAL_DIFFICULTIES =
  "The Connect service may be experiencing technical difficulties.";

/** The server's `error` field, or the whole body when it has none */
export function serverErrorDetail(value: unknown): string {
  if (isPlainObject(value) && value["error"] !== undefined) {
    const detail = value["error"];
    return typeof detail === "string" ? detail : JSON.stringify(detail);
  }
  return JSON.stringify(value);
}

function isAuthorizationStatus(statusCode: number): boolean {
  return statusCode === 401 || statusCode === 403;
}

/**
 * Interpret a response.
 *
 * @param action - what the request was doing, for error messages ("submitting dataset")
 */
export function interpretResponse<T>(
  response: TransportResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  action: string
): InterpretedResponse<T> {
  const { statusCode, body } = response;

  if (body.kind === "text") {
    if (statusCode < 300) {
      return {
        ok: false,
        statusCode,
        error: new DecodeError(`Error decoding ${statusCode} response: ${body.text}`, statusCode),
      };
    }
    const message = `Error ${statusCode}. ${TECHNICAL_DIFFICULTIES}`;
    return {
      ok: false,
      statusCode,
      error: isAuthorizationStatus(statusCode)
        ? new AuthorizationError(message, statusCode)
        : new RemoteError(message, statusCode),
    };
  }

  if (statusCode >= 300) {
    const message = `Error ${statusCode} ${action}: ${serverErrorDetail(body.value)}`;
    return {
      ok: false,
      statusCode,
      error: isAuthorizationStatus(statusCode)
        ? new AuthorizationError(message, statusCode)
        : new RemoteError(message, statusCode),
    };
  }

  const parsed = schema.safeParse(body.value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return {
      ok: false,
      statusCode,
      error: new DecodeError(
        `Unexpected ${statusCode} response while ${action}: ${issues}`,
        statusCode
      ),
    };
  }

  return { ok: true, statusCode, data: parsed.data };
}
