// Voice Moderation Relay - Moderation API response parsing
// zod schemas for the session token and moderation response bodies, and the mapping
// from HTTP status + body to an UploadOutcome.

import { z } from "zod";
import { ParseError, ServerError, describeError } from "./errors.js";
import {
  MODERATION_ACTION_KINDS,
  type ModerationAction,
  type ModerationActionKind,
  type ModerationResult,
  type RequestFlags,
  type UploadOutcome,
} from "./types.js";
import type { TransportResponse } from "./transport.js";

// ─── Wire schemas ───────────────────────────────────────────────────────────────

const actionKindSchema = z.union([
  z
    .number()
    .int()
    .min(0)
    .max(MODERATION_ACTION_KINDS.length - 1)
    .transform((idx): ModerationActionKind => MODERATION_ACTION_KINDS[idx]),
  z
    .string()
    .transform((name) => name.toLowerCase())
    .pipe(z.enum(MODERATION_ACTION_KINDS)),
]);

const wireActionSchema = z.object({
  action: actionKindSchema,
  customNumber: z.number().nullish(),
  customString: z.string().nullish(),
});

const wireAnalysisSchema = z.object({
  /** transcribed audio */
  ta: z.string().nullish(),
  /** safety score per category */
  e: z.record(z.number()).nullish(),
});

export const wireResultItemSchema = z.object({
  a: wireAnalysisSchema.nullish(),
  fileUrl: z.string().nullish(),
  id: z.string(),
  type: z.string(),
  act: z.array(wireActionSchema).nullish(),
  rv: z.array(z.string()).nullish(),
});

const wireErrorSchema = z.object({
  message: z.string(),
  code: z.string().nullish(),
});

export const moderationResponseSchema = z.object({
  results: z.array(wireResultItemSchema).nullish(),
  error: wireErrorSchema.nullish(),
});

const sessionTokenResponseSchema = z.object({
  jwt: z.string().min(1),
});

export type WireResultItem = z.infer<typeof wireResultItemSchema>;
export type ModerationResponseBody = z.infer<typeof moderationResponseSchema>;

// ─── Mapping ────────────────────────────────────────────────────────────────────

function toAction(wire: z.infer<typeof wireActionSchema>): ModerationAction {
  const action: ModerationAction = { kind: wire.action };
  if (wire.customNumber != null) action.customNumber = wire.customNumber;
  if (wire.customString != null) action.customString = wire.customString;
  return action;
}

/**
 * Convert wire items to results. Safety scores, transcription and file URL are only
 * copied when their request flag was set, so an absent field always means "not asked
 * for or not returned" rather than an empty value.
 */
export function toModerationResults(items: WireResultItem[], flags: RequestFlags): ModerationResult[] {
  return items.map((item) => {
    const result: ModerationResult = {
      id: item.id,
      type: item.type,
      ruleViolations: item.rv ?? [],
      actions: (item.act ?? []).map(toAction),
    };

    const scores = item.a?.e;
    if (flags.requestSafetyScores && scores != null) result.safetyScores = { ...scores };

    const transcription = item.a?.ta;
    if (flags.requestTranscription && transcription != null) result.transcription = transcription;

    if (flags.requestFileUrl && item.fileUrl != null) result.fileUrl = item.fileUrl;

    return result;
  });
}

function parseJson(body: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (err) {
    return { ok: false, reason: describeError(err) };
  }
}

function failure(error: ServerError | ParseError): UploadOutcome {
  return { ok: false, error, message: describeError(error) };
}

/**
 * Interpret the HTTP response to a chunk upload.
 *
 * - status >= 400: ServerError, using the structured `error` body when present.
 * - status < 400 with results: success.
 * - status < 400 with only an `error`: ServerError.
 * - anything else (including malformed JSON): ParseError.
 */
export function interpretUploadResponse(response: TransportResponse, flags: RequestFlags): UploadOutcome {
  let body: ModerationResponseBody | null = null;
  let parseProblem: string | null = null;

  if (response.body.trim().length > 0) {
    const json = parseJson(response.body);
    if (!json.ok) {
      parseProblem = `Malformed moderation response: ${json.reason}`;
    } else {
      const parsed = moderationResponseSchema.safeParse(json.value);
      if (parsed.success) {
        body = parsed.data;
      } else {
        parseProblem = `Unexpected moderation response shape: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`;
      }
    }
  }

  if (response.status >= 400) {
    const serverError = body?.error;
    if (serverError) {
      return failure(new ServerError(serverError.message, serverError.code ?? undefined, response.status));
    }
    return failure(new ServerError(`HTTP ${response.status}`, undefined, response.status));
  }

  if (parseProblem) {
    return failure(new ParseError(parseProblem));
  }

  if (body?.results && body.results.length > 0) {
    return { ok: true, results: toModerationResults(body.results, flags) };
  }

  if (body?.error) {
    return failure(new ServerError(body.error.message, body.error.code ?? undefined, response.status));
  }

  return failure(new ParseError("Unexpected response structure"));
}

/**
 * Build a ServerError for a failed (status >= 400) response, using the structured
 * `{"error": {"message", "code"}}` body when there is one.
 */
export function serverErrorFromResponse(response: TransportResponse): ServerError {
  const json = parseJson(response.body);
  if (json.ok) {
    const parsed = moderationResponseSchema.safeParse(json.value);
    if (parsed.success && parsed.data.error) {
      return new ServerError(parsed.data.error.message, parsed.data.error.code ?? undefined, response.status);
    }
  }
  return new ServerError(`HTTP ${response.status}`, undefined, response.status);
}

/**
 * Extract the session token from a token-exchange response body.
 * @throws ParseError if the body is not JSON or has no non-empty `jwt` string.
 */
export function parseSessionTokenResponse(body: string): string {
  const json = parseJson(body);
  if (!json.ok) {
    throw new ParseError(`Session token response is not valid JSON: ${json.reason}`);
  }
  const parsed = sessionTokenResponseSchema.safeParse(json.value);
  if (!parsed.success) {
    throw new ParseError("Session token response is missing the 'jwt' field");
  }
  return parsed.data.jwt;
}
