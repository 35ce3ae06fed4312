// Voice Moderation Relay - Environment configuration
// Fail-fast zod validation of the environment. Every problem is reported at once.

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { ChunkerStrategy } from "./audio-chunker.js";
import { ConfigurationError } from "./errors.js";
import type { RequestFlags } from "./types.js";

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(defaultValue ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const ChunkStrategySchema = z.enum(["fixed", "silence_filter", "vad"]);

const EnvSchema = z.object({
  MODERATION_API_KEY: z.string().min(1, "MODERATION_API_KEY is required"),
  MODERATION_ENDPOINT_URL: z.string().url("MODERATION_ENDPOINT_URL must be a URL"),
  MODERATION_SESSIONS_PATH: z.string().startsWith("/").default("/api/v1/sessions"),
  MODERATION_MODERATIONS_PATH: z.string().startsWith("/").default("/api/v1/moderations"),

  CHUNK_DURATION_SECONDS: z.coerce.number().int().positive().default(15),
  CHUNK_STRATEGY: ChunkStrategySchema.default("fixed"),
  SILENCE_THRESHOLD: z.coerce.number().min(0).max(1).optional(),

  REQUEST_ACTIONS: booleanFlag(true),
  REQUEST_SAFETY_SCORES: booleanFlag(true),
  REQUEST_TRANSCRIPTION: booleanFlag(true),
  REQUEST_FILE_URL: booleanFlag(false),
  REQUEST_RULE_VIOLATIONS: booleanFlag(false),

  MODERATION_USER_ID: z.string().optional(),
  MODERATION_ROOM_ID: z.string().default("default_room"),

  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  UPLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export type Env = z.infer<typeof EnvSchema>;
export type ChunkStrategyName = z.infer<typeof ChunkStrategySchema>;

export interface AppConfig {
  apiKey: string;
  endpointUrl: string;
  sessionsPath: string;
  moderationsPath: string;
  chunkDurationSeconds: number;
  chunkStrategy: ChunkerStrategy;
  requestFlags: RequestFlags;
  userId: string;
  roomId: string;
  port: number;
  uploadTimeoutMs: number;
}

function toChunkerStrategy(name: ChunkStrategyName, threshold: number | undefined): ChunkerStrategy {
  switch (name) {
    case "fixed":
      return { kind: "fixed", silenceThreshold: threshold };
    case "silence_filter":
      return { kind: "silence_filter", threshold };
    case "vad":
      return { kind: "vad", encodeSilenceThreshold: threshold };
    default: {
      const exhaustiveCheck: never = name;
      throw new ConfigurationError(`Unknown chunk strategy: ${String(exhaustiveCheck)}`);
    }
  }
}

/**
 * Validate the environment and build the application config.
 * Empty values count as unset, so `KEY=` in a .env file falls back to the default.
 *
 * @throws ConfigurationError listing every missing or invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const result = EnvSchema.safeParse(present);

  if (!result.success) {
    const missingVars: string[] = [];
    const invalidVars: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        missingVars.push(path);
      } else {
        invalidVars.push(`${path}: ${issue.message}`);
      }
    }

    const errorMessages: string[] = [];
    if (missingVars.length > 0) {
      errorMessages.push(`Missing required environment variables:\n  - ${missingVars.join("\n  - ")}`);
    }
    if (invalidVars.length > 0) {
      errorMessages.push(`Invalid environment variables:\n  - ${invalidVars.join("\n  - ")}`);
    }
    throw new ConfigurationError(errorMessages.join("\n"));
  }

  const parsed = result.data;
  return {
    apiKey: parsed.MODERATION_API_KEY,
    endpointUrl: parsed.MODERATION_ENDPOINT_URL,
    sessionsPath: parsed.MODERATION_SESSIONS_PATH,
    moderationsPath: parsed.MODERATION_MODERATIONS_PATH,
    chunkDurationSeconds: parsed.CHUNK_DURATION_SECONDS,
    chunkStrategy: toChunkerStrategy(parsed.CHUNK_STRATEGY, parsed.SILENCE_THRESHOLD),
    requestFlags: {
      requestActions: parsed.REQUEST_ACTIONS,
      requestSafetyScores: parsed.REQUEST_SAFETY_SCORES,
      requestTranscription: parsed.REQUEST_TRANSCRIPTION,
      requestFileUrl: parsed.REQUEST_FILE_URL,
      requestRuleViolations: parsed.REQUEST_RULE_VIOLATIONS,
    },
    userId: parsed.MODERATION_USER_ID ?? uuidv4(),
    roomId: parsed.MODERATION_ROOM_ID,
    port: parsed.PORT,
    uploadTimeoutMs: parsed.UPLOAD_TIMEOUT_MS,
  };
}
