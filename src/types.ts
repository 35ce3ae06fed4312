// Voice Moderation Relay - Shared TypeScript interfaces and types

import type { ModerationError } from "./errors.js";

// ─── Orchestrator State Machine ─────────────────────────────────────────────────

export enum OrchestratorState {
  UNINITIALIZED = "uninitialized",
  AWAITING_TOKEN = "awaiting_token",
  READY = "ready",
  EXPIRED = "expired",
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

// ─── Session Credential ─────────────────────────────────────────────────────────

/** Short-lived bearer token. Replaced as a whole on refresh, never edited in place. */
export interface Credential {
  readonly token: string;
  readonly expiresAt: Date;
}

// ─── Host-supplied metadata ─────────────────────────────────────────────────────

export interface AudioEventMetadata {
  userId: string;
  roomId: string;
}

/** Which optional fields the backend should compute for each chunk. */
export interface RequestFlags {
  requestActions: boolean;
  requestFileUrl: boolean;
  /** Sent on the wire as `request_evaluation`. */
  requestSafetyScores: boolean;
  requestTranscription: boolean;
  requestRuleViolations: boolean;
}

// ─── Moderation results ─────────────────────────────────────────────────────────

export const MODERATION_ACTION_KINDS = [
  "none",
  "timeout",
  "kick",
  "strike",
  "ban",
  "custom",
] as const;

export type ModerationActionKind = (typeof MODERATION_ACTION_KINDS)[number];

export interface ModerationAction {
  kind: ModerationActionKind;
  customNumber?: number;
  customString?: string;
}

/**
 * One moderated item. Optional fields are absent (not empty) when the matching
 * request flag was off or the backend did not return them.
 */
export interface ModerationResult {
  id: string;
  type: string;
  safetyScores?: Record<string, number>;
  transcription?: string;
  fileUrl?: string;
  ruleViolations: string[];
  actions: ModerationAction[];
}

export type UploadOutcome =
  | { ok: true; results: ModerationResult[] }
  | { ok: false; error: ModerationError; message: string };

export type ResultCallback = (outcome: UploadOutcome) => void;

export interface OrchestratorStatus {
  state: OrchestratorState;
  inFlightUploads: number;
  chunksEmitted: number;
  chunksSkipped: number;
  uploadsSucceeded: number;
  uploadsFailed: number;
  credentialExpiresAt: string | null;
}

// ─── Voice stream WebSocket protocol ────────────────────────────────────────────

// Client → Server messages (audio itself travels as binary float32 LE frames)
export type ClientMessage =
  | { type: "audio_format"; sampleRate: number; channels: number }
  | { type: "stop" };

// Server → Client messages
export type ServerMessage =
  | { type: "ready"; sampleRate: number; channels: number }
  | { type: "error"; message: string };
