// Voice Moderation Relay - Session/Upload Orchestrator
// Owns the session credential, drives the chunker from incoming frames and uploads
// each completed chunk to the moderation endpoint.
//
// Audio chunks are in-memory only. Each upload runs on its own promise: frame
// ingestion never waits for the network, uploads are not serialized, and results may
// reach the callback out of chunk order.

import { v4 as uuidv4 } from "uuid";
import { createAudioChunker, type AudioChunker, type ChunkerStrategy } from "./audio-chunker.js";
import {
  DEFAULT_CHANNEL_COUNT,
  DEFAULT_SAMPLE_RATE,
  assertAudioFormat,
  assertPositiveInteger,
  type SampleFrame,
} from "./chunk-accumulator.js";
import {
  ConfigurationError,
  CredentialExpiredError,
  EmptyPayloadError,
  ModerationError,
  NetworkError,
  ProtocolMisuseError,
  describeError,
} from "./errors.js";
import type { FrameSink } from "./frame-source.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import {
  interpretUploadResponse,
  parseSessionTokenResponse,
  serverErrorFromResponse,
} from "./moderation-response.js";
import type { MultipartPart, Transport, TransportResponse } from "./transport.js";
import {
  OrchestratorState,
  type AudioEventMetadata,
  type Credential,
  type OrchestratorStatus,
  type RequestFlags,
  type ResultCallback,
  type UploadOutcome,
} from "./types.js";
import { WAV_HEADER_BYTES } from "./wav-encoder.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Session tokens are valid for 4 hours from the moment they are obtained */
export const SESSION_TOKEN_TTL_MS = 4 * 60 * 60 * 1000;

/** Multipart part name referenced by `metadata.items[0].part` */
const AUDIO_PART_NAME = "audio";
const AUDIO_ITEM_ID = "audio_1";

const DEFAULT_REQUEST_FLAGS: RequestFlags = {
  requestActions: true,
  requestFileUrl: false,
  requestSafetyScores: false,
  requestTranscription: false,
  requestRuleViolations: false,
};

/**
 * Valid state transitions.
 *
 * UNINITIALIZED → AWAITING_TOKEN:  initialize()
 * AWAITING_TOKEN → READY:          token exchange succeeded
 * AWAITING_TOKEN → UNINITIALIZED:  token exchange failed (caller may retry initialize)
 * READY → EXPIRED:                 a chunk was processed after the credential expired
 * READY/EXPIRED → READY:           refreshSession()
 */
const VALID_TRANSITIONS: ReadonlyMap<OrchestratorState, readonly OrchestratorState[]> = new Map([
  [OrchestratorState.UNINITIALIZED, [OrchestratorState.AWAITING_TOKEN]],
  [OrchestratorState.AWAITING_TOKEN, [OrchestratorState.READY, OrchestratorState.UNINITIALIZED]],
  [OrchestratorState.READY, [OrchestratorState.EXPIRED, OrchestratorState.READY]],
  [OrchestratorState.EXPIRED, [OrchestratorState.READY]],
]);

// ─── Public types ───────────────────────────────────────────────────────────────

export interface InitializeOptions extends Partial<RequestFlags> {
  /** Host policy checked on every frame. Defaults to always true. */
  canRecord?: () => boolean;
  /** Supplies user/room identifiers for the token exchange and every upload. */
  getMetadata: () => AudioEventMetadata;
  chunkDurationSeconds: number;
  endpointUrl: string;
  moderationsPath: string;
  sessionsPath: string;
  /** Long-lived API key used for the token exchange. */
  apiKey: string;
  /** Also send the API key as `x-api-key` on uploads. Default: true */
  sendApiKeyHeader?: boolean;
}

export interface ModerationOrchestratorDeps {
  transport: Transport;
  /** Chunker instance or strategy. Default: { kind: "fixed" } */
  chunker?: AudioChunker | ChunkerStrategy;
  /** Receives exactly one outcome per uploaded (or failed) chunk. */
  onResult: ResultCallback;
  /** Epoch milliseconds. Default: Date.now */
  clock?: () => number;
  logger?: Logger;
  /** Id used to correlate log lines for one chunk. Default: uuid v4 */
  chunkIdFactory?: () => string;
}

interface SessionSettings {
  canRecord: () => boolean;
  getMetadata: () => AudioEventMetadata;
  chunkDurationSeconds: number;
  sessionsUrl: string;
  moderationsUrl: string;
  apiKey: string;
  sendApiKeyHeader: boolean;
  flags: RequestFlags;
}

function requireNonEmpty(name: string, value: string | undefined): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigurationError(`${name} is required`);
  }
  return value;
}

function resolveSettings(options: InitializeOptions): SessionSettings {
  const apiKey = requireNonEmpty("apiKey", options.apiKey);
  const endpointUrl = requireNonEmpty("endpointUrl", options.endpointUrl).replace(/\/+$/, "");
  const sessionsPath = requireNonEmpty("sessionsPath", options.sessionsPath);
  const moderationsPath = requireNonEmpty("moderationsPath", options.moderationsPath);
  assertPositiveInteger("chunkDurationSeconds", options.chunkDurationSeconds);
  if (typeof options.getMetadata !== "function") {
    throw new ConfigurationError("getMetadata is required");
  }

  return {
    canRecord: options.canRecord ?? (() => true),
    getMetadata: options.getMetadata,
    chunkDurationSeconds: options.chunkDurationSeconds,
    sessionsUrl: `${endpointUrl}${sessionsPath}`,
    moderationsUrl: `${endpointUrl}${moderationsPath}`,
    apiKey,
    sendApiKeyHeader: options.sendApiKeyHeader ?? true,
    flags: {
      requestActions: options.requestActions ?? DEFAULT_REQUEST_FLAGS.requestActions,
      requestFileUrl: options.requestFileUrl ?? DEFAULT_REQUEST_FLAGS.requestFileUrl,
      requestSafetyScores: options.requestSafetyScores ?? DEFAULT_REQUEST_FLAGS.requestSafetyScores,
      requestTranscription: options.requestTranscription ?? DEFAULT_REQUEST_FLAGS.requestTranscription,
      requestRuleViolations: options.requestRuleViolations ?? DEFAULT_REQUEST_FLAGS.requestRuleViolations,
    },
  };
}

/**
 * JSON metadata part describing the upload and the attached audio part.
 */
export function buildUploadMetadata(metadata: AudioEventMetadata, flags: RequestFlags) {
  return {
    user_id: metadata.userId,
    room_id: metadata.roomId,
    request_file_url: flags.requestFileUrl,
    request_evaluation: flags.requestSafetyScores,
    request_actions: flags.requestActions,
    request_transcription: flags.requestTranscription,
    request_rule_violations: flags.requestRuleViolations,
    items: [{ id: AUDIO_ITEM_ID, type: "audio", mime: "audio/wav", part: AUDIO_PART_NAME }],
  };
}

// ─── Orchestrator ───────────────────────────────────────────────────────────────

/**
 * Session/upload state machine.
 *
 * The credential is an immutable object swapped by reference on refresh. Every
 * upload reads it once when the chunk is dispatched, so a refresh never affects an
 * upload that is already on its way.
 */
export class ModerationOrchestrator implements FrameSink {
  private readonly transport: Transport;
  private readonly chunker: AudioChunker;
  private readonly onResult: ResultCallback;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly chunkIdFactory: () => string;

  private currentState: OrchestratorState = OrchestratorState.UNINITIALIZED;
  private settings: SessionSettings | null = null;
  private credential: Credential | null = null;
  private refreshInFlight: Promise<void> | null = null;
  private audioFormat = { sampleRate: DEFAULT_SAMPLE_RATE, channelCount: DEFAULT_CHANNEL_COUNT };
  private readonly inFlight = new Set<Promise<void>>();
  private hasWarnedNotReady = false;

  private chunksEmitted = 0;
  private chunksSkipped = 0;
  private uploadsSucceeded = 0;
  private uploadsFailed = 0;

  constructor(deps: ModerationOrchestratorDeps) {
    this.transport = deps.transport;
    const chunker: AudioChunker | ChunkerStrategy = deps.chunker ?? { kind: "fixed" };
    this.chunker = "append" in chunker ? chunker : createAudioChunker(chunker);
    this.onResult = deps.onResult;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? createConsoleLogger("ModerationOrchestrator");
    this.chunkIdFactory = deps.chunkIdFactory ?? (() => uuidv4());
    this.logger.info(`Chunk strategy: ${this.chunker.kind}`);
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  /** The current session credential, if any. */
  get sessionCredential(): Credential | null {
    return this.credential;
  }

  get inFlightUploads(): number {
    return this.inFlight.size;
  }

  private transition(to: OrchestratorState): void {
    const allowed = VALID_TRANSITIONS.get(this.currentState) ?? [];
    if (!allowed.includes(to)) {
      throw new ProtocolMisuseError(`Invalid state transition: "${this.currentState}" → "${to}"`);
    }
    if (to !== this.currentState) {
      this.logger.info(`State: ${this.currentState} → ${to}`);
    }
    this.currentState = to;
  }

  /**
   * Configure the chunker and exchange the API key for a session token.
   *
   * On failure the state returns to UNINITIALIZED and the error is rethrown; the
   * caller decides whether to call initialize() again. Nothing is retried here.
   *
   * @throws ProtocolMisuseError if already initializing or initialized.
   * @throws ConfigurationError for missing or invalid options.
   * @throws NetworkError | ServerError | ParseError if the token exchange fails.
   */
  async initialize(options: InitializeOptions): Promise<void> {
    if (this.currentState !== OrchestratorState.UNINITIALIZED) {
      throw new ProtocolMisuseError(
        `initialize() called while "${this.currentState}". It may only be called once per session.`,
      );
    }

    const settings = resolveSettings(options);
    this.chunker.configure(
      settings.chunkDurationSeconds,
      this.audioFormat.sampleRate,
      this.audioFormat.channelCount,
    );

    this.settings = settings;
    this.hasWarnedNotReady = false;
    this.transition(OrchestratorState.AWAITING_TOKEN);

    try {
      this.credential = await this.requestSessionToken(settings);
    } catch (err) {
      this.settings = null;
      this.transition(OrchestratorState.UNINITIALIZED);
      this.logger.error(`Initialization failed: ${describeError(err)}`);
      throw err;
    }

    this.transition(OrchestratorState.READY);
    this.logger.info(`Session ready, token expires at ${this.credential.expiresAt.toISOString()}`);
  }

  /**
   * Obtain a new session token and replace the credential. Concurrent calls share
   * one token exchange. On failure the previous credential and state are kept.
   *
   * @throws ProtocolMisuseError unless READY or EXPIRED.
   */
  refreshSession(): Promise<void> {
    const settings = this.settings;
    if (
      !settings ||
      (this.currentState !== OrchestratorState.READY && this.currentState !== OrchestratorState.EXPIRED)
    ) {
      return Promise.reject(
        new ProtocolMisuseError(`refreshSession() called while "${this.currentState}"; initialize() first.`),
      );
    }

    if (!this.refreshInFlight) {
      this.refreshInFlight = this.requestSessionToken(settings)
        .then((credential) => {
          this.credential = credential;
          this.transition(OrchestratorState.READY);
          this.logger.info(`Session refreshed, token expires at ${credential.expiresAt.toISOString()}`);
        })
        .catch((err: unknown) => {
          this.logger.error(`Session refresh failed: ${describeError(err)}`);
          throw err;
        })
        .finally(() => {
          this.refreshInFlight = null;
        });
    }
    return this.refreshInFlight;
  }

  /**
   * Record the real capture format. Reconfigures the chunker (dropping any partial
   * chunk and resetting VAD state) if a session is already configured.
   *
   * @throws ConfigurationError for non-positive, non-integer or out-of-range values.
   */
  configureAudio(sampleRate?: number, channelCount?: number): void {
    const format = {
      sampleRate: sampleRate ?? this.audioFormat.sampleRate,
      channelCount: channelCount ?? this.audioFormat.channelCount,
    };
    assertAudioFormat(format.sampleRate, format.channelCount);
    this.audioFormat = format;

    if (this.settings) {
      const layout = this.chunker.configure(
        this.settings.chunkDurationSeconds,
        this.audioFormat.sampleRate,
        this.audioFormat.channelCount,
      );
      this.logger.info(
        `Audio format ${layout.sampleRate}Hz x${layout.channelCount}: ` +
          `${layout.samplesPerChunk} samples per chunk, decimation ${layout.downsampleFactor}`,
      );
    }
  }

  /**
   * Entry point for the frame source. Never blocks on network I/O: a completed
   * chunk is handed to processChunk() and the call returns immediately.
   */
  onFrame(frame: SampleFrame): void {
    const settings = this.settings;
    if (this.currentState !== OrchestratorState.READY || !settings) {
      if (!this.hasWarnedNotReady) {
        this.hasWarnedNotReady = true;
        this.logger.warn(`Dropping audio: orchestrator is "${this.currentState}", not "ready"`);
      }
      return;
    }

    if (!settings.canRecord()) return;
    if (frame.length === 0) return;

    const chunk = this.chunker.append(frame);
    if (!chunk) return;

    this.chunksEmitted++;
    this.dispatch(chunk);
  }

  private dispatch(chunk: Float32Array): void {
    const upload: Promise<void> = this.processChunk(chunk)
      .catch((err: unknown) => {
        this.logger.error(`Unexpected failure while processing chunk: ${describeError(err)}`);
      })
      .finally(() => {
        this.inFlight.delete(upload);
      });
    this.inFlight.add(upload);
  }

  /**
   * Encode and upload one chunk, then report the outcome.
   *
   * - Credential expired: CredentialExpiredError, transport not called.
   * - Too quiet: skipped without a callback.
   * - Otherwise exactly one onResult call, success or failure. A chunker that
   *   throws is reported as a ConfigurationError.
   */
  async processChunk(chunk: Float32Array): Promise<void> {
    const chunkId = this.chunkIdFactory();
    try {
      await this.uploadChunk(chunkId, chunk);
    } catch (err) {
      const error =
        err instanceof ModerationError
          ? err
          : new ConfigurationError(`Chunk could not be processed: ${describeError(err)}`, { cause: err });
      this.report(chunkId, this.failure(error));
    }
  }

  private async uploadChunk(chunkId: string, chunk: Float32Array): Promise<void> {
    const settings = this.settings;
    const credential = this.credential;

    if (!settings || !credential) {
      this.report(chunkId, this.failure(new ConfigurationError("Chunk processed before initialize() completed")));
      return;
    }

    if (this.clock() > credential.expiresAt.getTime()) {
      if (this.currentState === OrchestratorState.READY) {
        this.transition(OrchestratorState.EXPIRED);
      }
      this.report(chunkId, this.failure(new CredentialExpiredError(credential.expiresAt)));
      return;
    }

    const wav = this.chunker.encode(chunk);
    if (wav === null) {
      this.chunksSkipped++;
      this.logger.debug(`Chunk ${chunkId} too quiet, skipping upload`);
      return;
    }
    if (wav.length <= WAV_HEADER_BYTES) {
      this.report(chunkId, this.failure(new EmptyPayloadError("Chunk encoded to an empty payload")));
      return;
    }

    let metadata: AudioEventMetadata;
    try {
      metadata = settings.getMetadata();
    } catch (err) {
      this.report(
        chunkId,
        this.failure(new ConfigurationError(`Metadata provider failed: ${describeError(err)}`, { cause: err })),
      );
      return;
    }

    const parts: MultipartPart[] = [
      {
        name: "metadata",
        filename: "metadata.json",
        contentType: "application/json",
        data: Buffer.from(JSON.stringify(buildUploadMetadata(metadata, settings.flags)), "utf-8"),
      },
      { name: AUDIO_PART_NAME, filename: "audio.wav", contentType: "audio/wav", data: wav },
    ];

    const headers: Record<string, string> = { Authorization: `Bearer ${credential.token}` };
    if (settings.sendApiKeyHeader) {
      headers["x-api-key"] = settings.apiKey;
    }

    this.logger.debug(`Chunk ${chunkId}: uploading ${wav.length} bytes`);

    let response: TransportResponse;
    try {
      response = await this.transport.postMultipart(settings.moderationsUrl, parts, headers);
    } catch (err) {
      this.report(chunkId, this.failure(new NetworkError(describeError(err), { cause: err })));
      return;
    }

    this.report(chunkId, interpretUploadResponse(response, settings.flags));
  }

  /**
   * Resolves once every upload in flight at the time of the call has settled.
   * Does not cancel anything.
   */
  async whenIdle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  getStatus(): OrchestratorStatus {
    return {
      state: this.currentState,
      inFlightUploads: this.inFlight.size,
      chunksEmitted: this.chunksEmitted,
      chunksSkipped: this.chunksSkipped,
      uploadsSucceeded: this.uploadsSucceeded,
      uploadsFailed: this.uploadsFailed,
      credentialExpiresAt: this.credential ? this.credential.expiresAt.toISOString() : null,
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async requestSessionToken(settings: SessionSettings): Promise<Credential> {
    const metadata = settings.getMetadata();

    let response: TransportResponse;
    try {
      response = await this.transport.postJson(
        settings.sessionsUrl,
        { user_id: metadata.userId },
        { Authorization: `Bearer ${settings.apiKey}`, "Content-Type": "application/json" },
      );
    } catch (err) {
      throw new NetworkError(`Session token request failed: ${describeError(err)}`, { cause: err });
    }

    if (response.status >= 400) {
      throw serverErrorFromResponse(response);
    }

    const token = parseSessionTokenResponse(response.body);
    return { token, expiresAt: new Date(this.clock() + SESSION_TOKEN_TTL_MS) };
  }

  private failure(error: ModerationError): UploadOutcome {
    return { ok: false, error, message: describeError(error) };
  }

  private report(chunkId: string, outcome: UploadOutcome): void {
    if (outcome.ok) {
      this.uploadsSucceeded++;
      this.logger.debug(`Chunk ${chunkId}: ${outcome.results.length} result(s)`);
    } else {
      this.uploadsFailed++;
      this.logger.error(`Chunk ${chunkId}: ${outcome.message}`);
    }

    try {
      this.onResult(outcome);
    } catch (err) {
      this.logger.error(`Result callback threw for chunk ${chunkId}: ${describeError(err)}`);
    }
  }
}
