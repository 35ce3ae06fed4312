// Voice Moderation Relay - Session refresher
// Keeps the session token fresh for a long-running host: refreshes a margin before
// the credential expires, and at once if an upload is rejected as expired.

import { describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { Credential, UploadOutcome } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Refresh this long before `expiresAt` */
export const DEFAULT_REFRESH_MARGIN_MS = 5 * 60 * 1000;

/** Wait before trying again after a failed refresh */
export const DEFAULT_REFRESH_RETRY_MS = 30 * 1000;

/** The part of ModerationOrchestrator the refresher drives. */
export interface RefreshableSession {
  readonly sessionCredential: Credential | null;
  refreshSession(): Promise<void>;
}

export interface SessionRefresherOptions {
  marginMs?: number;
  retryDelayMs?: number;
  /** Epoch milliseconds. Default: Date.now */
  clock?: () => number;
  logger?: Logger;
}

export class SessionRefresher {
  private readonly marginMs: number;
  private readonly retryDelayMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private refreshing: Promise<void> | null = null;
  private running = false;

  constructor(
    private readonly session: RefreshableSession,
    options: SessionRefresherOptions = {},
  ) {
    this.marginMs = options.marginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_REFRESH_RETRY_MS;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createConsoleLogger("SessionRefresher");
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Schedule the first refresh from the current credential. Call after initialize(). */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleFromCredential();
  }

  stop(): void {
    this.running = false;
    this.clearTimer();
  }

  /** Result callback hook: an expired-credential outcome triggers an immediate refresh. */
  handleOutcome(outcome: UploadOutcome): void {
    if (outcome.ok || outcome.error.kind !== "credential_expired" || !this.running) return;
    this.logger.warn("Upload rejected with an expired session token, refreshing now");
    this.refreshNow().catch((err: unknown) => {
      this.logger.error(`Unexpected refresh failure: ${describeError(err)}`);
    });
  }

  /**
   * Refresh the session now. Never rejects: a failure is logged and retried after
   * `retryDelayMs`. Concurrent calls share one refresh.
   */
  refreshNow(): Promise<void> {
    if (this.refreshing) return this.refreshing;
    this.clearTimer();

    this.refreshing = this.session
      .refreshSession()
      .then(() => {
        this.scheduleFromCredential();
      })
      .catch((err: unknown) => {
        this.logger.error(`Session refresh failed, retrying in ${this.retryDelayMs}ms: ${describeError(err)}`);
        this.schedule(this.retryDelayMs);
      })
      .finally(() => {
        this.refreshing = null;
      });
    return this.refreshing;
  }

  /** Resolves once the refresh in progress, if any, has settled. */
  whenSettled(): Promise<void> {
    return this.refreshing ?? Promise.resolve();
  }

  // ─── Timers ───────────────────────────────────────────────────────────────

  private scheduleFromCredential(): void {
    const credential = this.session.sessionCredential;
    if (!credential) return;
    const delay = Math.max(0, credential.expiresAt.getTime() - this.marginMs - this.clock());
    this.schedule(delay);
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.refreshNow().catch((err: unknown) => {
        this.logger.error(`Unexpected refresh failure: ${describeError(err)}`);
      });
    }, delayMs);
    this.logger.debug(`Next session refresh in ${delayMs}ms`);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
