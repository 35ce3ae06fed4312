// Voice Moderation Relay - Entry point
// Loads configuration, wires the moderation pipeline and starts the server.

import "dotenv/config";
import { loadConfig, type AppConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { ModerationOrchestrator } from "./moderation-orchestrator.js";
import { createAppServer } from "./server.js";
import { SessionRefresher } from "./session-refresher.js";
import { FetchTransport } from "./transport.js";
import type { UploadOutcome } from "./types.js";

export const APP_NAME = "Voice Moderation Relay";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const resultLogger = createConsoleLogger("Moderation");

function logOutcome(outcome: UploadOutcome): void {
  if (!outcome.ok) {
    resultLogger.error(`Upload failed (${outcome.error.kind}): ${outcome.message}`);
    return;
  }
  for (const result of outcome.results) {
    const actions = result.actions.map((action) => action.kind).join(", ") || "none";
    const violations = result.ruleViolations.length > 0 ? result.ruleViolations.join(", ") : "none";
    resultLogger.info(`Result ${result.id} (${result.type}): actions [${actions}], rule violations [${violations}]`);
    if (result.transcription !== undefined) {
      resultLogger.info(`  transcription: ${result.transcription}`);
    }
    if (result.safetyScores) {
      const scores = Object.entries(result.safetyScores)
        .map(([category, score]) => `${category}=${score}`)
        .join(" ");
      resultLogger.info(`  safety scores: ${scores}`);
    }
    if (result.fileUrl !== undefined) {
      resultLogger.info(`  file: ${result.fileUrl}`);
    }
  }
}

// ─── Validate configuration ─────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(`${describeError(err)}\nRefer to .env.example for the supported variables.`);
  process.exit(1);
}

logInit(`Configuration loaded (endpoint ${config.endpointUrl}, strategy ${config.chunkStrategy.kind})`);

// ─── Wire the pipeline ──────────────────────────────────────────────────────────

const orchestrator = new ModerationOrchestrator({
  transport: new FetchTransport({ timeoutMs: config.uploadTimeoutMs }),
  chunker: config.chunkStrategy,
  onResult: (outcome) => {
    logOutcome(outcome);
    refresher.handleOutcome(outcome);
  },
  logger: createConsoleLogger("ModerationOrchestrator"),
});

const refresher = new SessionRefresher(orchestrator);

const server = createAppServer({ orchestrator });

// ─── Start ──────────────────────────────────────────────────────────────────────

async function main(cfg: AppConfig): Promise<void> {
  logInit(`Exchanging API key for a session token (user ${cfg.userId}, room ${cfg.roomId})...`);
  await orchestrator.initialize({
    canRecord: () => server.frameSource.canRecord(),
    getMetadata: () => ({ userId: cfg.userId, roomId: cfg.roomId }),
    chunkDurationSeconds: cfg.chunkDurationSeconds,
    endpointUrl: cfg.endpointUrl,
    sessionsPath: cfg.sessionsPath,
    moderationsPath: cfg.moderationsPath,
    apiKey: cfg.apiKey,
    ...cfg.requestFlags,
  });
  refresher.start();

  const port = await server.listen(cfg.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
  logInit(`Stream audio to ws://localhost:${port}/audio`);
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logInit(`${signal} received, stopping audio intake...`);
  refresher.stop();
  await server.close();
  logInit(`Waiting for ${orchestrator.inFlightUploads} upload(s) in flight...`);
  await orchestrator.whenIdle();
  logInit("Shutdown complete");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      });
  });
}

main(config).catch((err: unknown) => {
  logFatal(`Startup failed: ${describeError(err)}`);
  process.exit(1);
});
