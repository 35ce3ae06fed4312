// Voice Moderation Relay - Express Server
// Health and status endpoints plus the voice stream WebSocket endpoint on one HTTP server.
//
// Privacy: audio is held in memory only and never written to disk.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import type { FrameSource } from "./frame-source.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { ModerationOrchestrator } from "./moderation-orchestrator.js";
import { WebSocketFrameSource } from "./websocket-frame-source.js";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  orchestrator: ModerationOrchestrator;
  /**
   * Builds the frame source for the HTTP server. Defaults to a WebSocketFrameSource
   * mounted at /audio and feeding the orchestrator.
   */
  frameSourceFactory?: (httpServer: HttpServer) => FrameSource;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  frameSource: FrameSource;
  /** Start listening and accepting streams. Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Stop the frame source and close the HTTP server. Does not wait for uploads. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server and frame source.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { orchestrator, logger = createConsoleLogger("Server") } = options;
  const frameSourceFactory =
    options.frameSourceFactory ??
    ((server: HttpServer) => new WebSocketFrameSource(orchestrator, { server, logger }));

  const app = express();
  const httpServer = createServer(app);
  const frameSource = frameSourceFactory(httpServer);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/status", (_req, res) => {
    res.json({
      ...orchestrator.getStatus(),
      frameSource: { name: frameSource.name, recording: frameSource.isRecording },
    });
  });

  return {
    app,
    httpServer,
    frameSource,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          const boundPort = typeof address === "object" && address !== null ? address.port : port;
          frameSource.start();
          logger.info(`Server listening on port ${boundPort}`);
          resolve(boundPort);
        });
      });
    },
    close(): Promise<void> {
      frameSource.stop();
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        httpServer.closeAllConnections();
      });
    },
  };
}
