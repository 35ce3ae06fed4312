// Voice Moderation Relay - WebSocket frame source
// Accepts one live audio stream over WebSocket and forwards its samples to the sink.
//
// Protocol:
//   client → {"type":"audio_format","sampleRate":48000,"channels":1}
//   server → {"type":"ready","sampleRate":48000,"channels":1}
//   client → binary frames of float32 little-endian samples (interleaved if multi-channel)
//   client → {"type":"stop"}  (server closes the connection)
//
// Audio is forwarded straight to the sink and never buffered here.

import type { Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";
import type { FrameSink, FrameSource } from "./frame-source.js";
import { MAX_CHANNEL_COUNT, MAX_SAMPLE_RATE } from "./chunk-accumulator.js";
import { describeError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { ClientMessage, ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const DEFAULT_AUDIO_PATH = "/audio";

/** Close code sent to a second client while a stream is already active ("try again later") */
export const CLOSE_CODE_BUSY = 1013;

const BYTES_PER_SAMPLE = 4;

const clientMessageSchema: z.ZodType<ClientMessage> = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("audio_format"),
    sampleRate: z.number().int().positive().max(MAX_SAMPLE_RATE),
    channels: z.number().int().positive().max(MAX_CHANNEL_COUNT),
  }),
  z.object({ type: z.literal("stop") }),
]);

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface StreamState {
  socket: WebSocket;
  formatAccepted: boolean;
  framesReceived: number;
}

export interface WebSocketFrameSourceOptions {
  /** HTTP server to share. The WebSocket endpoint is mounted at `path`. */
  server: HttpServer;
  /** Default: "/audio" */
  path?: string;
  logger?: Logger;
}

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** Decode float32 little-endian samples. Returns null if the length is not 4-byte aligned. */
export function decodeFloat32Frame(data: Buffer): Float32Array | null {
  if (data.length % BYTES_PER_SAMPLE !== 0) return null;
  const samples = new Float32Array(data.length / BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = data.readFloatLE(i * BYTES_PER_SAMPLE);
  }
  return samples;
}

export class WebSocketFrameSource implements FrameSource {
  readonly name = "websocket";
  private readonly server: HttpServer;
  private readonly path: string;
  private readonly logger: Logger;
  private wss: WebSocketServer | null = null;
  /** The stream that completed the format handshake; connections still handshaking are not counted. */
  private active: StreamState | null = null;

  constructor(
    private readonly sink: FrameSink,
    options: WebSocketFrameSourceOptions,
  ) {
    this.server = options.server;
    this.path = options.path ?? DEFAULT_AUDIO_PATH;
    this.logger = options.logger ?? createConsoleLogger("WebSocketFrameSource");
  }

  /** True while the endpoint is accepting streams. */
  get isRecording(): boolean {
    return this.wss !== null;
  }

  /** True while a client has an accepted stream open. */
  get hasActiveStream(): boolean {
    return this.active !== null;
  }

  canRecord(): boolean {
    return this.wss !== null;
  }

  start(): void {
    if (this.wss) return;
    const wss = new WebSocketServer({ server: this.server, path: this.path });
    wss.on("connection", (ws: WebSocket) => this.handleConnection(ws));
    wss.on("error", (err) => {
      this.logger.error(`WebSocket server error: ${err.message}`);
    });
    this.wss = wss;
    this.logger.info(`Accepting audio streams on ${this.path}`);
  }

  stop(): void {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    this.active = null;
    for (const client of wss.clients) {
      client.close(1001, "Server shutting down");
    }
    wss.close((err) => {
      if (err) this.logger.error(`Error closing WebSocket server: ${err.message}`);
    });
    this.logger.info("Stopped accepting audio streams");
  }

  dispose(): void {
    this.stop();
  }

  // ─── Connection Handling ──────────────────────────────────────────────────

  private rejectBusy(ws: WebSocket): void {
    this.logger.warn("Rejecting audio stream: another stream is already active");
    ws.close(CLOSE_CODE_BUSY, "Another audio stream is already active");
  }

  private handleConnection(ws: WebSocket): void {
    if (this.active) {
      this.rejectBusy(ws);
      return;
    }

    const stream: StreamState = { socket: ws, formatAccepted: false, framesReceived: 0 };
    this.logger.info("Audio stream connected");

    ws.on("message", (data: RawData, isBinary: boolean) => {
      try {
        if (isBinary) {
          this.handleBinaryMessage(stream, toBuffer(data));
        } else {
          this.handleTextMessage(stream, toBuffer(data).toString("utf-8"));
        }
      } catch (err) {
        const errorMessage = describeError(err);
        this.logger.error(`Error handling audio stream message: ${errorMessage}`);
        sendMessage(ws, { type: "error", message: errorMessage });
      }
    });

    ws.on("close", () => {
      this.logger.info(`Audio stream closed after ${stream.framesReceived} frame(s)`);
      if (this.active === stream) this.active = null;
    });

    ws.on("error", (err) => {
      this.logger.error(`Audio stream error: ${err.message}`);
      if (this.active === stream) this.active = null;
    });
  }

  private handleBinaryMessage(stream: StreamState, data: Buffer): void {
    if (!stream.formatAccepted) {
      sendMessage(stream.socket, {
        type: "error",
        message: "Audio format handshake required before sending audio frames.",
      });
      return;
    }

    const samples = decodeFloat32Frame(data);
    if (!samples) {
      sendMessage(stream.socket, {
        type: "error",
        message: `Audio frame byte length (${data.length}) is not a multiple of ${BYTES_PER_SAMPLE}. Expected float32 samples.`,
      });
      return;
    }

    stream.framesReceived++;
    this.sink.onFrame(samples);
  }

  private handleTextMessage(stream: StreamState, text: string): void {
    const parsed = clientMessageSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      sendMessage(stream.socket, {
        type: "error",
        message: `Invalid message: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      });
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case "audio_format":
        if (this.active && this.active !== stream) {
          this.rejectBusy(stream.socket);
          return;
        }
        this.sink.configureAudio(message.sampleRate, message.channels);
        stream.formatAccepted = true;
        this.active = stream;
        this.logger.info(`Audio format accepted: ${message.sampleRate}Hz x${message.channels}`);
        sendMessage(stream.socket, { type: "ready", sampleRate: message.sampleRate, channels: message.channels });
        break;

      case "stop":
        this.logger.info("Client ended the audio stream");
        stream.socket.close(1000, "Stream ended");
        break;

      default: {
        const exhaustiveCheck: never = message;
        sendMessage(stream.socket, {
          type: "error",
          message: `Unknown message type: ${(exhaustiveCheck as { type: string }).type}`,
        });
      }
    }
  }
}
