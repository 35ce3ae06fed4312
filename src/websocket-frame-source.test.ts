// WebSocketFrameSource tests over a real ws connection on an ephemeral port

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createServer, type Server as HttpServer } from "node:http";
import WebSocket from "ws";
import type { SampleFrame } from "./chunk-accumulator.js";
import type { FrameSink } from "./frame-source.js";
import type { ServerMessage } from "./types.js";
import { CLOSE_CODE_BUSY, WebSocketFrameSource, decodeFloat32Frame } from "./websocket-frame-source.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

class RecordingSink implements FrameSink {
  readonly frames: number[][] = [];
  readonly formats: Array<[number | undefined, number | undefined]> = [];

  configureAudio(sampleRate?: number, channelCount?: number): void {
    this.formats.push([sampleRate, channelCount]);
  }

  onFrame(frame: SampleFrame): void {
    this.frames.push(Array.from(frame));
  }
}

/**
 * A test WebSocket client that queues all incoming messages.
 */
class TestClient {
  ws: WebSocket;
  private messageQueue: ServerMessage[] = [];
  private waiters: Array<(msg: ServerMessage) => void> = [];
  readonly closed: Promise<{ code: number; reason: string }>;

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: WebSocket.RawData) => {
      const msg: ServerMessage = JSON.parse(data.toString());
      const waiter = this.waiters.shift();
      if (waiter) waiter(msg);
      else this.messageQueue.push(msg);
    });
    this.closed = new Promise((resolve) => {
      this.ws.on("close", (code: number, reason: Buffer) => resolve({ code, reason: reason.toString() }));
    });
  }

  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.once("open", () => resolve());
      this.ws.once("error", reject);
    });
  }

  nextMessage(timeoutMs = 3000): Promise<ServerMessage> {
    const queued = this.messageQueue.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiterFn);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      const waiterFn = (msg: ServerMessage) => {
        clearTimeout(timer);
        resolve(msg);
      };
      this.waiters.push(waiterFn);
    });
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  sendSamples(samples: number[]): void {
    const buf = Buffer.alloc(samples.length * 4);
    samples.forEach((s, i) => buf.writeFloatLE(s, i * 4));
    this.ws.send(buf);
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

let httpServer: HttpServer;
let sink: RecordingSink;
let source: WebSocketFrameSource;
let baseUrl: string;
const clients: TestClient[] = [];

async function connect(handshake = true): Promise<TestClient> {
  const client = new TestClient(`${baseUrl}/audio`);
  clients.push(client);
  await client.waitForOpen();
  if (handshake) {
    client.sendJson({ type: "audio_format", sampleRate: 48000, channels: 1 });
    expect(await client.nextMessage()).toEqual({ type: "ready", sampleRate: 48000, channels: 1 });
  }
  return client;
}

beforeEach(async () => {
  httpServer = createServer();
  sink = new RecordingSink();
  source = new WebSocketFrameSource(sink, { server: httpServer, logger: createSilentLogger() });
  source.start();
  await new Promise<void>((resolve) => httpServer.listen(0, "127.0.0.1", () => resolve()));
  const addr = httpServer.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Unexpected server address format");
  }
  baseUrl = `ws://127.0.0.1:${addr.port}`;
});

afterEach(async () => {
  for (const client of clients.splice(0)) client.close();
  source.stop();
  await new Promise<void>((resolve) => {
    httpServer.close(() => resolve());
    httpServer.closeAllConnections();
  });
});

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("decodeFloat32Frame", () => {
  it("decodes little-endian float32 samples", () => {
    const buf = Buffer.alloc(8);
    buf.writeFloatLE(0.5, 0);
    buf.writeFloatLE(-0.25, 4);
    expect(Array.from(decodeFloat32Frame(buf) ?? [])).toEqual([0.5, -0.25]);
  });

  it("returns null for a length that is not a multiple of 4", () => {
    expect(decodeFloat32Frame(Buffer.alloc(6))).toBeNull();
  });
});

describe("WebSocketFrameSource", () => {
  it("accepts the format handshake and forwards binary frames to the sink", async () => {
    const client = await connect();
    expect(sink.formats).toEqual([[48000, 1]]);
    expect(source.hasActiveStream).toBe(true);

    client.sendSamples([0.5, -0.25, 1]);
    client.sendSamples([0.125]);
    await vi.waitFor(() => expect(sink.frames).toHaveLength(2));
    expect(sink.frames).toEqual([[0.5, -0.25, 1], [0.125]]);
  });

  it("answers audio sent before the handshake with an error", async () => {
    const client = await connect(false);
    client.sendSamples([0.5]);
    expect(await client.nextMessage()).toEqual({
      type: "error",
      message: "Audio format handshake required before sending audio frames.",
    });
    expect(sink.frames).toEqual([]);
  });

  it("answers a misaligned binary frame with an error", async () => {
    const client = await connect();
    client.ws.send(Buffer.alloc(6));
    expect(await client.nextMessage()).toEqual({
      type: "error",
      message: "Audio frame byte length (6) is not a multiple of 4. Expected float32 samples.",
    });
    expect(sink.frames).toEqual([]);
  });

  it("rejects an invalid audio format", async () => {
    const client = await connect(false);
    client.sendJson({ type: "audio_format", sampleRate: 0, channels: 1 });
    const msg = await client.nextMessage();
    expect(msg.type).toBe("error");
    expect(msg.type === "error" && msg.message.startsWith("Invalid message: ")).toBe(true);
    expect(sink.formats).toEqual([]);
  });

  it("rejects a channel count the WAV header cannot hold", async () => {
    const client = await connect(false);
    client.sendJson({ type: "audio_format", sampleRate: 16000, channels: 40000 });
    const msg = await client.nextMessage();
    expect(msg.type === "error" && msg.message.startsWith("Invalid message: ")).toBe(true);
    expect(sink.formats).toEqual([]);
  });

  it("answers malformed JSON with an error and keeps the connection open", async () => {
    const client = await connect(false);
    client.ws.send("{oops");
    expect((await client.nextMessage()).type).toBe("error");

    client.sendJson({ type: "audio_format", sampleRate: 16000, channels: 2 });
    expect(await client.nextMessage()).toEqual({ type: "ready", sampleRate: 16000, channels: 2 });
  });

  it("closes a second connection with 1013 while a stream is active", async () => {
    const first = await connect();
    const second = new TestClient(`${baseUrl}/audio`);
    clients.push(second);

    const { code } = await second.closed;
    expect(code).toBe(CLOSE_CODE_BUSY);

    first.close();
    await first.closed;
    await vi.waitFor(() => expect(source.hasActiveStream).toBe(false));
    await connect();
  });

  it("does not let a connection that never handshakes block other streams", async () => {
    await connect(false);
    expect(source.hasActiveStream).toBe(false);

    await connect();
    expect(source.hasActiveStream).toBe(true);
  });

  it("closes a connection with 1013 when it handshakes after another stream", async () => {
    const waiting = await connect(false);
    await connect();

    waiting.sendJson({ type: "audio_format", sampleRate: 16000, channels: 1 });
    expect((await waiting.closed).code).toBe(CLOSE_CODE_BUSY);
    expect(sink.formats).toEqual([[48000, 1]]);
    expect(source.hasActiveStream).toBe(true);
  });

  it("closes the connection on a stop message", async () => {
    const client = await connect();
    client.sendJson({ type: "stop" });
    expect((await client.closed).code).toBe(1000);
  });

  it("closes every stream when stopped", async () => {
    const client = await connect();
    source.stop();
    expect(source.isRecording).toBe(false);
    expect(source.canRecord()).toBe(false);
    expect((await client.closed).code).toBe(1001);
  });
});
