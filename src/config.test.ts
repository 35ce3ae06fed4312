// Unit tests for environment configuration

import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const REQUIRED = {
  MODERATION_API_KEY: "test-secret",
  MODERATION_ENDPOINT_URL: "https://moderation.test",
};

describe("loadConfig", () => {
  it("applies defaults for everything optional", () => {
    const config = loadConfig({ ...REQUIRED, MODERATION_USER_ID: "user-1" });
    expect(config).toEqual({
      apiKey: "test-secret",
      endpointUrl: "https://moderation.test",
      sessionsPath: "/api/v1/sessions",
      moderationsPath: "/api/v1/moderations",
      chunkDurationSeconds: 15,
      chunkStrategy: { kind: "fixed", silenceThreshold: undefined },
      requestFlags: {
        requestActions: true,
        requestSafetyScores: true,
        requestTranscription: true,
        requestFileUrl: false,
        requestRuleViolations: false,
      },
      userId: "user-1",
      roomId: "default_room",
      port: 3000,
      uploadTimeoutMs: 30000,
    });
  });

  it("generates a user id when none is configured", () => {
    const { userId } = loadConfig({ ...REQUIRED });
    expect(userId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it("parses numbers, booleans and the chunk strategy", () => {
    const config = loadConfig({
      ...REQUIRED,
      CHUNK_DURATION_SECONDS: "5",
      CHUNK_STRATEGY: "silence_filter",
      SILENCE_THRESHOLD: "0.05",
      REQUEST_ACTIONS: "0",
      REQUEST_FILE_URL: "true",
      PORT: "8080",
      UPLOAD_TIMEOUT_MS: "1000",
    });
    expect(config.chunkDurationSeconds).toBe(5);
    expect(config.chunkStrategy).toEqual({ kind: "silence_filter", threshold: 0.05 });
    expect(config.requestFlags.requestActions).toBe(false);
    expect(config.requestFlags.requestFileUrl).toBe(true);
    expect(config.port).toBe(8080);
    expect(config.uploadTimeoutMs).toBe(1000);
  });

  it("maps the threshold onto the encode threshold for vad", () => {
    const config = loadConfig({ ...REQUIRED, CHUNK_STRATEGY: "vad", SILENCE_THRESHOLD: "0.01" });
    expect(config.chunkStrategy).toEqual({ kind: "vad", encodeSilenceThreshold: 0.01 });
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ ...REQUIRED, MODERATION_ROOM_ID: "", PORT: "" });
    expect(config.roomId).toBe("default_room");
    expect(config.port).toBe(3000);
  });

  it("lists every missing and invalid variable in one error", () => {
    let caught: unknown;
    try {
      loadConfig({ MODERATION_ENDPOINT_URL: "not a url", CHUNK_STRATEGY: "loud", CHUNK_DURATION_SECONDS: "-1" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const message = caught instanceof Error ? caught.message : "";
    expect(message).toContain("Missing required environment variables:\n  - MODERATION_API_KEY");
    expect(message).toContain("MODERATION_ENDPOINT_URL: MODERATION_ENDPOINT_URL must be a URL");
    expect(message).toContain("CHUNK_STRATEGY:");
    expect(message).toContain("CHUNK_DURATION_SECONDS:");
  });

  it("rejects an unknown boolean spelling", () => {
    expect(() => loadConfig({ ...REQUIRED, REQUEST_ACTIONS: "yes" })).toThrow("REQUEST_ACTIONS");
  });
});
