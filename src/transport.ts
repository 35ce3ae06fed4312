// Voice Moderation Relay - HTTP transport
// Minimal interface over the two requests the orchestrator makes, so tests can
// inject an in-process fake. FetchTransport is the production implementation.

export interface TransportResponse {
  status: number;
  body: string;
}

export interface MultipartPart {
  /** Form field name */
  name: string;
  filename: string;
  contentType: string;
  data: Buffer;
}

/**
 * Resolves for any HTTP response, whatever the status. Rejects only when no
 * response was received (DNS failure, refused connection, timeout...).
 */
export interface Transport {
  postJson(url: string, body: unknown, headers: Record<string, string>): Promise<TransportResponse>;
  postMultipart(url: string, parts: MultipartPart[], headers: Record<string, string>): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  /** Per-request timeout in milliseconds. Default: 30000 */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Transport built on the global fetch / FormData / Blob.
 */
export class FetchTransport implements Transport {
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async postJson(url: string, body: unknown, headers: Record<string, string>): Promise<TransportResponse> {
    return this.send(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
  }

  async postMultipart(
    url: string,
    parts: MultipartPart[],
    headers: Record<string, string>,
  ): Promise<TransportResponse> {
    const form = new FormData();
    for (const part of parts) {
      form.append(part.name, new Blob([part.data], { type: part.contentType }), part.filename);
    }
    // fetch sets the multipart Content-Type (with boundary) itself
    return this.send(url, { method: "POST", headers, body: form });
  }

  private async send(url: string, init: RequestInit): Promise<TransportResponse> {
    const response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    const body = await response.text();
    return { status: response.status, body };
  }
}
