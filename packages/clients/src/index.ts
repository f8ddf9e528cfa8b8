import fetch from 'node-fetch';
import type { DetectedSpan, RewritePolicy, SentenceSpan, SourceTier, SpanBatch, SpanRecord } from '@textguard/core';

export type ClientOptions = { baseUrl: string; apiKey?: string };

export type RedactSource =
  | { source: string; tier: SourceTier; spans: DetectedSpan[] }
  | { source: string; tier: SourceTier; kind: string; censored: string };

export interface RedactRequest {
  text: string;
  sources: RedactSource[];
  policy?: RewritePolicy;
  token?: string;
  thresholds?: Record<string, number>;
  placeholders?: Record<string, string>;
}

export interface RedactResponse {
  status: 'pass' | 'fixed';
  text: string;
  spans: SpanRecord[];
}

export interface DiffRequest {
  original: string;
  transformed: string;
  kind?: string;
  source?: string;
  replacement?: string;
}

export class TextGuardClientError extends Error {
  constructor(readonly status: number, readonly body: unknown) {
    super(`request failed with status ${status}`);
    this.name = 'TextGuardClientError';
  }
}

// Error bodies are JSON from the API, but a proxy in between may send text
function readErrorBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class TextGuardClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  private async request<T>(method: 'GET' | 'POST', path: string, body?: unknown): Promise<T> {
    const r = await fetch(`${this.opts.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!r.ok) throw new TextGuardClientError(r.status, readErrorBody(await r.text()));
    return r.json();
  }

  health() {
    return this.request<{ ok: boolean }>('GET', '/health');
  }

  merge(text: string, batches: SpanBatch[]) {
    return this.request<{ spans: SpanRecord[] }>('POST', '/spans/merge', { text, batches });
  }

  reconstruct(text: string, spans: SpanRecord[], policy: RewritePolicy, token?: string) {
    return this.request<{ text: string }>('POST', '/text/reconstruct', { text, spans, policy, token });
  }

  sentences(text: string) {
    return this.request<{ sentences: SentenceSpan[] }>('POST', '/text/sentences', { text });
  }

  diff(body: DiffRequest) {
    return this.request<{ spans: SpanRecord[] }>('POST', '/spans/diff', body);
  }

  redact(body: RedactRequest) {
    return this.request<RedactResponse>('POST', '/redact', body);
  }
}
