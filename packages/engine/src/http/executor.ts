import { Agent, FormData, fetch, type Dispatcher } from 'undici';
import type { VariableValue } from '@courier/catalog';
import type { HttpExchange, ResolvedRequest } from '../models/results.js';
import { stringify } from '../templates/template-resolver.js';
import { TransportError } from '../errors.js';

export interface ExecuteOptions {
  timeoutMs: number;
  /** Skip TLS certificate verification */
  insecure: boolean;
}

export interface RequestExecutor {
  execute(request: ResolvedRequest, options: ExecuteOptions): Promise<HttpExchange>;
}

// ── Fetch seam ──────────────────────────────────────────────────────

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string | FormData;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface FetchResponse {
  status: number;
  headers: { forEach(callback: (value: string, key: string) => void): void };
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

const undiciFetch: FetchLike = (url, init) => fetch(url, init);

// ── Executor ────────────────────────────────────────────────────────

/**
 * Sends a resolved request over HTTP(S) and reads the whole response as
 * text. Anything that prevents a response from arriving is reported as a
 * TransportError.
 */
export class FetchRequestExecutor implements RequestExecutor {
  private insecureAgent: Agent | null = null;

  constructor(private readonly fetchImpl: FetchLike = undiciFetch) {}

  async execute(request: ResolvedRequest, options: ExecuteOptions): Promise<HttpExchange> {
    const headers = { ...request.headers };
    const body = encodeBody(request, headers);

    const init: FetchInit = {
      method: request.method.toUpperCase(),
      headers,
      signal: AbortSignal.timeout(options.timeoutMs),
      ...(body !== undefined ? { body } : {}),
      ...(options.insecure ? { dispatcher: this.agent() } : {}),
    };

    const started = performance.now();
    try {
      const response = await this.fetchImpl(request.url, init);
      const text = await response.text();
      const elapsedMs = Math.round(performance.now() - started);

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });

      return { status: response.status, headers: responseHeaders, body: text, elapsedMs };
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new TransportError(
          `${init.method} ${request.url} timed out after ${options.timeoutMs}ms`,
          true,
        );
      }
      throw new TransportError(`${init.method} ${request.url} failed: ${describe(err)}`);
    }
  }

  /** Release pooled connections held by the insecure agent. */
  async close(): Promise<void> {
    if (this.insecureAgent) {
      await this.insecureAgent.close();
      this.insecureAgent = null;
    }
  }

  private agent(): Agent {
    if (!this.insecureAgent) {
      this.insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
    }
    return this.insecureAgent;
  }
}

// ── Body encoding ───────────────────────────────────────────────────

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

function setDefaultHeader(headers: Record<string, string>, name: string, value: string): void {
  if (!hasHeader(headers, name)) headers[name] = value;
}

/** Top-level fields of a form or multipart body, as text. */
export function formFields(value: VariableValue): [string, string][] {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return [];
  return Object.entries(value).map(([key, item]) => [key, stringify(item)]);
}

/** Encode the body for its type; fills in Content-Type unless one was given. */
export function encodeBody(
  request: ResolvedRequest,
  headers: Record<string, string>,
): string | FormData | undefined {
  if (request.body === undefined || (request.body === null && request.bodyType !== 'json')) {
    return undefined;
  }

  switch (request.bodyType) {
    case 'json':
      setDefaultHeader(headers, 'Content-Type', 'application/json');
      return JSON.stringify(request.body);

    case 'form':
      setDefaultHeader(headers, 'Content-Type', 'application/x-www-form-urlencoded');
      return new URLSearchParams(formFields(request.body)).toString();

    case 'text':
      setDefaultHeader(headers, 'Content-Type', 'text/plain');
      return stringify(request.body);

    case 'multipart': {
      // fetch writes the boundary into Content-Type itself
      const form = new FormData();
      for (const [key, value] of formFields(request.body)) form.append(key, value);
      return form;
    }

    default:
      return stringify(request.body);
  }
}

function describe(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
