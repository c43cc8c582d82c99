import { EventEmitter } from 'events';
import {
  BODY_KEYS,
  type BodyKey,
  type DataRow,
  type LoadedRequest,
  type RequestDocument,
  type RequestOptions,
  type SuiteBundle,
  type VariableMap,
  type VariableValue,
} from '@courier/catalog';
import { VariableStore, type LayerName } from '../variables/variable-store.js';
import type { PersistentVariables } from '../variables/persistent-variables.js';
import { TemplateResolver, stringify } from '../templates/template-resolver.js';
import type { FakeDataGenerator } from '../templates/fake-data.js';
import { ExtractAssertEngine } from '../assertions/extract-assert.js';
import { parseJsonBody, toNumber } from '../assertions/values.js';
import type { RequestExecutor } from '../http/executor.js';
import type { ScriptResult, ScriptRuntime } from '../scripts/script-runtime.js';
import { ResolutionError, ScriptError } from '../errors.js';
import {
  summarize,
  type BodyType,
  type HttpExchange,
  type RequestExecution,
  type ResolvedRequest,
  type RowContext,
  type SuiteResult,
} from '../models/results.js';

// ── Constants ────────────────────────────────────────────────────────

export const DEFAULT_TIMEOUT_MS = 60_000;

const BODY_TYPES: Record<Exclude<BodyKey, 'Body'>, BodyType> = {
  JsonBody: 'json',
  FormBody: 'form',
  TextBody: 'text',
  MultipartBody: 'multipart',
};

// ── Options ──────────────────────────────────────────────────────────

export interface SuiteOrchestratorDeps {
  persistent: PersistentVariables;
  executor: RequestExecutor;
  generator: FakeDataGenerator;
  /** Needed only by requests that declare PreExec/PostExec */
  scripts?: ScriptRuntime;
  /** Globals handed to every script, e.g. `{ faker }` */
  scriptHelpers?: Record<string, unknown>;
  precedence?: readonly LayerName[];
  maxDepth?: number;
  defaultTimeoutMs?: number;
  insecure?: boolean;
  /** Silence progress logging */
  quiet?: boolean;
}

export interface RunOptions {
  /** Highest-precedence variables, e.g. from the command line or API */
  overrides?: VariableMap;
  /** Checked between requests */
  signal?: AbortSignal;
  timeoutMs?: number;
  insecure?: boolean;
}

export interface SingleRequestOptions extends RunOptions {
  vars?: VariableMap;
  configs?: VariableMap[];
  options?: RequestOptions;
}

/** A request resolved and ready to send, with its effective transport settings. */
export interface PreparedRequest {
  request: ResolvedRequest;
  timeoutMs: number;
  insecure: boolean;
}

interface RequestContext {
  suiteOptions?: RequestOptions;
  timeoutMs: number;
  insecure: boolean;
}

/**
 * Runs a suite: every data row against every request, in order.
 *
 * Requests never abort the run; whatever goes wrong is written into that
 * request's record and the next request proceeds. Captures and script
 * writes go to the shared persistent layer and are visible to every later
 * request and row, behind the row's own data.
 *
 * Events: `suite:started`, `row:started`, `request:completed`,
 * `row:completed`, `suite:completed`.
 */
export class SuiteOrchestrator extends EventEmitter {
  private readonly deps: SuiteOrchestratorDeps;

  constructor(deps: SuiteOrchestratorDeps) {
    super();
    this.deps = deps;
  }

  // ── Suite run ────────────────────────────────────────────────────

  async run(bundle: SuiteBundle, options: RunOptions = {}): Promise<SuiteResult> {
    const startedAt = Date.now();
    const base = new VariableStore({
      overrides: options.overrides,
      suite: bundle.suite.Vars,
      configs: bundle.configs.map((config) => config.variables),
      persistent: this.deps.persistent,
      precedence: this.deps.precedence,
    });
    const ctx = this.requestContext(options, bundle.suite.Options);

    // no data source: one row with no data
    const data: DataRow[] = bundle.rows.length > 0 ? bundle.rows : [{}];
    const rows: RowContext[] = [];
    let cancelled = false;

    this.log(`Running suite ${bundle.name}: ${data.length} row(s) x ${bundle.requests.length} request(s)`);
    this.emit('suite:started', { name: bundle.name, rows: data.length, requests: bundle.requests.length });

    try {
      rowLoop: for (let i = 0; i < data.length; i++) {
        if (options.signal?.aborted) {
          cancelled = true;
          break;
        }

        const row: RowContext = { index: i + 1, variables: data[i], requests: [] };
        rows.push(row);
        this.emit('row:started', row);

        const rowStore = base.fork({ row: data[i] });

        for (let j = 0; j < bundle.requests.length; j++) {
          if (options.signal?.aborted) {
            cancelled = true;
            break rowLoop;
          }

          const request = bundle.requests[j];
          this.log(`Executing request ${j + 1}/${bundle.requests.length} (row ${row.index}): ${request.file}`);

          const execution = await this.executeRequest(request, rowStore, ctx);
          row.requests.push(execution);
          this.emit('request:completed', { row: row.index, execution });
        }

        this.emit('row:completed', row);
      }
    } finally {
      this.flush();
    }

    const result: SuiteResult = {
      name: bundle.name,
      status: cancelled ? 'cancelled' : 'completed',
      rows,
      summary: summarize(rows),
      startedAt,
      completedAt: Date.now(),
    };

    const { summary } = result;
    this.log(
      `Suite ${bundle.name} ${result.status}: ${summary.completedRequests}/${summary.requests} requests completed, ` +
        `${summary.passedAssertions}/${summary.assertions} assertions passed`,
    );
    this.emit('suite:completed', result);
    return result;
  }

  // ── Single request run ───────────────────────────────────────────

  async runRequest(request: LoadedRequest, options: SingleRequestOptions = {}): Promise<RequestExecution> {
    const store = new VariableStore({
      overrides: options.overrides,
      suite: options.vars,
      configs: options.configs,
      persistent: this.deps.persistent,
      precedence: this.deps.precedence,
    });

    try {
      return await this.executeRequest(request, store, this.requestContext(options, options.options));
    } finally {
      this.flush();
    }
  }

  /**
   * Resolve one request without sending it: defines and PreExec run, but
   * nothing is flushed to the persistent store.
   */
  prepare(request: LoadedRequest, options: SingleRequestOptions = {}): PreparedRequest {
    const store = new VariableStore({
      overrides: options.overrides,
      suite: options.vars,
      configs: options.configs,
      persistent: this.deps.persistent,
      precedence: this.deps.precedence,
    }).fork({ define: {} });
    const resolver = new TemplateResolver(store, this.deps.generator, { maxDepth: this.deps.maxDepth });

    return this.resolveRequest(request, store, resolver, this.requestContext(options, options.options));
  }

  // ── One request ──────────────────────────────────────────────────

  private async executeRequest(
    loaded: LoadedRequest,
    parent: VariableStore,
    ctx: RequestContext,
  ): Promise<RequestExecution> {
    const doc = loaded.document;
    const startedAt = Date.now();
    const execution: RequestExecution = {
      status: 'complete',
      file: loaded.file,
      assertions: {},
      captures: {},
      startedAt,
      completedAt: startedAt,
    };

    const store = parent.fork({ define: {} });
    const resolver = new TemplateResolver(store, this.deps.generator, { maxDepth: this.deps.maxDepth });
    const checks = new ExtractAssertEngine(resolver);

    try {
      const { request, timeoutMs, insecure } = this.resolveRequest(loaded, store, resolver, ctx);
      execution.request = request;

      const response = await this.deps.executor.execute(request, { timeoutMs, insecure });
      execution.response = response;
      this.log(`${request.method} ${request.url} -> ${response.status} (${response.elapsedMs}ms)`);

      execution.captures = checks.capture(doc.Captures ?? {}, response);
      for (const [name, value] of Object.entries(execution.captures)) {
        store.set(name, value, 'persistent');
      }
      this.flush();

      execution.assertions = checks.assert(doc.Asserts ?? {}, response, doc.Status);

      if (doc.PostExec !== undefined) {
        this.runScript('PostExec', doc.PostExec, store, loaded, response);
      }
    } catch (err) {
      execution.status = 'error';
      execution.error = err instanceof Error ? err.message : String(err);
      execution.errorType = err instanceof Error ? err.name : 'Error';
      this.logError(`Request ${loaded.file} failed:`, execution.error);
    } finally {
      this.flush();
    }

    execution.completedAt = Date.now();
    return execution;
  }

  private resolveRequest(
    loaded: LoadedRequest,
    store: VariableStore,
    resolver: TemplateResolver,
    ctx: RequestContext,
  ): PreparedRequest {
    const doc = loaded.document;

    // later defines may reference earlier ones
    for (const [name, value] of Object.entries(doc.Define ?? {})) {
      store.set(name, resolver.resolve(value, `Define.${name}`), 'define');
    }

    if (doc.PreExec !== undefined) {
      this.runScript('PreExec', doc.PreExec, store, loaded, undefined);
    }

    const request = prepareRequest(doc, resolver);
    return {
      request,
      timeoutMs: resolveTimeout(doc.Options, ctx, resolver),
      insecure: ctx.insecure || resolveInsecure(doc.Options, ctx, resolver),
    };
  }

  private runScript(
    phase: 'PreExec' | 'PostExec',
    source: string,
    store: VariableStore,
    loaded: LoadedRequest,
    response: HttpExchange | undefined,
  ): void {
    const runtime = this.deps.scripts;
    if (!runtime) throw new ScriptError(phase, 'no script runtime configured');

    const helpers: Record<string, unknown> = {
      ...this.deps.scriptHelpers,
      request: structuredClone(loaded.document),
    };
    if (response) {
      helpers.response = { ...response, json: parseJsonBody(response.body) ?? null };
    }

    let result: ScriptResult;
    try {
      result = runtime.run(source, {
        variables: store.snapshot(),
        helpers,
        filename: `${loaded.file}#${phase}`,
      });
    } catch (err) {
      throw new ScriptError(phase, err instanceof Error ? err.message : String(err));
    }

    for (const { name, value } of result.mutations) store.set(name, value, 'persistent');
  }

  private requestContext(options: RunOptions, suiteOptions: RequestOptions | undefined): RequestContext {
    return {
      suiteOptions,
      timeoutMs: options.timeoutMs ?? this.deps.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS,
      insecure: options.insecure ?? this.deps.insecure ?? false,
    };
  }

  private flush(): void {
    try {
      if (this.deps.persistent.flush()) this.log('Persistent variables saved');
    } catch (err) {
      console.error('SuiteOrchestrator: failed to save persistent variables:', err);
    }
  }

  private log(message: string): void {
    if (!this.deps.quiet) console.log(`SuiteOrchestrator: ${message}`);
  }

  private logError(message: string, detail: string): void {
    if (!this.deps.quiet) console.error(`SuiteOrchestrator: ${message}`, detail);
  }
}

// ── Request preparation ──────────────────────────────────────────────

/** Resolve every templated field of a request document into a sendable request. */
export function prepareRequest(doc: RequestDocument, resolver: TemplateResolver): ResolvedRequest {
  const method = resolver.resolveText(doc.Method, 'Method').trim().toUpperCase();
  let url = resolver.resolveText(doc.Endpoint, 'Endpoint').trim();

  if (doc.QueryParams) {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(doc.QueryParams)) {
      const name = resolver.resolveText(key, `QueryParams.${key}`);
      const resolved = resolver.resolve(value, `QueryParams.${key}`);
      for (const item of Array.isArray(resolved) ? resolved : [resolved]) {
        params.append(name, stringify(item));
      }
    }
    const query = params.toString();
    if (query) url += (url.includes('?') ? '&' : '?') + query;
  }

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(doc.Headers ?? {})) {
    const path = `Headers.${key}`;
    headers[resolver.resolveText(key, path)] =
      typeof value === 'string' ? resolver.resolveText(value, path) : String(value);
  }

  const request: ResolvedRequest = { method, url, headers };

  const bodyKey = BODY_KEYS.find((key) => doc[key] !== undefined);
  if (bodyKey) {
    const raw: VariableValue = doc[bodyKey] ?? null;
    request.body = resolver.resolve(raw, bodyKey);
    request.bodyType = bodyKey === 'Body' ? inferBodyType(raw) : BODY_TYPES[bodyKey];
  }

  return request;
}

/** `Body` is raw text when given as a string and form fields when given as a mapping. */
function inferBodyType(raw: VariableValue): BodyType {
  if (typeof raw === 'string') return 'raw';
  if (raw !== null && typeof raw === 'object' && !Array.isArray(raw)) return 'form';
  return 'json';
}

function resolveTimeout(
  requestOptions: RequestOptions | undefined,
  ctx: RequestContext,
  resolver: TemplateResolver,
): number {
  const own = requestOptions?.timeout;
  const value = own ?? ctx.suiteOptions?.timeout;
  if (value === undefined) return ctx.timeoutMs;

  const path = own !== undefined ? 'Options.timeout' : 'suite Options.timeout';

  const seconds = toNumber(resolver.resolve(value, path));
  if (seconds === undefined || seconds <= 0) {
    throw new ResolutionError(`Invalid timeout "${String(value)}"`, path);
  }
  return Math.round(seconds * 1000);
}

function resolveInsecure(
  requestOptions: RequestOptions | undefined,
  ctx: RequestContext,
  resolver: TemplateResolver,
): boolean {
  const value = requestOptions?.insecure ?? ctx.suiteOptions?.insecure;
  if (value === undefined) return false;
  const resolved = resolver.resolve(value, 'Options.insecure');
  return resolved === true || (typeof resolved === 'string' && resolved.trim().toLowerCase() === 'true');
}
