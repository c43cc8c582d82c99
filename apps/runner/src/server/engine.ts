import { EventEmitter } from 'events';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { nanoid } from 'nanoid';
import type { CatalogService, SuiteBundle } from '@courier/catalog';
import {
  DEFAULT_TIMEOUT_MS,
  FakerGenerator,
  FetchRequestExecutor,
  PersistentVariables,
  PropertiesVariableRepository,
  SuiteOrchestrator,
  VmScriptRuntime,
  summarize,
  toCurl,
  type RequestExecution,
  type RequestExecutor,
  type RowContext,
  type ScriptRuntime,
  type SuiteResult,
  type VariableRepository,
} from '@courier/engine';
import type { RunInput, SuiteRun } from '../shared/types.js';

// ── Concurrency semaphore types ──────────────────────────────────────

interface QueuedWaiter {
  resolve: () => void;
}

// ── Constants ────────────────────────────────────────────────────────

const DEFAULT_MAX_CONCURRENCY = 1;
const CLEANUP_INTERVAL_MS = 60_000;
const CLEANUP_TTL_MS = 30 * 60_000; // 30 minutes
const CLEANUP_MAX_RUNS = 50;

const TERMINAL_STATUSES = new Set(['completed', 'failed', 'cancelled']);
const ACTIVE_STATUSES = new Set(['pending', 'running']);

export class SuiteNotFoundError extends Error {
  constructor(readonly suiteId: string) {
    super(`Suite ${suiteId} not found`);
    this.name = 'SuiteNotFoundError';
  }
}

export interface SuiteEngineOptions {
  /** Transport for every run; defaults to undici fetch */
  executor?: RequestExecutor;
  /** Storage behind the persistent layer; defaults to the catalog's pvars file */
  repository?: VariableRepository;
  scripts?: ScriptRuntime;
  maxConcurrency?: number;
  timeoutMs?: number;
  insecure?: boolean;
  fakerSeed?: number;
  quiet?: boolean;
}

/**
 * Tracks suite runs started over HTTP or WebSocket. Each run gets a fresh
 * orchestrator over the shared persistent store; the semaphore keeps runs
 * (and so persisted writes) in a total order unless configured otherwise.
 */
export class SuiteEngine extends EventEmitter {
  private catalog: CatalogService;
  private runs: Map<string, SuiteRun> = new Map();
  private controls: Map<string, AbortController> = new Map();

  private executor: RequestExecutor;
  private ownedExecutor: FetchRequestExecutor | null = null;
  private repository: VariableRepository;
  private scripts: ScriptRuntime;
  private timeoutMs: number;
  private insecure: boolean;
  private fakerSeed: number | undefined;
  private quiet: boolean;

  // Concurrency semaphore
  private maxConcurrency: number;
  private activeCount = 0;
  private queue: QueuedWaiter[] = [];

  // Cleanup interval
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(catalog: CatalogService, options: SuiteEngineOptions = {}) {
    super();
    this.catalog = catalog;
    this.maxConcurrency =
      options.maxConcurrency ?? (parseInt(process.env.COURIER_MAX_CONCURRENCY ?? '', 10) || DEFAULT_MAX_CONCURRENCY);
    this.timeoutMs = options.timeoutMs ?? (parseInt(process.env.COURIER_TIMEOUT_MS ?? '', 10) || DEFAULT_TIMEOUT_MS);
    this.insecure = options.insecure ?? process.env.COURIER_INSECURE === 'true';
    this.fakerSeed = options.fakerSeed ?? parseSeed(process.env.COURIER_FAKER_SEED);
    this.quiet = options.quiet ?? false;
    this.repository = options.repository ?? new PropertiesVariableRepository(catalog.pvarsPath);
    this.scripts = options.scripts ?? new VmScriptRuntime();

    if (options.executor) {
      this.executor = options.executor;
    } else {
      this.ownedExecutor = new FetchRequestExecutor();
      this.executor = this.ownedExecutor;
    }

    this.cleanupTimer = setInterval(() => this.cleanupRuns(), CLEANUP_INTERVAL_MS);
  }

  async destroy(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    if (this.ownedExecutor) {
      await this.ownedExecutor.close();
      this.ownedExecutor = null;
    }
  }

  // ── Concurrency semaphore ────────────────────────────────────────

  private acquireSlot(): Promise<void> {
    if (this.activeCount < this.maxConcurrency) {
      this.activeCount++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ resolve });
    });
  }

  private releaseSlot(): void {
    const next = this.queue.shift();
    if (next) {
      next.resolve();
    } else {
      this.activeCount--;
    }
  }

  // ── Cleanup ──────────────────────────────────────────────────────

  private cleanupRuns(): void {
    const now = Date.now();

    for (const [id, run] of this.runs) {
      if (TERMINAL_STATUSES.has(run.status) && run.completedAt) {
        if (now - run.completedAt > CLEANUP_TTL_MS) {
          this.runs.delete(id);
          this.controls.delete(id);
        }
      }
    }

    if (this.runs.size > CLEANUP_MAX_RUNS) {
      const terminal = [...this.runs.entries()]
        .filter(([, r]) => TERMINAL_STATUSES.has(r.status))
        .sort((a, b) => (a[1].completedAt ?? 0) - (b[1].completedAt ?? 0));

      let excess = this.runs.size - CLEANUP_MAX_RUNS;
      for (const [id] of terminal) {
        if (excess <= 0) break;
        this.runs.delete(id);
        this.controls.delete(id);
        excess--;
      }
    }
  }

  // ── Start run ────────────────────────────────────────────────────

  /**
   * Load the suite and queue it. Load and validation failures reject here,
   * before a run id exists; anything later lands on the run as `failed`.
   */
  async startRun(suiteId: string, input: RunInput = {}): Promise<string> {
    if (!this.catalog.getSuite(suiteId)) {
      throw new SuiteNotFoundError(suiteId);
    }

    const variables = input.variables ?? {};
    const configs = input.configs ?? [];
    const bundle = this.catalog.loadSuiteBundle(suiteId, { configs, knownNames: Object.keys(variables) });

    const runId = nanoid();
    const run: SuiteRun = {
      id: runId,
      suiteId,
      status: 'pending',
      startedAt: Date.now(),
      rows: [],
      summary: summarize([]),
      variables,
      configs,
    };

    this.runs.set(runId, run);
    this.controls.set(runId, new AbortController());

    this.executeRun(run, bundle).catch((err) => {
      console.error(`SuiteEngine: Run ${runId} failed:`, err);
      run.status = 'failed';
      run.error = err instanceof Error ? err.message : String(err);
      run.completedAt = Date.now();
      this.emit('run:failed', run);
    });

    return runId;
  }

  private async executeRun(run: SuiteRun, bundle: SuiteBundle): Promise<void> {
    await this.acquireSlot();

    try {
      const signal = this.controls.get(run.id)?.signal;

      // cancelled while queued
      if (signal?.aborted) {
        run.status = 'cancelled';
        run.completedAt = Date.now();
        this.emit('run:cancelled', run);
        return;
      }

      run.status = 'running';
      this.emit('run:started', run);

      const orchestrator = this.createOrchestrator();
      orchestrator.on('row:started', (row: RowContext) => {
        run.rows.push(row);
      });
      orchestrator.on('request:completed', () => {
        run.summary = summarize(run.rows);
        this.emit('run:updated', run);
      });

      const result = await orchestrator.run(bundle, { overrides: run.variables, signal });

      run.result = result;
      run.rows = result.rows;
      run.summary = result.summary;
      run.completedAt = Date.now();
      run.duration = run.completedAt - run.startedAt;

      if (bundle.suite.ReportPath) {
        this.writeReport(resolve(dirname(bundle.file), bundle.suite.ReportPath), result);
      }

      if (result.status === 'cancelled') {
        run.status = 'cancelled';
        this.emit('run:cancelled', run);
      } else {
        run.status = 'completed';
        this.emit('run:completed', run);
      }
    } finally {
      this.releaseSlot();
    }
  }

  /**
   * A report that cannot be written, or that would land outside the working
   * directory, is logged; the run result stands.
   */
  private writeReport(target: string, result: SuiteResult): void {
    try {
      const path = this.catalog.confine(target);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, JSON.stringify(result, null, 2), 'utf-8');
      if (!this.quiet) console.log(`SuiteEngine: Report written to ${path}`);
    } catch (err) {
      console.error(`SuiteEngine: Failed to write report ${target}:`, err instanceof Error ? err.message : String(err));
    }
  }

  // ── Single request ───────────────────────────────────────────────

  /** Run one request file outside any suite and wait for its record. */
  async runRequest(path: string, input: RunInput = {}): Promise<RequestExecution> {
    const request = this.catalog.loadRequest(path);
    const configs = (input.configs ?? []).map((name) => this.catalog.loadConfig(name).variables);

    await this.acquireSlot();
    try {
      return await this.createOrchestrator().runRequest(request, { overrides: input.variables, configs });
    } finally {
      this.releaseSlot();
    }
  }

  /** Resolve one request file and render it as a curl command; nothing is sent or saved. */
  generateCurl(path: string, input: RunInput = {}): string {
    const request = this.catalog.loadRequest(path);
    const configs = (input.configs ?? []).map((name) => this.catalog.loadConfig(name).variables);

    const prepared = this.createOrchestrator().prepare(request, { overrides: input.variables, configs });
    return toCurl(prepared.request, { timeoutMs: prepared.timeoutMs, insecure: prepared.insecure });
  }

  private createOrchestrator(): SuiteOrchestrator {
    const generator = new FakerGenerator({ seed: this.fakerSeed });
    return new SuiteOrchestrator({
      persistent: new PersistentVariables(this.repository),
      executor: this.executor,
      generator,
      scripts: this.scripts,
      scriptHelpers: { faker: generator.instance },
      defaultTimeoutMs: this.timeoutMs,
      insecure: this.insecure,
      quiet: this.quiet,
    });
  }

  // ── Run control ──────────────────────────────────────────────────

  /** Takes effect before the next request; the one in flight completes. */
  cancelRun(id: string): boolean {
    const run = this.runs.get(id);
    const ctrl = this.controls.get(id);
    if (!run || !ctrl) return false;
    if (!ACTIVE_STATUSES.has(run.status)) return false;

    ctrl.abort();
    return true;
  }

  // ── Queries ──────────────────────────────────────────────────────

  getRun(runId: string): SuiteRun | undefined {
    return this.runs.get(runId);
  }

  listRuns(): SuiteRun[] {
    return [...this.runs.values()];
  }
}

function parseSeed(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const seed = Number(raw);
  return Number.isInteger(seed) ? seed : undefined;
}
