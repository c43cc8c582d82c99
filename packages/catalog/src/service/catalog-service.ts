import { existsSync, readFileSync, readdirSync } from 'fs';
import { basename, dirname, extname, isAbsolute, join, relative, resolve, sep } from 'path';
import { ZodError } from 'zod';
import {
  ConfigDocumentSchema,
  RequestDocumentSchema,
  SuiteDocumentSchema,
  type ConfigLayer,
  type DataRow,
  type LoadedRequest,
  type SuiteBundle,
  type SuiteDocument,
  type SuiteSummary,
} from '../models/types.js';
import { parseCsvRows, parseYamlDocument } from '../adapters/documents.js';
import { parseProperties } from '../adapters/properties.js';
import { validateRequest, validateSuiteRequests } from '../validation/request-validator.js';

/** Directory, relative to the working directory, holding state and settings. */
export const STATE_DIR = '.courier';
export const PVARS_FILE = 'pvars.properties';
export const PCFG_FILE = 'pcfg.properties';
export const DEFAULT_CONFIGS_DIR = 'configs';
export const SUITES_DIR = 'suites';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

/** A suite, request, config or data source could not be loaded; nothing ran. */
export class SuiteLoadError extends Error {
  constructor(
    message: string,
    readonly file?: string,
  ) {
    super(message);
    this.name = 'SuiteLoadError';
  }
}

export interface BundleOptions {
  /** Extra config names, applied after the suite's own */
  configs?: string[];
  /** Names provided by the caller (overrides), used for unresolved-name warnings */
  knownNames?: Iterable<string>;
}

/**
 * In-process catalog of suites, requests and configs under a working
 * directory. Suites in `suites/` are indexed once at construction; request
 * files, configs and data sources are read when a run is prepared.
 */
export class CatalogService {
  private suites: Map<string, { file: string; suite: SuiteDocument }> = new Map();
  readonly workingDir: string;

  constructor(workingDir?: string) {
    this.workingDir = resolve(workingDir ?? process.cwd());
    this.loadSuites(join(this.workingDir, SUITES_DIR));
  }

  private loadSuites(dir: string): void {
    let files: string[];
    try {
      files = readdirSync(dir).filter((f) => YAML_EXTENSIONS.has(extname(f)));
    } catch {
      console.warn(`CatalogService: suites directory not found at ${dir}`);
      return;
    }

    for (const file of files) {
      try {
        const suite = this.readSuite(join(dir, file));
        this.suites.set(suiteId(file), { file: join(dir, file), suite });
      } catch (err) {
        console.warn(`CatalogService: failed to load ${file}:`, errorMessage(err));
      }
    }
  }

  // ── Paths ────────────────────────────────────────────────────────

  get stateDir(): string {
    return join(this.workingDir, STATE_DIR);
  }

  get pvarsPath(): string {
    return join(this.stateDir, PVARS_FILE);
  }

  get configsDir(): string {
    const pcfgPath = join(this.stateDir, PCFG_FILE);
    if (!existsSync(pcfgPath)) return join(this.workingDir, DEFAULT_CONFIGS_DIR);
    const pcfg = parseProperties(readFileSync(pcfgPath, 'utf-8'));
    return resolve(this.workingDir, pcfg.configs_dir || DEFAULT_CONFIGS_DIR);
  }

  /**
   * Return `path` resolved against the working directory, or throw
   * SuiteLoadError when it points outside it.
   */
  confine(path: string): string {
    const file = resolve(this.workingDir, path);
    if (!isWithin(this.workingDir, file)) {
      throw new SuiteLoadError(`Path outside working directory: ${file}`, file);
    }
    return file;
  }

  // ── Queries ──────────────────────────────────────────────────────

  listSuites(): SuiteSummary[] {
    return [...this.suites.entries()].map(([id, { file, suite }]) => ({
      id,
      name: suite.Name ?? id,
      file,
      requestCount: suite.Requests.length,
      hasDataSource: suite.DataSources !== undefined && suite.DataSources.length > 0,
    }));
  }

  getSuite(id: string): SuiteDocument | undefined {
    return this.suites.get(id)?.suite;
  }

  get size(): number {
    return this.suites.size;
  }

  // ── Loading ──────────────────────────────────────────────────────

  /**
   * Load everything a suite run needs. Accepts an indexed suite id or a path
   * to a suite file. Any failure raises SuiteLoadError.
   */
  loadSuiteBundle(idOrPath: string, options: BundleOptions = {}): SuiteBundle {
    const indexed = this.suites.get(idOrPath);
    const file = indexed?.file ?? this.confine(idOrPath);
    const suite = indexed?.suite ?? this.readSuite(file);
    const suiteDir = dirname(file);
    const id = indexed ? idOrPath : suiteId(file);

    const requests = suite.Requests.map((entry) =>
      this.readRequest(isAbsolute(entry) ? entry : resolve(suiteDir, entry)),
    );

    const configNames = [...(suite.Configs ?? []), ...(options.configs ?? [])];
    const configs = configNames.map((name) => this.loadConfig(name));

    const rows = this.loadDataRows(suite, suiteDir);

    const known = new Set<string>(options.knownNames ?? []);
    for (const name of Object.keys(suite.Vars ?? {})) known.add(name);
    for (const layer of configs) {
      for (const name of Object.keys(layer.variables)) known.add(name);
    }
    for (const row of rows) {
      for (const name of Object.keys(row)) known.add(name);
    }
    for (const name of this.persistedNames()) known.add(name);

    const { warnings } = validateSuiteRequests(requests, known);
    if (warnings.length > 0) {
      console.warn(`CatalogService: warnings in ${basename(file)}:`, warnings);
    }

    return { id, name: suite.Name ?? id, file, suite, requests, rows, configs };
  }

  /** Load one request file under the working directory, outside any suite. */
  loadRequest(path: string): LoadedRequest {
    const request = this.readRequest(this.confine(path));

    const { warnings } = validateRequest(request.document, basename(request.file));
    if (warnings.length > 0) {
      console.warn(`CatalogService: warnings in ${basename(request.file)}:`, warnings);
    }
    return request;
  }

  loadConfig(name: string): ConfigLayer {
    const file = join(this.configsDir, `${name}.yaml`);
    if (!existsSync(file)) {
      throw new SuiteLoadError(`Config not found: ${file}`, file);
    }
    const data = this.readYaml(file);
    return { name, variables: this.parseWith(ConfigDocumentSchema, data ?? {}, file) };
  }

  private loadDataRows(suite: SuiteDocument, suiteDir: string): DataRow[] {
    const source = Array.isArray(suite.DataSources) ? suite.DataSources[0] : suite.DataSources;
    if (!source) return [];

    const file = isAbsolute(source) ? source : resolve(suiteDir, source);
    let content: string;
    try {
      content = readFileSync(file, 'utf-8');
    } catch (err) {
      throw new SuiteLoadError(`Data source not readable: ${file} (${errorMessage(err)})`, file);
    }

    try {
      return parseCsvRows(content, file);
    } catch (err) {
      throw new SuiteLoadError(errorMessage(err), file);
    }
  }

  private persistedNames(): string[] {
    if (!existsSync(this.pvarsPath)) return [];
    return Object.keys(parseProperties(readFileSync(this.pvarsPath, 'utf-8')));
  }

  // ── Helpers ──────────────────────────────────────────────────────

  private readRequest(file: string): LoadedRequest {
    const document = this.parseWith(RequestDocumentSchema, this.readYaml(file), file);
    return { file, document };
  }

  private readSuite(file: string): SuiteDocument {
    return this.parseWith(SuiteDocumentSchema, this.readYaml(file), file);
  }

  private readYaml(file: string): unknown {
    let content: string;
    try {
      content = readFileSync(file, 'utf-8');
    } catch (err) {
      throw new SuiteLoadError(`File not readable: ${file} (${errorMessage(err)})`, file);
    }
    try {
      return parseYamlDocument(content, file);
    } catch (err) {
      throw new SuiteLoadError(errorMessage(err), file);
    }
  }

  private parseWith<T>(schema: { parse(data: unknown): T }, data: unknown, file: string): T {
    try {
      return schema.parse(data);
    } catch (err) {
      if (err instanceof ZodError) {
        const issues = err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new SuiteLoadError(`Invalid document ${file}: ${issues.join('; ')}`, file);
      }
      throw err;
    }
  }
}

function isWithin(root: string, file: string): boolean {
  const rel = relative(root, file);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

function suiteId(file: string): string {
  return basename(file, extname(file));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
