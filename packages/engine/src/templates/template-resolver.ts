import {
  hasPlaceholder,
  isGeneratorCall,
  isWholePlaceholder,
  scanPlaceholders,
  PlaceholderSyntaxError,
  type PlaceholderSpan,
  type VariableValue,
} from '@courier/catalog';
import type { VariableStore } from '../variables/variable-store.js';
import { parseGeneratorCall, type FakeDataGenerator } from './fake-data.js';
import {
  CyclicVariableError,
  GeneratorError,
  ResolutionError,
  UnresolvedVariableError,
} from '../errors.js';

export const DEFAULT_MAX_DEPTH = 10;

export interface TemplateResolverOptions {
  /** Longest chain of variables referencing variables */
  maxDepth?: number;
}

/**
 * Rewrites `${...}` placeholders in strings and nested structures.
 *
 * A string that is exactly one placeholder takes the resolved value as-is,
 * keeping numbers, booleans and structured values intact. Anywhere else the
 * value is substituted as text. Values that contain placeholders themselves
 * are resolved recursively, up to `maxDepth` variables deep.
 */
export class TemplateResolver {
  private readonly maxDepth: number;

  constructor(
    private readonly store: VariableStore,
    private readonly generator: FakeDataGenerator,
    options: TemplateResolverOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /** Resolve every placeholder in `value`; the result has the same shape. */
  resolve(value: VariableValue, path = ''): VariableValue {
    return this.resolveValue(value, path, []);
  }

  /** Resolve a string that must stay a string. */
  resolveText(input: string, path = ''): string {
    return stringify(this.resolveString(input, path, []));
  }

  private resolveValue(value: VariableValue, path: string, chain: string[]): VariableValue {
    if (typeof value === 'string') return this.resolveString(value, path, chain);

    if (Array.isArray(value)) {
      return value.map((item, index) => this.resolveValue(item, `${path}[${index}]`, chain));
    }

    if (value !== null && typeof value === 'object') {
      const out: Record<string, VariableValue> = {};
      for (const [key, item] of Object.entries(value)) {
        const childPath = path ? `${path}.${key}` : key;
        const resolvedKey = hasPlaceholder(key) ? stringify(this.resolveString(key, childPath, chain)) : key;
        out[resolvedKey] = this.resolveValue(item, childPath, chain);
      }
      return out;
    }

    return value;
  }

  private resolveString(input: string, path: string, chain: string[]): VariableValue {
    if (!hasPlaceholder(input)) return input;

    let spans: PlaceholderSpan[];
    try {
      spans = scanPlaceholders(input);
    } catch (err) {
      if (err instanceof PlaceholderSyntaxError) throw new ResolutionError(err.message, path);
      throw err;
    }

    // a lone placeholder keeps the type of its value
    if (isWholePlaceholder(input)) {
      return this.resolveContent(spans[0].content, path, chain);
    }

    let out = '';
    let cursor = 0;
    for (const span of spans) {
      out += input.slice(cursor, span.start);
      out += stringify(this.resolveContent(span.content, path, chain));
      cursor = span.end;
    }
    return out + input.slice(cursor);
  }

  private resolveContent(content: string, path: string, chain: string[]): VariableValue {
    let inner = content.trim();

    // nested reference: the name itself is built from placeholders
    if (hasPlaceholder(inner)) {
      inner = stringify(this.resolveString(inner, path, chain)).trim();
    }

    if (isGeneratorCall(inner)) return this.invokeGenerator(inner, path);

    if (chain.includes(inner)) {
      throw new CyclicVariableError([...chain, inner], path, 'cycle');
    }
    if (chain.length >= this.maxDepth) {
      throw new CyclicVariableError([...chain, inner], path, 'depth');
    }

    const lookup = this.store.resolve(inner);
    if (!lookup.found) throw new UnresolvedVariableError(inner, path);

    return this.resolveValue(lookup.value, path, [...chain, inner]);
  }

  private invokeGenerator(call: string, path: string): VariableValue {
    const parsed = parseGeneratorCall(call);
    if (!parsed) throw new GeneratorError(call, 'malformed call', path);

    try {
      return this.generator.invoke(parsed.method, parsed.args);
    } catch (err) {
      throw new GeneratorError(call, err instanceof Error ? err.message : String(err), path);
    }
  }
}

/** Text form of a value when it is embedded in a larger string. */
export function stringify(value: VariableValue): string {
  if (typeof value === 'string') return value;
  if (value === null) return 'null';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
