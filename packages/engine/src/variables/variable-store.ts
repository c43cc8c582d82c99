import type { VariableMap, VariableValue } from '@courier/catalog';
import type { PersistentVariables } from './persistent-variables.js';

// ── Layers ───────────────────────────────────────────────────────────

export type LayerName = 'override' | 'row' | 'suite' | 'config' | 'persistent' | 'define';

/** Config layers are read-only once loaded. */
export type WritableLayer = Exclude<LayerName, 'config'>;

/** Highest precedence first. */
export const DEFAULT_PRECEDENCE: readonly LayerName[] = [
  'override',
  'row',
  'suite',
  'config',
  'persistent',
  'define',
];

const ALL_LAYERS = new Set<LayerName>(DEFAULT_PRECEDENCE);

export type VariableLookup =
  | { found: true; value: VariableValue; layer: LayerName }
  | { found: false };

export interface VariableStoreInit {
  overrides?: VariableMap;
  row?: VariableMap;
  suite?: VariableMap;
  /** In declaration order; later configs win over earlier ones */
  configs?: VariableMap[];
  persistent: PersistentVariables;
  define?: VariableMap;
  precedence?: readonly LayerName[];
}

interface LayerReader {
  has(name: string): boolean;
  get(name: string): VariableValue | undefined;
  entries(): Iterable<[string, VariableValue]>;
}

interface LayerState {
  override: Map<string, VariableValue>;
  row: Map<string, VariableValue>;
  suite: Map<string, VariableValue>;
  configs: ReadonlyArray<ReadonlyMap<string, VariableValue>>;
  persistent: PersistentVariables;
  define: Map<string, VariableValue>;
}

/**
 * Layered variable scope. `resolve` reads layers in precedence order and
 * never writes; `set` is the only mutator and touches exactly one layer.
 *
 * `fork` shares every layer by reference except the ones it replaces, which
 * is how a row or a request gets its own transient layer while captures keep
 * landing in the one persistent layer.
 */
export class VariableStore {
  private layers: LayerState;
  readonly precedence: readonly LayerName[];

  constructor(init: VariableStoreInit) {
    this.precedence = validatePrecedence(init.precedence ?? DEFAULT_PRECEDENCE);
    this.layers = {
      override: toMap(init.overrides),
      row: toMap(init.row),
      suite: toMap(init.suite),
      configs: (init.configs ?? []).map((config) => toMap(config)),
      persistent: init.persistent,
      define: toMap(init.define),
    };
  }

  /** New store with a fresh row and/or define layer; every other layer is shared. */
  fork(replace: { row?: VariableMap; define?: VariableMap }): VariableStore {
    const forked = new VariableStore({ persistent: this.layers.persistent, precedence: this.precedence });
    forked.layers = {
      ...this.layers,
      row: replace.row !== undefined ? toMap(replace.row) : this.layers.row,
      define: replace.define !== undefined ? toMap(replace.define) : this.layers.define,
    };
    return forked;
  }

  resolve(name: string): VariableLookup {
    for (const layer of this.precedence) {
      if (layer === 'config') {
        for (let i = this.layers.configs.length - 1; i >= 0; i--) {
          const config = this.layers.configs[i];
          if (config.has(name)) return found(config.get(name), layer);
        }
        continue;
      }

      const source = this.readable(layer);
      if (source.has(name)) return found(source.get(name), layer);
    }
    return { found: false };
  }

  get(name: string): VariableValue | undefined {
    const lookup = this.resolve(name);
    return lookup.found ? lookup.value : undefined;
  }

  has(name: string): boolean {
    return this.resolve(name).found;
  }

  set(name: string, value: VariableValue, layer: WritableLayer = 'persistent'): void {
    if (layer === 'persistent') {
      this.layers.persistent.set(name, value);
      return;
    }
    this.layers[layer].set(name, value);
  }

  /** Every visible name mapped to its highest-precedence value. */
  snapshot(): Record<string, VariableValue> {
    const flat = new Map<string, VariableValue>();
    for (const layer of [...this.precedence].reverse()) {
      if (layer === 'config') {
        for (const config of this.layers.configs) {
          for (const [name, value] of config) flat.set(name, value);
        }
        continue;
      }
      for (const [name, value] of this.readable(layer).entries()) flat.set(name, value);
    }
    return Object.fromEntries(flat);
  }

  get persistent(): PersistentVariables {
    return this.layers.persistent;
  }

  private readable(layer: WritableLayer): LayerReader {
    return layer === 'persistent' ? this.layers.persistent : this.layers[layer];
  }
}

function toMap(values: VariableMap | undefined): Map<string, VariableValue> {
  return new Map(Object.entries(values ?? {}));
}

function found(value: VariableValue | undefined, layer: LayerName): VariableLookup {
  // has() was checked first; undefined never enters a layer
  return { found: true, value: value ?? null, layer };
}

function validatePrecedence(order: readonly LayerName[]): readonly LayerName[] {
  const seen = new Set(order);
  if (seen.size !== order.length || seen.size !== ALL_LAYERS.size) {
    throw new Error(
      `Invalid variable precedence [${order.join(', ')}]: every layer of ${[...ALL_LAYERS].join(', ')} must appear exactly once`,
    );
  }
  return [...order];
}
