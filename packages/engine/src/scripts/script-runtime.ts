import vm from 'node:vm';
import type { VariableValue } from '@courier/catalog';
import { toVariableValue } from '../assertions/values.js';

export interface VariableMutation {
  name: string;
  value: VariableValue;
}

export interface ScriptContext {
  /** Read-only view of every visible variable when the script starts */
  variables: Record<string, VariableValue>;
  /** Extra globals such as `request`, `response` or `faker` */
  helpers?: Record<string, unknown>;
  /** Used in stack traces, e.g. `users/create.yaml#PreExec` */
  filename?: string;
}

export interface ScriptResult {
  /** `set_var` calls in call order */
  mutations: VariableMutation[];
}

/**
 * Runs PreExec/PostExec scripts. A runtime never touches the variable store:
 * it receives a snapshot and hands back the writes the script asked for.
 * Throws when the script fails, in which case no mutation applies.
 */
export interface ScriptRuntime {
  run(source: string, context: ScriptContext): ScriptResult;
}

export interface VmScriptRuntimeOptions {
  /** Wall-clock limit for one script */
  timeoutMs?: number;
}

const DEFAULT_SCRIPT_TIMEOUT_MS = 1_000;

/**
 * JavaScript scripts evaluated in a fresh `node:vm` context exposing
 * `get_var`, `set_var`, `console` and the supplied helpers.
 */
export class VmScriptRuntime implements ScriptRuntime {
  private readonly timeoutMs: number;

  constructor(options: VmScriptRuntimeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS;
  }

  run(source: string, context: ScriptContext): ScriptResult {
    if (source.trim() === '') return { mutations: [] };

    const snapshot = structuredClone(context.variables);
    const pending = new Map<string, VariableValue>();
    const mutations: VariableMutation[] = [];

    const sandbox: Record<string, unknown> = {
      ...context.helpers,
      get_var: (name: unknown): VariableValue => {
        const key = String(name);
        if (pending.has(key)) return pending.get(key) ?? null;
        return Object.hasOwn(snapshot, key) ? snapshot[key] : null;
      },
      set_var: (name: unknown, value: unknown): void => {
        const key = String(name);
        const converted = toVariableValue(value);
        pending.set(key, converted);
        mutations.push({ name: key, value: converted });
      },
      console: {
        log: (...args: unknown[]) => console.log('[script]', ...args),
        warn: (...args: unknown[]) => console.warn('[script]', ...args),
        error: (...args: unknown[]) => console.error('[script]', ...args),
      },
    };

    try {
      vm.runInNewContext(source, sandbox, {
        filename: context.filename ?? 'script.js',
        timeout: this.timeoutMs,
      });
    } catch (err) {
      throw new Error(scriptErrorMessage(err));
    }

    return { mutations };
  }
}

// Errors raised inside the context come from another realm and fail
// `instanceof Error`, so the message is read structurally.
function scriptErrorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    const name = 'name' in err && typeof err.name === 'string' ? err.name : 'Error';
    return `${name}: ${err.message}`;
  }
  return String(err);
}
