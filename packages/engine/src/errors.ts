// ── Resolution errors: fatal to the request being prepared ──────────

export class ResolutionError extends Error {
  constructor(
    message: string,
    /** Field path where resolution failed, e.g. `Headers.Authorization` */
    readonly path: string,
  ) {
    super(path ? `${message} (at ${path})` : message);
    this.name = 'ResolutionError';
  }
}

export class UnresolvedVariableError extends ResolutionError {
  constructor(
    readonly placeholder: string,
    path: string,
  ) {
    super(`Unresolved variable "\${${placeholder}}"`, path);
    this.name = 'UnresolvedVariableError';
  }
}

export class CyclicVariableError extends ResolutionError {
  constructor(
    /** Names in the active resolution chain, outermost first */
    readonly chain: string[],
    path: string,
    reason: 'cycle' | 'depth',
  ) {
    super(
      reason === 'cycle'
        ? `Cyclic variable reference: ${chain.join(' -> ')}`
        : `Variable nesting exceeds maximum depth: ${chain.join(' -> ')}`,
      path,
    );
    this.name = 'CyclicVariableError';
  }
}

export class GeneratorError extends ResolutionError {
  constructor(
    readonly call: string,
    detail: string,
    path: string,
  ) {
    super(`Fake-data call "\${${call}}" failed: ${detail}`, path);
    this.name = 'GeneratorError';
  }
}

// ── Execution errors ────────────────────────────────────────────────

/** Connection failure, timeout or any other failure before a response arrived. */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly timedOut = false,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class ScriptError extends Error {
  constructor(
    readonly phase: 'PreExec' | 'PostExec',
    detail: string,
  ) {
    super(`Error executing ${phase}: ${detail}`);
    this.name = 'ScriptError';
  }
}
