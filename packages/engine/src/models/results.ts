import type { AssertOperator, DataRow, VariableValue } from '@courier/catalog';

// ── HTTP exchange ───────────────────────────────────────────────────

export type BodyType = 'json' | 'form' | 'text' | 'multipart' | 'raw';

export interface ResolvedRequest {
  method: string;
  /** Final URL including query parameters */
  url: string;
  headers: Record<string, string>;
  body?: VariableValue;
  bodyType?: BodyType;
}

export interface HttpExchange {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  /** Raw response text */
  body: string;
  elapsedMs: number;
}

// ── Per-request records ─────────────────────────────────────────────

export interface AssertionRecord {
  passed: boolean;
  actual: VariableValue;
  expected: VariableValue;
  /** null for presence-only checks */
  operator: AssertOperator | null;
  /** Why a comparison could not be made */
  reason?: string;
}

export type RequestStatus = 'complete' | 'error';

export interface RequestExecution {
  status: RequestStatus;
  /** Source request file */
  file: string;
  request?: ResolvedRequest;
  response?: HttpExchange;
  error?: string;
  /** Error class name, e.g. UnresolvedVariableError or TransportError */
  errorType?: string;
  /** Keyed by assertion label; auto-generated status check is `Status` */
  assertions: Record<string, AssertionRecord>;
  captures: Record<string, VariableValue>;
  startedAt: number;
  completedAt: number;
}

// ── Suite trace ─────────────────────────────────────────────────────

export interface RowContext {
  /** 1-based */
  index: number;
  variables: DataRow;
  requests: RequestExecution[];
}

export interface SuiteSummaryCounts {
  rows: number;
  requests: number;
  completedRequests: number;
  erroredRequests: number;
  assertions: number;
  passedAssertions: number;
  failedAssertions: number;
}

export type SuiteStatus = 'completed' | 'cancelled';

export interface SuiteResult {
  name: string;
  status: SuiteStatus;
  rows: RowContext[];
  summary: SuiteSummaryCounts;
  startedAt: number;
  completedAt: number;
}

export function summarize(rows: RowContext[]): SuiteSummaryCounts {
  const summary: SuiteSummaryCounts = {
    rows: rows.length,
    requests: 0,
    completedRequests: 0,
    erroredRequests: 0,
    assertions: 0,
    passedAssertions: 0,
    failedAssertions: 0,
  };

  for (const row of rows) {
    for (const execution of row.requests) {
      summary.requests++;
      if (execution.status === 'complete') summary.completedRequests++;
      else summary.erroredRequests++;

      for (const assertion of Object.values(execution.assertions)) {
        summary.assertions++;
        if (assertion.passed) summary.passedAssertions++;
        else summary.failedAssertions++;
      }
    }
  }

  return summary;
}
