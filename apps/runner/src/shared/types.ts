import { z } from 'zod';
import { VariableMapSchema, type VariableMap } from '@courier/catalog';
import type { RequestExecution, RowContext, SuiteResult, SuiteSummaryCounts } from '@courier/engine';

// ── Runs ─────────────────────────────────────────────────────────────

export type RunStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface SuiteRun {
  id: string;
  suiteId: string;
  status: RunStatus;
  startedAt: number;
  completedAt?: number;
  duration?: number;
  /** Rows as they execute; shared with the result once the run ends */
  rows: RowContext[];
  summary: SuiteSummaryCounts;
  result?: SuiteResult;
  error?: string;
  variables: VariableMap;
  configs: string[];
}

export type { RequestExecution, SuiteResult };

// ── Request bodies ───────────────────────────────────────────────────

export const RunInputSchema = z.object({
  variables: VariableMapSchema.optional(),
  configs: z.array(z.string().min(1)).optional(),
});

export const StartRunBodySchema = RunInputSchema.extend({
  suiteId: z.string().min(1),
});

export const RunRequestBodySchema = RunInputSchema.extend({
  path: z.string().min(1),
  /** Answer with the equivalent curl command instead of sending the request */
  generate: z.boolean().optional(),
});

export type RunInput = z.infer<typeof RunInputSchema>;
export type StartRunBody = z.infer<typeof StartRunBodySchema>;
export type RunRequestBody = z.infer<typeof RunRequestBodySchema>;

// ── WebSocket protocol ───────────────────────────────────────────────

export const RunnerCommandSchema = z.object({
  type: z.string(),
  payload: z
    .object({
      suiteId: z.string().optional(),
      runId: z.string().optional(),
      variables: VariableMapSchema.optional(),
      configs: z.array(z.string()).optional(),
    })
    .default({}),
  timestamp: z.number().optional(),
});

export type RunnerCommand = z.infer<typeof RunnerCommandSchema>;

export type RunnerEventType =
  | 'RUN_STARTED'
  | 'RUN_UPDATED'
  | 'RUN_COMPLETED'
  | 'RUN_FAILED'
  | 'RUN_CANCELLED'
  | 'STATUS_UPDATE'
  | 'SUITES_LIST';

export interface RunnerEvent {
  type: RunnerEventType;
  payload: unknown;
  timestamp: number;
}
