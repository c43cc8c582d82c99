import { z } from 'zod';

// ── Variable values ─────────────────────────────────────────────────

/**
 * Every value that flows through variable layers and templates.
 * The JS type of the value is its tag: strings, numbers and booleans keep
 * their kind when a field is exactly one placeholder.
 */
export type VariableValue =
  | string
  | number
  | boolean
  | null
  | VariableValue[]
  | { [key: string]: VariableValue };

export const VariableValueSchema: z.ZodType<VariableValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(VariableValueSchema),
    z.record(VariableValueSchema),
  ]),
);

export const VariableMapSchema = z.record(VariableValueSchema);

export type VariableMap = z.infer<typeof VariableMapSchema>;

// Numeric and boolean fields may hold a placeholder until resolution.
const NumberOrTemplate = z.union([z.number(), z.string()]);
const BooleanOrTemplate = z.union([z.boolean(), z.string()]);

// ── Request options ─────────────────────────────────────────────────

export const RequestOptionsSchema = z.object({
  /** Seconds */
  timeout: NumberOrTemplate.optional(),
  insecure: BooleanOrTemplate.optional(),
});

export type RequestOptions = z.infer<typeof RequestOptionsSchema>;

// ── Request document ────────────────────────────────────────────────

export const BODY_KEYS = ['Body', 'JsonBody', 'FormBody', 'TextBody', 'MultipartBody'] as const;

export type BodyKey = (typeof BODY_KEYS)[number];

export const RequestDocumentSchema = z
  .object({
    Method: z.string().min(1),
    Endpoint: z.string().min(1),

    // request-local defaults, lowest precedence
    Define: VariableMapSchema.optional(),

    QueryParams: VariableMapSchema.optional(),
    Headers: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),

    // body, at most one
    Body: VariableValueSchema.optional(),
    JsonBody: VariableValueSchema.optional(),
    FormBody: VariableMapSchema.optional(),
    TextBody: z.string().optional(),
    MultipartBody: VariableMapSchema.optional(),

    // response handling
    Status: z.union([z.number().int(), z.string()]).optional(),
    Captures: z.record(z.string()).optional(),
    Asserts: z.record(z.string()).optional(),

    Options: RequestOptionsSchema.optional(),

    // scripts
    PreExec: z.string().optional(),
    PostExec: z.string().optional(),
  })
  .superRefine((doc, ctx) => {
    const bodies = BODY_KEYS.filter((key) => doc[key] !== undefined);
    if (bodies.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Only one body section is allowed, found: ${bodies.join(', ')}`,
      });
    }
  });

export type RequestDocument = z.infer<typeof RequestDocumentSchema>;

// ── Suite document ──────────────────────────────────────────────────

export const SuiteDocumentSchema = z.object({
  Name: z.string().optional(),
  Configs: z.array(z.string()).optional(),
  Vars: VariableMapSchema.optional(),
  Options: RequestOptionsSchema.optional(),
  Requests: z.array(z.string()).min(1),
  DataSources: z
    .union([
      z.string(),
      z.array(z.string()).max(1, 'Only a single CSV data source is supported'),
    ])
    .optional(),
  ReportPath: z.string().optional(),
});

export type SuiteDocument = z.infer<typeof SuiteDocumentSchema>;

// ── Config document ─────────────────────────────────────────────────

export const ConfigDocumentSchema = VariableMapSchema;

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;

// ── Loaded bundles ──────────────────────────────────────────────────

export interface LoadedRequest {
  /** Absolute path of the request file */
  file: string;
  document: RequestDocument;
}

export interface ConfigLayer {
  name: string;
  variables: VariableMap;
}

export type DataRow = Record<string, string>;

export interface SuiteBundle {
  id: string;
  name: string;
  file: string;
  suite: SuiteDocument;
  requests: LoadedRequest[];
  /** Empty when the suite declares no data source */
  rows: DataRow[];
  configs: ConfigLayer[];
}

export interface SuiteSummary {
  id: string;
  name: string;
  file: string;
  requestCount: number;
  hasDataSource: boolean;
}
