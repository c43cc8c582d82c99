// Errors
export {
  ResolutionError,
  UnresolvedVariableError,
  CyclicVariableError,
  GeneratorError,
  TransportError,
  ScriptError,
} from './errors.js';

// Variables
export {
  VariableStore,
  DEFAULT_PRECEDENCE,
  type LayerName,
  type WritableLayer,
  type VariableLookup,
  type VariableStoreInit,
} from './variables/variable-store.js';
export { PersistentVariables } from './variables/persistent-variables.js';
export {
  PropertiesVariableRepository,
  InMemoryVariableRepository,
  type VariableRepository,
} from './variables/repositories.js';

// Templates
export {
  TemplateResolver,
  DEFAULT_MAX_DEPTH,
  stringify,
  type TemplateResolverOptions,
} from './templates/template-resolver.js';
export {
  FakerGenerator,
  parseGeneratorCall,
  type FakeDataGenerator,
  type FakerGeneratorOptions,
  type GeneratorArg,
  type GeneratedValue,
  type GeneratorCall,
} from './templates/fake-data.js';

// Extraction and assertions
export {
  ExtractAssertEngine,
  STATUS_ASSERTION,
  USER_STATUS_ASSERTION,
  type Extraction,
} from './assertions/extract-assert.js';
export { compare, valuesEqual, toVariableValue, parseJsonBody, type Comparison } from './assertions/values.js';

// Collaborators
export {
  FetchRequestExecutor,
  encodeBody,
  type RequestExecutor,
  type ExecuteOptions,
  type FetchLike,
  type FetchInit,
  type FetchResponse,
} from './http/executor.js';
export { toCurl, type CurlOptions } from './http/curl.js';
export {
  VmScriptRuntime,
  type ScriptRuntime,
  type ScriptContext,
  type ScriptResult,
  type VariableMutation,
  type VmScriptRuntimeOptions,
} from './scripts/script-runtime.js';

// Orchestration
export {
  SuiteOrchestrator,
  prepareRequest,
  DEFAULT_TIMEOUT_MS,
  type SuiteOrchestratorDeps,
  type RunOptions,
  type SingleRequestOptions,
  type PreparedRequest,
} from './orchestrator/suite-orchestrator.js';

// Results
export {
  summarize,
  type BodyType,
  type ResolvedRequest,
  type HttpExchange,
  type AssertionRecord,
  type RequestStatus,
  type RequestExecution,
  type RowContext,
  type SuiteSummaryCounts,
  type SuiteStatus,
  type SuiteResult,
} from './models/results.js';
