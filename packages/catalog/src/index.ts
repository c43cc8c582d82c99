// Models
export {
  VariableValueSchema,
  VariableMapSchema,
  RequestOptionsSchema,
  RequestDocumentSchema,
  SuiteDocumentSchema,
  ConfigDocumentSchema,
  BODY_KEYS,
  type VariableValue,
  type VariableMap,
  type RequestOptions,
  type RequestDocument,
  type SuiteDocument,
  type ConfigDocument,
  type BodyKey,
  type LoadedRequest,
  type ConfigLayer,
  type DataRow,
  type SuiteBundle,
  type SuiteSummary,
} from './models/types.js';

// Syntax
export {
  scanPlaceholders,
  hasPlaceholder,
  isWholePlaceholder,
  isGeneratorCall,
  referencedNames,
  PlaceholderSyntaxError,
  type PlaceholderSpan,
} from './syntax/placeholders.js';

export {
  parseSourceExpression,
  parseAssertExpression,
  stripQuotes,
  ASSERT_OPERATORS,
  ExpressionSyntaxError,
  type SourceExpression,
  type AssertExpression,
  type AssertOperator,
} from './syntax/expressions.js';

// Adapters
export {
  parseYamlDocument,
  parseCsvRows,
  parseProperties,
  formatProperties,
  DocumentParseError,
} from './adapters/index.js';

// Validation
export {
  validateRequest,
  validateSuiteRequests,
  type ValidationResult,
} from './validation/request-validator.js';

// Service
export {
  CatalogService,
  SuiteLoadError,
  STATE_DIR,
  PVARS_FILE,
  PCFG_FILE,
  DEFAULT_CONFIGS_DIR,
  SUITES_DIR,
  type BundleOptions,
} from './service/catalog-service.js';
