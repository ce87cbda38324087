/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, OPENAI_API_KEY_ENV, type Config, type LogLevel } from './config';

// Types
export * from './types';

// Errors
export {
  ExtractionError,
  TemplateNotFoundError,
  TemplateParseError,
  ClassificationFailedError,
  DocumentOpenFailedError,
  NoRenderedPagesError,
  CredentialMissingError,
  UnsupportedModelError,
  EmptyModelResponseError,
  MalformedModelJsonError,
  UpstreamRejectedError,
  SchemaMismatchError,
  MALFORMED_SNIPPET_LENGTH,
  isExtractionError,
  toExtractionFailure,
  type ExtractionErrorKind,
} from './errors';

// Metrics
export {
  register,
  extractionsCounter,
  extractionDurationHistogram,
  renderedPagesHistogram,
  schemaMismatchCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Template conformance
export {
  deriveJsonSchema,
  validateAgainstTemplate,
  type DerivedJsonSchema,
  type ValidationResult,
} from './schemas';

// Templates
export {
  TEMPLATE_REGISTRY,
  resolveKeyword,
  getKnownKeywords,
  getDocumentTypes,
  loadTemplate,
  createTemplateLoader,
  getTemplatesDir,
  classifyFilename,
  matchTemplateEntry,
  normalizeFilename,
  type TemplateLoader,
  type ClassifyOptions,
} from './templates';

// Extraction
export {
  buildExtractionPrompt,
  EXTRACTION_SYSTEM_INSTRUCTION,
  decodeResponsesPayload,
  extractResponseText,
  stripCodeFences,
  parseModelResponse,
  ModelGateway,
  resolveModelAlias,
  ALLOWED_MODELS,
  DEFAULT_MODEL_ALIAS,
  type ProviderResponse,
  type ResponsesPayload,
  type ResponseOutputItem,
  type ResponseContentBlock,
  type ModelRequest,
  type ModelTransport,
  type ModelGatewayOptions,
} from './extraction';
