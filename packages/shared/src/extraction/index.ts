/**
 * Extraction Building Blocks
 */

export { buildExtractionPrompt, EXTRACTION_SYSTEM_INSTRUCTION } from './prompt';

export {
  decodeResponsesPayload,
  extractResponseText,
  type ProviderResponse,
  type ResponsesPayload,
  type ResponseOutputItem,
  type ResponseContentBlock,
} from './response-text';

export { stripCodeFences, parseModelResponse } from './response-parser';

export {
  ModelGateway,
  resolveModelAlias,
  ALLOWED_MODELS,
  DEFAULT_MODEL_ALIAS,
  type ModelRequest,
  type ModelTransport,
  type ModelGatewayOptions,
} from './model-gateway';
