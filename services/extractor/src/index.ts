/**
 * Extractor Service - Main Export
 */

export {
  ExtractionPipeline,
  createDefaultPipeline,
  getDefaultPipeline,
  extract,
  type Classifier,
  type PipelineDependencies,
  type ModelsDescription,
  type ExtractOptions,
} from './lib/pipeline';

export {
  rasterizePdf,
  selectRenderProfile,
  getEffectivePageCount,
  RENDER_PROFILES,
  type Rasterizer,
} from './lib/pdf';

export {
  OpenAiTransport,
  createOpenAiClient,
  translateOpenAiError,
  toDataUrl,
  type ResponsesClient,
  type ResponsesClientFactory,
  type ResponsesResult,
  type OpenAiTransportOptions,
} from './lib/llm';

export { runExtractionCli, PATH_PROMPT, type CliIo } from './cli';
