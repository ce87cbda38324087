/**
 * Extraction Pipeline
 *
 * filename -> template -> page images -> prompt -> model text -> JSON.
 * Each run executes in its own correlation context. Failures at any stage
 * propagate once, unmodified; nothing is retried.
 */

import {
  config,
  logger,
  getCorrelationId,
  runWithContextAsync,
  classifyFilename,
  buildExtractionPrompt,
  parseModelResponse,
  validateAgainstTemplate,
  toExtractionFailure,
  ModelGateway,
  NoRenderedPagesError,
  SchemaMismatchError,
  extractionsCounter,
  extractionDurationHistogram,
  schemaMismatchCounter,
  type ClassifyOptions,
  type ExtractionOutcome,
  type ExtractionOutput,
  type ExtractionRequest,
  type SchemaConformanceMode,
  type TemplateSelection,
} from '@scanfields/shared';
import { OpenAiTransport } from './llm';
import { rasterizePdf, type Rasterizer } from './pdf';

export type Classifier = (filename: string, options?: ClassifyOptions) => Promise<TemplateSelection>;

export interface PipelineDependencies {
  gateway: ModelGateway;
  rasterize?: Rasterizer;
  classify?: Classifier;
  schemaConformance?: SchemaConformanceMode;
  defaultMaxPages?: number;
}

export interface ModelsDescription {
  default: string;
  models: readonly string[];
}

export class ExtractionPipeline {
  private readonly gateway: ModelGateway;
  private readonly rasterize: Rasterizer;
  private readonly classify: Classifier;
  private readonly schemaConformance: SchemaConformanceMode;
  private readonly defaultMaxPages: number;

  constructor(deps: PipelineDependencies) {
    this.gateway = deps.gateway;
    this.rasterize = deps.rasterize ?? rasterizePdf;
    this.classify = deps.classify ?? classifyFilename;
    this.schemaConformance = deps.schemaConformance ?? config.schemaConformance;
    this.defaultMaxPages = deps.defaultMaxPages ?? config.defaultMaxPages;
  }

  describeModels(): ModelsDescription {
    return {
      default: this.gateway.getDefaultModel(),
      models: this.gateway.getAllowedModels(),
    };
  }

  /**
   * Run the full pipeline and return the parsed model output.
   *
   * @throws ExtractionError subclasses for every known failure; transport
   *   errors the gateway does not recognise propagate as thrown
   */
  async extract(request: ExtractionRequest): Promise<ExtractionOutput> {
    const model = request.model ?? this.gateway.getDefaultModel();

    return runWithContextAsync(
      { correlationId: getCorrelationId(), filename: request.filename, model },
      () => this.run(request, model)
    );
  }

  /**
   * Like extract(), but failures come back as `{ ok: false, error }`.
   */
  async tryExtract(request: ExtractionRequest): Promise<ExtractionOutcome> {
    try {
      return { ok: true, data: await this.extract(request) };
    } catch (error) {
      return { ok: false, error: toExtractionFailure(error) };
    }
  }

  private async run(request: ExtractionRequest, model: string): Promise<ExtractionOutput> {
    const startTime = Date.now();
    let documentType = 'unknown';

    logger.info('Extraction started', {
      byte_length: request.pdfBytes.length,
      max_pages: request.maxPages ?? this.defaultMaxPages,
    });

    try {
      const selection = await this.classify(request.filename);
      documentType = selection.documentType;

      const images = await this.rasterize(request.pdfBytes, request.maxPages ?? this.defaultMaxPages);
      if (images.length === 0) {
        throw new NoRenderedPagesError();
      }

      const prompt = buildExtractionPrompt(selection.documentType, selection.schema);
      const rawText = await this.gateway.invoke(prompt, images, model);
      const result = parseModelResponse(rawText);

      this.checkConformance(selection, result);

      const duration = (Date.now() - startTime) / 1000;
      extractionsCounter.inc({ document_type: documentType, status: 'success' });
      extractionDurationHistogram.observe({ status: 'success' }, duration);

      logger.info('Extraction complete', {
        document_type: documentType,
        page_count: images.length,
        duration_seconds: duration,
      });

      return result;
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      extractionsCounter.inc({ document_type: documentType, status: 'error' });
      extractionDurationHistogram.observe({ status: 'error' }, duration);

      logger.error('Extraction failed', error, {
        document_type: documentType,
        error_kind: toExtractionFailure(error).kind,
      });

      throw error;
    }
  }

  private checkConformance(selection: TemplateSelection, result: ExtractionOutput): void {
    if (this.schemaConformance === 'off') {
      return;
    }

    const validation = validateAgainstTemplate(selection.schema, result);
    if (validation.valid) {
      return;
    }

    const issues = validation.errors ?? [];
    schemaMismatchCounter.inc({ document_type: selection.documentType });

    if (this.schemaConformance === 'enforce') {
      throw new SchemaMismatchError(selection.documentType, issues);
    }

    logger.warn('Model output does not match template', {
      document_type: selection.documentType,
      issues,
    });
  }
}

/**
 * Pipeline wired to the OpenAI transport and the configured defaults
 */
export function createDefaultPipeline(): ExtractionPipeline {
  const gateway = new ModelGateway(new OpenAiTransport(), {
    defaultModel: config.defaultModel,
  });
  return new ExtractionPipeline({ gateway });
}

let defaultPipeline: ExtractionPipeline | undefined;

export function getDefaultPipeline(): ExtractionPipeline {
  if (!defaultPipeline) {
    defaultPipeline = createDefaultPipeline();
  }
  return defaultPipeline;
}

export interface ExtractOptions {
  maxPages?: number;
  model?: string;
}

/**
 * Extract structured fields from a PDF using the default pipeline.
 */
export async function extract(
  pdfBytes: Uint8Array,
  filename: string,
  options: ExtractOptions = {}
): Promise<ExtractionOutput> {
  return getDefaultPipeline().extract({ pdfBytes, filename, ...options });
}
