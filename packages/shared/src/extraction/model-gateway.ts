/**
 * Model Gateway
 *
 * Validates the requested model alias, sends prompt + page images to the
 * vision model through a ModelTransport, and returns the raw text answer.
 * JSON interpretation is left to the response parser.
 */

import { config } from '../config';
import { UnsupportedModelError } from '../errors';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import type { PageImage } from '../types';
import { EXTRACTION_SYSTEM_INSTRUCTION } from './prompt';
import { extractResponseText, type ProviderResponse } from './response-text';

/** Sentinel alias resolved to the configured default model */
export const DEFAULT_MODEL_ALIAS = 'default';

export const ALLOWED_MODELS: readonly string[] = Object.freeze([
  DEFAULT_MODEL_ALIAS,
  'gpt-4.1-mini',
  'gpt-4.1',
  'gpt-4o-mini',
  'gpt-4o',
  // Legacy/dated aliases kept for compatibility.
  'gpt-4.1-2025-04-14',
  'gpt-4.1-mini-2025-04-14',
  'gpt-5-2025-08-07',
  'gpt-5-mini-2025-08-07',
]);

/** A single extraction call as handed to the transport */
export interface ModelRequest {
  model: string;
  temperature: 0;
  instructions: string;
  prompt: string;
  /** Page images in page order */
  images: PageImage[];
}

/**
 * Wire-level access to the model service. Implementations own credentials
 * and the client handle; one instance may serve concurrent requests.
 */
export interface ModelTransport {
  readonly provider: string;
  send(request: ModelRequest): Promise<ProviderResponse>;
}

export interface ModelGatewayOptions {
  defaultModel?: string;
  allowedModels?: readonly string[];
}

/**
 * Map an alias to a concrete model name, replacing 'default' first.
 *
 * @throws UnsupportedModelError when the resolved name is not allowed
 */
export function resolveModelAlias(
  alias: string,
  defaultModel: string = config.defaultModel,
  allowedModels: readonly string[] = ALLOWED_MODELS
): string {
  const resolved = alias === DEFAULT_MODEL_ALIAS ? defaultModel : alias;

  if (!allowedModels.includes(resolved)) {
    throw new UnsupportedModelError(alias, allowedModels);
  }

  return resolved;
}

export class ModelGateway {
  private readonly defaultModel: string;
  private readonly allowedModels: readonly string[];

  constructor(
    private readonly transport: ModelTransport,
    options: ModelGatewayOptions = {}
  ) {
    this.defaultModel = options.defaultModel ?? config.defaultModel;
    this.allowedModels = options.allowedModels ?? ALLOWED_MODELS;
  }

  /** Models accepted by invoke(), including the 'default' sentinel */
  getAllowedModels(): readonly string[] {
    return this.allowedModels;
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }

  resolveModel(alias: string): string {
    return resolveModelAlias(alias, this.defaultModel, this.allowedModels);
  }

  /**
   * Send one extraction request and return the model's text output.
   * Never retries; transport failures propagate as thrown.
   */
  async invoke(prompt: string, images: PageImage[], modelAlias: string): Promise<string> {
    const model = this.resolveModel(modelAlias);

    logger.info('Invoking vision model', {
      provider: this.transport.provider,
      model,
      image_count: images.length,
      prompt_length: prompt.length,
    });

    const startTime = Date.now();

    try {
      const response = await this.transport.send({
        model,
        temperature: 0,
        instructions: EXTRACTION_SYSTEM_INSTRUCTION,
        prompt,
        images,
      });

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model }, duration);
      llmRequestsCounter.inc({ model, status: 'success' });

      const text = extractResponseText(response);

      logger.info('Vision model response received', {
        model,
        response_shape: response.shape,
        text_length: text.length,
        duration_seconds: duration,
      });

      return text;
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model }, duration);
      llmRequestsCounter.inc({ model, status: 'error' });

      logger.error('Vision model request failed', error, { model });

      throw error;
    }
  }
}
