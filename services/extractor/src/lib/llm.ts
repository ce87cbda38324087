/**
 * OpenAI Vision Transport
 *
 * ModelTransport backed by the OpenAI Responses API. The API key is read
 * from the environment the first time a request is sent, and the client is
 * built once and reused after that.
 */

import OpenAI from 'openai';
import type {
  Response as OpenAiResponse,
  ResponseCreateParamsNonStreaming,
  ResponseInputContent,
  ResponseInputItem,
} from 'openai/resources/responses/responses';
import {
  config,
  logger,
  decodeResponsesPayload,
  CredentialMissingError,
  UpstreamRejectedError,
  OPENAI_API_KEY_ENV,
  type ModelRequest,
  type ModelTransport,
  type PageImage,
  type ProviderResponse,
  type ResponseOutputItem,
  type ResponsesPayload,
} from '@scanfields/shared';

/** What the transport reads back from a Responses API call */
export interface ResponsesResult extends ResponsesPayload {
  id?: string;
  usage?: {
    input_tokens?: number;
    output_tokens?: number;
    total_tokens?: number;
  } | null;
}

/** The slice of the OpenAI client this transport calls */
export interface ResponsesClient {
  responses: {
    create(body: ResponseCreateParamsNonStreaming): Promise<ResponsesResult>;
  };
}

export type ResponsesClientFactory = (apiKey: string) => ResponsesClient;

export interface OpenAiTransportOptions {
  /** Overrides the environment lookup */
  apiKey?: string;
  /** Request timeout in ms; 0 keeps the SDK default */
  timeoutMs?: number;
  clientFactory?: ResponsesClientFactory;
}

/**
 * Encode a page image as a base64 data URL
 */
export function toDataUrl(image: PageImage): string {
  return `data:${image.mimeType};base64,${image.data.toString('base64')}`;
}

/**
 * Reduce an SDK response to the fields text extraction reads.
 * Only message items carry text; refusals and tool calls contribute no blocks.
 */
function toResponsesResult(response: OpenAiResponse): ResponsesResult {
  const output: ResponseOutputItem[] = response.output.map((item) => {
    if (item.type !== 'message') {
      return { type: item.type };
    }
    return {
      type: item.type,
      content: item.content.map((block) =>
        block.type === 'output_text' ? { type: block.type, text: block.text } : { type: block.type }
      ),
    };
  });

  return {
    id: response.id,
    output_text: response.output_text,
    output,
    usage: response.usage,
  };
}

export function createOpenAiClient(
  apiKey: string,
  timeoutMs: number = config.llmRequestTimeoutMs
): ResponsesClient {
  const client = new OpenAI({
    apiKey,
    ...(timeoutMs > 0 ? { timeout: timeoutMs } : {}),
  });

  return {
    responses: {
      create: async (body) => toResponsesResult(await client.responses.create(body)),
    },
  };
}

function buildInput(request: ModelRequest): ResponseInputItem[] {
  const userContent: ResponseInputContent[] = [
    { type: 'input_text', text: request.prompt },
    ...request.images.map(
      (image): ResponseInputContent => ({
        type: 'input_image',
        detail: 'auto',
        image_url: toDataUrl(image),
      })
    ),
  ];

  return [
    {
      role: 'system',
      content: [{ type: 'input_text', text: request.instructions }],
    },
    {
      role: 'user',
      content: userContent,
    },
  ];
}

/**
 * Credential and billing rejections become UpstreamRejectedError; anything
 * else is returned unchanged.
 */
export function translateOpenAiError(error: unknown): unknown {
  if (!(error instanceof OpenAI.APIError) || error.status === undefined) {
    return error;
  }

  const status = error.status;
  const quotaExhausted = status === 429 && error.code === 'insufficient_quota';

  if (status === 401 || status === 402 || status === 403 || quotaExhausted) {
    return new UpstreamRejectedError(status, error.message, error);
  }

  return error;
}

export class OpenAiTransport implements ModelTransport {
  readonly provider = 'openai';

  private client: ResponsesClient | undefined;
  private readonly clientFactory: ResponsesClientFactory;

  constructor(private readonly options: OpenAiTransportOptions = {}) {
    const timeoutMs = options.timeoutMs ?? config.llmRequestTimeoutMs;
    this.clientFactory = options.clientFactory ?? ((apiKey) => createOpenAiClient(apiKey, timeoutMs));
  }

  private getClient(): ResponsesClient {
    if (this.client) {
      return this.client;
    }

    const apiKey = this.options.apiKey || process.env[OPENAI_API_KEY_ENV];
    if (!apiKey) {
      throw new CredentialMissingError(OPENAI_API_KEY_ENV);
    }

    this.client = this.clientFactory(apiKey);
    return this.client;
  }

  async send(request: ModelRequest): Promise<ProviderResponse> {
    const client = this.getClient();

    try {
      const response = await client.responses.create({
        model: request.model,
        temperature: request.temperature,
        input: buildInput(request),
      });

      logger.debug('OpenAI response usage', {
        response_id: response.id,
        input_tokens: response.usage?.input_tokens,
        output_tokens: response.usage?.output_tokens,
        total_tokens: response.usage?.total_tokens,
      });

      return decodeResponsesPayload(response);
    } catch (error) {
      throw translateOpenAiError(error);
    }
  }
}
