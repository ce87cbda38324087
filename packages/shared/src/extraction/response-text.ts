/**
 * Provider Response Text
 *
 * The Responses API exposes model text two ways: an aggregated
 * `output_text` convenience field, and the raw list of output items whose
 * content blocks carry text. Payloads are decoded into a tagged union first
 * so text extraction is a plain switch.
 */

/** One content block inside an output item */
export interface ResponseContentBlock {
  type: string;
  text?: string;
}

/** One output item (message, reasoning, tool call, ...) */
export interface ResponseOutputItem {
  type: string;
  content?: ResponseContentBlock[];
}

/** Subset of a Responses API payload the pipeline reads */
export interface ResponsesPayload {
  output_text?: string | null;
  output?: ResponseOutputItem[] | null;
}

export type ProviderResponse =
  | { shape: 'output_text'; text: string }
  | { shape: 'content_blocks'; blocks: ResponseContentBlock[] }
  | { shape: 'empty' };

const TEXT_BLOCK_TYPES = new Set(['output_text', 'text']);

/**
 * Classify a payload by which text source it offers.
 * A non-blank `output_text` wins over the block list.
 */
export function decodeResponsesPayload(payload: ResponsesPayload): ProviderResponse {
  if (typeof payload.output_text === 'string' && payload.output_text.trim()) {
    return { shape: 'output_text', text: payload.output_text };
  }

  if (Array.isArray(payload.output)) {
    const blocks = payload.output.flatMap((item) => item.content ?? []);
    return { shape: 'content_blocks', blocks };
  }

  return { shape: 'empty' };
}

/**
 * Raw model text from a decoded response, trimmed. Empty string when the
 * response carried no text.
 */
export function extractResponseText(response: ProviderResponse): string {
  switch (response.shape) {
    case 'output_text':
      return response.text.trim();

    case 'content_blocks':
      return response.blocks
        .filter((block) => TEXT_BLOCK_TYPES.has(block.type))
        .map((block) => block.text ?? '')
        .join('')
        .trim();

    case 'empty':
      return '';
  }
}
