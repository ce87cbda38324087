/**
 * Model Response Parser
 *
 * Turns the model's raw text into a JSON value. Models sometimes wrap their
 * answer in a markdown code fence despite being told not to; the fence is
 * removed before parsing. No structural checks happen here.
 */

import { EmptyModelResponseError, MalformedModelJsonError } from '../errors';
import type { ExtractionOutput } from '../types';

const FENCE = '```';

/**
 * Remove an opening fence line (with optional language tag) and a trailing
 * closing fence line. Text that does not start with a fence is only trimmed.
 */
export function stripCodeFences(rawText: string): string {
  const text = rawText.trim();
  if (!text.startsWith(FENCE)) {
    return text;
  }

  let lines = text.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[0].trimStart().startsWith(FENCE)) {
    lines = lines.slice(1);
  }
  if (lines.length > 0 && lines[lines.length - 1].trim().startsWith(FENCE)) {
    lines = lines.slice(0, -1);
  }

  return lines.join('\n').trim();
}

/**
 * Parse the model's raw text output.
 *
 * @throws EmptyModelResponseError when nothing is left after fence stripping
 * @throws MalformedModelJsonError when the remainder is not strict JSON
 */
export function parseModelResponse(rawText: string): ExtractionOutput {
  const jsonText = stripCodeFences(rawText);

  if (!jsonText) {
    throw new EmptyModelResponseError();
  }

  try {
    return JSON.parse(jsonText);
  } catch (error) {
    const diagnostic = error instanceof Error ? error.message : String(error);
    throw new MalformedModelJsonError(diagnostic, jsonText, error);
  }
}
