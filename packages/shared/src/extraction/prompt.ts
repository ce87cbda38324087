/**
 * Extraction Prompts
 */

import type { Schema } from '../types';

/** System-level framing sent with every extraction request */
export const EXTRACTION_SYSTEM_INSTRUCTION = 'You are a precise document extraction engine.';

/**
 * Build the user prompt asking the model to fill the template for a document type.
 * Pure: the schema is only serialized, never modified.
 */
export function buildExtractionPrompt(documentType: string, schema: Schema): string {
  return `You are a document data extraction system.

Document Type: ${documentType}

Extract all information from the provided document image(s) and return it in the following exact JSON structure:

${JSON.stringify(schema, null, 2)}

Instructions:
- Output only valid JSON matching exactly the structure above
- Do NOT add explanations
- Do NOT wrap the JSON in markdown, backticks, or code fences
- If a field is missing, set it to ""
- Use the exact field names; do not modify the structure
- Extract information from ALL pages
`;
}
