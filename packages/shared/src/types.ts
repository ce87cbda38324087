/**
 * Shared TypeScript Types
 *
 * Types for the template-driven document extraction pipeline.
 */

// ============================================================================
// JSON Values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// ============================================================================
// Templates
// ============================================================================

/**
 * Target shape for one document type. Loaded from a template file and
 * treated as read-only; extraction results are new values shaped after it.
 */
export type Schema = JsonValue;

/** One keyword -> document type association in the template registry. */
export interface TemplateEntry {
  /** Lowercase substring matched against the input filename */
  keyword: string;
  /** Human-readable document type label */
  documentType: string;
  /** Template file name, relative to the templates directory */
  templateFile: string;
}

/** Output of filename classification */
export interface TemplateSelection {
  keyword: string;
  documentType: string;
  templateFile: string;
  schema: Schema;
}

// ============================================================================
// Rasterization
// ============================================================================

export type FidelityTier = 'high' | 'medium' | 'low';

export interface RenderProfile {
  tier: FidelityTier;
  /** Viewport scale factor (1.0 = 72 DPI) */
  scale: number;
  /** JPEG quality, 0-100 */
  quality: number;
}

/** One rendered page, in document order */
export interface PageImage {
  /** Zero-based page index */
  index: number;
  mimeType: 'image/jpeg';
  data: Buffer;
}

// ============================================================================
// Extraction
// ============================================================================

export interface ExtractionRequest {
  pdfBytes: Uint8Array;
  filename: string;
  /** Page limit; non-positive means all pages */
  maxPages?: number;
  /** Model alias, or 'default' */
  model?: string;
}

/** Parsed model output, returned verbatim */
export type ExtractionOutput = JsonValue;

export interface ExtractionFailure {
  kind: string;
  message: string;
}

export type ExtractionOutcome =
  | { ok: true; data: ExtractionOutput }
  | { ok: false; error: ExtractionFailure };

export type SchemaConformanceMode = 'off' | 'warn' | 'enforce';

// ============================================================================
// API Responses
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
