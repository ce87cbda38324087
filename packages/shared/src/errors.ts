/**
 * Extraction Errors
 *
 * Every failure the pipeline can raise carries a `kind` so callers can
 * branch on it without instanceof chains.
 */

import type { ExtractionFailure } from './types';

export type ExtractionErrorKind =
  | 'TemplateNotFound'
  | 'TemplateParseFailed'
  | 'ClassificationFailed'
  | 'DocumentOpenFailed'
  | 'NoRenderedPages'
  | 'CredentialMissing'
  | 'UnsupportedModel'
  | 'EmptyModelResponse'
  | 'MalformedModelJSON'
  | 'UpstreamRejected'
  | 'SchemaMismatch';

/** Characters of model output kept on a MalformedModelJsonError */
export const MALFORMED_SNIPPET_LENGTH = 500;

/**
 * ExtractionError
 *
 * Base class for all pipeline failures.
 */
export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;

  constructor(kind: ExtractionErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
    this.kind = kind;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

export class TemplateNotFoundError extends ExtractionError {
  readonly templatePath: string;

  constructor(templatePath: string, options?: ErrorOptions) {
    super('TemplateNotFound', `Template not found: ${templatePath}`, options);
    this.name = 'TemplateNotFoundError';
    this.templatePath = templatePath;
  }
}

export class TemplateParseError extends ExtractionError {
  readonly templatePath: string;

  constructor(templatePath: string, cause: unknown) {
    super(
      'TemplateParseFailed',
      `Template is not valid JSON: ${templatePath}: ${ExtractionError.getErrorMessage(cause)}`,
      { cause }
    );
    this.name = 'TemplateParseError';
    this.templatePath = templatePath;
  }
}

export class ClassificationFailedError extends ExtractionError {
  readonly filename: string;
  readonly knownKeywords: readonly string[];

  constructor(filename: string, knownKeywords: readonly string[]) {
    super(
      'ClassificationFailed',
      `Could not infer document type from filename '${filename}'. ` +
        `Known keywords: ${knownKeywords.join(', ')}`
    );
    this.name = 'ClassificationFailedError';
    this.filename = filename;
    this.knownKeywords = knownKeywords;
  }
}

export class DocumentOpenFailedError extends ExtractionError {
  constructor(cause: unknown) {
    super(
      'DocumentOpenFailed',
      `Could not open PDF document: ${ExtractionError.getErrorMessage(cause)}`,
      { cause }
    );
    this.name = 'DocumentOpenFailedError';
  }
}

export class NoRenderedPagesError extends ExtractionError {
  constructor() {
    super('NoRenderedPages', 'No images were extracted from PDF');
    this.name = 'NoRenderedPagesError';
  }
}

export class CredentialMissingError extends ExtractionError {
  readonly envVar: string;

  constructor(envVar: string) {
    super('CredentialMissing', `${envVar} is not set. Set it in your environment or CI secrets.`);
    this.name = 'CredentialMissingError';
    this.envVar = envVar;
  }
}

export class UnsupportedModelError extends ExtractionError {
  readonly requested: string;
  readonly allowed: readonly string[];

  constructor(requested: string, allowed: readonly string[]) {
    super(
      'UnsupportedModel',
      `Unsupported model alias '${requested}'. Supported values: ${allowed.join(', ')}.`
    );
    this.name = 'UnsupportedModelError';
    this.requested = requested;
    this.allowed = allowed;
  }
}

export class EmptyModelResponseError extends ExtractionError {
  constructor() {
    super('EmptyModelResponse', 'Model response did not contain any text content to parse as JSON.');
    this.name = 'EmptyModelResponseError';
  }
}

export class MalformedModelJsonError extends ExtractionError {
  readonly diagnostic: string;
  readonly snippet: string;

  constructor(diagnostic: string, text: string, cause?: unknown) {
    const snippet = text.slice(0, MALFORMED_SNIPPET_LENGTH);
    super(
      'MalformedModelJSON',
      `Model output was not valid JSON: ${diagnostic}. ` +
        `First ${MALFORMED_SNIPPET_LENGTH} characters of response: ${JSON.stringify(snippet)}`,
      { cause }
    );
    this.name = 'MalformedModelJsonError';
    this.diagnostic = diagnostic;
    this.snippet = snippet;
  }
}

export class UpstreamRejectedError extends ExtractionError {
  readonly status: number;

  constructor(status: number, detail: string, cause?: unknown) {
    super(
      'UpstreamRejected',
      `The model service rejected the request (HTTP ${status}): ${detail}. ` +
        'Check that the API key is valid and that the account has billing and quota available.',
      { cause }
    );
    this.name = 'UpstreamRejectedError';
    this.status = status;
  }
}

export class SchemaMismatchError extends ExtractionError {
  readonly issues: readonly string[];

  constructor(documentType: string, issues: readonly string[]) {
    super(
      'SchemaMismatch',
      `Model output does not match the ${documentType} template: ${issues.join('; ')}`
    );
    this.name = 'SchemaMismatchError';
    this.issues = issues;
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

/**
 * Flatten any thrown value into the `{ kind, message }` shape UIs render.
 */
export function toExtractionFailure(error: unknown): ExtractionFailure {
  if (isExtractionError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'Unexpected', message: ExtractionError.getErrorMessage(error) };
}
