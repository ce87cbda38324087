/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * The model credential is not part of it: the transport reads
 * OPENAI_API_KEY at first use.
 */

import { fileURLToPath } from 'node:url';
import type { SchemaConformanceMode } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Config {
  // Templates
  templatesDir: string;

  // Extraction
  defaultModel: string;
  defaultMaxPages: number;
  schemaConformance: SchemaConformanceMode;

  // LLM
  llmRequestTimeoutMs: number;

  // HTTP API
  port: number;
  maxUploadBytes: number;

  // Logging
  logLevel: LogLevel;
}

export const OPENAI_API_KEY_ENV = 'OPENAI_API_KEY';

const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../templates/', import.meta.url));

function parseConformanceMode(value: string | undefined): SchemaConformanceMode {
  if (value === 'off' || value === 'warn' || value === 'enforce') {
    return value;
  }
  return 'warn';
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
  }
}

export const config: Config = {
  // Templates
  templatesDir: process.env.TEMPLATES_DIR || DEFAULT_TEMPLATES_DIR,

  // Extraction
  defaultModel: process.env.EXTRACTOR_MODEL_ALIAS || 'gpt-4.1-mini',
  defaultMaxPages: parseInt(process.env.EXTRACTOR_MAX_PAGES || '10', 10),
  schemaConformance: parseConformanceMode(process.env.SCHEMA_CONFORMANCE),

  // LLM (0 keeps the SDK's own timeout)
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '0', 10),

  // HTTP API
  port: parseInt(process.env.PORT || '8080', 10),
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || '52428800', 10),

  // Logging
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
