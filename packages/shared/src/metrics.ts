/**
 * Prometheus Metrics
 *
 * Metrics for extraction throughput, rendering payloads and model calls.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const extractionsCounter = new promClient.Counter({
  name: 'scanfields_extractions_total',
  help: 'Total number of extraction requests by outcome',
  labelNames: ['document_type', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'scanfields_extraction_duration_seconds',
  help: 'End-to-end duration of an extraction request',
  labelNames: ['status'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const renderedPagesHistogram = new promClient.Histogram({
  name: 'scanfields_rendered_pages',
  help: 'Pages rendered per document, by fidelity tier',
  labelNames: ['tier'],
  buckets: [1, 2, 3, 5, 10, 20, 50],
  registers: [register],
});

export const schemaMismatchCounter = new promClient.Counter({
  name: 'scanfields_schema_mismatches_total',
  help: 'Model outputs whose structure differed from the requested template',
  labelNames: ['document_type'],
  registers: [register],
});

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'scanfields_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'scanfields_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'scanfields_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 60],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'scanfields_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
