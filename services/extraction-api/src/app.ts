/**
 * Extraction API
 *
 * HTTP front end for the extraction pipeline. Clients POST the raw PDF body
 * and get the extracted JSON back, or an error envelope.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContext,
  runWithContextAsync,
  getMetrics,
  getMetricsContentType,
  getDocumentTypes,
  getKnownKeywords,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isExtractionError,
  ExtractionError,
  type ErrorEnvelope,
  type ExtractionErrorKind,
} from '@scanfields/shared';
import { getDefaultPipeline, type ExtractionPipeline } from '@scanfields/extractor';

const CORRELATION_HEADER = 'X-Correlation-Id';

interface ErrorMapping {
  status: number;
  code: string;
}

export const ERROR_RESPONSES: Readonly<Record<ExtractionErrorKind, ErrorMapping>> = {
  TemplateNotFound: { status: 500, code: 'template_not_found' },
  TemplateParseFailed: { status: 500, code: 'template_invalid' },
  ClassificationFailed: { status: 400, code: 'classification_failed' },
  DocumentOpenFailed: { status: 400, code: 'invalid_pdf' },
  NoRenderedPages: { status: 400, code: 'no_pages' },
  CredentialMissing: { status: 503, code: 'credential_missing' },
  UnsupportedModel: { status: 400, code: 'unsupported_model' },
  EmptyModelResponse: { status: 422, code: 'empty_model_response' },
  MalformedModelJSON: { status: 422, code: 'malformed_model_json' },
  UpstreamRejected: { status: 502, code: 'upstream_rejected' },
  SchemaMismatch: { status: 422, code: 'schema_mismatch' },
};

export interface AppOptions {
  pipeline?: ExtractionPipeline;
}

function correlationIdOf(res: Response): string {
  const header = res.getHeader(CORRELATION_HEADER);
  return typeof header === 'string' ? header : ulid();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(envelope);
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}

function parseMaxPages(value: string | undefined): number | undefined | null {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (!/^-?\d+$/.test(value)) {
    return null;
  }
  return parseInt(value, 10);
}

export function createApp(options: AppOptions = {}) {
  const resolvePipeline = () => options.pipeline ?? getDefaultPipeline();
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = firstString(req.headers['x-correlation-id']) || ulid();
    res.setHeader(CORRELATION_HEADER, correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'extraction-api',
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    try {
      const metrics = await getMetrics();
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(metrics);
    } catch (error) {
      logger.error('Failed to collect metrics', error);
      sendError(res, 500, 'internal_error', 'Failed to collect metrics');
    }
  });

  /**
   * GET /models
   * Accepted model aliases and the model 'default' resolves to
   */
  app.get('/models', (req: Request, res: Response) => {
    res.json(resolvePipeline().describeModels());
  });

  /**
   * GET /templates
   * Filename keywords in match order, and the document types they select
   */
  app.get('/templates', (req: Request, res: Response) => {
    res.json({
      keywords: getKnownKeywords(),
      document_types: getDocumentTypes().map((entry) => ({
        document_type: entry.documentType,
        template_file: entry.templateFile,
        keywords: entry.keywords,
      })),
    });
  });

  /**
   * POST /extract
   * Body: raw PDF bytes. Query: filename (or X-Filename header), model, max_pages
   */
  app.post(
    '/extract',
    express.raw({
      type: ['application/pdf', 'application/octet-stream'],
      limit: config.maxUploadBytes,
    }),
    async (req: Request, res: Response) => {
      const filename = firstString(req.query.filename) || req.get('X-Filename');
      const model = firstString(req.query.model);
      const maxPages = parseMaxPages(firstString(req.query.max_pages));

      if (!filename) {
        sendError(res, 400, 'bad_request', 'A filename is required (filename query parameter or X-Filename header)');
        return;
      }
      if (maxPages === null) {
        sendError(res, 400, 'bad_request', 'max_pages must be an integer');
        return;
      }
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        sendError(res, 400, 'bad_request', 'Request body must be a non-empty PDF sent as application/pdf');
        return;
      }

      const pdfBytes = new Uint8Array(req.body);
      const correlationId = correlationIdOf(res);

      try {
        const result = await runWithContextAsync({ correlationId, filename, model }, () =>
          resolvePipeline().extract({ pdfBytes, filename, model, maxPages })
        );
        res.json(result);
      } catch (error) {
        if (isExtractionError(error)) {
          const mapping = ERROR_RESPONSES[error.kind];
          sendError(res, mapping.status, mapping.code, error.message);
          return;
        }

        logger.error('Unexpected extraction failure', error);
        sendError(res, 500, 'internal_error', ExtractionError.getErrorMessage(error));
      }
    }
  );

  // Body parser failures (oversized upload, aborted stream)
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const status =
      typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
        ? error.status
        : 500;

    logger.warn('Request rejected', { status, error: ExtractionError.getErrorMessage(error) });
    sendError(
      res,
      status,
      status === 413 ? 'payload_too_large' : status < 500 ? 'bad_request' : 'internal_error',
      ExtractionError.getErrorMessage(error)
    );
  });

  return app;
}
