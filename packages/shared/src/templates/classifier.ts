/**
 * Filename Classifier
 *
 * Picks the document type and template from the uploaded file's name.
 */

import path from 'node:path';
import { ClassificationFailedError } from '../errors';
import { logger } from '../logger';
import type { TemplateEntry, TemplateSelection } from '../types';
import { loadTemplate, type TemplateLoader } from './loader';
import { TEMPLATE_REGISTRY, getKnownKeywords } from './registry';

export interface ClassifyOptions {
  registry?: readonly TemplateEntry[];
  loader?: TemplateLoader;
}

/**
 * Lowercased basename of a filename. Both '/' and '\' count as separators,
 * since uploads may come from Windows clients.
 */
export function normalizeFilename(filename: string): string {
  return path.win32.basename(filename).toLowerCase();
}

/**
 * First registry entry whose keyword occurs in the filename's basename.
 * First match wins, not longest match.
 */
export function matchTemplateEntry(
  filename: string,
  registry: readonly TemplateEntry[] = TEMPLATE_REGISTRY
): TemplateEntry | undefined {
  const basename = normalizeFilename(filename);
  return registry.find((entry) => basename.includes(entry.keyword));
}

/**
 * Resolve a filename to its document type and parsed template.
 *
 * @throws ClassificationFailedError listing every known keyword when nothing matches
 */
export async function classifyFilename(
  filename: string,
  options: ClassifyOptions = {}
): Promise<TemplateSelection> {
  const registry = options.registry ?? TEMPLATE_REGISTRY;
  const loader = options.loader ?? loadTemplate;

  const entry = matchTemplateEntry(filename, registry);
  if (!entry) {
    const basename = normalizeFilename(filename);
    logger.warn('No template keyword matched filename', { basename });
    throw new ClassificationFailedError(basename, getKnownKeywords(registry));
  }

  const schema = await loader(entry.templateFile);

  logger.info('Filename classified', {
    keyword: entry.keyword,
    document_type: entry.documentType,
    template_file: entry.templateFile,
  });

  return {
    keyword: entry.keyword,
    documentType: entry.documentType,
    templateFile: entry.templateFile,
    schema,
  };
}
