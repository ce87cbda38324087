/**
 * Template Loader
 *
 * Reads template JSON files from the templates directory. Every call
 * re-reads the file and returns a fresh object, so callers can never
 * mutate a shared copy.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { config } from '../config';
import { TemplateNotFoundError, TemplateParseError } from '../errors';
import { logger } from '../logger';
import type { Schema } from '../types';

export type TemplateLoader = (templateFile: string) => Promise<Schema>;

/**
 * Directory template references are resolved against
 */
export function getTemplatesDir(): string {
  return config.templatesDir;
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'EISDIR')
  );
}

/**
 * Load and parse a template file.
 *
 * @param templateFile - File name relative to the templates directory
 * @param templatesDir - Override for the templates directory
 * @throws TemplateNotFoundError if the file does not exist
 * @throws TemplateParseError if the file is not valid JSON
 */
export async function loadTemplate(
  templateFile: string,
  templatesDir: string = getTemplatesDir()
): Promise<Schema> {
  const templatePath = path.join(templatesDir, templateFile);

  let content: string;
  try {
    content = await fs.readFile(templatePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new TemplateNotFoundError(templatePath, { cause: error });
    }
    throw error;
  }

  let schema: Schema;
  try {
    schema = JSON.parse(content);
  } catch (error) {
    throw new TemplateParseError(templatePath, error);
  }

  logger.debug('Loaded template', { template_path: templatePath, bytes: content.length });

  return schema;
}

/**
 * Build a loader bound to a specific templates directory
 */
export function createTemplateLoader(templatesDir: string): TemplateLoader {
  return (templateFile) => loadTemplate(templateFile, templatesDir);
}
