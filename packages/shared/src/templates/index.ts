/**
 * Document Templates
 *
 * Filename keyword registry, template file loading and classification.
 */

export {
  TEMPLATE_REGISTRY,
  resolveKeyword,
  getKnownKeywords,
  getDocumentTypes,
} from './registry';

export {
  loadTemplate,
  createTemplateLoader,
  getTemplatesDir,
  type TemplateLoader,
} from './loader';

export {
  classifyFilename,
  matchTemplateEntry,
  normalizeFilename,
  type ClassifyOptions,
} from './classifier';
