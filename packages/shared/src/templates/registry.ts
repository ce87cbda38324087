/**
 * Template Registry
 *
 * Ordered keyword -> template associations. Classification walks this list
 * top to bottom and stops at the first keyword contained in the filename,
 * so declaration order decides overlaps (e.g. 'offer letter' before
 * 'employment', 'marriage' before 'marriage_certificate').
 */

import type { TemplateEntry } from '../types';

const I129 = { documentType: 'USCIS Form I-129 H-1B Petition', templateFile: 'i129_h1b_petition.json' };
const I94 = { documentType: 'Form I-94 Arrival/Departure Record', templateFile: 'i_94.json' };
const I20 = { documentType: 'Form I-20 Certificate of Eligibility', templateFile: 'proof_of_in_country_status.json' };
const PASSPORT = { documentType: 'Passport', templateFile: 'passport.json' };
const VISA = { documentType: 'US Visa', templateFile: 'us_visa.json' };
const TRANSCRIPT = { documentType: 'Academic Transcript', templateFile: 'school_transcripts.json' };
const DIPLOMA = { documentType: 'Diploma', templateFile: 'diplomas.json' };
const EMPLOYMENT_LETTER = { documentType: 'Employment Letter', templateFile: 'employment_letter.json' };
const RESUME = { documentType: 'Resume/CV', templateFile: 'resume.json' };
const CORPORATE_TAX = { documentType: 'Corporate Tax Returns', templateFile: 'corporate_tax_returns.json' };
const MARRIAGE = { documentType: 'Marriage Certificate', templateFile: 'marriage_certificate.json' };
const PROOF_OF_STATUS = { documentType: 'Proof of In-Country Status', templateFile: 'proof_of_in_country_status.json' };

export const TEMPLATE_REGISTRY: readonly TemplateEntry[] = Object.freeze([
  // Immigration forms
  { keyword: 'i129', ...I129 },
  { keyword: 'i94', ...I94 },
  { keyword: 'i-94', ...I94 },
  { keyword: 'i20', ...I20 },
  { keyword: 'i-20', ...I20 },

  // Identity documents
  { keyword: 'passport', ...PASSPORT },
  { keyword: 'visa', ...VISA },

  // Education documents
  { keyword: 'transcript', ...TRANSCRIPT },
  { keyword: 'diploma', ...DIPLOMA },

  // Employment documents
  { keyword: 'employment letter', ...EMPLOYMENT_LETTER },
  { keyword: 'offer letter', ...EMPLOYMENT_LETTER },
  { keyword: 'offer-letter', ...EMPLOYMENT_LETTER },
  { keyword: 'offer_letter', ...EMPLOYMENT_LETTER },
  { keyword: 'employment_letter', ...EMPLOYMENT_LETTER },
  { keyword: 'employment', ...EMPLOYMENT_LETTER },
  { keyword: 'resume', ...RESUME },
  { keyword: 'cv', ...RESUME },

  // Tax and corporate documents
  { keyword: 'fein', ...CORPORATE_TAX },
  { keyword: 'cp575', ...CORPORATE_TAX },
  { keyword: 'tax', ...CORPORATE_TAX },

  // Personal documents
  { keyword: 'marriage', ...MARRIAGE },
  { keyword: 'marriage_certificate', ...MARRIAGE },

  // Proof of status
  { keyword: 'proof', ...PROOF_OF_STATUS },
].map((entry) => Object.freeze(entry)));

/**
 * Look up the entry declared for an exact keyword.
 *
 * @returns The entry, or undefined if the keyword is not registered
 */
export function resolveKeyword(
  keyword: string,
  registry: readonly TemplateEntry[] = TEMPLATE_REGISTRY
): TemplateEntry | undefined {
  const normalized = keyword.toLowerCase();
  return registry.find((entry) => entry.keyword === normalized);
}

/**
 * All registered keywords, in declaration order
 */
export function getKnownKeywords(registry: readonly TemplateEntry[] = TEMPLATE_REGISTRY): string[] {
  return registry.map((entry) => entry.keyword);
}

/**
 * Distinct document types with the keywords that select them
 */
export function getDocumentTypes(
  registry: readonly TemplateEntry[] = TEMPLATE_REGISTRY
): Array<{ documentType: string; templateFile: string; keywords: string[] }> {
  const byType = new Map<string, { documentType: string; templateFile: string; keywords: string[] }>();

  for (const entry of registry) {
    const existing = byType.get(entry.documentType);
    if (existing) {
      existing.keywords.push(entry.keyword);
    } else {
      byType.set(entry.documentType, {
        documentType: entry.documentType,
        templateFile: entry.templateFile,
        keywords: [entry.keyword],
      });
    }
  }

  return Array.from(byType.values());
}
