/**
 * PDF Rasterization
 *
 * Renders PDF pages to JPEG images using pdfjs-dist on a @napi-rs/canvas
 * surface. Resolution and JPEG quality step down as the page count grows so
 * the request payload stays bounded.
 */

import { createRequire } from 'node:module';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { createCanvas } from '@napi-rs/canvas';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import {
  DocumentOpenFailedError,
  logger,
  renderedPagesHistogram,
  type FidelityTier,
  type PageImage,
  type RenderProfile,
} from '@scanfields/shared';

// Configure worker and font data for Node.js environment
const require = createRequire(import.meta.url);
const pdfjsRoot = path.dirname(require.resolve('pdfjs-dist/package.json'));
pdfjsLib.GlobalWorkerOptions.workerSrc = pathToFileURL(
  path.join(pdfjsRoot, 'legacy/build/pdf.worker.mjs')
).href;

const STANDARD_FONT_DATA_URL = path.join(pdfjsRoot, 'standard_fonts') + path.sep;
const CMAP_URL = path.join(pdfjsRoot, 'cmaps') + path.sep;

export const RENDER_PROFILES: Readonly<Record<FidelityTier, RenderProfile>> = Object.freeze({
  high: { tier: 'high', scale: 4.17, quality: 80 }, // ~300 DPI
  medium: { tier: 'medium', scale: 2.0, quality: 60 }, // ~145 DPI
  low: { tier: 'low', scale: 1.5, quality: 60 }, // ~110 DPI
});

export type Rasterizer = (pdfBytes: Uint8Array, maxPages?: number) => Promise<PageImage[]>;

/**
 * Pages that will actually be rendered. A non-positive or missing limit
 * means every page.
 */
export function getEffectivePageCount(totalPages: number, maxPages?: number): number {
  if (maxPages !== undefined && maxPages > 0) {
    return Math.min(totalPages, maxPages);
  }
  return totalPages;
}

/**
 * Rendering parameters for a document of the given effective page count
 */
export function selectRenderProfile(pageCount: number): RenderProfile {
  if (pageCount <= 2) {
    return RENDER_PROFILES.high;
  }
  if (pageCount <= 10) {
    return RENDER_PROFILES.medium;
  }
  return RENDER_PROFILES.low;
}

async function openDocument(pdfBytes: Uint8Array) {
  // pdf.js takes ownership of the buffer it is given; hand it a copy
  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(pdfBytes),
    standardFontDataUrl: STANDARD_FONT_DATA_URL,
    cMapUrl: CMAP_URL,
    cMapPacked: true,
    isEvalSupported: false,
    verbosity: 0,
  });

  try {
    return await loadingTask.promise;
  } catch (error) {
    await loadingTask.destroy();
    throw new DocumentOpenFailedError(error);
  }
}

type PdfDocument = Awaited<ReturnType<typeof openDocument>>;

async function renderPage(
  pdf: PdfDocument,
  index: number,
  profile: RenderProfile
): Promise<PageImage> {
  const page = await pdf.getPage(index + 1);
  const viewport = page.getViewport({ scale: profile.scale });
  const canvas = createCanvas(
    Math.max(1, Math.floor(viewport.width)),
    Math.max(1, Math.floor(viewport.height))
  );

  try {
    const context = canvas.getContext('2d');
    // pdf.js is typed against the DOM canvas; the napi canvas implements the same 2D API
    const renderParams = {
      canvas: canvas as unknown as HTMLCanvasElement,
      canvasContext: context as unknown as CanvasRenderingContext2D,
      viewport,
    };
    await page.render(renderParams).promise;

    const data = await canvas.encode('jpeg', profile.quality);
    return { index, mimeType: 'image/jpeg', data };
  } finally {
    page.cleanup();
    canvas.width = 0;
    canvas.height = 0;
  }
}

/**
 * Render the first `maxPages` pages of a PDF to JPEG images, in page order.
 *
 * @param pdfBytes - Raw PDF content
 * @param maxPages - Page limit; non-positive or omitted renders all pages
 * @returns One image per rendered page; empty only for a document with no pages
 * @throws DocumentOpenFailedError if the bytes cannot be opened as a PDF
 */
export async function rasterizePdf(pdfBytes: Uint8Array, maxPages?: number): Promise<PageImage[]> {
  const startTime = Date.now();
  const pdf = await openDocument(pdfBytes);

  try {
    const totalPages = pdf.numPages;
    const pageCount = getEffectivePageCount(totalPages, maxPages);
    const profile = selectRenderProfile(pageCount);

    logger.info('Rasterizing PDF', {
      total_pages: totalPages,
      page_count: pageCount,
      tier: profile.tier,
      scale: profile.scale,
      quality: profile.quality,
    });

    const images: PageImage[] = [];
    for (let index = 0; index < pageCount; index++) {
      images.push(await renderPage(pdf, index, profile));
    }

    renderedPagesHistogram.observe({ tier: profile.tier }, images.length);

    logger.info('PDF rasterization complete', {
      page_count: images.length,
      tier: profile.tier,
      total_bytes: images.reduce((sum, image) => sum + image.data.length, 0),
      duration_ms: Date.now() - startTime,
    });

    return images;
  } finally {
    await pdf.destroy();
  }
}
