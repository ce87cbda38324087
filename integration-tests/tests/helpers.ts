/**
 * Test Helpers
 *
 * Synthetic PDFs, stub model transports and an in-process API server.
 */

import type { Express } from 'express';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type {
  ModelRequest,
  ModelTransport,
  PageImage,
  ProviderResponse,
} from '@scanfields/shared';

/**
 * Build a PDF with `pageCount` small pages, each labelled with its page number
 */
export async function createTestPdf(pageCount: number): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);

  for (let i = 0; i < pageCount; i++) {
    const page = doc.addPage([200, 100]);
    page.drawText(`Page ${i + 1}`, { x: 20, y: 50, size: 12, font });
  }

  return doc.save();
}

/**
 * ModelTransport double that records requests and answers with fixed text
 */
export class StubTransport implements ModelTransport {
  readonly provider = 'stub';
  readonly requests: ModelRequest[] = [];

  constructor(private readonly reply: ProviderResponse | (() => Promise<ProviderResponse>)) {}

  static text(text: string): StubTransport {
    return new StubTransport({ shape: 'output_text', text });
  }

  async send(request: ModelRequest): Promise<ProviderResponse> {
    this.requests.push(request);
    return typeof this.reply === 'function' ? this.reply() : this.reply;
  }
}

/**
 * Rasterizer double producing one fake JPEG per page
 */
export function fakeRasterizer(pageCount: number) {
  const calls: Array<{ byteLength: number; maxPages?: number }> = [];

  const rasterize = async (pdfBytes: Uint8Array, maxPages?: number): Promise<PageImage[]> => {
    calls.push({ byteLength: pdfBytes.length, maxPages });
    return Array.from({ length: pageCount }, (_, index) => ({
      index,
      mimeType: 'image/jpeg' as const,
      data: Buffer.from([0xff, 0xd8, 0xff, 0xd9]),
    }));
  };

  return { rasterize, calls };
}

/**
 * Listen on an ephemeral localhost port and return the base URL
 */
export async function listen(app: Express): Promise<{ baseUrl: string; close: () => Promise<void> }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      const port = address.port;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}
