/**
 * Rasterizer failure after the document has opened
 *
 * JPEG encoding is made to fail so the error surfaces mid-render.
 */

import { createTestPdf } from './helpers';

const { encodeFailure, createdCanvases } = vi.hoisted(() => {
  const canvases: Array<{ width: number; height: number }> = [];
  return { encodeFailure: new Error('JPEG encoder unavailable'), createdCanvases: canvases };
});

vi.mock('@napi-rs/canvas', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@napi-rs/canvas')>();
  return {
    ...actual,
    createCanvas: (width: number, height: number) => {
      const canvas = actual.createCanvas(width, height);
      vi.spyOn(canvas, 'encode').mockRejectedValue(encodeFailure);
      createdCanvases.push(canvas);
      return canvas;
    },
  };
});

import { rasterizePdf } from '@scanfields/extractor';

describe('rasterizePdf render failures', () => {
  it('propagates the render error unchanged and releases the page canvas', async () => {
    const pdfBytes = await createTestPdf(2);

    await expect(rasterizePdf(pdfBytes, 2)).rejects.toBe(encodeFailure);

    expect(createdCanvases).toHaveLength(1);
    expect(createdCanvases[0].width).toBe(0);
    expect(createdCanvases[0].height).toBe(0);
  });

  it('opens the next document normally after a failed render', async () => {
    await expect(rasterizePdf(await createTestPdf(1), 1)).rejects.toBe(encodeFailure);
  });
});
