/**
 * Extraction Pipeline E2E Tests
 *
 * Real templates and rasterizer, stubbed model service.
 */

import { loadImage } from '@napi-rs/canvas';
import {
  ModelGateway,
  ClassificationFailedError,
  CredentialMissingError,
  NoRenderedPagesError,
  SchemaMismatchError,
  MalformedModelJsonError,
  type PageImage,
} from '@scanfields/shared';
import { ExtractionPipeline, OpenAiTransport, rasterizePdf } from '@scanfields/extractor';
import { StubTransport, createTestPdf, fakeRasterizer } from './helpers';

const STUB_OUTPUT = '{"petitioner": "", "beneficiary": ""}';

describe('Extraction Pipeline E2E', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('extracts i129_half.pdf end to end', async () => {
    const transport = StubTransport.text(STUB_OUTPUT);
    const rendered: PageImage[] = [];
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(transport, { defaultModel: 'gpt-4.1-mini' }),
      rasterize: async (pdfBytes, maxPages) => {
        const images = await rasterizePdf(pdfBytes, maxPages);
        rendered.push(...images);
        return images;
      },
      schemaConformance: 'warn',
    });

    const result = await pipeline.extract({
      pdfBytes: await createTestPdf(1),
      filename: 'i129_half.pdf',
    });

    expect(result).toEqual({ petitioner: '', beneficiary: '' });

    expect(rendered).toHaveLength(1);
    const decoded = await loadImage(rendered[0].data);
    expect(decoded.width).toBeGreaterThanOrEqual(833);

    expect(transport.requests).toHaveLength(1);
    const request = transport.requests[0];
    expect(request.model).toBe('gpt-4.1-mini');
    expect(request.temperature).toBe(0);
    expect(request.images).toEqual(rendered);
    expect(request.prompt).toContain('Document Type: USCIS Form I-129 H-1B Petition\n');
    expect(request.prompt).toContain('"receipt_number": ""');
  });

  it('fails with CredentialMissing before any model call', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const clientFactory = vi.fn();
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(new OpenAiTransport({ clientFactory })),
    });

    await expect(
      pipeline.extract({ pdfBytes: await createTestPdf(1), filename: 'i129_half.pdf' })
    ).rejects.toThrow(CredentialMissingError);
    expect(clientFactory).not.toHaveBeenCalled();
  });

  it('stops at classification when the filename is unknown', async () => {
    const transport = StubTransport.text(STUB_OUTPUT);
    const raster = fakeRasterizer(1);
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(transport),
      rasterize: raster.rasterize,
    });

    await expect(
      pipeline.extract({ pdfBytes: new Uint8Array([1, 2, 3]), filename: 'scan_0001.pdf' })
    ).rejects.toThrow(ClassificationFailedError);
    expect(raster.calls).toHaveLength(0);
    expect(transport.requests).toHaveLength(0);
  });

  it('treats zero rendered pages as fatal', async () => {
    const transport = StubTransport.text(STUB_OUTPUT);
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(transport),
      rasterize: fakeRasterizer(0).rasterize,
    });

    await expect(
      pipeline.extract({ pdfBytes: new Uint8Array([1]), filename: 'passport.pdf' })
    ).rejects.toThrow(NoRenderedPagesError);
    expect(transport.requests).toHaveLength(0);
  });

  it('applies the default page limit and forwards an explicit one', async () => {
    const raster = fakeRasterizer(2);
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(StubTransport.text('{}')),
      rasterize: raster.rasterize,
      defaultMaxPages: 10,
      schemaConformance: 'off',
    });

    await pipeline.extract({ pdfBytes: new Uint8Array([1]), filename: 'visa.pdf' });
    await pipeline.extract({ pdfBytes: new Uint8Array([1]), filename: 'visa.pdf', maxPages: 0 });

    expect(raster.calls.map((call) => call.maxPages)).toEqual([10, 0]);
  });

  it('returns fenced model output as parsed JSON', async () => {
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(StubTransport.text('```json\n{"full_name": "Test Person"}\n```')),
      rasterize: fakeRasterizer(1).rasterize,
      schemaConformance: 'off',
    });

    const result = await pipeline.extract({ pdfBytes: new Uint8Array([1]), filename: 'resume.pdf' });

    expect(result).toEqual({ full_name: 'Test Person' });
  });

  it('rejects mismatched output in enforce mode', async () => {
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(StubTransport.text(STUB_OUTPUT)),
      rasterize: fakeRasterizer(1).rasterize,
      schemaConformance: 'enforce',
    });

    const error = await pipeline
      .extract({ pdfBytes: new Uint8Array([1]), filename: 'i129_half.pdf' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaMismatchError);
    if (error instanceof SchemaMismatchError) {
      expect(error.issues).toContain('/petitioner: must be object');
      expect(error.message.startsWith('Model output does not match the USCIS Form I-129 H-1B Petition template: ')).toBe(true);
    }
  });

  it('reports outcomes as values through tryExtract', async () => {
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(StubTransport.text('not json at all')),
      rasterize: fakeRasterizer(1).rasterize,
    });

    const failed = await pipeline.tryExtract({ pdfBytes: new Uint8Array([1]), filename: 'diploma.pdf' });
    const unknown = await pipeline.tryExtract({ pdfBytes: new Uint8Array([1]), filename: 'notes.pdf' });

    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.kind).toBe('MalformedModelJSON');
    }
    expect(unknown).toEqual({
      ok: false,
      error: {
        kind: 'ClassificationFailed',
        message: expect.stringContaining("Could not infer document type from filename 'notes.pdf'."),
      },
    });
  });

  it('passes the requested model alias to the gateway', async () => {
    const transport = StubTransport.text('{}');
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(transport, { defaultModel: 'gpt-4.1-mini' }),
      rasterize: fakeRasterizer(1).rasterize,
      schemaConformance: 'off',
    });

    const outcome = await pipeline.tryExtract({
      pdfBytes: new Uint8Array([1]),
      filename: 'tax_return.pdf',
      model: 'gpt-4o',
    });

    expect(outcome).toEqual({ ok: true, data: {} });
    expect(transport.requests[0].model).toBe('gpt-4o');
  });

  it('surfaces malformed JSON with its snippet', async () => {
    const pipeline = new ExtractionPipeline({
      gateway: new ModelGateway(StubTransport.text('{"a": ')),
      rasterize: fakeRasterizer(1).rasterize,
    });

    await expect(
      pipeline.extract({ pdfBytes: new Uint8Array([1]), filename: 'passport.pdf' })
    ).rejects.toMatchObject({ snippet: '{"a":' });
    await expect(
      pipeline.extract({ pdfBytes: new Uint8Array([1]), filename: 'passport.pdf' })
    ).rejects.toThrow(MalformedModelJsonError);
  });
});
