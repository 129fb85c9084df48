import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CliDocumentConverter, type PdfTextParser } from './cli.js';

describe('CliDocumentConverter.pdfText', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relay-pdftext-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function converter(parsePdf: PdfTextParser): CliDocumentConverter {
    return new CliDocumentConverter({ pdftoppmBin: 'pdftoppm', tesseractBin: 'tesseract', parsePdf });
  }

  it('returns the trimmed text layer and page count', async () => {
    const pdfPath = join(dir, 'source.pdf');
    await writeFile(pdfPath, '%PDF-1.4\n%fixture');
    const parsePdf = vi.fn<PdfTextParser>(async () => ({ text: '\n\nInvoice 42\n\nTotal due\n\n', numpages: 3 }));

    const layer = await converter(parsePdf).pdfText(pdfPath);

    expect(layer).toEqual({ text: 'Invoice 42\n\nTotal due', pages: 3 });
    expect(parsePdf.mock.calls[0]?.[0].toString('latin1')).toBe('%PDF-1.4\n%fixture');
  });

  it('reports an empty layer for scanned documents', async () => {
    const pdfPath = join(dir, 'scan.pdf');
    await writeFile(pdfPath, '%PDF-1.4');

    const layer = await converter(async () => ({ text: '  \n ', numpages: 2 })).pdfText(pdfPath);

    expect(layer).toEqual({ text: '', pages: 2 });
  });
});
