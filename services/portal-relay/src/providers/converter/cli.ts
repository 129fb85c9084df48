import { readdir, readFile } from 'fs/promises';
import { createRequire } from 'module';
import { join } from 'path';
import { runCommand } from '../../core/process.js';
import type { Workspace } from '../../core/workspace.js';
import type { DocumentConverter } from '../../types/converter.js';

export interface PdfTextLayer {
  text: string;
  numpages: number;
}

export type PdfTextParser = (data: Buffer) => Promise<PdfTextLayer>;

// pdf-parse's entry point reads a bundled sample file when it has no parent
// module, which is the case under an ESM import.
const require = createRequire(import.meta.url);
const pdfParse: PdfTextParser = require('pdf-parse');

export interface CliConverterOptions {
  pdftoppmBin: string;
  tesseractBin: string;
  parsePdf?: PdfTextParser;
}

const PAGE_PREFIX = 'page';

function pageNumber(fileName: string): number {
  const match = /-(\d+)\.png$/.exec(fileName);
  return match ? Number.parseInt(match[1], 10) : Number.NaN;
}

/** poppler's pdftoppm for rendering, pdf-parse for text layers, tesseract for OCR. */
export class CliDocumentConverter implements DocumentConverter {
  readonly name = 'poppler+tesseract';

  constructor(private readonly options: CliConverterOptions) {}

  async pdfToImages(pdfPath: string, workspace: Workspace, options: { dpi: number }): Promise<string[]> {
    const prefix = workspace.path(PAGE_PREFIX);
    await runCommand(this.options.pdftoppmBin, ['-png', '-r', String(options.dpi), pdfPath, prefix]);

    const entries = await readdir(workspace.dir);
    return entries
      .filter((entry) => entry.startsWith(`${PAGE_PREFIX}-`) && entry.endsWith('.png'))
      .filter((entry) => Number.isFinite(pageNumber(entry)))
      .sort((a, b) => pageNumber(a) - pageNumber(b))
      .map((entry) => join(workspace.dir, entry));
  }

  async pdfText(pdfPath: string): Promise<{ text: string; pages: number }> {
    const parse = this.options.parsePdf ?? pdfParse;
    const layer = await parse(await readFile(pdfPath));
    return { text: layer.text.trim(), pages: layer.numpages };
  }

  async imageToText(imagePath: string, language: string): Promise<string> {
    const { stdout } = await runCommand(this.options.tesseractBin, [imagePath, 'stdout', '-l', language]);
    return stdout.trim();
  }
}
