import { writeFile } from 'fs/promises';
import type { Workspace } from '../../core/workspace.js';
import type { DocumentConverter } from '../../types/converter.js';

// 1x1 transparent PNG.
const PLACEHOLDER_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=',
  'base64',
);

/** Stand-in converter for local runs without poppler or tesseract installed. */
export class MockDocumentConverter implements DocumentConverter {
  readonly name = 'mock';

  constructor(private readonly pageCount = 2) {}

  async pdfToImages(_pdfPath: string, workspace: Workspace): Promise<string[]> {
    const pages: string[] = [];
    for (let page = 1; page <= this.pageCount; page += 1) {
      const path = workspace.path(`page-${page}.png`);
      await writeFile(path, PLACEHOLDER_PNG);
      pages.push(path);
    }
    return pages;
  }

  async pdfText(): Promise<{ text: string; pages: number }> {
    return { text: '', pages: this.pageCount };
  }

  async imageToText(_imagePath: string, language: string): Promise<string> {
    return `mock text (${language})`;
  }
}
