import type { Workspace } from '../core/workspace.js';

export interface DocumentConverter {
  readonly name: string;
  /** Renders every page to PNG inside the workspace, in page order. */
  pdfToImages(pdfPath: string, workspace: Workspace, options: { dpi: number }): Promise<string[]>;
  /** Embedded text layer of a PDF; empty when the document is scanned. */
  pdfText(pdfPath: string): Promise<{ text: string; pages: number }>;
  imageToText(imagePath: string, language: string): Promise<string>;
}
