import { config } from '../../config.js';
import type { DocumentConverter } from '../../types/converter.js';
import { CliDocumentConverter } from './cli.js';
import { MockDocumentConverter } from './mock.js';

export function createDocumentConverter(): DocumentConverter {
  if (config.converterProvider === 'mock') {
    return new MockDocumentConverter();
  }

  return new CliDocumentConverter({
    pdftoppmBin: config.pdftoppmBin,
    tesseractBin: config.tesseractBin,
  });
}
