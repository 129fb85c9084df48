export type SniffedType = 'pdf' | 'png' | 'jpeg' | 'gif' | 'bmp' | 'tiff' | 'webp';

export interface SniffResult {
  type: SniffedType;
  kind: 'pdf' | 'image';
  mimeType: string;
  extension: string;
}

const RESULTS: Record<SniffedType, SniffResult> = {
  pdf: { type: 'pdf', kind: 'pdf', mimeType: 'application/pdf', extension: 'pdf' },
  png: { type: 'png', kind: 'image', mimeType: 'image/png', extension: 'png' },
  jpeg: { type: 'jpeg', kind: 'image', mimeType: 'image/jpeg', extension: 'jpg' },
  gif: { type: 'gif', kind: 'image', mimeType: 'image/gif', extension: 'gif' },
  bmp: { type: 'bmp', kind: 'image', mimeType: 'image/bmp', extension: 'bmp' },
  tiff: { type: 'tiff', kind: 'image', mimeType: 'image/tiff', extension: 'tif' },
  webp: { type: 'webp', kind: 'image', mimeType: 'image/webp', extension: 'webp' },
};

function startsWith(buf: Uint8Array, bytes: number[], offset = 0): boolean {
  if (buf.length < offset + bytes.length) return false;
  return bytes.every((byte, index) => buf[offset + index] === byte);
}

/**
 * Identifies a document from its leading bytes. Filenames and declared
 * content types are never consulted.
 */
export function sniffFileType(buf: Uint8Array): SniffResult | undefined {
  // %PDF- may follow a few bytes of junk; readers accept it within the first KiB.
  const head = Buffer.from(buf.subarray(0, 1024)).toString('latin1');
  if (head.includes('%PDF-')) return RESULTS.pdf;

  if (startsWith(buf, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return RESULTS.png;
  if (startsWith(buf, [0xff, 0xd8, 0xff])) return RESULTS.jpeg;
  if (startsWith(buf, [0x47, 0x49, 0x46, 0x38])) return RESULTS.gif;
  if (startsWith(buf, [0x42, 0x4d]) && buf.length >= 26) return RESULTS.bmp;
  if (startsWith(buf, [0x49, 0x49, 0x2a, 0x00]) || startsWith(buf, [0x4d, 0x4d, 0x00, 0x2a])) {
    return RESULTS.tiff;
  }
  if (startsWith(buf, [0x52, 0x49, 0x46, 0x46]) && startsWith(buf, [0x57, 0x45, 0x42, 0x50], 8)) {
    return RESULTS.webp;
  }

  return undefined;
}
