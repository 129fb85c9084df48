import { describe, expect, it } from 'vitest';
import { sniffFileType } from './fileSniff.js';

const bytes = (...values: number[]) => Uint8Array.from(values);

describe('sniffFileType', () => {
  it('detects a PDF header after leading junk', () => {
    const buf = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('%PDF-1.7\n')]);
    expect(sniffFileType(buf)?.type).toBe('pdf');
  });

  it('detects image signatures', () => {
    expect(sniffFileType(bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0))?.extension).toBe('png');
    expect(sniffFileType(bytes(0xff, 0xd8, 0xff, 0xe0))?.extension).toBe('jpg');
    expect(sniffFileType(Buffer.from('GIF89a'))?.type).toBe('gif');
    expect(sniffFileType(bytes(0x49, 0x49, 0x2a, 0x00))?.type).toBe('tiff');
    expect(sniffFileType(Buffer.from('RIFF\0\0\0\0WEBPVP8 '))?.mimeType).toBe('image/webp');
  });

  it('requires a full BMP header', () => {
    expect(sniffFileType(Buffer.from('BM'))).toBeUndefined();
    expect(sniffFileType(Buffer.concat([Buffer.from('BM'), Buffer.alloc(24)]))?.type).toBe('bmp');
  });

  it('ignores content it does not know', () => {
    expect(sniffFileType(Buffer.from('<html><body>nope</body></html>'))).toBeUndefined();
    expect(sniffFileType(new Uint8Array())).toBeUndefined();
  });
});
