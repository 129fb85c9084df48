import { writeFile } from 'fs/promises';
import { DownloadError, errorMessage } from './errors.js';
import { sniffFileType, type SniffResult } from './fileSniff.js';
import type { Workspace } from './workspace.js';

export interface DownloadOptions {
  timeoutMs: number;
  maxBytes: number;
}

export interface DownloadedSource {
  path: string;
  sizeBytes: number;
  /** Undefined when the leading bytes match no supported format. */
  sniffed: SniffResult | undefined;
}

async function readCapped(response: Response, maxBytes: number): Promise<Buffer> {
  const declared = Number.parseInt(response.headers.get('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    throw new DownloadError(`Source exceeds ${maxBytes} bytes`, { content_length: declared });
  }

  if (!response.body) return Buffer.alloc(0);

  const reader = response.body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    if (!value) continue;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new DownloadError(`Source exceeds ${maxBytes} bytes`);
    }
    chunks.push(Buffer.from(value));
  }
  return Buffer.concat(chunks);
}

/**
 * Fetches a caller-supplied URL into the workspace. Every failure is the
 * caller's input problem and surfaces as `DownloadError`.
 */
export async function downloadToWorkspace(
  url: URL,
  workspace: Workspace,
  baseName: string,
  options: DownloadOptions,
): Promise<DownloadedSource> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url.toString(), { signal: controller.signal, redirect: 'follow' });
    if (!response.ok) {
      throw new DownloadError(`Failed to download source: HTTP ${response.status}`, {
        url: url.toString(),
        status_code: response.status,
      });
    }

    const data = await readCapped(response, options.maxBytes);
    if (data.byteLength === 0) {
      throw new DownloadError('Downloaded source is empty', { url: url.toString() });
    }

    const sniffed = sniffFileType(data);
    const path = workspace.path(`${baseName}.${sniffed?.extension ?? 'bin'}`);
    await writeFile(path, data);

    return { path, sizeBytes: data.byteLength, sniffed };
  } catch (error) {
    if (error instanceof DownloadError) throw error;
    const reason = controller.signal.aborted ? `timed out after ${options.timeoutMs}ms` : errorMessage(error);
    throw new DownloadError(`Failed to download source: ${reason}`, { url: url.toString() });
  } finally {
    clearTimeout(timer);
  }
}
