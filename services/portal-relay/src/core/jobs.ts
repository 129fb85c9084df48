import { randomUUID } from 'crypto';
import { copyFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import type { CookieAutomation, ReportAutomation, ReportRequest } from '../types/automation.js';
import type { DocumentConverter } from '../types/converter.js';
import type { Artifact, ArtifactRegistry } from './artifactRegistry.js';
import { collisionFreeName, fileExists, moveIntoStore } from './artifacts.js';
import { downloadToWorkspace } from './download.js';
import { AutomationError, ConversionError, errorMessage, RelayError, ValidationError } from './errors.js';
import type { ExpiryScheduler } from './expiryScheduler.js';
import type { JobRunner } from './jobRunner.js';
import { parseSourceUrl } from './validation.js';
import type { Workspace } from './workspace.js';

const LANGUAGE_PATTERN = /^[A-Za-z_]{3,16}(\+[A-Za-z_]{3,16})*$/;

export interface JobSettings {
  publicBaseUrl: string;
  reportsDir: string;
  imagesDir: string;
  artifactTtlSeconds: number;
  imageTtlSeconds: number;
  directDownloadGraceSeconds: number;
  pdfRenderDpi: number;
  ocrLanguage: string;
  fetchTimeoutMs: number;
  maxDownloadBytes: number;
}

export interface JobsDeps {
  runner: JobRunner;
  registry: ArtifactRegistry;
  scheduler: ExpiryScheduler;
  reports: ReportAutomation;
  cookies: CookieAutomation;
  converter: DocumentConverter;
  settings: JobSettings;
}

export interface ReportLink {
  report_url: string;
  file_id: string;
  report_date: string;
  generated_at: string;
  expires_in: number;
}

export interface ReportFile {
  path: string;
  filename: string;
  report_date: string;
}

export interface CookieResult {
  cookies: string;
  cookie_count: number;
  extracted_at: string;
}

export interface ConvertedPage {
  page: number;
  url: string;
  filename: string;
}

export interface PdfConversionResult {
  images: ConvertedPage[];
  total_pages: number;
  conversion_id: string;
  generated_at: string;
  expires_in: number;
}

export type ExtractionMethod = 'tesseract-ocr' | 'pdf-text-layer' | 'pdf-ocr';

export interface TextExtractionResult {
  text: string;
  language: string;
  extraction_method: ExtractionMethod;
  source_type: 'image' | 'pdf';
  total_pages: number;
  extracted_at: string;
  request_id: string;
}

function conversionFailure(error: unknown): RelayError {
  if (error instanceof RelayError) return error;
  return new ConversionError(errorMessage(error, 'Conversion failed'));
}

export function attachmentName(reportDate: string): string {
  return `attendance_report_${reportDate}.xlsx`;
}

export class Jobs {
  constructor(private readonly deps: JobsDeps) {}

  /** Runs the report automation and registers the spreadsheet for later download. */
  generateReport(request: ReportRequest): Promise<ReportLink> {
    const { settings } = this.deps;
    return this.deps.runner.run({
      kind: 'report',
      execute: (workspace) => this.deps.reports.generateReport(request, workspace),
      finalize: async (downloaded) => {
        const stored = await this.storeReport(downloaded);
        const fileId = randomUUID();
        let artifact: Artifact;
        try {
          artifact = this.deps.registry.register(fileId, stored, request.reportDate, settings.artifactTtlSeconds);
        } catch (error) {
          await rm(stored, { force: true });
          throw error;
        }
        return {
          report_url: `${settings.publicBaseUrl}/download/${fileId}`,
          file_id: fileId,
          report_date: artifact.logical_date,
          generated_at: artifact.created_at,
          expires_in: settings.artifactTtlSeconds,
        };
      },
    });
  }

  /**
   * Runs the report automation for a response that carries the file itself.
   * The stored copy is never registered; call `releaseReportFile` once the
   * response is done with it.
   */
  generateReportFile(request: ReportRequest): Promise<ReportFile> {
    return this.deps.runner.run({
      kind: 'report',
      execute: (workspace) => this.deps.reports.generateReport(request, workspace),
      finalize: async (downloaded) => ({
        path: await this.storeReport(downloaded),
        filename: attachmentName(request.reportDate),
        report_date: request.reportDate,
      }),
    });
  }

  releaseReportFile(path: string): void {
    this.deps.scheduler.schedule(
      this.deps.settings.directDownloadGraceSeconds * 1000,
      () => rm(path, { force: true }),
      'direct report removal',
    );
  }

  extractCookies(request: { email: string; password: string; finalUrl: string }): Promise<CookieResult> {
    return this.deps.runner.run({
      kind: 'cookies',
      execute: (workspace) => this.deps.cookies.extractCookies(request, workspace),
      finalize: async (cookies) => ({
        cookies: cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; '),
        cookie_count: cookies.length,
        extracted_at: new Date().toISOString(),
      }),
    });
  }

  async convertPdfToImages(input: { pdfUrl: unknown; dpi?: number }): Promise<PdfConversionResult> {
    const { settings } = this.deps;
    const source = parseSourceUrl(input.pdfUrl, 'pdf_url');
    const dpi = input.dpi ?? settings.pdfRenderDpi;

    return this.deps.runner.run({
      kind: 'pdf_to_images',
      execute: async (workspace) => {
        const pdfPath = await this.downloadPdf(source, workspace);
        return this.deps.converter.pdfToImages(pdfPath, workspace, { dpi });
      },
      finalize: async (pages) => {
        if (pages.length === 0) {
          throw new ConversionError('PDF produced no pages');
        }

        const conversionId = randomUUID();
        const dir = join(settings.imagesDir, conversionId);
        await mkdir(dir, { recursive: true });
        this.deps.scheduler.schedule(
          settings.imageTtlSeconds * 1000,
          () => rm(dir, { recursive: true, force: true }),
          `image set removal conversion_id=${conversionId}`,
        );

        const images: ConvertedPage[] = [];
        try {
          for (const [index, pagePath] of pages.entries()) {
            const filename = `${conversionId}_page_${index + 1}.png`;
            await copyFile(pagePath, join(dir, filename));
            images.push({
              page: index + 1,
              url: `${settings.publicBaseUrl}/files/images/${conversionId}/${filename}`,
              filename,
            });
          }
        } catch (error) {
          await rm(dir, { recursive: true, force: true });
          throw error;
        }

        return {
          images,
          total_pages: images.length,
          conversion_id: conversionId,
          generated_at: new Date().toISOString(),
          expires_in: settings.imageTtlSeconds,
        };
      },
      wrapError: conversionFailure,
    });
  }

  async extractText(input: { url: unknown; language?: string }): Promise<TextExtractionResult> {
    const { settings } = this.deps;
    const source = parseSourceUrl(input.url, 'url');
    const language = input.language ?? settings.ocrLanguage;
    if (!LANGUAGE_PATTERN.test(language)) {
      throw new ValidationError('language must be a tesseract language code such as "eng" or "eng+deu"');
    }

    return this.deps.runner.run({
      kind: 'ocr',
      execute: (workspace) => this.extract(source, language, workspace),
      finalize: async (result, workspace) => ({
        ...result,
        language,
        extracted_at: new Date().toISOString(),
        request_id: workspace.id,
      }),
      wrapError: conversionFailure,
    });
  }

  private async extract(
    source: URL,
    language: string,
    workspace: Workspace,
  ): Promise<Pick<TextExtractionResult, 'text' | 'extraction_method' | 'source_type' | 'total_pages'>> {
    const { settings, converter } = this.deps;
    const downloaded = await downloadToWorkspace(source, workspace, 'source', {
      timeoutMs: settings.fetchTimeoutMs,
      maxBytes: settings.maxDownloadBytes,
    });

    if (!downloaded.sniffed) {
      throw new ValidationError('Unsupported file type. Expected a PDF or an image', { url: source.toString() });
    }

    if (downloaded.sniffed.kind === 'image') {
      const text = await converter.imageToText(downloaded.path, language);
      return { text, extraction_method: 'tesseract-ocr', source_type: 'image', total_pages: 1 };
    }

    const layer = await converter.pdfText(downloaded.path);
    if (layer.text.trim().length > 0) {
      return { text: layer.text, extraction_method: 'pdf-text-layer', source_type: 'pdf', total_pages: layer.pages };
    }

    const pages = await converter.pdfToImages(downloaded.path, workspace, { dpi: settings.pdfRenderDpi });
    const texts: string[] = [];
    for (const page of pages) {
      texts.push(await converter.imageToText(page, language));
    }
    return {
      text: texts.map((text) => text.trim()).filter(Boolean).join('\n\n'),
      extraction_method: 'pdf-ocr',
      source_type: 'pdf',
      total_pages: pages.length,
    };
  }

  private async downloadPdf(source: URL, workspace: Workspace): Promise<string> {
    const downloaded = await downloadToWorkspace(source, workspace, 'source', {
      timeoutMs: this.deps.settings.fetchTimeoutMs,
      maxBytes: this.deps.settings.maxDownloadBytes,
    });
    if (downloaded.sniffed?.kind !== 'pdf') {
      throw new ValidationError('Downloaded file is not a PDF', { url: source.toString() });
    }
    return downloaded.path;
  }

  private async storeReport(downloaded: string): Promise<string> {
    if (!(await fileExists(downloaded))) {
      throw new AutomationError('Report generation failed - file not found', 'REPORT_FILE_MISSING');
    }
    return moveIntoStore(downloaded, this.deps.settings.reportsDir, collisionFreeName(downloaded, 'xlsx'));
  }
}
