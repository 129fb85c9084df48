import 'dotenv/config';
import { join, resolve } from 'path';

const DEFAULT_PORT = 8000;

type AutomationProviderName = 'playwright' | 'mock';
type ConverterProviderName = 'cli' | 'mock';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function boolFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase().trim();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return fallback;
}

function oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[name];
  if (!raw) return fallback;
  const match = allowed.find((value) => value === raw.trim());
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(', ')} (got "${raw}")`);
  }
  return match;
}

const port = intFromEnv('PORT', DEFAULT_PORT);
const dataDir = resolve(process.cwd(), process.env.DATA_DIR || 'data');

export const config = {
  port,
  publicBaseUrl: (process.env.PUBLIC_BASE_URL || `http://localhost:${port}`).replace(/\/+$/, ''),
  masterApiKey: process.env.MASTER_API_KEY || '',
  dataDir,
  workDir: join(dataDir, 'work'),
  reportsDir: join(dataDir, 'reports'),
  imagesDir: join(dataDir, 'images'),
  debugDir: join(dataDir, 'debug'),
  artifactTtlSeconds: intFromEnv('ARTIFACT_TTL_SECONDS', 3600),
  imageTtlSeconds: intFromEnv('IMAGE_TTL_SECONDS', 3600),
  directDownloadGraceSeconds: intFromEnv('DIRECT_DOWNLOAD_GRACE_SECONDS', 60),
  debugRetentionHours: intFromEnv('DEBUG_RETENTION_HOURS', 168),
  debugMaxSessions: intFromEnv('DEBUG_MAX_SESSIONS', 50),
  storeSweepIntervalMs: intFromEnv('STORE_SWEEP_INTERVAL_MS', 30 * 60 * 1000),
  automationProvider: oneOf<AutomationProviderName>('AUTOMATION_PROVIDER', ['playwright', 'mock'], 'playwright'),
  converterProvider: oneOf<ConverterProviderName>('CONVERTER_PROVIDER', ['cli', 'mock'], 'cli'),
  chromiumPath: process.env.CHROMIUM_PATH || '',
  browserHeadless: boolFromEnv('BROWSER_HEADLESS', true),
  pageLoadTimeoutMs: intFromEnv('PAGE_LOAD_TIMEOUT_MS', 30_000),
  elementTimeoutMs: intFromEnv('ELEMENT_TIMEOUT_MS', 10_000),
  downloadTimeoutMs: intFromEnv('DOWNLOAD_TIMEOUT_MS', 30_000),
  sekureIdBaseUrl: (process.env.SEKUREID_BASE_URL || 'https://cloud.sekure-id.com').replace(/\/+$/, ''),
  vollnaBaseUrl: (process.env.VOLLNA_BASE_URL || 'https://www.vollna.com').replace(/\/+$/, ''),
  defaultCompanyCode: process.env.DEFAULT_COMPANY_CODE || '',
  defaultUsername: process.env.DEFAULT_USERNAME || '',
  defaultPassword: process.env.DEFAULT_PASSWORD || '',
  fetchTimeoutMs: intFromEnv('FETCH_TIMEOUT_MS', 60_000),
  maxDownloadBytes: intFromEnv('MAX_DOWNLOAD_BYTES', 50 * 1024 * 1024),
  pdfRenderDpi: intFromEnv('PDF_RENDER_DPI', 200),
  ocrLanguage: process.env.OCR_LANGUAGE || 'eng',
  pdftoppmBin: process.env.PDFTOPPM_BIN || 'pdftoppm',
  tesseractBin: process.env.TESSERACT_BIN || 'tesseract',
} as const;

export type ServiceConfig = typeof config;
