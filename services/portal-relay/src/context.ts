import { ArtifactRegistry } from './core/artifactRegistry.js';
import { DebugBucketIndex } from './core/debugBuckets.js';
import { ExpiryScheduler } from './core/expiryScheduler.js';
import { JobRunner, type JobTransition } from './core/jobRunner.js';
import { Jobs } from './core/jobs.js';
import { WorkspaceManager } from './core/workspace.js';
import type { ServiceConfig } from './config.js';
import type { AppContext, ServiceSettings } from './types/appContext.js';
import type { CookieAutomation, ReportAutomation } from './types/automation.js';
import type { DocumentConverter } from './types/converter.js';

export interface AppContextOptions {
  settings: ServiceSettings;
  reports: ReportAutomation;
  cookies: CookieAutomation;
  converter: DocumentConverter;
  now?: () => number;
  onTransition?: (transition: JobTransition) => void;
}

export function settingsFromConfig(config: ServiceConfig): ServiceSettings {
  return {
    publicBaseUrl: config.publicBaseUrl,
    masterApiKey: config.masterApiKey,
    workDir: config.workDir,
    reportsDir: config.reportsDir,
    imagesDir: config.imagesDir,
    debugDir: config.debugDir,
    artifactTtlSeconds: config.artifactTtlSeconds,
    imageTtlSeconds: config.imageTtlSeconds,
    directDownloadGraceSeconds: config.directDownloadGraceSeconds,
    debugRetentionHours: config.debugRetentionHours,
    debugMaxSessions: config.debugMaxSessions,
    pdfRenderDpi: config.pdfRenderDpi,
    ocrLanguage: config.ocrLanguage,
    fetchTimeoutMs: config.fetchTimeoutMs,
    maxDownloadBytes: config.maxDownloadBytes,
    defaultCredentials: {
      companyCode: config.defaultCompanyCode,
      username: config.defaultUsername,
      password: config.defaultPassword,
    },
  };
}

/** Wires the stores, the job runner and the providers around one settings object. */
export function createAppContext(options: AppContextOptions): AppContext {
  const { settings } = options;
  const scheduler = new ExpiryScheduler();
  const registry = new ArtifactRegistry({ scheduler, now: options.now });
  const workspaces = new WorkspaceManager(settings.workDir);
  const debug = new DebugBucketIndex({
    rootDir: settings.debugDir,
    publicUrl: `${settings.publicBaseUrl}/files/debug`,
    maxSessions: settings.debugMaxSessions,
    retentionHours: settings.debugRetentionHours,
    now: options.now,
  });
  const runner = new JobRunner({ workspaces, debug, onTransition: options.onTransition });
  const jobs = new Jobs({
    runner,
    registry,
    scheduler,
    reports: options.reports,
    cookies: options.cookies,
    converter: options.converter,
    settings,
  });

  return {
    settings,
    jobs,
    registry,
    scheduler,
    workspaces,
    debug,
    providers: {
      reports: options.reports.name,
      cookies: options.cookies.name,
      converter: options.converter.name,
    },
  };
}
