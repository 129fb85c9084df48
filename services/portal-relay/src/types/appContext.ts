import type { ArtifactRegistry } from '../core/artifactRegistry.js';
import type { DebugBucketIndex } from '../core/debugBuckets.js';
import type { ExpiryScheduler } from '../core/expiryScheduler.js';
import type { Jobs, JobSettings } from '../core/jobs.js';
import type { WorkspaceManager } from '../core/workspace.js';

export interface DefaultCredentials {
  companyCode: string;
  username: string;
  password: string;
}

export interface ServiceSettings extends JobSettings {
  masterApiKey: string;
  workDir: string;
  debugDir: string;
  debugRetentionHours: number;
  debugMaxSessions: number;
  defaultCredentials: DefaultCredentials;
}

export interface AppContext {
  settings: ServiceSettings;
  jobs: Jobs;
  registry: ArtifactRegistry;
  scheduler: ExpiryScheduler;
  workspaces: WorkspaceManager;
  debug: DebugBucketIndex;
  providers: {
    reports: string;
    cookies: string;
    converter: string;
  };
}
