import { sweepDirectory } from './artifacts.js';
import type { DebugBucketIndex } from './debugBuckets.js';
import type { WorkspaceManager } from './workspace.js';

export interface StoreSweepTargets {
  workspaces: WorkspaceManager;
  debug: DebugBucketIndex;
  reportsDir: string;
  imagesDir: string;
  artifactTtlSeconds: number;
  imageTtlSeconds: number;
}

export interface SweepCounts {
  workspaces: number;
  reports: number;
  images: number;
  debugSessions: number;
}

/**
 * Clears what a previous process left behind. The artifact registry does
 * not survive a restart, so every stored report is unreachable and goes.
 */
export async function sweepOnStartup(targets: StoreSweepTargets, now = Date.now()): Promise<SweepCounts> {
  return {
    workspaces: await targets.workspaces.sweep(),
    reports: await sweepDirectory(targets.reportsDir, 0, now),
    images: await sweepDirectory(targets.imagesDir, targets.imageTtlSeconds * 1000, now),
    debugSessions: await targets.debug.prune(),
  };
}

/** Catches files whose expiry timers were lost. Live workspaces are left alone. */
export async function sweepExpired(targets: StoreSweepTargets, now = Date.now()): Promise<Omit<SweepCounts, 'workspaces'>> {
  return {
    reports: await sweepDirectory(targets.reportsDir, targets.artifactTtlSeconds * 1000, now),
    images: await sweepDirectory(targets.imagesDir, targets.imageTtlSeconds * 1000, now),
    debugSessions: await targets.debug.prune(),
  };
}

export function startStoreSweepLoop(targets: StoreSweepTargets, intervalMs: number): { stop: () => void } {
  const timer = setInterval(async () => {
    try {
      const counts = await sweepExpired(targets);
      const total = counts.reports + counts.images + counts.debugSessions;
      if (total > 0) {
        // eslint-disable-next-line no-console
        console.log(
          `[portal-relay] swept reports=${counts.reports} images=${counts.images} debug_sessions=${counts.debugSessions}`,
        );
      }
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[portal-relay] store sweep failed', error);
    }
  }, intervalMs);
  timer.unref();

  return {
    stop: () => clearInterval(timer),
  };
}
