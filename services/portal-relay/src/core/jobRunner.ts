import { randomUUID } from 'crypto';
import type { DebugBucketIndex, DebugSessionDetail } from './debugBuckets.js';
import { AutomationError, errorMessage, RelayError } from './errors.js';
import type { Workspace, WorkspaceManager } from './workspace.js';

export type JobKind = 'report' | 'cookies' | 'pdf_to_images' | 'ocr';

export type JobState = 'created' | 'workspace_ready' | 'running' | 'succeeded' | 'failed';

export interface JobTransition {
  jobId: string;
  kind: JobKind;
  from: JobState;
  to: JobState;
}

export interface JobDefinition<TResult, TOutput> {
  kind: JobKind;
  /** The single external call. Never retried. */
  execute(workspace: Workspace): Promise<TResult>;
  /** Relocates whatever `execute` produced out of the workspace. */
  finalize(result: TResult, workspace: Workspace): Promise<TOutput>;
  wrapError?(error: unknown): RelayError;
}

export interface JobRunnerDeps {
  workspaces: WorkspaceManager;
  debug: DebugBucketIndex;
  onTransition?: (transition: JobTransition) => void;
}

function defaultWrapError(error: unknown): RelayError {
  if (error instanceof RelayError) return error;
  return new AutomationError(errorMessage(error, 'Automation failed'));
}

export function debugBlock(session: DebugSessionDetail, debugUrl: string): Record<string, unknown> {
  return {
    debug_id: session.debug_id,
    debug_url: debugUrl,
    files: session.files.map((file) => ({ name: file.name, url: file.url, type: file.type, size: file.size })),
  };
}

/**
 * Drives one job from workspace allocation to a terminal state.
 *
 * The workspace is released on every exit path. On failure the diagnostic
 * files the job reported are copied into a debug session before release,
 * and the session is referenced from the error's `details.debug`.
 */
export class JobRunner {
  constructor(private readonly deps: JobRunnerDeps) {}

  async run<TResult, TOutput>(job: JobDefinition<TResult, TOutput>): Promise<TOutput> {
    const jobId = randomUUID();
    let state: JobState = 'created';
    const move = (to: JobState) => {
      const transition: JobTransition = { jobId, kind: job.kind, from: state, to };
      state = to;
      // eslint-disable-next-line no-console
      console.log(`[portal-relay] job_id=${jobId} kind=${job.kind} ${transition.from}->${to}`);
      this.deps.onTransition?.(transition);
    };

    let workspace: Workspace;
    try {
      workspace = await this.deps.workspaces.acquire();
    } catch (error) {
      move('failed');
      throw defaultWrapError(error);
    }
    move('workspace_ready');

    try {
      move('running');
      const result = await job.execute(workspace);
      const output = await job.finalize(result, workspace);
      move('succeeded');
      return output;
    } catch (error) {
      const failure = (job.wrapError ?? defaultWrapError)(error);
      const session = await this.salvage(jobId, workspace);
      if (session) {
        failure.attachDetails({ debug: debugBlock(session, `/debug/${session.debug_id}`) });
      }
      // eslint-disable-next-line no-console
      console.error(
        `[portal-relay] job_id=${jobId} kind=${job.kind} failed code=${failure.code} error=${failure.message}` +
          (session ? ` debug_id=${session.debug_id}` : ''),
      );
      move('failed');
      throw failure;
    } finally {
      await this.deps.workspaces.release(workspace);
    }
  }

  private async salvage(jobId: string, workspace: Workspace): Promise<DebugSessionDetail | undefined> {
    try {
      return await this.deps.debug.createSession(workspace.diagnosticFiles());
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error(`[portal-relay] job_id=${jobId} diagnostics salvage failed error=${errorMessage(error)}`);
      return undefined;
    }
  }
}
