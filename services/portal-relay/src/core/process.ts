import { spawn } from 'child_process';

const STDERR_LIMIT = 500;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export function runCommand(bin: string, args: string[], timeoutMs = 120_000): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(bin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    // Decode across chunk boundaries; a multi-byte character may be split.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      reject(new Error(`${bin} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      if (stderr.length < STDERR_LIMIT) stderr += chunk;
    });
    child.on('error', (error) => {
      clearTimeout(timer);
      reject(new Error(`${bin} could not be started: ${error.message}`));
    });
    child.on('close', (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      reject(new Error(`${bin} exited with code ${code}: ${stderr.slice(0, STDERR_LIMIT).trim()}`));
    });
  });
}
