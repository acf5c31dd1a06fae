import { spawn } from 'child_process';
import { ExternalToolError } from '../errors';

export interface ToolRunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ToolRunResult {
  stdout: string;
  stderr: string;
}

export type ToolRunner = (command: string, args: string[], options?: ToolRunOptions) => Promise<ToolRunResult>;

const MAX_CAPTURE = 64 * 1024;

/**
 * Run an external program without a shell. Non-zero exit, spawn errors and
 * timeouts reject with ExternalToolError.
 */
export const runTool: ToolRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          proc.kill('SIGKILL');
        }, options.timeoutMs)
      : null;

    const finish = (error: ExternalToolError | null) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (error) reject(error);
      else resolve({ stdout, stderr });
    };

    proc.stdout.on('data', (chunk: Buffer) => {
      if (stdout.length < MAX_CAPTURE) stdout += chunk.toString();
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      if (stderr.length < MAX_CAPTURE) stderr += chunk.toString();
    });

    proc.on('error', err => {
      finish(new ExternalToolError(command, `failed to start: ${err.message}`, { stderr }, { cause: err }));
    });

    proc.on('close', code => {
      if (timedOut) {
        finish(new ExternalToolError(command, `timed out after ${options.timeoutMs}ms`, { timedOut: true, stderr }));
      } else if (code !== 0) {
        finish(new ExternalToolError(command, `exited with code ${code}: ${stderr.trim()}`, { exitCode: code, stderr }));
      } else {
        finish(null);
      }
    });
  });
