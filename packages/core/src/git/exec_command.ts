import { spawn } from 'child_process';
import type { ExecCommandFn, ExecOptions, ExecResult } from './types';

/**
 * Creates an ExecCommandFn backed by `child_process.spawn`.
 *
 * Never rejects: spawn failures resolve with exit code 1 and the error
 * message as stderr. A process killed by a signal also reports exit code 1.
 */
export function createExecCommand(defaultCwd: string = process.cwd()): ExecCommandFn {
  return (command: string, args: string[], options?: ExecOptions) => {
    return new Promise<ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd ?? defaultCwd,
        env: { ...process.env, ...options?.env },
      });

      let stdout = '';
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code: number | null) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      proc.on('error', (error: Error) => {
        resolve({ exitCode: 1, stdout, stderr: error.message });
      });
    });
  };
}
