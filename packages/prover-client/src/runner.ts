import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started or was killed on timeout. */
  error?: Error;
}

export interface RunOptions {
  timeoutMs: number;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<CommandResult>;
}

/**
 * Runs the command without a shell and resolves once it has exited. A
 * process still running after `timeoutMs` is sent SIGTERM.
 */
export const spawnRunner: CommandRunner = {
  run(command, args, options) {
    return new Promise((resolve) => {
      const proc = spawn(command, [...args], {
        stdio: ['ignore', 'pipe', 'pipe'],
        timeout: options.timeoutMs,
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const settle = (result: CommandResult) => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      // A binary that cannot be started may never emit 'close'.
      proc.on('error', (err) => {
        settle({ exitCode: null, signal: null, stdout, stderr, error: err });
      });

      proc.on('close', (code, signal) => {
        const timedOut = code === null && signal === 'SIGTERM';
        settle({
          exitCode: code,
          signal,
          stdout,
          stderr,
          ...(timedOut && { error: new Error(`${command} timed out after ${options.timeoutMs}ms`) }),
        });
      });
    });
  },
};
