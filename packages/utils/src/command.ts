/**
 * Command Execution Wrapper
 * 
 * Wrapper for executing external commands with:
 * - Optional timeout
 * - Output capture (separate and combined)
 * - Streaming output callbacks
 * - Abort signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order */
  output: string;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds, 0 disables
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command
 * 
 * Resolves once the process has exited, whatever its exit code.
 * Rejects only when the process could not be spawned.
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
    onStdout,
    onStderr,
  } = options;

  const startTime = Date.now();
  let timedOut = false;
  let aborted = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let output = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    let timeoutId: NodeJS.Timeout | null = null;
    let killTimerId: NodeJS.Timeout | null = null;
    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        // Force kill after 10 seconds
        killTimerId = setTimeout(() => child.kill('SIGKILL'), 10000);
      }, timeout);
    }

    const onAbort = (): void => {
      aborted = true;
      child.kill('SIGTERM');
    };
    if (signal) {
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    const cleanup = (): void => {
      if (timeoutId) clearTimeout(timeoutId);
      if (killTimerId) clearTimeout(killTimerId);
      signal?.removeEventListener('abort', onAbort);
    };

    child.stdout?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      onStdout?.(chunk);
      if (stdoutSize < maxOutputSize) {
        stdout += chunk;
        output += chunk;
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      onStderr?.(chunk);
      if (stderrSize < maxOutputSize) {
        stderr += chunk;
        output += chunk;
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        output,
        duration: Date.now() - startTime,
        timedOut,
        aborted,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}

/**
 * Last non-empty lines of a command's output, for error details
 */
export function outputTail(output: string, lines: number = 5): string {
  return output
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .slice(-lines)
    .join('\n');
}
