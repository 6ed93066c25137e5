import { spawn } from 'child_process';
import type { CommandResult } from './executor-interface.js';

export const COMMAND_TIMEOUT_MS = 120000;

export interface RunProcessOptions {
  timeoutMs?: number;
  onOutput?: (chunk: string) => void;
}

export function runProcess(file: string, args: string[], options: RunProcessOptions = {}): Promise<CommandResult> {
  const { timeoutMs = COMMAND_TIMEOUT_MS, onOutput } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(file, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    const timeout = setTimeout(() => {
      proc.kill();
      reject(new Error(`${file} command timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    proc.stdout?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      stdout += chunk;
      onOutput?.(chunk);
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (err) => {
      clearTimeout(timeout);
      reject(err);
    });

    proc.on('close', (code) => {
      clearTimeout(timeout);
      resolve({
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        // A signal-terminated process has no exit code
        exitCode: code ?? 1,
      });
    });
  });
}
