/**
 * @fileoverview External process execution
 *
 * Sync shells out to an external command. The runner is an interface so
 * tests can substitute a fake.
 */

import { spawn } from 'child_process';

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Signal that ended the process, e.g. on timeout */
  signal?: NodeJS.Signals;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], timeoutMs?: number): Promise<ProcessResult>;
}

/**
 * Runs commands with child_process.spawn, stdin closed
 */
export class SystemProcessRunner implements ProcessRunner {
  constructor(private defaultTimeout: number = 60_000) {}

  run(command: string, args: readonly string[], timeoutMs?: number): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        timeout: timeoutMs ?? this.defaultTimeout,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code, signal) => {
        const result: ProcessResult = { exitCode: code ?? -1, stdout: stdout.trim(), stderr: stderr.trim() };
        if (signal) result.signal = signal;
        resolve(result);
      });

      proc.on('error', (error) => {
        reject(error);
      });
    });
  }
}
