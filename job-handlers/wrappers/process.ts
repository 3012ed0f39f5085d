import { spawn } from 'child_process';

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

interface RunOptions {
  timeoutMs: number;
  cwd?: string;
}

/**
 * Spawn an external tool and collect its output.
 * Never rejects for a non-zero exit; callers decide what the exit status means.
 * Rejects only when the binary could not be started at all.
 */
export function runProcess(command: string, args: string[], options: RunOptions) {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      killSignal: 'SIGKILL',
    });
    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (msg: Buffer) => {
      stdout += msg.toString();
    });
    child.stderr.on('data', (msg: Buffer) => {
      stderr += msg.toString();
    });
    child.on('error', (err) => {
      reject(err);
    });
    child.on('close', (code, signal) => {
      resolve({
        code,
        stdout,
        stderr,
        timedOut: code === null && signal === 'SIGKILL',
      });
    });
  });
}
