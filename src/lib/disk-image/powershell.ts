import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';

export class PowerShellExecError extends Error {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, input: { exitCode: number | null; stdout: string; stderr: string }) {
    super(message);
    this.name = 'PowerShellExecError';
    this.exitCode = input.exitCode;
    this.stdout = input.stdout;
    this.stderr = input.stderr;
  }
}

export class PowerShellParseError extends Error {
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, input: { stdout: string; stderr: string }) {
    super(message);
    this.name = 'PowerShellParseError';
    this.stdout = input.stdout;
    this.stderr = input.stderr;
  }
}

function excerpt(text: string, limit = 2000): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

/**
 * Runs an inline PowerShell command and parses its stdout as JSON.
 *
 * The child is killed on `timeoutMs` or when `signal` aborts, whichever comes first.
 */
export async function runPowerShellJson(args: {
  powershellExe?: string;
  command: string;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<unknown> {
  const powershellExe = args.powershellExe ?? 'powershell.exe';
  if (args.signal?.aborted) {
    throw new PowerShellExecError('powershell aborted', { exitCode: null, stdout: '', stderr: '' });
  }

  let child: ChildProcessByStdio<null, Readable, Readable>;
  try {
    child = spawn(powershellExe, ['-NoProfile', '-NonInteractive', '-Command', args.command], {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
  } catch (err) {
    throw new PowerShellExecError('powershell spawn failed', {
      exitCode: null,
      stdout: '',
      stderr: excerpt(err instanceof Error ? err.message : String(err)),
    });
  }

  let stdout = '';
  let stderr = '';

  child.stdout.on('data', (buf: Buffer) => {
    stdout += buf.toString('utf8');
  });
  child.stderr.on('data', (buf: Buffer) => {
    stderr += buf.toString('utf8');
  });

  const kill: { reason: 'timeout' | 'abort' | null } = { reason: null };
  const stop = (reason: 'timeout' | 'abort') => {
    if (kill.reason) return;
    kill.reason = reason;
    child.kill('SIGKILL');
  };
  const timeout = setTimeout(() => stop('timeout'), args.timeoutMs);
  const onAbort = () => stop('abort');
  args.signal?.addEventListener('abort', onAbort, { once: true });

  const exit = await new Promise<{ exitCode: number | null; spawnError?: unknown }>((resolve) => {
    let done = false;
    const finish = (value: { exitCode: number | null; spawnError?: unknown }) => {
      if (done) return;
      done = true;
      resolve(value);
    };
    child.on('error', (err) => finish({ exitCode: null, spawnError: err }));
    child.on('close', (code) => finish({ exitCode: code ?? null }));
  });

  clearTimeout(timeout);
  args.signal?.removeEventListener('abort', onAbort);

  if (exit.spawnError) {
    throw new PowerShellExecError('powershell failed to start', {
      exitCode: null,
      stdout: excerpt(stdout),
      stderr: excerpt(exit.spawnError instanceof Error ? exit.spawnError.message : String(exit.spawnError)),
    });
  }

  if (kill.reason) {
    throw new PowerShellExecError(kill.reason === 'timeout' ? 'powershell timed out' : 'powershell aborted', {
      exitCode: exit.exitCode ?? -1,
      stdout: excerpt(stdout),
      stderr: excerpt(stderr),
    });
  }

  if (exit.exitCode !== 0) {
    throw new PowerShellExecError('powershell exited non-zero', {
      exitCode: exit.exitCode,
      stdout: excerpt(stdout),
      stderr: excerpt(stderr),
    });
  }

  const text = stdout.trim();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    throw new PowerShellParseError('powershell output is not valid json', {
      stdout: excerpt(stdout),
      stderr: excerpt(stderr),
    });
  }
}
