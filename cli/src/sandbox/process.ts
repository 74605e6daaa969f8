/**
 * Bounded Process Spawning
 *
 * Runs a program from an argument vector (never through a shell) with:
 * - its own process group, so a timeout takes down every descendant
 * - SIGTERM to the group on timeout, SIGKILL after a grace period
 * - stdout/stderr captured up to a byte limit each
 * - launch failures reported in the result instead of thrown
 */

import { spawn, type ChildProcess } from 'node:child_process';

export interface BoundedSpawnOptions {
  timeoutMs: number;
  maxOutputBytes: number;
  killGraceMs: number;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface BoundedSpawnResult {
  pid: number | null;
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  truncated: boolean;
  error?: string;
}

export interface DetachedSpawnResult {
  pid: number | null;
  durationMs: number;
  error?: string;
}

class CappedBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    if (kept.length < chunk.length) this.truncated = true;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

export function spawnBounded(argv: readonly string[], options: BoundedSpawnOptions): Promise<BoundedSpawnResult> {
  const started = performance.now();
  const [file, ...args] = argv;

  if (!file) {
    return Promise.resolve({
      pid: null,
      exitCode: null,
      signal: null,
      stdout: '',
      stderr: '',
      durationMs: 0,
      timedOut: false,
      truncated: false,
      error: 'Empty argument vector',
    });
  }

  return new Promise<BoundedSpawnResult>((resolve) => {
    const stdout = new CappedBuffer(options.maxOutputBytes);
    const stderr = new CappedBuffer(options.maxOutputBytes);
    let timedOut = false;
    let settled = false;
    let exitInfo: { code: number | null; signal: string | null } | null = null;
    let stdinError: string | undefined;
    let graceTimer: NodeJS.Timeout | undefined;
    let deadlineTimer: NodeJS.Timeout | undefined;

    const child = spawn(file, args, {
      stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      detached: true,
      shell: false,
      env: options.env ?? process.env,
      cwd: options.cwd,
    });

    const finish = (code: number | null, signal: string | null, error?: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(graceTimer);
      clearTimeout(deadlineTimer);
      if (timedOut) killGroup(child, 'SIGKILL');
      resolve({
        pid: child.pid ?? null,
        exitCode: timedOut ? null : code,
        signal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        durationMs: Math.round(performance.now() - started),
        timedOut,
        truncated: stdout.truncated || stderr.truncated,
        error: error ?? stdinError,
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup(child, 'SIGTERM');
      graceTimer = setTimeout(() => {
        killGroup(child, 'SIGKILL');
        // A descendant outside the group may still hold the pipes open.
        deadlineTimer = setTimeout(() => {
          child.stdout?.destroy();
          child.stderr?.destroy();
          finish(exitInfo?.code ?? null, exitInfo?.signal ?? 'SIGKILL');
        }, options.killGraceMs);
      }, options.killGraceMs);
    }, options.timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    if (options.input !== undefined && child.stdin) {
      child.stdin.on('error', (err) => {
        stdinError = `stdin: ${err.message}`;
      });
      child.stdin.end(options.input);
    }

    child.on('exit', (code, signal) => {
      exitInfo = { code, signal };
    });

    child.on('close', (code, signal) => {
      finish(code, signal);
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      // Emitted without a pid when the program could not be launched.
      if (child.pid === undefined) {
        const detail = err.code === 'ENOENT' ? `Program not found: ${file}` : `Failed to start ${file}: ${err.message}`;
        stderr.push(Buffer.from(detail));
        finish(null, null, detail);
      }
    });
  });
}

/**
 * Launch a program in its own session and return once it has started.
 * Used for desktop applications that are expected to keep running.
 */
export function spawnDetached(argv: readonly string[]): Promise<DetachedSpawnResult> {
  const started = performance.now();
  const [file, ...args] = argv;

  if (!file) {
    return Promise.resolve({ pid: null, durationMs: 0, error: 'Empty argument vector' });
  }

  return new Promise<DetachedSpawnResult>((resolve) => {
    const child = spawn(file, args, {
      stdio: 'ignore',
      detached: true,
      shell: false,
    });

    child.once('spawn', () => {
      child.unref();
      resolve({ pid: child.pid ?? null, durationMs: Math.round(performance.now() - started) });
    });

    child.once('error', (err: NodeJS.ErrnoException) => {
      const detail = err.code === 'ENOENT' ? `Program not found: ${file}` : `Failed to start ${file}: ${err.message}`;
      resolve({ pid: null, durationMs: Math.round(performance.now() - started), error: detail });
    });
  });
}

function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code !== 'ESRCH') {
      child.kill(signal);
    }
  }
}
