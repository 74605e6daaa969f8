import fs from 'node:fs';
import { setTimeout as delay } from 'node:timers/promises';

export interface FileLock {
  release(): void;
}

export interface FileLockOptions {
  currentPid?: number;
  timeoutMs?: number;
  retryMs?: number;
  /** A lock file with no readable owner is considered abandoned after this long. */
  staleMs?: number;
  isProcessAlive?: (pid: number) => boolean;
}

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_MS = 10;
const DEFAULT_STALE_MS = 10_000;

/**
 * Take an exclusive lock by creating `lockPath` with O_EXCL and writing our pid.
 * Locks left by dead processes are removed and retaken.
 */
export async function acquireFileLock(lockPath: string, options: FileLockOptions = {}): Promise<FileLock> {
  const currentPid = options.currentPid ?? process.pid;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retryMs = options.retryMs ?? DEFAULT_RETRY_MS;
  const staleMs = options.staleMs ?? DEFAULT_STALE_MS;
  const isProcessAlive = options.isProcessAlive ?? defaultIsProcessAlive;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    try {
      const handle = await fs.promises.open(lockPath, 'wx', 0o600);
      try {
        await handle.writeFile(`${currentPid}\n`, 'utf-8');
      } finally {
        await handle.close();
      }
      let released = false;
      return {
        release: () => {
          if (released) return;
          released = true;
          releaseFileLock(lockPath, currentPid);
        },
      };
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code !== 'EEXIST') {
        throw err;
      }
    }

    const inode = lockInode(lockPath);
    const ownerPid = readLockPid(lockPath);
    if (ownerPid !== null ? !isProcessAlive(ownerPid) : lockAgeMs(lockPath) > staleMs) {
      removeLockIfUnchanged(lockPath, inode, ownerPid);
      continue;
    }

    if (Date.now() >= deadline) {
      const owner = ownerPid !== null ? ` (held by pid ${ownerPid})` : '';
      throw new Error(`Timed out waiting for lock ${lockPath}${owner}`);
    }
    await delay(retryMs);
  }
}

function releaseFileLock(lockPath: string, expectedPid: number): void {
  if (readLockPid(lockPath) !== expectedPid) return;
  removeLockFile(lockPath);
}

/**
 * Another waiter may have removed the stale lock and taken a fresh one since we
 * looked; only unlink the file we judged stale (same inode, same owner).
 */
function removeLockIfUnchanged(lockPath: string, inode: number | null, ownerPid: number | null): void {
  if (inode === null) return;
  if (lockInode(lockPath) !== inode || readLockPid(lockPath) !== ownerPid) return;
  removeLockFile(lockPath);
}

function removeLockFile(lockPath: string): void {
  try {
    fs.unlinkSync(lockPath);
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code !== 'ENOENT') throw err;
  }
}

function readLockPid(lockPath: string): number | null {
  try {
    const raw = fs.readFileSync(lockPath, 'utf-8').trim();
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isInteger(parsed) || parsed <= 0) return null;
    return parsed;
  } catch {
    return null;
  }
}

function lockInode(lockPath: string): number | null {
  try {
    return fs.statSync(lockPath).ino;
  } catch {
    return null;
  }
}

function lockAgeMs(lockPath: string): number {
  try {
    return Date.now() - fs.statSync(lockPath).mtimeMs;
  } catch {
    return 0;
  }
}

function defaultIsProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    return error.code !== 'ESRCH';
  }
}
