/**
 * Audit Logger: Hash-chained JSONL audit trail
 *
 * Every request is logged with:
 * - Cryptographic hash chaining (tamper-evident)
 * - Raw model output, parse outcome, verdict and execution result
 * - Append-only storage
 *
 * Appends from this process go through a queue; appends from other processes
 * are kept out by a lock file next to the log.
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import canonicalize from 'canonicalize';
import { v4 as uuidv4 } from 'uuid';
import { acquireFileLock, type FileLockOptions } from './lock.js';
import { boundRecord, type AuditTrail } from '../core/audit.js';
import { AuditWriteError } from '../core/errors.js';
import type { AuditEntry, AuditRecord } from '../core/types.js';

export interface ChainVerification {
  valid: boolean;
  eventCount: number;
  error?: string;
}

export class FileAuditTrail implements AuditTrail {
  readonly logPath: string;
  private readonly lockPath: string;
  private readonly lockOptions: FileLockOptions;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(logPath: string, lockOptions: FileLockOptions = {}) {
    this.logPath = logPath;
    this.lockPath = `${logPath}.lock`;
    this.lockOptions = lockOptions;
  }

  record(record: AuditRecord): Promise<AuditEntry> {
    const next = this.queue.then(() => this.append(record));
    // Keep the queue moving after a failed append; the caller still gets the rejection from `next`.
    this.queue = next.catch(() => undefined);
    return next;
  }

  async assertWritable(): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.logPath), { recursive: true });
      const handle = await fs.promises.open(this.logPath, 'a', 0o600);
      await handle.close();
    } catch (err) {
      throw new AuditWriteError(this.logPath, err);
    }
  }

  private async append(record: AuditRecord): Promise<AuditEntry> {
    try {
      await fs.promises.mkdir(path.dirname(this.logPath), { recursive: true });
      const lock = await acquireFileLock(this.lockPath, this.lockOptions);
      try {
        const previousHash = await readLastHash(this.logPath);
        const unhashed = {
          id: `ae_${uuidv4().replace(/-/g, '')}`,
          timestamp: new Date().toISOString(),
          ...boundRecord(record),
          previousHash,
        };
        const entry: AuditEntry = { ...unhashed, hash: computeHash(unhashed) };
        await fs.promises.appendFile(this.logPath, JSON.stringify(entry) + '\n', { encoding: 'utf-8', mode: 0o600 });
        return entry;
      } finally {
        lock.release();
      }
    } catch (err) {
      throw new AuditWriteError(this.logPath, err);
    }
  }

  /**
   * Read every well-formed entry in the log, oldest first.
   */
  async readEntries(): Promise<AuditEntry[]> {
    const lines = await readLines(this.logPath);
    const entries: AuditEntry[] = [];
    for (const line of lines) {
      const parsed = parseEntry(line);
      if (parsed) entries.push(parsed);
    }
    return entries;
  }

  /**
   * Verify the integrity of the hash chain.
   */
  async verify(): Promise<ChainVerification> {
    const lines = await readLines(this.logPath);
    let previousHash: string | null = null;
    let count = 0;

    for (const line of lines) {
      const entry = parseEntry(line);
      if (!entry) {
        return { valid: false, eventCount: count, error: `Malformed entry at line ${count + 1}` };
      }

      if (entry.previousHash !== previousHash) {
        return {
          valid: false,
          eventCount: count,
          error: `Chain broken at entry ${count + 1}: expected previous hash ${previousHash}, got ${entry.previousHash}`,
        };
      }

      const { hash, ...rest } = entry;
      if (computeHash(rest) !== hash) {
        return { valid: false, eventCount: count, error: `Hash mismatch at entry ${count + 1}` };
      }

      previousHash = hash;
      count++;
    }

    return { valid: true, eventCount: count };
  }
}

/**
 * SHA-256 over the RFC 8785 canonical form (keys sorted at every depth).
 */
export function computeHash(data: object): string {
  return `sha256:${crypto.createHash('sha256').update(canonicalJson(data), 'utf8').digest('hex')}`;
}

export function canonicalJson(value: unknown): string {
  const result = canonicalize(value);
  if (result === undefined) {
    throw new Error('Canonicalization failed: input produced undefined');
  }
  return result;
}

async function readLines(logPath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(logPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw err;
  }
  return content.split('\n').filter(Boolean);
}

/**
 * Hash of the last entry, read from the end of the file so the log is not
 * reloaded on every append.
 */
async function readLastHash(logPath: string): Promise<string | null> {
  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(logPath, 'r');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }

  try {
    const { size } = await handle.stat();
    let window = Math.min(size, 16 * 1024);
    while (window > 0) {
      const buffer = Buffer.alloc(window);
      await handle.read(buffer, 0, window, size - window);
      const text = buffer.toString('utf-8').replace(/\n+$/, '');
      const newline = text.lastIndexOf('\n');
      if (newline !== -1 || window === size) {
        const entry = parseEntry(text.slice(newline + 1));
        return entry ? entry.hash : null;
      }
      window = Math.min(size, window * 2);
    }
    return null;
  } finally {
    await handle.close();
  }
}

function parseEntry(line: string): AuditEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isAuditEntry(parsed)) return null;
  return parsed;
}

function isAuditEntry(value: unknown): value is AuditEntry {
  if (typeof value !== 'object' || value === null) return false;
  const id: unknown = Reflect.get(value, 'id');
  const hash: unknown = Reflect.get(value, 'hash');
  const previousHash: unknown = Reflect.get(value, 'previousHash');
  const parseOutcome: unknown = Reflect.get(value, 'parseOutcome');
  return typeof id === 'string'
    && typeof hash === 'string'
    && (previousHash === null || typeof previousHash === 'string')
    && typeof parseOutcome === 'object' && parseOutcome !== null;
}
