/**
 * AuditTrail: one append-only entry per request
 *
 * Every request is recorded exactly once, whatever happened to it:
 * parse failure, refusal, decline, success, failure or timeout.
 * The file implementation lives in audit/logger.ts.
 */

import type { AuditEntry, AuditRecord, ExecutionResult } from './types.js';

export const MAX_RAW_INPUT_CHARS = 2048;
export const MAX_AUDIT_OUTPUT_CHARS = 4096;

export interface AuditTrail {
  /** Append one entry. Rejects with AuditWriteError when the sink cannot be written. */
  record(record: AuditRecord): Promise<AuditEntry>;
  /** Rejects with AuditWriteError when a record() would fail to open the sink. */
  assertWritable(): Promise<void>;
}

export function truncate(value: string, limit: number): string {
  if (value.length <= limit) return value;
  return `${value.slice(0, limit)}…[truncated ${value.length - limit} chars]`;
}

/** Bound the free-text parts of a record before it is written. */
export function boundRecord(record: AuditRecord): AuditRecord {
  const bounded: AuditRecord = {
    ...record,
    rawInput: truncate(record.rawInput, MAX_RAW_INPUT_CHARS),
  };
  if (record.executionResult) {
    bounded.executionResult = boundResult(record.executionResult);
  }
  return bounded;
}

function boundResult(result: ExecutionResult): ExecutionResult {
  return {
    ...result,
    stdout: truncate(result.stdout, MAX_AUDIT_OUTPUT_CHARS),
    stderr: truncate(result.stderr, MAX_AUDIT_OUTPUT_CHARS),
  };
}
