/**
 * sysgate audit: read the audit trail
 *
 *   sysgate audit verify        Check the hash chain
 *   sysgate audit tail [-n 20]  Show the latest entries
 */

import { loadConfig } from '../config/config.js';
import { describeCommand } from '../core/command.js';
import { FileAuditTrail } from '../audit/logger.js';
import type { AuditEntry } from '../core/types.js';

export async function auditCommand(action: string, options: { lines?: string } = {}): Promise<void> {
  try {
    const { auditPath } = loadConfig();
    const trail = new FileAuditTrail(auditPath);

    switch (action) {
      case 'verify': {
        const result = await trail.verify();
        if (result.valid) {
          console.log(`  ✅ ${auditPath}: ${result.eventCount} entr${result.eventCount === 1 ? 'y' : 'ies'}, chain intact`);
        } else {
          console.error(`  ❌ ${auditPath}: ${result.error}`);
          process.exitCode = 1;
        }
        break;
      }

      case 'tail': {
        const count = Number.parseInt(options.lines ?? '20', 10);
        const entries = await trail.readEntries();
        const shown = entries.slice(-(Number.isInteger(count) && count > 0 ? count : 20));
        if (shown.length === 0) {
          console.log('  No audit entries yet');
          return;
        }
        for (const entry of shown) {
          console.log(`  ${summarizeEntry(entry)}`);
        }
        break;
      }

      default:
        console.error(`  ❌ Unknown audit command: ${action}`);
        process.exitCode = 1;
    }
  } catch (err) {
    console.error(`  ❌ ${(err as Error).message}`);
    process.exitCode = 1;
  }
}

export function summarizeEntry(entry: AuditEntry): string {
  const when = entry.timestamp.replace('T', ' ').replace(/\.\d+Z$/, 'Z');
  if (!entry.parseOutcome.ok) {
    const label = entry.verdict ? 'denied  ' : 'rejected';
    return `${when}  ${label}  ${entry.parseOutcome.error.kind}: ${entry.parseOutcome.error.message}`;
  }

  const what = describeCommand(entry.parseOutcome.command);
  if (!entry.verdict || entry.verdict.decision === 'deny') {
    return `${when}  denied    ${what} [${entry.verdict?.matchedRule ?? 'none'}]`;
  }
  if (entry.confirmed === false) {
    return `${when}  declined  ${what}`;
  }

  const result = entry.executionResult;
  if (!result) return `${when}  allowed   ${what}`;
  if (result.timedOut) return `${when}  timeout   ${what} (${result.durationMs}ms)`;
  return `${when}  exit ${String(result.exitCode ?? '-').padEnd(4)} ${what} (${result.durationMs}ms)`;
}
