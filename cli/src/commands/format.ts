import type { GateOutcome, GateStatus } from '../core/gate.js';

const EXIT_CODES: Record<GateStatus, number> = {
  executed: 0,
  failed: 1,
  rejected: 2,
  refused: 3,
  declined: 4,
  timed_out: 5,
};

const GLYPHS: Record<GateStatus, string> = {
  executed: '✅',
  failed: '❌',
  rejected: '⚠️ ',
  refused: '🛑',
  declined: '↩️ ',
  timed_out: '⏱️ ',
};

export function exitCodeFor(status: GateStatus): number {
  return EXIT_CODES[status];
}

/** Lines shown to the user for one request; output is indented and capped at maxLines. */
export function formatOutcome(outcome: GateOutcome, maxLines = 100): string[] {
  const lines = [`${GLYPHS[outcome.status]} ${outcome.message}`];

  const result = outcome.result;
  if (result) {
    const stdout = result.stdout.replace(/\n+$/, '');
    if (stdout) {
      const outLines = stdout.split('\n');
      lines.push('');
      for (const line of outLines.slice(0, maxLines)) {
        lines.push(`    ${line}`);
      }
      if (outLines.length > maxLines) {
        lines.push(`    … ${outLines.length - maxLines} more line(s)`);
      }
    }
    const stderr = result.stderr.trim();
    if (stderr && outcome.status !== 'executed') {
      lines.push('');
      lines.push(`    stderr: ${stderr.split('\n').slice(0, 5).join('\n            ')}`);
    }
    if (result.truncated) {
      lines.push('    (output truncated)');
    }
  }

  lines.push('');
  lines.push(`  audit: ${outcome.entry.id}`);
  return lines;
}
