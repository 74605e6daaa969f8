/**
 * Gate: the request pipeline
 *
 * One function: (rawInput: string) => Promise<GateOutcome>
 *
 * For each request:
 *   1. Parse the raw model output into a Command (or reject it; an unknown
 *      action or a disallowed query program is refused by the policy)
 *   2. Evaluate the policy (allow / deny)
 *   3. If confirmation is required, ask (a failed prompt declines)
 *   4. Make sure the audit log can be written, then execute
 *   5. Record exactly one audit entry
 *
 * Only AuditWriteError escapes; every other failure is part of the outcome.
 */

import { describeCommand } from './command.js';
import { parseIntent, type ParseOptions } from './intent.js';
import type { Policy } from './policy.js';
import type { Executor } from './executor.js';
import type { AuditTrail } from './audit.js';
import type { AuditEntry, AuditRecord, Command, ExecutionResult, ParseOutcome, Verdict } from './types.js';

export type GateStatus = 'rejected' | 'refused' | 'declined' | 'executed' | 'failed' | 'timed_out';

export interface GateOutcome {
  status: GateStatus;
  message: string;
  command?: Command;
  verdict?: Verdict;
  result?: ExecutionResult;
  entry: AuditEntry;
}

export type Gate = (rawInput: string) => Promise<GateOutcome>;

export type ConfirmFn = (command: Command, verdict: Verdict) => Promise<boolean>;

export interface GateOptions {
  policy: Policy;
  executor: Executor;
  audit: AuditTrail;
  /** Called for allowed commands before they run; resolving false cancels. */
  confirm?: ConfirmFn;
  parse?: ParseOptions;
  quiet?: boolean;
}

export function createGate(options: GateOptions): Gate {
  const { policy, executor, audit, confirm } = options;
  const log = (line: string): void => {
    if (!options.quiet) console.log(`  ${line}`);
  };

  return async (rawInput: string): Promise<GateOutcome> => {
    const parsed = parseIntent(rawInput, options.parse);

    if (!parsed.ok) {
      log(`[intent] rejected (${parsed.error.kind}): ${parsed.error.message}`);
      const parseOutcome: ParseOutcome = { ok: false, error: { kind: parsed.error.kind, message: parsed.error.message } };

      const verdict = policy.evaluateRejected(parsed.error);
      if (verdict) {
        log(`[policy] -> deny (${verdict.matchedRule}: ${verdict.reason})`);
        const entry = await audit.record({ rawInput, parseOutcome, verdict });
        return { status: 'refused', message: `Request refused: ${verdict.reason}`, verdict, entry };
      }

      const entry = await audit.record({ rawInput, parseOutcome });
      return { status: 'rejected', message: parsed.error.message, entry };
    }

    const command = parsed.command;
    const verdict = policy.evaluate(command);
    log(`[policy] ${describeCommand(command)} -> ${verdict.decision} (${verdict.matchedRule}: ${verdict.reason})`);

    const base: AuditRecord = { rawInput, parseOutcome: { ok: true, command }, verdict };

    if (verdict.decision === 'deny') {
      const entry = await audit.record(base);
      return { status: 'refused', message: `Request refused: ${verdict.reason}`, command, verdict, entry };
    }

    if (confirm && !(await askConfirmation(confirm, command, verdict, log))) {
      log('[gate] cancelled by user');
      const entry = await audit.record({ ...base, confirmed: false });
      return { status: 'declined', message: 'Cancelled by user', command, verdict, entry };
    }

    await audit.assertWritable();

    const result = await executor.run(command);
    const status = statusOf(result);
    log(`[exec] ${status} exit=${result.exitCode ?? '-'} in ${result.durationMs}ms`);

    const entry = await audit.record({
      ...base,
      ...(confirm ? { confirmed: true } : {}),
      executionResult: result,
    });
    return { status, message: messageOf(status, command, result), command, verdict, result, entry };
  };
}

/** A confirmation that fails counts as a "no". */
async function askConfirmation(
  confirm: ConfirmFn,
  command: Command,
  verdict: Verdict,
  log: (line: string) => void,
): Promise<boolean> {
  try {
    return await confirm(command, verdict);
  } catch (err) {
    log(`[gate] confirmation failed: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

function statusOf(result: ExecutionResult): GateStatus {
  if (result.timedOut) return 'timed_out';
  return result.exitCode === 0 ? 'executed' : 'failed';
}

function messageOf(status: GateStatus, command: Command, result: ExecutionResult): string {
  const what = describeCommand(command);
  switch (status) {
    case 'executed':
      return `Done: ${what}`;
    case 'timed_out':
      return `Timed out: ${what} (process terminated)`;
    default: {
      if (result.error) return `Failed: ${what}: ${result.error}`;
      if (result.signal) return `Failed: ${what}: killed by ${result.signal}`;
      return `Failed: ${what}: exit code ${result.exitCode ?? 'unknown'}`;
    }
  }
}
