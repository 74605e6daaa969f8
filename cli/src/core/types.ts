/**
 * Core Types: Command, Verdict, PolicyRule, ExecutionResult, AuditEntry
 *
 * A Command is one permitted system action, already validated.
 * A Verdict is the policy's decision: allow or deny, with the rule that decided it.
 * An AuditEntry is the durable record of one request, whatever its outcome.
 */

export type ActionTag =
  | 'start_application'
  | 'kill_process'
  | 'list_processes'
  | 'restart_service'
  | 'shell_query';

export type ShellQueryProgram = 'ps' | 'grep';
export type KillSignal = 'TERM' | 'INT' | 'HUP' | 'KILL';
export type ProcessSort = 'cpu' | 'memory';

export interface StartApplication {
  readonly action: 'start_application';
  readonly name: string;
}

export interface KillProcess {
  readonly action: 'kill_process';
  readonly name: string;
  readonly signal?: KillSignal;
}

export interface ListProcesses {
  readonly action: 'list_processes';
  readonly filter?: string;
  readonly sort?: ProcessSort;
}

export interface RestartService {
  readonly action: 'restart_service';
  readonly unit: string;
}

export interface ShellQuery {
  readonly action: 'shell_query';
  readonly program: ShellQueryProgram;
  readonly args: readonly string[];
}

export type Command =
  | StartApplication
  | KillProcess
  | ListProcesses
  | RestartService
  | ShellQuery;

export type Decision = 'allow' | 'deny';

export interface Verdict {
  decision: Decision;
  reason: string;
  matchedRule: string;
}

export interface RuleMatch {
  action?: ActionTag;
  name?: string;
  unit?: string;
  filter?: string;
  program?: string;
  args?: string;
}

export interface PolicyRule {
  id: string;
  match?: RuleMatch;
  decision: Decision;
  reason: string;
}

export interface PolicyConfig {
  version: string;
  rules: PolicyRule[];
}

export interface ExecutionResult {
  command: Command;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  signal: string | null;
  truncated: boolean;
  error?: string;
}

export type ParseOutcome =
  | { ok: true; command: Command }
  | { ok: false; error: { kind: string; message: string } };

/** What the gate hands to the audit trail; id, timestamp and hashes are added on append. */
export interface AuditRecord {
  rawInput: string;
  parseOutcome: ParseOutcome;
  verdict?: Verdict;
  confirmed?: boolean;
  executionResult?: ExecutionResult;
}

export interface AuditEntry extends AuditRecord {
  id: string;
  timestamp: string;
  previousHash: string | null;
  hash: string;
}
