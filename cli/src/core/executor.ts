/**
 * Executor: approved Command → argument-vector process invocation
 *
 * Each action maps to exactly one program call:
 *
 *   start_application  <name>                       (detached, returns once started)
 *   kill_process       pkill -<SIG> -x -- <name>
 *   list_processes     ps aux [--sort=-%cpu|-%mem]   (filter applied to the output here)
 *   restart_service    systemctl restart -- <unit>.service
 *   shell_query        ps|grep <args...>
 *
 * run() never rejects: launch failures, non-zero exits, signals and timeouts
 * all come back as an ExecutionResult.
 */

import { assertNever } from './command.js';
import { spawnBounded, spawnDetached, type BoundedSpawnResult } from '../sandbox/process.js';
import type { Command, ExecutionResult } from './types.js';

export type ProgramKey = 'pkill' | 'ps' | 'grep' | 'systemctl';

export interface ExecutorOptions {
  timeoutMs?: number;
  maxOutputBytes?: number;
  killGraceMs?: number;
  dryRun?: boolean;
  /** argv prefix per program; e.g. { systemctl: ['/usr/bin/systemctl'] } */
  programs?: Partial<Record<ProgramKey, readonly string[]>>;
}

export interface Invocation {
  argv: string[];
  detached: boolean;
  /** Post-filter for list_processes: keep the header and lines containing this text. */
  lineFilter?: string;
}

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 64 * 1024;
export const DEFAULT_KILL_GRACE_MS = 2_000;

export class Executor {
  readonly timeoutMs: number;
  readonly maxOutputBytes: number;
  readonly killGraceMs: number;
  readonly dryRun: boolean;
  private readonly programs: Record<ProgramKey, readonly string[]>;

  constructor(options: ExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.dryRun = options.dryRun ?? false;
    this.programs = {
      pkill: options.programs?.pkill ?? ['pkill'],
      ps: options.programs?.ps ?? ['ps'],
      grep: options.programs?.grep ?? ['grep'],
      systemctl: options.programs?.systemctl ?? ['systemctl'],
    };
  }

  buildInvocation(command: Command): Invocation {
    switch (command.action) {
      case 'start_application':
        return { argv: [command.name], detached: true };

      case 'kill_process':
        return {
          argv: [...this.programs.pkill, `-${command.signal ?? 'TERM'}`, '-x', '--', exactPattern(command.name)],
          detached: false,
        };

      case 'list_processes': {
        const argv = [...this.programs.ps, 'aux'];
        if (command.sort === 'cpu') argv.push('--sort=-%cpu');
        if (command.sort === 'memory') argv.push('--sort=-%mem');
        return { argv, detached: false, lineFilter: command.filter };
      }

      case 'restart_service': {
        const unit = command.unit.endsWith('.service') ? command.unit : `${command.unit}.service`;
        return { argv: [...this.programs.systemctl, 'restart', '--', unit], detached: false };
      }

      case 'shell_query':
        return { argv: [...this.programs[command.program], ...command.args], detached: false };

      default:
        return assertNever(command);
    }
  }

  async run(command: Command): Promise<ExecutionResult> {
    const invocation = this.buildInvocation(command);

    if (this.dryRun) {
      return {
        command,
        exitCode: 0,
        stdout: `[dry run] ${invocation.argv.join(' ')}`,
        stderr: '',
        durationMs: 0,
        timedOut: false,
        signal: null,
        truncated: false,
      };
    }

    if (invocation.detached) {
      const started = await spawnDetached(invocation.argv);
      return {
        command,
        exitCode: started.error ? null : 0,
        stdout: started.pid !== null ? `Started ${invocation.argv[0]} (pid ${started.pid})` : '',
        stderr: started.error ?? '',
        durationMs: started.durationMs,
        timedOut: false,
        signal: null,
        truncated: false,
        ...(started.error ? { error: started.error } : {}),
      };
    }

    const result = await spawnBounded(invocation.argv, {
      timeoutMs: this.timeoutMs,
      maxOutputBytes: this.maxOutputBytes,
      killGraceMs: this.killGraceMs,
    });

    return toExecutionResult(command, result, invocation.lineFilter);
  }
}

function toExecutionResult(command: Command, result: BoundedSpawnResult, lineFilter?: string): ExecutionResult {
  return {
    command,
    exitCode: result.exitCode,
    stdout: lineFilter ? filterLines(result.stdout, lineFilter) : result.stdout,
    stderr: result.stderr,
    durationMs: result.durationMs,
    timedOut: result.timedOut,
    signal: result.signal,
    truncated: result.truncated,
    ...(result.error ? { error: result.error } : {}),
  };
}

/** Keep the first (header) line and every later line containing the filter, case-insensitively. */
export function filterLines(output: string, filter: string): string {
  const lines = output.split('\n');
  const [header, ...rest] = lines;
  const needle = filter.toLowerCase();
  const kept = rest.filter((line) => line.toLowerCase().includes(needle));
  return [header, ...kept].join('\n');
}

/** pkill reads its pattern as an extended regex; escape it so "ssh." matches only "ssh.". */
export function exactPattern(name: string): string {
  return name.replace(/[.*+?^$()[\]{}|\\]/g, '\\$&');
}
