/**
 * Built-in Deny Rules
 *
 * Evaluated before any configured rule and not configurable: a policy file
 * can add denies but cannot allow anything these rules refuse.
 * The program, process, service and path lists live in data/denylist.json.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { SHELL_QUERY_PROGRAMS } from '../core/command.js';
import type { Command } from '../core/types.js';

export interface BuiltinRule {
  id: string;
  reason: string;
  matches(command: Command): boolean;
}

export const SHELL_QUERY_PROGRAM_RULE_ID = 'builtin:shell-query-program';
export const SHELL_QUERY_PROGRAM_REASON = `shell_query may only run ${SHELL_QUERY_PROGRAMS.join(' or ')}`;

const DenylistSchema = z.object({
  destructive_programs: z.record(z.string(), z.array(z.string().min(1))),
  protected_processes: z.array(z.string().min(1)),
  protected_services: z.array(z.string().min(1)),
  sensitive_paths: z.array(z.string().min(1)),
});

export type Denylist = z.infer<typeof DenylistSchema>;

const DENYLIST_URL = new URL('../../data/denylist.json', import.meta.url);

let cachedRules: readonly BuiltinRule[] | null = null;

export function loadDenylist(file: URL | string = DENYLIST_URL): Denylist {
  const content = fs.readFileSync(file, 'utf-8');
  return DenylistSchema.parse(JSON.parse(content));
}

/** Built-in rules from the shipped denylist, loaded once per process. */
export function getBuiltinRules(): readonly BuiltinRule[] {
  if (!cachedRules) {
    cachedRules = buildBuiltinRules(loadDenylist());
  }
  return cachedRules;
}

export function buildBuiltinRules(denylist: Denylist): readonly BuiltinRule[] {
  const rules: BuiltinRule[] = [
    {
      id: SHELL_QUERY_PROGRAM_RULE_ID,
      reason: SHELL_QUERY_PROGRAM_REASON,
      matches: (command) =>
        command.action === 'shell_query' && !SHELL_QUERY_PROGRAMS.includes(command.program),
    },
  ];

  for (const [category, programs] of Object.entries(denylist.destructive_programs)) {
    const blocked = new Set(programs.map((p) => p.toLowerCase()));
    rules.push({
      id: `builtin:destructive:${category}`,
      reason: `${category.replace(/_/g, ' ')} programs are never started`,
      matches: (command) => command.action === 'start_application' && isBlockedProgram(command.name, blocked),
    });
  }

  const processes = new Set(denylist.protected_processes.map((p) => p.toLowerCase()));
  rules.push({
    id: 'builtin:protected-process',
    reason: 'critical system processes cannot be killed',
    matches: (command) => command.action === 'kill_process' && processes.has(command.name.toLowerCase()),
  });

  const services = new Set(denylist.protected_services.map((s) => s.toLowerCase()));
  rules.push({
    id: 'builtin:protected-service',
    reason: 'protected services cannot be restarted',
    matches: (command) => command.action === 'restart_service' && services.has(serviceBaseName(command.unit)),
  });

  const paths = denylist.sensitive_paths.map(normalizeDir);
  rules.push({
    id: 'builtin:sensitive-path',
    reason: 'queries may not read system paths',
    matches: (command) =>
      command.action === 'shell_query' && command.args.some((arg) => touchesPath(arg, paths)),
  });

  return Object.freeze(rules.map((rule) => Object.freeze(rule)));
}

function normalizeDir(dir: string): string {
  const normalized = path.posix.normalize(dir);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

/**
 * "/etc", "/etc/shadow", "//etc/./x", "-f/etc/x" and "--file=/etc/x" all touch
 * "/etc", and so does "/" (a recursive grep from the root reads it). "/etcetera" does not.
 */
export function touchesPath(arg: string, dirs: readonly string[]): boolean {
  const candidates = [arg];
  if (arg.startsWith('-') && arg.includes('/')) candidates.push(arg.slice(arg.indexOf('/')));
  const eq = arg.indexOf('=');
  if (eq >= 0) candidates.push(arg.slice(eq + 1));

  return candidates.some((candidate) => {
    if (!candidate.startsWith('/')) return false;
    const normalized = normalizeDir(candidate);
    const asDir = normalized === '/' ? '/' : `${normalized}/`;
    return dirs.some((dir) => normalized === dir || normalized.startsWith(`${dir}/`) || dir.startsWith(asDir));
  });
}

/** "mkfs" also blocks "mkfs.ext4"; "python3" also blocks "python3.12". */
function isBlockedProgram(name: string, blocked: Set<string>): boolean {
  const lower = name.toLowerCase();
  if (blocked.has(lower)) return true;
  const dot = lower.indexOf('.');
  return dot > 0 && blocked.has(lower.slice(0, dot));
}

export function serviceBaseName(unit: string): string {
  const lower = unit.toLowerCase();
  return lower.endsWith('.service') ? lower.slice(0, -'.service'.length) : lower;
}
