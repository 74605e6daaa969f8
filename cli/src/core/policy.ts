/**
 * Policy: ordered allow/deny rules where deny wins and nothing is allowed by default
 *
 * Evaluation order for a Command:
 *   1. built-in deny rules (program allow-set, destructive programs,
 *      protected processes and services, sensitive paths)
 *   2. configured rules in load order: the first matching deny returns,
 *      the first matching allow is remembered
 *   3. the remembered allow, or deny "no matching allow rule"
 *
 * A Policy is frozen at construction. evaluate() does no I/O.
 */

import { PolicyParser } from '../policy/parser.js';
import {
  getBuiltinRules,
  SHELL_QUERY_PROGRAM_REASON,
  SHELL_QUERY_PROGRAM_RULE_ID,
  type BuiltinRule,
} from '../policy/builtin.js';
import type { ParseError } from './errors.js';
import type { Command, PolicyConfig, PolicyRule, RuleMatch, Verdict } from './types.js';

export const NO_MATCH_REASON = 'no matching allow rule';
export const DEFAULT_RULE_ID = 'default:deny';

export class Policy {
  readonly version: string;
  readonly rules: readonly PolicyRule[];
  private readonly builtins: readonly BuiltinRule[];

  constructor(config: PolicyConfig, builtins: readonly BuiltinRule[] = getBuiltinRules()) {
    this.version = config.version;
    this.rules = Object.freeze(config.rules.map(freezeRule));
    this.builtins = builtins;
    Object.freeze(this);
  }

  evaluate(command: Command): Verdict {
    for (const builtin of this.builtins) {
      if (builtin.matches(command)) {
        return { decision: 'deny', reason: builtin.reason, matchedRule: builtin.id };
      }
    }

    let allowed: PolicyRule | null = null;
    for (const rule of this.rules) {
      if (!matches(rule.match, command)) continue;
      if (rule.decision === 'deny') {
        return { decision: 'deny', reason: rule.reason, matchedRule: rule.id };
      }
      if (!allowed) allowed = rule;
    }

    if (allowed) {
      return { decision: 'allow', reason: allowed.reason, matchedRule: allowed.id };
    }
    return { decision: 'deny', reason: NO_MATCH_REASON, matchedRule: DEFAULT_RULE_ID };
  }

  /**
   * Verdict for input that never became a Command but still names something
   * refused outright: an unknown action, or a shell_query program outside
   * the allow-set. Other parse failures get no verdict.
   */
  evaluateRejected(error: ParseError): Verdict | null {
    switch (error.kind) {
      case 'unknown_action':
        return { decision: 'deny', reason: NO_MATCH_REASON, matchedRule: DEFAULT_RULE_ID };
      case 'program_not_allowed':
        return { decision: 'deny', reason: SHELL_QUERY_PROGRAM_REASON, matchedRule: SHELL_QUERY_PROGRAM_RULE_ID };
      default:
        return null;
    }
  }
}

function matches(match: RuleMatch | undefined, command: Command): boolean {
  if (!match) return true;
  if (match.action && match.action !== command.action) return false;

  const fields = matchableFields(command);
  if (match.name !== undefined && !globMatch(fields.name, match.name)) return false;
  if (match.unit !== undefined && !globMatch(fields.unit, match.unit)) return false;
  if (match.filter !== undefined && !globMatch(fields.filter, match.filter)) return false;
  if (match.program !== undefined && !globMatch(fields.program, match.program)) return false;
  if (match.args !== undefined && !globMatch(fields.args, match.args)) return false;

  return true;
}

function matchableFields(command: Command): Record<'name' | 'unit' | 'filter' | 'program' | 'args', string> {
  const fields = { name: '', unit: '', filter: '', program: '', args: '' };
  switch (command.action) {
    case 'start_application':
    case 'kill_process':
      fields.name = command.name;
      break;
    case 'list_processes':
      fields.filter = command.filter ?? '';
      break;
    case 'restart_service':
      fields.unit = command.unit;
      break;
    case 'shell_query':
      fields.program = command.program;
      fields.args = command.args.join(' ');
      break;
  }
  return fields;
}

function freezeRule(rule: PolicyRule): PolicyRule {
  return Object.freeze({
    ...rule,
    ...(rule.match ? { match: Object.freeze({ ...rule.match }) } : {}),
  });
}

/**
 * Simple glob matching: * matches any characters, ? matches one character.
 */
export function globMatch(value: string, pattern: string): boolean {
  if (pattern === '*') return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*+/g, '.*')
    .replace(/\?/g, '.');

  return new RegExp(`^${regexStr}$`, 's').test(value);
}

export function loadPolicy(filePath: string): Policy {
  return new Policy(PolicyParser.parseFile(filePath));
}

export function parsePolicy(yamlContent: string): Policy {
  return new Policy(PolicyParser.parse(yamlContent));
}
