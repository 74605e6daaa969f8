/**
 * YAML Policy Parser
 *
 * Parses and validates sysgate policy files.
 *
 *   version: "1"
 *   rules:
 *     - id: allow-kill
 *       match: { action: kill_process, name: "firefox*" }
 *       decision: allow
 *       reason: Closing user applications is fine
 *
 * There is no default decision: a command no rule allows is denied.
 */

import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import { ACTION_TAGS, isActionTag } from '../core/command.js';
import { PolicyLoadError } from '../core/errors.js';
import type { PolicyConfig, PolicyRule, RuleMatch } from '../core/types.js';

const VALID_DECISIONS = ['allow', 'deny'];
const PATTERN_KEYS = ['name', 'unit', 'filter', 'program', 'args'] as const;
const MATCH_KEYS: readonly string[] = ['action', ...PATTERN_KEYS];
const RULE_KEYS = ['id', 'match', 'decision', 'reason'];

export class PolicyParser {
  /**
   * Parse a YAML policy file.
   */
  static parseFile(filePath: string): PolicyConfig {
    const content = fs.readFileSync(filePath, 'utf-8');
    return PolicyParser.parse(content);
  }

  /**
   * Parse a YAML policy string. Throws PolicyLoadError listing every problem.
   */
  static parse(yamlContent: string): PolicyConfig {
    let raw: unknown;
    try {
      raw = yamlParse(yamlContent);
    } catch (err) {
      throw new PolicyLoadError([`YAML syntax error: ${(err as Error).message}`]);
    }

    const errors = PolicyParser.validate(raw);
    if (errors.length > 0) {
      throw new PolicyLoadError(errors);
    }
    return PolicyParser.normalize(raw);
  }

  /**
   * Validate a parsed policy document and return any errors.
   */
  static validate(raw: unknown): string[] {
    const errors: string[] = [];

    if (!isRecord(raw)) {
      return ['Policy must be a YAML mapping'];
    }

    if (raw.version !== undefined && typeof raw.version !== 'string' && typeof raw.version !== 'number') {
      errors.push('"version" must be a string');
    }

    if ('default' in raw || 'default_action' in raw) {
      errors.push('A default decision cannot be configured; unmatched commands are always denied');
    }

    if (raw.rules === undefined) {
      return errors;
    }
    if (!Array.isArray(raw.rules)) {
      errors.push('"rules" must be an array');
      return errors;
    }

    const seenIds = new Set<string>();

    raw.rules.forEach((rule: unknown, i: number) => {
      const prefix = `Rule ${i + 1}`;

      if (!isRecord(rule)) {
        errors.push(`${prefix}: must be a mapping`);
        return;
      }

      for (const key of Object.keys(rule)) {
        if (!RULE_KEYS.includes(key)) {
          errors.push(`${prefix}: Unknown field "${key}"`);
        }
      }

      if (rule.id !== undefined) {
        if (typeof rule.id !== 'string' || rule.id.length === 0) {
          errors.push(`${prefix}: "id" must be a non-empty string`);
        } else if (rule.id.startsWith('builtin:') || rule.id.startsWith('default:')) {
          errors.push(`${prefix}: id "${rule.id}" uses a reserved prefix`);
        } else if (seenIds.has(rule.id)) {
          errors.push(`${prefix}: Duplicate id "${rule.id}"`);
        } else {
          seenIds.add(rule.id);
        }
      }

      if (rule.decision === undefined) {
        errors.push(`${prefix}: Missing "decision" field`);
      } else if (typeof rule.decision !== 'string' || !VALID_DECISIONS.includes(rule.decision)) {
        errors.push(`${prefix}: Invalid decision "${String(rule.decision)}". Must be one of: ${VALID_DECISIONS.join(', ')}`);
      }

      if (rule.reason !== undefined && typeof rule.reason !== 'string') {
        errors.push(`${prefix}: "reason" must be a string`);
      }

      if (rule.match !== undefined) {
        if (!isRecord(rule.match)) {
          errors.push(`${prefix}: "match" must be a mapping`);
          return;
        }
        for (const [key, value] of Object.entries(rule.match)) {
          if (!MATCH_KEYS.includes(key)) {
            errors.push(`${prefix}: Unknown match field "${key}"`);
          } else if (key === 'action') {
            if (typeof value !== 'string' || !isActionTag(value)) {
              errors.push(`${prefix}: Invalid action "${String(value)}". Must be one of: ${ACTION_TAGS.join(', ')}`);
            }
          } else if (typeof value !== 'string') {
            errors.push(`${prefix}: "${key}" must be a string glob pattern`);
          }
        }
      }
    });

    return errors;
  }

  /** Build a PolicyConfig from a document that passed validate(). */
  private static normalize(raw: unknown): PolicyConfig {
    if (!isRecord(raw)) {
      return { version: '1', rules: [] };
    }

    const rules: PolicyRule[] = [];
    const entries: unknown[] = Array.isArray(raw.rules) ? raw.rules : [];

    entries.forEach((entry, i) => {
      if (!isRecord(entry)) return;
      const id = typeof entry.id === 'string' ? entry.id : `rule-${i + 1}`;
      const rule: PolicyRule = {
        id,
        decision: entry.decision === 'allow' ? 'allow' : 'deny',
        reason: typeof entry.reason === 'string' ? entry.reason : `Matched rule ${id}`,
      };
      if (isRecord(entry.match)) {
        rule.match = normalizeMatch(entry.match);
      }
      rules.push(rule);
    });

    return {
      version: raw.version === undefined ? '1' : String(raw.version),
      rules,
    };
  }
}

function normalizeMatch(raw: Record<string, unknown>): RuleMatch {
  const match: RuleMatch = {};
  if (typeof raw.action === 'string' && isActionTag(raw.action)) {
    match.action = raw.action;
  }
  for (const key of PATTERN_KEYS) {
    const value = raw[key];
    if (typeof value === 'string') {
      match[key] = value;
    }
  }
  return match;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
