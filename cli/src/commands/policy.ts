/**
 * sysgate policy: Inspect and check policies
 *
 * Commands:
 *   sysgate policy show            Display the active rules, built-ins first
 *   sysgate policy check <file>    Validate a YAML policy file
 *   sysgate policy eval <json>     Parse and evaluate without executing
 */

import fs from 'node:fs';
import path from 'node:path';
import { loadConfig } from '../config/config.js';
import { describeCommand } from '../core/command.js';
import { PolicyLoadError } from '../core/errors.js';
import { parseIntent } from '../core/intent.js';
import { loadPolicy } from '../core/policy.js';
import { getBuiltinRules } from '../policy/builtin.js';
import { PolicyParser } from '../policy/parser.js';

export async function policyCommand(action: string, arg?: string): Promise<void> {
  try {
    switch (action) {
      case 'show': {
        const { policyPath } = loadConfig();
        if (!fs.existsSync(policyPath)) {
          console.log('  No policy configured. Run: sysgate init');
          return;
        }
        const policy = loadPolicy(policyPath);
        console.log('');
        console.log(`  Policy ${policyPath} (version ${policy.version})`);
        console.log('  ──────────────────');
        console.log('');
        console.log('  Built-in (always evaluated first):');
        for (const rule of getBuiltinRules()) {
          console.log(`    deny   ${rule.id.padEnd(40)} ${rule.reason}`);
        }
        console.log('');
        console.log('  Configured (load order, deny wins):');
        for (const rule of policy.rules) {
          const match = rule.match ? JSON.stringify(rule.match) : '(any)';
          console.log(`    ${rule.decision.padEnd(6)} ${rule.id.padEnd(40)} ${match}`);
        }
        console.log('');
        console.log('  Anything else: deny (no matching allow rule)');
        console.log('');
        break;
      }

      case 'check': {
        if (!arg) {
          console.error('  ❌ Usage: sysgate policy check <file>');
          process.exitCode = 1;
          return;
        }
        const resolvedPath = path.resolve(arg);
        const config = PolicyParser.parseFile(resolvedPath);
        console.log(`  ✅ ${resolvedPath} is valid`);
        console.log(`  Rules: ${config.rules.length}`);
        break;
      }

      case 'eval': {
        if (!arg) {
          console.error('  ❌ Usage: sysgate policy eval <json>');
          process.exitCode = 1;
          return;
        }
        const parsed = parseIntent(arg);
        if (!parsed.ok) {
          console.log(`  ⚠️  Rejected (${parsed.error.kind}): ${parsed.error.message}`);
          process.exitCode = 2;
          return;
        }
        const verdict = loadPolicy(loadConfig().policyPath).evaluate(parsed.command);
        console.log(`  ${describeCommand(parsed.command)}`);
        console.log(`  ${verdict.decision === 'allow' ? '✅ allow' : '🛑 deny'}: ${verdict.reason} [${verdict.matchedRule}]`);
        process.exitCode = verdict.decision === 'allow' ? 0 : 3;
        break;
      }

      default:
        console.error(`  ❌ Unknown policy command: ${action}`);
        process.exitCode = 1;
    }
  } catch (err) {
    if (err instanceof PolicyLoadError) {
      console.error('  ❌ Policy validation errors:');
      for (const error of err.errors) {
        console.error(`    - ${error}`);
      }
    } else {
      console.error(`  ❌ ${(err as Error).message}`);
    }
    process.exitCode = 1;
  }
}
