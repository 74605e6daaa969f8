#!/usr/bin/env node

/**
 * sysgate CLI: natural-language system actions behind a policy gate
 *
 * Model output is parsed into one of a fixed set of commands, checked against
 * the policy, run as an argument vector with a timeout, and audited.
 *
 * Usage:
 *   sysgate init [--force] [--model "<command>"]
 *   sysgate run [json] [--dry-run] [--yes] [--quiet]
 *   sysgate ask <request...> [--dry-run] [--yes] [--quiet]
 *   sysgate policy show
 *   sysgate policy check <file>
 *   sysgate policy eval <json>
 *   sysgate audit verify
 *   sysgate audit tail [-n <count>]
 *   sysgate status
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { askCommand, runCommand } from './commands/run.js';
import { policyCommand } from './commands/policy.js';
import { auditCommand } from './commands/audit.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('sysgate')
  .description('Policy-gated execution of natural-language system requests')
  .version('0.1.0');

// sysgate init
program
  .command('init')
  .description('Write a starter config and policy')
  .option('--force', 'Overwrite existing files', false)
  .option('--model <command>', 'Model command to run for "ask"')
  .action(initCommand);

// sysgate run [json]
program
  .command('run')
  .description('Gate and execute raw model output (argument or stdin)')
  .argument('[json]', 'Model output; read from stdin when omitted')
  .option('--dry-run', 'Show the invocation without running it', false)
  .option('-y, --yes', 'Skip the confirmation prompt', false)
  .option('-q, --quiet', 'Suppress pipeline log lines', false)
  .action(runCommand);

// sysgate ask <request...>
program
  .command('ask')
  .description('Ask the model for a command, then gate and execute it')
  .argument('<request...>', 'What you want done, e.g. "restart nginx"')
  .option('--dry-run', 'Show the invocation without running it', false)
  .option('-y, --yes', 'Skip the confirmation prompt', false)
  .option('-q, --quiet', 'Suppress pipeline log lines', false)
  .action(askCommand);

// sysgate policy
const policy = program
  .command('policy')
  .description('Inspect and check policies');

policy
  .command('show')
  .description('Show the active policy')
  .action(() => policyCommand('show'));

policy
  .command('check <file>')
  .description('Validate a YAML policy file')
  .action((file: string) => policyCommand('check', file));

policy
  .command('eval <json>')
  .description('Evaluate model output against the policy without running it')
  .action((json: string) => policyCommand('eval', json));

// sysgate audit
const audit = program
  .command('audit')
  .description('Read the audit trail');

audit
  .command('verify')
  .description('Verify the audit hash chain')
  .action(() => auditCommand('verify'));

audit
  .command('tail')
  .description('Show the latest audit entries')
  .option('-n, --lines <count>', 'Number of entries', '20')
  .action((options: { lines?: string }) => auditCommand('tail', options));

// sysgate status
program
  .command('status')
  .description('Show configuration, policy and audit state')
  .action(statusCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(`  ❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
