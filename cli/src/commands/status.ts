/**
 * sysgate status: Show configuration, policy and audit state
 */

import fs from 'node:fs';
import { loadConfig } from '../config/config.js';
import { loadPolicy } from '../core/policy.js';
import { FileAuditTrail } from '../audit/logger.js';

export async function statusCommand(): Promise<void> {
  console.log('');
  console.log('  🛡️  sysgate Status');
  console.log('  ─────────────────');

  try {
    const config = loadConfig();
    console.log(`  Config:   ${fs.existsSync(config.configPath) ? config.configPath : '❌ Missing (defaults in use)'}`);

    if (fs.existsSync(config.policyPath)) {
      const policy = loadPolicy(config.policyPath);
      console.log(`  Policy:   ✅ ${config.policyPath} (${policy.rules.length} rule(s))`);
    } else {
      console.log('  Policy:   ❌ Missing. Run: sysgate init');
    }

    console.log(`  Timeout:  ${config.executor.timeoutMs}ms${config.executor.dryRun ? ' (dry run)' : ''}`);
    console.log(`  Confirm:  ${config.requireConfirmation ? 'yes' : 'no'}`);
    console.log(`  Model:    ${config.model.command.join(' ')}`);

    if (fs.existsSync(config.auditPath)) {
      const result = await new FileAuditTrail(config.auditPath).verify();
      console.log(`  Audit:    ${result.valid ? '✅' : '❌'} ${result.eventCount} entr${result.eventCount === 1 ? 'y' : 'ies'}${result.error ? ` (${result.error})` : ''}`);
    } else {
      console.log('  Audit:    No entries yet');
    }
  } catch (err) {
    console.error(`  ❌ ${(err as Error).message}`);
    process.exitCode = 1;
  }

  console.log('');
}
