/**
 * sysgate init: write a starter config and policy
 *
 * Creates ~/.sysgate/ (or $SYSGATE_HOME) with config.yml and policy.yml.
 * Existing files are kept unless --force is given.
 */

import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import {
  DEFAULT_MODEL_COMMAND,
  DEFAULT_MODEL_TIMEOUT_MS,
  getSysgateHome,
} from '../config/config.js';
import { DEFAULT_KILL_GRACE_MS, DEFAULT_MAX_OUTPUT_BYTES, DEFAULT_TIMEOUT_MS } from '../core/executor.js';
import { getDefaultPolicy } from '../policy/defaults.js';

interface InitOptions {
  force?: boolean;
  model?: string;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const home = getSysgateHome();
  const configPath = path.join(home, 'config.yml');
  const policyPath = path.join(home, 'policy.yml');

  console.log('');
  console.log('  🛡️  sysgate: policy-gated system actions');
  console.log('  ─────────────────────────────────────────');
  console.log('');

  fs.mkdirSync(home, { recursive: true, mode: 0o700 });

  const config = {
    version: '1',
    policy: 'policy.yml',
    audit: 'audit.jsonl',
    require_confirmation: false,
    executor: {
      timeout_ms: DEFAULT_TIMEOUT_MS,
      max_output_bytes: DEFAULT_MAX_OUTPUT_BYTES,
      kill_grace_ms: DEFAULT_KILL_GRACE_MS,
      dry_run: false,
    },
    model: {
      command: options.model ? options.model.trim().split(/\s+/) : DEFAULT_MODEL_COMMAND,
      timeout_ms: DEFAULT_MODEL_TIMEOUT_MS,
    },
  };

  writeUnlessPresent(configPath, yamlStringify(config), options.force);
  writeUnlessPresent(policyPath, yamlStringify(getDefaultPolicy()), options.force);

  console.log('');
  console.log('  Try it:');
  console.log(`    sysgate run '{"action":"list_processes","sort":"cpu"}'`);
  console.log('    sysgate ask restart nginx');
  console.log('');
}

function writeUnlessPresent(filePath: string, content: string, force?: boolean): void {
  if (fs.existsSync(filePath) && !force) {
    console.log(`  ⏭️  Kept existing ${filePath}`);
    return;
  }
  fs.writeFileSync(filePath, content, { encoding: 'utf-8', mode: 0o600 });
  console.log(`  ✅ Wrote ${filePath}`);
}
