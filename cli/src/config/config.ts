/**
 * Configuration
 *
 * ~/.sysgate/config.yml, overridden by SYSGATE_* environment variables:
 *
 *   policy: policy.yml
 *   audit: audit.jsonl
 *   require_confirmation: false
 *   executor:
 *     timeout_ms: 10000
 *     max_output_bytes: 65536
 *     kill_grace_ms: 2000
 *     dry_run: false
 *     programs: { systemctl: ["/usr/bin/systemctl"] }
 *   model:
 *     command: ["ollama", "run", "llama3"]
 *     timeout_ms: 60000
 *
 * Relative paths resolve against the sysgate home directory.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import {
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_MAX_OUTPUT_BYTES,
  DEFAULT_TIMEOUT_MS,
  type ProgramKey,
} from '../core/executor.js';

const argv = z.array(z.string().min(1)).min(1);

const ConfigFileSchema = z.object({
  version: z.union([z.string(), z.number()]).optional(),
  policy: z.string().min(1).optional(),
  audit: z.string().min(1).optional(),
  require_confirmation: z.boolean().optional(),
  executor: z.object({
    timeout_ms: z.number().int().positive().optional(),
    max_output_bytes: z.number().int().positive().optional(),
    kill_grace_ms: z.number().int().positive().optional(),
    dry_run: z.boolean().optional(),
    programs: z.object({
      pkill: argv.optional(),
      ps: argv.optional(),
      grep: argv.optional(),
      systemctl: argv.optional(),
    }).strict().optional(),
  }).strict().optional(),
  model: z.object({
    command: argv.optional(),
    timeout_ms: z.number().int().positive().optional(),
  }).strict().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface SysgateConfig {
  home: string;
  configPath: string;
  policyPath: string;
  auditPath: string;
  requireConfirmation: boolean;
  executor: {
    timeoutMs: number;
    maxOutputBytes: number;
    killGraceMs: number;
    dryRun: boolean;
    programs: Partial<Record<ProgramKey, string[]>>;
  };
  model: {
    command: string[];
    timeoutMs: number;
  };
}

export const DEFAULT_MODEL_COMMAND = ['ollama', 'run', 'llama3'];
export const DEFAULT_MODEL_TIMEOUT_MS = 60_000;

export function getSysgateHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.SYSGATE_HOME || path.join(os.homedir(), '.sysgate');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SysgateConfig {
  const home = getSysgateHome(env);
  const configPath = path.join(home, 'config.yml');
  const file = readConfigFile(configPath);
  const resolve = (p: string): string => path.resolve(home, p.startsWith('~/') ? path.join(os.homedir(), p.slice(2)) : p);

  return {
    home,
    configPath,
    policyPath: resolve(env.SYSGATE_POLICY || file.policy || 'policy.yml'),
    auditPath: resolve(env.SYSGATE_AUDIT_LOG || file.audit || 'audit.jsonl'),
    requireConfirmation: readBooleanEnv(env, 'SYSGATE_CONFIRM') ?? file.require_confirmation ?? false,
    executor: {
      timeoutMs: readPositiveIntEnv(env, 'SYSGATE_TIMEOUT_MS') ?? file.executor?.timeout_ms ?? DEFAULT_TIMEOUT_MS,
      maxOutputBytes: file.executor?.max_output_bytes ?? DEFAULT_MAX_OUTPUT_BYTES,
      killGraceMs: file.executor?.kill_grace_ms ?? DEFAULT_KILL_GRACE_MS,
      dryRun: readBooleanEnv(env, 'SYSGATE_DRY_RUN') ?? file.executor?.dry_run ?? false,
      programs: file.executor?.programs ?? {},
    },
    model: {
      command: readArgvEnv(env, 'SYSGATE_MODEL_COMMAND') ?? file.model?.command ?? DEFAULT_MODEL_COMMAND,
      timeoutMs: file.model?.timeout_ms ?? DEFAULT_MODEL_TIMEOUT_MS,
    },
  };
}

export function readConfigFile(configPath: string): ConfigFile {
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = yamlParse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to read ${configPath}: ${(err as Error).message}`);
  }
  if (raw === null || raw === undefined) return {};

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${configPath}: ${details}`);
  }
  return parsed.data;
}

function readPositiveIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== raw.trim()) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

function readBooleanEnv(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

function readArgvEnv(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const parts = raw.trim().split(/\s+/).filter(Boolean);
  return parts.length > 0 ? parts : undefined;
}
