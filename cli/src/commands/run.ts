/**
 * sysgate run / sysgate ask: push one request through the gate
 *
 *   sysgate run '{"action":"kill_process","name":"firefox"}'
 *   echo '{"action":"list_processes"}' | sysgate run
 *   sysgate ask kill firefox
 *
 * `run` takes model output directly; `ask` gets it from the model command.
 */

import fs from 'node:fs';
import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { loadConfig, type SysgateConfig } from '../config/config.js';
import { describeCommand } from '../core/command.js';
import { Executor } from '../core/executor.js';
import { createGate, type Gate } from '../core/gate.js';
import { loadPolicy } from '../core/policy.js';
import { FileAuditTrail } from '../audit/logger.js';
import { ModelClient } from '../model/client.js';
import { exitCodeFor, formatOutcome } from './format.js';
import type { Command, Verdict } from '../core/types.js';

export interface RunOptions {
  quiet?: boolean;
  dryRun?: boolean;
  yes?: boolean;
}

/** Read one answer; a stream that is already at its end, or ends first, answers "". */
export function promptLine(
  question: string,
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): Promise<string> {
  if (input.readableEnded) {
    output.write(`${question}(no input, answering no)\n`);
    return Promise.resolve('');
  }
  const rl = readline.createInterface({ input, output });
  return new Promise((resolve) => {
    rl.once('close', () => resolve(''));
    rl.question(question, (answer) => {
      resolve(answer.trim());
      rl.close();
    });
  });
}

async function confirmOnTerminal(command: Command, verdict: Verdict): Promise<boolean> {
  console.log(`  About to ${describeCommand(command)} (${verdict.reason})`);
  const answer = await promptLine('  Proceed? [y/N] ');
  return answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes';
}

export function buildGate(config: SysgateConfig, options: RunOptions = {}): Gate {
  if (!fs.existsSync(config.policyPath)) {
    throw new Error(`Policy not found at ${config.policyPath}. Run: sysgate init`);
  }

  const policy = loadPolicy(config.policyPath);
  const executor = new Executor({
    timeoutMs: config.executor.timeoutMs,
    maxOutputBytes: config.executor.maxOutputBytes,
    killGraceMs: config.executor.killGraceMs,
    dryRun: options.dryRun || config.executor.dryRun,
    programs: config.executor.programs,
  });
  const audit = new FileAuditTrail(config.auditPath);
  const needsConfirmation = config.requireConfirmation && !options.yes;

  return createGate({
    policy,
    executor,
    audit,
    confirm: needsConfirmation ? confirmOnTerminal : undefined,
    quiet: options.quiet,
  });
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function submit(gate: Gate, rawInput: string): Promise<void> {
  const outcome = await gate(rawInput);
  console.log('');
  for (const line of formatOutcome(outcome)) {
    console.log(`  ${line}`);
  }
  console.log('');
  process.exitCode = exitCodeFor(outcome.status);
}

export async function runCommand(input: string | undefined, options: RunOptions): Promise<void> {
  try {
    const config = loadConfig();
    const gate = buildGate(config, options);
    const rawInput = input ?? (await readStdin());
    await submit(gate, rawInput);
  } catch (err) {
    console.error(`  ❌ ${(err as Error).message}`);
    process.exitCode = 1;
  }
}

export async function askCommand(words: string[], options: RunOptions): Promise<void> {
  const request = words.join(' ').trim();
  if (!request) {
    console.error('  ❌ Usage: sysgate ask <request...>');
    process.exitCode = 1;
    return;
  }

  try {
    const config = loadConfig();
    const gate = buildGate(config, options);
    const model = new ModelClient({ command: config.model.command, timeoutMs: config.model.timeoutMs });

    if (!options.quiet) {
      console.log(`  [model] ${config.model.command.join(' ')}`);
    }
    const reply = await model.complete(request);
    if (!reply.ok) {
      console.error(`  ❌ ${reply.error ?? 'Model call failed'}`);
      process.exitCode = 1;
      return;
    }

    await submit(gate, reply.text);
  } catch (err) {
    console.error(`  ❌ ${(err as Error).message}`);
    process.exitCode = 1;
  }
}
