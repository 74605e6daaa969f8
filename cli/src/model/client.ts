/**
 * Model Client
 *
 * Runs the configured model command (default `ollama run llama3`) with the
 * prompt on stdin and returns whatever it printed. The text goes straight to
 * the intent parser; nothing here interprets it.
 */

import { spawnBounded } from '../sandbox/process.js';
import { buildPrompt } from './prompt.js';

export interface ModelClientOptions {
  command: readonly string[];
  timeoutMs: number;
  maxOutputBytes?: number;
}

export interface ModelReply {
  ok: boolean;
  text: string;
  error?: string;
}

const DEFAULT_MAX_REPLY_BYTES = 64 * 1024;

export class ModelClient {
  constructor(private readonly options: ModelClientOptions) {}

  async complete(request: string): Promise<ModelReply> {
    const result = await spawnBounded(this.options.command, {
      timeoutMs: this.options.timeoutMs,
      maxOutputBytes: this.options.maxOutputBytes ?? DEFAULT_MAX_REPLY_BYTES,
      killGraceMs: 1000,
      input: buildPrompt(request),
    });

    if (result.timedOut) {
      return { ok: false, text: result.stdout, error: `Model did not answer within ${this.options.timeoutMs}ms` };
    }
    if (result.error) {
      return { ok: false, text: result.stdout, error: result.error };
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n').pop() || `exit code ${result.exitCode ?? 'unknown'}`;
      return { ok: false, text: result.stdout, error: `Model command failed: ${detail}` };
    }
    return { ok: true, text: result.stdout };
  }
}
