/**
 * Intent Parser: raw model output → Command
 *
 * The model is asked for JSON but is not trusted to produce it. This module
 * only deserializes and validates; nothing here is executed or handed to a shell.
 *
 * Accepted shapes:
 *   {"action": "kill_process", "name": "firefox"}
 *   {"command": {"action": ...}, "error": null, "cannot_process": false}
 *
 * Markdown fences and prose around the object are tolerated.
 */

import { z } from 'zod';
import { createCommand, isActionTag, isShellQueryProgram } from './command.js';
import { InvalidCommandError, ParseError } from './errors.js';
import type { Command } from './types.js';

export const DEFAULT_MAX_INPUT_BYTES = 8192;

export interface ParseOptions {
  maxBytes?: number;
}

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; error: ParseError };

const StartApplicationSchema = z.object({
  action: z.literal('start_application'),
  name: z.string(),
}).strict();

const KillProcessSchema = z.object({
  action: z.literal('kill_process'),
  name: z.string(),
  signal: z.enum(['TERM', 'INT', 'HUP', 'KILL']).optional(),
}).strict();

const ListProcessesSchema = z.object({
  action: z.literal('list_processes'),
  filter: z.string().optional(),
  sort: z.enum(['cpu', 'memory']).optional(),
}).strict();

const RestartServiceSchema = z.object({
  action: z.literal('restart_service'),
  unit: z.string(),
}).strict();

const ShellQuerySchema = z.object({
  action: z.literal('shell_query'),
  program: z.enum(['ps', 'grep']),
  args: z.array(z.string()),
}).strict();

export const CommandSchema = z.discriminatedUnion('action', [
  StartApplicationSchema,
  KillProcessSchema,
  ListProcessesSchema,
  RestartServiceSchema,
  ShellQuerySchema,
]);

export function parseIntent(raw: string, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, command: decode(raw, options.maxBytes ?? DEFAULT_MAX_INPUT_BYTES) };
  } catch (err) {
    if (err instanceof ParseError) {
      return { ok: false, error: err };
    }
    if (err instanceof InvalidCommandError) {
      return { ok: false, error: new ParseError('invalid_command', err.message) };
    }
    throw err;
  }
}

function decode(raw: string, maxBytes: number): Command {
  const size = Buffer.byteLength(raw, 'utf8');
  if (size > maxBytes) {
    throw new ParseError('too_large', `Input is ${size} bytes, limit is ${maxBytes}`);
  }

  const json = extractJson(raw);
  if (json === null) {
    throw new ParseError('malformed', 'No JSON object found in model output');
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new ParseError('malformed', `Invalid JSON: ${(err as Error).message}`);
  }

  const candidate = unwrapEnvelope(data);

  if (isRecord(candidate) && typeof candidate.action === 'string' && !isActionTag(candidate.action)) {
    throw new ParseError('unknown_action', `Unknown action "${candidate.action.slice(0, 64)}"`);
  }

  if (
    isRecord(candidate)
    && candidate.action === 'shell_query'
    && typeof candidate.program === 'string'
    && !isShellQueryProgram(candidate.program)
  ) {
    throw new ParseError('program_not_allowed', `Program "${candidate.program.slice(0, 64)}" is not allowed for shell_query`);
  }

  const decoded = CommandSchema.safeParse(candidate);
  if (!decoded.success) {
    const details = decoded.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParseError('schema', `Command does not match schema: ${details}`);
  }

  return createCommand(decoded.data);
}

/**
 * Strip code fences and take the outermost {...} span.
 */
export function extractJson(text: string): string | null {
  const stripped = text.replace(/```(?:json)?\s*/gi, '');
  const start = stripped.indexOf('{');
  const end = stripped.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return stripped.slice(start, end + 1);
}

function unwrapEnvelope(data: unknown): unknown {
  if (!isRecord(data) || 'action' in data || !('command' in data)) {
    return data;
  }

  const stated = typeof data.error === 'string' && data.error.length > 0
    ? data.error.slice(0, 256)
    : 'no reason given';

  if (data.cannot_process === true || data.command === null) {
    throw new ParseError('declined', `Model declined the request: ${stated}`);
  }
  return data.command;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
