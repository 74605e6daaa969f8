/**
 * Command Model
 *
 * The closed vocabulary of actions sysgate can perform, and the field rules
 * every Command must satisfy before anything downstream looks at it:
 *
 *   - strings are 1..256 characters
 *   - no shell metacharacters, control characters or ".." path segments
 *   - names and units are plain identifiers (no whitespace, no slash)
 *   - shell_query programs come from a fixed allow-set
 *
 * createCommand() returns a frozen copy holding only the known fields.
 */

import { InvalidCommandError } from './errors.js';
import type { ActionTag, Command, KillSignal, ProcessSort, ShellQueryProgram } from './types.js';

export const ACTION_TAGS: readonly ActionTag[] = [
  'start_application',
  'kill_process',
  'list_processes',
  'restart_service',
  'shell_query',
];

export const SHELL_QUERY_PROGRAMS: readonly ShellQueryProgram[] = ['ps', 'grep'];
export const KILL_SIGNALS: readonly KillSignal[] = ['TERM', 'INT', 'HUP', 'KILL'];
export const PROCESS_SORTS: readonly ProcessSort[] = ['cpu', 'memory'];

export const MAX_FIELD_LENGTH = 256;
export const MAX_ARGS = 32;

const SHELL_METACHARACTERS = /[;|&$`<>\n]/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;
const IDENTIFIER = /^[A-Za-z0-9][A-Za-z0-9._@+:-]*$/;

export function isActionTag(value: string): value is ActionTag {
  return (ACTION_TAGS as readonly string[]).includes(value);
}

export function isShellQueryProgram(value: string): value is ShellQueryProgram {
  return (SHELL_QUERY_PROGRAMS as readonly string[]).includes(value);
}

export function containsShellMetacharacter(value: string): boolean {
  return SHELL_METACHARACTERS.test(value);
}

export function createCommand(input: Command): Command {
  switch (input.action) {
    case 'start_application':
      return Object.freeze({
        action: input.action,
        name: checkIdentifier('name', input.name),
      });

    case 'kill_process': {
      if (input.signal !== undefined && !KILL_SIGNALS.includes(input.signal)) {
        throw new InvalidCommandError('signal', `must be one of ${KILL_SIGNALS.join(', ')}`);
      }
      return Object.freeze({
        action: input.action,
        name: checkIdentifier('name', input.name),
        ...(input.signal !== undefined ? { signal: input.signal } : {}),
      });
    }

    case 'list_processes': {
      if (input.sort !== undefined && !PROCESS_SORTS.includes(input.sort)) {
        throw new InvalidCommandError('sort', `must be one of ${PROCESS_SORTS.join(', ')}`);
      }
      return Object.freeze({
        action: input.action,
        ...(input.filter !== undefined ? { filter: checkText('filter', input.filter) } : {}),
        ...(input.sort !== undefined ? { sort: input.sort } : {}),
      });
    }

    case 'restart_service':
      return Object.freeze({
        action: input.action,
        unit: checkIdentifier('unit', input.unit),
      });

    case 'shell_query': {
      if (!isShellQueryProgram(input.program)) {
        throw new InvalidCommandError('program', `must be one of ${SHELL_QUERY_PROGRAMS.join(', ')}`);
      }
      if (input.args.length > MAX_ARGS) {
        throw new InvalidCommandError('args', `at most ${MAX_ARGS} arguments are allowed`);
      }
      const args = input.args.map((arg, i) => checkText(`args[${i}]`, arg));
      return Object.freeze({
        action: input.action,
        program: input.program,
        args: Object.freeze(args),
      });
    }

    default:
      return assertNever(input);
  }
}

/** One-line description for prompts and logs. */
export function describeCommand(command: Command): string {
  switch (command.action) {
    case 'start_application':
      return `start application "${command.name}"`;
    case 'kill_process':
      return `kill process "${command.name}" (SIG${command.signal ?? 'TERM'})`;
    case 'list_processes': {
      const parts = ['list processes'];
      if (command.filter) parts.push(`matching "${command.filter}"`);
      if (command.sort) parts.push(`sorted by ${command.sort}`);
      return parts.join(' ');
    }
    case 'restart_service':
      return `restart service "${command.unit}"`;
    case 'shell_query':
      return `query: ${[command.program, ...command.args].join(' ')}`;
    default:
      return assertNever(command);
  }
}

export function assertNever(value: never): never {
  throw new InvalidCommandError('action', `unsupported action ${JSON.stringify(value)}`);
}

function checkText(field: string, value: string): string {
  if (typeof value !== 'string') {
    throw new InvalidCommandError(field, 'must be a string');
  }
  if (value.length === 0) {
    throw new InvalidCommandError(field, 'must not be empty');
  }
  if (value.length > MAX_FIELD_LENGTH) {
    throw new InvalidCommandError(field, `exceeds ${MAX_FIELD_LENGTH} characters`);
  }
  if (containsShellMetacharacter(value)) {
    throw new InvalidCommandError(field, 'contains a shell metacharacter');
  }
  if (CONTROL_CHARACTERS.test(value)) {
    throw new InvalidCommandError(field, 'contains a control character');
  }
  if (value.split('/').includes('..')) {
    throw new InvalidCommandError(field, 'contains a path traversal sequence');
  }
  return value;
}

function checkIdentifier(field: string, value: string): string {
  checkText(field, value);
  if (!IDENTIFIER.test(value)) {
    throw new InvalidCommandError(field, 'must be a plain name (letters, digits, . _ @ + : -)');
  }
  return value;
}
