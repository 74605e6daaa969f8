import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_MAX_INPUT_BYTES, extractJson, parseIntent } from '../core/intent.js';
import type { ParseErrorKind } from '../core/errors.js';

function expectError(raw: string, kind: ParseErrorKind, message?: string): string {
  const result = parseIntent(raw);
  assert.strictEqual(result.ok, false);
  if (result.ok) throw new Error('unreachable');
  assert.strictEqual(result.error.kind, kind);
  if (message !== undefined) {
    assert.strictEqual(result.error.message, message);
  }
  return result.error.message;
}

describe('parseIntent', () => {
  it('parses a bare command object', () => {
    const result = parseIntent('{"action":"kill_process","name":"firefox"}');
    assert.deepStrictEqual(result, { ok: true, command: { action: 'kill_process', name: 'firefox' } });
  });

  it('parses the model envelope', () => {
    const result = parseIntent('{"command":{"action":"restart_service","unit":"nginx"},"error":null,"cannot_process":false}');
    assert.deepStrictEqual(result, { ok: true, command: { action: 'restart_service', unit: 'nginx' } });
  });

  it('tolerates fences and prose around the object', () => {
    const raw = 'Sure! Here you go:\n```json\n{"action":"list_processes","sort":"memory"}\n```\n';
    const result = parseIntent(raw);
    assert.deepStrictEqual(result, { ok: true, command: { action: 'list_processes', sort: 'memory' } });
  });

  it('rejects output with no JSON object', () => {
    expectError('I cannot help with that.', 'malformed', 'No JSON object found in model output');
  });

  it('rejects invalid JSON', () => {
    const message = expectError('{"action": "kill_process", name: firefox}', 'malformed');
    assert.ok(message.startsWith('Invalid JSON: '));
  });

  it('rejects input over the size limit before parsing', () => {
    const raw = `{"action":"list_processes","filter":"${'a'.repeat(DEFAULT_MAX_INPUT_BYTES)}"}`;
    const size = Buffer.byteLength(raw, 'utf8');
    expectError(raw, 'too_large', `Input is ${size} bytes, limit is ${DEFAULT_MAX_INPUT_BYTES}`);
  });

  it('honors a custom size limit', () => {
    const result = parseIntent('{"action":"list_processes"}', { maxBytes: 10 });
    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.strictEqual(result.error.kind, 'too_large');
      assert.strictEqual(result.error.message, 'Input is 27 bytes, limit is 10');
    }
  });

  it('reports a model refusal', () => {
    expectError(
      '{"command":null,"error":"I will not format disks","cannot_process":true}',
      'declined',
      'Model declined the request: I will not format disks',
    );
    expectError('{"command":null}', 'declined', 'Model declined the request: no reason given');
  });

  it('rejects an unknown action', () => {
    expectError('{"action":"format_disk","device":"/dev/sda"}', 'unknown_action', 'Unknown action "format_disk"');
  });

  it('rejects a missing required field', () => {
    const message = expectError('{"action":"kill_process"}', 'schema');
    assert.ok(message.startsWith('Command does not match schema: name: '));
  });

  it('rejects unknown fields', () => {
    const message = expectError('{"action":"kill_process","name":"firefox","force":true}', 'schema');
    assert.ok(message.startsWith('Command does not match schema: '));
    assert.ok(message.includes('force'));
  });

  it('rejects a shell_query program outside the allow-set', () => {
    expectError(
      '{"action":"shell_query","program":"rm","args":["-rf","/"]}',
      'program_not_allowed',
      'Program "rm" is not allowed for shell_query',
    );
  });

  it('rejects a non-string shell_query program at the schema', () => {
    const message = expectError('{"action":"shell_query","program":7,"args":[]}', 'schema');
    assert.ok(message.startsWith('Command does not match schema: program: '));
  });

  it('rejects injection attempts in field values', () => {
    expectError(
      '{"action":"kill_process","name":"firefox; rm -rf ~"}',
      'invalid_command',
      'name: contains a shell metacharacter',
    );
  });

  it('rejects an object without an action', () => {
    const message = expectError('{"name":"firefox"}', 'schema');
    assert.ok(message.startsWith('Command does not match schema: action: '));
  });
});

describe('extractJson', () => {
  it('returns the outermost object span', () => {
    assert.strictEqual(extractJson('x {"a":{"b":1}} y'), '{"a":{"b":1}}');
  });

  it('returns null when there are no braces', () => {
    assert.strictEqual(extractJson('nothing here'), null);
    assert.strictEqual(extractJson('} backwards {'), null);
  });
});
