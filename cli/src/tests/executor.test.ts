import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import { Executor, exactPattern, filterLines } from '../core/executor.js';
import { spawnBounded } from '../sandbox/process.js';

/** Linux-only: a pid is gone once /proc no longer lists it or it is a zombie. */
function isAlive(pid: number): boolean {
  try {
    const stat = fs.readFileSync(`/proc/${pid}/stat`, 'utf-8');
    const state = stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3);
    return state !== 'Z';
  } catch {
    return false;
  }
}

async function waitForExit(pid: number, timeoutMs = 2000): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isAlive(pid)) return true;
    await sleep(25);
  }
  return !isAlive(pid);
}

describe('Executor.buildInvocation', () => {
  const executor = new Executor();

  it('starts applications detached by name', () => {
    assert.deepStrictEqual(executor.buildInvocation({ action: 'start_application', name: 'firefox' }), {
      argv: ['firefox'],
      detached: true,
    });
  });

  it('kills by exact name with SIGTERM by default', () => {
    assert.deepStrictEqual(executor.buildInvocation({ action: 'kill_process', name: 'firefox' }).argv, [
      'pkill', '-TERM', '-x', '--', 'firefox',
    ]);
    assert.deepStrictEqual(executor.buildInvocation({ action: 'kill_process', name: 'vlc', signal: 'KILL' }).argv, [
      'pkill', '-KILL', '-x', '--', 'vlc',
    ]);
  });

  it('escapes regex characters so pkill matches the literal name only', () => {
    assert.deepStrictEqual(executor.buildInvocation({ action: 'kill_process', name: 'ssh.' }).argv, [
      'pkill', '-TERM', '-x', '--', 'ssh\\.',
    ]);
    assert.deepStrictEqual(executor.buildInvocation({ action: 'kill_process', name: 's.+' }).argv, [
      'pkill', '-TERM', '-x', '--', 's\\.\\+',
    ]);
    assert.strictEqual(exactPattern('kworker:0-events'), 'kworker:0-events');
  });

  it('lists processes with an optional sort and a post-filter', () => {
    assert.deepStrictEqual(executor.buildInvocation({ action: 'list_processes' }), {
      argv: ['ps', 'aux'],
      detached: false,
      lineFilter: undefined,
    });
    assert.deepStrictEqual(executor.buildInvocation({ action: 'list_processes', filter: 'py', sort: 'cpu' }), {
      argv: ['ps', 'aux', '--sort=-%cpu'],
      detached: false,
      lineFilter: 'py',
    });
    assert.deepStrictEqual(executor.buildInvocation({ action: 'list_processes', sort: 'memory' }).argv, [
      'ps', 'aux', '--sort=-%mem',
    ]);
  });

  it('restarts services as .service units', () => {
    assert.deepStrictEqual(executor.buildInvocation({ action: 'restart_service', unit: 'nginx' }).argv, [
      'systemctl', 'restart', '--', 'nginx.service',
    ]);
    assert.deepStrictEqual(executor.buildInvocation({ action: 'restart_service', unit: 'nginx.service' }).argv, [
      'systemctl', 'restart', '--', 'nginx.service',
    ]);
  });

  it('passes shell_query args through unchanged', () => {
    assert.deepStrictEqual(
      executor.buildInvocation({ action: 'shell_query', program: 'grep', args: ['-i', 'error; reboot', 'app.log'] }).argv,
      ['grep', '-i', 'error; reboot', 'app.log'],
    );
  });

  it('uses configured program paths', () => {
    const custom = new Executor({ programs: { systemctl: ['/usr/bin/systemctl', '--user'] } });
    assert.deepStrictEqual(custom.buildInvocation({ action: 'restart_service', unit: 'pipewire' }).argv, [
      '/usr/bin/systemctl', '--user', 'restart', '--', 'pipewire.service',
    ]);
  });
});

describe('Executor.run', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sysgate-exec-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns the invocation without running it in dry-run mode', async () => {
    const executor = new Executor({ dryRun: true });
    const command = { action: 'kill_process', name: 'firefox' } as const;
    const result = await executor.run(command);
    assert.deepStrictEqual(result, {
      command,
      exitCode: 0,
      stdout: '[dry run] pkill -TERM -x -- firefox',
      stderr: '',
      durationMs: 0,
      timedOut: false,
      signal: null,
      truncated: false,
    });
  });

  it('hands each argument to the program as-is, with no shell in between', async () => {
    const executor = new Executor({ programs: { pkill: ['sh', '-c', 'printf "%s|" "$@"', 'pkill'] } });
    const result = await executor.run({ action: 'kill_process', name: 'firefox', signal: 'KILL' });
    assert.strictEqual(result.exitCode, 0);
    assert.strictEqual(result.stdout, '-KILL|-x|--|firefox|');
    assert.strictEqual(result.timedOut, false);
  });

  it('reports a non-zero exit with stderr', async () => {
    const executor = new Executor({ programs: { pkill: ['sh', '-c', 'echo boom >&2; exit 3', 'pkill'] } });
    const result = await executor.run({ action: 'kill_process', name: 'firefox' });
    assert.strictEqual(result.exitCode, 3);
    assert.strictEqual(result.stdout, '');
    assert.strictEqual(result.stderr, 'boom\n');
    assert.strictEqual(result.timedOut, false);
    assert.strictEqual(result.signal, null);
    assert.strictEqual(result.error, undefined);
  });

  it('filters list_processes output and keeps the header', async () => {
    const script = "printf 'USER PID COMMAND\\nroot 1 systemd\\nalice 42 Firefox\\nalice 43 bash\\n'";
    const executor = new Executor({ programs: { ps: ['sh', '-c', script, 'ps'] } });
    const result = await executor.run({ action: 'list_processes', filter: 'firefox' });
    assert.strictEqual(result.exitCode, 0);
    assert.strictEqual(result.stdout, 'USER PID COMMAND\nalice 42 Firefox');
  });

  it('reports a missing program without throwing', async () => {
    const executor = new Executor({ programs: { pkill: ['/nonexistent/pkill'] } });
    const result = await executor.run({ action: 'kill_process', name: 'firefox' });
    assert.strictEqual(result.exitCode, null);
    assert.strictEqual(result.error, 'Program not found: /nonexistent/pkill');
    assert.strictEqual(result.stderr, 'Program not found: /nonexistent/pkill');
    assert.strictEqual(result.timedOut, false);
  });

  it('caps captured output', async () => {
    const executor = new Executor({
      maxOutputBytes: 1000,
      programs: { ps: ['sh', '-c', 'yes | head -c 100000'] },
    });
    const result = await executor.run({ action: 'shell_query', program: 'ps', args: [] });
    assert.strictEqual(result.exitCode, 0);
    assert.strictEqual(result.stdout.length, 1000);
    assert.strictEqual(result.truncated, true);
  });

  it('terminates a hung command and its children on timeout', async () => {
    const pidFile = path.join(tmpDir, 'child.pid');
    const executor = new Executor({
      timeoutMs: 200,
      killGraceMs: 200,
      programs: { systemctl: ['sh', '-c', 'sleep 30 & echo $! > "$0"; wait', pidFile] },
    });

    const result = await executor.run({ action: 'restart_service', unit: 'nginx' });
    assert.strictEqual(result.timedOut, true);
    assert.strictEqual(result.exitCode, null);
    assert.ok(result.durationMs >= 200);
    assert.ok(result.durationMs < 5000);

    const childPid = Number.parseInt(fs.readFileSync(pidFile, 'utf-8').trim(), 10);
    assert.ok(Number.isInteger(childPid));
    assert.strictEqual(await waitForExit(childPid), true);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const executor = new Executor({
      timeoutMs: 200,
      killGraceMs: 200,
      programs: { systemctl: ['sh', '-c', 'trap "" TERM; sleep 30 & wait; wait', 'systemctl'] },
    });

    const result = await executor.run({ action: 'restart_service', unit: 'nginx' });
    assert.strictEqual(result.timedOut, true);
    assert.strictEqual(result.exitCode, null);
    assert.strictEqual(result.signal, 'SIGKILL');
    assert.ok(result.durationMs >= 400);
  });

  it('starts an application and returns without waiting for it', async () => {
    const executor = new Executor();
    const result = await executor.run({ action: 'start_application', name: 'true' });
    assert.strictEqual(result.exitCode, 0);
    assert.match(result.stdout, /^Started true \(pid \d+\)$/);
    assert.strictEqual(result.error, undefined);
  });

  it('reports an application that cannot be found', async () => {
    const executor = new Executor();
    const result = await executor.run({ action: 'start_application', name: 'sysgate-no-such-app' });
    assert.strictEqual(result.exitCode, null);
    assert.strictEqual(result.stdout, '');
    assert.strictEqual(result.error, 'Program not found: sysgate-no-such-app');
  });
});

describe('spawnBounded', () => {
  it('feeds input on stdin', async () => {
    const result = await spawnBounded(['cat'], {
      timeoutMs: 5000,
      maxOutputBytes: 1024,
      killGraceMs: 100,
      input: 'hello\n',
    });
    assert.strictEqual(result.exitCode, 0);
    assert.strictEqual(result.stdout, 'hello\n');
  });

  it('reports an empty argument vector', async () => {
    const result = await spawnBounded([], { timeoutMs: 100, maxOutputBytes: 10, killGraceMs: 10 });
    assert.strictEqual(result.error, 'Empty argument vector');
    assert.strictEqual(result.pid, null);
  });
});

describe('filterLines', () => {
  it('matches case-insensitively and always keeps the header', () => {
    assert.strictEqual(filterLines('H\nFoo 1\nbar 2\nfoo 3', 'FOO'), 'H\nFoo 1\nfoo 3');
    assert.strictEqual(filterLines('H\nbar', 'zzz'), 'H');
  });
});
