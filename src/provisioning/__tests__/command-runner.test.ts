import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import { describeFailure, SpawnCommandRunner } from '../command-runner';
import { commandResult } from '../../__tests__/fakes';

vi.mock('child_process', () => ({
  spawn: vi.fn()
}));

class FakeChild extends EventEmitter {
  stdout = Object.assign(new EventEmitter(), { setEncoding: vi.fn() });
  stderr = Object.assign(new EventEmitter(), { setEncoding: vi.fn() });
  stdin = Object.assign(new EventEmitter(), { end: vi.fn() });
}

describe('SpawnCommandRunner', () => {
  let child: FakeChild;
  let runner: SpawnCommandRunner;

  beforeEach(() => {
    child = new FakeChild();
    vi.mocked(spawn).mockReset();
    vi.mocked(spawn).mockImplementation(() => child as never);
    runner = new SpawnCommandRunner({ PATH: '/usr/bin' });
  });

  it('should buffer output of a successful command', async () => {
    const pending = runner.run('docker', ['images'], { cwd: '/srv/app', env: { DOCKER_HOST: 'tcp://192.168.49.2:2376' } });
    child.stdout.emit('data', 'REPOSITORY   TAG\n');
    child.stdout.emit('data', 'backend      latest\n');
    child.emit('close', 0, null);

    await expect(pending).resolves.toEqual({
      ok: true,
      exitCode: 0,
      stdout: 'REPOSITORY   TAG\nbackend      latest\n',
      stderr: ''
    });
    expect(spawn).toHaveBeenCalledWith('docker', ['images'], {
      cwd: '/srv/app',
      env: { PATH: '/usr/bin', DOCKER_HOST: 'tcp://192.168.49.2:2376' },
      timeout: undefined
    });
  });

  it('should bound the command by its timeout', async () => {
    const pending = runner.run('kubectl', ['version', '--client'], { timeoutMs: 10000 });
    child.emit('close', null, 'SIGTERM');

    expect((await pending).error).toBe('kubectl was terminated by SIGTERM');
    expect(spawn).toHaveBeenCalledWith('kubectl', ['version', '--client'], {
      cwd: undefined,
      env: { PATH: '/usr/bin' },
      timeout: 10000
    });
  });

  it('should report a non-zero exit without throwing', async () => {
    const pending = runner.run('kubectl', ['apply', '-f', '-']);
    child.stderr.emit('data', 'error: no objects passed to apply\n');
    child.emit('close', 1, null);

    const result = await pending;

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('error: no objects passed to apply\n');
    expect(result.error).toBe('kubectl exited with code 1');
  });

  it('should report termination by signal', async () => {
    const pending = runner.run('kubectl', ['wait']);
    child.emit('close', null, 'SIGTERM');

    const result = await pending;

    expect(result.exitCode).toBeNull();
    expect(result.error).toBe('kubectl was terminated by SIGTERM');
  });

  it('should settle once when the command cannot be started', async () => {
    const pending = runner.run('minikube', ['status']);
    child.emit('error', new Error('spawn minikube ENOENT'));
    child.emit('close', -2, null);

    await expect(pending).resolves.toEqual({
      ok: false,
      exitCode: null,
      stdout: '',
      stderr: '',
      error: 'spawn minikube ENOENT'
    });
  });

  it('should write input to stdin', async () => {
    const pending = runner.run('kubectl', ['apply', '-f', '-'], { input: 'kind: Secret\n' });
    child.emit('close', 0, null);
    await pending;

    expect(child.stdin.end).toHaveBeenCalledWith('kind: Secret\n');
  });

  it('should record stdin errors in stderr', async () => {
    const pending = runner.run('kubectl', ['apply', '-f', '-'], { input: 'kind: Secret\n' });
    child.stdin.emit('error', new Error('write EPIPE'));
    child.emit('close', 1, null);

    expect((await pending).stderr).toBe('stdin: write EPIPE\n');
  });
});

describe('describeFailure', () => {
  it('should prefer the last stderr line', () => {
    const result = commandResult({ ok: false, stderr: 'warning: deprecated\nerror: not found\n\n', error: 'x exited with code 1' });

    expect(describeFailure(result)).toBe('error: not found');
  });

  it('should fall back to the error, then stdout', () => {
    expect(describeFailure(commandResult({ ok: false, error: 'docker exited with code 2' }))).toBe('docker exited with code 2');
    expect(describeFailure(commandResult({ ok: false, stdout: 'step 1\nstep 2 failed\n' }))).toBe('step 2 failed');
    expect(describeFailure(commandResult({ ok: false }))).toBe('unknown error');
  });
});
