/**
 * Command Runner Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { spawn } from 'node:child_process';
import { ShellCommandRunner, toLogLines } from './command-runner.js';

// ===========================================
// Mock child_process spawn
// ===========================================

class FakeProcess extends EventEmitter {
  pid: number | undefined = undefined;
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  stdin = { end: vi.fn() };
  kill = vi.fn((signal: string) => {
    setTimeout(() => this.emit('close', null, signal), 0);
    return true;
  });
}

let proc: FakeProcess;

vi.mock('node:child_process', () => ({
  spawn: vi.fn(() => proc),
}));

describe('ShellCommandRunner', () => {
  const runner = new ShellCommandRunner();

  beforeEach(() => {
    proc = new FakeProcess();
    vi.mocked(spawn).mockClear();
    vi.spyOn(process, 'kill').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.mocked(process.kill).mockRestore();
  });

  it('should capture output and the exit code', async () => {
    const pending = runner.run('npm test', [], { cwd: '/work/api', shell: true, env: { CI: 'true' } });

    proc.stdout.emit('data', Buffer.from('12 passed\n'));
    proc.stderr.emit('data', Buffer.from('warning: slow test\n'));
    proc.emit('close', 0);

    const result = await pending;
    expect(result).toMatchObject({ exitCode: 0, stdout: '12 passed\n', stderr: 'warning: slow test\n', timedOut: false });
    expect(vi.mocked(spawn)).toHaveBeenCalledWith(
      'npm test',
      [],
      expect.objectContaining({ cwd: '/work/api', shell: true, env: expect.objectContaining({ CI: 'true' }) })
    );
  });

  it('should write input to stdin', async () => {
    const pending = runner.run('docker', ['login', '--password-stdin'], { cwd: '/', input: 'test-secret' });
    proc.emit('close', 0);
    await pending;

    expect(proc.stdin.end).toHaveBeenCalledWith('test-secret');
  });

  it('should kill the process on timeout', async () => {
    const result = await runner.run('sleep 10', [], { cwd: '/', shell: true, timeoutMs: 5 });

    expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it('should signal the whole process group on timeout', async () => {
    proc.pid = 4321;
    const kill = vi.mocked(process.kill).mockImplementation(() => {
      setTimeout(() => proc.emit('close', null, 'SIGTERM'), 0);
      return true;
    });

    const result = await runner.run('npm test', [], { cwd: '/work/api', shell: true, timeoutMs: 5 });

    expect(kill).toHaveBeenCalledWith(-4321, 'SIGTERM');
    expect(proc.kill).not.toHaveBeenCalled();
    expect(result.timedOut).toBe(true);
    expect(vi.mocked(spawn)).toHaveBeenCalledWith('npm test', [], expect.objectContaining({ detached: true }));
  });

  it('should fall back to the child when the group cannot be signalled', async () => {
    proc.pid = 4321;
    vi.mocked(process.kill).mockImplementation(() => {
      throw new Error('kill ESRCH');
    });

    const result = await runner.run('npm test', [], { cwd: '/work/api', shell: true, timeoutMs: 5 });

    expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
    expect(result.timedOut).toBe(true);
  });

  it('should reject when the process cannot start', async () => {
    const pending = runner.run('missing-binary', [], { cwd: '/' });
    proc.emit('error', new Error('spawn missing-binary ENOENT'));

    await expect(pending).rejects.toThrow('spawn missing-binary ENOENT');
  });
});

describe('toLogLines', () => {
  it('should split output into non-empty lines', () => {
    expect(toLogLines('a\r\nb\n\n', 'c\n')).toEqual(['a', 'b', 'c']);
  });
});
