import { describe, expect, it, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';

const childProcessMocks = vi.hoisted(() => {
  return {
    spawnMock: vi.fn(),
  };
});

vi.mock('node:child_process', () => ({
  spawn: childProcessMocks.spawnMock,
}));

const { spawnMock } = childProcessMocks;

import { formatCommand, signalExitCode, spawnCommand } from '../src/process/index.js';

function fakeChild(script: (child: EventEmitter) => void): EventEmitter {
  const child = new EventEmitter();
  setImmediate(() => script(child));
  return child;
}

describe('spawnCommand', () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it('runs the command in the given directory with inherited stdio', async () => {
    spawnMock.mockReturnValue(fakeChild(child => child.emit('close', 0, null)));

    const outcome = await spawnCommand({ command: 'clang++', args: ['out.ll', '-o', 'out.bin'], cwd: '/work' });

    expect(outcome).toEqual({ exitCode: 0, signal: null });
    expect(spawnMock).toHaveBeenCalledWith('clang++', ['out.ll', '-o', 'out.bin'], { cwd: '/work', stdio: 'inherit' });
  });

  it('passes the program exit code through', async () => {
    spawnMock.mockReturnValue(fakeChild(child => child.emit('close', 42, null)));

    const outcome = await spawnCommand({ command: '/work/out.bin', args: [], cwd: '/work' });

    expect(outcome.exitCode).toBe(42);
  });

  it('maps a terminating signal to 128 + signal number', async () => {
    spawnMock.mockReturnValue(fakeChild(child => child.emit('close', null, 'SIGKILL')));

    const outcome = await spawnCommand({ command: '/work/out.bin', args: [], cwd: '/work' });

    expect(outcome).toEqual({ exitCode: 137, signal: 'SIGKILL' });
  });

  it('reports a spawn error with the shell exit code for a missing command', async () => {
    spawnMock.mockReturnValue(
      fakeChild(child => {
        child.emit('error', new Error('spawn no-such-cc ENOENT'));
        child.emit('close', -2, null);
      }),
    );

    const outcome = await spawnCommand({ command: 'no-such-cc', args: [], cwd: '/work' });

    expect(outcome.exitCode).toBe(127);
    expect(outcome.error?.message).toBe('spawn no-such-cc ENOENT');
  });
});

describe('command helpers', () => {
  it('formats commands with quoting where needed', () => {
    expect(formatCommand({ command: 'clang++', args: ['-O3', 'my file.ll', ''] })).toBe('clang++ -O3 "my file.ll" ""');
  });

  it('derives exit codes from signals', () => {
    expect(signalExitCode('SIGTERM')).toBe(143);
    expect(signalExitCode(null)).toBe(1);
  });
});
