import { describe, it, expect, vi } from 'vitest';
import { system, systemWithCause } from '../../lib/errors/index.js';
import type { TimerOutcome } from '../../lib/runner/index.js';
import { readVersion, runCli } from '../program.js';
import type { CliDependencies } from '../program.js';

const finished: TimerOutcome = {
  status: 'finished',
  initialMs: 90_000,
  remainingMs: 0,
  elapsedMs: 90_000,
  message: 'Timer finished!',
};

function fakeDeps(runTimer: CliDependencies['runTimer'] = vi.fn(async () => finished)) {
  const out: string[] = [];
  const err: string[] = [];
  const deps: CliDependencies = {
    runTimer,
    writeOut: (text) => {
      out.push(text);
    },
    writeErr: (text) => {
      err.push(text);
    },
  };
  return { deps, out, err };
}

const argv = (...args: string[]) => ['node', 'countdown', ...args];

describe('runCli', () => {
  it('parses the duration and runs the timer', async () => {
    const runTimer = vi.fn(async () => finished);
    const { deps, err } = fakeDeps(runTimer);
    await expect(runCli(argv('1:30'), deps)).resolves.toBe(0);
    expect(runTimer).toHaveBeenCalledWith(90_000);
    expect(err).toEqual([]);
  });

  it('exits 0 when the user stops the timer', async () => {
    const stopped: TimerOutcome = { ...finished, status: 'stopped', remainingMs: 30_000, elapsedMs: 60_000 };
    const { deps } = fakeDeps(vi.fn(async () => stopped));
    await expect(runCli(argv('1:30'), deps)).resolves.toBe(0);
  });

  it('reports a bad duration before touching the terminal', async () => {
    const runTimer = vi.fn(async () => finished);
    const { deps, err } = fakeDeps(runTimer);
    await expect(runCli(argv('1:x'), deps)).resolves.toBe(1);
    expect(runTimer).not.toHaveBeenCalled();
    expect(err).toEqual([
      [
        'Oh no! Failed to parse the seconds part.',
        '',
        'This was caused by:',
        ' - invalid digit found in string',
        '',
        'To try and fix this, you can:',
        ' - Make sure to provide a valid number for the seconds part',
        '',
      ].join('\n'),
    ]);
  });

  it('reports an overflowing duration', async () => {
    const { deps, err } = fakeDeps();
    await expect(runCli(argv('99999999999999999999:0'), deps)).resolves.toBe(1);
    expect(err[0]).toContain(' - Overflow in minutes\n');
  });

  it('exits non-zero on a terminal failure', async () => {
    const failure = systemWithCause(
      'Failed to write to the terminal',
      'Try notifying the developer',
      new Error('EIO'),
    );
    const { deps, err } = fakeDeps(vi.fn(async () => Promise.reject(failure)));
    await expect(runCli(argv('5'), deps)).resolves.toBe(1);
    expect(err[0].split('\n')[0]).toBe(
      "Whoops! Failed to write to the terminal (this isn't your fault).",
    );
  });

  it('exits non-zero on a usage error without a duration', async () => {
    const { deps, err } = fakeDeps();
    await expect(runCli(argv(), deps)).resolves.toBe(1);
    expect(err.join('')).toContain("missing required argument 'duration'");
  });

  it('rejects extra arguments', async () => {
    const runTimer = vi.fn(async () => finished);
    const { deps } = fakeDeps(runTimer);
    await expect(runCli(argv('1', '2'), deps)).resolves.toBe(1);
    expect(runTimer).not.toHaveBeenCalled();
  });

  it('prints the version and exits 0', async () => {
    const { deps, out } = fakeDeps();
    await expect(runCli(argv('--version'), deps)).resolves.toBe(0);
    expect(out).toEqual([`${readVersion()}\n`]);
  });

  it('prints help and exits 0', async () => {
    const { deps, out } = fakeDeps();
    await expect(runCli(argv('--help'), deps)).resolves.toBe(0);
    expect(out.join('')).toContain('Usage: countdown [options] <duration>');
  });

  it('formats a system error without a cause', async () => {
    const { deps, err } = fakeDeps(vi.fn(async () => Promise.reject(system('Failed to build the runtime', 'Try notifying the developer'))));
    await expect(runCli(argv('5'), deps)).resolves.toBe(1);
    expect(err).toEqual([
      "Whoops! Failed to build the runtime (this isn't your fault).\n\nTo try and fix this, you can:\n - Try notifying the developer\n",
    ]);
  });
});

describe('readVersion', () => {
  it('reads the package version', () => {
    expect(readVersion()).toBe('0.1.2');
  });
});
