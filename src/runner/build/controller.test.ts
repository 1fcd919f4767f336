import { EventEmitter } from 'node:events';
import { realpathSync } from 'node:fs';
import { mkdir, mkdtemp, readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FatalError, InterruptedError } from '@/runner/errors';
import { HIDE_CURSOR, SHOW_CURSOR } from '@/runner/progress/cursor';
import { attachInterrupts } from '@/runner/session/signals';
import { ProcessSupervisor } from '@/runner/session/supervisor';
import { pad } from '@/runner/ui/printer';
import { rmDirWithRetries } from '@/test';
import { memoryPrinter, waitForFile } from '@/test-support/session';

import {
  BuildController,
  type BuildOperations,
  withWorkingDirectory,
} from './controller';

const node = (source: string): string[] => [process.execPath, '-e', source];
const record = (word: string) =>
  node(`require('fs').appendFileSync('ops.log', '${word}\\n')`);

const OPS: BuildOperations = {
  clean: record('clean'),
  configure: record('configure'),
  make: record('make'),
};

describe('BuildController', () => {
  let dir: string;
  let cwd: string;

  beforeEach(async () => {
    cwd = process.cwd();
    dir = await mkdtemp(path.join(os.tmpdir(), 'relcheck-build-'));
    await mkdir(path.join(dir, 'orb-4.9'));
  });

  afterEach(async () => {
    process.chdir(cwd);
    await rmDirWithRetries(dir);
  });

  const controller = (operations: BuildOperations = OPS) => {
    const mem = memoryPrinter();
    return {
      mem,
      ctl: new BuildController({
        printer: mem.printer,
        supervisor: new ProcessSupervisor(),
        signal: new AbortController().signal,
        operations,
        progressIntervalMs: 60_000,
      }),
    };
  };

  it('builds inside the located directory and records the state', async () => {
    const { ctl, mem } = controller();
    expect(ctl.state('orb')).toBe('unknown');
    const target = await ctl.build(dir, 'orb');
    expect(target).toEqual({
      name: 'orb',
      directory: path.join(dir, 'orb-4.9'),
      state: 'compiled',
    });
    expect(ctl.state('orb')).toBe('compiled');
    expect(await readFile(path.join(dir, 'orb-4.9', 'ops.log'), 'utf8')).toBe(
      'configure\nmake\n',
    );
    expect(process.cwd()).toBe(cwd);
    expect(mem.text()).toBe(`${pad('Compiling orb')} . . . \n`);
  });

  it('cleans and marks the target uncompiled', async () => {
    const { ctl, mem } = controller();
    await ctl.build(dir, 'orb');
    await ctl.clean(dir, 'orb');
    expect(ctl.state('orb')).toBe('uncompiled');
    expect(await readFile(path.join(dir, 'orb-4.9', 'ops.log'), 'utf8')).toBe(
      'configure\nmake\nclean\n',
    );
    expect(mem.lines()).toContain(`${pad('Deleting orb binary')} . . . `);
  });

  it('is fatal on a non-zero exit and restores the working directory', async () => {
    const failing = node('process.exit(2)');
    const { ctl } = controller({ ...OPS, make: failing });
    await expect(ctl.build(dir, 'orb')).rejects.toThrow(
      `relcheck: error: ${failing.join(' ')} failed!`,
    );
    expect(process.cwd()).toBe(cwd);
    expect(ctl.state('orb')).toBe('unknown');
  });

  it('is fatal when the directory is missing', async () => {
    const { ctl } = controller();
    const err = await ctl.build(dir, 'grape').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FatalError);
    expect(err instanceof Error ? err.message : '').toBe(
      `relcheck: error: can't find the grape directory in ${dir}`,
    );
    expect(ctl.state('grape')).toBe('unknown');
  });

  it('is fatal when the operation cannot be launched', async () => {
    const { ctl } = controller({ ...OPS, clean: [path.join(dir, 'nope')] });
    await expect(ctl.clean(dir, 'orb')).rejects.toThrow(
      `relcheck: error: ${path.join(dir, 'nope')} failed!`,
    );
  });
});

describe('BuildController interrupt', () => {
  let dir: string;
  let cwd: string;

  beforeEach(async () => {
    cwd = process.cwd();
    dir = await mkdtemp(path.join(os.tmpdir(), 'relcheck-build-int-'));
    await mkdir(path.join(dir, 'orb-4.9'));
  });

  afterEach(async () => {
    process.chdir(cwd);
    await rmDirWithRetries(dir);
  });

  it('kills a hanging operation, prints Killed! and restores the cursor and cwd', async () => {
    const mem = memoryPrinter(true);
    const supervisor = new ProcessSupervisor(200);
    const signals = new EventEmitter();
    const interrupts = attachInterrupts(supervisor, signals);
    const pidFile = path.join(dir, 'orb-4.9', 'op.pid');
    try {
      const ctl = new BuildController({
        printer: mem.printer,
        supervisor,
        signal: interrupts.signal,
        operations: {
          ...OPS,
          make: node(
            "require('fs').writeFileSync('op.pid', String(process.pid)); setInterval(() => undefined, 1000)",
          ),
        },
        progressIntervalMs: 60_000,
      });
      const running = ctl.build(dir, 'orb');
      await waitForFile(pidFile);
      signals.emit('SIGINT');
      await expect(running).rejects.toBeInstanceOf(InterruptedError);

      const pid = Number(await readFile(pidFile, 'utf8'));
      expect(() => process.kill(pid, 0)).toThrow();
      expect(process.cwd()).toBe(cwd);
      expect(ctl.state('orb')).toBe('unknown');
      expect(mem.text()).toBe(
        `${HIDE_CURSOR}${pad('Compiling orb')} . . . ${SHOW_CURSOR}\nKilled!\n`,
      );
    } finally {
      interrupts.detach();
    }
  });
});

describe('withWorkingDirectory', () => {
  it('switches back even when the body throws', async () => {
    const before = process.cwd();
    const target = os.tmpdir();
    await expect(
      withWorkingDirectory(target, async () => {
        expect(process.cwd()).toBe(realpathSync(target));
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(process.cwd()).toBe(before);
  });
});
