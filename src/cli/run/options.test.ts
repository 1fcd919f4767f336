import { mkdir, mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_BUILD_OPERATIONS } from '@/runner/build/controller';
import { DEFAULT_QUICK_TESTS } from '@/runner/matrix/statements';
import { rmDirWithRetries } from '@/test';
import { makeEnvRoot } from '@/test-support/session';

import {
  checkSetup,
  deriveLoadName,
  expandPath,
  pkgDirFor,
  resolveRunOptions,
} from './options';

const none = { path: null, config: {} };

describe('resolveRunOptions', () => {
  it('falls back to the built-in defaults', () => {
    expect(resolveRunOptions({}, none, '/work')).toEqual({
      roots: [path.join(os.homedir(), 'gap')],
      pkgDir: undefined,
      pkgName: 'semigroups',
      loadName: 'semigroups',
      companion: 'smallsemi',
      dependencies: ['grape', 'orb'],
      toggle: 'orb',
      quickTests: DEFAULT_QUICK_TESTS,
      session: { command: 'bin/gap.sh', memory: '1g', verbose: false },
      build: DEFAULT_BUILD_OPERATIONS,
      progressIntervalMs: undefined,
      keep: false,
      logDir: undefined,
    });
  });

  it('lets flags win over the config file', () => {
    const opts = resolveRunOptions(
      { pkgName: 'semigroups-5.3.0', verbose: true, keep: false },
      {
        path: '/cfg/relcheck.config.yml',
        config: { pkgName: 'other', cliDefaults: { verbose: false, keep: true } },
      },
      '/work',
    );
    expect(opts.pkgName).toBe('semigroups-5.3.0');
    expect(opts.loadName).toBe('semigroups');
    expect(opts.session.verbose).toBe(true);
    expect(opts.keep).toBe(false);
  });

  it('resolves flag paths from cwd and config paths from the config file', () => {
    const loaded = {
      path: '/cfg/relcheck.config.yml',
      config: { roots: ['a', '~/b'], pkgDir: 'pkgs', logDir: 'logs' },
    };
    const fromConfig = resolveRunOptions({}, loaded, '/work');
    expect(fromConfig.roots).toEqual(['/cfg/a', path.join(os.homedir(), 'b')]);
    expect(fromConfig.pkgDir).toBe('/cfg/pkgs');
    expect(fromConfig.logDir).toBe('/cfg/logs');

    const fromFlags = resolveRunOptions(
      { root: ['x'], pkgDir: 'p', logDir: 'l' },
      loaded,
      '/work',
    );
    expect(fromFlags.roots).toEqual(['/work/x']);
    expect(fromFlags.pkgDir).toBe('/work/p');
    expect(fromFlags.logDir).toBe('/work/l');
  });

  it('toggles the last dependency unless told otherwise', () => {
    expect(
      resolveRunOptions({}, { path: null, config: { dependencies: ['io'] } }, '/w')
        .toggle,
    ).toBe('io');
    expect(
      resolveRunOptions(
        {},
        { path: null, config: { dependencies: ['io', 'orb'], toggle: 'io' } },
        '/w',
      ).toggle,
    ).toBe('io');
  });

  it('maps configured quick tests and build operations', () => {
    const opts = resolveRunOptions(
      {},
      {
        path: null,
        config: {
          quickTests: [{ test: 't.tst' }, { examples: 'x.xml' }, { read: 'r.g' }],
          build: { make: ['make', '-j4'] },
          roots: 'env',
        },
      },
      '/w',
    );
    expect(opts.roots).toEqual(['/w/env']);
    expect(opts.quickTests).toEqual([
      { kind: 'test', path: 't.tst' },
      { kind: 'examples', chapter: 'x.xml' },
      { kind: 'read', path: 'r.g' },
    ]);
    expect(opts.build).toEqual({
      clean: ['make', 'clean'],
      configure: ['./configure'],
      make: ['make', '-j4'],
    });
  });
});

describe('path helpers', () => {
  it('expands the home directory', () => {
    expect(expandPath('~', '/w')).toBe(os.homedir());
    expect(expandPath('~/gap', '/w')).toBe(path.join(os.homedir(), 'gap'));
    expect(expandPath('rel', '/w')).toBe('/w/rel');
  });

  it('derives the load name from a versioned directory name', () => {
    expect(deriveLoadName('semigroups-5.3.0')).toBe('semigroups');
    expect(deriveLoadName('io-4.8.2')).toBe('io');
    expect(deriveLoadName('semigroups')).toBe('semigroups');
    expect(deriveLoadName('my-pkg')).toBe('my-pkg');
  });
});

describe('checkSetup', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'relcheck-setup-'));
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  const optsFor = (root: string, pkgDir?: string) =>
    resolveRunOptions({ root: [root], pkgDir }, none, dir);

  it('accepts a complete environment root', async () => {
    await makeEnvRoot(dir);
    const opts = optsFor(dir);
    expect(() => checkSetup(opts)).not.toThrow();
    expect(pkgDirFor(opts, dir)).toBe(path.join(dir, 'pkg'));
  });

  it('rejects a missing root', () => {
    const missing = path.join(dir, 'nope');
    expect(() => checkSetup(optsFor(missing))).toThrow(
      `relcheck: error: can't find the environment root directory ${missing}!`,
    );
  });

  it('rejects a missing package directory', async () => {
    await mkdir(path.join(dir, 'env'));
    expect(() => checkSetup(optsFor(path.join(dir, 'env')))).toThrow(
      `relcheck: error: can't find the package directory ${path.join(dir, 'env', 'pkg')}!`,
    );
  });

  it('rejects missing package metadata', async () => {
    await mkdir(path.join(dir, 'pkg', 'semigroups'), { recursive: true });
    expect(() => checkSetup(optsFor(dir))).toThrow(
      `relcheck: error: cannot find ${path.join(dir, 'pkg', 'semigroups', 'PackageInfo.g')}`,
    );
  });
});
