/* src/cli/run/options.ts
 * Shared options of run/doc/coverage and their resolution:
 * CLI flag > config file > built-in default.
 */
import { existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';

import type { Command } from 'commander';

import type { LoadedConfig } from '@/cli/config/load';
import type { RelcheckConfig } from '@/cli/config/schema';
import {
  type BuildOperations,
  DEFAULT_BUILD_OPERATIONS,
} from '@/runner/build/controller';
import { FatalError } from '@/runner/errors';
import { DEFAULT_QUICK_TESTS, type QuickTest } from '@/runner/matrix/statements';
import { DEFAULT_SESSION, type SessionSettings } from '@/runner/session/invocation';

export type RunFlags = {
  root?: string[];
  pkgDir?: string;
  pkgName?: string;
  loadName?: string;
  verbose?: boolean;
  keep?: boolean;
  logDir?: string;
};

export const RUN_DEFAULTS = {
  roots: ['~/gap'],
  pkgName: 'semigroups',
  companion: 'smallsemi',
  dependencies: ['grape', 'orb'],
} as const;

export type ResolvedRun = {
  roots: string[];
  /** Explicit package directory; otherwise <root>/pkg per root. */
  pkgDir?: string;
  pkgName: string;
  loadName: string;
  companion: string;
  dependencies: readonly string[];
  toggle: string;
  quickTests: readonly QuickTest[];
  session: SessionSettings;
  build: BuildOperations;
  progressIntervalMs?: number;
  keep: boolean;
  logDir?: string;
};

export const addRunOptions = (cmd: Command): Command =>
  cmd
    .option(
      '-r, --root <dirs...>',
      'environment root directories (default: ~/gap)',
    )
    .option('-p, --pkg-dir <dir>', 'package directory (default: <root>/pkg)')
    .option('-n, --pkg-name <name>', 'package directory name (default: semigroups)')
    .option(
      '-l, --load-name <name>',
      'name the package is loaded by (default: pkg name without version)',
    )
    .option('-v, --verbose', 'verbose session mode')
    .option('-k, --keep', 'keep transcripts after a successful run')
    .option('-o, --log-dir <dir>', 'write transcripts to this directory');

/** "~" and "~/x" expand to the home directory; the result is absolute. */
export const expandPath = (p: string, cwd: string): string => {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return resolve(cwd, p);
};

/** "semigroups-5.3.0" -> "semigroups" */
export const deriveLoadName = (pkgName: string): string =>
  pkgName.replace(/-\d[\w.]*$/, '');

const toQuickTest = (
  t: NonNullable<RelcheckConfig['quickTests']>[number],
): QuickTest => {
  if ('test' in t) return { kind: 'test', path: t.test };
  if ('examples' in t) return { kind: 'examples', chapter: t.examples };
  return { kind: 'read', path: t.read };
};

/**
 * Resolve flags over the loaded config. Flag paths are relative to `cwd`;
 * config paths are relative to the config file's directory.
 */
export const resolveRunOptions = (
  flags: RunFlags,
  loaded: LoadedConfig,
  cwd: string,
): ResolvedRun => {
  const { config } = loaded;
  const base = loaded.path ? dirname(loaded.path) : cwd;
  const fromFlag = (p: string) => expandPath(p, cwd);
  const fromConfig = (p: string) => expandPath(p, base);

  const configRoots =
    typeof config.roots === 'string' ? [config.roots] : config.roots;
  const roots =
    flags.root?.map(fromFlag) ??
    configRoots?.map(fromConfig) ??
    RUN_DEFAULTS.roots.map(fromFlag);
  const pkgDir = flags.pkgDir
    ? fromFlag(flags.pkgDir)
    : config.pkgDir
      ? fromConfig(config.pkgDir)
      : undefined;
  const logDir = flags.logDir
    ? fromFlag(flags.logDir)
    : config.logDir
      ? fromConfig(config.logDir)
      : undefined;
  const pkgName = flags.pkgName ?? config.pkgName ?? RUN_DEFAULTS.pkgName;
  const dependencies = config.dependencies ?? [...RUN_DEFAULTS.dependencies];
  return {
    roots,
    pkgDir,
    pkgName,
    loadName: flags.loadName ?? config.loadName ?? deriveLoadName(pkgName),
    companion: config.companion ?? RUN_DEFAULTS.companion,
    dependencies,
    toggle: config.toggle ?? dependencies[dependencies.length - 1] ?? 'orb',
    quickTests: config.quickTests?.map(toQuickTest) ?? DEFAULT_QUICK_TESTS,
    session: {
      command: config.session?.command ?? DEFAULT_SESSION.command,
      memory: config.session?.memory ?? DEFAULT_SESSION.memory,
      verbose: flags.verbose ?? config.cliDefaults?.verbose ?? false,
    },
    build: {
      clean: config.build?.clean ?? DEFAULT_BUILD_OPERATIONS.clean,
      configure: config.build?.configure ?? DEFAULT_BUILD_OPERATIONS.configure,
      make: config.build?.make ?? DEFAULT_BUILD_OPERATIONS.make,
    },
    progressIntervalMs: config.progress?.intervalMs,
    keep: flags.keep ?? config.cliDefaults?.keep ?? false,
    logDir,
  };
};

export const pkgDirFor = (opts: ResolvedRun, root: string): string =>
  opts.pkgDir ?? join(root, 'pkg');

export const metadataPath = (root: string, pkgName: string): string =>
  join(root, 'pkg', pkgName, 'PackageInfo.g');

const isDir = (p: string): boolean => existsSync(p) && statSync(p).isDirectory();
const isFile = (p: string): boolean => existsSync(p) && statSync(p).isFile();

/** Setup errors: fatal before any step runs. */
export const checkSetup = (opts: ResolvedRun): void => {
  for (const root of opts.roots) {
    if (!isDir(root)) {
      throw new FatalError(
        `relcheck: error: can't find the environment root directory ${root}!`,
      );
    }
    const pkgDir = pkgDirFor(opts, root);
    if (!isDir(pkgDir)) {
      throw new FatalError(
        `relcheck: error: can't find the package directory ${pkgDir}!`,
      );
    }
    const meta = metadataPath(root, opts.pkgName);
    if (!isFile(meta)) {
      throw new FatalError(`relcheck: error: cannot find ${meta}`);
    }
  }
};
