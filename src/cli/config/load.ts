/* src/cli/config/load.ts
 * Locate and validate relcheck.config.* (cwd, then each ancestor).
 */
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, relative } from 'node:path';

import YAML from 'yaml';
import { ZodError } from 'zod';

import { FatalError } from '@/runner/errors';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CLI_CONFIG_LOAD } from '@/runner/util/debug-scopes';

import { configSchema, type RelcheckConfig } from './schema';

export const CONFIG_FILES = [
  'relcheck.config.yml',
  'relcheck.config.yaml',
  'relcheck.config.json',
] as const;

export const findConfigPathSync = (cwd: string): string | null => {
  let dir = cwd;
  for (;;) {
    for (const name of CONFIG_FILES) {
      const p = join(dir, name);
      if (existsSync(p)) return p;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
};

/** JSON by extension, YAML otherwise. */
const parseConfigText = (p: string, text: string): unknown =>
  p.endsWith('.json') ? JSON.parse(text) : YAML.parse(text);

const formatZodError = (e: ZodError): string =>
  e.issues
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('\n');

export type LoadedConfig = {
  path: string | null;
  config: RelcheckConfig;
};

/** Load and validate the config; a missing file yields an empty config. */
export const loadConfigSync = (cwd: string): LoadedConfig => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) {
    debugLog(DBG_SCOPE_CLI_CONFIG_LOAD, `no config file above ${cwd}`);
    return { path: null, config: {} };
  }
  const rel = relative(cwd, cfgPath).replace(/\\/g, '/') || cfgPath;
  let raw: unknown;
  try {
    raw = parseConfigText(cfgPath, readFileSync(cfgPath, 'utf8'));
  } catch (e) {
    throw new FatalError(
      `relcheck: error: cannot parse ${rel}: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e },
    );
  }
  try {
    const config = configSchema.parse(raw ?? {});
    debugLog(DBG_SCOPE_CLI_CONFIG_LOAD, `loaded ${cfgPath}`);
    return { path: cfgPath, config };
  } catch (e) {
    if (e instanceof ZodError) {
      throw new FatalError(
        `relcheck: error: invalid config in ${rel}\n${formatZodError(e)}`,
        { cause: e },
      );
    }
    throw e;
  }
};
