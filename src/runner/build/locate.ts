/* src/runner/build/locate.ts
 * Find a dependency's directory by name prefix (one level below root).
 */
import { basename } from 'node:path';

import fg from 'fast-glob';

import { FatalError } from '@/runner/errors';

/**
 * Resolve the unique subdirectory of `rootDir` whose name starts with `name`
 * (e.g. "orb" -> "<root>/orb-4.9.0"). When several match, an exact name wins;
 * otherwise the match is ambiguous and fatal.
 */
export const locateTarget = async (
  rootDir: string,
  name: string,
): Promise<string> => {
  const matches = (
    await fg(`${fg.escapePath(name)}*`, {
      cwd: rootDir,
      onlyDirectories: true,
      deep: 1,
      absolute: true,
    })
  ).sort();
  if (matches.length === 0) {
    throw new FatalError(
      `relcheck: error: can't find the ${name} directory in ${rootDir}`,
    );
  }
  const [only] = matches;
  if (only !== undefined && matches.length === 1) return only;
  const exact = matches.find((m) => basename(m) === name);
  if (exact) return exact;
  throw new FatalError(
    `relcheck: error: more than one ${name} directory in ${rootDir}: ${matches
      .map((m) => basename(m))
      .join(', ')}`,
  );
};
