// src/test-support/session.ts
import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { SessionInvocation } from '@/runner/session/invocation';
import type { Printer } from '@/runner/ui/printer';

export const FAKE_SESSION = fileURLToPath(
  new URL('./fake-session.cjs', import.meta.url),
);

/** Invocation of the in-process-tree fake session (see fake-session.cjs). */
export const fakeInvocation = (): SessionInvocation => ({
  command: process.execPath,
  args: [FAKE_SESSION],
});

export type MemoryPrinter = {
  printer: Printer;
  text(): string;
  lines(): string[];
};

export const memoryPrinter = (isTTY = false): MemoryPrinter => {
  let out = '';
  return {
    printer: {
      isTTY,
      write: (s) => {
        out += s;
      },
      line: (s = '') => {
        out += `${s}\n`;
      },
    },
    text: () => out,
    lines: () => out.split('\n'),
  };
};

export const writeFileAt = async (
  root: string,
  rel: string,
  body = '',
): Promise<string> => {
  const abs = path.join(root, rel);
  await mkdir(path.dirname(abs), { recursive: true });
  await writeFile(abs, body, 'utf8');
  return abs;
};

/**
 * Minimal environment root: <root>/pkg/<pkgName>/PackageInfo.g plus one
 * versioned directory per dependency under <root>/pkg.
 */
export const makeEnvRoot = async (
  root: string,
  pkgName = 'semigroups',
  dependencies: readonly string[] = ['grape', 'orb'],
): Promise<void> => {
  await writeFileAt(root, path.join('pkg', pkgName, 'PackageInfo.g'), '');
  for (const dep of dependencies) {
    await mkdir(path.join(root, 'pkg', `${dep}-1.0`), { recursive: true });
  }
};

/** Poll until `p` exists. */
export const waitForFile = async (p: string, timeoutMs = 5000): Promise<void> => {
  const until = Date.now() + timeoutMs;
  while (!existsSync(p)) {
    if (Date.now() > until) throw new Error(`timed out waiting for ${p}`);
    await new Promise((r) => setTimeout(r, 20));
  }
};
