/* src/runner/matrix/statements.ts
 * Session statements used by the matrix. The orchestrator never interprets
 * them; they are built here and passed through verbatim.
 */
import { join } from 'node:path';

import { sessionString as str } from '@/runner/session/script';

/** "semigroups" -> "Semigroups" (prefix of the package's test functions). */
export const capitalize = (name: string): string =>
  name.charAt(0).toUpperCase() + name.slice(1);

export type PackageStatements = {
  load: string;
  loadOnlyNeeded: string;
  testInstall: string;
  testStandard: string;
  testManualExamples: string;
  makeDoc: string;
};

export const packageStatements = (loadName: string): PackageStatements => {
  const fn = capitalize(loadName);
  return {
    load: `LoadPackage(${str(loadName)}, false);`,
    loadOnlyNeeded: `LoadPackage(${str(loadName)}, false : OnlyNeeded);`,
    testInstall: `${fn}TestInstall();`,
    testStandard: `${fn}TestStandard();`,
    testManualExamples: `${fn}TestManualExamples();`,
    makeDoc: `${fn}MakeDoc();`,
  };
};

export type CompanionStatements = {
  load: string;
  testAll: readonly string[];
};

export const companionStatements = (name: string): CompanionStatements => {
  const fn = capitalize(name);
  return {
    load: `LoadPackage(${str(name)}, false);`,
    testAll: [`${fn}TestAll();`, `${fn}TestManualExamples();`],
  };
};

export const validatePackageInfo = (root: string, pkgName: string): string =>
  `ValidatePackageInfo(${str(join(root, 'pkg', pkgName, 'PackageInfo.g'))});`;

/**
 * Targeted regression checks run after the standard suites. Paths are
 * relative to the environment root; `examples` names a reference-manual
 * chapter whose examples are extracted and run.
 */
export type QuickTest =
  | { kind: 'test'; path: string }
  | { kind: 'examples'; chapter: string }
  | { kind: 'read'; path: string };

export const DEFAULT_QUICK_TESTS: readonly QuickTest[] = [
  { kind: 'test', path: 'tst/testinstall/trans.tst' },
  { kind: 'test', path: 'tst/testinstall/pperm.tst' },
  { kind: 'test', path: 'tst/testinstall/semigrp.tst' },
  { kind: 'test', path: 'tst/teststandard/reesmat.tst' },
  { kind: 'examples', chapter: 'trans.xml' },
  { kind: 'examples', chapter: 'pperm.xml' },
  { kind: 'examples', chapter: 'invsgp.xml' },
  { kind: 'examples', chapter: 'reesmat.xml' },
  { kind: 'examples', chapter: 'mgmadj.xml' },
  { kind: 'test', path: 'tst/teststandard/bugfix.tst' },
  { kind: 'read', path: 'tst/testinstall.g' },
];

export const quickTestStatement = (root: string, t: QuickTest): string => {
  switch (t.kind) {
    case 'test':
      return `Test(${str(join(root, t.path))});`;
    case 'read':
      return `Read(${str(join(root, t.path))});`;
    case 'examples':
      return (
        `ex := ExtractExamples(${str(join(root, 'doc', 'ref'))}, ${str(t.chapter)}, ` +
        `[${str(t.chapter)}], "Section"); RunExamples(ex);`
      );
  }
};

/** Statements of a line-by-line profiling run over one test file. */
export const coverageStatements = (args: {
  load: string;
  testFile: string;
  sourcesDir: string;
  outDir: string;
}): string[] => {
  const profile = join(args.outDir, 'profile.gz');
  return [
    `ProfileLineByLine(${str(profile)});`,
    args.load,
    `Test(${str(args.testFile)});`,
    'UnprofileLineByLine();',
    `LoadPackage("profiling", false);`,
    `x := ReadLineByLineProfile(${str(profile)});`,
    `OutputAnnotatedCodeCoverageFiles(x, ${str(args.sourcesDir)}, ${str(args.outDir)});`,
  ];
};
