/* src/runner/matrix/plan.ts
 * The configuration matrix as data: an ordered list of entries the driver
 * walks one at a time. Building the plan has no side effects.
 */
import type { TestStep } from '@/runner/session/run-step';

import {
  capitalize,
  companionStatements,
  DEFAULT_QUICK_TESTS,
  packageStatements,
  type QuickTest,
  quickTestStatement,
  validatePackageInfo,
} from './statements';

export type MatrixEntry =
  | { kind: 'heading'; text: string }
  | { kind: 'step'; step: TestStep }
  | { kind: 'clean'; target: string }
  | { kind: 'build'; target: string }
  | { kind: 'success' };

export type MatrixProfile = {
  /** Environment root (absolute). */
  root: string;
  /** Package directory name under <root>/pkg (may carry a version suffix). */
  pkgName: string;
  /** Name the package is loaded by. */
  loadName: string;
  /** Unrelated optional package used for load-order and suite checks. */
  companion: string;
  /** Optional native-code dependencies, cleaned and rebuilt in turn. */
  dependencies: readonly string[];
  /** Dependency toggled between the compiled and uncompiled suite runs. */
  toggle: string;
  quickTests?: readonly QuickTest[];
};

const step = (
  description: string,
  statements: readonly string[],
  stopOnFailure = true,
): MatrixEntry => ({
  kind: 'step',
  step: { description, statements, stopOnFailure },
});

/** install / manual / standard / quick suites under one load statement. */
const suites = (
  load: string,
  profile: MatrixProfile,
): MatrixEntry[] => {
  const pkg = packageStatements(profile.loadName);
  const quick = (profile.quickTests ?? DEFAULT_QUICK_TESTS).map((t) =>
    quickTestStatement(profile.root, t),
  );
  return [
    step('testinstall.tst', [load, pkg.testInstall]),
    step('manual examples', [load, pkg.testManualExamples]),
    step('test standard', [load, pkg.testStandard]),
    // Isolated regression checks: report and keep going.
    step('quick tests', [load, ...quick], false),
  ];
};

/** Documentation build (load, then generate). */
export const docStep = (loadName: string): MatrixEntry => {
  const pkg = packageStatements(loadName);
  return step('Compiling the doc', [pkg.load, pkg.makeDoc]);
};

export const buildMatrix = (profile: MatrixProfile): MatrixEntry[] => {
  const pkg = packageStatements(profile.loadName);
  const comp = companionStatements(profile.companion);
  const Comp = capitalize(profile.companion);
  const Toggle = capitalize(profile.toggle);
  const entries: MatrixEntry[] = [];

  entries.push({ kind: 'heading', text: `Running tests in ${profile.root}` });

  // 1. metadata
  entries.push(
    step('Validating PackageInfo.g', [
      validatePackageInfo(profile.root, profile.pkgName),
    ]),
  );

  // 2. load modes
  entries.push(step('Loading package', [pkg.load]));
  entries.push(step('Loading only needed', [pkg.loadOnlyNeeded]));

  // 3. load-order independence
  entries.push(step(`Loading ${Comp} first`, [comp.load, pkg.load]));
  entries.push(step(`Loading ${Comp} second`, [pkg.load, comp.load]));

  // 4. dependency build states
  for (const dep of profile.dependencies) {
    const Dep = capitalize(dep);
    entries.push({ kind: 'clean', target: dep });
    entries.push(step(`Loading ${Dep} not compiled`, [pkg.load]));
    entries.push({ kind: 'build', target: dep });
    entries.push(step(`Loading ${Dep} compiled`, [pkg.load]));
  }

  // 5. documentation
  entries.push(docStep(profile.loadName));

  // 6. companion suites
  entries.push(step(`Testing ${Comp}`, [pkg.load, comp.load, ...comp.testAll]));

  // 7. suites, toggled dependency compiled
  entries.push({ kind: 'heading', text: `Testing with ${Toggle} compiled` });
  entries.push(...suites(pkg.load, profile));

  // 8. suites, toggled dependency uncompiled; rebuild afterwards
  entries.push({ kind: 'heading', text: `Testing with ${Toggle} uncompiled` });
  entries.push({ kind: 'clean', target: profile.toggle });
  entries.push(...suites(pkg.load, profile));
  entries.push({ kind: 'build', target: profile.toggle });

  // 9. only-needed load mode
  entries.push({ kind: 'heading', text: 'Testing only needed' });
  entries.push(...suites(pkg.loadOnlyNeeded, profile));

  // 10.
  entries.push({ kind: 'success' });
  return entries;
};
