/* src/runner/session/classify.ts
 * Transcript classifier: literal, case-sensitive substring search against a
 * fixed marker set. Pure; operator-visible reporting lives in the runner.
 */

export type Outcome = 'pass' | 'fail';

export type Classification = {
  outcome: Outcome;
  /** Zero-length transcript (reported, not itself a failure). */
  emptyWarning: boolean;
  /** Markers found, in marker-set order. */
  markers: readonly string[];
};

/** Markers that do not depend on the package under test. */
export const BASE_FAILURE_MARKERS: readonly string[] = Object.freeze([
  '########> Diff',
  '# WARNING',
  '#E ',
  'Error',
  'brk>',
]);

/**
 * Full marker set for a run: the base markers plus the two-line sequence the
 * session logs when loading the package returns `fail`.
 */
export const failureMarkerSet = (loadStatement: string): readonly string[] =>
  Object.freeze([...BASE_FAILURE_MARKERS, `${loadStatement}\nfail`]);

export const classify = (
  text: string,
  markers: readonly string[] = BASE_FAILURE_MARKERS,
): Classification => {
  const found = markers.filter((m) => text.includes(m));
  return {
    outcome: found.length > 0 ? 'fail' : 'pass',
    emptyWarning: text.length === 0,
    markers: found,
  };
};

/** Split a transcript into display lines (no trailing empty line). */
export const transcriptLines = (text: string): string[] => {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.map((l) => l.trimEnd());
};
