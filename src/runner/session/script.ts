/* src/runner/session/script.ts
 * Command script fed to the session: an output-redirection directive naming
 * the transcript file, then the step's statements verbatim.
 */

/** Quote `s` as a session string literal (backslash and double quote escaped). */
export const sessionString = (s: string): string =>
  `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

export const logToStatement = (transcriptPath: string): string =>
  `LogTo(${sessionString(transcriptPath)});`;

export const buildCommandScript = (
  transcriptPath: string,
  statements: readonly string[],
): string => [logToStatement(transcriptPath), ...statements].join('\n') + '\n';
