/** Library entry point. */
export { makeCli } from './cli';
export { performCoverage } from './cli/coverage';
export { performDoc } from './cli/doc';
export { performRun, type RunDeps } from './cli/run/action';
export type { RunFlags } from './cli/run/options';
export { BuildController, type BuildState } from './runner/build/controller';
export { FatalError, InterruptedError } from './runner/errors';
export { buildMatrix, type MatrixEntry, type MatrixProfile } from './runner/matrix/plan';
export { executeMatrix } from './runner/matrix/driver';
export * from './runner/run';
export {
  BASE_FAILURE_MARKERS,
  type Classification,
  classify,
  failureMarkerSet,
} from './runner/session/classify';
export { runStep, type StepResult, type TestStep } from './runner/session/run-step';
