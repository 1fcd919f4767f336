// src/runner/run/index.ts
export { runPlans } from './service';
export type { RootPlan, RunOutcome, RunSettings } from './types';
