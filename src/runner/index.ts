export { runProvision, buildSteps } from './runner.js';
export type { RunProvisionOptions, ProvisionResult } from './runner.js';
