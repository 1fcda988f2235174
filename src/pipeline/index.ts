export {
  parsePipelineYaml,
  loadPipelineFile,
  loadPipeline,
  resolvePipeline,
  formatConfigError,
} from './parser.js';
export type {
  LoadPipelineOptions,
  LoadedPipeline,
  ResolvePipelineOptions,
} from './parser.js';
export { STEP_CATALOG, defaultPipeline, type CatalogEntry } from './catalog.js';
export {
  pipelineSchema,
  stepSchema,
  normalizeStep,
  stepName,
  DEFAULT_CONFIG_FILE,
} from './types.js';
export type { Pipeline, StepConfig, ResolvedStep } from './types.js';
