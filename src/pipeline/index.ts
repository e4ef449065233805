export { runPipeline, runPipelineAsync, DEFAULT_CONCURRENCY } from './run.js';
export type { PipelineHooks, PipelineOptions, AsyncPipelineOptions } from './run.js';
export { mapWithConcurrency } from './pool.js';
