export { SyncPipeline } from './sync-pipeline.js';
export type { SyncPipelineDependencies } from './sync-pipeline.js';
