// src/pipeline/index.ts
export * from './types.js'
export { ReviewPipeline } from './pipeline.js'
