// src/index.ts
export * from './errors.js'
export * from './sources/index.js'
export * from './aggregator/index.js'
export * from './prompt-builder/index.js'
export * from './providers/index.js'
export * from './reporter/types.js'
export { MarkdownReporter, createArtifact } from './reporter/markdown.js'
export * from './writer/index.js'
export * from './pipeline/index.js'
export type * from './config/types.js'
export { loadConfig, resolveConfig, expandEnvVars, getConfigPath } from './config/loader.js'
export { generateConfig, initConfig, DEFAULT_CONFIG } from './config/init.js'
