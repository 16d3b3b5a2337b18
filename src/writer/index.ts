// src/writer/index.ts
export * from './types.js'
export * from './output-writer.js'
