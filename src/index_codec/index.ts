// src/index_codec/index.ts

export { compressIndices, expandIndexSpec, countIndices } from './codec';
export { splitIntoBatches } from './batching';
export type { BatchOptions, ArrayBatch } from './batching';
export * from './strategies';
