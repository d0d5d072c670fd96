// src/checkpoint_store/index.ts

export type { CheckpointRepository } from './types';
export { FileCheckpointStore } from './file_store';
export type { FileCheckpointStoreOptions } from './file_store';
export { InMemoryCheckpointStore } from './memory_store';
export { assertChainRecord, isValidChainId, CHAIN_ID_PATTERN, CHECKPOINT_SCHEMA } from './schema';
export { atomicWriteFileSync, atomicWriteJsonSync } from './atomic_write';
export type { FsyncMode } from './atomic_write';
export { stableStringify } from './stable_stringify';
