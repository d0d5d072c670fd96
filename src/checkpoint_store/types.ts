// src/checkpoint_store/types.ts

import type { ChainRecord } from '../chain_types';

/**
 * Whole-record persistence for chain checkpoints.
 *
 * Implementations never merge: `save` replaces whatever was stored under the
 * record's chain id. Callers serialize load-mutate-save themselves.
 */
export interface CheckpointRepository {
    load(chainId: string): ChainRecord | null;
    save(record: ChainRecord): void;
    /** chain ids, sorted ascending */
    list(): string[];
    exists(chainId: string): boolean;
}
