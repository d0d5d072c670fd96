// src/checkpoint_store/memory_store.ts

import type { ChainRecord } from '../chain_types';
import type { CheckpointRepository } from './types';

/**
 * Keeps checkpoints in a Map. Records are deep-copied on the way in and out
 * so callers cannot mutate stored state without a save.
 */
export class InMemoryCheckpointStore implements CheckpointRepository {
    private readonly records = new Map<string, ChainRecord>();

    load(chainId: string): ChainRecord | null {
        const record = this.records.get(chainId);
        return record ? structuredClone(record) : null;
    }

    save(record: ChainRecord): void {
        this.records.set(record.chain_id, structuredClone(record));
    }

    list(): string[] {
        return [...this.records.keys()].sort();
    }

    exists(chainId: string): boolean {
        return this.records.has(chainId);
    }
}
