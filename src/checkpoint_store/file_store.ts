// src/checkpoint_store/file_store.ts
//
// One JSON document per chain at <dir>/<chain_id>.checkpoint.json.

import * as fs from 'fs';
import * as path from 'path';
import type { ChainRecord } from '../chain_types';
import { CHECKPOINT_FILE_SUFFIX } from '../config';
import { createLogger } from '../logger';
import { ErrorFactory } from '../structured_error';
import { atomicWriteJsonSync, type FsyncMode } from './atomic_write';
import { assertChainRecord, isValidChainId } from './schema';
import type { CheckpointRepository } from './types';

const log = createLogger('checkpoint-store');

function validateRecord(file: string, parsed: unknown): ChainRecord {
    try {
        assertChainRecord(parsed);
        return parsed;
    } catch (e) {
        throw ErrorFactory.checkpointIo(file, 'validate', e);
    }
}

export interface FileCheckpointStoreOptions {
    fsyncMode?: FsyncMode;
    fileMode?: number;
}

export class FileCheckpointStore implements CheckpointRepository {
    private readonly fsyncMode: FsyncMode;
    private readonly fileMode: number;

    constructor(readonly dir: string, opts: FileCheckpointStoreOptions = {}) {
        this.fsyncMode = opts.fsyncMode ?? 'BEST_EFFORT';
        this.fileMode = opts.fileMode ?? 0o644;
    }

    pathFor(chainId: string): string {
        if (!isValidChainId(chainId)) {
            throw ErrorFactory.invalidArgument(`Invalid chain id: ${JSON.stringify(chainId)}`, { chain_id: chainId });
        }
        return path.join(this.dir, `${chainId}${CHECKPOINT_FILE_SUFFIX}`);
    }

    exists(chainId: string): boolean {
        return fs.existsSync(this.pathFor(chainId));
    }

    load(chainId: string): ChainRecord | null {
        const file = this.pathFor(chainId);

        let text: string;
        try {
            text = fs.readFileSync(file, 'utf-8');
        } catch (e: unknown) {
            if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return null;
            throw ErrorFactory.checkpointIo(file, 'read', e);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (e) {
            throw ErrorFactory.checkpointIo(file, 'read', e);
        }

        const record = validateRecord(file, parsed);
        if (record.chain_id !== chainId) {
            throw ErrorFactory.checkpointIo(
                file,
                'validate',
                new Error(`file holds chain ${record.chain_id}, expected ${chainId}`)
            );
        }
        return record;
    }

    save(record: ChainRecord): void {
        const file = this.pathFor(record.chain_id);
        const warnings: string[] = [];
        try {
            atomicWriteJsonSync({
                filePath: file,
                data: record,
                mode: this.fileMode,
                fsyncMode: this.fsyncMode,
                warnings,
            });
        } catch (e) {
            throw ErrorFactory.checkpointIo(file, 'write', e);
        }
        for (const warning of warnings) {
            log.warn('Checkpoint write degraded', { file, warning });
        }
        log.debug('Checkpoint saved', { file, status: record.state.status, rounds: record.rounds.length });
    }

    list(): string[] {
        let entries: string[];
        try {
            entries = fs.readdirSync(this.dir);
        } catch (e: unknown) {
            if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return [];
            throw ErrorFactory.checkpointIo(this.dir, 'read', e);
        }
        return entries
            .filter((name) => name.endsWith(CHECKPOINT_FILE_SUFFIX))
            .map((name) => name.slice(0, -CHECKPOINT_FILE_SUFFIX.length))
            .filter(isValidChainId)
            .sort();
    }
}
