/**
 * Checkpoint persistence — snapshot and resume workflow runs.
 *
 * The engine saves a checkpoint after every completed step. Two stores:
 * an in-memory map (tests, single-process batch runs) and JSON files under
 * `.codeloom/checkpoints/` so runs survive restarts.
 *
 * Writes for one run are applied in the order they are issued; writes for
 * different runs are independent.
 *
 * Dependency direction: checkpoint.ts → zod, utils/fs, utils/logger
 * Used by: engine, runner, CLI status/resume commands
 */

import { join } from 'node:path';
import { z } from 'zod';
import {
    listJsonFiles,
    readJsonFileIfExists,
    removeFile,
    writeJsonFileAtomic,
} from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { runIdString } from '../../utils/validation.js';
import { ValidationError } from '../errors.js';

export type RunStatus = 'running' | 'completed' | 'failed' | 'cancelled';

/** A durable snapshot of one run. */
export interface Checkpoint<S> {
    readonly runId: string;
    /** Last step that completed, or null before the first one. */
    readonly step: string | null;
    /** Steps applied so far. */
    readonly stepCount: number;
    readonly status: RunStatus;
    readonly state: S;
    readonly error?: { readonly kind: string; readonly message: string };
    readonly createdAt: number;
    readonly updatedAt: number;
}

export interface CheckpointStore<S> {
    /** Persist a checkpoint under `checkpoint.runId`, replacing the previous one. */
    save(checkpoint: Checkpoint<S>): Promise<void>;
    /** Latest checkpoint of a run, or null when there is none. */
    load(runId: string): Promise<Checkpoint<S> | null>;
    /** All checkpoints, most recently updated first. */
    list(): Promise<Checkpoint<S>[]>;
    delete(runId: string): Promise<void>;
}

/** Keeps checkpoints in process memory. Stored values are deep copies. */
export class MemoryCheckpointStore<S> implements CheckpointStore<S> {
    private readonly checkpoints = new Map<string, Checkpoint<S>>();

    async save(checkpoint: Checkpoint<S>): Promise<void> {
        this.checkpoints.set(checkpoint.runId, structuredClone(checkpoint));
    }

    async load(runId: string): Promise<Checkpoint<S> | null> {
        const found = this.checkpoints.get(runId);
        return found ? structuredClone(found) : null;
    }

    async list(): Promise<Checkpoint<S>[]> {
        return [...this.checkpoints.values()]
            .map((cp) => structuredClone(cp))
            .sort((a, b) => b.updatedAt - a.updatedAt);
    }

    async delete(runId: string): Promise<void> {
        this.checkpoints.delete(runId);
    }
}

const checkpointEnvelopeSchema = z.object({
    runId: runIdString,
    step: z.string().nullable(),
    stepCount: z.number().int().min(0),
    status: z.enum(['running', 'completed', 'failed', 'cancelled']),
    state: z.unknown(),
    error: z.object({ kind: z.string(), message: z.string() }).optional(),
    createdAt: z.number(),
    updatedAt: z.number(),
});

/**
 * One JSON file per run. `parseState` validates the state on the way back in.
 */
export class FileCheckpointStore<S> implements CheckpointStore<S> {
    private readonly dir: string;
    private readonly parseState: (raw: unknown) => S;
    private readonly pending = new Map<string, Promise<void>>();

    constructor(dir: string, parseState: (raw: unknown) => S) {
        this.dir = dir;
        this.parseState = parseState;
    }

    save(checkpoint: Checkpoint<S>): Promise<void> {
        let path: string;
        try {
            path = this.pathFor(checkpoint.runId);
        } catch (err) {
            return Promise.reject(err);
        }
        const write = (): Promise<void> => writeJsonFileAtomic(path, checkpoint);

        // Chain behind any write still in flight for the same run.
        const previous = this.pending.get(checkpoint.runId);
        const current = previous ? previous.then(write, write) : write();
        this.pending.set(checkpoint.runId, current);

        const settle = (): void => {
            if (this.pending.get(checkpoint.runId) === current) {
                this.pending.delete(checkpoint.runId);
            }
        };
        void current.then(settle, settle);

        return current;
    }

    async load(runId: string): Promise<Checkpoint<S> | null> {
        const path = this.pathFor(runId);
        await this.pending.get(runId)?.catch((err: unknown) => {
            logger.debug(`Earlier checkpoint write for ${runId} failed: ${String(err)}`);
        });

        const raw = await readJsonFileIfExists(path);
        if (raw === null) return null;
        return this.parse(raw, path);
    }

    async list(): Promise<Checkpoint<S>[]> {
        const files = await listJsonFiles(this.dir);
        const checkpoints: Checkpoint<S>[] = [];

        for (const file of files) {
            try {
                const raw = await readJsonFileIfExists(file);
                if (raw !== null) checkpoints.push(this.parse(raw, file));
            } catch (err) {
                logger.warn(`Skipping unreadable checkpoint ${file}: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        return checkpoints.sort((a, b) => b.updatedAt - a.updatedAt);
    }

    async delete(runId: string): Promise<void> {
        await removeFile(this.pathFor(runId));
    }

    private pathFor(runId: string): string {
        const result = runIdString.safeParse(runId);
        if (!result.success) {
            throw new ValidationError(`Invalid run ID "${runId}": ${result.error.issues[0]?.message ?? 'invalid'}`);
        }
        return join(this.dir, `${runId}.json`);
    }

    private parse(raw: unknown, source: string): Checkpoint<S> {
        const result = checkpointEnvelopeSchema.safeParse(raw);
        if (!result.success) {
            const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
            throw new ValidationError(`Invalid checkpoint ${source}: ${issues}`);
        }
        const { state, ...envelope } = result.data;
        return { ...envelope, state: this.parseState(state) };
    }
}
