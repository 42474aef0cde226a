import { MAX_PAYLOAD_SIZE, deserialize, serialize } from '@stratflow/sdk';
import { CheckpointRecord } from '../db/checkpoint.entity';
import { PipelineState } from '../state/pipeline-state';

const TAG = '[checkpoint]';

/**
 * Keyed persistence of pipeline state snapshots. The engine only depends on
 * this interface, so a durable store can replace the in-memory one.
 */
export interface CheckpointStore {
    save(key: string, state: PipelineState): Promise<void>;
    load(key: string): Promise<PipelineState | null>;
    delete(key: string): Promise<void>;
    exists(key: string): Promise<boolean>;
    /** Keys whose TTL has run out at `now`. */
    listExpired(now?: Date): Promise<string[]>;
}

export interface InMemoryCheckpointStoreOptions {
    /** Evict-after time measured from the last save. Unset means records never expire. */
    ttlMs?: number;
    maxBytes?: number;
    now?: () => Date;
}

interface StoredCheckpoint {
    snapshot: string;
    savedAtMs: number;
}

export function toCheckpointRecord(state: PipelineState, updatedAt: string): CheckpointRecord {
    const { series: _series, features: _features, run: _run, ...payload } = state.payload;
    return {
        sessionId: state.sessionId,
        stepCursor: state.stepCursor,
        status: state.status,
        input: { ...state.input },
        payload,
        errors: [...state.errors],
        warnings: [...state.warnings],
        retryCounts: { ...state.retryCounts },
        usage: [...state.usage],
        pendingInput: state.pendingInput,
        confirmation: state.confirmation,
        pendingNode: state.pendingNode,
        createdAt: state.createdAt,
        updatedAt,
    };
}

/**
 * Single-process checkpoint store. Snapshots are serialized on save and
 * deserialized on every load, so callers never share mutable state.
 * Calls for the same key run one at a time, in arrival order.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
    private readonly records = new Map<string, StoredCheckpoint>();
    private readonly chains = new Map<string, Promise<void>>();
    private readonly ttlMs: number | undefined;
    private readonly maxBytes: number;
    private readonly now: () => Date;

    constructor(options: InMemoryCheckpointStoreOptions = {}) {
        this.ttlMs = options.ttlMs;
        this.maxBytes = options.maxBytes ?? MAX_PAYLOAD_SIZE;
        this.now = options.now ?? (() => new Date());
    }

    save(key: string, state: PipelineState): Promise<void> {
        return this.withKey(key, () => {
            const now = this.now();
            const snapshot = serialize(toCheckpointRecord(state, now.toISOString()), this.maxBytes);
            this.records.set(key, { snapshot, savedAtMs: now.getTime() });
        });
    }

    load(key: string): Promise<PipelineState | null> {
        return this.withKey(key, () => {
            const stored = this.records.get(key);
            if (!stored || this.isExpired(stored, this.now())) return null;
            return deserialize<CheckpointRecord>(stored.snapshot) ?? null;
        });
    }

    delete(key: string): Promise<void> {
        return this.withKey(key, () => {
            this.records.delete(key);
        });
    }

    exists(key: string): Promise<boolean> {
        return this.withKey(key, () => {
            const stored = this.records.get(key);
            return stored !== undefined && !this.isExpired(stored, this.now());
        });
    }

    async listExpired(now: Date = this.now()): Promise<string[]> {
        const expired: string[] = [];
        for (const [key, stored] of this.records) {
            if (this.isExpired(stored, now)) expired.push(key);
        }
        return expired;
    }

    get size(): number {
        return this.records.size;
    }

    private isExpired(stored: StoredCheckpoint, now: Date): boolean {
        return this.ttlMs !== undefined && now.getTime() - stored.savedAtMs > this.ttlMs;
    }

    private withKey<T>(key: string, fn: () => T): Promise<T> {
        const previous = this.chains.get(key) ?? Promise.resolve();
        const next = previous.then(fn);
        const settled = next.then(
            () => undefined,
            (err: unknown) => {
                console.error(`${TAG} operation on ${key} failed:`, err);
            },
        );
        this.chains.set(key, settled);
        void settled.then(() => {
            if (this.chains.get(key) === settled) this.chains.delete(key);
        });
        return next;
    }
}
