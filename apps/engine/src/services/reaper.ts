import { CheckpointStore } from '../repositories/checkpoint.repository';
import { SessionLock } from './session-lock';

const TAG = '[reaper]';

// Evicts checkpoints whose TTL ran out. Sessions currently held by the engine
// are skipped so a live run never loses its checkpoint mid-flight.
export class CheckpointReaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isReaping = false;

    constructor(
        private readonly store: CheckpointStore,
        private readonly lock: SessionLock,
        private readonly intervalMs = 60_000,
        private readonly now: () => Date = () => new Date(),
    ) { }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }

        this.running = true;
        console.log(`${TAG} started (interval: ${this.intervalMs}ms)`);

        // Fire immediately, then on schedule
        void this.reap();
        this.intervalHandle = setInterval(() => void this.reap(), this.intervalMs);
        this.intervalHandle.unref();
    }

    stop(): void {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    async reap(): Promise<string[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        const reaped: string[] = [];

        try {
            for (const key of await this.store.listExpired(this.now())) {
                if (this.lock.isHeld(key)) continue;
                await this.store.delete(key);
                reaped.push(key);
            }

            if (reaped.length > 0) {
                console.log(`${TAG} evicted ${reaped.length} checkpoints: ${reaped.join(', ')}`);
            }
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
        } finally {
            this.isReaping = false;
        }

        return reaped;
    }
}
