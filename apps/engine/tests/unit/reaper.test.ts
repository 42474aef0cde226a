import { InMemoryCheckpointStore } from '../../src/repositories/checkpoint.repository';
import { CheckpointReaper } from '../../src/services/reaper';
import { SessionLock } from '../../src/services/session-lock';
import { createInitialState } from '../../src/state/pipeline-state';

const T0 = new Date('2024-01-01T00:00:00.000Z');
const flush = () => new Promise<void>(resolve => setImmediate(() => resolve()));

describe('CheckpointReaper', () => {
    let clock: Date;
    let store: InMemoryCheckpointStore;
    let lock: SessionLock;
    let reaper: CheckpointReaper;

    const save = (key: string) => store.save(key, createInitialState(key, { text: 'golden cross', model: 'test-model' }, clock));

    beforeEach(() => {
        clock = T0;
        store = new InMemoryCheckpointStore({ ttlMs: 1000, now: () => clock });
        lock = new SessionLock();
        reaper = new CheckpointReaper(store, lock, 100, () => clock);
    });

    afterEach(() => {
        reaper.stop();
    });

    it('evicts expired checkpoints', async () => {
        await save('stale');
        clock = new Date(T0.getTime() + 2000);
        await save('fresh');

        expect(await reaper.reap()).toEqual(['stale']);
        expect(store.size).toBe(1);
        expect(await store.exists('fresh')).toBe(true);
    });

    it('skips sessions the engine is holding', async () => {
        await save('busy');
        lock.tryAcquire('busy');
        clock = new Date(T0.getTime() + 2000);

        expect(await reaper.reap()).toEqual([]);
        expect(store.size).toBe(1);
    });

    it('does not overlap reap cycles', async () => {
        await save('stale');
        clock = new Date(T0.getTime() + 2000);

        const [first, second] = await Promise.all([reaper.reap(), reaper.reap()]);
        expect(first).toEqual(['stale']);
        expect(second).toEqual([]);
    });

    it('reaps immediately on start and reports its state', async () => {
        await save('stale');
        clock = new Date(T0.getTime() + 2000);

        reaper.start();
        expect(reaper.isRunning()).toBe(true);
        await flush();
        expect(store.size).toBe(0);

        reaper.stop();
        expect(reaper.isRunning()).toBe(false);
    });
});
