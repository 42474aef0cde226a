import { InvalidInputError } from '@stratflow/sdk';
import { sessionStatus } from '../../src/db/checkpoint.entity';
import { SessionNotFoundError, StateConsistencyError } from '../../src/errors';
import { CheckpointStore, InMemoryCheckpointStore } from '../../src/repositories/checkpoint.repository';
import { NodeSettledEvent } from '../../src/services/pipeline-engine';
import { PipelineState } from '../../src/state/pipeline-state';
import { STRATEGY_TEXT, fakeCollaborators, testEngine } from '../helpers/fixtures';

/** Delegates to a real store but dies on the Nth save, the way a killed process would. */
class CrashingStore implements CheckpointStore {
    private saves = 0;

    constructor(
        private readonly inner: CheckpointStore,
        private readonly crashOnSave: number,
    ) { }

    async save(key: string, state: PipelineState): Promise<void> {
        this.saves += 1;
        if (this.saves === this.crashOnSave) throw new Error('simulated crash');
        await this.inner.save(key, state);
    }

    load(key: string): Promise<PipelineState | null> {
        return this.inner.load(key);
    }

    delete(key: string): Promise<void> {
        return this.inner.delete(key);
    }

    exists(key: string): Promise<boolean> {
        return this.inner.exists(key);
    }

    listExpired(now?: Date): Promise<string[]> {
        return this.inner.listExpired(now);
    }
}

describe('Crash Recovery Integration', () => {
    let durable: InMemoryCheckpointStore;

    beforeEach(() => {
        durable = new InMemoryCheckpointStore();
    });

    // Saves happen before each node: translate, interpret, validate, fetch_data, add_features, pre_qa, backtest...
    async function crashBefore(saveNumber: number, collaborators = fakeCollaborators()) {
        const { engine } = testEngine(collaborators, { store: new CrashingStore(durable, saveNumber) });
        await expect(engine.start({ text: STRATEGY_TEXT, confirmed: true, sessionId: 'crashed' })).rejects.toThrow('simulated crash');
        return collaborators;
    }

    it('leaves the last step checkpoint running with the next node pending', async () => {
        await crashBefore(7);

        const saved = await durable.load('crashed');
        expect(saved?.status).toBe(sessionStatus.RUNNING);
        expect(saved?.stepCursor).toBe('add_features');
        expect(saved?.pendingNode).toBe('pre_qa');
        expect(Object.keys(saved?.payload ?? {}).sort()).toEqual(['interpretation', 'spec', 'validation']);
    });

    it('recomputes dropped datasets and finishes on a fresh engine', async () => {
        const collaborators = await crashBefore(7);
        const events: NodeSettledEvent[] = [];
        const { engine } = testEngine(collaborators, { store: durable, onNodeSettled: event => events.push(event) });

        const state = await engine.recover('crashed');

        expect(state.status).toBe(sessionStatus.COMPLETED);
        expect(state.payload.metrics?.numTrades).toBe(2);
        expect(events.map(event => event.node)).toEqual([
            'fetch_data',
            'add_features',
            'pre_qa',
            'backtest',
            'metrics',
            'trades',
            'explain',
        ]);
        expect(state.retryCounts.fetch_data).toBe(1);
        expect(collaborators.dataSource).toHaveBeenCalledTimes(2);
        expect(collaborators.translator).toHaveBeenCalledTimes(1);
        expect(collaborators.interpreter).toHaveBeenCalledTimes(1);
    });

    async function uninterrupted(): Promise<PipelineState> {
        const { engine } = testEngine();
        const { state } = await engine.start({ text: STRATEGY_TEXT, confirmed: true, sessionId: 'uninterrupted' });
        return state;
    }

    it('replays the node that was in flight', async () => {
        const expected = await uninterrupted();
        const collaborators = await crashBefore(2);

        const { engine } = testEngine(collaborators, { store: durable });
        const state = await engine.recover('crashed');

        expect(state.status).toBe(sessionStatus.COMPLETED);
        expect(collaborators.translator).toHaveBeenCalledTimes(2);
        expect(state.confirmation).toEqual({ confirmed: true });
        expect(state.payload.spec).toEqual(expected.payload.spec);
        expect(state.payload).toEqual(expected.payload);
    });

    it('ends with the same outputs as a run that never crashed', async () => {
        const expected = await uninterrupted();
        const collaborators = await crashBefore(7);

        const { engine } = testEngine(collaborators, { store: durable });
        const state = await engine.recover('crashed');

        expect(state.payload.dataValidation).toEqual(expected.payload.dataValidation);
        expect(state.payload.features).toEqual(expected.payload.features);
        expect(state.payload).toEqual(expected.payload);
        expect(state.retryCounts).toEqual(expected.retryCounts);
    });

    it('fails the session when recomputation fails', async () => {
        const collaborators = await crashBefore(7);
        collaborators.dataSource.mockRejectedValueOnce(new InvalidInputError('delisted'));

        const { engine } = testEngine(collaborators, { store: durable });
        const state = await engine.recover('crashed');

        expect(state.status).toBe(sessionStatus.FAILED);
        expect(state.stepCursor).toBe('add_features');
        expect(state.errors).toEqual([
            expect.objectContaining({ node: 'fetch_data', code: 'INVALID_INPUT', message: 'fetch_data failed: delisted' }),
        ]);
        expect((await durable.load('crashed'))?.status).toBe(sessionStatus.FAILED);
    });

    it('only recovers sessions that were running', async () => {
        const { engine } = testEngine(fakeCollaborators(), { store: durable });
        const { sessionId } = await engine.start({ text: STRATEGY_TEXT });

        await expect(engine.recover(sessionId)).rejects.toThrow(
            new StateConsistencyError(`Cannot recover session ${sessionId}: status is awaiting_input`),
        );
        await expect(engine.recover('never-started')).rejects.toThrow(SessionNotFoundError);
    });
});
