import { SearchWorker } from '../src/core/search-worker.js';
import { logger } from '../src/logger.js';
import { ParallelSearch } from '../src/parallel-search.js';
import { SearchQueue, SearchRun } from '../src/search-queue.js';
import { FakeSessionFactory, oneRecord, queriesFrom, Scenario, ScenarioParser } from './helpers/fakes.js';

logger.configure({ level: 'error' });

function createQueue(scenario: Scenario = query => ({ delayMs: 5, records: oneRecord(query) })) {
    const factory = new FakeSessionFactory(scenario);
    const worker = new SearchWorker(new ScenarioParser(scenario), { queryTimeoutMs: 1000 });
    const queue = new SearchQueue(new ParallelSearch(factory, worker, { sessionsPerMinute: 100, delayBetweenSearches: 0 }));
    return { factory, queue };
}

describe('SearchQueue', () => {
    test('runs a search and emits its lifecycle', async () => {
        const { queue } = createQueue();
        const events: string[] = [];
        for (const name of ['runAdded', 'runStarted', 'runProgress', 'runCompleted', 'queueCompleted']) {
            queue.on(name, () => events.push(name));
        }
        const queueDone = new Promise(resolve => queue.once('queueCompleted', resolve));

        const id = queue.addRun(queriesFrom('Doe', 'Roe'), { concurrency: 2 });
        const run = await queue.waitForRun(id);
        await queueDone;

        expect(run.status).toBe('completed');
        expect(run.completed).toBe(2);
        expect(run.results?.map(result => result.status.kind)).toEqual(['Success', 'Success']);
        expect(events).toEqual(['runAdded', 'runStarted', 'runProgress', 'runProgress', 'runCompleted', 'queueCompleted']);
    });

    test('runs one search at a time', async () => {
        const { queue } = createQueue();

        const first = queue.addRun(queriesFrom('A1', 'A2'));
        const second = queue.addRun(queriesFrom('B1'));

        expect(queue.getStatus()).toMatchObject({ totalRuns: 2, pending: 1, inProgress: 1 });
        expect(queue.getStatus().currentRun?.id).toBe(first);

        const secondRun = await queue.waitForRun(second);
        const firstRun = queue.getRun(first);
        expect(firstRun?.status).toBe('completed');
        expect(secondRun.status).toBe('completed');
        expect(firstRun?.finishedAt).toBeLessThanOrEqual(secondRun.startedAt ?? 0);
    });

    test('cancels a pending run without starting it', async () => {
        const { queue } = createQueue();
        const cancelled: SearchRun[] = [];
        queue.on('runCancelled', run => cancelled.push(run));

        const first = queue.addRun(queriesFrom('A1'));
        const second = queue.addRun(queriesFrom('B1', 'B2'));

        expect(queue.cancelRun(second)).toBe(true);
        const run = await queue.waitForRun(second);

        expect(run.status).toBe('cancelled');
        expect(run.startedAt).toBeUndefined();
        expect(run.results?.map(result => result.status)).toEqual([
            { kind: 'Failed', reason: 'Cancelled', message: 'Search cancelled before it started' },
            { kind: 'Failed', reason: 'Cancelled', message: 'Search cancelled before it started' }
        ]);
        expect(cancelled.map(entry => entry.id)).toEqual([second]);
        await expect(queue.waitForRun(first)).resolves.toMatchObject({ status: 'completed' });
    });

    test('aborts a run in progress', async () => {
        const { factory, queue } = createQueue();

        const id = queue.addRun(queriesFrom('C1', 'C2', 'C3'), { concurrency: 1 });
        expect(queue.cancelRun(id)).toBe(true);
        const run = await queue.waitForRun(id);

        expect(run.status).toBe('cancelled');
        expect(run.results?.every(result => result.status.kind === 'Failed')).toBe(true);
        expect(factory.created).toBe(0);
    });

    test('marks a run failed when no session opens', async () => {
        const { factory, queue } = createQueue();
        factory.failCreate = new Error('portal down');

        const id = queue.addRun(queriesFrom('D1'));
        const run = await queue.waitForRun(id);

        expect(run.status).toBe('failed');
        expect(run.error).toBe('Could not open a session: portal down');
        expect(run.results).toBeUndefined();
    });

    test('refuses to cancel unknown or finished runs', async () => {
        const { queue } = createQueue();
        const id = queue.addRun(queriesFrom('E1'));
        await queue.waitForRun(id);

        expect(queue.cancelRun(id)).toBe(false);
        expect(queue.cancelRun('run_missing')).toBe(false);
        await expect(queue.waitForRun('run_missing')).rejects.toThrow('Unknown run: run_missing');
    });

    test('clears finished runs', async () => {
        const { queue } = createQueue();
        const id = queue.addRun(queriesFrom('F1'));
        await queue.waitForRun(id);

        queue.clearCompleted();

        expect(queue.getRun(id)).toBeUndefined();
        expect(queue.getStatus()).toEqual({
            totalRuns: 0,
            pending: 0,
            inProgress: 0,
            completed: 0,
            failed: 0,
            cancelled: 0,
            currentRun: undefined
        });
    });
});
