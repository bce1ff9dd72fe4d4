import { SearchWorker, classifyFailure, failedResult } from './core/search-worker.js';
import { CancelledError, InvalidBatchError, RunError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { SessionPool } from './session-pool.js';
import { SearchOptions, SearchQuery, SearchResult, formatQueryName } from './types.js';
import { Session, SessionFactory } from './types/session.js';

export interface ParallelSearchOptions {
    maxParallel?: number;
    delayBetweenSearches?: number;
    sessionsPerMinute?: number;
}

function validateBatch(batch: readonly SearchQuery[], concurrency: number): void {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new InvalidBatchError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    const blank = batch.findIndex(query => !query.lastName.trim());
    if (blank !== -1) {
        throw new InvalidBatchError(`Query ${blank + 1} has an empty last name`);
    }
}

function pause(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}

function cancelledResult(query: SearchQuery): SearchResult {
    return failedResult(query, new CancelledError());
}

/**
 * Runs a batch of searches over a bounded pool of sessions. Results come back
 * in batch order whatever order the searches finish in.
 */
export class ParallelSearch {
    private factory: SessionFactory;
    private worker: SearchWorker;
    private options: Required<ParallelSearchOptions>;

    constructor(factory: SessionFactory, worker: SearchWorker, options: ParallelSearchOptions = {}) {
        this.factory = factory;
        this.worker = worker;
        this.options = {
            maxParallel: options.maxParallel || 3,
            delayBetweenSearches: options.delayBetweenSearches ?? 200,
            sessionsPerMinute: options.sessionsPerMinute || 6
        };
    }

    public async run(batch: readonly SearchQuery[], options: SearchOptions = {}): Promise<SearchResult[]> {
        const concurrency = options.concurrency ?? this.options.maxParallel;
        const staggerMs = options.staggerMs ?? this.options.delayBetweenSearches;
        const { signal, queryTimeoutMs } = options;

        validateBatch(batch, concurrency);
        if (batch.length === 0) {
            return [];
        }
        if (signal?.aborted) {
            return batch.map(cancelledResult);
        }

        const pool = new SessionPool(this.factory, {
            maxSessions: concurrency,
            sessionsPerMinute: this.options.sessionsPerMinute
        });

        let firstSession: Session;
        try {
            firstSession = await pool.acquire(signal);
        } catch (error) {
            if (error instanceof CancelledError) {
                return batch.map(cancelledResult);
            }
            throw new RunError(`Could not open a session: ${errorMessage(error)}`, { cause: error });
        }

        logger.info(`Starting ${batch.length} searches with ${concurrency} workers`, 'coordinator');

        // Each lane writes only to the slots it claimed through `next`.
        const results: Array<SearchResult | undefined> = new Array(batch.length).fill(undefined);
        let next = 0;
        let completed = 0;
        let recordTotal = 0;

        const report = (index: number, startedAt: number) => {
            const result = results[index];
            if (!result) return;
            completed++;
            recordTotal += result.records.length;
            logger.info(
                `Progress: ${Math.floor((completed / batch.length) * 100)}% (${completed}/${batch.length}) - Total records: ${recordTotal}`,
                'coordinator'
            );
            if (!options.onProgress) return;
            try {
                options.onProgress({
                    index,
                    total: batch.length,
                    completed,
                    query: result.query,
                    status: result.status,
                    recordCount: result.records.length,
                    elapsedMs: Date.now() - startedAt
                });
            } catch (error) {
                logger.warn(`Progress listener failed: ${errorMessage(error)}`, 'coordinator');
            }
        };

        const lane = async (laneIndex: number, initial: Session | null): Promise<void> => {
            let held = initial;
            try {
                if (laneIndex > 0 && staggerMs > 0) {
                    await pause(laneIndex * staggerMs, signal);
                }

                for (;;) {
                    if (signal?.aborted || next >= batch.length) {
                        return;
                    }
                    const index = next++;
                    const query = batch[index];
                    const startedAt = Date.now();

                    if (!held) {
                        try {
                            held = await pool.acquire(signal);
                        } catch (error) {
                            if (error instanceof CancelledError) {
                                results[index] = cancelledResult(query);
                                return;
                            }
                            logger.warn(`No session for ${formatQueryName(query)}: ${errorMessage(error)}`, 'coordinator');
                            results[index] = failedResult(query, classifyFailure(error));
                            report(index, startedAt);
                            continue;
                        }
                    }

                    const outcome = await this.worker.run(query, held, queryTimeoutMs);
                    results[index] = outcome.result;
                    if (!outcome.reusable) {
                        const broken = held;
                        held = null;
                        await pool.discard(broken);
                    }
                    report(index, startedAt);
                }
            } finally {
                if (held) {
                    pool.release(held);
                }
            }
        };

        const laneCount = Math.min(concurrency, batch.length);
        try {
            await Promise.all(
                Array.from({ length: laneCount }, (_, laneIndex) => lane(laneIndex, laneIndex === 0 ? firstSession : null))
            );
        } finally {
            await pool.drain();
        }

        if (signal?.aborted) {
            logger.warn(`Run cancelled after ${completed} of ${batch.length} searches`, 'coordinator');
        } else {
            logger.info(`All searches complete. Found ${recordTotal} booking records.`, 'coordinator');
        }

        return results.map((result, index) => result ?? cancelledResult(batch[index]));
    }

    public async cleanup(): Promise<void> {
        await this.factory.close();
    }
}
