import EventEmitter from 'events';
import { failedResult } from './core/search-worker.js';
import { CancelledError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { ParallelSearch } from './parallel-search.js';
import { SearchProgress, SearchQuery, SearchResult } from './types.js';

export type RunStatus = 'pending' | 'in_progress' | 'completed' | 'failed' | 'cancelled';

export interface SearchRun {
    id: string;
    queries: readonly SearchQuery[];
    concurrency?: number;
    status: RunStatus;
    completed: number;
    results?: SearchResult[];
    error?: string;
    createdAt: number;
    startedAt?: number;
    finishedAt?: number;
}

export interface QueueStatus {
    totalRuns: number;
    pending: number;
    inProgress: number;
    completed: number;
    failed: number;
    cancelled: number;
    currentRun?: SearchRun;
}

export interface AddRunOptions {
    concurrency?: number;
}

const TERMINAL: readonly RunStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: RunStatus): boolean {
    return TERMINAL.includes(status);
}

/**
 * Registry of search runs. Runs share one portal account, so they execute one
 * at a time in submission order; queries inside a run go out in parallel.
 */
export class SearchQueue extends EventEmitter {
    private runs: SearchRun[] = [];
    private controllers = new Map<string, AbortController>();
    private inProgress = false;
    private search: ParallelSearch;
    private sequence = 0;

    constructor(search: ParallelSearch) {
        super();
        this.search = search;
    }

    public addRun(queries: readonly SearchQuery[], options: AddRunOptions = {}): string {
        const id = `run_${Date.now()}_${++this.sequence}`;
        const run: SearchRun = {
            id,
            queries,
            concurrency: options.concurrency,
            status: 'pending',
            completed: 0,
            createdAt: Date.now()
        };

        this.runs.push(run);
        this.emit('runAdded', run);

        if (!this.inProgress) {
            this.processQueue().catch(error => {
                logger.error(`Search queue stopped: ${errorMessage(error)}`, 'queue');
            });
        }

        return id;
    }

    public getRun(id: string): SearchRun | undefined {
        return this.runs.find(run => run.id === id);
    }

    public getStatus(): QueueStatus {
        const count = (status: RunStatus) => this.runs.filter(run => run.status === status).length;

        return {
            totalRuns: this.runs.length,
            pending: count('pending'),
            inProgress: count('in_progress'),
            completed: count('completed'),
            failed: count('failed'),
            cancelled: count('cancelled'),
            currentRun: this.runs.find(run => run.status === 'in_progress')
        };
    }

    /** Returns false when the run is unknown or already finished. */
    public cancelRun(id: string): boolean {
        const run = this.getRun(id);
        if (!run || isTerminal(run.status)) {
            return false;
        }

        if (run.status === 'pending') {
            const cancelled = new CancelledError();
            run.status = 'cancelled';
            run.results = run.queries.map(query => failedResult(query, cancelled));
            run.finishedAt = Date.now();
            this.emit('runCancelled', run);
            return true;
        }

        const controller = this.controllers.get(id);
        if (controller && !controller.signal.aborted) {
            logger.info(`Cancelling run ${id}`, 'queue');
            controller.abort();
        }
        return true;
    }

    /** Resolves with the run once it reaches a terminal state. */
    public waitForRun(id: string): Promise<SearchRun> {
        const run = this.getRun(id);
        if (!run) {
            return Promise.reject(new Error(`Unknown run: ${id}`));
        }
        if (isTerminal(run.status)) {
            return Promise.resolve(run);
        }

        return new Promise<SearchRun>(resolve => {
            const onFinished = (finished: SearchRun) => {
                if (finished.id !== id) {
                    return;
                }
                this.off('runCompleted', onFinished);
                this.off('runFailed', onFinished);
                this.off('runCancelled', onFinished);
                resolve(finished);
            };
            this.on('runCompleted', onFinished);
            this.on('runFailed', onFinished);
            this.on('runCancelled', onFinished);
        });
    }

    public clearCompleted(): void {
        this.runs = this.runs.filter(run => !isTerminal(run.status));
        this.emit('queueUpdated', this.getStatus());
    }

    private async processQueue(): Promise<void> {
        if (this.inProgress) {
            return;
        }
        this.inProgress = true;

        try {
            for (;;) {
                const run = this.runs.find(candidate => candidate.status === 'pending');
                if (!run) {
                    break;
                }
                await this.execute(run);
            }
        } finally {
            this.inProgress = false;
        }

        this.emit('queueCompleted', this.getStatus());
    }

    private async execute(run: SearchRun): Promise<void> {
        const controller = new AbortController();
        this.controllers.set(run.id, controller);
        run.status = 'in_progress';
        run.startedAt = Date.now();
        this.emit('runStarted', run);

        try {
            const results = await this.search.run(run.queries, {
                concurrency: run.concurrency,
                signal: controller.signal,
                onProgress: (progress: SearchProgress) => {
                    run.completed = progress.completed;
                    this.emit('runProgress', run, progress);
                }
            });

            run.results = results;
            run.finishedAt = Date.now();
            if (controller.signal.aborted) {
                run.status = 'cancelled';
                this.emit('runCancelled', run);
            } else {
                run.status = 'completed';
                this.emit('runCompleted', run);
            }
        } catch (error) {
            run.status = 'failed';
            run.error = errorMessage(error);
            run.finishedAt = Date.now();
            logger.error(`Run ${run.id} failed: ${run.error}`, 'queue');
            this.emit('runFailed', run);
        } finally {
            this.controllers.delete(run.id);
        }
    }
}
