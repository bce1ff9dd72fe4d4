import { errors as playwrightErrors } from 'playwright-core';
import { NetworkError, SearchFailure, TimeoutError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { BookingRecord, FailureReason, SearchQuery, SearchResult, SearchStatus, formatQueryName } from '../types.js';
import { Session } from '../types/session.js';
import { BookingParser } from './booking-parser.js';
import { STATUS_FIELD, repairRecord } from './record-processing.js';

export type WorkerState = 'NotStarted' | 'Submitted' | 'Rendered' | 'Parsed' | 'Failed';

const TRANSITIONS: Record<WorkerState, readonly WorkerState[]> = {
    NotStarted: ['Submitted', 'Failed'],
    Submitted: ['Rendered', 'Failed'],
    Rendered: ['Parsed', 'Failed'],
    Parsed: [],
    Failed: []
};

// A session in one of these states cannot be trusted with another query.
const SESSION_BREAKING: readonly FailureReason[] = ['Timeout', 'NetworkError', 'AuthExpired'];

export class IllegalTransitionError extends Error {
    constructor(from: WorkerState, to: WorkerState) {
        super(`Illegal worker transition ${from} -> ${to}`);
        this.name = 'IllegalTransitionError';
    }
}

export class SearchExecution {
    private state: WorkerState = 'NotStarted';
    private readonly visited: WorkerState[] = ['NotStarted'];

    get current(): WorkerState {
        return this.state;
    }

    get history(): readonly WorkerState[] {
        return this.visited;
    }

    transition(next: WorkerState): void {
        if (!TRANSITIONS[this.state].includes(next)) {
            throw new IllegalTransitionError(this.state, next);
        }
        this.state = next;
        this.visited.push(next);
    }
}

export interface WorkerOutcome {
    result: SearchResult;
    /** False when the session must be discarded instead of recycled. */
    reusable: boolean;
    history: readonly WorkerState[];
}

export interface SearchWorkerOptions {
    queryTimeoutMs?: number;
}

export function classifyFailure(error: unknown): SearchFailure {
    if (error instanceof SearchFailure) {
        return error;
    }
    if (error instanceof playwrightErrors.TimeoutError) {
        return new TimeoutError(error.message);
    }
    return new NetworkError(errorMessage(error));
}

function freezeResult(query: SearchQuery, records: BookingRecord[], status: SearchStatus): SearchResult {
    const result: SearchResult = { query, records: Object.freeze(records), status: Object.freeze(status) };
    return Object.freeze(result);
}

export function failedResult(query: SearchQuery, failure: SearchFailure): SearchResult {
    return freezeResult(query, [], { kind: 'Failed', reason: failure.reason, message: failure.message });
}

export class SearchWorker {
    private parser: BookingParser;
    private options: Required<SearchWorkerOptions>;

    constructor(parser: BookingParser, options: SearchWorkerOptions = {}) {
        this.parser = parser;
        this.options = {
            queryTimeoutMs: options.queryTimeoutMs || 60000
        };
    }

    public async execute(query: SearchQuery, session: Session): Promise<SearchResult> {
        const outcome = await this.run(query, session);
        return outcome.result;
    }

    public async run(query: SearchQuery, session: Session, timeoutMs = this.options.queryTimeoutMs): Promise<WorkerOutcome> {
        const name = formatQueryName(query);
        const execution = new SearchExecution();
        const controller = new AbortController();

        try {
            const markup = await this.withDeadline(async () => {
                await session.submitSearch(query, controller.signal);
                controller.signal.throwIfAborted();
                execution.transition('Submitted');

                const html = await session.waitForResults(controller.signal);
                controller.signal.throwIfAborted();
                execution.transition('Rendered');
                return html;
            }, controller, name, timeoutMs);

            const outcome = this.parser.parse(markup, query);
            execution.transition('Parsed');

            if (outcome.kind === 'no-match' || outcome.records.length === 0) {
                logger.info(`No results for ${name}`, 'worker');
                return {
                    result: freezeResult(query, [], { kind: 'NoMatch' }),
                    reusable: true,
                    history: execution.history
                };
            }

            const records = outcome.records.map((record, index) => repairRecord(record, index, name));
            logger.info(`Found ${records.length} records for ${name} (${describeCustody(records)})`, 'worker');

            return {
                result: freezeResult(query, records, { kind: 'Success' }),
                reusable: true,
                history: execution.history
            };
        } catch (error) {
            if (TRANSITIONS[execution.current].includes('Failed')) {
                execution.transition('Failed');
            }
            const failure = classifyFailure(error);
            logger.warn(`Search for ${name} failed (${failure.reason}): ${failure.message}`, 'worker');

            return {
                result: failedResult(query, failure),
                reusable: !SESSION_BREAKING.includes(failure.reason),
                history: execution.history
            };
        }
    }

    private async withDeadline<T>(
        task: () => Promise<T>,
        controller: AbortController,
        name: string,
        timeoutMs: number
    ): Promise<T> {
        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = new TimeoutError(`Results for ${name} did not render within ${timeoutMs}ms`);
                controller.abort(error);
                reject(error);
            }, timeoutMs);
        });

        try {
            return await Promise.race([task(), deadline]);
        } finally {
            clearTimeout(timer);
        }
    }
}

function describeCustody(records: readonly BookingRecord[]): string {
    const inCustody = records.filter(record => record[STATUS_FIELD] === 'In Custody').length;
    const released = records.filter(record => record[STATUS_FIELD] === 'Released').length;
    return `In Custody: ${inCustody}, Released: ${released}`;
}
