import { Config } from './config.js';
import { BookingParser, HtmlBookingParser } from './core/booking-parser.js';
import { BrowserSessionFactory } from './core/browser-session.js';
import { RecordFilter, RecordStatistics, filterRecords, getStatistics, sortRecords } from './core/record-processing.js';
import { SearchWorker } from './core/search-worker.js';
import { ConfigError, ExportError, InvalidBatchError } from './errors.js';
import { ExportFormat, ExportResult, collectRecords, defaultExportPath, exportRecords } from './exporter.js';
import { logger } from './logger.js';
import { ParallelSearch } from './parallel-search.js';
import { RunStatus, SearchQueue, SearchRun } from './search-queue.js';
import { FailureReason, SearchQuery, SearchResult, formatQueryName } from './types.js';
import { SessionFactory } from './types/session.js';

export interface BookingBlotterDependencies {
    sessionFactory?: SessionFactory;
    parser?: BookingParser;
}

export interface QueryRow {
    name: string;
    status: 'Pending' | 'Success' | 'NoMatch' | 'Failed';
    reason?: FailureReason;
    message?: string;
    recordCount: number;
}

export interface RunReport {
    runId: string;
    status: RunStatus;
    total: number;
    completed: number;
    error?: string;
    timing: {
        created: string;
        started?: string;
        finished?: string;
        duration?: number;
    };
    rows: QueryRow[];
    statistics?: RecordStatistics;
}

export interface StartSearchOptions {
    concurrency?: number;
}

export interface ExportRunOptions {
    format: ExportFormat;
    outputPath?: string;
    filter?: RecordFilter;
    sort?: {
        field: string;
        ascending?: boolean;
    };
}

function toRow(query: SearchQuery, result: SearchResult | undefined): QueryRow {
    const name = formatQueryName(query);
    if (!result) {
        return { name, status: 'Pending', recordCount: 0 };
    }
    const { status } = result;
    if (status.kind === 'Failed') {
        return { name, status: 'Failed', reason: status.reason, message: status.message, recordCount: 0 };
    }
    return { name, status: status.kind, recordCount: result.records.length };
}

function toIso(time: number | undefined): string | undefined {
    return time === undefined ? undefined : new Date(time).toISOString();
}

/**
 * Entry point for searches: wires the configured session factory, parser,
 * coordinator and queue together and exports finished runs.
 */
export class BookingBlotter {
    private config: Config;
    private dependencies: BookingBlotterDependencies;
    private factory: SessionFactory | null = null;
    private queue: SearchQueue | null = null;

    constructor(config: Config, dependencies: BookingBlotterDependencies = {}) {
        this.config = config;
        this.dependencies = dependencies;
    }

    public startSearch(queries: readonly SearchQuery[], options: StartSearchOptions = {}): string {
        if (queries.length === 0) {
            throw new InvalidBatchError('No names to search');
        }
        const runId = this.ensureQueue().addRun(queries, {
            concurrency: options.concurrency ?? this.config.search.maxWorkers
        });
        logger.info(`Queued run ${runId} with ${queries.length} names`, 'blotter');
        return runId;
    }

    public getRunReport(runId: string): RunReport | undefined {
        const run = this.queue?.getRun(runId);
        return run ? this.toReport(run) : undefined;
    }

    public async waitForRun(runId: string): Promise<RunReport> {
        if (!this.queue) {
            throw new Error(`Unknown run: ${runId}`);
        }
        const run = await this.queue.waitForRun(runId);
        return this.toReport(run);
    }

    public cancel(runId: string): boolean {
        return this.queue?.cancelRun(runId) ?? false;
    }

    public async exportRun(runId: string, options: ExportRunOptions): Promise<ExportResult> {
        const run = this.queue?.getRun(runId);
        if (!run) {
            throw new ExportError(`Unknown run: ${runId}`);
        }
        if (!run.results) {
            throw new ExportError(`Run ${runId} has not finished yet`);
        }

        let records = filterRecords(collectRecords(run.results), options.filter);
        if (options.sort) {
            records = sortRecords(records, options.sort.field, options.sort.ascending ?? true);
        }

        return exportRecords(records, {
            format: options.format,
            filePath: options.outputPath ?? defaultExportPath(this.config.outputDir, options.format),
            runId,
            columns: this.config.siteProfile.columns
        });
    }

    public async shutdown(): Promise<void> {
        const status = this.queue?.getStatus();
        if (status?.currentRun) {
            this.queue?.cancelRun(status.currentRun.id);
        }
        if (this.factory) {
            await this.factory.close();
        }
    }

    private ensureQueue(): SearchQueue {
        if (this.queue) {
            return this.queue;
        }

        const { search, siteProfile } = this.config;
        const factory = this.dependencies.sessionFactory ?? this.createBrowserFactory();
        const parser = this.dependencies.parser ?? new HtmlBookingParser(siteProfile);
        const worker = new SearchWorker(parser, { queryTimeoutMs: search.queryTimeoutMs });

        this.factory = factory;
        this.queue = new SearchQueue(new ParallelSearch(factory, worker, {
            maxParallel: search.maxWorkers,
            sessionsPerMinute: search.sessionsPerMinute
        }));
        this.queue.on('runCompleted', (run: SearchRun) => {
            logger.info(`Run ${run.id} completed (${run.queries.length} names)`, 'blotter');
        });
        return this.queue;
    }

    private createBrowserFactory(): SessionFactory {
        const { credentials, siteProfile, search, browser } = this.config;
        if (!credentials) {
            throw new ConfigError('Portal credentials are not configured', [
                'Set BLOTTER_USERNAME and BLOTTER_PASSWORD or pass --username and --password'
            ]);
        }
        return new BrowserSessionFactory(credentials, siteProfile, {
            headless: browser.headless,
            executablePath: browser.executablePath,
            channel: browser.channel,
            minDelayMs: search.minDelayMs,
            maxDelayMs: search.maxDelayMs,
            navigationTimeoutMs: search.queryTimeoutMs
        });
    }

    private toReport(run: SearchRun): RunReport {
        const rows = run.queries.map((query, index) => toRow(query, run.results?.[index]));
        const report: RunReport = {
            runId: run.id,
            status: run.status,
            total: run.queries.length,
            completed: run.results ? run.queries.length : run.completed,
            timing: {
                created: new Date(run.createdAt).toISOString(),
                started: toIso(run.startedAt),
                finished: toIso(run.finishedAt),
                duration: run.startedAt !== undefined && run.finishedAt !== undefined
                    ? run.finishedAt - run.startedAt
                    : undefined
            },
            rows
        };
        if (run.error) {
            report.error = run.error;
        }
        if (run.results) {
            report.statistics = getStatistics(collectRecords(run.results));
        }
        return report;
    }
}

export default BookingBlotter;
