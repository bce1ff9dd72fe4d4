export interface SearchQuery {
    readonly lastName: string;
    readonly firstName: string;
}

/**
 * One booking entry scraped from the results page. Field names come from the
 * site profile, so the shape is left open.
 */
export type BookingRecord = Record<string, string | number>;

export type FailureReason =
    | 'Timeout'
    | 'NetworkError'
    | 'ParseError'
    | 'AuthExpired'
    | 'Cancelled';

export type SearchStatus =
    | { kind: 'Success' }
    | { kind: 'NoMatch' }
    | { kind: 'Failed'; reason: FailureReason; message: string };

export interface SearchResult {
    readonly query: SearchQuery;
    readonly records: readonly BookingRecord[];
    readonly status: SearchStatus;
}

export interface SearchProgress {
    index: number;
    total: number;
    completed: number;
    query: SearchQuery;
    status: SearchStatus;
    recordCount: number;
    elapsedMs: number;
}

export interface SearchOptions {
    concurrency?: number;
    queryTimeoutMs?: number;
    staggerMs?: number;
    signal?: AbortSignal;
    onProgress?: (progress: SearchProgress) => void;
}

export function formatQueryName(query: SearchQuery): string {
    return query.firstName ? `${query.lastName}, ${query.firstName}` : query.lastName;
}
