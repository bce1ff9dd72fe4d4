import { SearchQuery } from '../types.js';

export interface Credentials {
    readonly username: string;
    readonly password: string;
}

/**
 * An authenticated browsing context. A session serves one query at a time;
 * the pool never hands the same session to two running workers.
 */
export interface Session {
    readonly id: string;
    /** Fills and submits the search form for the query. */
    submitSearch(query: SearchQuery, signal: AbortSignal): Promise<void>;
    /** Resolves with the results page markup once it has rendered. */
    waitForResults(signal: AbortSignal): Promise<string>;
    close(): Promise<void>;
}

export interface SessionFactory {
    create(): Promise<Session>;
    close(): Promise<void>;
}
