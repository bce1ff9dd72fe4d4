import { readFile } from 'fs/promises';
import { SearchQuery } from '../types.js';
import { parseCsv } from './csv.js';

export interface RejectedLine {
    line: number;
    text: string;
    reason: string;
}

export interface NameList {
    queries: SearchQuery[];
    rejected: RejectedLine[];
}

function firstWord(text: string): string {
    return text.trim().split(/\s+/)[0] ?? '';
}

function toQuery(lastPart: string, firstPart: string): SearchQuery | string {
    const lastName = firstWord(lastPart);
    if (!lastName) {
        return 'Missing last name';
    }
    return { lastName, firstName: firstWord(firstPart) };
}

/**
 * Reads one "Lastname, Firstname" entry per line. Middle names and suffixes
 * are dropped because the portal matches on single words.
 */
export function parseNameList(text: string): NameList {
    const queries: SearchQuery[] = [];
    const rejected: RejectedLine[] = [];

    text.split(/\r?\n/).forEach((raw, index) => {
        const line = raw.trim();
        if (!line) {
            return;
        }
        const comma = line.indexOf(',');
        if (comma === -1) {
            rejected.push({ line: index + 1, text: line, reason: 'Expected "Lastname, Firstname"' });
            return;
        }
        const query = toQuery(line.slice(0, comma), line.slice(comma + 1));
        if (typeof query === 'string') {
            rejected.push({ line: index + 1, text: line, reason: query });
        } else {
            queries.push(query);
        }
    });

    return { queries, rejected };
}

/** Last name in the first column, first name in the second. */
export async function loadNameListCsv(filePath: string): Promise<NameList> {
    const content = await readFile(filePath, 'utf-8');
    const queries: SearchQuery[] = [];
    const rejected: RejectedLine[] = [];

    parseCsv(content).forEach((row, index) => {
        if (row.every(cell => !cell.trim())) {
            return;
        }
        const query = toQuery(row[0] ?? '', row[1] ?? '');
        if (typeof query === 'string') {
            rejected.push({ line: index + 1, text: row.join(','), reason: query });
        } else {
            queries.push(query);
        }
    });

    return { queries, rejected };
}
