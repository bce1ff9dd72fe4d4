import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { toCsvLine } from './core/csv.js';
import { RAW_DATA_FIELD, getStatistics, RecordStatistics } from './core/record-processing.js';
import { ExportError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { BookingRecord, SearchResult } from './types.js';

export type ExportFormat = 'csv' | 'json';

export interface ExportOptions {
    format: ExportFormat;
    filePath: string;
    runId?: string;
    /** Preferred column order; remaining fields follow alphabetically. */
    columns?: readonly string[];
    now?: Date;
}

export interface ExportSummary extends RecordStatistics {
    generatedAt: string;
}

export interface ExportResult {
    filePath: string;
    format: ExportFormat;
    recordCount: number;
}

/** Flattens results into one record list, keeping batch order. */
export function collectRecords(results: readonly SearchResult[]): BookingRecord[] {
    return results.flatMap(result => result.records);
}

export function summarize(records: readonly BookingRecord[], now: Date = new Date()): ExportSummary {
    return {
        ...getStatistics(records),
        generatedAt: now.toISOString()
    };
}

export function orderColumns(records: readonly BookingRecord[], preferred: readonly string[] = []): string[] {
    const present = new Set<string>();
    for (const record of records) {
        for (const key of Object.keys(record)) {
            if (key !== RAW_DATA_FIELD) {
                present.add(key);
            }
        }
    }

    const leading = preferred.filter(column => present.has(column));
    const rest = [...present].filter(column => !leading.includes(column)).sort();
    return [...leading, ...rest];
}

export function toCsv(records: readonly BookingRecord[], preferred: readonly string[] = []): string {
    const columns = orderColumns(records, preferred);
    const lines = [
        toCsvLine(columns),
        ...records.map(record => toCsvLine(columns.map(column => record[column])))
    ];
    return lines.join('\r\n') + '\r\n';
}

export function toJson(records: readonly BookingRecord[], runId: string, now: Date): string {
    return JSON.stringify({
        runId,
        timestamp: now.toISOString(),
        summary: summarize(records, now),
        records
    }, null, 2);
}

export async function exportRecords(records: readonly BookingRecord[], options: ExportOptions): Promise<ExportResult> {
    if (records.length === 0) {
        throw new ExportError('No data to export');
    }

    const now = options.now ?? new Date();
    const content = options.format === 'csv'
        ? toCsv(records, options.columns)
        : toJson(records, options.runId ?? 'unknown', now);

    try {
        await mkdir(path.dirname(options.filePath), { recursive: true });
        await writeFile(options.filePath, content, 'utf-8');
    } catch (error) {
        throw new ExportError(`Could not write ${options.filePath}: ${errorMessage(error)}`, { cause: error });
    }

    logger.info(`Exported ${records.length} records to ${options.filePath}`, 'export');
    return { filePath: options.filePath, format: options.format, recordCount: records.length };
}

export function defaultExportPath(outputDir: string, format: ExportFormat, now: Date = new Date()): string {
    const stamp = now.toISOString().replace(/[:.]/g, '-');
    return path.join(outputDir, `booking_results_${stamp}.${format}`);
}
