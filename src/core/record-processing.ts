import { BookingRecord } from '../types.js';

export const NAME_FIELD = 'Name';
export const BOOKING_NUMBER_FIELD = 'Booking Number';
export const BOOKING_DATE_FIELD = 'Booking Date';
export const RELEASE_DATE_FIELD = 'Release Date';
export const STATUS_FIELD = 'Status';
export const TIME_SERVED_FIELD = 'Time Served (Days)';
export const RAW_DATA_FIELD = 'Raw Data';

export type CustodyStatus = 'In Custody' | 'Released' | 'Unknown';

export interface RecordFilter {
    text?: string;
    field?: string;
    status?: string;
}

export interface RecordStatistics {
    total: number;
    inCustody: number;
    released: number;
    avgDays: number;
    maxDays: number;
    minDays: number;
    uniqueNames: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const NOT_RELEASED = ['', 'n/a', 'unknown', 'still in custody'];
const DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})(?:\s+(\d{1,2}):(\d{2}))?$/;

/**
 * Parses the blotter's `MM/DD/YYYY [HH:mm]` and `MM/DD/YY [HH:mm]` dates in
 * local time. Two-digit years 69-99 land in the 1900s.
 */
export function parseBlotterDate(text: string | null | undefined): Date | null {
    if (!text) {
        return null;
    }
    const match = DATE_PATTERN.exec(text.trim());
    if (!match) {
        return null;
    }
    const [, monthText, dayText, yearText, hourText, minuteText] = match;
    let year = parseInt(yearText, 10);
    if (yearText.length === 2) {
        year += year >= 69 ? 1900 : 2000;
    }
    const month = parseInt(monthText, 10);
    const day = parseInt(dayText, 10);
    const hour = hourText ? parseInt(hourText, 10) : 0;
    const minute = minuteText ? parseInt(minuteText, 10) : 0;

    if (hour > 23 || minute > 59) {
        return null;
    }
    const date = new Date(year, month - 1, day, hour, minute);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
        return null;
    }
    return date;
}

/** Release dates may read "Still in custody" or carry a trailing "Time: hh:mm". */
export function parseReleaseDate(text: string | null | undefined): Date | null {
    const normalized = (text ?? '').trim().toLowerCase();
    if (NOT_RELEASED.includes(normalized)) {
        return null;
    }
    return parseBlotterDate(normalized.replace(/\s*time:.*/i, ''));
}

export function determineStatus(
    releaseDate: string | null | undefined,
    location: string | null | undefined,
    now: Date,
    custodyIndicators: readonly string[]
): CustodyStatus {
    const released = parseReleaseDate(releaseDate);
    if (released && released.getTime() <= now.getTime()) {
        return 'Released';
    }

    const normalizedLocation = (location ?? '').trim().toLowerCase();
    if (normalizedLocation && custodyIndicators.some(indicator => normalizedLocation.includes(indicator.toLowerCase()))) {
        return 'In Custody';
    }

    return 'Unknown';
}

export function timeServedDays(bookingDate: Date | null, releaseDate: Date | null, now: Date): number {
    if (!bookingDate) {
        return 0;
    }
    const end = releaseDate ?? now;
    return Math.floor((end.getTime() - bookingDate.getTime()) / DAY_MS) + 1;
}

function hasValue(value: string | number | undefined): boolean {
    return value !== undefined && value !== '' && value !== 0 && value !== 'N/A';
}

/**
 * Fills the fields every exported row relies on. Records from the bundled
 * parser already carry them; pluggable parsers may not.
 */
export function repairRecord(record: BookingRecord, index: number, name: string): BookingRecord {
    const repaired: BookingRecord = { ...record };

    if (!(NAME_FIELD in repaired)) {
        repaired[NAME_FIELD] = name;
    }
    if (!(BOOKING_NUMBER_FIELD in repaired)) {
        repaired[BOOKING_NUMBER_FIELD] = `Unknown-${index}`;
    }
    if (!(STATUS_FIELD in repaired)) {
        repaired[STATUS_FIELD] = hasValue(repaired[RELEASE_DATE_FIELD]) ? 'Released' : 'In Custody';
    }

    return repaired;
}

export function filterRecords(records: readonly BookingRecord[], filter: RecordFilter = {}): BookingRecord[] {
    const needle = filter.text?.toLowerCase();

    return records.filter(record => {
        if (filter.status && record[STATUS_FIELD] !== filter.status) {
            return false;
        }
        if (!needle) {
            return true;
        }
        if (filter.field) {
            const value = record[filter.field];
            return value !== undefined && value !== '' && String(value).toLowerCase().includes(needle);
        }
        return Object.entries(record).some(([key, value]) =>
            key !== RAW_DATA_FIELD && String(value).toLowerCase().includes(needle)
        );
    });
}

type SortKey = number | string | null;

function sortKey(record: BookingRecord, field: string, dateFields: readonly string[]): SortKey {
    const value = record[field];
    if (value === undefined || value === '') {
        return null;
    }
    if (typeof value === 'number') {
        return value;
    }
    if (dateFields.includes(field)) {
        const date = parseReleaseDate(value);
        if (date) {
            return date.getTime();
        }
    }
    return value.toLowerCase();
}

function compareKeys(a: number | string, b: number | string): number {
    if (typeof a === 'number' && typeof b === 'number') {
        return a - b;
    }
    if (typeof a === 'number') {
        return -1;
    }
    if (typeof b === 'number') {
        return 1;
    }
    return a < b ? -1 : (a > b ? 1 : 0);
}

/** Missing values always sort last. */
export function sortRecords(
    records: readonly BookingRecord[],
    field: string,
    ascending = true,
    dateFields: readonly string[] = [BOOKING_DATE_FIELD, RELEASE_DATE_FIELD]
): BookingRecord[] {
    const direction = ascending ? 1 : -1;
    return [...records].sort((left, right) => {
        const a = sortKey(left, field, dateFields);
        const b = sortKey(right, field, dateFields);
        if (a === null && b === null) return 0;
        if (a === null) return 1;
        if (b === null) return -1;
        return compareKeys(a, b) * direction;
    });
}

export function groupByName(records: readonly BookingRecord[]): Map<string, BookingRecord[]> {
    const groups = new Map<string, BookingRecord[]>();
    for (const record of records) {
        const name = String(record[NAME_FIELD] ?? 'Unknown');
        const group = groups.get(name);
        if (group) {
            group.push(record);
        } else {
            groups.set(name, [record]);
        }
    }
    return groups;
}

export function getStatistics(records: readonly BookingRecord[]): RecordStatistics {
    const daysServed = records
        .map(record => record[TIME_SERVED_FIELD])
        .filter((days): days is number => typeof days === 'number' && days > 0);

    const avgDays = daysServed.length > 0
        ? daysServed.reduce((sum, days) => sum + days, 0) / daysServed.length
        : 0;

    return {
        total: records.length,
        inCustody: records.filter(record => record[STATUS_FIELD] === 'In Custody').length,
        released: records.filter(record => record[STATUS_FIELD] === 'Released').length,
        avgDays: Math.round(avgDays * 10) / 10,
        maxDays: daysServed.length > 0 ? Math.max(...daysServed) : 0,
        minDays: daysServed.length > 0 ? Math.min(...daysServed) : 0,
        uniqueNames: groupByName(records).size
    };
}
