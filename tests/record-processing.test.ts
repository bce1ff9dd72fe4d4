import {
    determineStatus,
    filterRecords,
    getStatistics,
    groupByName,
    parseBlotterDate,
    parseReleaseDate,
    repairRecord,
    sortRecords,
    timeServedDays
} from '../src/core/record-processing.js';
import { BookingRecord } from '../src/types.js';

const indicators = ['jail', 'cell', 'surety bond'];

const records: BookingRecord[] = [
    { Name: 'Doe, John', 'Booking Number': '3', 'Booking Date': '01/15/2024 10:30', Status: 'Released', 'Time Served (Days)': 5, Charges: 'THEFT' },
    { Name: 'Roe, Jane', 'Booking Number': '1', 'Booking Date': '12/01/2023', Status: 'In Custody', 'Time Served (Days)': 92, Charges: 'DUI' },
    { Name: 'Doe, John', 'Booking Number': '2', 'Booking Date': '', Status: 'In Custody', 'Time Served (Days)': 0, Charges: 'Burglary' }
];

describe('parseBlotterDate', () => {
    test('parses dates with and without a time', () => {
        expect(parseBlotterDate('01/15/2024 10:30')).toEqual(new Date(2024, 0, 15, 10, 30));
        expect(parseBlotterDate('3/5/2024')).toEqual(new Date(2024, 2, 5));
    });

    test('maps two digit years around 1969', () => {
        expect(parseBlotterDate('07/04/99')).toEqual(new Date(1999, 6, 4));
        expect(parseBlotterDate('07/04/24')).toEqual(new Date(2024, 6, 4));
    });

    test('rejects impossible or unknown dates', () => {
        expect(parseBlotterDate('02/30/2024')).toBeNull();
        expect(parseBlotterDate('01/01/2024 25:00')).toBeNull();
        expect(parseBlotterDate('Unknown')).toBeNull();
        expect(parseBlotterDate(undefined)).toBeNull();
    });
});

describe('parseReleaseDate', () => {
    test('ignores placeholders', () => {
        expect(parseReleaseDate('N/A')).toBeNull();
        expect(parseReleaseDate('Still in custody')).toBeNull();
        expect(parseReleaseDate('  ')).toBeNull();
    });

    test('drops a trailing time label', () => {
        expect(parseReleaseDate('01/20/2024 Time: 14:00')).toEqual(new Date(2024, 0, 20));
    });
});

describe('determineStatus', () => {
    const now = new Date(2024, 2, 1);

    test('is Released for a past release date', () => {
        expect(determineStatus('02/01/2024', 'Main Jail', now, indicators)).toBe('Released');
    });

    test('is In Custody when a future release date meets a custody location', () => {
        expect(determineStatus('04/01/2024', 'Cell Block C', now, indicators)).toBe('In Custody');
    });

    test('matches custody indicators case-insensitively', () => {
        expect(determineStatus('N/A', 'SURETY BOND pending', now, indicators)).toBe('In Custody');
    });

    test('is Unknown without evidence either way', () => {
        expect(determineStatus('N/A', 'Courthouse', now, indicators)).toBe('Unknown');
        expect(determineStatus(null, null, now, indicators)).toBe('Unknown');
    });
});

describe('timeServedDays', () => {
    test('counts the booking day', () => {
        expect(timeServedDays(new Date(2024, 0, 15, 10, 30), new Date(2024, 0, 20), new Date(2024, 2, 1))).toBe(5);
        expect(timeServedDays(new Date(2024, 0, 1, 8), new Date(2024, 0, 1, 20), new Date(2024, 2, 1))).toBe(1);
    });

    test('runs until now for people still in custody', () => {
        expect(timeServedDays(new Date(2024, 1, 25, 8), null, new Date(2024, 2, 1, 12))).toBe(6);
    });

    test('is zero without a booking date', () => {
        expect(timeServedDays(null, null, new Date())).toBe(0);
    });
});

describe('repairRecord', () => {
    test('fills name, booking number and status', () => {
        expect(repairRecord({ Charges: 'DUI' }, 4, 'Doe, John')).toEqual({
            Charges: 'DUI',
            Name: 'Doe, John',
            'Booking Number': 'Unknown-4',
            Status: 'In Custody'
        });
    });

    test('infers Released from a release date', () => {
        expect(repairRecord({ 'Release Date': '01/02/2024' }, 0, 'Roe').Status).toBe('Released');
        expect(repairRecord({ 'Release Date': 'N/A' }, 0, 'Roe').Status).toBe('In Custody');
    });

    test('keeps fields that are already present', () => {
        const record = { Name: 'Smith, Jane', 'Booking Number': '9', Status: 'Unknown' };
        expect(repairRecord(record, 1, 'Other')).toEqual(record);
    });
});

describe('filterRecords', () => {
    test('matches text across fields case-insensitively', () => {
        expect(filterRecords(records, { text: 'dui' }).map(record => record['Booking Number'])).toEqual(['1']);
    });

    test('restricts matching to one field', () => {
        expect(filterRecords(records, { text: 'doe', field: 'Charges' })).toEqual([]);
        expect(filterRecords(records, { text: 'doe', field: 'Name' })).toHaveLength(2);
    });

    test('filters by status', () => {
        expect(filterRecords(records, { status: 'In Custody' }).map(record => record['Booking Number'])).toEqual(['1', '2']);
    });

    test('does not search the raw page text', () => {
        expect(filterRecords([{ Name: 'A', 'Raw Data': 'secret words' }], { text: 'secret' })).toEqual([]);
    });
});

describe('sortRecords', () => {
    test('sorts dates chronologically with missing dates last', () => {
        expect(sortRecords(records, 'Booking Date').map(record => record['Booking Number'])).toEqual(['1', '3', '2']);
        expect(sortRecords(records, 'Booking Date', false).map(record => record['Booking Number'])).toEqual(['3', '1', '2']);
    });

    test('sorts numbers numerically', () => {
        expect(sortRecords(records, 'Time Served (Days)', false).map(record => record['Time Served (Days)'])).toEqual([92, 5, 0]);
    });

    test('sorts text case-insensitively without mutating the input', () => {
        const sorted = sortRecords(records, 'Charges');
        expect(sorted.map(record => record.Charges)).toEqual(['Burglary', 'DUI', 'THEFT']);
        expect(records[0].Charges).toBe('THEFT');
    });
});

describe('statistics', () => {
    test('groups records by name', () => {
        const groups = groupByName(records);
        expect([...groups.keys()]).toEqual(['Doe, John', 'Roe, Jane']);
        expect(groups.get('Doe, John')).toHaveLength(2);
    });

    test('summarizes custody and time served', () => {
        expect(getStatistics(records)).toEqual({
            total: 3,
            inCustody: 2,
            released: 1,
            avgDays: 48.5,
            maxDays: 92,
            minDays: 5,
            uniqueNames: 2
        });
    });

    test('reports zeros for an empty list', () => {
        expect(getStatistics([])).toEqual({
            total: 0,
            inCustody: 0,
            released: 0,
            avgDays: 0,
            maxDays: 0,
            minDays: 0,
            uniqueNames: 0
        });
    });
});
