import { readFileSync } from 'fs';
import path from 'path';
import defaultProfile from '../config/site-profile.json';
import { HtmlBookingParser, extractValue, toLines } from '../src/core/booking-parser.js';
import { ParseError } from '../src/errors.js';
import { SiteProfileSchema } from '../src/types/site-profile.js';

const profile = SiteProfileSchema.parse(defaultProfile);
const query = { lastName: 'Doe', firstName: 'John' };
const now = () => new Date(2024, 2, 1, 12, 0);

describe('HtmlBookingParser', () => {
    const parser = new HtmlBookingParser(profile, now);

    test('extracts one record per result entry', () => {
        const markup = readFileSync(path.join(__dirname, 'fixtures', 'results-page.html'), 'utf-8');

        const outcome = parser.parse(markup, query);
        if (outcome.kind !== 'records') {
            throw new Error(`expected records, got ${outcome.kind}`);
        }

        expect(outcome.records).toHaveLength(2);
        expect(outcome.records[0]).toEqual({
            Name: 'Doe, John',
            'Booking Number': '24-0001',
            'Booking Date': '01/15/2024 10:30',
            'Release Date': '01/20/2024 Time: 14:00',
            Charges: 'BATTERY | TRESPASS',
            'Cell Location': 'Lobby',
            Status: 'Released',
            'Time Served (Days)': 5,
            'Raw Data': [
                'Booking Number: 24-0001',
                'Booking Date/Time: 01/15/2024 10:30',
                'Release Date: 01/20/2024 Time: 14:00',
                'Charges:',
                'BATTERY',
                'TRESPASS',
                'Cell Location: Lobby'
            ].join('\n')
        });
    });

    test('derives custody from the cell location when there is no release date', () => {
        const markup = readFileSync(path.join(__dirname, 'fixtures', 'results-page.html'), 'utf-8');

        const outcome = parser.parse(markup, query);
        if (outcome.kind !== 'records') {
            throw new Error(`expected records, got ${outcome.kind}`);
        }

        const record = outcome.records[1];
        expect(record['Booking Number']).toBe('24-0002');
        expect(record.Charges).toBe('DUI');
        expect(record['Cell Location']).toBe('Main Jail North Tower');
        expect(record['Release Date']).toBe('Still in custody');
        expect(record.Status).toBe('In Custody');
        expect(record['Time Served (Days)']).toBe(6);
    });

    test('treats an empty results container as no match', () => {
        expect(parser.parse('<div id="resultspage"></div>', query)).toEqual({ kind: 'no-match' });
    });

    test('recognizes the no-results notice', () => {
        expect(parser.parse('<p class="no-results">Nothing here</p>', query)).toEqual({ kind: 'no-match' });
        expect(parser.parse('<body><h2>No Records Found</h2></body>', query)).toEqual({ kind: 'no-match' });
    });

    test('finds entries rendered outside the results container', () => {
        const outcome = parser.parse('<div id="allresults_9">Booking Number: 9</div>', query);

        expect(outcome.kind).toBe('records');
        if (outcome.kind === 'records') {
            expect(outcome.records[0]['Booking Number']).toBe('9');
            expect(outcome.records[0]['Release Date']).toBe('Still in custody');
            expect(outcome.records[0].Status).toBe('Unknown');
            expect(outcome.records[0]['Time Served (Days)']).toBe(0);
        }
    });

    test('fails on a page it does not recognize', () => {
        const markup = '<html><body><h1>Scheduled maintenance</h1></body></html>';

        expect(() => parser.parse(markup, query)).toThrow(ParseError);
        expect(() => parser.parse(markup, query)).toThrow(
            'Results page for Doe, John did not contain "#resultspage" or a no-results notice'
        );
    });

    test('leaves status fields alone when the profile derives nothing', () => {
        const plain = new HtmlBookingParser({ ...profile, derived: undefined }, now);

        const outcome = plain.parse('<div id="allresults_1">Booking Number: 77</div>', query);

        expect(outcome).toEqual({
            kind: 'records',
            records: [{
                Name: 'Doe, John',
                'Booking Number': '77',
                'Booking Date': 'Unknown',
                'Release Date': 'N/A',
                Charges: 'Not specified',
                'Cell Location': 'Not specified',
                'Raw Data': 'Booking Number: 77'
            }]
        });
    });
});

describe('toLines', () => {
    test('collapses whitespace and drops blank lines', () => {
        expect(toLines('  Booking   Number:  1 \n\n\t\n Charges:\tDUI ')).toEqual(['Booking Number: 1', 'Charges: DUI']);
    });
});

describe('extractValue', () => {
    const bookingNumber = { key: 'Booking Number', label: 'Booking Number:', defaultValue: 'Unknown' };
    const charges = { key: 'Charges', label: 'Charges:', multiline: true, defaultValue: 'Not specified' };
    const labels = ['Booking Number:', 'Charges:'];

    test('reads the value on the label line', () => {
        expect(extractValue(['Booking Number: 42'], bookingNumber, labels)).toBe('42');
    });

    test('reads the value on the following line', () => {
        expect(extractValue(['Booking Number:', '42'], bookingNumber, labels)).toBe('42');
    });

    test('does not take another label as the value', () => {
        expect(extractValue(['Booking Number:', 'Charges: DUI'], bookingNumber, labels)).toBeNull();
    });

    test('joins multiline values until the next labelled line', () => {
        expect(extractValue(['Charges: THEFT', 'FRAUD', 'Cell Location: A'], charges, labels)).toBe('THEFT | FRAUD');
    });

    test('returns null when the label is absent', () => {
        expect(extractValue(['Something else'], charges, labels)).toBeNull();
    });
});
