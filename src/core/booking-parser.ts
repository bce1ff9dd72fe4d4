import * as cheerio from 'cheerio';
import { ParseError } from '../errors.js';
import { BookingRecord, SearchQuery, formatQueryName } from '../types.js';
import { FieldRule, SiteProfile } from '../types/site-profile.js';
import {
    NAME_FIELD,
    RAW_DATA_FIELD,
    STATUS_FIELD,
    TIME_SERVED_FIELD,
    determineStatus,
    parseBlotterDate,
    parseReleaseDate,
    timeServedDays
} from './record-processing.js';

type CheerioRoot = ReturnType<typeof cheerio.load>;

export type ParseOutcome =
    | { kind: 'records'; records: BookingRecord[] }
    | { kind: 'no-match' };

/**
 * Turns a rendered results page into booking records. Throws ParseError when
 * the page is neither a result list nor a recognizable empty result.
 */
export interface BookingParser {
    parse(markup: string, query: SearchQuery): ParseOutcome;
}

const BLOCK_ELEMENTS = 'p, div, tr, li, dt, dd, td, th, h1, h2, h3, h4, h5, h6, table, section, article';

export class HtmlBookingParser implements BookingParser {
    private profile: SiteProfile;
    private now: () => Date;

    constructor(profile: SiteProfile, now: () => Date = () => new Date()) {
        this.profile = profile;
        this.now = now;
    }

    public parse(markup: string, query: SearchQuery): ParseOutcome {
        const $ = cheerio.load(markup);
        this.breakIntoLines($);

        const { results, entry } = this.profile.selectors;
        const container = $(results);
        // Some result pages render entries without the wrapping container.
        const entries = container.length > 0 ? container.find(entry) : $(entry);

        if (entries.length === 0) {
            if (container.length > 0 || this.hasNoResultsIndicator($)) {
                return { kind: 'no-match' };
            }
            throw new ParseError(
                `Results page for ${formatQueryName(query)} did not contain "${results}" or a no-results notice`
            );
        }

        const name = formatQueryName(query);
        const texts = entries.map((_, element) => $(element).text()).get();
        return {
            kind: 'records',
            records: texts.map(text => this.parseEntry(toLines(text), name))
        };
    }

    private breakIntoLines($: CheerioRoot): void {
        $('script, style, noscript').remove();
        $('br').replaceWith('\n');
        $(BLOCK_ELEMENTS).append('\n');
    }

    private hasNoResultsIndicator($: CheerioRoot): boolean {
        const { noResults } = this.profile.selectors;
        if (noResults && $(noResults).length > 0) {
            return true;
        }
        const bodyText = $('body').text().toLowerCase();
        return this.profile.noResultsText.some(text => bodyText.includes(text.toLowerCase()));
    }

    private parseEntry(lines: string[], name: string): BookingRecord {
        const record: BookingRecord = { [NAME_FIELD]: name };
        const labels = this.profile.fields.map(rule => rule.label);

        for (const rule of this.profile.fields) {
            record[rule.key] = extractValue(lines, rule, labels) ?? rule.defaultValue;
        }

        const { derived } = this.profile;
        if (derived) {
            const now = this.now();
            const bookingText = String(record[derived.bookingDate]);
            const releaseText = String(record[derived.releaseDate]);
            const status = determineStatus(
                releaseText,
                String(record[derived.location]),
                now,
                this.profile.custodyIndicators
            );

            record[derived.releaseDate] = status === 'Released' ? releaseText : 'Still in custody';
            record[STATUS_FIELD] = status;
            record[TIME_SERVED_FIELD] = timeServedDays(
                parseBlotterDate(bookingText),
                status === 'Released' ? parseReleaseDate(releaseText) : null,
                now
            );
        }

        record[RAW_DATA_FIELD] = lines.join('\n');
        return record;
    }
}

export function toLines(text: string): string[] {
    return text
        .split('\n')
        .map(line => line.replace(/\s+/g, ' ').trim())
        .filter(line => line.length > 0);
}

/**
 * Reads the value that follows a label, either on the label's own line or on
 * the next one. Multiline fields run until the next line containing a colon.
 */
export function extractValue(lines: readonly string[], rule: FieldRule, labels: readonly string[] = [rule.label]): string | null {
    const isLabelLine = (line: string) => labels.some(label => line.includes(label));

    for (let i = 0; i < lines.length; i++) {
        const position = lines[i].indexOf(rule.label);
        if (position === -1) {
            continue;
        }

        const inline = lines[i].slice(position + rule.label.length).trim();

        if (rule.multiline) {
            const collected = inline ? [inline] : [];
            for (let j = i + 1; j < lines.length && !lines[j].includes(':'); j++) {
                collected.push(lines[j]);
            }
            return collected.length > 0 ? collected.join(' | ') : null;
        }

        if (inline) {
            return inline;
        }
        const next = lines[i + 1];
        return next !== undefined && !isLabelLine(next) ? next : null;
    }

    return null;
}
