import { describe, it, expect } from 'vitest';
import {
    cleanSummary,
    extractExternalId,
    extractLinks,
    parseProjectId,
    parseRssDate
} from '../../../src/utils/parsing.util';

describe('Parsing Utilities - Unit Tests', () => {
    describe('extractExternalId', () => {
        it('should read the project id from a project URL', () => {
            expect(extractExternalId('https://www.fl.ru/projects/5512345/sdelat-sayt.html')).toBe(5512345);
        });

        it('should return null without a project segment', () => {
            expect(extractExternalId('https://www.fl.ru/users/someone/')).toBeNull();
            expect(extractExternalId('https://www.fl.ru/projects/123')).toBeNull();
            expect(extractExternalId(null)).toBeNull();
            expect(extractExternalId('')).toBeNull();
        });
    });

    describe('parseProjectId', () => {
        it('should accept integers and digit strings', () => {
            expect(parseProjectId(42)).toBe(42);
            expect(parseProjectId('987654')).toBe(987654);
            expect(parseProjectId(' 15 ')).toBe(15);
        });

        it('should reject anything else', () => {
            expect(parseProjectId('12a')).toBeNull();
            expect(parseProjectId(1.5)).toBeNull();
            expect(parseProjectId(null)).toBeNull();
            expect(parseProjectId('')).toBeNull();
            expect(parseProjectId({ id: 1 })).toBeNull();
        });
    });

    describe('parseRssDate', () => {
        it('should parse RFC 822 dates into UTC instants', () => {
            const date = parseRssDate('Wed, 01 May 2024 15:30:00 +0300');
            expect(date?.toISOString()).toBe('2024-05-01T12:30:00.000Z');
        });

        it('should return null for missing or invalid dates', () => {
            expect(parseRssDate(undefined)).toBeNull();
            expect(parseRssDate('not a date')).toBeNull();
        });
    });

    describe('cleanSummary', () => {
        it('should drop carriage returns and trim without truncating', () => {
            const long = 'x'.repeat(5000);
            expect(cleanSummary(`  line one\r\nline two\r\n${long}  `)).toBe(`line one\nline two\n${long}`);
        });

        it('should return an empty string for null', () => {
            expect(cleanSummary(null)).toBe('');
        });
    });

    describe('extractLinks', () => {
        it('should collect distinct links in order with trailing punctuation removed', () => {
            const summary = 'See HTTPS://Example.COM/Path?a=1. Also http://docs.example.test/guide), '
                + 'and again https://example.com/Path?a=1 plus "https://files.example.test/a.pdf"';

            expect(extractLinks(summary)).toEqual([
                'https://example.com/Path?a=1',
                'http://docs.example.test/guide',
                'https://files.example.test/a.pdf'
            ]);
        });

        it('should strip a closing guillemet', () => {
            expect(extractLinks('«https://example.com/brief»')).toEqual(['https://example.com/brief']);
        });

        it('should return an empty list when there are no links', () => {
            expect(extractLinks('no links here')).toEqual([]);
        });
    });
});
