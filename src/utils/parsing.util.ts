const EXTERNAL_ID_PATTERN = /\/projects\/(\d+)\//;
const URL_PATTERN = /https?:\/\/[^\s<>"]+/gi;
const TRAILING_PUNCTUATION = /[.,")'»]+$/;

/**
 * Extracts the marketplace project id from a URL such as
 * `https://www.fl.ru/projects/123456/title.html`.
 */
export function extractExternalId(url: string | null | undefined): number | null {
    if (!url) {
        return null;
    }
    const match = EXTERNAL_ID_PATTERN.exec(url);
    if (!match) {
        return null;
    }
    const value = Number(match[1]);
    return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parses a project id supplied as a number or a string of digits.
 */
export function parseProjectId(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) ? value : null;
    }
    if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
        const parsed = Number(value.trim());
        return Number.isSafeInteger(parsed) ? parsed : null;
    }
    return null;
}

/**
 * Parses an RSS (RFC 822) or ISO date. Returns null when the value is
 * missing or unparseable. Dates are absolute instants, so they are UTC already.
 */
export function parseRssDate(value: string | null | undefined): Date | null {
    if (!value) {
        return null;
    }
    const timestamp = Date.parse(value);
    return Number.isNaN(timestamp) ? null : new Date(timestamp);
}

export function cleanSummary(summary: string | null | undefined): string {
    if (summary === null || summary === undefined) {
        return '';
    }
    return summary.replace(/\r/g, '').trim();
}

// Only scheme and host are case-insensitive
function normalizeUrl(raw: string): string {
    const match = /^([a-z][a-z0-9+.-]*):\/\/([^/?#]*)(.*)$/i.exec(raw);
    if (!match) {
        return raw;
    }
    return `${match[1].toLowerCase()}://${match[2].toLowerCase()}${match[3]}`;
}

/**
 * Collects distinct http(s) links mentioned in a feed summary, in order of
 * first appearance.
 */
export function extractLinks(summary: string): string[] {
    const seen = new Set<string>();
    const links: string[] = [];

    for (const match of summary.matchAll(URL_PATTERN)) {
        const normalized = normalizeUrl(match[0].replace(TRAILING_PUNCTUATION, ''));
        if (!seen.has(normalized)) {
            seen.add(normalized);
            links.push(normalized);
        }
    }

    return links;
}
