import Parser from 'rss-parser';
import { ILogger } from '../config/logger';
import { Settings } from '../config/settings';
import { IDatabase } from '../db/interfaces';
import { toJsonObject } from '../types/json';
import { HttpError } from '../utils/http-error';
import { cleanSummary, extractExternalId, extractLinks, parseRssDate } from '../utils/parsing.util';
import { OrdersService } from './orders.service';

export interface RssIngestOptions {
    feedUrl?: string | null;
    category?: number | null;
    subcategory?: number | null;
    limit?: number | null;
}

export interface RssIngestResult {
    status: 'ok';
    inserted: number;
    updated: number;
}

/**
 * Where the feed document comes from.
 */
export interface IFeedSource {
    fetch(url: string): Promise<string>;
}

type FetchFn = typeof fetch;

export class HttpFeedSource implements IFeedSource {
    constructor(private fetchImpl: FetchFn = fetch) { }

    async fetch(url: string): Promise<string> {
        const response = await this.fetchImpl(url, {
            headers: { 'Accept': 'application/rss+xml, application/xml, text/xml' }
        });
        if (!response.ok) {
            throw new Error(`HTTP ${response.status}`);
        }
        return response.text();
    }
}

interface FeedItemFields {
    description?: string;
}

/**
 * Resolves the feed URL from the request overrides and the settings.
 * Category and subcategory are merged into the URL's existing query.
 */
export function buildFeedUrl(
    options: RssIngestOptions,
    settings: Pick<Settings, 'rssFeedUrl' | 'rssCategory' | 'rssSubcategory'>
): string {
    const url = new URL(options.feedUrl || settings.rssFeedUrl);
    const category = options.category ?? settings.rssCategory;
    const subcategory = options.subcategory ?? settings.rssSubcategory;

    if (category !== null) {
        url.searchParams.set('category', String(category));
    }
    if (subcategory !== null) {
        url.searchParams.set('subcategory', String(subcategory));
    }
    return url.toString();
}

/**
 * RSS Ingest Service
 *
 * Fetches the marketplace feed and upserts every entry as an order.
 *
 * Flow:
 * 1. Resolve the feed URL (request overrides, then settings)
 * 2. Fetch and parse the feed; either failing is a 502
 * 3. Upsert entries in one transaction, counting inserts and updates
 */
export class RssIngestService {
    private parser = new Parser<object, FeedItemFields>({
        customFields: { item: ['description'] }
    });

    constructor(
        private database: IDatabase,
        private ordersService: OrdersService,
        private settings: Pick<Settings, 'rssFeedUrl' | 'rssCategory' | 'rssSubcategory'>,
        private logger: ILogger,
        private feedSource: IFeedSource = new HttpFeedSource()
    ) { }

    async ingest(options: RssIngestOptions = {}): Promise<RssIngestResult> {
        const feedUrl = buildFeedUrl(options, this.settings);
        this.logger.info({ feedUrl }, 'Fetching RSS feed');

        let document: string;
        try {
            document = await this.feedSource.fetch(feedUrl);
        } catch (error: unknown) {
            this.logger.error({
                feedUrl,
                error: error instanceof Error ? error.message : String(error)
            }, 'Failed to fetch RSS feed');
            throw HttpError.badGateway('Failed to fetch RSS feed');
        }

        let feed: Parser.Output<FeedItemFields>;
        try {
            feed = await this.parser.parseString(document);
        } catch (error: unknown) {
            this.logger.error({
                feedUrl,
                error: error instanceof Error ? error.message : String(error)
            }, 'Failed to parse RSS feed');
            throw HttpError.badGateway('Failed to parse RSS feed');
        }

        const limit = options.limit ?? null;
        const entries = limit !== null ? feed.items.slice(0, limit) : feed.items;
        this.logger.info({ feedUrl, entries: entries.length }, 'RSS feed parsed');

        const counts = await this.database.transaction(async ({ orders }) => {
            let inserted = 0;
            let updated = 0;

            for (const entry of entries) {
                const link = entry.link;
                const title = entry.title;
                if (!link || !title) {
                    this.logger.warn({ guid: entry.guid ?? null, link: link ?? null }, 'Skipping entry without link/title');
                    continue;
                }

                const summaryRaw = entry.summary || entry.description || entry.content;
                const summary = summaryRaw === undefined ? null : cleanSummary(summaryRaw);

                const { created } = await this.ordersService.upsertFromFeed(orders, {
                    externalId: extractExternalId(link),
                    link,
                    title,
                    summary,
                    pubDate: parseRssDate(entry.pubDate ?? entry.isoDate),
                    rssRaw: {
                        ...toJsonObject(entry),
                        extracted_links: extractLinks(summary ?? '')
                    }
                });

                if (created) {
                    inserted++;
                } else {
                    updated++;
                }
            }

            return { inserted, updated };
        });

        this.logger.info({ feedUrl, ...counts }, 'RSS ingest completed');

        return { status: 'ok', ...counts };
    }
}
