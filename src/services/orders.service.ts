import * as crypto from 'crypto';
import { ILogger } from '../config/logger';
import { IOrderRepository, OrderListQuery } from '../db/interfaces';
import { JsonObject } from '../types/json';
import { OrderRecord, OrderWithAttachments } from '../types/records';
import { HttpError } from '../utils/http-error';
import { deepMerge } from '../utils/json-merge.util';

export interface FeedEntry {
    externalId: number | null;
    link: string;
    title: string;
    summary: string | null;
    pubDate: Date | null;
    rssRaw: JsonObject;
}

export interface EnsureOrderInput {
    externalId: number | null;
    link: string | null;
    title?: string | null;
    summary?: string | null;
    rssRaw?: JsonObject | null;
}

export interface UpsertResult {
    order: OrderRecord;
    created: boolean;
}

/**
 * Looks an order up by external id first, then by link.
 */
export async function findOrder(orders: IOrderRepository, externalId: number | null, link: string | null): Promise<OrderRecord | null> {
    if (externalId !== null) {
        const byExternalId = await orders.findByExternalId(externalId);
        if (byExternalId) {
            return byExternalId;
        }
    }
    if (link) {
        return orders.findByLink(link);
    }
    return null;
}

/**
 * Synthetic link for an order known by nothing else. The random suffix keeps
 * links unique when two such orders are created in the same millisecond.
 */
export function placeholderLink(now: Date = new Date()): string {
    return `unknown://${now.getTime() / 1000}/${crypto.randomBytes(4).toString('hex')}`;
}

/**
 * Orders Service
 *
 * Reconciles feed sightings and agent uploads onto a single order row.
 * Methods take the repository explicitly so callers can run them inside a
 * transaction.
 */
export class OrdersService {
    constructor(
        private logger: ILogger,
        private clock: () => Date = () => new Date()
    ) { }

    /**
     * Inserts a new order for the feed entry, or overwrites the feed-sourced
     * fields of the existing one.
     */
    async upsertFromFeed(orders: IOrderRepository, entry: FeedEntry): Promise<UpsertResult> {
        const existing = await findOrder(orders, entry.externalId, entry.link);

        if (!existing) {
            const order = await orders.insert({
                external_id: entry.externalId,
                link: entry.link,
                title: entry.title,
                summary: entry.summary,
                pub_date: entry.pubDate,
                rss_raw: entry.rssRaw,
                enriched_json: {}
            });
            this.logger.info({ orderId: order.id, externalId: entry.externalId, link: entry.link }, 'Inserted order');
            return { order, created: true };
        }

        const order = await orders.update(existing.id, {
            title: entry.title,
            summary: entry.summary,
            pub_date: entry.pubDate,
            rss_raw: entry.rssRaw,
            ...(entry.externalId !== null && existing.external_id === null ? { external_id: entry.externalId } : {})
        });
        this.logger.info({ orderId: order.id, externalId: order.external_id, link: entry.link }, 'Updated order');
        return { order, created: false };
    }

    /**
     * Returns the matching order, creating a placeholder when there is none.
     */
    async ensureOrder(orders: IOrderRepository, input: EnsureOrderInput): Promise<OrderRecord> {
        const existing = await findOrder(orders, input.externalId, input.link);
        if (existing) {
            return existing;
        }

        const order = await orders.insert({
            external_id: input.externalId,
            link: input.link || placeholderLink(this.clock()),
            title: input.title ?? '',
            summary: input.summary ?? null,
            pub_date: null,
            rss_raw: input.rssRaw ?? {},
            enriched_json: {}
        });

        this.logger.info({
            orderId: order.id,
            externalId: order.external_id,
            link: order.link
        }, 'Created placeholder order');

        return order;
    }

    /**
     * Deep-merges the payload into the order's enrichment.
     */
    async mergeEnrichment(orders: IOrderRepository, order: OrderRecord, payload: JsonObject): Promise<OrderRecord> {
        return orders.update(order.id, {
            enriched_json: deepMerge(order.enriched_json, payload)
        });
    }

    async listOrders(orders: IOrderRepository, query: OrderListQuery): Promise<OrderWithAttachments[]> {
        return orders.list(query);
    }

    async getOrder(orders: IOrderRepository, externalId: number): Promise<OrderWithAttachments> {
        const order = await orders.findWithAttachments(externalId);
        if (!order) {
            throw HttpError.notFound('Order not found');
        }
        return order;
    }
}
