import { Request, Response, Router } from "express";
import { z } from "zod";
import { ILogger } from "../config/logger";
import { IOrderRepository } from "../db/interfaces";
import { OrdersService } from "../services/orders.service";
import { AttachmentRecord, OrderWithAttachments } from "../types/records";
import { handleRouteError } from "../utils/http-error";

const booleanQuery = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

const listQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50),
    offset: z.coerce.number().int().min(0).default(0),
    q: z.string().optional(),
    has_attachments: booleanQuery.optional()
});

const externalIdSchema = z.coerce.number().int().nonnegative();

function toAttachmentResponse(attachment: AttachmentRecord) {
    return {
        id: attachment.id,
        filename: attachment.filename,
        size_bytes: attachment.size_bytes,
        mime_type: attachment.mime_type,
        original_url: attachment.original_url,
        page_url: attachment.page_url,
        sha256: attachment.sha256
    };
}

export function toOrderResponse(order: OrderWithAttachments) {
    return {
        external_id: order.external_id,
        link: order.link,
        title: order.title,
        summary: order.summary,
        pub_date: order.pub_date,
        rss_raw: order.rss_raw,
        enriched: order.enriched_json,
        attachments: order.attachments.map(toAttachmentResponse),
        created_at: order.created_at,
        updated_at: order.updated_at
    };
}

export function createOrdersRoutes(orders: IOrderRepository, ordersService: OrdersService, logger: ILogger): Router {
    const router = Router();

    /**
     * GET /api/orders
     *
     * Lists orders, most recently updated first, with their attachments.
     *
     * Query: limit (1-500, default 50), offset, q (title/summary search),
     * has_attachments (true/false)
     * Returns: { items, limit, offset }
     */
    router.get('/', async (req: Request, res: Response) => {
        try {
            const query = listQuerySchema.parse(req.query);
            const items = await ordersService.listOrders(orders, {
                limit: query.limit,
                offset: query.offset,
                q: query.q || null,
                hasAttachments: query.has_attachments ?? null
            });

            res.json({
                items: items.map(toOrderResponse),
                limit: query.limit,
                offset: query.offset
            });

        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'Order listing failed');
        }
    });

    /**
     * GET /api/orders/:externalId
     *
     * Returns a single order by its marketplace id, with attachments.
     */
    router.get('/:externalId', async (req: Request, res: Response) => {
        try {
            const externalId = externalIdSchema.parse(req.params.externalId);
            const order = await ordersService.getOrder(orders, externalId);
            res.json(toOrderResponse(order));

        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'Order retrieval failed');
        }
    });

    return router;
}
