import { Request, Response, Router } from "express";
import { z } from "zod";
import { ILogger } from "../config/logger";
import { RssIngestService } from "../services/rss-ingest.service";
import { handleRouteError } from "../utils/http-error";

const ingestRequestSchema = z.object({
    feed_url: z.string().url().nullish(),
    category: z.number().int().nullish(),
    subcategory: z.number().int().nullish(),
    limit: z.number().int().min(0).nullish()
});

export function createIngestRoutes(ingestService: RssIngestService, logger: ILogger): Router {
    const router = Router();

    /**
     * POST /api/rss/ingest
     *
     * Fetches the marketplace feed and upserts its entries as orders.
     *
     * Body (all optional): { feed_url, category, subcategory, limit }
     * Returns: { status: "ok", inserted, updated }
     */
    router.post('/ingest', async (req: Request, res: Response) => {
        try {
            const body = ingestRequestSchema.parse(req.body ?? {});
            const result = await ingestService.ingest({
                feedUrl: body.feed_url,
                category: body.category,
                subcategory: body.subcategory,
                limit: body.limit
            });
            res.json(result);

        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'RSS ingest failed');
        }
    });

    return router;
}
