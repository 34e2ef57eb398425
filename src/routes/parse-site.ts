import { Request, Response, Router } from "express";
import { z } from "zod";
import { ILogger } from "../config/logger";
import { StagehandService, StagehandServiceError } from "../services/stagehand.service";
import { jsonObjectSchema } from "../types/json";
import { HttpError, handleRouteError } from "../utils/http-error";

const parseSiteSchema = z.object({
    url: z.unknown(),
    instruction: z.string().nullish(),
    schema: jsonObjectSchema.nullish(),
    options: jsonObjectSchema.nullish()
});

export function isHttpUrl(value: unknown): value is string {
    if (typeof value !== 'string') {
        return false;
    }
    try {
        const url = new URL(value);
        return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
    } catch {
        return false;
    }
}

export function createParseSiteRoutes(stagehandService: StagehandService, logger: ILogger): Router {
    const router = Router();

    /**
     * POST /api/parse-site
     *
     * Asks the page-analysis service to extract data from a web page.
     *
     * Body: { url, instruction?, schema?, options? }
     * Returns: the service's JSON response unchanged
     */
    router.post('/parse-site', async (req: Request, res: Response) => {
        try {
            const body = parseSiteSchema.parse(req.body ?? {});
            if (!isHttpUrl(body.url)) {
                throw HttpError.badRequest('A valid http(s) URL is required');
            }

            const result = await stagehandService.parseSite({
                url: body.url,
                instruction: body.instruction,
                schema: body.schema,
                options: body.options
            });
            res.json(result);

        } catch (error: unknown) {
            if (error instanceof StagehandServiceError) {
                handleRouteError(HttpError.badGateway(error.message), res, logger, 'Page analysis failed');
                return;
            }
            handleRouteError(error, res, logger, 'Page analysis failed');
        }
    });

    return router;
}
