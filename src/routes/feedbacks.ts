import { Request, Response, Router } from "express";
import { z } from "zod";
import { ILogger } from "../config/logger";
import { FeedbacksService } from "../services/feedbacks.service";
import { parseUid } from "../services/users.service";
import { OrderFeedbackRecord } from "../types/records";
import { handleRouteError } from "../utils/http-error";

const feedbackCreateSchema = z.object({
    order_id: z.number().int(),
    user_id: z.string().uuid(),
    feedback_text: z.string()
});

const pageSchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50),
    offset: z.coerce.number().int().min(0).default(0)
});

const idSchema = z.coerce.number().int().positive();
const statusSchema = z.string({ required_error: 'status is required' });

function toFeedbackResponse(feedback: OrderFeedbackRecord) {
    return {
        id: feedback.id,
        order_id: feedback.order_id,
        user_id: feedback.user_id,
        feedback_text: feedback.feedback_text,
        status: feedback.status,
        created_at: feedback.created_at,
        updated_at: feedback.updated_at
    };
}

function readStatus(req: Request): unknown {
    if (req.query.status !== undefined) {
        return req.query.status;
    }
    const body: unknown = req.body;
    if (typeof body === 'object' && body !== null && 'status' in body) {
        return body.status;
    }
    return undefined;
}

export function createFeedbacksRoutes(feedbacksService: FeedbacksService, logger: ILogger): Router {
    const router = Router();

    /**
     * POST /api/feedbacks
     *
     * Body: { order_id, user_id, feedback_text }
     * One feedback per user and order; a second one is a 400.
     */
    router.post('/', async (req: Request, res: Response) => {
        try {
            const input = feedbackCreateSchema.parse(req.body);
            const feedback = await feedbacksService.createFeedback({
                ...input,
                user_id: input.user_id.toLowerCase()
            });
            res.json(toFeedbackResponse(feedback));
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'Feedback creation failed');
        }
    });

    /**
     * GET /api/feedbacks/order/:orderId
     *
     * Feedbacks left on an order, newest first. Query: limit, offset
     */
    router.get('/order/:orderId', async (req: Request, res: Response) => {
        try {
            const orderId = idSchema.parse(req.params.orderId);
            const page = pageSchema.parse(req.query);
            const list = await feedbacksService.listForOrder(orderId, page);
            res.json({ ...list, items: list.items.map(toFeedbackResponse) });
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'Order feedback listing failed');
        }
    });

    /**
     * GET /api/feedbacks/user/:uid
     *
     * Feedbacks left by a user, newest first. Query: limit, offset
     */
    router.get('/user/:uid', async (req: Request, res: Response) => {
        try {
            const uid = parseUid(req.params.uid);
            const page = pageSchema.parse(req.query);
            const list = await feedbacksService.listForUser(uid, page);
            res.json({ ...list, items: list.items.map(toFeedbackResponse) });
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'User feedback listing failed');
        }
    });

    /**
     * PATCH /api/feedbacks/:id/status
     *
     * Status comes from the query string (`?status=accepted`) or the body.
     * Allowed: pending, accepted, rejected
     */
    router.patch('/:id/status', async (req: Request, res: Response) => {
        try {
            const id = idSchema.parse(req.params.id);
            const status = statusSchema.parse(readStatus(req));
            const feedback = await feedbacksService.updateStatus(id, status);
            res.json(toFeedbackResponse(feedback));
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'Feedback status update failed');
        }
    });

    /**
     * DELETE /api/feedbacks/:id
     */
    router.delete('/:id', async (req: Request, res: Response) => {
        try {
            const id = idSchema.parse(req.params.id);
            res.json(await feedbacksService.deleteFeedback(id));
        } catch (error: unknown) {
            handleRouteError(error, res, logger, 'Feedback deletion failed');
        }
    });

    return router;
}
