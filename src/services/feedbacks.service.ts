import { ILogger } from '../config/logger';
import { DuplicateRecordError, IDatabase, Page } from '../db/interfaces';
import { FEEDBACK_STATUSES, FeedbackStatus, OrderFeedbackRecord } from '../types/records';
import { HttpError } from '../utils/http-error';

export interface FeedbackCreate {
    order_id: number;
    user_id: string;
    feedback_text: string;
}

export interface FeedbackList extends Page {
    items: OrderFeedbackRecord[];
}

export function isFeedbackStatus(value: string): value is FeedbackStatus {
    return FEEDBACK_STATUSES.some(status => status === value);
}

function duplicateFeedback(userId: string, orderId: number): HttpError {
    return HttpError.badRequest(`User ${userId} already left feedback for order ${orderId}`);
}

/**
 * Feedbacks Service
 *
 * Freelancer responses to orders. A user can answer an order once; the
 * check before insert covers the common case and the unique constraint
 * covers concurrent requests.
 */
export class FeedbacksService {
    constructor(
        private database: IDatabase,
        private logger: ILogger
    ) { }

    async createFeedback(input: FeedbackCreate): Promise<OrderFeedbackRecord> {
        const { orders, users, feedbacks } = this.database;

        if (!await orders.findById(input.order_id)) {
            throw HttpError.notFound(`Order with id ${input.order_id} not found`);
        }
        if (!await users.findByUid(input.user_id)) {
            throw HttpError.notFound(`User with id ${input.user_id} not found`);
        }
        if (await feedbacks.findByOrderAndUser(input.order_id, input.user_id)) {
            throw duplicateFeedback(input.user_id, input.order_id);
        }

        let feedback: OrderFeedbackRecord;
        try {
            feedback = await feedbacks.insert({
                order_id: input.order_id,
                user_id: input.user_id,
                feedback_text: input.feedback_text,
                status: 'pending'
            });
        } catch (error: unknown) {
            if (error instanceof DuplicateRecordError) {
                throw duplicateFeedback(input.user_id, input.order_id);
            }
            throw error;
        }

        this.logger.info({
            feedbackId: feedback.id,
            orderId: feedback.order_id,
            userId: feedback.user_id
        }, 'Feedback created');

        return feedback;
    }

    async listForOrder(orderId: number, page: Page): Promise<FeedbackList> {
        if (!await this.database.orders.findById(orderId)) {
            throw HttpError.notFound(`Order with id ${orderId} not found`);
        }
        const items = await this.database.feedbacks.listByOrder(orderId, page);
        return { items, limit: page.limit, offset: page.offset };
    }

    async listForUser(userId: string, page: Page): Promise<FeedbackList> {
        if (!await this.database.users.findByUid(userId)) {
            throw HttpError.notFound(`User with id ${userId} not found`);
        }
        const items = await this.database.feedbacks.listByUser(userId, page);
        return { items, limit: page.limit, offset: page.offset };
    }

    async updateStatus(id: number, status: string): Promise<OrderFeedbackRecord> {
        if (!isFeedbackStatus(status)) {
            throw HttpError.badRequest(
                `Invalid status: ${status}. Must be one of: ${FEEDBACK_STATUSES.join(', ')}`
            );
        }
        if (!await this.database.feedbacks.findById(id)) {
            throw HttpError.notFound(`Feedback with id ${id} not found`);
        }

        const feedback = await this.database.feedbacks.updateStatus(id, status);
        this.logger.info({ feedbackId: id, newStatus: status }, 'Feedback status updated');
        return feedback;
    }

    async deleteFeedback(id: number): Promise<{ status: 'success'; message: string }> {
        if (!await this.database.feedbacks.findById(id)) {
            throw HttpError.notFound(`Feedback with id ${id} not found`);
        }
        await this.database.feedbacks.delete(id);
        this.logger.info({ feedbackId: id }, 'Feedback deleted');
        return { status: 'success', message: `Feedback ${id} deleted` };
    }
}
