import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FeedbacksService } from '../../../src/services/feedbacks.service';
import { HttpError } from '../../../src/utils/http-error';
import { InMemoryDatabase } from '../../support/in-memory-database';
import { createMockLogger } from '../../support/helpers';

describe('Feedbacks Service - Unit Tests', () => {
    let db: InMemoryDatabase;
    let service: FeedbacksService;
    let orderId: number;
    let userId: string;

    beforeEach(async () => {
        db = new InMemoryDatabase();
        service = new FeedbacksService(db, createMockLogger());

        const order = await db.orders.insert({
            external_id: 100,
            link: 'https://www.fl.ru/projects/100/task.html',
            title: 'Task',
            summary: null,
            pub_date: null,
            rss_raw: {},
            enriched_json: {}
        });
        const user = await db.users.insert({ competencies_text: null, categories: null, meta: null });
        orderId = order.id;
        userId = user.uid;
    });

    describe('createFeedback', () => {
        it('should create a pending feedback', async () => {
            const feedback = await service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'I can do it' });

            expect(feedback).toMatchObject({
                order_id: orderId,
                user_id: userId,
                feedback_text: 'I can do it',
                status: 'pending'
            });
        });

        it('should reject a second feedback from the same user', async () => {
            await service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'first' });

            await expect(service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'second' }))
                .rejects.toEqual(new HttpError(400, `User ${userId} already left feedback for order ${orderId}`));
        });

        it('should map a unique violation raised at insert time', async () => {
            await service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'first' });
            vi.spyOn(db.feedbacks, 'findByOrderAndUser').mockResolvedValue(null);

            await expect(service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'racing' }))
                .rejects.toEqual(new HttpError(400, `User ${userId} already left feedback for order ${orderId}`));
            expect(db.state.feedbacks).toHaveLength(1);
        });

        it('should throw 404 for an unknown order or user', async () => {
            await expect(service.createFeedback({ order_id: 999, user_id: userId, feedback_text: 'x' }))
                .rejects.toEqual(new HttpError(404, 'Order with id 999 not found'));

            const missing = '9f1c2d3e-4b5a-4c6d-8e7f-0a1b2c3d4e5f';
            await expect(service.createFeedback({ order_id: orderId, user_id: missing, feedback_text: 'x' }))
                .rejects.toEqual(new HttpError(404, `User with id ${missing} not found`));
        });
    });

    describe('listing', () => {
        it('should list an order\'s feedbacks newest first with paging', async () => {
            const other = await db.users.insert({ competencies_text: null, categories: null, meta: null });
            await service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'older' });
            await service.createFeedback({ order_id: orderId, user_id: other.uid, feedback_text: 'newer' });

            const all = await service.listForOrder(orderId, { limit: 50, offset: 0 });
            const second = await service.listForOrder(orderId, { limit: 1, offset: 1 });

            expect(all.items.map(f => f.feedback_text)).toEqual(['newer', 'older']);
            expect(second).toMatchObject({ limit: 1, offset: 1 });
            expect(second.items.map(f => f.feedback_text)).toEqual(['older']);
        });

        it('should list a user\'s feedbacks', async () => {
            await service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'mine' });

            const result = await service.listForUser(userId, { limit: 50, offset: 0 });

            expect(result.items.map(f => f.order_id)).toEqual([orderId]);
        });

        it('should throw 404 when listing for an unknown order', async () => {
            await expect(service.listForOrder(999, { limit: 50, offset: 0 }))
                .rejects.toEqual(new HttpError(404, 'Order with id 999 not found'));
        });
    });

    describe('updateStatus', () => {
        it('should change the status', async () => {
            const feedback = await service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'x' });

            const updated = await service.updateStatus(feedback.id, 'accepted');

            expect(updated.status).toBe('accepted');
        });

        it('should reject an unknown status', async () => {
            const feedback = await service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'x' });

            await expect(service.updateStatus(feedback.id, 'done'))
                .rejects.toEqual(new HttpError(400, 'Invalid status: done. Must be one of: pending, accepted, rejected'));
        });

        it('should throw 404 for an unknown feedback', async () => {
            await expect(service.updateStatus(77, 'rejected'))
                .rejects.toEqual(new HttpError(404, 'Feedback with id 77 not found'));
        });
    });

    describe('deleteFeedback', () => {
        it('should delete and confirm', async () => {
            const feedback = await service.createFeedback({ order_id: orderId, user_id: userId, feedback_text: 'x' });

            const result = await service.deleteFeedback(feedback.id);

            expect(result).toEqual({ status: 'success', message: `Feedback ${feedback.id} deleted` });
            expect(await db.feedbacks.findById(feedback.id)).toBeNull();
        });

        it('should throw 404 for an unknown feedback', async () => {
            await expect(service.deleteFeedback(77)).rejects.toEqual(new HttpError(404, 'Feedback with id 77 not found'));
        });
    });
});
