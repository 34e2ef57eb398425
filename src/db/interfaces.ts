import {
    AttachmentRecord,
    FeedbackStatus,
    NewAttachment,
    NewOrder,
    NewOrderFeedback,
    NewUser,
    NewUserAttachment,
    OrderFeedbackRecord,
    OrderRecord,
    OrderWithAttachments,
    UserAttachmentRecord,
    UserRecord,
    UserWithAttachments
} from "../types/records";

/**
 * Database Interfaces
 *
 * Contracts the services use to reach the relational store. The TypeORM
 * implementation lives in `typeorm-database.ts`; tests use an in-memory one.
 */

export interface Page {
    limit: number;
    offset: number;
}

export interface OrderListQuery extends Page {
    q?: string | null;
    hasAttachments?: boolean | null;
}

export type OrderChanges = Partial<Omit<OrderRecord, 'id' | 'created_at' | 'updated_at'>>;
export type UserChanges = Partial<Pick<UserRecord, 'competencies_text' | 'categories' | 'meta'>>;

export interface IOrderRepository {
    findById(id: number): Promise<OrderRecord | null>;
    findByExternalId(externalId: number): Promise<OrderRecord | null>;
    findByLink(link: string): Promise<OrderRecord | null>;
    insert(order: NewOrder): Promise<OrderRecord>;
    /** Applies the changes and bumps `updated_at` */
    update(id: number, changes: OrderChanges): Promise<OrderRecord>;
    findWithAttachments(externalId: number): Promise<OrderWithAttachments | null>;
    /** Newest `updated_at` first */
    list(query: OrderListQuery): Promise<OrderWithAttachments[]>;
}

export interface IAttachmentRepository {
    insert(attachment: NewAttachment): Promise<AttachmentRecord>;
}

export interface IUserRepository {
    findByUid(uid: string): Promise<UserRecord | null>;
    insert(user: Omit<NewUser, 'uid'>): Promise<UserRecord>;
    update(uid: string, changes: UserChanges): Promise<UserRecord>;
    /** Attachments ordered by `created_at` ascending */
    findWithAttachments(uid: string): Promise<UserWithAttachments | null>;
}

export interface IUserAttachmentRepository {
    insert(attachment: NewUserAttachment): Promise<UserAttachmentRecord>;
}

export interface IFeedbackRepository {
    findById(id: number): Promise<OrderFeedbackRecord | null>;
    findByOrderAndUser(orderId: number, userId: string): Promise<OrderFeedbackRecord | null>;
    /** Throws DuplicateRecordError when the (order, user) pair already exists */
    insert(feedback: NewOrderFeedback): Promise<OrderFeedbackRecord>;
    /** Newest first */
    listByOrder(orderId: number, page: Page): Promise<OrderFeedbackRecord[]>;
    /** Newest first */
    listByUser(userId: string, page: Page): Promise<OrderFeedbackRecord[]>;
    updateStatus(id: number, status: FeedbackStatus): Promise<OrderFeedbackRecord>;
    delete(id: number): Promise<void>;
}

export interface Stores {
    orders: IOrderRepository;
    attachments: IAttachmentRepository;
    users: IUserRepository;
    userAttachments: IUserAttachmentRepository;
    feedbacks: IFeedbackRepository;
}

export interface IDatabase extends Stores {
    /**
     * Runs the work in one transaction. Everything written through the
     * given stores is committed when the work resolves and rolled back when
     * it throws.
     */
    transaction<T>(work: (stores: Stores) => Promise<T>): Promise<T>;
}

/**
 * Raised by a store when an insert violates a uniqueness constraint.
 */
export class DuplicateRecordError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DuplicateRecordError';
    }
}
