import type { JsonObject } from "./json";

/**
 * Persisted record shapes shared by the TypeORM entities and the services.
 *
 * Services only see these interfaces; the entities in `src/db/entities`
 * implement them, and the tests provide plain objects of the same shape.
 */

export interface OrderRecord {
    id: number;
    external_id: number | null;
    link: string;
    title: string;
    summary: string | null;
    pub_date: Date | null;
    rss_raw: JsonObject;
    enriched_json: JsonObject;
    created_at: Date;
    updated_at: Date;
}

export interface AttachmentRecord {
    id: number;
    order_id: number;
    filename: string;
    stored_path: string;
    size_bytes: number;
    mime_type: string | null;
    original_url: string | null;
    page_url: string | null;
    sha256: string | null;
    created_at: Date;
}

export interface OrderWithAttachments extends OrderRecord {
    attachments: AttachmentRecord[];
}

export interface UserRecord {
    uid: string;
    competencies_text: string | null;
    categories: string[] | null;
    meta: JsonObject | null;
    created_at: Date;
    updated_at: Date;
}

export interface UserAttachmentRecord {
    id: number;
    user_uid: string;
    filename: string;
    stored_path: string;
    size: number;
    sha256: string;
    content_type: string | null;
    meta: JsonObject | null;
    created_at: Date;
}

export interface UserWithAttachments extends UserRecord {
    attachments: UserAttachmentRecord[];
}

export const FEEDBACK_STATUSES = ['pending', 'accepted', 'rejected'] as const;
export type FeedbackStatus = typeof FEEDBACK_STATUSES[number];

export interface OrderFeedbackRecord {
    id: number;
    order_id: number;
    user_id: string;
    feedback_text: string;
    status: FeedbackStatus;
    created_at: Date;
    updated_at: Date;
}

// Insert payloads: generated columns are filled by the store
export type NewOrder = Omit<OrderRecord, 'id' | 'created_at' | 'updated_at'>;
export type NewAttachment = Omit<AttachmentRecord, 'id' | 'created_at'>;
export type NewUser = Omit<UserRecord, 'created_at' | 'updated_at'>;
export type NewUserAttachment = Omit<UserAttachmentRecord, 'id' | 'created_at'>;
export type NewOrderFeedback = Omit<OrderFeedbackRecord, 'id' | 'created_at' | 'updated_at'>;
