import { z } from 'zod';
import { ILogger } from '../config/logger';
import { IDatabase, UserChanges } from '../db/interfaces';
import { JsonObject } from '../types/json';
import { UserAttachmentRecord, UserWithAttachments } from '../types/records';
import { UploadedPart } from '../types/upload';
import { HttpError } from '../utils/http-error';
import { IStorageService, StoredFile, userSegment } from './storage.service';

const uidSchema = z.string().uuid();

export interface UserPatch {
    competencies_text?: string | null;
    categories?: string[] | null;
}

/**
 * Validates a user id taken from the URL.
 */
export function parseUid(value: string): string {
    const parsed = uidSchema.safeParse(value);
    if (!parsed.success) {
        throw HttpError.badRequest('Invalid user id');
    }
    return parsed.data.toLowerCase();
}

/**
 * Lower-cases and trims categories, dropping blanks and repeats while
 * keeping the first-seen order.
 */
export function normalizeCategories(categories: readonly string[] | null): string[] | null {
    if (categories === null) {
        return null;
    }
    const seen = new Set<string>();
    const normalized: string[] = [];
    for (const item of categories) {
        const value = item.trim().toLowerCase();
        if (value && !seen.has(value)) {
            seen.add(value);
            normalized.push(value);
        }
    }
    return normalized;
}

/**
 * Users Service
 *
 * Profile CRUD and portfolio uploads. Files go through the same storage
 * rules as order attachments, under `user_<uid>`.
 */
export class UsersService {
    constructor(
        private database: IDatabase,
        private storage: IStorageService,
        private logger: ILogger
    ) { }

    async createUser(meta: JsonObject | null = null): Promise<{ uid: string }> {
        const user = await this.database.users.insert({
            competencies_text: null,
            categories: null,
            meta
        });
        this.logger.info({ userUid: user.uid }, 'Created user');
        return { uid: user.uid };
    }

    async getUser(uid: string): Promise<UserWithAttachments> {
        const user = await this.database.users.findWithAttachments(uid);
        if (!user) {
            throw HttpError.notFound('User not found');
        }
        return {
            ...user,
            attachments: [...user.attachments].sort((a, b) => a.created_at.getTime() - b.created_at.getTime())
        };
    }

    /**
     * Applies only the keys present in the patch.
     */
    async updateUser(uid: string, patch: UserPatch): Promise<UserWithAttachments> {
        const existing = await this.database.users.findByUid(uid);
        if (!existing) {
            throw HttpError.notFound('User not found');
        }

        const changes: UserChanges = {};
        if (patch.competencies_text !== undefined) {
            changes.competencies_text = patch.competencies_text;
        }
        if (patch.categories !== undefined) {
            changes.categories = normalizeCategories(patch.categories);
        }

        await this.database.users.update(uid, changes);
        this.logger.info({ userUid: uid, fields: Object.keys(changes) }, 'Updated user');

        return this.getUser(uid);
    }

    /**
     * Stores every file and records it against the user. Either all files
     * are kept or none are.
     */
    async addUserAttachments(uid: string, files: readonly UploadedPart[]): Promise<UserAttachmentRecord[]> {
        if (files.length === 0) {
            throw HttpError.badRequest('No files uploaded');
        }

        const storedFiles: StoredFile[] = [];

        try {
            const attachments = await this.database.transaction(async ({ users, userAttachments }) => {
                const user = await users.findByUid(uid);
                if (!user) {
                    throw HttpError.notFound('User not found');
                }

                const created: UserAttachmentRecord[] = [];
                for (const file of files) {
                    const stored = await this.storage.saveStream([file.buffer], {
                        segment: userSegment(uid),
                        filename: file.originalName || 'file',
                        contentType: file.mimeType
                    });
                    storedFiles.push(stored);

                    created.push(await userAttachments.insert({
                        user_uid: uid,
                        filename: stored.filename,
                        stored_path: stored.storedPath,
                        size: stored.sizeBytes,
                        sha256: stored.sha256,
                        content_type: stored.contentType,
                        meta: null
                    }));
                }
                return created;
            });

            this.logger.info({ userUid: uid, count: attachments.length }, 'Added user attachments');
            return attachments;

        } catch (error: unknown) {
            for (const stored of storedFiles) {
                await this.storage.remove(stored.storedPath);
            }
            throw error;
        }
    }
}
