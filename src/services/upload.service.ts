import { ILogger } from '../config/logger';
import { IDatabase } from '../db/interfaces';
import { isJsonObject, JsonObject, jsonValueSchema } from '../types/json';
import { UploadedPart, UploadIntent } from '../types/upload';
import { HttpError } from '../utils/http-error';
import { extractExternalId, parseProjectId } from '../utils/parsing.util';
import { OrdersService } from './orders.service';
import { IStorageService, projectSegment, StoredFile } from './storage.service';

export interface MetadataUploadResult {
    status: 'success';
    mode: 'metadata';
    order: {
        external_id: number | null;
        id: number;
        link: string;
    };
}

export interface AttachmentUploadResult {
    status: 'success';
    mode: 'attachment';
    file: {
        filename: string;
        size_bytes: number;
        sha256: string | null;
    };
    order: {
        external_id: number | null;
        id: number;
    };
}

export type UploadResult = MetadataUploadResult | AttachmentUploadResult;

export interface AttachmentInput {
    file: UploadedPart | null;
    projectId: string | null;
    pageUrl: string | null;
    originalUrl: string | null;
    filename: string | null;
}

function textValue(value: JsonObject[string] | undefined): string | null {
    return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Parses the metadata payload into a JSON object.
 */
export function parseProjectData(raw: string): JsonObject {
    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch {
        throw HttpError.unprocessable('Invalid JSON in projectData');
    }

    const parsed = jsonValueSchema.safeParse(decoded);
    if (!parsed.success || !isJsonObject(parsed.data)) {
        throw HttpError.unprocessable('projectData must be a JSON object');
    }
    return parsed.data;
}

/**
 * Upload Service
 *
 * Executes a resolved upload intent: metadata is deep-merged into the
 * order's enrichment, attachments are stored on disk and recorded against
 * the order. Each upload runs in a single transaction.
 */
export class UploadService {
    constructor(
        private database: IDatabase,
        private ordersService: OrdersService,
        private storage: IStorageService,
        private logger: ILogger
    ) { }

    async handle(intent: UploadIntent): Promise<UploadResult> {
        if (intent.mode === 'metadata') {
            return this.handleMetadata(intent.projectData);
        }
        return this.handleAttachment(intent);
    }

    async handleMetadata(projectDataRaw: string): Promise<MetadataUploadResult> {
        const projectData = parseProjectData(projectDataRaw);
        const url = textValue(projectData.url);
        const externalId = parseProjectId(projectData.id) ?? extractExternalId(url);

        const order = await this.database.transaction(async ({ orders }) => {
            const existing = await this.ordersService.ensureOrder(orders, {
                externalId,
                link: url,
                title: textValue(projectData.title),
                summary: textValue(projectData.summary)
            });
            return this.ordersService.mergeEnrichment(orders, existing, projectData);
        });

        this.logger.info({ externalId: order.external_id, orderId: order.id }, 'Metadata uploaded');

        return {
            status: 'success',
            mode: 'metadata',
            order: {
                external_id: order.external_id,
                id: order.id,
                link: order.link
            }
        };
    }

    async handleAttachment(input: AttachmentInput): Promise<AttachmentUploadResult> {
        const file = input.file;
        if (!file) {
            throw HttpError.badRequest('Attachment file is required');
        }

        const externalId = parseProjectId(input.projectId)
            ?? extractExternalId(input.pageUrl)
            ?? extractExternalId(input.originalUrl);
        const link = input.pageUrl || input.originalUrl;

        const storedFiles: StoredFile[] = [];

        try {
            const { order, attachment } = await this.database.transaction(async ({ orders, attachments }) => {
                const order = await this.ordersService.ensureOrder(orders, {
                    externalId,
                    link,
                    title: '',
                    summary: null
                });

                const stored = await this.storage.saveStream([file.buffer], {
                    segment: projectSegment(order.external_id),
                    filename: input.filename || file.originalName || 'file',
                    contentType: file.mimeType
                });
                storedFiles.push(stored);

                const attachment = await attachments.insert({
                    order_id: order.id,
                    filename: stored.filename,
                    stored_path: stored.storedPath,
                    size_bytes: stored.sizeBytes,
                    mime_type: stored.contentType,
                    original_url: input.originalUrl,
                    page_url: input.pageUrl,
                    sha256: stored.sha256
                });

                return { order, attachment };
            });

            this.logger.info({
                attachmentId: attachment.id,
                orderId: order.id,
                externalId: order.external_id
            }, 'Attachment uploaded');

            return {
                status: 'success',
                mode: 'attachment',
                file: {
                    filename: attachment.filename,
                    size_bytes: attachment.size_bytes,
                    sha256: attachment.sha256
                },
                order: {
                    external_id: order.external_id,
                    id: order.id
                }
            };

        } catch (error: unknown) {
            // The transaction rolled back; the file on disk has to go too
            for (const stored of storedFiles) {
                await this.storage.remove(stored.storedPath);
            }
            throw error;
        }
    }
}
