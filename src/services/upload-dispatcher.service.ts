import { ILogger } from '../config/logger';
import { HttpError } from '../utils/http-error';
import { parseMultipartBody } from '../utils/multipart.util';
import {
    appendField,
    FieldSet,
    isUploadedPart,
    UploadedPart,
    UploadFields,
    UploadIntent
} from '../types/upload';

/**
 * What the multipart capture middleware recorded for a request: the raw
 * bytes, and the structured parser's failure if it had one.
 */
export interface MultipartCapture {
    rawBody: Buffer;
    structuredError: Error | null;
}

/**
 * Framework-independent view of an upload request.
 */
export interface UploadRequestView {
    contentType: string;
    body: unknown;
    files: UploadedPart[];
    multipart: MultipartCapture | null;
    /** The request declared no body bytes at all */
    emptyBody: boolean;
}

export interface ParseStrategy {
    readonly name: string;
    parse(request: UploadRequestView): FieldSet | null;
}

// Historical names clients have used for each logical field
export const FIELD_ALIASES = {
    projectData: ['projectData', 'project_data'],
    type: ['type'],
    projectId: ['project_id', 'projectId'],
    pageUrl: ['page_url', 'pageUrl'],
    originalUrl: ['original_url', 'originalUrl'],
    filename: ['filename'],
    file: ['file']
} as const;

export const USER_FILE_FIELDS = ['files', 'files[]'] as const;

function isMultipart(contentType: string): boolean {
    return contentType.toLowerCase().includes('multipart/form-data');
}

function isJson(contentType: string): boolean {
    return contentType.toLowerCase().includes('application/json');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

function appendScalar(fields: FieldSet, name: string, value: unknown): void {
    if (typeof value === 'string') {
        appendField(fields, name, value);
    } else if (typeof value === 'number' || typeof value === 'boolean') {
        appendField(fields, name, String(value));
    } else if (Array.isArray(value)) {
        for (const item of value) {
            if (typeof item === 'string') {
                appendField(fields, name, item);
            }
        }
    }
}

/**
 * Fields and files produced by multer, used when multer succeeded and
 * found anything at all.
 */
export const multipartFormStrategy: ParseStrategy = {
    name: 'multipart-form',
    parse(request) {
        if (!isMultipart(request.contentType) || !request.multipart || request.multipart.structuredError) {
            return null;
        }

        const fields: FieldSet = new Map();
        if (isPlainObject(request.body)) {
            for (const [name, value] of Object.entries(request.body)) {
                appendScalar(fields, name, value);
            }
        }
        for (const file of request.files) {
            appendField(fields, file.fieldName, file);
        }

        return fields.size > 0 ? fields : null;
    }
};

/**
 * Manual parse of the captured multipart bytes.
 */
export const multipartRawStrategy: ParseStrategy = {
    name: 'multipart-raw',
    parse(request) {
        if (!isMultipart(request.contentType) || !request.multipart || request.multipart.rawBody.length === 0) {
            return null;
        }
        const fields = parseMultipartBody(request.multipart.rawBody, request.contentType);
        return fields.size > 0 ? fields : null;
    }
};

/**
 * JSON bodies. A `projectData` key carries the metadata payload; without it
 * the whole body is the payload. Objects are re-serialized so every path
 * hands the same string form downstream.
 */
export const jsonStrategy: ParseStrategy = {
    name: 'json',
    parse(request) {
        if (!isJson(request.contentType)) {
            return null;
        }

        const body = request.body;
        if (!isPlainObject(body) && !Array.isArray(body)) {
            return null;
        }

        const fields: FieldSet = new Map();
        const payload = isPlainObject(body) && 'projectData' in body ? body.projectData : body;

        if (typeof payload === 'string') {
            appendField(fields, 'projectData', payload);
        } else if (typeof payload === 'object' && payload !== null) {
            appendField(fields, 'projectData', JSON.stringify(payload));
        }

        if (isPlainObject(body)) {
            for (const [name, value] of Object.entries(body)) {
                if (name !== 'projectData' && !Array.isArray(value)) {
                    appendScalar(fields, name, value);
                }
            }
        }

        return fields;
    }
};

/**
 * URL-encoded forms and anything else that is not JSON: best-effort
 * key/value decoding.
 */
export const urlEncodedStrategy: ParseStrategy = {
    name: 'url-encoded',
    parse(request) {
        if (isJson(request.contentType)) {
            return null;
        }

        const fields: FieldSet = new Map();
        const body = request.body;

        if (isPlainObject(body)) {
            for (const [name, value] of Object.entries(body)) {
                appendScalar(fields, name, value);
            }
            return fields;
        }

        let text: string | null = null;
        if (Buffer.isBuffer(body)) {
            text = body.toString('utf8');
        } else if (typeof body === 'string') {
            text = body;
        }
        if (text) {
            for (const [name, value] of new URLSearchParams(text)) {
                appendField(fields, name, value);
            }
        }

        return fields;
    }
};

export const DEFAULT_STRATEGIES: readonly ParseStrategy[] = [
    multipartFormStrategy,
    multipartRawStrategy,
    jsonStrategy,
    urlEncodedStrategy
];

export function firstText(fields: FieldSet, aliases: readonly string[]): string | null {
    for (const alias of aliases) {
        for (const value of fields.get(alias) ?? []) {
            if (typeof value === 'string' && value.length > 0) {
                return value;
            }
        }
    }
    return null;
}

export function firstFile(fields: FieldSet, aliases: readonly string[]): UploadedPart | null {
    for (const alias of aliases) {
        const file = (fields.get(alias) ?? []).find(isUploadedPart);
        if (file) {
            return file;
        }
    }
    return null;
}

export function collectFiles(fields: FieldSet, aliases: readonly string[]): UploadedPart[] {
    return aliases.flatMap(alias => (fields.get(alias) ?? []).filter(isUploadedPart));
}

export function extractUploadFields(fields: FieldSet): UploadFields {
    const type = firstText(fields, FIELD_ALIASES.type);
    return {
        projectData: firstText(fields, FIELD_ALIASES.projectData),
        type: type === null ? null : type.trim().toLowerCase(),
        projectId: firstText(fields, FIELD_ALIASES.projectId),
        pageUrl: firstText(fields, FIELD_ALIASES.pageUrl),
        originalUrl: firstText(fields, FIELD_ALIASES.originalUrl),
        filename: firstText(fields, FIELD_ALIASES.filename),
        file: firstFile(fields, FIELD_ALIASES.file)
    };
}

export function resolveIntent(fields: UploadFields): UploadIntent {
    if (fields.file !== null || fields.type === 'attachment') {
        return {
            mode: 'attachment',
            file: fields.file,
            projectId: fields.projectId,
            pageUrl: fields.pageUrl,
            originalUrl: fields.originalUrl,
            filename: fields.filename
        };
    }

    if (fields.projectData !== null && fields.projectData.length > 0) {
        return { mode: 'metadata', projectData: fields.projectData };
    }

    throw HttpError.badRequest('Invalid request: nothing to process');
}

export function hasUploadPayload(fields: FieldSet): boolean {
    return firstText(fields, FIELD_ALIASES.projectData) !== null || firstFile(fields, FIELD_ALIASES.file) !== null;
}

export function hasUserFiles(fields: FieldSet): boolean {
    return collectFiles(fields, USER_FILE_FIELDS).length > 0;
}

/**
 * Upload Dispatcher
 *
 * Runs the parsing strategies in order and returns the first field set the
 * caller can use. When none is usable, the first non-empty result is kept
 * so the caller can still report what was missing.
 */
export class UploadDispatcher {
    constructor(
        private logger: ILogger,
        private strategies: readonly ParseStrategy[] = DEFAULT_STRATEGIES
    ) { }

    resolveFields(request: UploadRequestView, isUsable: (fields: FieldSet) => boolean): FieldSet {
        if (request.multipart?.structuredError) {
            this.logger.warn({
                error: request.multipart.structuredError.message
            }, 'Structured multipart parse failed, falling back to manual parse');
        }

        let fallback: FieldSet | null = null;

        for (const strategy of this.strategies) {
            const fields = strategy.parse(request);
            if (!fields) {
                continue;
            }
            if (isUsable(fields)) {
                this.logger.debug({ strategy: strategy.name, fields: [...fields.keys()] }, 'Upload fields resolved');
                return fields;
            }
            fallback ??= fields;
        }

        return fallback ?? new Map();
    }

    /**
     * Resolves the intent of a metadata-or-attachment upload.
     */
    dispatch(request: UploadRequestView): UploadIntent {
        // An empty body would otherwise parse to `{}` and pass as metadata
        if (request.emptyBody && isJson(request.contentType)) {
            throw HttpError.unprocessable('Invalid JSON in request body');
        }
        const fields = this.resolveFields(request, hasUploadPayload);
        return resolveIntent(extractUploadFields(fields));
    }

    /**
     * Returns every file sent under `files` or `files[]`.
     */
    userFiles(request: UploadRequestView): UploadedPart[] {
        const fields = this.resolveFields(request, hasUserFiles);
        return collectFiles(fields, USER_FILE_FIELDS);
    }
}
