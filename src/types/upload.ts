/**
 * A file received in a request, whichever parser produced it.
 */
export interface UploadedPart {
    fieldName: string;
    originalName: string;
    mimeType: string | null;
    buffer: Buffer;
}

export type FieldValue = string | UploadedPart;

/**
 * Raw request fields keyed by the name the client used. A name may repeat,
 * so every key holds a list in arrival order.
 */
export type FieldSet = Map<string, FieldValue[]>;

export function isUploadedPart(value: FieldValue): value is UploadedPart {
    return typeof value !== 'string';
}

export function appendField(fields: FieldSet, name: string, value: FieldValue): void {
    const existing = fields.get(name);
    if (existing) {
        existing.push(value);
    } else {
        fields.set(name, [value]);
    }
}

/**
 * Canonical upload fields after alias resolution.
 */
export interface UploadFields {
    projectData: string | null;
    type: string | null;
    projectId: string | null;
    pageUrl: string | null;
    originalUrl: string | null;
    filename: string | null;
    file: UploadedPart | null;
}

export type UploadIntent =
    | { mode: 'metadata'; projectData: string }
    | {
        mode: 'attachment';
        file: UploadedPart | null;
        projectId: string | null;
        pageUrl: string | null;
        originalUrl: string | null;
        filename: string | null;
    };
