import { appendField, FieldSet } from "../types/upload";

const CRLF = Buffer.from('\r\n');
const HEADER_END = Buffer.from('\r\n\r\n');

interface PartHeaders {
    disposition: string | null;
    name: string | null;
    filename: string | null;
    contentType: string | null;
    charset: string | null;
    transferEncoding: string | null;
}

/**
 * Reads a header parameter such as `name="file"` or `filename*=UTF-8''na%C3%AFve.txt`.
 */
function headerParam(header: string, param: string): string | null {
    const extended = new RegExp(`(?:^|;)\\s*${param}\\*\\s*=\\s*([^']*)'[^']*'([^;]*)`, 'i').exec(header);
    if (extended) {
        try {
            return decodeURIComponent(extended[2].trim());
        } catch {
            return extended[2].trim();
        }
    }

    const quoted = new RegExp(`(?:^|;)\\s*${param}\\s*=\\s*"((?:[^"\\\\]|\\\\.)*)"`, 'i').exec(header);
    if (quoted) {
        return quoted[1].replace(/\\(.)/g, '$1');
    }

    const bare = new RegExp(`(?:^|;)\\s*${param}\\s*=\\s*([^;\\s]+)`, 'i').exec(header);
    return bare ? bare[1] : null;
}

export function extractBoundary(contentType: string): string | null {
    const boundary = headerParam(contentType, 'boundary');
    return boundary && boundary.length > 0 ? boundary : null;
}

function parsePartHeaders(raw: string): PartHeaders {
    const headers: PartHeaders = {
        disposition: null,
        name: null,
        filename: null,
        contentType: null,
        charset: null,
        transferEncoding: null
    };

    for (const line of raw.split('\r\n')) {
        const separator = line.indexOf(':');
        if (separator <= 0) {
            continue;
        }
        const key = line.slice(0, separator).trim().toLowerCase();
        const value = line.slice(separator + 1).trim();

        if (key === 'content-disposition') {
            headers.disposition = value.split(';')[0].trim().toLowerCase();
            headers.name = headerParam(value, 'name');
            headers.filename = headerParam(value, 'filename');
        } else if (key === 'content-type') {
            headers.contentType = value.split(';')[0].trim().toLowerCase() || null;
            headers.charset = headerParam(value, 'charset');
        } else if (key === 'content-transfer-encoding') {
            headers.transferEncoding = value.toLowerCase();
        }
    }

    return headers;
}

function decodeText(payload: Buffer, charset: string | null): string {
    try {
        return new TextDecoder(charset ?? 'utf-8').decode(payload);
    } catch {
        // Unknown charset label
        return new TextDecoder('utf-8').decode(payload);
    }
}

function decodePayload(payload: Buffer, transferEncoding: string | null): Buffer {
    if (transferEncoding === 'base64') {
        return Buffer.from(payload.toString('ascii').replace(/\s+/g, ''), 'base64');
    }
    return payload;
}

/**
 * Parses a multipart/form-data body without a streaming parser.
 *
 * Used when the structured parser rejected the request or produced nothing.
 * Splits on the declared boundary and rebuilds every `form-data` part: parts
 * with a filename become files, the rest text fields. A missing closing
 * boundary is tolerated; the last part then runs to the end of the body.
 */
export function parseMultipartBody(body: Buffer, contentType: string): FieldSet {
    const fields: FieldSet = new Map();
    const boundary = extractBoundary(contentType);
    if (!boundary || body.length === 0) {
        return fields;
    }

    const delimiter = Buffer.from(`--${boundary}`);
    let cursor = body.indexOf(delimiter);

    while (cursor !== -1) {
        let partStart = cursor + delimiter.length;

        // Closing delimiter
        if (body[partStart] === 0x2d && body[partStart + 1] === 0x2d) {
            break;
        }
        if (body.subarray(partStart, partStart + CRLF.length).equals(CRLF)) {
            partStart += CRLF.length;
        }

        const next = body.indexOf(delimiter, partStart);
        let partEnd = next === -1 ? body.length : next;
        if (partEnd - CRLF.length >= partStart && body.subarray(partEnd - CRLF.length, partEnd).equals(CRLF)) {
            partEnd -= CRLF.length;
        }

        const part = body.subarray(partStart, partEnd);
        const headerEnd = part.indexOf(HEADER_END);
        if (headerEnd !== -1) {
            const headers = parsePartHeaders(part.subarray(0, headerEnd).toString('utf8'));
            const payload = decodePayload(part.subarray(headerEnd + HEADER_END.length), headers.transferEncoding);

            if (headers.disposition === 'form-data' && headers.name) {
                if (headers.filename) {
                    appendField(fields, headers.name, {
                        fieldName: headers.name,
                        originalName: headers.filename,
                        mimeType: headers.contentType ?? 'application/octet-stream',
                        buffer: Buffer.from(payload)
                    });
                } else {
                    appendField(fields, headers.name, decodeText(payload, headers.charset));
                }
            }
        }

        cursor = next;
    }

    return fields;
}
