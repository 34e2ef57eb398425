import express, { NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import { Settings, maxUploadBytes } from "../config/settings";
import { fileTooLarge } from "../services/storage.service";
import { MultipartCapture, UploadRequestView } from "../services/upload-dispatcher.service";
import { UploadedPart } from "../types/upload";

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace Express {
        interface Request {
            multipartCapture?: MultipartCapture;
        }
    }
}

// Room for part headers and text fields next to a file at the limit
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

/**
 * Multipart capture middleware.
 *
 * Runs multer (memory storage) over the request while keeping a copy of
 * the raw bytes, so the dispatcher can fall back to the manual parser when
 * multer fails. A multer parse error never fails the request here; it is
 * recorded on `req.multipartCapture` instead.
 *
 * A file over the upload ceiling is a 413. The raw copy stops growing once
 * it passes the ceiling plus header overhead; past that point there is no
 * fallback, so a multer failure becomes a 413 as well.
 */
export function createMultipartCapture(settings: Pick<Settings, 'maxUploadMb'>): RequestHandler {
    const maxBytes = maxUploadBytes(settings);
    const rawLimit = maxBytes + MULTIPART_OVERHEAD_BYTES;
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: maxBytes,
            fieldSize: maxBytes
        }
    }).any();

    return (req: Request, res: Response, next: NextFunction) => {
        if (!req.is('multipart/form-data')) {
            next();
            return;
        }

        let chunks: Buffer[] = [];
        let capturedBytes = 0;
        let overflowed = false;

        const bodyRead = new Promise<void>((resolve, reject) => {
            req.on('data', (chunk: Buffer) => {
                if (overflowed) {
                    return;
                }
                capturedBytes += chunk.length;
                if (capturedBytes > rawLimit) {
                    overflowed = true;
                    chunks = [];
                    return;
                }
                chunks.push(chunk);
            });
            req.on('end', () => resolve());
            req.on('error', reject);
        });

        upload(req, res, (error?: unknown) => {
            const structuredError = error === undefined || error === null
                ? null
                : error instanceof Error ? error : new Error(String(error));
            const fileOverLimit = error instanceof multer.MulterError && error.code === 'LIMIT_FILE_SIZE';

            // Wait for the whole body so the 413 is not sent mid-upload
            bodyRead.then(() => {
                if (fileOverLimit || (overflowed && structuredError)) {
                    next(fileTooLarge(settings));
                    return;
                }
                req.multipartCapture = {
                    rawBody: overflowed ? Buffer.alloc(0) : Buffer.concat(chunks),
                    structuredError
                };
                next();
            }, next);
        });
    };
}

/**
 * Keeps bodies of types no other parser handles as a Buffer, for the
 * url-encoded fallback strategy.
 */
export function createRawBody(settings: Pick<Settings, 'maxUploadMb'>): RequestHandler {
    return express.raw({
        type: (req) => !String(req.headers['content-type'] ?? '').toLowerCase().includes('multipart/'),
        limit: maxUploadBytes(settings)
    });
}

function multerFiles(req: Request): UploadedPart[] {
    const files = req.files;
    if (!files) {
        return [];
    }
    const list = Array.isArray(files) ? files : Object.values(files).flat();
    return list.map(file => ({
        fieldName: file.fieldname,
        originalName: file.originalname,
        mimeType: file.mimetype || null,
        buffer: file.buffer
    }));
}

function hasNoBody(req: Request): boolean {
    return req.headers['transfer-encoding'] === undefined
        && Number(req.headers['content-length'] ?? '0') === 0;
}

export function toUploadRequestView(req: Request): UploadRequestView {
    const structuredFailed = req.multipartCapture?.structuredError != null;
    return {
        contentType: req.headers['content-type'] ?? '',
        body: req.body,
        files: structuredFailed ? [] : multerFiles(req),
        multipart: req.multipartCapture ?? null,
        emptyBody: hasNoBody(req)
    };
}
