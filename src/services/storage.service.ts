import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { ILogger } from '../config/logger';
import { maxUploadBytes, Settings } from '../config/settings';
import { HttpError } from '../utils/http-error';

const CHUNK_SIZE = 1024 * 1024;
const DIRECTORY_MODE = 0o755;
const SAFE_CHARS_PATTERN = /[^A-Za-z0-9._-]+/g;

export interface StoredFile {
    filename: string;
    storedPath: string;
    sizeBytes: number;
    sha256: string;
    contentType: string | null;
}

export interface SaveOptions {
    /** Top-level directory under the upload root, e.g. `project_123` or `user_<uid>` */
    segment: string;
    filename: string;
    contentType?: string | null;
}

export type ByteSource = AsyncIterable<Uint8Array> | Iterable<Uint8Array>;

export interface IStorageService {
    saveStream(source: ByteSource, options: SaveOptions): Promise<StoredFile>;
    remove(storedPath: string): Promise<void>;
}

export function sanitizeFilename(name: string): string {
    const baseName = name.split(/[\\/]/).pop() ?? '';
    const sanitized = baseName.replace(SAFE_CHARS_PATTERN, '_');
    return sanitized === '' || sanitized === '.' || sanitized === '..' ? 'file' : sanitized;
}

export function fileTooLarge(settings: Pick<Settings, 'maxUploadMb'>): HttpError {
    return HttpError.payloadTooLarge(`Uploaded file exceeds allowed size (${settings.maxUploadMb}MB)`);
}

export function projectSegment(externalId: number | null): string {
    return externalId !== null ? `project_${externalId}` : 'project_unknown';
}

export function userSegment(uid: string): string {
    return `user_${uid}`;
}

function pad(value: number, width: number = 2): string {
    return String(value).padStart(width, '0');
}

function compactTimestamp(now: Date): string {
    return `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`
        + `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
}

export function collisionName(filename: string, now: Date = new Date()): string {
    const extension = path.extname(filename);
    const stem = filename.slice(0, filename.length - extension.length);
    const suffix = crypto.randomBytes(4).toString('hex');
    return `${stem}__${compactTimestamp(now)}_${suffix}${extension}`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Splits incoming chunks so no single write exceeds CHUNK_SIZE.
 */
async function* fixedChunks(source: ByteSource): AsyncGenerator<Uint8Array> {
    for await (const chunk of source) {
        for (let offset = 0; offset < chunk.length; offset += CHUNK_SIZE) {
            yield chunk.subarray(offset, offset + CHUNK_SIZE);
        }
    }
}

/**
 * Storage Service
 *
 * Persists uploaded bytes under `<upload_root>/<segment>/<YYYY>/<MM>/<DD>/`,
 * hashing and size-limiting while it writes. A failed save never leaves a
 * file behind.
 */
export class StorageService implements IStorageService {
    constructor(
        private settings: Pick<Settings, 'uploadDir' | 'maxUploadMb'>,
        private logger: ILogger,
        private clock: () => Date = () => new Date()
    ) { }

    private async ensureDirectory(directory: string): Promise<void> {
        await fs.promises.mkdir(directory, { recursive: true, mode: DIRECTORY_MODE });
        try {
            await fs.promises.chmod(directory, DIRECTORY_MODE);
        } catch (error: unknown) {
            // Mounted volumes may refuse chmod; the directory is still usable
            this.logger.debug({
                directory,
                error: error instanceof Error ? error.message : String(error)
            }, 'Could not adjust upload directory permissions');
        }
    }

    /**
     * Opens the target exclusively, renaming on collision.
     */
    private async openUnique(directory: string, filename: string, now: Date): Promise<{ handle: fs.promises.FileHandle; targetPath: string }> {
        let candidate = filename;
        for (let attempt = 0; attempt < 5; attempt++) {
            const targetPath = path.join(directory, candidate);
            try {
                const handle = await fs.promises.open(targetPath, 'wx');
                return { handle, targetPath };
            } catch (error: unknown) {
                if (!isErrnoException(error) || error.code !== 'EEXIST') {
                    throw error;
                }
                candidate = collisionName(filename, now);
            }
        }
        throw new Error(`Could not find a free name for ${filename}`);
    }

    async saveStream(source: ByteSource, options: SaveOptions): Promise<StoredFile> {
        const maxBytes = maxUploadBytes(this.settings);
        const filename = sanitizeFilename(options.filename);
        const now = this.clock();
        const directory = path.join(
            this.settings.uploadDir,
            options.segment,
            String(now.getUTCFullYear()).padStart(4, '0'),
            pad(now.getUTCMonth() + 1),
            pad(now.getUTCDate())
        );

        let targetPath: string | null = null;
        let handle: fs.promises.FileHandle | null = null;

        try {
            await this.ensureDirectory(directory);
            const opened = await this.openUnique(directory, filename, now);
            handle = opened.handle;
            targetPath = opened.targetPath;

            const hasher = crypto.createHash('sha256');
            let totalBytes = 0;

            for await (const chunk of fixedChunks(source)) {
                totalBytes += chunk.length;
                if (totalBytes > maxBytes) {
                    throw fileTooLarge(this.settings);
                }
                hasher.update(chunk);
                await handle.write(chunk);
            }

            if (totalBytes === 0) {
                throw HttpError.badRequest('Uploaded file is empty');
            }

            await handle.close();
            handle = null;

            const sha256 = hasher.digest('hex');
            const storedPath = path.resolve(targetPath);

            this.logger.info({
                segment: options.segment,
                path: storedPath,
                sizeBytes: totalBytes,
                sha256
            }, 'Saved upload');

            return {
                filename: path.basename(targetPath),
                storedPath,
                sizeBytes: totalBytes,
                sha256,
                contentType: options.contentType ?? null
            };

        } catch (error: unknown) {
            if (handle) {
                await handle.close().catch((closeError: unknown) => {
                    this.logger.warn({
                        error: closeError instanceof Error ? closeError.message : String(closeError)
                    }, 'Failed to close partial upload');
                });
            }
            if (targetPath) {
                await this.remove(targetPath);
            }

            if (error instanceof HttpError) {
                throw error;
            }

            this.logger.error({
                segment: options.segment,
                filename,
                error: error instanceof Error ? error.message : String(error)
            }, 'Failed to save upload');
            throw HttpError.internal(`Failed to save file: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    /**
     * Best-effort removal of a stored file.
     */
    async remove(storedPath: string): Promise<void> {
        try {
            await fs.promises.rm(storedPath, { force: true });
        } catch (error: unknown) {
            this.logger.warn({
                path: storedPath,
                error: error instanceof Error ? error.message : String(error)
            }, 'Failed to remove stored file');
        }
    }
}
