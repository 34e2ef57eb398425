import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    extractUploadFields,
    ParseStrategy,
    resolveIntent,
    UploadDispatcher,
    UploadRequestView
} from '../../../src/services/upload-dispatcher.service';
import { FieldSet, UploadedPart } from '../../../src/types/upload';
import { HttpError } from '../../../src/utils/http-error';
import { createMockLogger } from '../../support/helpers';

const BOUNDARY = 'DispatchBoundary';

function view(overrides: Partial<UploadRequestView>): UploadRequestView {
    return {
        contentType: '',
        body: {},
        files: [],
        multipart: null,
        emptyBody: false,
        ...overrides
    };
}

function part(fieldName: string, originalName: string, content: string): UploadedPart {
    return { fieldName, originalName, mimeType: 'text/plain', buffer: Buffer.from(content) };
}

describe('Upload Dispatcher - Strategy Chain Tests', () => {
    let logger: ReturnType<typeof createMockLogger>;
    let dispatcher: UploadDispatcher;

    beforeEach(() => {
        logger = createMockLogger();
        dispatcher = new UploadDispatcher(logger);
    });

    describe('JSON Bodies', () => {
        it('should re-serialize an object projectData', () => {
            const intent = dispatcher.dispatch(view({
                contentType: 'application/json',
                body: { projectData: { id: 987654, nested: { field: 'value' } } }
            }));

            expect(intent).toEqual({
                mode: 'metadata',
                projectData: '{"id":987654,"nested":{"field":"value"}}'
            });
        });

        it('should pass a string projectData through unchanged', () => {
            const intent = dispatcher.dispatch(view({
                contentType: 'application/json; charset=utf-8',
                body: { projectData: '{"id": 1}' }
            }));

            expect(intent).toEqual({ mode: 'metadata', projectData: '{"id": 1}' });
        });

        it('should treat the whole body as metadata without a projectData key', () => {
            const intent = dispatcher.dispatch(view({
                contentType: 'application/json',
                body: { id: 5, url: 'https://www.fl.ru/projects/5/x.html' }
            }));

            expect(intent).toEqual({
                mode: 'metadata',
                projectData: '{"id":5,"url":"https://www.fl.ru/projects/5/x.html"}'
            });
        });

        it('should reject an empty JSON body as invalid JSON', () => {
            expect(() => dispatcher.dispatch(view({
                contentType: 'application/json',
                body: {},
                emptyBody: true
            }))).toThrow(new HttpError(422, 'Invalid JSON in request body'));
        });

        it('should accept an explicit empty JSON object as metadata', () => {
            const intent = dispatcher.dispatch(view({ contentType: 'application/json', body: {} }));

            expect(intent).toEqual({ mode: 'metadata', projectData: '{}' });
        });

        it('should leave a scalar projectData unset', () => {
            expect(() => dispatcher.dispatch(view({
                contentType: 'application/json',
                body: { projectData: 5 }
            }))).toThrow(new HttpError(400, 'Invalid request: nothing to process'));
        });

        it('should read attachment fields from JSON and stringify numeric ids', () => {
            const intent = dispatcher.dispatch(view({
                contentType: 'application/json',
                body: { type: 'attachment', projectId: 77, pageUrl: 'https://www.fl.ru/projects/77/x.html' }
            }));

            expect(intent).toEqual({
                mode: 'attachment',
                file: null,
                projectId: '77',
                pageUrl: 'https://www.fl.ru/projects/77/x.html',
                originalUrl: null,
                filename: null
            });
        });
    });

    describe('Form Bodies', () => {
        it('should decode url-encoded fields with aliases', () => {
            const intent = dispatcher.dispatch(view({
                contentType: 'application/x-www-form-urlencoded',
                body: { project_data: '{"id":3}' }
            }));

            expect(intent).toEqual({ mode: 'metadata', projectData: '{"id":3}' });
        });

        it('should decode an unrecognized body as a query string', () => {
            const intent = dispatcher.dispatch(view({
                contentType: 'text/plain',
                body: Buffer.from('projectData=%7B%22id%22%3A9%7D')
            }));

            expect(intent).toEqual({ mode: 'metadata', projectData: '{"id":9}' });
        });

        it('should resolve attachment intent from the type field alone', () => {
            const intent = dispatcher.dispatch(view({
                contentType: 'application/x-www-form-urlencoded',
                body: { type: ' Attachment ', project_id: '12' }
            }));

            expect(intent.mode).toBe('attachment');
        });

        it('should reject a request with nothing to process', () => {
            expect(() => dispatcher.dispatch(view({ contentType: 'text/plain', body: {} })))
                .toThrow(new HttpError(400, 'Invalid request: nothing to process'));
        });
    });

    describe('Multipart Bodies', () => {
        it('should use the structured parser result when it succeeded', () => {
            const file = part('file', 'brief.txt', 'hello');
            const intent = dispatcher.dispatch(view({
                contentType: `multipart/form-data; boundary=${BOUNDARY}`,
                body: { project_id: '4242', page_url: 'https://www.fl.ru/projects/4242/x.html' },
                files: [file],
                multipart: { rawBody: Buffer.alloc(0), structuredError: null }
            }));

            expect(intent).toEqual({
                mode: 'attachment',
                file,
                projectId: '4242',
                pageUrl: 'https://www.fl.ru/projects/4242/x.html',
                originalUrl: null,
                filename: null
            });
        });

        it('should fall back to the manual parser when the structured parser failed', () => {
            const rawBody = Buffer.from([
                `--${BOUNDARY}`,
                'Content-Disposition: form-data; name="projectId"',
                '',
                '31',
                `--${BOUNDARY}`,
                'Content-Disposition: form-data; name="file"; filename="brief.pdf"',
                'Content-Type: application/pdf',
                '',
                'PDF'
            ].join('\r\n'));

            const intent = dispatcher.dispatch(view({
                contentType: `multipart/form-data; boundary=${BOUNDARY}`,
                body: {},
                multipart: { rawBody, structuredError: new Error('Unexpected end of form') }
            }));

            expect(intent.mode).toBe('attachment');
            if (intent.mode === 'attachment') {
                expect(intent.projectId).toBe('31');
                expect(intent.file?.originalName).toBe('brief.pdf');
                expect(intent.file?.buffer.toString('utf8')).toBe('PDF');
            }
            expect(logger.warn).toHaveBeenCalledWith(
                { error: 'Unexpected end of form' },
                'Structured multipart parse failed, falling back to manual parse'
            );
        });

        it('should collect user files from both files and files[]', () => {
            const first = part('files', 'cv.pdf', 'one');
            const second = part('files[]', 'portfolio.pdf', 'two');
            const files = dispatcher.userFiles(view({
                contentType: `multipart/form-data; boundary=${BOUNDARY}`,
                files: [second, first],
                multipart: { rawBody: Buffer.alloc(0), structuredError: null }
            }));

            expect(files).toEqual([first, second]);
        });
    });

    describe('Strategy Ordering', () => {
        it('should return the first usable result and skip later strategies', () => {
            const usable: FieldSet = new Map([['projectData', ['{"a":1}']]]);
            const first: ParseStrategy = { name: 'first', parse: vi.fn().mockReturnValue(null) };
            const second: ParseStrategy = { name: 'second', parse: vi.fn().mockReturnValue(usable) };
            const third: ParseStrategy = { name: 'third', parse: vi.fn() };

            const custom = new UploadDispatcher(logger, [first, second, third]);
            const intent = custom.dispatch(view({}));

            expect(intent).toEqual({ mode: 'metadata', projectData: '{"a":1}' });
            expect(third.parse).not.toHaveBeenCalled();
        });

        it('should keep the first non-empty result when none is usable', () => {
            const partial: FieldSet = new Map([['project_id', ['5']]]);
            const other: FieldSet = new Map([['project_id', ['6']], ['type', ['attachment']]]);
            const custom = new UploadDispatcher(logger, [
                { name: 'partial', parse: () => partial },
                { name: 'other', parse: () => other }
            ]);

            expect(() => custom.dispatch(view({})))
                .toThrow(new HttpError(400, 'Invalid request: nothing to process'));
        });
    });
});

describe('Field Extraction and Intent - Unit Tests', () => {
    it('should take the first alias that carries a value', () => {
        const fields: FieldSet = new Map([
            ['projectId', ['2']],
            ['project_id', ['', '1']]
        ]);

        expect(extractUploadFields(fields).projectId).toBe('1');
    });

    it('should take the first file-typed entry under file', () => {
        const file = part('file', 'a.txt', 'A');
        const fields: FieldSet = new Map([['file', ['not-a-file', file, part('file', 'b.txt', 'B')]]]);

        expect(extractUploadFields(fields).file).toBe(file);
    });

    it('should prefer attachment when both a file and metadata are present', () => {
        const file = part('file', 'a.txt', 'A');
        const intent = resolveIntent({
            projectData: '{"id":1}',
            type: null,
            projectId: null,
            pageUrl: null,
            originalUrl: null,
            filename: null,
            file
        });

        expect(intent.mode).toBe('attachment');
    });
});
