import { describe, it, expect, vi } from 'vitest';
import { StagehandService, StagehandServiceError } from '../../../src/services/stagehand.service';
import { createMockLogger, testSettings } from '../../support/helpers';

function brokenBody(): Response {
    const stream = new ReadableStream<Uint8Array>({
        start(controller) {
            controller.error(new Error('socket hang up'));
        }
    });
    return new Response(stream, { status: 200 });
}

function serviceWith(fetchImpl: typeof fetch): StagehandService {
    return new StagehandService(testSettings(), createMockLogger(), fetchImpl);
}

describe('Stagehand Service - Unit Tests', () => {
    it('should post the extraction request and return the payload', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('{"title":"Hi","items":[1,2]}', { status: 200 }));

        const result = await serviceWith(fetchImpl).parseSite({
            url: 'https://example.test/page',
            instruction: 'Get the title',
            schema: null
        });

        expect(result).toEqual({ title: 'Hi', items: [1, 2] });
        expect(fetchImpl).toHaveBeenCalledWith(
            'http://stagehand.example.test/stagehand/extract',
            expect.objectContaining({
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: '{"url":"https://example.test/page","instruction":"Get the title"}'
            })
        );
    });

    it('should report an error status with the response body', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('browser crashed', { status: 500 }));

        await expect(serviceWith(fetchImpl).parseSite({ url: 'https://example.test/page' }))
            .rejects.toEqual(new StagehandServiceError('Stagehand service error 500: browser crashed'));
    });

    it('should report an unreachable service', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

        await expect(serviceWith(fetchImpl).parseSite({ url: 'https://example.test/page' }))
            .rejects.toThrow('Could not reach Stagehand service: fetch failed');
    });

    it('should report a response body that fails mid-read', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(brokenBody());

        const result = serviceWith(fetchImpl).parseSite({ url: 'https://example.test/page' });

        await expect(result).rejects.toThrow(StagehandServiceError);
        await expect(result).rejects.toThrow(/^Could not read Stagehand service response: /);
    });

    it('should report invalid JSON', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>', { status: 200 }));

        await expect(serviceWith(fetchImpl).parseSite({ url: 'https://example.test/page' }))
            .rejects.toThrow('Invalid JSON returned from Stagehand service');
    });

    it('should report a payload that is not an object', async () => {
        const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('[1,2]', { status: 200 }));

        await expect(serviceWith(fetchImpl).parseSite({ url: 'https://example.test/page' }))
            .rejects.toThrow(StagehandServiceError);
    });
});
