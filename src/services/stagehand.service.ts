import { ILogger } from '../config/logger';
import { Settings } from '../config/settings';
import { isJsonObject, JsonObject, jsonValueSchema } from '../types/json';

export interface ParseSiteRequest {
    url: string;
    instruction?: string | null;
    schema?: JsonObject | null;
    options?: JsonObject | null;
}

export class StagehandServiceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'StagehandServiceError';
    }
}

type FetchFn = typeof fetch;

/**
 * Stagehand Service
 *
 * Client for the external browser-automation service that extracts
 * structured data from web pages.
 */
export class StagehandService {
    constructor(
        private settings: Pick<Settings, 'stagehandServiceUrl' | 'stagehandTimeoutMs'>,
        private logger: ILogger,
        private fetchImpl: FetchFn = fetch
    ) { }

    async parseSite(request: ParseSiteRequest): Promise<JsonObject> {
        const payload: JsonObject = { url: request.url };
        if (request.instruction) {
            payload.instruction = request.instruction;
        }
        if (request.schema) {
            payload.schema = request.schema;
        }
        if (request.options) {
            payload.options = request.options;
        }

        const endpoint = `${this.settings.stagehandServiceUrl}/stagehand/extract`;
        this.logger.info({ url: request.url }, 'Sending Stagehand extraction request');

        let response: Response;
        try {
            response = await this.fetchImpl(endpoint, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(this.settings.stagehandTimeoutMs)
            });
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error({ endpoint, error: message }, 'Failed to call Stagehand service');
            throw new StagehandServiceError(`Could not reach Stagehand service: ${message}`);
        }

        // The body streams after the headers; a drop or timeout here is still an upstream failure
        let body: string;
        try {
            body = await response.text();
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error({ endpoint, status: response.status, error: message }, 'Failed to read Stagehand response');
            throw new StagehandServiceError(`Could not read Stagehand service response: ${message}`);
        }

        if (response.status >= 400) {
            this.logger.error({ status: response.status, body }, 'Stagehand service returned error');
            throw new StagehandServiceError(`Stagehand service error ${response.status}: ${body}`);
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(body);
        } catch {
            this.logger.error({ status: response.status }, 'Invalid JSON from Stagehand service');
            throw new StagehandServiceError('Invalid JSON returned from Stagehand service');
        }

        const parsed = jsonValueSchema.safeParse(decoded);
        if (!parsed.success || !isJsonObject(parsed.data)) {
            throw new StagehandServiceError('Stagehand service returned a non-object payload');
        }
        return parsed.data;
    }
}
