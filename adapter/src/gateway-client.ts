/**
 * Gateway HTTP client for the chat adapter
 *
 * Every call resolves to a GatewayResult; transport problems, timeouts and
 * non-2xx answers are values, not exceptions.
 */

import type { z } from 'zod';
import type { Logger } from './logger.js';
import { ErrorBodySchema } from './gateway-schemas.js';

const MAX_DETAIL_LENGTH = 200;

export type GatewayFailure =
    | { kind: 'http'; status: number; detail: string }
    | { kind: 'timeout'; timeoutSeconds: number }
    | { kind: 'network'; message: string }
    | { kind: 'invalid_response'; message: string };

export type GatewayResult<T> =
    | { ok: true; data: T }
    | { ok: false; failure: GatewayFailure };

export interface GatewayClientOptions {
    baseUrl: string;
    timeoutSeconds: number;
}

type JsonParse = { ok: true; value: unknown } | { ok: false; message: string };

function parseJson(text: string): JsonParse {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch (error) {
        return { ok: false, message: error instanceof Error ? error.message : String(error) };
    }
}

/** Gateway `error` field, else the raw body, else a placeholder */
export function errorDetail(text: string): string {
    const json = parseJson(text);
    if (json.ok) {
        const body = ErrorBodySchema.safeParse(json.value);
        const detail = body.success ? body.data.error ?? body.data.detail : undefined;
        if (detail) {
            return detail;
        }
    }
    const trimmed = text.trim();
    return trimmed ? trimmed.slice(0, MAX_DETAIL_LENGTH) : 'Unknown error';
}

export class GatewayClient {
    private readonly baseUrl: string;

    constructor(
        private readonly options: GatewayClientOptions,
        private readonly log: Logger
    ) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    }

    get<T>(path: string, schema: z.ZodType<T>): Promise<GatewayResult<T>> {
        return this.request('GET', path, schema);
    }

    post<T>(path: string, body: unknown, schema: z.ZodType<T>): Promise<GatewayResult<T>> {
        return this.request('POST', path, schema, body);
    }

    private async request<T>(
        method: 'GET' | 'POST',
        path: string,
        schema: z.ZodType<T>,
        body?: unknown
    ): Promise<GatewayResult<T>> {
        const url = `${this.baseUrl}${path}`;
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutSeconds * 1000);

        try {
            const response = await fetch(url, {
                method,
                headers: body === undefined
                    ? { Accept: 'application/json' }
                    : { Accept: 'application/json', 'Content-Type': 'application/json' },
                ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
                signal: controller.signal,
            });
            const text = await response.text();

            if (!response.ok) {
                const detail = errorDetail(text);
                this.log.warn({ method, path, status: response.status, detail }, '[GatewayClient] Gateway returned an error');
                return { ok: false, failure: { kind: 'http', status: response.status, detail } };
            }

            const json = parseJson(text);
            if (!json.ok) {
                this.log.warn({ method, path, error: json.message }, '[GatewayClient] Response is not JSON');
                return { ok: false, failure: { kind: 'invalid_response', message: json.message } };
            }

            const parsed = schema.safeParse(json.value);
            if (!parsed.success) {
                const message = parsed.error.issues
                    .slice(0, 3)
                    .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
                    .join('; ');
                this.log.warn({ method, path, error: message }, '[GatewayClient] Response does not match the expected shape');
                return { ok: false, failure: { kind: 'invalid_response', message } };
            }

            return { ok: true, data: parsed.data };
        } catch (error) {
            if (controller.signal.aborted) {
                this.log.warn({ method, path, timeoutSeconds: this.options.timeoutSeconds }, '[GatewayClient] Request timed out');
                return { ok: false, failure: { kind: 'timeout', timeoutSeconds: this.options.timeoutSeconds } };
            }
            const message = error instanceof Error ? error.message : String(error);
            this.log.warn({ method, path, error: message }, '[GatewayClient] Network error');
            return { ok: false, failure: { kind: 'network', message } };
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
