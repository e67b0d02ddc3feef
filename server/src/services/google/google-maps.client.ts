/**
 * Google Maps web-services client
 *
 * Constructed once at startup with the server-held key and injected into MapsService.
 * Every call is a single fetch bounded by the configured timeout; there is no retry.
 */

import type { z } from 'zod';
import { logger } from '../../lib/logger/structured-logger.js';
import { fetchWithTimeout } from '../../utils/fetch-with-timeout.js';
import {
    DetailsResponseSchema,
    DirectionsResponseSchema,
    GeocodeResponseSchema,
    PlacesListResponseSchema,
    type GoogleEnvelope,
    type GoogleGeocodeResult,
    type GooglePlace,
    type GoogleRoute,
} from './google.types.js';
import type {
    DirectionsParams,
    EmbedParams,
    MapsProvider,
    NearbySearchParams,
    ProviderCallContext,
    StaticMapImage,
    StaticMapParams,
} from './maps-provider.interface.js';

const API_BASE_URL = 'https://maps.googleapis.com/maps/api';
const STATIC_MAP_URL = 'https://maps.googleapis.com/maps/api/staticmap';
const EMBED_SEARCH_URL = 'https://www.google.com/maps/embed/v1/search';

const PROVIDER = 'google_maps';

/** Provider answered, but not with data we can use */
export class ProviderError extends Error {
    constructor(
        public readonly status: string,
        public readonly endpoint: string,
        public readonly providerMessage?: string
    ) {
        super(`Google Maps ${endpoint} failed with status ${status}`);
        this.name = 'ProviderError';
    }
}

export interface GoogleMapsClientOptions {
    apiKey: string;
    timeoutMs: number;
}

/**
 * Splits a markers value into individual marker specs.
 * Accepts "color:red|label:1|1,2&markers=color:red|label:2|3,4" as sent by the chat adapter.
 */
export function splitMarkers(markers: string | undefined): string[] {
    if (!markers) return [];
    return markers
        .split('&')
        .map((part) => part.trim())
        .map((part) => (part.startsWith('markers=') ? part.slice('markers='.length) : part))
        .filter((part) => part.length > 0);
}

/** Unparseable text yields undefined, which the envelope schema then rejects */
function parseJson(text: string): unknown {
    try {
        const value: unknown = JSON.parse(text);
        return value;
    } catch {
        return undefined;
    }
}

export class GoogleMapsClient implements MapsProvider {
    private readonly apiKey: string;
    private readonly timeoutMs: number;

    constructor(options: GoogleMapsClientOptions) {
        if (!options.apiKey.trim()) {
            throw new Error('Google Maps API key is required to construct the client');
        }
        if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
            throw new Error(`Invalid provider timeout: ${options.timeoutMs}`);
        }
        this.apiKey = options.apiKey.trim();
        this.timeoutMs = options.timeoutMs;
    }

    async geocode(address: string, ctx?: ProviderCallContext): Promise<GoogleGeocodeResult[]> {
        const body = await this.getJson('geocode', { address }, GeocodeResponseSchema, ctx);
        if (this.isEmpty('geocode', body, ['ZERO_RESULTS'])) {
            return [];
        }
        return body.results ?? [];
    }

    async textSearch(query: string, ctx?: ProviderCallContext): Promise<GooglePlace[]> {
        const body = await this.getJson('place/textsearch', { query }, PlacesListResponseSchema, ctx);
        if (this.isEmpty('place/textsearch', body, ['ZERO_RESULTS'])) {
            return [];
        }
        return body.results ?? [];
    }

    async nearbySearch(params: NearbySearchParams, ctx?: ProviderCallContext): Promise<GooglePlace[]> {
        const body = await this.getJson('place/nearbysearch', {
            location: `${params.location.lat},${params.location.lng}`,
            radius: String(params.radius),
            keyword: params.keyword,
        }, PlacesListResponseSchema, ctx);
        if (this.isEmpty('place/nearbysearch', body, ['ZERO_RESULTS'])) {
            return [];
        }
        return body.results ?? [];
    }

    async placeDetails(
        placeId: string,
        fields: readonly string[],
        ctx?: ProviderCallContext
    ): Promise<GooglePlace | null> {
        const body = await this.getJson('place/details', {
            place_id: placeId,
            fields: fields.join(','),
        }, DetailsResponseSchema, ctx);
        // INVALID_REQUEST here means the id itself is not one the provider knows
        if (this.isEmpty('place/details', body, ['NOT_FOUND', 'ZERO_RESULTS', 'INVALID_REQUEST'])) {
            return null;
        }
        const result = body.result;
        return result && Object.keys(result).length > 0 ? result : null;
    }

    async directions(params: DirectionsParams, ctx?: ProviderCallContext): Promise<GoogleRoute[]> {
        const body = await this.getJson('directions', {
            origin: params.origin,
            destination: params.destination,
            mode: params.mode,
        }, DirectionsResponseSchema, ctx);
        // NOT_FOUND: origin or destination could not be geocoded, so there is no route
        if (this.isEmpty('directions', body, ['ZERO_RESULTS', 'NOT_FOUND'])) {
            return [];
        }
        return body.routes ?? [];
    }

    buildEmbedUrl(params: EmbedParams): string {
        const url = new URL(EMBED_SEARCH_URL);
        url.searchParams.set('key', this.apiKey);
        url.searchParams.set('q', params.q);
        url.searchParams.set('zoom', String(params.zoom));
        return url.toString();
    }

    buildStaticMapUrl(params: StaticMapParams): string {
        const url = new URL(STATIC_MAP_URL);
        url.searchParams.set('center', params.q);
        if (params.zoom !== undefined) {
            url.searchParams.set('zoom', String(params.zoom));
        }
        url.searchParams.set('size', `${params.width}x${params.height}`);
        for (const marker of splitMarkers(params.markers)) {
            url.searchParams.append('markers', marker);
        }
        if (params.path) {
            url.searchParams.set('path', params.path);
        }
        url.searchParams.set('key', this.apiKey);
        return url.toString();
    }

    async fetchStaticMap(params: StaticMapParams, ctx?: ProviderCallContext): Promise<StaticMapImage> {
        return fetchWithTimeout(this.buildStaticMapUrl(params), {
            method: 'GET',
            headers: { Accept: 'image/*' },
        }, {
            timeoutMs: this.timeoutMs,
            requestId: ctx?.requestId,
            stage: 'staticmap',
            provider: PROVIDER,
        }, async (response) => {
            if (!response.ok) {
                throw new ProviderError(`HTTP_${response.status}`, 'staticmap');
            }
            return {
                contentType: response.headers.get('content-type') || 'image/png',
                body: Buffer.from(await response.arrayBuffer()),
            };
        });
    }

    private async getJson<T extends GoogleEnvelope>(
        endpoint: string,
        params: Record<string, string>,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        ctx?: ProviderCallContext
    ): Promise<T> {
        const url = new URL(`${API_BASE_URL}/${endpoint}/json`);
        for (const [name, value] of Object.entries(params)) {
            url.searchParams.set(name, value);
        }
        url.searchParams.set('key', this.apiKey);

        const text = await fetchWithTimeout(url.toString(), {
            method: 'GET',
            headers: { Accept: 'application/json' },
        }, {
            timeoutMs: this.timeoutMs,
            requestId: ctx?.requestId,
            stage: endpoint,
            provider: PROVIDER,
        }, async (response) => {
            if (!response.ok) {
                throw new ProviderError(`HTTP_${response.status}`, endpoint);
            }
            return response.text();
        });

        const parsed = schema.safeParse(parseJson(text));
        if (!parsed.success) {
            logger.warn({
                requestId: ctx?.requestId,
                endpoint,
                issues: parsed.error.issues.slice(0, 5),
            }, '[GoogleMaps] Unexpected response shape');
            throw new ProviderError('INVALID_RESPONSE', endpoint);
        }
        return parsed.data;
    }

    /**
     * True when the status means "no data"; throws on any status other than OK.
     */
    private isEmpty(endpoint: string, body: GoogleEnvelope, emptyStatuses: readonly string[]): boolean {
        const status = body.status ?? 'UNKNOWN_ERROR';
        if (status === 'OK') {
            return false;
        }
        if (emptyStatuses.includes(status)) {
            return true;
        }
        logger.warn({
            endpoint,
            status,
            providerMessage: body.error_message,
        }, '[GoogleMaps] Provider returned error status');
        throw new ProviderError(status, endpoint, body.error_message);
    }
}
