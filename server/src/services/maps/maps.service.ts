/**
 * Maps Service
 * Orchestrates provider calls and reshapes their output into the wire DTOs.
 *
 * Failures leave this layer only as MapsError; translation to HTTP happens in
 * the error middleware.
 */

import type {
    DirectionsResponse,
    GeocodeMatch,
    GeocodeResponse,
    LatLng,
    PlaceDetail,
    PlaceSearchResponse,
} from '../../../../shared/api/index.js';
import { logger, type Logger } from '../../lib/logger/structured-logger.js';
import type { GoogleGeocodeResult } from '../google/google.types.js';
import type { MapsProvider, StaticMapImage } from '../google/maps-provider.interface.js';
import { MapsError } from './maps.errors.js';
import {
    toDirectionsResponse,
    toGeocodeMatch,
    toLatLng,
    toPlaceDetail,
    toPlaceSummaries,
} from './maps.mapper.js';
import type {
    DirectionsRequest,
    EmbedQuery,
    GeocodeRequest,
    SearchRequest,
    StaticMapQuery,
} from './maps-request.dto.js';

export const PLACE_DETAIL_FIELDS = [
    'name',
    'formatted_address',
    'formatted_phone_number',
    'international_phone_number',
    'website',
    'rating',
    'user_ratings_total',
    'price_level',
    'opening_hours',
    'geometry',
    'types',
] as const;

export const GEOCODE_RESULT_LIMIT = 5;

export interface MapsServiceOptions {
    maxResults: number;
}

export interface MapsCallContext {
    requestId?: string;
    log?: Logger;
}

export class MapsService {
    constructor(
        private readonly provider: MapsProvider | null,
        private readonly options: MapsServiceOptions
    ) { }

    get isConfigured(): boolean {
        return this.provider !== null;
    }

    async searchPlaces(request: SearchRequest, ctx: MapsCallContext = {}): Promise<PlaceSearchResponse> {
        const provider = this.requireProvider();
        const log = ctx.log ?? logger;

        log.info({
            query: request.query,
            location: request.location,
            radius: request.radius,
        }, '[Maps] Searching places');

        const center = request.location
            ? await this.resolveLocation(provider, request.location, ctx)
            : undefined;

        const rawResults = await this.callProvider('Search failed', () =>
            center
                ? provider.nearbySearch({ location: center, keyword: request.query, radius: request.radius }, ctx)
                : provider.textSearch(request.query, ctx)
        );

        const results = toPlaceSummaries(rawResults, this.options.maxResults);

        log.info({
            query: request.query,
            providerCount: rawResults.length,
            count: results.length,
            mode: center ? 'nearby' : 'text',
        }, '[Maps] Search complete');

        return { query: request.query, results, count: results.length };
    }

    async getPlaceDetails(placeId: string, ctx: MapsCallContext = {}): Promise<PlaceDetail> {
        const provider = this.requireProvider();
        const log = ctx.log ?? logger;

        log.info({ placeId }, '[Maps] Fetching place details');

        const place = await this.callProvider('Failed to fetch place details', () =>
            provider.placeDetails(placeId, PLACE_DETAIL_FIELDS, ctx)
        );
        if (!place) {
            throw new MapsError('NOT_FOUND', `Place not found: ${placeId}`);
        }

        const detail = toPlaceDetail(placeId, place);
        if (!detail) {
            throw new MapsError('UPSTREAM_FAILURE', 'Failed to fetch place details',
                new Error(`Place ${placeId} returned without coordinates`));
        }
        return detail;
    }

    async getDirections(request: DirectionsRequest, ctx: MapsCallContext = {}): Promise<DirectionsResponse> {
        const provider = this.requireProvider();
        const log = ctx.log ?? logger;

        log.info({
            origin: request.origin,
            destination: request.destination,
            mode: request.mode,
        }, '[Maps] Getting directions');

        const routes = await this.callProvider('Failed to get directions', () =>
            provider.directions(request, ctx)
        );

        const route = routes[0];
        const leg = route?.legs?.[0];
        if (!route || !leg) {
            log.warn({ origin: request.origin, destination: request.destination }, '[Maps] No route found');
            throw new MapsError('NOT_FOUND', 'No route found');
        }

        return toDirectionsResponse(request.origin, request.destination, request.mode, route, leg);
    }

    async geocodeAddress(request: GeocodeRequest, ctx: MapsCallContext = {}): Promise<GeocodeResponse> {
        const provider = this.requireProvider();
        const log = ctx.log ?? logger;

        log.info({ address: request.address }, '[Maps] Geocoding address');

        const raw = await this.callProvider('Geocoding failed', () => provider.geocode(request.address, ctx));

        const results: GeocodeMatch[] = [];
        for (const item of raw.slice(0, GEOCODE_RESULT_LIMIT)) {
            const match = toGeocodeMatch(item);
            if (match) {
                results.push(match);
            }
        }

        if (results.length === 0) {
            log.warn({ address: request.address }, '[Maps] Geocoding returned no results');
            throw new MapsError('NOT_FOUND', `Could not geocode address: ${request.address}`);
        }

        return { address: request.address, results, count: results.length };
    }

    getEmbedSrc(query: EmbedQuery): string {
        return this.requireProvider().buildEmbedUrl(query);
    }

    getStaticMapSrc(query: StaticMapQuery): string {
        return this.requireProvider().buildStaticMapUrl(query);
    }

    async fetchStaticMap(query: StaticMapQuery, ctx: MapsCallContext = {}): Promise<StaticMapImage> {
        const provider = this.requireProvider();

        const image = await this.callProvider('Failed to fetch map image', () =>
            provider.fetchStaticMap(query, ctx)
        );
        if (!image.contentType.startsWith('image/')) {
            throw new MapsError('UPSTREAM_FAILURE', 'Failed to fetch map image',
                new Error(`Unexpected content type from provider: ${image.contentType}`));
        }
        return image;
    }

    private requireProvider(): MapsProvider {
        if (!this.provider) {
            throw new MapsError('NOT_CONFIGURED', 'Maps API key not configured');
        }
        return this.provider;
    }

    /**
     * Resolves free text to the first geocoded coordinate.
     * Unresolvable text is a client error, not an upstream one.
     */
    private async resolveLocation(
        provider: MapsProvider,
        location: string,
        ctx: MapsCallContext
    ): Promise<LatLng> {
        let results: GoogleGeocodeResult[];
        try {
            results = await provider.geocode(location, ctx);
        } catch (error) {
            throw new MapsError('BAD_LOCATION', `Invalid location: ${location}`, error);
        }

        for (const result of results) {
            const latLng = toLatLng(result.geometry?.location);
            if (latLng) {
                (ctx.log ?? logger).debug({ location, latLng }, '[Maps] Resolved search location');
                return latLng;
            }
        }
        throw new MapsError('BAD_LOCATION', `Could not find location: ${location}`);
    }

    private async callProvider<T>(failureMessage: string, call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (error) {
            throw new MapsError('UPSTREAM_FAILURE', failureMessage, error);
        }
    }
}
