/**
 * Maps provider contract
 * The gateway service talks to this interface; GoogleMapsClient is the real
 * implementation and tests substitute an in-process fake.
 */

import type { LatLng, TravelMode } from '../../../../shared/api/index.js';
import type { GoogleGeocodeResult, GooglePlace, GoogleRoute } from './google.types.js';

export interface NearbySearchParams {
    location: LatLng;
    keyword: string;
    radius: number;
}

export interface DirectionsParams {
    origin: string;
    destination: string;
    mode: TravelMode;
}

export interface EmbedParams {
    q: string;
    zoom: number;
}

export interface StaticMapParams {
    q: string;
    width: number;
    height: number;
    zoom?: number;
    /** One or more marker specs, several joined by '&' */
    markers?: string;
    path?: string;
}

export interface StaticMapImage {
    contentType: string;
    body: Buffer;
}

/** Optional per-call context for log correlation */
export interface ProviderCallContext {
    requestId?: string;
}

export interface MapsProvider {
    geocode(address: string, ctx?: ProviderCallContext): Promise<GoogleGeocodeResult[]>;
    textSearch(query: string, ctx?: ProviderCallContext): Promise<GooglePlace[]>;
    nearbySearch(params: NearbySearchParams, ctx?: ProviderCallContext): Promise<GooglePlace[]>;
    /** Resolves null when the provider has no record for the id */
    placeDetails(placeId: string, fields: readonly string[], ctx?: ProviderCallContext): Promise<GooglePlace | null>;
    directions(params: DirectionsParams, ctx?: ProviderCallContext): Promise<GoogleRoute[]>;

    buildEmbedUrl(params: EmbedParams): string;
    buildStaticMapUrl(params: StaticMapParams): string;
    fetchStaticMap(params: StaticMapParams, ctx?: ProviderCallContext): Promise<StaticMapImage>;
}
