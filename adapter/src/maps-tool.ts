/**
 * Maps tool for chat hosts
 *
 * Each operation calls the Gateway and returns ready-to-display markdown.
 * Operations never reject: every failure renders as a single ❌ / ⏱️ line.
 */

import {
    TRAVEL_MODES,
    type DirectionsResponse,
    type GeocodeResponse,
    type LatLng,
    type PlaceDetail,
    type PlaceSearchResponse,
    type PlaceSummary,
    type TravelMode,
} from '../../shared/api/index.js';
import {
    mergeSettings,
    parseSettings,
    type AdapterSettings,
    type AdapterSettingsInput,
} from './config.js';
import { GatewayClient, type GatewayFailure } from './gateway-client.js';
import {
    DirectionsResponseSchema,
    GeocodeResponseSchema,
    PlaceDetailSchema,
    PlaceSearchResponseSchema,
} from './gateway-schemas.js';
import { createAdapterLogger, type Logger } from './logger.js';
import {
    capitalize,
    coordinate,
    coordinates,
    image,
    instructionToMarkdown,
    latLngParam,
    marker,
    markerLabel,
    pointUrl,
    ratingText,
    searchUrl,
    staticImageUrl,
} from './markdown.js';

export const MAX_DIRECTION_STEPS = 20;
export const GEOCODE_DISPLAY_LIMIT = 3;
const SEARCH_TYPE_LIMIT = 3;
const DETAIL_CATEGORY_LIMIT = 5;

const MODE_EMOJI: Record<TravelMode, string> = {
    driving: '🚗',
    walking: '🚶',
    bicycling: '🚴',
    transit: '🚇',
};

export interface MapsToolOptions {
    settings?: AdapterSettingsInput;
    logger?: Logger;
}

function isTravelMode(value: string): value is TravelMode {
    return TRAVEL_MODES.some((mode) => mode === value);
}

/** One line per failure; 404s get an operation-specific wording */
function failureLine(failure: GatewayFailure, doing: string, notFound?: string): string {
    switch (failure.kind) {
        case 'http':
            if (failure.status === 404 && notFound) {
                return notFound;
            }
            return `❌ Error ${doing} (HTTP ${failure.status}): ${failure.detail}`;
        case 'timeout':
            return `⏱️ Request timed out after ${failure.timeoutSeconds} seconds. Please try again.`;
        case 'network':
            return `❌ Network error connecting to maps gateway: ${failure.message}`;
        case 'invalid_response':
            return `❌ Unexpected response from maps gateway: ${failure.message}`;
    }
}

export class MapsTool {
    private settings: AdapterSettings;
    private client: GatewayClient;
    private readonly log: Logger;

    constructor(options: MapsToolOptions = {}) {
        this.log = options.logger ?? createAdapterLogger();
        this.settings = parseSettings(options.settings ?? {});
        this.client = this.createClient();
    }

    getSettings(): Readonly<AdapterSettings> {
        return this.settings;
    }

    /**
     * Applies a partial settings update from the chat host.
     * @throws AdapterConfigError on unknown keys or invalid values; current settings are kept
     */
    updateSettings(patch: Record<string, unknown>): Readonly<AdapterSettings> {
        this.settings = mergeSettings(this.settings, patch);
        this.client = this.createClient();
        this.log.info({ keys: Object.keys(patch) }, '[MapsTool] Settings updated');
        return this.settings;
    }

    async searchPlaces(query: string, location?: string, radius = 5000): Promise<string> {
        return this.guard('searching places', async () => {
            const result = await this.client.post('/search', { query, location, radius }, PlaceSearchResponseSchema);
            if (!result.ok) {
                return failureLine(result.failure, 'searching for places');
            }
            return this.renderSearch(result.data, query, location);
        });
    }

    async getPlaceDetails(placeId: string): Promise<string> {
        return this.guard('getting place details', async () => {
            const result = await this.client.get(`/place/${encodeURIComponent(placeId)}`, PlaceDetailSchema);
            if (!result.ok) {
                return failureLine(result.failure, 'fetching place details', `❌ Place not found with ID: ${placeId}`);
            }
            return this.renderPlaceDetail(result.data);
        });
    }

    async getDirections(origin: string, destination: string, mode = 'driving'): Promise<string> {
        const normalized = mode.trim().toLowerCase();
        if (!isTravelMode(normalized)) {
            return `❌ Invalid travel mode '${mode}'. Use: ${TRAVEL_MODES.join(', ')}`;
        }

        return this.guard('getting directions', async () => {
            const result = await this.client.post(
                '/directions',
                { origin, destination, mode: normalized },
                DirectionsResponseSchema
            );
            if (!result.ok) {
                return failureLine(result.failure, 'getting directions', `❌ No route found from ${origin} to ${destination}`);
            }
            return this.renderDirections(result.data, origin, destination);
        });
    }

    async geocodeAddress(address: string): Promise<string> {
        return this.guard('geocoding address', async () => {
            const result = await this.client.post('/geocode', { address }, GeocodeResponseSchema);
            if (!result.ok) {
                return failureLine(result.failure, 'geocoding address', `❌ Could not find location: ${address}`);
            }
            return this.renderGeocode(result.data, address);
        });
    }

    private createClient(): GatewayClient {
        return new GatewayClient({
            baseUrl: this.settings.backendApiUrl,
            timeoutSeconds: this.settings.requestTimeoutSeconds,
        }, this.log);
    }

    /** Last-resort net so a rendering bug still yields a chat line */
    private async guard(doing: string, operation: () => Promise<string>): Promise<string> {
        try {
            return await operation();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.log.error({ operation: doing, error: message }, '[MapsTool] Unexpected error');
            return `❌ Unexpected error ${doing}: ${message}`;
        }
    }

    private renderSearch(data: PlaceSearchResponse, query: string, location?: string): string {
        const near = location ? ` near ${location}` : '';
        const places = data.results;
        if (places.length === 0) {
            return `🔍 No results found for '${query}'${near}. Try a different search term or location.`;
        }

        const shown = places.slice(0, this.settings.maxResultsDisplay);
        const output = [`📍 **Found ${data.count} places for '${query}'${near}:**\n`];

        shown.forEach((place, index) => {
            output.push(this.renderSearchEntry(place, index + 1));
        });

        if (places.length > shown.length) {
            output.push(`\n_(${places.length - shown.length} more results available)_\n`);
        }

        const first = shown[0];
        if (this.settings.showMapImages && first) {
            const url = staticImageUrl(this.settings.browserApiUrl, {
                q: latLngParam(first.location),
                width: this.settings.mapWidth,
                height: this.settings.mapHeight,
                markers: shown.map((place, index) => marker('red', markerLabel(index + 1), place.location)),
            });
            output.push('\n## 🗺️ Map View\n');
            output.push(image('Map showing search results', url));
            if (this.settings.includeMapLinks) {
                output.push(`\n🔗 [**View on Google Maps**](${searchUrl(first.location)})\n`);
            }
        }

        return output.join('');
    }

    private renderSearchEntry(place: PlaceSummary, position: number): string {
        let entry = `\n**${position}. ${place.name}**${ratingText(place.rating, place.user_ratings_total)}\n`;
        entry += `   📍 ${place.address}\n`;
        entry += `   🗺️ Coordinates: ${coordinates(place.location)}\n`;
        if (this.settings.includeMapLinks && place.google_maps_url) {
            entry += `   🔗 [View on Google Maps](${place.google_maps_url})\n`;
        }
        if (place.types && place.types.length > 0) {
            entry += `   🏷️ Types: ${place.types.slice(0, SEARCH_TYPE_LIMIT).join(', ')}\n`;
        }
        return entry;
    }

    private renderPlaceDetail(place: PlaceDetail): string {
        const output = [`📍 **${place.name}**\n`];
        output.push(`\n**Address:**\n${place.formatted_address}\n`);

        const rating = ratingText(place.rating, place.user_ratings_total);
        if (rating) {
            output.push(`\n**Rating:**${rating}\n`);
        }
        if (place.price_level) {
            output.push(`\n**Price Level:** ${'$'.repeat(place.price_level)}\n`);
        }
        if (place.formatted_phone_number) {
            output.push(`\n**Phone:** ${place.formatted_phone_number}\n`);
        }
        if (place.website) {
            output.push(`\n**Website:** ${place.website}\n`);
        }

        const hours = place.opening_hours;
        if (hours?.open_now !== undefined) {
            output.push(`\n**Status:** ${hours.open_now ? '🟢 Open now' : '🔴 Closed now'}\n`);
        }
        if (hours && hours.weekday_text.length > 0) {
            output.push('\n**Hours:**\n');
            for (const day of hours.weekday_text) {
                output.push(`  ${day}\n`);
            }
        }

        output.push(`\n**Coordinates:** ${coordinates(place.location)}\n`);

        if (place.types && place.types.length > 0) {
            output.push(`\n**Categories:** ${place.types.slice(0, DETAIL_CATEGORY_LIMIT).join(', ')}\n`);
        }
        if (this.settings.includeMapLinks && place.google_maps_url) {
            output.push(`\n🔗 [View on Google Maps](${place.google_maps_url})\n`);
        }
        if (this.settings.showMapImages) {
            output.push(image(`Location map - ${place.name}`, this.locationImageUrl(place.location)));
        }

        return output.join('');
    }

    private renderDirections(data: DirectionsResponse, origin: string, destination: string): string {
        const { route, mode } = data;
        const output = [
            `${MODE_EMOJI[mode]} **Directions: ${origin} → ${destination}**\n`,
            `**Mode:** ${capitalize(mode)}\n\n`,
            '**Route Summary:**\n',
            `  📏 Distance: ${route.distance}\n`,
            `  ⏱️ Duration: ${route.duration}\n`,
            `  🏁 Start: ${route.start_address}\n`,
            `  🎯 End: ${route.end_address}\n`,
            `\n**Turn-by-Turn Directions** (${route.steps.length} steps):\n\n`,
        ];

        route.steps.slice(0, MAX_DIRECTION_STEPS).forEach((step, index) => {
            output.push(`${index + 1}. ${instructionToMarkdown(step.instruction)}\n`);
            output.push(`   📏 ${step.distance} • ⏱️ ${step.duration}\n\n`);
        });

        if (route.steps.length > MAX_DIRECTION_STEPS) {
            output.push(`_(${route.steps.length - MAX_DIRECTION_STEPS} more steps...)_\n\n`);
        }

        if (this.settings.includeMapLinks && data.google_maps_url) {
            output.push(`🗺️ [View full route on Google Maps](${data.google_maps_url})\n`);
        }

        const start = route.start_location;
        const end = route.end_location;
        if (this.settings.showMapImages && start && end) {
            const url = staticImageUrl(this.settings.browserApiUrl, {
                q: latLngParam(start),
                width: this.settings.mapWidth,
                height: this.settings.mapHeight,
                markers: [marker('green', 'A', start), marker('red', 'B', end)],
                path: [start, end],
            });
            output.push('\n## 🗺️ Route Map\n');
            output.push(image(`Route map from ${origin} to ${destination}`, url));
        }

        return output.join('');
    }

    private renderGeocode(data: GeocodeResponse, address: string): string {
        if (data.results.length === 0) {
            return `🔍 No results found for: ${address}`;
        }

        const output = [`📍 **Geocoding Results for '${address}':**\n`];
        data.results.slice(0, GEOCODE_DISPLAY_LIMIT).forEach((match, index) => {
            output.push(`\n**${index + 1}. ${match.formatted_address}**\n`);
            output.push(`   🌐 Latitude: ${coordinate(match.location.lat)}\n`);
            output.push(`   🌐 Longitude: ${coordinate(match.location.lng)}\n`);
            output.push(`   🎯 Type: ${match.location_type}\n`);
            if (this.settings.includeMapLinks) {
                output.push(`   🔗 [View on Map](${pointUrl(match.location)})\n`);
            }
        });

        const first = data.results[0];
        if (this.settings.showMapImages && first) {
            output.push(image(`Location map - ${first.formatted_address}`, this.locationImageUrl(first.location)));
        }

        return output.join('');
    }

    private locationImageUrl(location: LatLng): string {
        return staticImageUrl(this.settings.browserApiUrl, {
            q: latLngParam(location),
            width: this.settings.mapWidth,
            height: this.settings.mapHeight,
        });
    }
}
