/**
 * Provider → wire shaping
 *
 * Optional provider fields stay absent in the output (no sentinel defaults);
 * name and address fall back to "Unknown" / "N/A". Search results without an id
 * or coordinates are dropped.
 */

import type {
    DirectionsResponse,
    GeocodeMatch,
    LatLng,
    OpeningHours,
    PlaceDetail,
    PlaceSummary,
    Route,
    RouteStep,
    TravelMode,
} from '../../../../shared/api/index.js';
import type {
    GoogleGeocodeResult,
    GoogleLatLng,
    GooglePlace,
    GoogleRoute,
    GoogleRouteLeg,
    GoogleRouteStep,
} from '../google/google.types.js';

export const UNKNOWN_NAME = 'Unknown';
export const UNKNOWN_ADDRESS = 'N/A';

export function placeUrl(placeId: string): string {
    return `https://www.google.com/maps/place/?q=place_id:${placeId}`;
}

/**
 * Deep link to the provider's web directions page.
 * Values are embedded as received: mode is enum-validated upstream,
 * origin/destination pass through unescaped.
 */
export function directionsUrl(origin: string, destination: string, mode: TravelMode): string {
    return (
        'https://www.google.com/maps/dir/?api=1' +
        `&origin=${origin}` +
        `&destination=${destination}` +
        `&travelmode=${mode}`
    );
}

export function toLatLng(location: GoogleLatLng | undefined): LatLng | undefined {
    if (location?.lat === undefined || location.lng === undefined) {
        return undefined;
    }
    return { lat: location.lat, lng: location.lng };
}

export function toPlaceSummary(place: GooglePlace): PlaceSummary | undefined {
    const location = toLatLng(place.geometry?.location);
    const placeId = place.place_id;
    if (!location || !placeId) {
        return undefined;
    }

    return {
        name: place.name || UNKNOWN_NAME,
        address: place.vicinity || place.formatted_address || UNKNOWN_ADDRESS,
        place_id: placeId,
        ...(place.rating !== undefined ? { rating: place.rating } : {}),
        ...(place.user_ratings_total !== undefined ? { user_ratings_total: place.user_ratings_total } : {}),
        location,
        ...(place.types !== undefined ? { types: place.types } : {}),
        google_maps_url: placeUrl(placeId),
    };
}

/** Maps raw search results, keeping at most `limit` places that carry an id and coordinates */
export function toPlaceSummaries(places: GooglePlace[], limit: number): PlaceSummary[] {
    const summaries: PlaceSummary[] = [];
    for (const place of places.slice(0, limit)) {
        const summary = toPlaceSummary(place);
        if (summary) {
            summaries.push(summary);
        }
    }
    return summaries;
}

export function toOpeningHours(hours: GooglePlace['opening_hours']): OpeningHours | undefined {
    if (!hours) {
        return undefined;
    }
    return {
        ...(hours.open_now !== undefined ? { open_now: hours.open_now } : {}),
        weekday_text: hours.weekday_text ?? [],
    };
}

export function toPlaceDetail(placeId: string, place: GooglePlace): PlaceDetail | undefined {
    const location = toLatLng(place.geometry?.location);
    if (!location) {
        return undefined;
    }
    const openingHours = toOpeningHours(place.opening_hours);

    return {
        name: place.name || UNKNOWN_NAME,
        formatted_address: place.formatted_address || UNKNOWN_ADDRESS,
        ...(place.formatted_phone_number !== undefined ? { formatted_phone_number: place.formatted_phone_number } : {}),
        ...(place.international_phone_number !== undefined
            ? { international_phone_number: place.international_phone_number }
            : {}),
        ...(place.website !== undefined ? { website: place.website } : {}),
        ...(place.rating !== undefined ? { rating: place.rating } : {}),
        ...(place.user_ratings_total !== undefined ? { user_ratings_total: place.user_ratings_total } : {}),
        ...(place.price_level !== undefined ? { price_level: place.price_level } : {}),
        ...(openingHours ? { opening_hours: openingHours } : {}),
        location,
        ...(place.types !== undefined ? { types: place.types } : {}),
        google_maps_url: placeUrl(placeId),
    };
}

export function toRouteStep(step: GoogleRouteStep): RouteStep {
    return {
        instruction: step.html_instructions ?? '',
        distance: step.distance?.text ?? '',
        duration: step.duration?.text ?? '',
    };
}

export function toRoute(route: GoogleRoute, leg: GoogleRouteLeg): Route {
    const startLocation = toLatLng(leg.start_location);
    const endLocation = toLatLng(leg.end_location);

    return {
        summary: route.summary || 'Route',
        distance: leg.distance?.text ?? '',
        duration: leg.duration?.text ?? '',
        start_address: leg.start_address ?? '',
        end_address: leg.end_address ?? '',
        ...(startLocation ? { start_location: startLocation } : {}),
        ...(endLocation ? { end_location: endLocation } : {}),
        steps: (leg.steps ?? []).map(toRouteStep),
    };
}

export function toDirectionsResponse(
    origin: string,
    destination: string,
    mode: TravelMode,
    route: GoogleRoute,
    leg: GoogleRouteLeg
): DirectionsResponse {
    return {
        origin,
        destination,
        mode,
        route: toRoute(route, leg),
        google_maps_url: directionsUrl(origin, destination, mode),
    };
}

export function toGeocodeMatch(result: GoogleGeocodeResult): GeocodeMatch | undefined {
    const location = toLatLng(result.geometry?.location);
    if (!location) {
        return undefined;
    }
    return {
        formatted_address: result.formatted_address || UNKNOWN_ADDRESS,
        location,
        location_type: result.geometry?.location_type ?? 'UNKNOWN',
        place_id: result.place_id ?? '',
    };
}
