// Wire shapes shared by the gateway and the chat adapter.
// Field names follow the provider vocabulary (snake_case).

export interface LatLng {
    lat: number;
    lng: number;
}

export const TRAVEL_MODES = ['driving', 'walking', 'bicycling', 'transit'] as const;
export type TravelMode = (typeof TRAVEL_MODES)[number];

export interface PlaceSummary {
    name: string;
    address: string;
    place_id: string;
    rating?: number;
    user_ratings_total?: number;
    location: LatLng;
    types?: string[];
    google_maps_url: string;
}

export interface PlaceSearchResponse {
    query: string;
    results: PlaceSummary[];
    count: number;
}

export interface OpeningHours {
    open_now?: boolean;
    weekday_text: string[];
}

export interface PlaceDetail {
    name: string;
    formatted_address: string;
    formatted_phone_number?: string;
    international_phone_number?: string;
    website?: string;
    rating?: number;
    user_ratings_total?: number;
    price_level?: number;
    opening_hours?: OpeningHours;
    location: LatLng;
    types?: string[];
    google_maps_url: string;
}

export interface RouteStep {
    /** Provider instruction text, may contain HTML emphasis */
    instruction: string;
    distance: string;
    duration: string;
}

export interface Route {
    summary: string;
    distance: string;
    duration: string;
    start_address: string;
    end_address: string;
    start_location?: LatLng;
    end_location?: LatLng;
    steps: RouteStep[];
}

export interface DirectionsResponse {
    origin: string;
    destination: string;
    mode: TravelMode;
    route: Route;
    google_maps_url: string;
}

export interface GeocodeMatch {
    formatted_address: string;
    location: LatLng;
    location_type: string;
    place_id: string;
}

export interface GeocodeResponse {
    address: string;
    results: GeocodeMatch[];
    count: number;
}

export interface MapSourceResponse {
    src: string;
}

export interface HealthResponse {
    status: 'healthy';
    service: string;
    version: string;
    maps_api_configured: boolean;
}

export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'BAD_LOCATION'
    | 'NOT_FOUND'
    | 'NOT_CONFIGURED'
    | 'UPSTREAM_FAILURE'
    | 'INTERNAL_ERROR';

export interface ValidationIssue {
    field: string;
    message: string;
}

export interface ErrorResponse {
    error: string;
    code: ErrorCode;
    traceId: string;
    details?: ValidationIssue[];
}
