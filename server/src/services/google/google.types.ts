/**
 * Raw Google Maps web-service shapes (legacy JSON APIs).
 * Only the fields the gateway reads are declared; everything is optional
 * because the provider omits fields freely. Unknown fields are stripped.
 */

import { z } from 'zod';

export const GoogleLatLngSchema = z.object({
    lat: z.number().optional(),
    lng: z.number().optional(),
});

const GeometrySchema = z.object({
    location: GoogleLatLngSchema.optional(),
    location_type: z.string().optional(),
});

export const GooglePlaceSchema = z.object({
    place_id: z.string().optional(),
    name: z.string().optional(),
    vicinity: z.string().optional(),
    formatted_address: z.string().optional(),
    formatted_phone_number: z.string().optional(),
    international_phone_number: z.string().optional(),
    website: z.string().optional(),
    rating: z.number().optional(),
    user_ratings_total: z.number().optional(),
    price_level: z.number().optional(),
    opening_hours: z.object({
        open_now: z.boolean().optional(),
        weekday_text: z.array(z.string()).optional(),
    }).optional(),
    geometry: GeometrySchema.optional(),
    types: z.array(z.string()).optional(),
});

export const GoogleGeocodeResultSchema = z.object({
    place_id: z.string().optional(),
    formatted_address: z.string().optional(),
    geometry: GeometrySchema.optional(),
    types: z.array(z.string()).optional(),
});

const TextValueSchema = z.object({
    text: z.string().optional(),
    value: z.number().optional(),
});

const RouteStepSchema = z.object({
    html_instructions: z.string().optional(),
    distance: TextValueSchema.optional(),
    duration: TextValueSchema.optional(),
    travel_mode: z.string().optional(),
});

const RouteLegSchema = z.object({
    distance: TextValueSchema.optional(),
    duration: TextValueSchema.optional(),
    start_address: z.string().optional(),
    end_address: z.string().optional(),
    start_location: GoogleLatLngSchema.optional(),
    end_location: GoogleLatLngSchema.optional(),
    steps: z.array(RouteStepSchema).optional(),
});

export const GoogleRouteSchema = z.object({
    summary: z.string().optional(),
    legs: z.array(RouteLegSchema).optional(),
});

const EnvelopeSchema = z.object({
    status: z.string().optional(),
    error_message: z.string().optional(),
});

export const PlacesListResponseSchema = EnvelopeSchema.extend({
    results: z.array(GooglePlaceSchema).optional(),
});

export const GeocodeResponseSchema = EnvelopeSchema.extend({
    results: z.array(GoogleGeocodeResultSchema).optional(),
});

export const DetailsResponseSchema = EnvelopeSchema.extend({
    result: GooglePlaceSchema.optional(),
});

export const DirectionsResponseSchema = EnvelopeSchema.extend({
    routes: z.array(GoogleRouteSchema).optional(),
});

export type GoogleLatLng = z.infer<typeof GoogleLatLngSchema>;
export type GooglePlace = z.infer<typeof GooglePlaceSchema>;
export type GoogleGeocodeResult = z.infer<typeof GoogleGeocodeResultSchema>;
export type GoogleRoute = z.infer<typeof GoogleRouteSchema>;
export type GoogleRouteLeg = z.infer<typeof RouteLegSchema>;
export type GoogleRouteStep = z.infer<typeof RouteStepSchema>;
export type GoogleEnvelope = z.infer<typeof EnvelopeSchema>;
