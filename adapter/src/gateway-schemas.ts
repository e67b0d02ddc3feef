/**
 * Runtime shapes of Gateway responses, pinned to the shared wire DTOs.
 */

import { z } from 'zod';
import {
    TRAVEL_MODES,
    type DirectionsResponse,
    type GeocodeResponse,
    type LatLng,
    type PlaceDetail,
    type PlaceSearchResponse,
} from '../../shared/api/index.js';

const LatLngSchema: z.ZodType<LatLng> = z.object({
    lat: z.number(),
    lng: z.number(),
});

const PlaceSummarySchema = z.object({
    name: z.string(),
    address: z.string(),
    place_id: z.string(),
    rating: z.number().optional(),
    user_ratings_total: z.number().optional(),
    location: LatLngSchema,
    types: z.array(z.string()).optional(),
    google_maps_url: z.string(),
});

export const PlaceSearchResponseSchema: z.ZodType<PlaceSearchResponse> = z.object({
    query: z.string(),
    results: z.array(PlaceSummarySchema),
    count: z.number(),
});

export const PlaceDetailSchema: z.ZodType<PlaceDetail> = z.object({
    name: z.string(),
    formatted_address: z.string(),
    formatted_phone_number: z.string().optional(),
    international_phone_number: z.string().optional(),
    website: z.string().optional(),
    rating: z.number().optional(),
    user_ratings_total: z.number().optional(),
    price_level: z.number().optional(),
    opening_hours: z.object({
        open_now: z.boolean().optional(),
        weekday_text: z.array(z.string()),
    }).optional(),
    location: LatLngSchema,
    types: z.array(z.string()).optional(),
    google_maps_url: z.string(),
});

export const DirectionsResponseSchema: z.ZodType<DirectionsResponse> = z.object({
    origin: z.string(),
    destination: z.string(),
    mode: z.enum(TRAVEL_MODES),
    route: z.object({
        summary: z.string(),
        distance: z.string(),
        duration: z.string(),
        start_address: z.string(),
        end_address: z.string(),
        start_location: LatLngSchema.optional(),
        end_location: LatLngSchema.optional(),
        steps: z.array(z.object({
            instruction: z.string(),
            distance: z.string(),
            duration: z.string(),
        })),
    }),
    google_maps_url: z.string(),
});

export const GeocodeResponseSchema: z.ZodType<GeocodeResponse> = z.object({
    address: z.string(),
    results: z.array(z.object({
        formatted_address: z.string(),
        location: LatLngSchema,
        location_type: z.string(),
        place_id: z.string(),
    })),
    count: z.number(),
});

/** Gateway error bodies carry `error`; older gateways used `detail` */
export const ErrorBodySchema = z.object({
    error: z.string().optional(),
    detail: z.string().optional(),
});
