/**
 * Request schemas for the maps endpoints
 * Parsed at the HTTP boundary; services only ever see validated values.
 */

import { z } from 'zod';
import { TRAVEL_MODES, type TravelMode } from '../../../../shared/api/index.js';

const isTravelMode = (value: string): value is TravelMode =>
    TRAVEL_MODES.some((mode) => mode === value);

const optionalText = (max: number) =>
    z
        .string()
        .max(max)
        .nullish()
        .transform((value) => {
            const trimmed = value?.trim();
            return trimmed ? trimmed : undefined;
        });

export const SearchRequestSchema = z.object({
    query: z
        .string({ required_error: 'Query is required' })
        .trim()
        .min(1, 'Query cannot be empty or whitespace')
        .max(200),
    location: optionalText(200),
    radius: z.coerce.number().int().min(1).max(50000).default(5000),
});

export const PlaceIdParamSchema = z.object({
    placeId: z.string().trim().min(1, 'Place ID is required').max(512),
});

export const DirectionsRequestSchema = z.object({
    origin: z.string({ required_error: 'Origin is required' }).trim().min(1).max(200),
    destination: z.string({ required_error: 'Destination is required' }).trim().min(1).max(200),
    mode: z
        .string()
        .default('driving')
        .transform((value) => value.trim().toLowerCase())
        .refine(isTravelMode, { message: `Mode must be one of: ${TRAVEL_MODES.join(', ')}` })
        .transform((value): TravelMode => (isTravelMode(value) ? value : 'driving')),
});

export const GeocodeRequestSchema = z.object({
    address: z
        .string({ required_error: 'Address is required' })
        .trim()
        .min(1, 'Address cannot be empty or whitespace')
        .max(300),
});

export const EmbedQuerySchema = z.object({
    q: z.string({ required_error: 'q is required' }).trim().min(1).max(300),
    zoom: z.coerce.number().int().min(0).max(21).default(14),
});

export const StaticMapQuerySchema = z.object({
    q: z.string({ required_error: 'q is required' }).trim().min(1).max(300),
    width: z.coerce.number().int().min(100).max(1280).default(600),
    height: z.coerce.number().int().min(100).max(1280).default(400),
    zoom: z.coerce.number().int().min(0).max(21).optional(),
    // Repeated ?markers=…&markers=… arrives as an array
    markers: z.preprocess(
        (value) => (Array.isArray(value) ? value.join('&') : value),
        optionalText(2000)
    ),
    path: optionalText(2000),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
export type DirectionsRequest = z.infer<typeof DirectionsRequestSchema>;
export type GeocodeRequest = z.infer<typeof GeocodeRequestSchema>;
export type EmbedQuery = z.infer<typeof EmbedQuerySchema>;
export type StaticMapQuery = z.infer<typeof StaticMapQuerySchema>;
