/**
 * Markdown building blocks for chat output
 */

import type { LatLng } from '../../shared/api/index.js';

export const MAX_STARS = 5;

/** Rounds half up and clamps to 0..5 */
export function stars(rating: number): string {
    const count = Math.min(MAX_STARS, Math.max(0, Math.floor(rating + 0.5)));
    return '⭐'.repeat(count);
}

/** " ⭐⭐⭐⭐ 4.4/5 (120 reviews)"; empty when there is no rating */
export function ratingText(rating: number | undefined, reviews: number | undefined): string {
    if (!rating) {
        return '';
    }
    const reviewText = reviews ? ` (${reviews} reviews)` : '';
    return ` ${stars(rating)} ${rating}/5${reviewText}`;
}

export function coordinate(value: number): string {
    return value.toFixed(6);
}

export function coordinates(location: LatLng): string {
    return `${coordinate(location.lat)}, ${coordinate(location.lng)}`;
}

/**
 * Provider step HTML to chat markdown: bold becomes **, div wrappers go,
 * anything else tag-shaped is stripped.
 */
export function instructionToMarkdown(html: string): string {
    return html
        .replace(/<\/?b>/gi, '**')
        .replace(/<div[^>]*>/gi, '')
        .replace(/<\/div>/gi, '')
        .replace(/<[^>]+>/g, '');
}

export function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

export function searchUrl(location: LatLng): string {
    return `https://www.google.com/maps/search/?api=1&query=${location.lat},${location.lng}`;
}

export function pointUrl(location: LatLng): string {
    return `https://www.google.com/maps?q=${location.lat},${location.lng}`;
}

export interface StaticImageParams {
    q: string;
    width: number;
    height: number;
    markers?: string[];
    path?: LatLng[];
}

export function latLngParam(location: LatLng): string {
    return `${location.lat},${location.lng}`;
}

/** Static map labels are one character: 1-9, then A, B, ... from the tenth marker */
export function markerLabel(position: number): string {
    return position <= 9 ? String(position) : String.fromCharCode('A'.charCodeAt(0) + position - 10);
}

export function marker(color: string, label: string, location: LatLng): string {
    return `markers=color:${color}|label:${label}|${latLngParam(location)}`;
}

/**
 * Browser-facing Gateway image URL. The provider key is added server-side,
 * so nothing here ever points at the provider directly.
 */
export function staticImageUrl(browserApiUrl: string, params: StaticImageParams): string {
    const query = new URLSearchParams();
    if (params.markers && params.markers.length > 0) {
        query.set('markers', params.markers.join('&'));
    }
    if (params.path && params.path.length > 0) {
        query.set('path', params.path.map(latLngParam).join('|'));
    }
    query.set('width', String(params.width));
    query.set('height', String(params.height));
    query.set('q', params.q);
    return `${browserApiUrl.replace(/\/+$/, '')}/static-image?${query.toString()}`;
}

export function image(alt: string, url: string): string {
    return `\n![${alt}](${url})\n`;
}
