/**
 * Maps error kinds
 * Closed set; the error middleware maps each kind to exactly one HTTP status.
 */

export type MapsErrorKind = 'BAD_LOCATION' | 'NOT_FOUND' | 'NOT_CONFIGURED' | 'UPSTREAM_FAILURE';

export const MAPS_ERROR_STATUS: Record<MapsErrorKind, number> = {
    BAD_LOCATION: 400,
    NOT_FOUND: 404,
    NOT_CONFIGURED: 500,
    UPSTREAM_FAILURE: 500,
};

/**
 * The message is always composed by the gateway and safe to return.
 * Provider and transport errors travel in `cause` and are only logged.
 */
export class MapsError extends Error {
    constructor(
        public readonly kind: MapsErrorKind,
        message: string,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'MapsError';
    }

    get statusCode(): number {
        return MAPS_ERROR_STATUS[this.kind];
    }
}

export function isMapsError(error: unknown): error is MapsError {
    return error instanceof MapsError;
}
