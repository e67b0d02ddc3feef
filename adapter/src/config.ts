/**
 * Chat adapter settings
 * Closed set of keys; unknown or out-of-range values are rejected as a whole.
 */

import { z } from 'zod';

export const AdapterSettingsSchema = z
    .object({
        /** Gateway base as seen from the chat host (container network) */
        backendApiUrl: z.string().url().default('http://maps-gateway:8000/api/maps'),
        /** Gateway base as seen from the user's browser; used for images only */
        browserApiUrl: z.string().url().default('http://localhost:8000/api/maps'),
        maxResultsDisplay: z.number().int().min(1).max(20).default(5),
        requestTimeoutSeconds: z.number().min(1).max(120).default(15),
        includeMapLinks: z.boolean().default(true),
        showMapImages: z.boolean().default(true),
        mapWidth: z.number().int().min(100).max(1280).default(600),
        mapHeight: z.number().int().min(100).max(1280).default(400),
    })
    .strict();

export type AdapterSettings = z.infer<typeof AdapterSettingsSchema>;
export type AdapterSettingsInput = z.input<typeof AdapterSettingsSchema>;

export class AdapterConfigError extends Error {
    constructor(public readonly keys: string[]) {
        super(`Invalid adapter settings: ${keys.join(', ')}`);
        this.name = 'AdapterConfigError';
    }
}

function offendingKeys(error: z.ZodError): string[] {
    const keys = error.issues.flatMap((issue) =>
        issue.code === z.ZodIssueCode.unrecognized_keys ? issue.keys : [issue.path.join('.') || 'settings']
    );
    return [...new Set(keys)];
}

export function parseSettings(input: unknown): AdapterSettings {
    const parsed = AdapterSettingsSchema.safeParse(input);
    if (!parsed.success) {
        throw new AdapterConfigError(offendingKeys(parsed.error));
    }
    return parsed.data;
}

/** Applies a partial update on top of the current settings */
export function mergeSettings(current: AdapterSettings, patch: Record<string, unknown>): AdapterSettings {
    return parseSettings({ ...current, ...patch });
}
