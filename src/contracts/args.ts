import { ProfilePatch } from '../models/FarmerProfile';

// Transaction arguments arrive as strings. Anything unparsable becomes NaN
// and is rejected by the domain's own input checks.

export function parseNumber(raw: string): number {
    return raw.trim() === '' ? NaN : Number(raw);
}

export function parseInteger(raw: string): number {
    const value = parseNumber(raw);
    return Number.isInteger(value) ? value : NaN;
}

// Empty string stands for "not supplied".
export function optional(raw: string | undefined): string | undefined {
    return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Decode the JSON object passed to UpdateProfile. Keys that are absent stay
 * absent; a key with the wrong type makes the whole patch invalid.
 */
export function parseProfilePatch(json: string): ProfilePatch | null {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (e) {
        return null;
    }
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;

    const patch: ProfilePatch = {};
    if ('name' in raw) {
        if (typeof raw.name !== 'string') return null;
        patch.name = raw.name;
    }
    if ('location' in raw) {
        if (typeof raw.location !== 'string') return null;
        patch.location = raw.location;
    }
    if ('farmSize' in raw) {
        if (typeof raw.farmSize !== 'number') return null;
        patch.farmSize = raw.farmSize;
    }
    if ('additionalInfo' in raw) {
        if (typeof raw.additionalInfo !== 'string') return null;
        patch.additionalInfo = raw.additionalInfo;
    }
    return patch;
}
