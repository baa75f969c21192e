/**
 * Configuration sanitizer helpers. Anything out of shape falls back to the default.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sanitizeRecord(value: unknown): Record<string, unknown> {
    return isRecord(value) ? value : {};
}

export function sanitizeNumber(value: unknown, fallback: number, min: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        return fallback;
    }
    return Math.max(min, value);
}

export function sanitizeInteger(value: unknown, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        return fallback;
    }
    return Math.min(max, Math.max(min, Math.floor(value)));
}

export function sanitizeString(value: unknown, fallback: string): string {
    if (typeof value !== 'string') {
        return fallback;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : fallback;
}

export function sanitizeEnum<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
    return allowed.find(entry => entry === value) ?? fallback;
}
