import { hostname } from 'node:os';

/** Current UTC time as ISO-8601 with milliseconds, e.g. 2024-05-01T12:00:00.000Z. */
export function utcIsoNow(): string {
    return new Date().toISOString();
}

export function getHostName(): string {
    return hostname();
}

export function roundDuration(durationMs: number): number {
    return Math.round(durationMs * 100) / 100;
}
