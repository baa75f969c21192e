/**
 * Rover Telemetry Utility Functions
 * Small helpers shared by the poller, decoder and nodes
 */

import { TransportError } from './errors';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

export function toErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Check whether a link error means the serial handle is unusable
 * and must be reopened before the next request
 */
export function isFatalLinkError(error: unknown): boolean {
    const fatalErrors = ['ECONNRESET', 'EPIPE', 'ENOENT', 'EACCES', 'Port Not Open', 'Port is closed'];
    const message = toErrorMessage(error);
    return fatalErrors.some(e => message.includes(e));
}

/**
 * Race an operation against a timer; the timer is cleared either way
 *
 * @param operation - Operation to perform
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Name of operation for error message
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TransportError(operationName, `timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeoutPromise]);
    } finally {
        if (timer) clearTimeout(timer);
    }
}

/**
 * Round to a fixed number of decimals
 */
export function roundTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}
