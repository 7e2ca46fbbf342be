import { DEFAULTS } from '../constants/index.js';

const CIRCULAR_TEXT = '<<circular>>';

export interface RedactConfig {
    /** @default '<<redacted>>' */
    replacementText?: string;
}

/**
 * Recursively copies a payload, replacing the value of every key found in
 * redactKeys. Keys are compared case-insensitively; non-object payloads are
 * returned unchanged. A reference back to an enclosing object becomes
 * '<<circular>>'.
 */
export function redactPayload(
    payload: Record<string, unknown>,
    redactKeys: readonly string[],
    config?: RedactConfig,
): Record<string, unknown>;
export function redactPayload(payload: unknown, redactKeys: readonly string[], config?: RedactConfig): unknown;
export function redactPayload(payload: unknown, redactKeys: readonly string[], config: RedactConfig = {}): unknown {
    const { replacementText = DEFAULTS.REDACTED_TEXT } = config;

    if (!isPlainRecord(payload) || redactKeys.length === 0) {
        return payload;
    }

    const redactSet = new Set(redactKeys.map((key) => key.toLowerCase()));
    // Objects on the current path; a repeat means a cycle.
    const ancestors = new WeakSet<object>();

    function redactValue(value: unknown): unknown {
        if (typeof value !== 'object' || value === null) {
            return value;
        }
        if (ancestors.has(value)) {
            return CIRCULAR_TEXT;
        }

        ancestors.add(value);
        try {
            if (Array.isArray(value)) {
                return value.map((item) => redactValue(item));
            }

            if (isPlainRecord(value)) {
                const redacted: Record<string, unknown> = {};
                for (const [key, entry] of Object.entries(value)) {
                    redacted[key] = redactSet.has(key.toLowerCase()) ? replacementText : redactValue(entry);
                }
                return redacted;
            }

            return value;
        } finally {
            ancestors.delete(value);
        }
    }

    return redactValue(payload);
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
