import Decimal from 'decimal.js';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a wire number (string or number) into an exact Decimal.
 * Strings keep every digit the venue sent; numbers go through their shortest string form.
 */
export function toDecimal(value: unknown): Decimal | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'number') {
        return Number.isFinite(value) ? new Decimal(String(value)) : undefined;
    }
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    if (!trimmed || !NUMERIC_PATTERN.test(trimmed)) return undefined;
    return new Decimal(trimmed);
}

// Пороговые значения: всё, что больше, считается более мелкой единицей.
const NS_THRESHOLD = 1e17;
const US_THRESHOLD = 1e14;
const MS_THRESHOLD = 1e11;

/**
 * Normalizes a timestamp in seconds, milliseconds, microseconds or nanoseconds to unix ms.
 */
export function toEpochMs(value: unknown): number | undefined {
    if (typeof value === 'string') {
        const trimmed = value.trim();
        if (!/^\d+(\.\d+)?$/.test(trimmed)) return undefined;
        // nanosecond strings exceed 2^53; divide as bigint to keep the ms digits exact
        if (/^\d{18,}$/.test(trimmed)) {
            return Number(BigInt(trimmed) / 1_000_000n);
        }
        return toEpochMs(Number(trimmed));
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) return undefined;
    if (value >= NS_THRESHOLD) return Math.floor(value / 1e6);
    if (value >= US_THRESHOLD) return Math.floor(value / 1e3);
    if (value >= MS_THRESHOLD) return Math.floor(value);
    return Math.floor(value * 1000);
}

export function toOptionalInt(value: unknown): number | undefined {
    if (value === undefined || value === null || value === '') return undefined;
    const num = typeof value === 'number' ? value : Number(value);
    return Number.isSafeInteger(num) ? num : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
