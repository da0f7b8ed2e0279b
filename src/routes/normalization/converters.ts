/**
 * Value conversion utilities for sensor data normalization
 */

/**
 * Sensor values
 */

/** Tokens data loggers write when a sensor reading failed. */
const NAN_TOKENS = new Set(["NAN", "NA", "NULL", ""]);
const POSITIVE_INF_TOKENS = new Set(["INF", "+INF", "INFINITY", "+INFINITY"]);
const NEGATIVE_INF_TOKENS = new Set(["-INF", "-INFINITY"]);

/**
 * Converts a raw logger cell into a number. Missing or failed readings become NaN and the logger's
 * infinity tokens become ±Infinity, so the flag evaluator can classify them.
 */
export function parseSensorValue(raw: number | string | null | undefined): number {
    if (raw === null || raw === undefined) return NaN;
    if (typeof raw === "number") return raw;

    const token = raw.trim().replace(/^"|"$/g, "").toUpperCase();
    if (NAN_TOKENS.has(token)) return NaN;
    if (POSITIVE_INF_TOKENS.has(token)) return Infinity;
    if (NEGATIVE_INF_TOKENS.has(token)) return -Infinity;

    const value = Number(token);
    return Number.isNaN(value) ? NaN : value;
}

/**
 * Angle conversions
 */

export function degreesToRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
}

export function radiansToDegrees(radians: number): number {
    return radians * (180 / Math.PI);
}

/**
 * Normalize an angle to the 0-360 range
 */
export function normalizeDegrees(degrees: number): number {
    let normalized = degrees % 360;
    if (normalized < 0) normalized += 360;
    return normalized;
}

/**
 * Utility: Clamp value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}
