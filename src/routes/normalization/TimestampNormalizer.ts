import { find as findTimezones } from "geo-tz";
import { TZDate } from "@date-fns/tz";
import { parseISO, isValid } from "date-fns";

import { GeoCoordinates } from "../../types";
import { CodedError, ErrorCode } from "../../errors";

/**
 * How a station's logger clock relates to UTC.
 */
export interface StationClock {
    coordinates: GeoCoordinates;
    /** IANA timezone (e.g. "America/Vancouver"). */
    timezone?: string;
    /**
     * Fixed offset of the logger clock from UTC, in minutes (e.g. -420 for a logger kept on PDT all year).
     * Takes precedence over `timezone` because loggers usually do not follow daylight saving time.
     */
    utcOffsetMinutes?: number;
}

const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const NAIVE_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/;

const timezoneCache = new Map<string, string>();

/**
 * Resolves the timezone of a station: the configured one, otherwise the one found for its coordinates.
 */
export function resolveTimezone(clock: StationClock): string {
    if (clock.timezone) {
        return clock.timezone;
    }

    const cacheKey = clock.coordinates.join(",");
    const cached = timezoneCache.get(cacheKey);
    if (cached) {
        return cached;
    }

    const timezone = findTimezones(clock.coordinates[0], clock.coordinates[1])[0] ?? "UTC";
    timezoneCache.set(cacheKey, timezone);
    return timezone;
}

/**
 * Normalizes a timestamp as delivered by ingestion into a UTC instant.
 *
 * @param raw - ISO string with or without offset, "YYYY-MM-DD HH:mm[:ss]" logger time, or Unix epoch seconds
 * @param clock - Station clock settings used for timestamps without an offset
 * @throws CodedError(InvalidTimestamp) if the timestamp cannot be parsed
 */
export function normalizeTimestamp(raw: string | number, clock: StationClock): Date {
    if (typeof raw === "number") {
        const date = new Date(raw * 1000);
        if (!Number.isFinite(raw) || !isValid(date)) {
            throw new CodedError(ErrorCode.InvalidTimestamp, `Invalid epoch timestamp: ${raw}`);
        }
        return date;
    }

    const text = raw.trim().replace(/^"|"$/g, "");

    // 1. Timestamps that carry their own offset need no station context
    if (OFFSET_SUFFIX.test(text) && /\d[T ]\d/.test(text)) {
        const date = parseISO(text);
        if (!isValid(date)) {
            throw new CodedError(ErrorCode.InvalidTimestamp, `Unparseable timestamp: "${raw}"`);
        }
        return date;
    }

    // 2. Logger clock time, read in the station's clock
    const match = NAIVE_DATE_TIME.exec(text);
    if (!match) {
        throw new CodedError(ErrorCode.InvalidTimestamp, `Unparseable timestamp: "${raw}"`);
    }

    const [year, month, day, hours, minutes, seconds, millis] = match.slice(1).map(part => part === undefined ? 0 : Number(part));
    // Date.UTC rolls 30 February over into March; the calendar date must survive the round trip
    const calendar = new Date(Date.UTC(year, month - 1, day));
    if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day ||
        hours > 23 || minutes > 59 || seconds > 59) {
        throw new CodedError(ErrorCode.InvalidTimestamp, `Timestamp out of range: "${raw}"`);
    }

    let date: Date;
    if (clock.utcOffsetMinutes !== undefined) {
        date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis) - clock.utcOffsetMinutes * 60000);
    } else {
        const local = new TZDate(year, month - 1, day, hours, minutes, seconds, millis, resolveTimezone(clock));
        date = new Date(local.getTime());
    }

    if (!isValid(date)) {
        throw new CodedError(ErrorCode.InvalidTimestamp, `Unparseable timestamp: "${raw}"`);
    }
    return date;
}
