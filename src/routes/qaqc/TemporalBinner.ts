import { parseISO, isValid } from "date-fns";

import { BinKey, DayNight, GeoCoordinates } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { classifyDayNight } from "./SolarClassifier";

const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Accepts a UTC-normalized timestamp and returns it as a Date.
 *
 * Strings must carry `Z` or an explicit offset: a bare local clock time would shift the day/night boundary by the
 * station's UTC offset, so it is rejected rather than guessed.
 */
export function toUtcDate(timestamp: Date | number | string): Date {
    let date: Date;
    if (timestamp instanceof Date) {
        date = timestamp;
    } else if (typeof timestamp === "number") {
        date = new Date(timestamp);
    } else {
        const trimmed = timestamp.trim();
        if (!ZONE_DESIGNATOR.test(trimmed)) {
            throw new CodedError(ErrorCode.InvalidTimestamp, `Timestamp has no timezone information: "${timestamp}"`);
        }
        date = parseISO(trimmed);
    }

    if (!isValid(date)) {
        throw new CodedError(ErrorCode.InvalidTimestamp, `Unparseable timestamp: "${String(timestamp)}"`);
    }
    return date;
}

/** Assigns a UTC timestamp to its (month, day/night) bin. */
export function binTimestamp(timestamp: Date | number | string, coordinates: GeoCoordinates): BinKey {
    const date = toUtcDate(timestamp);
    return {
        month: date.getUTCMonth() + 1,
        dayNight: classifyDayNight(date, coordinates)
    };
}

/**
 * Key of the seasonal limits a bin resolves to: `"7:Day"` with the diurnal split, `"7"` without it.
 */
export function formatSeasonKey(bin: BinKey, diurnal: boolean): string {
    return diurnal ? `${bin.month}:${bin.dayNight}` : `${bin.month}`;
}

export function parseSeasonKey(key: string): { month: number, dayNight?: DayNight } {
    const [month, dayNight] = key.split(":");
    return {
        month: Number(month),
        dayNight: dayNight === "Day" || dayNight === "Night" ? dayNight : undefined
    };
}

/** All 12 (or 24 with the diurnal split) season keys of a variable. */
export function seasonKeys(diurnal: boolean): string[] {
    const keys: string[] = [];
    for (let month = 1; month <= 12; month++) {
        if (diurnal) {
            keys.push(`${month}:Day`, `${month}:Night`);
        } else {
            keys.push(`${month}`);
        }
    }
    return keys;
}
