import { describe, it, expect } from "vitest";

import { CodedError } from "../../errors";
import { binTimestamp, formatSeasonKey, parseSeasonKey, seasonKeys, toUtcDate } from "./TemporalBinner";

const station: [number, number] = [53.72, -125.64];

describe("binTimestamp", () => {
    it("bins by UTC month and day/night", () => {
        expect(binTimestamp("2024-06-21T20:00:00Z", station)).toEqual({ month: 6, dayNight: "Day" });
        expect(binTimestamp(Date.parse("2024-06-21T10:00:00Z"), station)).toEqual({ month: 6, dayNight: "Night" });
    });

    it("uses the UTC month at a month boundary", () => {
        // 31 July 23:30 local time is already August in UTC
        expect(binTimestamp("2024-08-01T06:30:00Z", station).month).toBe(8);
    });

    it("rejects timestamps without timezone information", () => {
        expect(() => toUtcDate("2024-06-21 20:00")).toThrow(CodedError);
        expect(() => toUtcDate("2024-02-30T25:00:00Z")).toThrow(CodedError);
    });
});

describe("season keys", () => {
    it("formats with and without the diurnal split", () => {
        expect(formatSeasonKey({ month: 7, dayNight: "Day" }, true)).toBe("7:Day");
        expect(formatSeasonKey({ month: 7, dayNight: "Day" }, false)).toBe("7");
    });

    it("parses keys back", () => {
        expect(parseSeasonKey("7:Night")).toEqual({ month: 7, dayNight: "Night" });
        expect(parseSeasonKey("3")).toEqual({ month: 3, dayNight: undefined });
    });

    it("lists every bin", () => {
        expect(seasonKeys(false)).toHaveLength(12);
        expect(seasonKeys(true)).toHaveLength(24);
        expect(seasonKeys(true).slice(0, 2)).toEqual(["1:Day", "1:Night"]);
    });
});
