import { describe, it, expect } from "vitest";

import { ErrorCode } from "../../errors";
import { BaselineSample } from "../../types";
import { maxRateOfChange, percentile, profileBin } from "./PercentileProfiler";

const range = (from: number, to: number): number[] => Array.from({ length: to - from + 1 }, (_, i) => from + i);

describe("percentile", () => {
    it("interpolates linearly between the closest ranks", () => {
        expect(percentile([1, 2, 3, 4, 5], 50)).toBe(3);
        expect(percentile([1, 2, 3, 4, 5], 25)).toBe(2);
        expect(percentile([1, 2, 3, 4, 5], 10)).toBeCloseTo(1.4);
        expect(percentile([7], 99)).toBe(7);
        expect(percentile([], 50)).toBeNaN();
    });
});

describe("profileBin", () => {
    const options = { percentilePair: [1, 99] as const, minBinSampleSize: 30, hardMin: 0, hardMax: 1000 };

    it("derives the soft band from the percentile pair", () => {
        const profile = profileBin(range(1, 100), options);
        expect(profile.ok).toBe(true);
        expect(profile.sampleSize).toBe(100);
        expect(profile.limits.softMin).toBeCloseTo(1.99);
        expect(profile.limits.softMax).toBeCloseTo(99.01);
    });

    it("narrows the band monotonically as the percentiles move inward", () => {
        const values = range(1, 100).map(v => (v * 37) % 101);
        const wide = profileBin(values, options).limits;
        const narrow = profileBin(values, { ...options, percentilePair: [5, 95] }).limits;
        expect(narrow.softMin).toBeGreaterThanOrEqual(wide.softMin);
        expect(narrow.softMax).toBeLessThanOrEqual(wide.softMax);
    });

    it("clamps the band to the hard limits", () => {
        const profile = profileBin(range(1, 100), { ...options, hardMin: 5, hardMax: 50 });
        expect(profile.limits).toEqual({ softMin: 5, softMax: 50 });
    });

    it("falls back to the hard limits when the bin is too small", () => {
        const profile = profileBin(range(1, 10), options);
        expect(profile.ok).toBe(false);
        expect(profile.limits).toEqual({ softMin: 0, softMax: 1000 });
        if (!profile.ok) {
            expect(profile.error.errCode).toBe(ErrorCode.InsufficientHistory);
        }
    });

    it("ignores values that are not finite", () => {
        const profile = profileBin([NaN, Infinity, ...range(1, 30)], options);
        expect(profile.ok).toBe(true);
        expect(profile.sampleSize).toBe(30);
    });
});

describe("maxRateOfChange", () => {
    const start = Date.UTC(2024, 6, 1);
    const at = (minutes: number, value: number): BaselineSample => ({ timestamp: start + minutes * 60000, value, dayNight: "Day" });
    const samples = [at(0, 0), at(15, 1), at(30, 3), at(45, 4), at(105, 100)];

    it("takes the largest step between adjacent samples and skips gaps", () => {
        expect(maxRateOfChange(samples, { timestepMinutes: 15, samplingIntervalMinutes: 15 })).toBe(2);
    });

    it("normalizes to the timestep", () => {
        expect(maxRateOfChange(samples, { timestepMinutes: 60, samplingIntervalMinutes: 15 })).toBe(8);
    });

    it("can trim to a percentile of the steps", () => {
        expect(maxRateOfChange(samples, { timestepMinutes: 15, samplingIntervalMinutes: 15, trimPercentile: 50 })).toBe(1);
    });

    it("returns undefined without adjacent samples", () => {
        expect(maxRateOfChange([at(0, 1)], { timestepMinutes: 15, samplingIntervalMinutes: 15 })).toBeUndefined();
    });
});
