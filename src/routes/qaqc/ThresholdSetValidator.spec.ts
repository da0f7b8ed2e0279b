import { describe, it, expect } from "vitest";

import { SeasonalLimit, ThresholdSet } from "../../types";
import { seasonKeys } from "./TemporalBinner";
import { validateThresholdSet } from "./ThresholdSetValidator";

function makeSet(overrides: Partial<ThresholdSet> = {}): ThresholdSet {
    const seasonal: Record<string, SeasonalLimit> = {};
    for (const key of seasonKeys(false)) {
        seasonal[key] = { softMin: 0, softMax: 10 };
    }
    return {
        stationId: "s",
        variable: "v",
        kind: "generic",
        version: 1,
        createdAt: "2024-01-01T00:00:00.000Z",
        hardMin: -10,
        hardMax: 20,
        seasonal,
        rateLimit: 5,
        timestepMinutes: 15,
        flatlineWindowMinutes: 360,
        flatlineEpsilon: 0,
        gapPolicy: "skip",
        diurnal: false,
        insufficientBins: [],
        ...overrides
    };
}

describe("validateThresholdSet", () => {
    it("accepts a well formed set", () => {
        expect(validateThresholdSet(makeSet())).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it("rejects a soft band that is not inside the hard band", () => {
        const set = makeSet();
        const result = validateThresholdSet(makeSet({ seasonal: { ...set.seasonal, "7": { softMin: 15, softMax: 10 } } }));
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(["s/v: bin 7: expected -10 ≤ 15 ≤ 10 ≤ 20"]);
    });

    it("rejects a missing bin", () => {
        const { "3": _dropped, ...seasonal } = makeSet().seasonal;
        expect(validateThresholdSet(makeSet({ seasonal })).errors).toEqual(["s/v: bin 3: seasonal limits missing"]);
    });

    it("rejects a night ceiling on a variable that is not radiation", () => {
        const result = validateThresholdSet(makeSet({ nightMax: 5 }));
        expect(result.errors).toEqual(["s/v: night_max is only allowed for radiation variables"]);
    });

    it("rejects non-positive rate limits", () => {
        expect(validateThresholdSet(makeSet({ rateLimit: 0 })).errors).toEqual(["s/v: rate limit must be positive (0)"]);
    });

    it("warns about bins without enough history", () => {
        const result = validateThresholdSet(makeSet({ insufficientBins: ["1", "2"] }));
        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual(["s/v: 2 bin(s) use hard limits (insufficient history): 1, 2"]);
    });
});
