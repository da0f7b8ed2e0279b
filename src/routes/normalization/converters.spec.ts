import { describe, it, expect } from "vitest";

import { clamp, normalizeDegrees, parseSensorValue } from "./converters";

describe("parseSensorValue", () => {
    it("passes numbers through", () => {
        expect(parseSensorValue(3)).toBe(3);
        expect(parseSensorValue("12.5")).toBe(12.5);
        expect(parseSensorValue(" -4 ")).toBe(-4);
    });

    it("turns logger error tokens and empty cells into NaN", () => {
        expect(parseSensorValue("NAN")).toBeNaN();
        expect(parseSensorValue("\"NAN\"")).toBeNaN();
        expect(parseSensorValue("")).toBeNaN();
        expect(parseSensorValue(null)).toBeNaN();
        expect(parseSensorValue(undefined)).toBeNaN();
        expect(parseSensorValue("abc")).toBeNaN();
    });

    it("turns infinity tokens into signed infinity", () => {
        expect(parseSensorValue("INF")).toBe(Infinity);
        expect(parseSensorValue("\"inf\"")).toBe(Infinity);
        expect(parseSensorValue("-INF")).toBe(-Infinity);
    });
});

describe("angle and range helpers", () => {
    it("normalizes degrees to 0-360", () => {
        expect(normalizeDegrees(370)).toBe(10);
        expect(normalizeDegrees(-90)).toBe(270);
    });

    it("clamps", () => {
        expect(clamp(5, 0, 3)).toBe(3);
        expect(clamp(-1, 0, 3)).toBe(0);
        expect(clamp(2, 0, 3)).toBe(2);
    });
});
