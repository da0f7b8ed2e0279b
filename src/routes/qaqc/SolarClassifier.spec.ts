import { describe, it, expect } from "vitest";

import { classifyDayNight, solarPosition } from "./SolarClassifier";

describe("solarPosition", () => {
    it("puts the sun near the zenith at the equator on the equinox at noon", () => {
        const position = solarPosition(new Date("2024-03-20T12:00:00Z"), [0, 0]);
        expect(position.elevation).toBeGreaterThan(85);
        expect(Math.abs(position.declination)).toBeLessThan(1);
        expect(position.isDay).toBe(true);
    });

    it("puts the sun below the horizon at midnight", () => {
        const position = solarPosition(new Date("2024-03-20T00:00:00Z"), [0, 0]);
        expect(position.elevation).toBeLessThan(-60);
        expect(position.isDay).toBe(false);
    });

    it("gives a northern summer declination near the solstice", () => {
        const position = solarPosition(new Date("2024-06-21T12:00:00Z"), [0, 0]);
        expect(position.declination).toBeGreaterThan(23);
        expect(position.declination).toBeLessThan(23.5);
    });
});

describe("classifyDayNight", () => {
    const station: [number, number] = [53.72, -125.64];

    it("classifies a summer afternoon in British Columbia as day", () => {
        expect(classifyDayNight(new Date("2024-06-21T20:00:00Z"), station)).toBe("Day");
    });

    it("classifies the small hours as night", () => {
        expect(classifyDayNight(new Date("2024-06-21T10:00:00Z"), station)).toBe("Night");
    });

    it("is deterministic", () => {
        const date = new Date("2024-11-02T16:45:00Z");
        expect(solarPosition(date, station)).toEqual(solarPosition(date, station));
    });
});
