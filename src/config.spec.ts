import { describe, it, expect } from "vitest";

import { CodedError, ErrorCode } from "./errors";
import { DEFAULT_BUILDER_OPTIONS, loadServerSettings, parseBuilderOptions, parseStationConfigs } from "./config";

const base = { id: "s1", coordinates: [53.72, -125.64] };

function configError(fn: () => unknown): CodedError {
    try {
        fn();
    } catch (err) {
        if (err instanceof CodedError) {
            return err;
        }
        throw err;
    }
    throw new Error("expected a CodedError");
}

describe("parseStationConfigs", () => {
    it("applies the defaults of the shipped table", () => {
        const [station] = parseStationConfigs([{ ...base, variables: { AirT_C_Avg: {} } }]);
        expect(station.samplingIntervalMinutes).toBe(15);
        expect(station.options).toEqual(DEFAULT_BUILDER_OPTIONS);
        expect(station.variables.AirT_C_Avg).toEqual({
            kind: "generic",
            hardMin: -50,
            hardMax: 60,
            rateLimit: 5,
            flatline: true,
            flatlineWindowMinutes: undefined,
            flatlineEpsilon: undefined,
            nightMax: undefined,
            diurnal: false,
            pairedWith: undefined,
            calmEpsilon: 0,
            seasonalOverrides: []
        });
    });

    it("configures radiation with the diurnal split and no flatline check", () => {
        const [station] = parseStationConfigs([{ ...base, variables: { SWin_Avg: {} } }]);
        expect(station.variables.SWin_Avg).toMatchObject({ kind: "radiation", diurnal: true, nightMax: 5, flatline: false });
    });

    it("lets the station override the defaults", () => {
        const [station] = parseStationConfigs([{
            ...base,
            options: { flatlineWindowMinutes: 120 },
            variables: { RH: { hardMax: 105, flatlineEpsilon: 0.1 } }
        }]);
        expect(station.variables.RH).toMatchObject({ hardMin: 0, hardMax: 105, flatlineEpsilon: 0.1 });
        expect(station.variables.RH.flatlineWindowMinutes).toBeUndefined();
        expect(station.options.flatlineWindowMinutes).toBe(120);
    });

    it("rejects hard limits in the wrong order", () => {
        const err = configError(() => parseStationConfigs([{ ...base, variables: { Foo: { hardMin: 10, hardMax: 0 } } }]));
        expect(err.errCode).toBe(ErrorCode.InvalidConfiguration);
        expect(err.message).toBe("Station s1: variable Foo has hardMin 10 above hardMax 0");
    });

    it("rejects a seasonal override with its limits in the wrong order", () => {
        const err = configError(() => parseStationConfigs([{
            ...base,
            variables: { RH: { seasonalOverrides: [{ months: [7], softMin: 10, softMax: 0 }] } }
        }]));
        expect(err.errCode).toBe(ErrorCode.InvalidConfiguration);
        expect(err.message).toBe("Invalid station configuration");
        expect(err.details).toEqual(["0.variables.RH.seasonalOverrides.0: softMin must not exceed softMax"]);
    });

    it("rejects a seasonal override outside the hard limits", () => {
        const err = configError(() => parseStationConfigs([{
            ...base,
            variables: { RH: { seasonalOverrides: [{ months: [7], softMin: 0, softMax: 150 }] } }
        }]));
        expect(err.message).toBe("Station s1: variable RH has a seasonal override [0, 150] outside its hard limits [0, 100]");
    });

    it("rejects a night ceiling outside the hard limits", () => {
        const err = configError(() => parseStationConfigs([{ ...base, variables: { SWin_Avg: { nightMax: 2000 } } }]));
        expect(err.message).toBe("Station s1: variable SWin_Avg has nightMax 2000 outside its hard limits [0, 1350]");
    });

    it("requires hard limits for unknown variables", () => {
        const err = configError(() => parseStationConfigs([{ ...base, variables: { Foo: {} } }]));
        expect(err.errCode).toBe(ErrorCode.InvalidConfiguration);
        expect(err.message).toBe("Station s1: variable Foo has no hard limits and none are known by default");
    });

    it("requires the paired wind speed of a wind direction", () => {
        const err = configError(() => parseStationConfigs([{ ...base, variables: { WindDir: {} } }]));
        expect(err.message).toBe("Station s1: WindDir is paired with WS_ms_Avg, which is not a configured wind speed");
    });

    it("rejects duplicate station ids", () => {
        const station = { ...base, variables: {} };
        expect(configError(() => parseStationConfigs([station, station])).message).toBe("Duplicate station id: s1");
    });

    it("lists schema problems in the error details", () => {
        const err = configError(() => parseStationConfigs([{ ...base, coordinates: [100, 0], variables: {} }]));
        expect(err.message).toBe("Invalid station configuration");
        expect(err.details).toHaveLength(1);
        expect(err.details[0].startsWith("0.coordinates.0:")).toBe(true);
    });
});

describe("parseBuilderOptions", () => {
    it("fills in the defaults", () => {
        expect(parseBuilderOptions({ percentilePair: [5, 95] })).toEqual({ ...DEFAULT_BUILDER_OPTIONS, percentilePair: [5, 95] });
        expect(parseBuilderOptions(undefined)).toEqual(DEFAULT_BUILDER_OPTIONS);
    });

    it("rejects a percentile pair in the wrong order", () => {
        expect(configError(() => parseBuilderOptions({ percentilePair: [60, 99] })).errCode).toBe(ErrorCode.InvalidConfiguration);
        expect(configError(() => parseBuilderOptions({ gapPolicy: "interpolate" })).errCode).toBe(ErrorCode.InvalidConfiguration);
    });

    it("caps grid filling at 2880 slots unless told otherwise", () => {
        expect(DEFAULT_BUILDER_OPTIONS.maxGapSlots).toBe(2880);
        expect(parseBuilderOptions({ maxGapSlots: 4 }).maxGapSlots).toBe(4);
        expect(configError(() => parseBuilderOptions({ maxGapSlots: -1 })).errCode).toBe(ErrorCode.InvalidConfiguration);
    });
});

describe("loadServerSettings", () => {
    it("reads the environment", () => {
        expect(loadServerSettings({ PORT: "8080", HOST: "127.0.0.1", PERSISTENCE_LOCATION: "/tmp/qc" }))
            .toEqual({ port: 8080, host: "127.0.0.1", persistenceLocation: "/tmp/qc" });
    });

    it("falls back to the defaults", () => {
        const settings = loadServerSettings({});
        expect(settings.port).toBe(3000);
        expect(settings.host).toBe("0.0.0.0");
        expect(settings.persistenceLocation.endsWith("data")).toBe(true);
    });
});
