import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { RollingBaseline } from "../qaqc/RollingBaseline";
import { FileStateRepository } from "./StateRepository";

describe("FileStateRepository", () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "station-qc-"));
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it("starts empty when nothing was persisted", () => {
        const repository = new FileStateRepository(dir);
        expect(repository.loadStations()).toEqual([]);
        expect(repository.loadThresholds().has("s1")).toBe(false);
        expect(repository.loadBaseline().variables("s1")).toEqual([]);
    });

    it("reads and validates stations.json", () => {
        fs.writeFileSync(path.join(dir, "stations.json"), JSON.stringify([
            { id: "s1", coordinates: [53.72, -125.64], variables: { AirT_C_Avg: {} } }
        ]));
        const stations = new FileStateRepository(dir).loadStations();
        expect(stations.map(s => s.id)).toEqual(["s1"]);
        expect(stations[0].variables.AirT_C_Avg.hardMax).toBe(60);
    });

    it("persists thresholds and baseline", () => {
        const nested = path.join(dir, "nested");
        const repository = new FileStateRepository(nested);

        fs.writeFileSync(path.join(dir, "stations.json"), JSON.stringify([
            { id: "s1", coordinates: [53.72, -125.64], variables: { AirT_C_Avg: {} } }
        ]));
        const [s1] = new FileStateRepository(dir).loadStations();

        const thresholds = repository.loadThresholds();
        thresholds.initialize(s1);
        const baseline = new RollingBaseline();
        baseline.append("s1", "AirT_C_Avg", [{ timestamp: Date.UTC(2024, 6, 1), value: 12, dayNight: "Day", flag: "P" }]);

        repository.saveThresholds(thresholds);
        repository.saveBaseline(baseline);

        expect(fs.existsSync(path.join(nested, "thresholds.json"))).toBe(true);
        expect(fs.existsSync(path.join(nested, "thresholds.json.tmp"))).toBe(false);
        expect(repository.loadThresholds().current("s1", "AirT_C_Avg")?.version).toBe(1);
        expect(repository.loadBaseline().samples("s1", "AirT_C_Avg").map(s => s.value)).toEqual([12]);
    });
});
