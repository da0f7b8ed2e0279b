import {
    BinKey,
    FlagCode,
    FlagResult,
    IngestRecord,
    QcRecord,
    ThresholdSnapshot
} from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { BuilderOptions, StationConfig } from "../../config";
import { normalizeTimestamp } from "../normalization/TimestampNormalizer";
import { parseSensorValue } from "../normalization/converters";
import { binTimestamp, formatSeasonKey } from "./TemporalBinner";
import { FlagEvaluator } from "./FlagEvaluator";
import { countMissingTimestamps, findMissingTimestamps } from "./SeriesScanner";
import { FlaggedSample, RollingBaseline } from "./RollingBaseline";
import { buildThresholdSet, RebuildReport, ThresholdStore } from "./ThresholdStore";

function log(message: string) {
    console.log(`[QcPipeline] ${message}`);
}

function warn(message: string) {
    console.warn(`[QcPipeline] ${message}`);
}

export interface RejectedRecord {
    timestamp: string | number;
    reason: string;
}

/** A gap longer than `maxGapSlots`, left without placeholders. */
export interface UnfilledGap {
    /** ISO timestamps of the records on either side. */
    from: string;
    to: string;
    missingSlots: number;
}

export interface QcRunSummary {
    stationId: string;
    /** Length of the regular output grid. */
    gridLength: number;
    /** Grid slots synthesized because no record existed. */
    filledGaps: number;
    unfilledGaps: UnfilledGap[];
    duplicates: number;
    rejected: RejectedRecord[];
    /** Input variables without configured thresholds. */
    ignoredVariables: string[];
    flagCounts: Record<string, Record<FlagCode, number>>;
    /** Rate-of-change pairs that straddled a gap. */
    gapBoundaries: Record<string, number>;
    thresholdVersions: Record<string, number>;
    baselineAppended: number;
    rebuild?: RebuildReport;
}

export interface QcRunResult {
    records: QcRecord[];
    summary: QcRunSummary;
}

export interface QcRunOptions {
    /** Rebuild the station's thresholds from the updated baseline at the end of the run. */
    rebuild?: boolean;
    /** Builder options for that rebuild; the station's options otherwise. */
    builderOptions?: BuilderOptions;
}

/** One slot of the regular time grid; `values` is undefined for a synthesized placeholder. */
interface GridRow {
    timestamp: number;
    bin: BinKey;
    values?: IngestRecord["values"];
}

interface EvaluatedGrid {
    records: QcRecord[];
    results: Map<string, FlagResult[]>;
    gapBoundaries: Record<string, number>;
}

function emptyFlagCounts(): Record<FlagCode, number> {
    return { P: 0, LMT: 0, SPK: 0, FLT: 0, F: 0, NAN: 0, INF: 0, M: 0 };
}

interface PreparedGrid {
    rows: GridRow[];
    filledGaps: number;
    unfilledGaps: UnfilledGap[];
    duplicates: number;
    rejected: RejectedRecord[];
    inputVariables: Set<string>;
}

/**
 * Sequences a QC run for one station: timestamps to UTC, gap filling, binning, evaluation of every variable (wind
 * speed before the wind direction that depends on it) and feedback of accepted values into the rolling baseline.
 */
export class QcPipeline {
    constructor(
        private readonly store: ThresholdStore,
        private readonly baseline: RollingBaseline
    ) {}

    run(station: StationConfig, input: readonly IngestRecord[], options: QcRunOptions = {}): QcRunResult {
        this.store.initialize(station);
        const snapshot = this.store.snapshot(station.id);

        log(`Station ${station.id}: evaluating ${input.length} records`);
        const grid = this.prepareGrid(station, input, station.options.maxGapSlots);
        const evaluated = this.evaluateGrid(station, grid.rows, snapshot);
        const { records } = evaluated;

        const summary = this.summarize(station, grid, evaluated, snapshot);
        summary.baselineAppended = this.feedBaseline(station, grid.rows, evaluated);

        if (options.rebuild) {
            summary.rebuild = this.store.rebuild(station, this.baseline, options.builderOptions ?? station.options);
        }

        log(`Station ${station.id}: emitted ${records.length} records on a grid of ${grid.rows.length}, ${grid.filledGaps} gap(s) filled, ${summary.baselineAppended} value(s) added to the baseline`);
        return { records, summary };
    }

    /**
     * Creates a station's first real thresholds from an initial multi-year corpus. The corpus is first evaluated
     * against hard limits only, so values that are already known to be bad never reach the profiler.
     */
    bootstrap(station: StationConfig, corpus: readonly IngestRecord[], builderOptions: BuilderOptions = station.options): QcRunResult {
        log(`Station ${station.id}: bootstrapping thresholds from ${corpus.length} records`);

        const empty = new RollingBaseline();
        const hardOnly: ThresholdSnapshot = new Map(
            Object.entries(station.variables).map(([variable, config]) =>
                [variable, buildThresholdSet(station, variable, config, empty, builderOptions, 0)]
            )
        );

        const grid = this.prepareGrid(station, corpus, builderOptions.maxGapSlots);
        const evaluated = this.evaluateGrid(station, grid.rows, hardOnly);

        const summary = this.summarize(station, grid, evaluated, hardOnly);
        summary.baselineAppended = this.feedBaseline(station, grid.rows, evaluated);
        summary.rebuild = this.store.rebuild(station, this.baseline, builderOptions);
        return { records: evaluated.records, summary };
    }

    private prepareGrid(station: StationConfig, input: readonly IngestRecord[], maxGapSlots: number): PreparedGrid {
        const rejected: RejectedRecord[] = [];
        const inputVariables = new Set<string>();
        const normalized: { timestamp: number, values: IngestRecord["values"] }[] = [];

        // 1. Timestamps to UTC; a bad timestamp only costs its own record
        for (const record of input) {
            try {
                const date = normalizeTimestamp(record.timestamp, station);
                normalized.push({ timestamp: date.getTime(), values: record.values });
                Object.keys(record.values).forEach(v => inputVariables.add(v));
            } catch (err) {
                if (err instanceof CodedError && err.errCode === ErrorCode.InvalidTimestamp) {
                    rejected.push({ timestamp: record.timestamp, reason: err.message });
                    continue;
                }
                throw err;
            }
        }
        if (rejected.length > 0) {
            warn(`Station ${station.id}: ${rejected.length} record(s) with invalid timestamps, their slots are reported as missing`);
        }

        // 2. Chronological order, first record wins on duplicate timestamps
        normalized.sort((a, b) => a.timestamp - b.timestamp);
        let duplicates = 0;
        const unique = normalized.filter((record, i) => {
            if (i > 0 && normalized[i - 1].timestamp === record.timestamp) {
                duplicates++;
                return false;
            }
            return true;
        });
        if (duplicates > 0) {
            warn(`Station ${station.id}: dropped ${duplicates} record(s) with duplicate timestamps`);
        }

        // 3. Regular grid with placeholders for the missing slots, up to maxGapSlots per gap
        const intervalMs = station.samplingIntervalMinutes * 60000;
        const rows: GridRow[] = [];
        const unfilledGaps: UnfilledGap[] = [];
        let filledGaps = 0;
        unique.forEach((record, i) => {
            if (i > 0) {
                const prev = unique[i - 1].timestamp;
                const missingSlots = countMissingTimestamps(prev, record.timestamp, intervalMs);
                if (missingSlots > maxGapSlots) {
                    unfilledGaps.push({
                        from: new Date(prev).toISOString(),
                        to: new Date(record.timestamp).toISOString(),
                        missingSlots
                    });
                } else {
                    for (const missing of findMissingTimestamps(prev, record.timestamp, intervalMs)) {
                        rows.push({ timestamp: missing, bin: binTimestamp(missing, station.coordinates) });
                        filledGaps++;
                    }
                }
            }
            rows.push({
                timestamp: record.timestamp,
                bin: binTimestamp(record.timestamp, station.coordinates),
                values: record.values
            });
        });

        if (unfilledGaps.length > 0) {
            warn(`Station ${station.id}: ${unfilledGaps.length} gap(s) longer than ${maxGapSlots} slots left unfilled, first from ${unfilledGaps[0].from} to ${unfilledGaps[0].to}`);
        }

        return { rows, filledGaps, unfilledGaps, duplicates, rejected, inputVariables };
    }

    private evaluateGrid(
        station: StationConfig,
        rows: readonly GridRow[],
        snapshot: ThresholdSnapshot
    ): EvaluatedGrid {
        const variables = [...snapshot.keys()];
        // Wind directions depend on the resolved wind speed, so they go last
        const ordered = [
            ...variables.filter(v => snapshot.get(v)?.kind !== "windDirection"),
            ...variables.filter(v => snapshot.get(v)?.kind === "windDirection")
        ];

        const results = new Map<string, FlagResult[]>();
        const gapBoundaries: Record<string, number> = {};
        for (const variable of ordered) {
            const thresholds = snapshot.get(variable);
            const config = station.variables[variable];
            if (!thresholds || !config) {
                continue;
            }

            const pairedResults = config.pairedWith ? results.get(config.pairedWith) : undefined;
            const pairedConfig = config.pairedWith ? station.variables[config.pairedWith] : undefined;
            const evaluator = new FlagEvaluator(thresholds, {
                samplingIntervalMinutes: station.samplingIntervalMinutes,
                calmEpsilon: pairedConfig?.calmEpsilon
            });

            let boundaries = 0;
            results.set(variable, rows.map((row, i) => {
                const result = evaluator.evaluate(
                    {
                        timestamp: new Date(row.timestamp),
                        variable,
                        value: row.values ? parseSensorValue(row.values[variable]) : NaN,
                        placeholder: row.values === undefined
                    },
                    row.bin,
                    pairedResults?.[i]
                );
                if (evaluator.rateOfChange?.boundary) {
                    boundaries++;
                }
                return result;
            }));
            gapBoundaries[variable] = boundaries;
        }

        const records: QcRecord[] = [];
        rows.forEach((row, i) => {
            const timestamp = new Date(row.timestamp).toISOString();
            for (const variable of variables) {
                const result = results.get(variable)?.[i];
                const thresholds = snapshot.get(variable);
                if (!result || !thresholds) {
                    continue;
                }
                const original = row.values ? parseSensorValue(row.values[variable]) : NaN;
                records.push({
                    timestamp,
                    stationId: station.id,
                    variable,
                    value: result.value,
                    originalValue: Number.isNaN(original) ? null : original,
                    flag: result.flag,
                    action: result.action,
                    bin: formatSeasonKey(row.bin, thresholds.diurnal),
                    thresholdVersion: thresholds.version
                });
            }
        });

        return { records, results, gapBoundaries };
    }

    /** Appends every variable's accepted values to the baseline; returns how many were added. */
    private feedBaseline(station: StationConfig, rows: readonly GridRow[], evaluated: EvaluatedGrid): number {
        let appended = 0;
        for (const [variable, results] of evaluated.results) {
            appended += this.baseline.append(station.id, variable, this.acceptedSamples(rows, results));
        }
        return appended;
    }

    private acceptedSamples(rows: readonly GridRow[], results: readonly FlagResult[]): FlaggedSample[] {
        const samples: FlaggedSample[] = [];
        results.forEach((result, i) => {
            if (result.value !== null) {
                samples.push({
                    timestamp: rows[i].timestamp,
                    value: result.value,
                    dayNight: rows[i].bin.dayNight,
                    flag: result.flag
                });
            }
        });
        return samples;
    }

    private summarize(station: StationConfig, grid: PreparedGrid, evaluated: EvaluatedGrid, snapshot: ThresholdSnapshot): QcRunSummary {
        const flagCounts: Record<string, Record<FlagCode, number>> = {};
        const thresholdVersions: Record<string, number> = {};
        for (const [variable, set] of snapshot) {
            flagCounts[variable] = emptyFlagCounts();
            thresholdVersions[variable] = set.version;
        }
        for (const record of evaluated.records) {
            flagCounts[record.variable][record.flag]++;
        }

        const ignoredVariables = [...grid.inputVariables].filter(v => !snapshot.has(v));
        if (ignoredVariables.length > 0) {
            warn(`Station ${station.id}: no thresholds for ${ignoredVariables.join(", ")}, not evaluated`);
        }

        return {
            stationId: station.id,
            gridLength: grid.rows.length,
            filledGaps: grid.filledGaps,
            unfilledGaps: grid.unfilledGaps,
            duplicates: grid.duplicates,
            rejected: grid.rejected,
            ignoredVariables,
            flagCounts,
            gapBoundaries: evaluated.gapBoundaries,
            thresholdVersions,
            baselineAppended: 0
        };
    }
}
