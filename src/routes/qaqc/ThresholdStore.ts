import { SeasonalLimit, ThresholdSet, ThresholdSnapshot } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { BuilderOptions, StationConfig, VariableConfig } from "../../config";
import { RollingBaseline } from "./RollingBaseline";
import { profileBin, maxRateOfChange } from "./PercentileProfiler";
import { formatSeasonKey, parseSeasonKey, seasonKeys } from "./TemporalBinner";
import { validateThresholdSet } from "./ThresholdSetValidator";

function log(message: string) {
    console.log(`[ThresholdStore] ${message}`);
}

function warn(message: string) {
    console.warn(`[ThresholdStore] ${message}`);
}

export interface RebuildReport {
    stationId: string;
    /** Active version per variable after the rebuild. */
    versions: Record<string, number>;
    warnings: string[];
}

export type SerializedThresholds = Record<string, Record<string, ThresholdSet[]>>;

/**
 * Builds the ThresholdSet of one variable from its baseline window. Bins with too few samples fall back to the hard
 * limits and are listed in `insufficientBins`.
 */
export function buildThresholdSet(
    station: StationConfig,
    variable: string,
    config: VariableConfig,
    baseline: RollingBaseline,
    options: BuilderOptions,
    version: number
): ThresholdSet {
    const samples = baseline.window(station.id, variable, options.rollingWindowYears);

    // 1. Group the window by season key
    const byBin = new Map<string, number[]>();
    for (const sample of samples) {
        const month = new Date(sample.timestamp).getUTCMonth() + 1;
        const key = formatSeasonKey({ month, dayNight: sample.dayNight }, config.diurnal);
        const values = byBin.get(key);
        if (values) {
            values.push(sample.value);
        } else {
            byBin.set(key, [sample.value]);
        }
    }

    // 2. Profile every bin
    const seasonal: Record<string, SeasonalLimit> = {};
    const insufficientBins: string[] = [];
    for (const key of seasonKeys(config.diurnal)) {
        const profile = profileBin(byBin.get(key) ?? [], {
            percentilePair: options.percentilePair,
            minBinSampleSize: options.minBinSampleSize,
            hardMin: config.hardMin,
            hardMax: config.hardMax
        });
        if (!profile.ok) {
            insufficientBins.push(key);
        }
        seasonal[key] = applySeasonalOverrides(key, profile.limits, config);
    }

    // 3. Rate limit: configured, else the profiled maximum
    let rateLimit = config.rateLimit;
    if (rateLimit === undefined && samples.length >= options.minBinSampleSize) {
        const profiled = maxRateOfChange(samples, {
            timestepMinutes: station.samplingIntervalMinutes,
            samplingIntervalMinutes: station.samplingIntervalMinutes,
            trimPercentile: options.rateOfChangePercentile
        });
        rateLimit = profiled !== undefined && profiled > 0 ? profiled : undefined;
    }

    return {
        stationId: station.id,
        variable,
        kind: config.kind,
        version,
        createdAt: new Date().toISOString(),
        hardMin: config.hardMin,
        hardMax: config.hardMax,
        seasonal,
        rateLimit,
        timestepMinutes: station.samplingIntervalMinutes,
        flatlineWindowMinutes: config.flatline ? config.flatlineWindowMinutes ?? options.flatlineWindowMinutes : undefined,
        flatlineEpsilon: config.flatlineEpsilon ?? options.flatlineEpsilon,
        gapPolicy: options.gapPolicy,
        nightMax: config.nightMax,
        diurnal: config.diurnal,
        insufficientBins
    };
}

/** The last override naming the bin's month replaces the profiled limits. */
function applySeasonalOverrides(key: string, limits: SeasonalLimit, config: VariableConfig): SeasonalLimit {
    const { month } = parseSeasonKey(key);
    const override = config.seasonalOverrides.filter(o => o.months.includes(month)).pop();
    return override ? { softMin: override.softMin, softMax: override.softMax } : limits;
}

function freezeSet(set: ThresholdSet): ThresholdSet {
    for (const limit of Object.values(set.seasonal)) {
        Object.freeze(limit);
    }
    Object.freeze(set.seasonal);
    Object.freeze(set.insufficientBins);
    return Object.freeze(set);
}

/**
 * Holds the versioned ThresholdSets of every station.
 *
 * Sets are frozen once activated. A station's active sets are replaced as a whole, so a run that pinned a
 * snapshot keeps seeing the complete old version while a rebuild activates the new one.
 */
export class ThresholdStore {
    private readonly active = new Map<string, ThresholdSnapshot>();
    private readonly history = new Map<string, Map<string, ThresholdSet[]>>();

    /**
     * The ThresholdSets a run should use for this station.
     * @throws CodedError(UnknownStation) if the station has no active thresholds
     */
    snapshot(stationId: string): ThresholdSnapshot {
        const snapshot = this.active.get(stationId);
        if (!snapshot) {
            throw new CodedError(ErrorCode.UnknownStation, `No thresholds for station ${stationId}`);
        }
        return snapshot;
    }

    has(stationId: string): boolean {
        return this.active.has(stationId);
    }

    current(stationId: string, variable: string): ThresholdSet | undefined {
        return this.active.get(stationId)?.get(variable);
    }

    versions(stationId: string, variable: string): readonly ThresholdSet[] {
        return this.history.get(stationId)?.get(variable) ?? [];
    }

    /**
     * Validates and activates a complete set of thresholds for a station. If any set violates an invariant nothing is
     * activated and the previously active versions stay in place.
     *
     * @returns Warnings collected during validation
     * @throws CodedError(MalformedThresholdSet) listing every violated invariant
     */
    activate(stationId: string, sets: readonly ThresholdSet[]): string[] {
        const errors: string[] = [];
        const warnings: string[] = [];

        for (const set of sets) {
            if (set.stationId !== stationId) {
                errors.push(`${set.stationId}/${set.variable}: belongs to another station than ${stationId}`);
                continue;
            }
            const result = validateThresholdSet(set);
            errors.push(...result.errors);
            warnings.push(...result.warnings);
        }

        if (errors.length > 0) {
            errors.forEach(e => warn(e));
            throw new CodedError(
                ErrorCode.MalformedThresholdSet,
                `Refusing to activate thresholds for station ${stationId}: ${errors.length} invariant violation(s)`,
                errors
            );
        }

        const next = new Map(this.active.get(stationId) ?? []);
        let stationHistory = this.history.get(stationId);
        if (!stationHistory) {
            stationHistory = new Map();
            this.history.set(stationId, stationHistory);
        }

        for (const set of sets) {
            const frozen = freezeSet({ ...set, seasonal: { ...set.seasonal }, insufficientBins: [...set.insufficientBins] });
            next.set(set.variable, frozen);
            const versions = stationHistory.get(set.variable) ?? [];
            stationHistory.set(set.variable, [...versions, frozen]);
        }

        this.active.set(stationId, next);
        log(`Activated ${sets.length} threshold set(s) for station ${stationId}`);
        return warnings;
    }

    /**
     * Hard-limit-only thresholds for every configured variable that has none yet, e.g. a new station or a variable
     * added to its configuration since the last rebuild. Variables with active thresholds keep them.
     */
    initialize(station: StationConfig): void {
        const empty = new RollingBaseline();
        const sets = Object.entries(station.variables)
            .filter(([variable]) => !this.current(station.id, variable))
            .map(([variable, config]) => buildThresholdSet(station, variable, config, empty, station.options, 1));
        if (sets.length > 0) {
            this.activate(station.id, sets);
        }
    }

    /**
     * Threshold-Rebuild entry point: profiles every configured variable over its baseline window and activates the
     * result as the next version.
     */
    rebuild(station: StationConfig, baseline: RollingBaseline, options: BuilderOptions = station.options): RebuildReport {
        log(`Rebuilding thresholds for station ${station.id} (${options.percentilePair[0]}/${options.percentilePair[1]} percentiles, ${options.rollingWindowYears} year window)`);

        const sets = Object.entries(station.variables).map(([variable, config]) => {
            const version = (this.current(station.id, variable)?.version ?? 0) + 1;
            return buildThresholdSet(station, variable, config, baseline, options, version);
        });

        const warnings = this.activate(station.id, sets);
        warnings.forEach(w => warn(w));

        return {
            stationId: station.id,
            versions: Object.fromEntries(sets.map(s => [s.variable, s.version])),
            warnings
        };
    }

    toJSON(): SerializedThresholds {
        const out: SerializedThresholds = {};
        for (const [stationId, variables] of this.history) {
            out[stationId] = Object.fromEntries(variables);
        }
        return out;
    }

    /**
     * Restores persisted versions. Every version is validated again; the newest one of each variable becomes active.
     */
    static fromJSON(data: SerializedThresholds): ThresholdStore {
        const store = new ThresholdStore();
        for (const [stationId, variables] of Object.entries(data)) {
            const maxVersions = Math.max(0, ...Object.values(variables).map(v => v.length));
            for (let i = 0; i < maxVersions; i++) {
                const sets = Object.values(variables)
                    .map(versions => versions[i])
                    .filter((set): set is ThresholdSet => set !== undefined);
                store.activate(stationId, sets);
            }
        }
        return store;
    }
}
