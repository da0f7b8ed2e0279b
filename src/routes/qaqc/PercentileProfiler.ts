import { BaselineSample, SeasonalLimit } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { clamp } from "../normalization/converters";

export interface BinProfileOptions {
    /** Lower and upper percentile, in percent (e.g. [1, 99]). */
    percentilePair: readonly [number, number];
    minBinSampleSize: number;
    hardMin: number;
    hardMax: number;
}

/**
 * Result of profiling one bin. An insufficient sample is not thrown: the bin falls back to the hard limits and the
 * caller decides how to report the `InsufficientHistory` error.
 */
export type BinProfile =
    | { ok: true, limits: SeasonalLimit, sampleSize: number }
    | { ok: false, limits: SeasonalLimit, sampleSize: number, error: CodedError };

/**
 * Percentile of an ascending sorted sample, linearly interpolated between the closest ranks.
 */
export function percentile(sorted: readonly number[], p: number): number {
    if (sorted.length === 0) {
        return NaN;
    }
    const rank = (clamp(p, 0, 100) / 100) * (sorted.length - 1);
    const lower = Math.floor(rank);
    const upper = Math.ceil(rank);
    if (lower === upper) {
        return sorted[lower];
    }
    return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

/**
 * Derives the soft band of one bin from its accepted historical values.
 */
export function profileBin(values: readonly number[], options: BinProfileOptions): BinProfile {
    const { hardMin, hardMax } = options;
    const finite = values.filter(v => Number.isFinite(v));

    if (finite.length < options.minBinSampleSize) {
        return {
            ok: false,
            limits: { softMin: hardMin, softMax: hardMax },
            sampleSize: finite.length,
            error: new CodedError(
                ErrorCode.InsufficientHistory,
                `Only ${finite.length} samples, at least ${options.minBinSampleSize} required`
            )
        };
    }

    const sorted = [...finite].sort((a, b) => a - b);
    const [low, high] = options.percentilePair;

    return {
        ok: true,
        limits: {
            softMin: clamp(percentile(sorted, low), hardMin, hardMax),
            softMax: clamp(percentile(sorted, high), hardMin, hardMax)
        },
        sampleSize: finite.length
    };
}

export interface RateOfChangeOptions {
    /** Timestep the rate is expressed in, in minutes. */
    timestepMinutes: number;
    /** Expected sampling interval; successive samples further apart are a gap and not compared. */
    samplingIntervalMinutes: number;
    /** Keep only this percentile of the differences, so one historical glitch does not set the limit. */
    trimPercentile?: number;
}

/**
 * Maximum absolute successive difference of an ordered baseline, normalized to the timestep.
 * Returns undefined when no pair of adjacent samples exists.
 */
export function maxRateOfChange(samples: readonly BaselineSample[], options: RateOfChangeOptions): number | undefined {
    const intervalMs = options.samplingIntervalMinutes * 60000;
    const timestepMs = options.timestepMinutes * 60000;
    const deltas: number[] = [];

    for (let i = 1; i < samples.length; i++) {
        const elapsed = samples[i].timestamp - samples[i - 1].timestamp;
        if (elapsed <= 0 || elapsed > intervalMs) {
            continue;
        }
        deltas.push(Math.abs(samples[i].value - samples[i - 1].value) * (timestepMs / elapsed));
    }

    if (deltas.length === 0) {
        return undefined;
    }

    deltas.sort((a, b) => a - b);
    if (options.trimPercentile !== undefined) {
        return percentile(deltas, options.trimPercentile);
    }
    return deltas[deltas.length - 1];
}
