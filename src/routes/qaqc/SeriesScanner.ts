import { GapPolicy } from "../../types";

export interface SeriesPoint {
    /** Unix epoch milliseconds. */
    timestamp: number;
    value: number;
}

export interface SeriesScannerOptions {
    /** Expected interval between records, in minutes. */
    samplingIntervalMinutes: number;
    /** Timestep the rate limit is expressed in, in minutes. */
    timestepMinutes: number;
    rateLimit?: number;
    /** Undefined disables flatline detection. */
    flatlineWindowMinutes?: number;
    flatlineEpsilon: number;
    gapPolicy: GapPolicy;
}

export interface RateOfChangeResult {
    /** |Δvalue| normalized to the timestep; undefined when the pair was not compared. */
    delta?: number;
    exceeded: boolean;
    /** The pair straddles a gap. */
    boundary: boolean;
}

/** Number of grid slots missing between two consecutive records. */
export function countMissingTimestamps(prevTimestamp: number, currTimestamp: number, expectedIntervalMs: number): number {
    if (!(expectedIntervalMs > 0) || currTimestamp <= prevTimestamp) {
        return 0;
    }
    return Math.ceil((currTimestamp - prevTimestamp) / expectedIntervalMs) - 1;
}

/**
 * Timestamps missing between two consecutive records on the regular grid anchored at `prevTimestamp`.
 */
export function findMissingTimestamps(prevTimestamp: number, currTimestamp: number, expectedIntervalMs: number): number[] {
    const missing: number[] = [];
    if (!(expectedIntervalMs > 0)) {
        return missing;
    }
    for (let t = prevTimestamp + expectedIntervalMs; t < currTimestamp; t += expectedIntervalMs) {
        missing.push(t);
    }
    return missing;
}

interface FlatlineRun {
    start: number;
    value: number;
}

/**
 * Rolling state of one (station, variable) stream: the last accepted point for the rate-of-change check and the
 * current run of unchanged values for the flatline check. Points must be observed in time order; create a new
 * scanner to restart a series.
 */
export class SeriesScanner {
    private readonly intervalMs: number;
    private readonly timestepMs: number;
    private lastAccepted?: SeriesPoint;
    private run?: FlatlineRun;

    constructor(private readonly options: SeriesScannerOptions) {
        this.intervalMs = options.samplingIntervalMinutes * 60000;
        this.timestepMs = options.timestepMinutes * 60000;
    }

    get previous(): SeriesPoint | undefined {
        return this.lastAccepted;
    }

    /**
     * Number of grid slots missing between two records. A gap also ends the current unchanged run.
     */
    observeGap(prevTimestamp: number, currTimestamp: number, expectedIntervalMs: number = this.intervalMs): number {
        const missing = countMissingTimestamps(prevTimestamp, currTimestamp, expectedIntervalMs);
        if (missing > 0) {
            this.interrupt();
        }
        return missing;
    }

    /**
     * Change between the previous accepted point and the current one, normalized to the timestep.
     * Across a gap the pair is a boundary case: skipped by default, or compared per elapsed timestep with the
     * "compare" policy.
     */
    observeRateOfChange(prev: SeriesPoint | undefined, curr: SeriesPoint): RateOfChangeResult {
        if (!prev || !Number.isFinite(prev.value) || !Number.isFinite(curr.value)) {
            return { exceeded: false, boundary: false };
        }

        const elapsed = curr.timestamp - prev.timestamp;
        if (elapsed <= 0) {
            return { exceeded: false, boundary: false };
        }

        const boundary = elapsed > this.intervalMs;
        if (boundary && this.options.gapPolicy === "skip") {
            return { exceeded: false, boundary };
        }

        const delta = Math.abs(curr.value - prev.value) * (this.timestepMs / elapsed);
        const exceeded = this.options.rateLimit !== undefined && delta > this.options.rateLimit;
        return { delta, exceeded, boundary };
    }

    /**
     * Extends the unchanged run when the value is within epsilon of the run's value, otherwise starts a new run.
     * Each reading covers one sampling interval, so n equal readings make a run of n intervals.
     *
     * @returns True once the run lasts at least the flatline window
     */
    observeFlatline(curr: SeriesPoint): boolean {
        if (!this.run || Math.abs(curr.value - this.run.value) > this.options.flatlineEpsilon) {
            this.run = { start: curr.timestamp, value: curr.value };
        }

        if (this.options.flatlineWindowMinutes === undefined) {
            return false;
        }
        const duration = curr.timestamp - this.run.start + this.intervalMs;
        return duration >= this.options.flatlineWindowMinutes * 60000;
    }

    /** Records a value that was kept, making it the reference for the next rate-of-change comparison. */
    accept(point: SeriesPoint): void {
        this.lastAccepted = point;
    }

    /** A missing or nullified reading interrupts any unchanged run. */
    interrupt(): void {
        this.run = undefined;
    }

    reset(): void {
        this.lastAccepted = undefined;
        this.run = undefined;
    }
}
