import { BinKey, FlagCode, FlagResult, Observation, QcAction, ThresholdSet } from "../../types";
import { formatSeasonKey } from "./TemporalBinner";
import { RateOfChangeResult, SeriesScanner } from "./SeriesScanner";

/** Flags from most to least severe. When several checks fire, the first one in this list wins. */
export const FLAG_PRECEDENCE: readonly FlagCode[] = ["NAN", "INF", "M", "F", "SPK", "FLT", "LMT", "P"];

export const FLAG_ACTIONS: Readonly<Record<FlagCode, QcAction>> = {
    NAN: "nullify",
    INF: "nullify",
    M: "nullify",
    F: "nullify",
    SPK: "flag",
    FLT: "flag",
    LMT: "flag",
    P: "keep"
};

/** Which checks fired for one observation. */
export interface CheckOutcome {
    nan: boolean;
    inf: boolean;
    missing: boolean;
    hardLimit: boolean;
    spike: boolean;
    flatline: boolean;
    softLimit: boolean;
}

export function resolveFlag(outcome: CheckOutcome): FlagCode {
    const fired: Record<FlagCode, boolean> = {
        NAN: outcome.nan,
        INF: outcome.inf,
        M: outcome.missing,
        F: outcome.hardLimit,
        SPK: outcome.spike,
        FLT: outcome.flatline,
        LMT: outcome.softLimit,
        P: true
    };
    return FLAG_PRECEDENCE.find(flag => fired[flag]) ?? "P";
}

export interface FlagEvaluatorOptions {
    samplingIntervalMinutes: number;
    /** Wind direction only: paired wind speeds within this distance of zero count as calm. */
    calmEpsilon?: number;
}

/**
 * Runs the check hierarchy for one (station, variable) stream. Observations must be passed in time order; the
 * evaluator keeps the rate-of-change and flatline state between them.
 */
export class FlagEvaluator {
    private readonly scanner: SeriesScanner;
    private lastRateOfChange?: RateOfChangeResult;
    private lastTimestamp?: number;

    constructor(readonly thresholds: ThresholdSet, private readonly options: FlagEvaluatorOptions) {
        this.scanner = new SeriesScanner({
            samplingIntervalMinutes: options.samplingIntervalMinutes,
            timestepMinutes: thresholds.timestepMinutes,
            rateLimit: thresholds.rateLimit,
            flatlineWindowMinutes: thresholds.flatlineWindowMinutes,
            flatlineEpsilon: thresholds.flatlineEpsilon,
            gapPolicy: thresholds.gapPolicy
        });
    }

    /** Rate-of-change result of the last evaluated observation, e.g. to report gap boundaries. */
    get rateOfChange(): RateOfChangeResult | undefined {
        return this.lastRateOfChange;
    }

    /**
     * @param observation - The observation, UTC timestamp
     * @param bin - Its (month, day/night) bin
     * @param pairedSpeed - Wind direction only: the resolved wind speed result at the same timestamp
     */
    evaluate(observation: Observation, bin: BinKey, pairedSpeed?: FlagResult): FlagResult {
        const t = this.thresholds;
        const value = observation.value;
        const timestamp = observation.timestamp.getTime();
        this.lastRateOfChange = undefined;

        // Slots left unfilled between two observations end any unchanged run
        if (this.lastTimestamp !== undefined) {
            this.scanner.observeGap(this.lastTimestamp, timestamp);
        }
        this.lastTimestamp = timestamp;

        const outcome: CheckOutcome = {
            nan: !observation.placeholder && Number.isNaN(value),
            inf: !observation.placeholder && (value === Infinity || value === -Infinity),
            missing: observation.placeholder || (t.kind === "windDirection" && this.isCalm(pairedSpeed)),
            hardLimit: false,
            spike: false,
            flatline: false,
            softLimit: false
        };

        if (!outcome.nan && !outcome.inf && !outcome.missing) {
            const nightViolation = t.kind === "radiation" && t.nightMax !== undefined &&
                bin.dayNight === "Night" && value > t.nightMax;
            outcome.hardLimit = value < t.hardMin || value > t.hardMax || nightViolation;
        }

        if (outcome.nan || outcome.inf || outcome.missing || outcome.hardLimit) {
            this.scanner.interrupt();
            return this.result(resolveFlag(outcome), value);
        }

        const point = { timestamp, value };
        this.lastRateOfChange = this.scanner.observeRateOfChange(this.scanner.previous, point);
        outcome.spike = this.lastRateOfChange.exceeded;
        outcome.flatline = this.scanner.observeFlatline(point);
        this.scanner.accept(point);

        const limit = t.seasonal[formatSeasonKey(bin, t.diurnal)];
        outcome.softLimit = limit !== undefined && (value < limit.softMin || value > limit.softMax);

        return this.result(resolveFlag(outcome), value);
    }

    private isCalm(speed: FlagResult | undefined): boolean {
        if (!speed || speed.action === "nullify" || speed.value === null) {
            return true;
        }
        return Math.abs(speed.value) <= (this.options.calmEpsilon ?? 0);
    }

    private result(flag: FlagCode, value: number): FlagResult {
        const action = FLAG_ACTIONS[flag];
        return { flag, action, value: action === "nullify" ? null : value };
    }
}
