import { subYears } from "date-fns";

import { ACCEPTED_FLAGS, BaselineSample, FlagCode } from "../../types";

/** A baseline candidate together with the flag the evaluator gave it. */
export interface FlaggedSample extends BaselineSample {
    flag: FlagCode;
}

export type SerializedBaseline = Record<string, Record<string, BaselineSample[]>>;

/**
 * Append-only history of accepted values per (station, variable), ordered by time.
 *
 * Values that were nullified (F, NAN, INF, M) never enter, so a rebuild cannot widen the
 * thresholds around data that was already known to be bad.
 */
export class RollingBaseline {
    private readonly stations = new Map<string, Map<string, BaselineSample[]>>();

    /**
     * Adds the accepted samples of a run. A timestamp that is already present is replaced, so re-running a series
     * does not count its values twice.
     *
     * @returns Number of samples that were accepted
     */
    append(stationId: string, variable: string, samples: readonly FlaggedSample[]): number {
        const accepted = samples.filter(s => ACCEPTED_FLAGS.has(s.flag) && Number.isFinite(s.value));
        if (accepted.length === 0) {
            return 0;
        }

        const merged = new Map<number, BaselineSample>();
        for (const sample of this.samples(stationId, variable)) {
            merged.set(sample.timestamp, sample);
        }
        for (const { timestamp, value, dayNight } of accepted) {
            merged.set(timestamp, { timestamp, value, dayNight });
        }

        const sorted = [...merged.values()].sort((a, b) => a.timestamp - b.timestamp);
        this.variablesOf(stationId).set(variable, sorted);
        return accepted.length;
    }

    samples(stationId: string, variable: string): readonly BaselineSample[] {
        return this.stations.get(stationId)?.get(variable) ?? [];
    }

    /**
     * Samples within `years` of the newest sample. Older samples drop out of the baseline for good.
     */
    window(stationId: string, variable: string, years: number): readonly BaselineSample[] {
        const samples = this.samples(stationId, variable);
        if (samples.length === 0) {
            return samples;
        }

        const newest = samples[samples.length - 1].timestamp;
        const cutoff = subYears(new Date(newest), years).getTime();
        const kept = samples.filter(s => s.timestamp > cutoff);

        if (kept.length !== samples.length) {
            this.variablesOf(stationId).set(variable, kept);
        }
        return kept;
    }

    variables(stationId: string): string[] {
        return [...(this.stations.get(stationId)?.keys() ?? [])];
    }

    toJSON(): SerializedBaseline {
        const out: SerializedBaseline = {};
        for (const [stationId, variables] of this.stations) {
            out[stationId] = Object.fromEntries(variables);
        }
        return out;
    }

    static fromJSON(data: SerializedBaseline): RollingBaseline {
        const baseline = new RollingBaseline();
        for (const [stationId, variables] of Object.entries(data)) {
            for (const [variable, samples] of Object.entries(variables)) {
                baseline.append(stationId, variable, samples.map(s => ({ ...s, flag: "P" as const })));
            }
        }
        return baseline;
    }

    private variablesOf(stationId: string): Map<string, BaselineSample[]> {
        let variables = this.stations.get(stationId);
        if (!variables) {
            variables = new Map();
            this.stations.set(stationId, variables);
        }
        return variables;
    }
}
