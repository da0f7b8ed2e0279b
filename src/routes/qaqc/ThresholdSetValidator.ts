import { ThresholdSet, ValidationResult } from "../../types";
import { seasonKeys } from "./TemporalBinner";

/**
 * Checks a ThresholdSet against its invariants before it may be activated.
 */
export function validateThresholdSet(set: ThresholdSet): ValidationResult {
    const result: ValidationResult = {
        valid: true,
        errors: [],
        warnings: []
    };
    const label = `${set.stationId}/${set.variable}`;

    const fail = (message: string) => {
        result.errors.push(`${label}: ${message}`);
        result.valid = false;
    };

    // Check 1: Hard limits are finite and ordered
    if (!Number.isFinite(set.hardMin) || !Number.isFinite(set.hardMax)) {
        fail(`hard limits must be finite (${set.hardMin}, ${set.hardMax})`);
    } else if (set.hardMin > set.hardMax) {
        fail(`hard_min > hard_max (${set.hardMin} > ${set.hardMax})`);
    }

    // Check 2: Every bin present and hard_min ≤ soft_min ≤ soft_max ≤ hard_max
    for (const key of seasonKeys(set.diurnal)) {
        const limit = set.seasonal[key];
        if (!limit) {
            fail(`bin ${key}: seasonal limits missing`);
            continue;
        }
        if (!(set.hardMin <= limit.softMin && limit.softMin <= limit.softMax && limit.softMax <= set.hardMax)) {
            fail(
                `bin ${key}: expected ${set.hardMin} ≤ ${limit.softMin} ≤ ${limit.softMax} ≤ ${set.hardMax}`
            );
        }
    }

    // Check 3: Rate and flatline parameters
    if (set.rateLimit !== undefined && !(set.rateLimit > 0)) {
        fail(`rate limit must be positive (${set.rateLimit})`);
    }
    if (!(set.timestepMinutes > 0)) {
        fail(`timestep must be positive (${set.timestepMinutes})`);
    }
    if (set.flatlineWindowMinutes !== undefined && !(set.flatlineWindowMinutes > 0)) {
        fail(`flatline window must be positive (${set.flatlineWindowMinutes})`);
    }
    if (!(set.flatlineEpsilon >= 0)) {
        fail(`flatline epsilon must not be negative (${set.flatlineEpsilon})`);
    }
    if (set.gapPolicy !== "skip" && set.gapPolicy !== "compare") {
        fail(`unknown gap policy "${String(set.gapPolicy)}"`);
    }

    // Check 4: Night ceiling only for radiation, inside the hard band
    if (set.nightMax !== undefined) {
        if (set.kind !== "radiation") {
            fail(`night_max is only allowed for radiation variables`);
        } else if (set.nightMax < set.hardMin || set.nightMax > set.hardMax) {
            fail(`night_max ${set.nightMax} outside hard limits`);
        }
    }

    // Check 5: Bins without enough history
    if (set.insufficientBins.length > 0) {
        result.warnings.push(
            `${label}: ${set.insufficientBins.length} bin(s) use hard limits (insufficient history): ${set.insufficientBins.join(", ")}`
        );
    }

    return result;
}
