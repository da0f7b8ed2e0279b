/** Geographic coordinates. The 1st element is the latitude, and the 2nd element is the longitude. */
export type GeoCoordinates = [number, number];

/**
 * Quality flag attached to every emitted observation.
 *
 * - `P`   passed every check
 * - `LMT` outside the seasonal soft band
 * - `FLT` flatline (stuck sensor)
 * - `SPK` rate-of-change violation
 * - `F`   hard-limit or night-time radiation violation
 * - `M`   missing record (gap-filled placeholder or calm-wind direction)
 * - `INF` sensor reported ±Infinity
 * - `NAN` sensor reported NaN / no value
 */
export type FlagCode = "P" | "LMT" | "SPK" | "FLT" | "F" | "NAN" | "INF" | "M";

/** What happens to the value: kept as-is, kept with a flag, or replaced by the no-data marker. */
export type QcAction = "keep" | "flag" | "nullify";

export type DayNight = "Day" | "Night";

/** Kind of sensor a variable comes from. Decides which special checks apply. */
export type VariableKind = "generic" | "radiation" | "windSpeed" | "windDirection";

export interface BinKey {
	/** Calendar month of the UTC timestamp, 1..12. */
	month: number;
	dayNight: DayNight;
}

/** What the spike check does with a pair of values that straddles a gap. */
export type GapPolicy = "skip" | "compare";

export interface SeasonalLimit {
	softMin: number;
	softMax: number;
}

/**
 * Thresholds for one variable of one station. Instances handed out by the ThresholdStore are frozen;
 * a rebuild creates a new version instead of changing an existing one.
 */
export interface ThresholdSet {
	stationId: string;
	variable: string;
	kind: VariableKind;
	version: number;
	/** ISO timestamp of the build. */
	createdAt: string;
	hardMin: number;
	hardMax: number;
	/** Soft limits keyed by `formatSeasonKey()` ("7" or "7:Day"). */
	seasonal: Readonly<Record<string, SeasonalLimit>>;
	/** Maximum allowed |Δvalue| per timestep. Absent disables the spike check. */
	rateLimit?: number;
	/** The fixed timestep the rate limit is expressed in, in minutes. */
	timestepMinutes: number;
	/** Minimum duration of an unchanged run that counts as a flatline. Absent disables the check. */
	flatlineWindowMinutes?: number;
	flatlineEpsilon: number;
	gapPolicy: GapPolicy;
	/** Night-time ceiling, radiation-type variables only. */
	nightMax?: number;
	/** Whether the 24-bin day/night split applies. */
	diurnal: boolean;
	/** Season keys that fell back to hard limits because of insufficient history. */
	insufficientBins: readonly string[];
}

/** Frozen map variable → ThresholdSet that one QC run is pinned to. */
export type ThresholdSnapshot = ReadonlyMap<string, ThresholdSet>;

/** One record handed over by the ingestion collaborator. The timestamp has no resolved timezone yet. */
export interface IngestRecord {
	timestamp: string | number;
	values: Record<string, number | string | null | undefined>;
}

/** A single-variable observation with its UTC timestamp. */
export interface Observation {
	timestamp: Date;
	variable: string;
	/** NaN when the sensor reported no value. */
	value: number;
	/** True for placeholders synthesized by gap filling. */
	placeholder: boolean;
}

export interface FlagResult {
	flag: FlagCode;
	action: QcAction;
	/** The output value; `null` is the no-data marker. */
	value: number | null;
}

/** Output row, the contract the tidy export serializes. */
export interface QcRecord {
	/** ISO-8601 UTC timestamp. */
	timestamp: string;
	stationId: string;
	variable: string;
	value: number | null;
	/** The value as reported, kept for audit when the output was nullified. */
	originalValue: number | null;
	flag: FlagCode;
	action: QcAction;
	bin: string;
	thresholdVersion: number;
}

/** An accepted historical value in the rolling baseline. */
export interface BaselineSample {
	/** Unix epoch milliseconds. */
	timestamp: number;
	value: number;
	dayNight: DayNight;
}

export interface ValidationResult {
	valid: boolean;
	errors: string[];
	warnings: string[];
}

/** Flags whose values are kept and feed back into the rolling baseline. */
export const ACCEPTED_FLAGS: ReadonlySet<FlagCode> = new Set<FlagCode>(["P", "LMT", "SPK", "FLT"]);

