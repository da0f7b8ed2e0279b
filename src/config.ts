import path from "path";
import { z } from "zod";

import defaultThresholds from "./data/defaultThresholds.json";
import { GeoCoordinates, VariableKind } from "./types";
import { CodedError, ErrorCode } from "./errors";

// --- Builder options --------------------------------------------

export const BuilderOptionsSchema = z.object({
	/** Lower/upper percentile of the seasonal soft band. */
	percentilePair: z.tuple([
		z.number().min(0.01).max(50),
		z.number().min(50).max(99.99)
	]).refine(([low, high]) => low < high, { message: "lower percentile must be below the upper one" })
		.default([1, 99]),
	rollingWindowYears: z.number().int().positive().default(3),
	minBinSampleSize: z.number().int().positive().default(30),
	flatlineWindowMinutes: z.number().positive().default(360),
	flatlineEpsilon: z.number().nonnegative().default(0),
	/** Trim the profiled maximum rate of change to this percentile of the historical differences. */
	rateOfChangePercentile: z.number().min(50).max(100).optional(),
	/** What the spike check does across a detected gap: skip the pair, or compare normalized to the elapsed steps. */
	gapPolicy: z.enum(["skip", "compare"]).default("skip"),
	/** Longest gap, in grid slots, that is filled with missing placeholders (2880 = 30 days of 15 minute data). */
	maxGapSlots: z.number().int().nonnegative().default(2880)
});

export type BuilderOptions = z.infer<typeof BuilderOptionsSchema>;

export const DEFAULT_BUILDER_OPTIONS: BuilderOptions = BuilderOptionsSchema.parse({});

// --- Station configuration --------------------------------------

const SeasonalOverrideSchema = z.object({
	months: z.array(z.number().int().min(1).max(12)).min(1),
	softMin: z.number(),
	softMax: z.number()
}).refine(o => o.softMin <= o.softMax, { message: "softMin must not exceed softMax" });

export type SeasonalOverride = z.infer<typeof SeasonalOverrideSchema>;

const VariableConfigSchema = z.object({
	kind: z.enum(["generic", "radiation", "windSpeed", "windDirection"]).optional(),
	hardMin: z.number().optional(),
	hardMax: z.number().optional(),
	rateLimit: z.number().positive().optional(),
	/** false disables the flatline check (e.g. radiation, which is legitimately 0 all night). */
	flatline: z.boolean().optional(),
	flatlineWindowMinutes: z.number().positive().optional(),
	flatlineEpsilon: z.number().nonnegative().optional(),
	nightMax: z.number().optional(),
	diurnal: z.boolean().optional(),
	/** Wind direction only: the wind speed variable it depends on. */
	pairedWith: z.string().optional(),
	/** Wind speed only: speeds within this distance of zero count as calm. */
	calmEpsilon: z.number().nonnegative().optional(),
	/** Months whose soft limits are pinned, e.g. snow depth 0 in summer. */
	seasonalOverrides: z.array(SeasonalOverrideSchema).optional()
});

type RawVariableConfig = z.infer<typeof VariableConfigSchema>;

const StationConfigSchema = z.object({
	id: z.string().min(1),
	name: z.string().optional(),
	coordinates: z.tuple([z.number().min(-90).max(90), z.number().min(-180).max(180)]),
	timezone: z.string().optional(),
	utcOffsetMinutes: z.number().int().min(-840).max(840).optional(),
	samplingIntervalMinutes: z.number().positive().default(15),
	options: BuilderOptionsSchema.default({}),
	variables: z.record(VariableConfigSchema)
});

export const StationListSchema = z.array(StationConfigSchema);

/** Per-variable configuration after defaults from the shipped table were applied. */
export interface VariableConfig {
	kind: VariableKind;
	hardMin: number;
	hardMax: number;
	rateLimit?: number;
	/** false disables the flatline check. */
	flatline: boolean;
	/** Variable-specific flatline settings; the builder options apply where these are absent. */
	flatlineWindowMinutes?: number;
	flatlineEpsilon?: number;
	nightMax?: number;
	diurnal: boolean;
	pairedWith?: string;
	calmEpsilon: number;
	seasonalOverrides: SeasonalOverride[];
}

export interface StationConfig {
	id: string;
	name?: string;
	coordinates: GeoCoordinates;
	timezone?: string;
	utcOffsetMinutes?: number;
	samplingIntervalMinutes: number;
	options: BuilderOptions;
	variables: Record<string, VariableConfig>;
}

const DefaultTableSchema = z.record(VariableConfigSchema);
const DEFAULT_TABLE: Record<string, RawVariableConfig> = DefaultTableSchema.parse(defaultThresholds);

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function resolveVariable(stationId: string, name: string, raw: RawVariableConfig): VariableConfig {
	const merged: RawVariableConfig = { ...DEFAULT_TABLE[name], ...raw };
	const kind = merged.kind ?? "generic";

	if (merged.hardMin === undefined || merged.hardMax === undefined) {
		throw new CodedError(
			ErrorCode.InvalidConfiguration,
			`Station ${stationId}: variable ${name} has no hard limits and none are known by default`
		);
	}
	const hardMin = merged.hardMin;
	const hardMax = merged.hardMax;
	if (hardMin > hardMax) {
		throw new CodedError(
			ErrorCode.InvalidConfiguration,
			`Station ${stationId}: variable ${name} has hardMin ${hardMin} above hardMax ${hardMax}`
		);
	}
	const nightMax = kind === "radiation" ? merged.nightMax : undefined;
	if (nightMax !== undefined && (nightMax < hardMin || nightMax > hardMax)) {
		throw new CodedError(
			ErrorCode.InvalidConfiguration,
			`Station ${stationId}: variable ${name} has nightMax ${nightMax} outside its hard limits [${hardMin}, ${hardMax}]`
		);
	}
	for (const override of merged.seasonalOverrides ?? []) {
		if (override.softMin < hardMin || override.softMax > hardMax) {
			throw new CodedError(
				ErrorCode.InvalidConfiguration,
				`Station ${stationId}: variable ${name} has a seasonal override [${override.softMin}, ${override.softMax}] outside its hard limits [${hardMin}, ${hardMax}]`
			);
		}
	}
	if (kind === "windDirection" && !merged.pairedWith) {
		throw new CodedError(
			ErrorCode.InvalidConfiguration,
			`Station ${stationId}: wind direction ${name} needs a paired wind speed variable`
		);
	}

	return {
		kind,
		hardMin,
		hardMax,
		rateLimit: merged.rateLimit,
		flatline: merged.flatline ?? true,
		flatlineWindowMinutes: merged.flatlineWindowMinutes,
		flatlineEpsilon: merged.flatlineEpsilon,
		nightMax,
		diurnal: merged.diurnal ?? kind === "radiation",
		pairedWith: kind === "windDirection" ? merged.pairedWith : undefined,
		calmEpsilon: merged.calmEpsilon ?? 0,
		seasonalOverrides: merged.seasonalOverrides ?? []
	};
}

/**
 * Validates a station list (as read from stations.json) and applies the defaults.
 * @throws CodedError(InvalidConfiguration) with one detail line per problem
 */
export function parseStationConfigs(input: unknown): StationConfig[] {
	const parsed = StationListSchema.safeParse(input);
	if (!parsed.success) {
		throw new CodedError(ErrorCode.InvalidConfiguration, "Invalid station configuration", formatIssues(parsed.error));
	}

	const ids = new Set<string>();
	return parsed.data.map(station => {
		if (ids.has(station.id)) {
			throw new CodedError(ErrorCode.InvalidConfiguration, `Duplicate station id: ${station.id}`);
		}
		ids.add(station.id);

		const variables: Record<string, VariableConfig> = {};
		for (const [name, raw] of Object.entries(station.variables)) {
			variables[name] = resolveVariable(station.id, name, raw);
		}

		for (const [name, variable] of Object.entries(variables)) {
			if (variable.pairedWith && variables[variable.pairedWith]?.kind !== "windSpeed") {
				throw new CodedError(
					ErrorCode.InvalidConfiguration,
					`Station ${station.id}: ${name} is paired with ${variable.pairedWith}, which is not a configured wind speed`
				);
			}
		}

		return {
			id: station.id,
			name: station.name,
			coordinates: station.coordinates,
			timezone: station.timezone,
			utcOffsetMinutes: station.utcOffsetMinutes,
			samplingIntervalMinutes: station.samplingIntervalMinutes,
			options: station.options,
			variables
		};
	});
}

/**
 * Validates builder options given by a caller, e.g. a rebuild request.
 */
export function parseBuilderOptions(input: unknown): BuilderOptions {
	const parsed = BuilderOptionsSchema.safeParse(input ?? {});
	if (!parsed.success) {
		throw new CodedError(ErrorCode.InvalidConfiguration, "Invalid builder options", formatIssues(parsed.error));
	}
	return parsed.data;
}

// --- Environment ------------------------------------------------

export interface ServerSettings {
	port: number;
	host: string;
	/** Directory holding stations.json and the persisted thresholds and baselines. */
	persistenceLocation: string;
}

export function loadServerSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
	const port = parseInt(env.PORT ?? "", 10);
	return {
		port: Number.isNaN(port) ? 3000 : port,
		host: env.HOST || "0.0.0.0",
		persistenceLocation: env.PERSISTENCE_LOCATION || path.join(__dirname, "..", "data")
	};
}
