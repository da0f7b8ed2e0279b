import { z } from "zod";

import { IngestRecord, ThresholdSet } from "../types";
import { CodedError, ErrorCode, makeCodedError } from "../errors";
import { BuilderOptions, StationConfig, parseBuilderOptions } from "../config";
import { QcPipeline } from "./qaqc/Pipeline";
import { RollingBaseline } from "./qaqc/RollingBaseline";
import { ThresholdStore } from "./qaqc/ThresholdStore";
import { StateRepository } from "./persistence/StateRepository";

/** The parts of an express request the QC handlers read. */
export interface QcRequest {
	params: Record<string, string>;
	query: Record<string, unknown>;
	body: unknown;
}

/** The parts of an express response the QC handlers write. */
export interface QcResponse {
	status( code: number ): QcResponse;
	json( body: unknown ): unknown;
}

export interface QcContext {
	stations: ReadonlyMap<string, StationConfig>;
	store: ThresholdStore;
	baseline: RollingBaseline;
	/** Saves thresholds and baseline after every change; nothing is persisted without it. */
	repository?: StateRepository;
}

const RecordSchema = z.object( {
	timestamp: z.union( [ z.string(), z.number() ] ),
	values: z.record( z.union( [ z.number(), z.string(), z.null() ] ) )
} );

const RecordsBodySchema = z.object( {
	records: z.array( RecordSchema ),
	options: z.unknown().optional()
} );

const RebuildBodySchema = z.object( {
	options: z.unknown().optional()
} ).optional();

const STATUS_CODES: Partial<Record<ErrorCode, number>> = {
	[ ErrorCode.UnknownStation ]: 404,
	[ ErrorCode.InvalidConfiguration ]: 400,
	[ ErrorCode.MalformedRequest ]: 400,
	[ ErrorCode.InvalidTimestamp ]: 400,
	[ ErrorCode.MalformedThresholdSet ]: 422
};

export function statusForError( err: CodedError ): number {
	return STATUS_CODES[ err.errCode ] ?? 500;
}

function sendError( res: QcResponse, err: unknown ): void {
	const coded = makeCodedError( err );
	const status = statusForError( coded );
	if ( status >= 500 ) {
		console.error( `[QcRoutes] ${coded.message}`, err );
	} else {
		console.warn( `[QcRoutes] ${ErrorCode[ coded.errCode ]}: ${coded.message}` );
	}
	res.status( status ).json( {
		error: ErrorCode[ coded.errCode ],
		errCode: coded.errCode,
		message: coded.message,
		details: coded.details
	} );
}

function parseBody<S extends z.ZodTypeAny>( schema: S, body: unknown ): z.infer<S> {
	const parsed = schema.safeParse( body );
	if ( !parsed.success ) {
		throw new CodedError(
			ErrorCode.MalformedRequest,
			"Malformed request body",
			parsed.error.issues.map( issue => `${issue.path.join( "." ) || "(body)"}: ${issue.message}` )
		);
	}
	return parsed.data;
}

/** Query flags arrive as strings; "true" and "1" switch them on. */
function isQueryFlagSet( value: unknown ): boolean {
	return value === "true" || value === "1";
}

function toRecords( records: z.infer<typeof RecordSchema>[] ): IngestRecord[] {
	return records.map( r => ( { timestamp: r.timestamp, values: r.values } ) );
}

function describeSet( set: ThresholdSet ) {
	return {
		variable: set.variable,
		kind: set.kind,
		version: set.version,
		createdAt: set.createdAt,
		hardMin: set.hardMin,
		hardMax: set.hardMax,
		rateLimit: set.rateLimit ?? null,
		timestepMinutes: set.timestepMinutes,
		flatlineWindowMinutes: set.flatlineWindowMinutes ?? null,
		flatlineEpsilon: set.flatlineEpsilon,
		gapPolicy: set.gapPolicy,
		nightMax: set.nightMax ?? null,
		diurnal: set.diurnal,
		seasonal: set.seasonal,
		insufficientBins: set.insufficientBins
	};
}

/**
 * Express handlers for the QC service. Each handler resolves the station, does its work on the in-memory store and
 * baseline and persists the result before responding.
 */
export function createQcHandlers( context: QcContext ) {
	const pipeline = new QcPipeline( context.store, context.baseline );

	const getStation = ( req: QcRequest ): StationConfig => {
		const stationId = req.params.stationId;
		const station = stationId !== undefined ? context.stations.get( stationId ) : undefined;
		if ( !station ) {
			throw new CodedError( ErrorCode.UnknownStation, `Unknown station: ${stationId}` );
		}
		return station;
	};

	const persist = (): void => {
		if ( !context.repository ) {
			return;
		}
		context.repository.saveThresholds( context.store );
		context.repository.saveBaseline( context.baseline );
	};

	const builderOptions = ( station: StationConfig, input: unknown ): BuilderOptions =>
		input === undefined ? station.options : parseBuilderOptions( input );

	const getThresholds = async function( req: QcRequest, res: QcResponse ) {
		try {
			const station = getStation( req );
			context.store.initialize( station );
			const snapshot = context.store.snapshot( station.id );
			res.status( 200 ).json( {
				stationId: station.id,
				thresholds: [ ...snapshot.values() ].map( describeSet )
			} );
		} catch ( err ) {
			sendError( res, err );
		}
	};

	const runQc = async function( req: QcRequest, res: QcResponse ) {
		try {
			const station = getStation( req );
			const body = parseBody( RecordsBodySchema, req.body );
			const rebuild = isQueryFlagSet( req.query.rebuild );
			const result = pipeline.run( station, toRecords( body.records ), {
				rebuild,
				builderOptions: rebuild ? builderOptions( station, body.options ) : undefined
			} );
			persist();
			res.status( 200 ).json( result );
		} catch ( err ) {
			sendError( res, err );
		}
	};

	const rebuildThresholds = async function( req: QcRequest, res: QcResponse ) {
		try {
			const station = getStation( req );
			const body = parseBody( RebuildBodySchema, req.body );
			const report = context.store.rebuild( station, context.baseline, builderOptions( station, body?.options ) );
			persist();
			res.status( 200 ).json( report );
		} catch ( err ) {
			sendError( res, err );
		}
	};

	const bootstrapStation = async function( req: QcRequest, res: QcResponse ) {
		try {
			const station = getStation( req );
			const body = parseBody( RecordsBodySchema, req.body );
			const result = pipeline.bootstrap( station, toRecords( body.records ), builderOptions( station, body.options ) );
			persist();
			// The corpus is history, not a run to export: answer with the summary only
			res.status( 200 ).json( result.summary );
		} catch ( err ) {
			sendError( res, err );
		}
	};

	return { getThresholds, runQc, rebuildThresholds, bootstrapStation };
}
