import fs from "fs";
import path from "path";

import { StationConfig, parseStationConfigs } from "../../config";
import { RollingBaseline, SerializedBaseline } from "../qaqc/RollingBaseline";
import { SerializedThresholds, ThresholdStore } from "../qaqc/ThresholdStore";

/**
 * Persistence collaborator: station configuration in, threshold versions and the rolling baseline in and out.
 * Reads happen before a QC run and writes after it, never inside the evaluation loop.
 */
export interface StateRepository {
	loadStations(): StationConfig[];
	loadThresholds(): ThresholdStore;
	saveThresholds( store: ThresholdStore ): void;
	loadBaseline(): RollingBaseline;
	saveBaseline( baseline: RollingBaseline ): void;
}

/**
 * Keeps everything as JSON files in the data directory:
 * - stations.json   station list (written by the configuration collaborator)
 * - thresholds.json every threshold version per station and variable
 * - baseline.json   accepted historical values per station and variable
 */
export class FileStateRepository implements StateRepository {
	private readonly stationsFile: string;
	private readonly thresholdsFile: string;
	private readonly baselineFile: string;

	public constructor( private readonly dataDir: string ) {
		this.stationsFile = path.join( dataDir, "stations.json" );
		this.thresholdsFile = path.join( dataDir, "thresholds.json" );
		this.baselineFile = path.join( dataDir, "baseline.json" );
	}

	public loadStations(): StationConfig[] {
		if ( !fs.existsSync( this.stationsFile ) ) {
			console.warn( `[StateRepository] ${this.stationsFile} not found, no stations configured` );
			return [];
		}
		const stations = parseStationConfigs( JSON.parse( fs.readFileSync( this.stationsFile, "utf8" ) ) );
		console.log( `[StateRepository] Loaded ${stations.length} station(s) from ${this.stationsFile}` );
		return stations;
	}

	public loadThresholds(): ThresholdStore {
		if ( !fs.existsSync( this.thresholdsFile ) ) {
			return new ThresholdStore();
		}
		const data: SerializedThresholds = JSON.parse( fs.readFileSync( this.thresholdsFile, "utf8" ) );
		return ThresholdStore.fromJSON( data );
	}

	public saveThresholds( store: ThresholdStore ): void {
		this.write( this.thresholdsFile, store.toJSON() );
	}

	public loadBaseline(): RollingBaseline {
		if ( !fs.existsSync( this.baselineFile ) ) {
			return new RollingBaseline();
		}
		const data: SerializedBaseline = JSON.parse( fs.readFileSync( this.baselineFile, "utf8" ) );
		const baseline = RollingBaseline.fromJSON( data );
		console.log( `[StateRepository] Loaded rolling baseline for ${Object.keys( data ).length} station(s)` );
		return baseline;
	}

	public saveBaseline( baseline: RollingBaseline ): void {
		this.write( this.baselineFile, baseline.toJSON() );
	}

	private write( file: string, data: unknown ): void {
		// Ensure data directory exists
		if ( !fs.existsSync( this.dataDir ) ) {
			fs.mkdirSync( this.dataDir, { recursive: true } );
		}
		// Write to a temporary file first so a crash never leaves half a file behind
		const tmp = `${file}.tmp`;
		fs.writeFileSync( tmp, JSON.stringify( data ), "utf8" );
		fs.renameSync( tmp, file );
	}
}
