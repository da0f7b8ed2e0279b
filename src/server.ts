import express from "express";

import { loadServerSettings } from "./config";
import { createQcHandlers, QcContext } from "./routes/qc";
import { FileStateRepository, StateRepository } from "./routes/persistence/StateRepository";

export function createApp( context: QcContext ): express.Express {
	const handlers = createQcHandlers( context );
	const app = express();

	app.use( express.json( { limit: "50mb" } ) );

	app.get( "/stations/:stationId/thresholds", handlers.getThresholds );
	app.post( "/stations/:stationId/qc", handlers.runQc );
	app.post( "/stations/:stationId/thresholds/rebuild", handlers.rebuildThresholds );
	app.post( "/stations/:stationId/bootstrap", handlers.bootstrapStation );

	app.get( "/", ( req, res ) => {
		res.send( "Station QC service" );
	} );

	return app;
}

/** Loads the stations and the persisted state from the repository into a fresh context. */
export function loadContext( repository: StateRepository ): QcContext {
	const stations = new Map( repository.loadStations().map( station => [ station.id, station ] ) );
	return {
		stations,
		store: repository.loadThresholds(),
		baseline: repository.loadBaseline(),
		repository
	};
}

if ( require.main === module ) {
	const settings = loadServerSettings();
	const context = loadContext( new FileStateRepository( settings.persistenceLocation ) );

	createApp( context ).listen( settings.port, settings.host, () => {
		console.log( "Station QC service now listening on %s:%d with %d station(s)", settings.host, settings.port, context.stations.size );
	} );
}
