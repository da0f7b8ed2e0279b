export enum ErrorCode {
	/** The timestamp could not be parsed or resolved to UTC. */
	InvalidTimestamp = 10,
	/** A bin had fewer samples than the configured minimum; hard limits were used instead. */
	InsufficientHistory = 11,
	/** hard_min ≤ soft_min ≤ soft_max ≤ hard_max (or another threshold invariant) does not hold. */
	MalformedThresholdSet = 12,
	/** Station or builder configuration failed validation. */
	InvalidConfiguration = 20,
	/** No station with the requested ID is configured. */
	UnknownStation = 21,
	/** The request body could not be understood. */
	MalformedRequest = 22,
	/** An unexpected error occurred. */
	UnexpectedError = 99
}

/** An error with a numeric code that can be used to identify the type of error. */
export class CodedError extends Error {
	public readonly errCode: ErrorCode;
	/** Details that belong to the error, e.g. the list of failed invariants. */
	public readonly details: readonly string[];

	public constructor( errCode: ErrorCode, message?: string, details: readonly string[] = [] ) {
		super( message ?? ErrorCode[ errCode ] );
		this.name = "CodedError";
		this.errCode = errCode;
		this.details = details;
		Object.setPrototypeOf( this, CodedError.prototype );
	}
}

/**
 * Returns a CodedError representing the specified error. This function can be used to ensure that errors thrown by
 * third-party code are wrapped in a CodedError.
 * @param err The error to wrap.
 */
export function makeCodedError( err: unknown ): CodedError {
	if ( err instanceof CodedError ) {
		return err;
	}
	const message = err instanceof Error ? err.message : String( err );
	return new CodedError( ErrorCode.UnexpectedError, message );
}
