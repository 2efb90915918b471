/**
 * Error thrown when a caller hands a report mutator a value that violates
 * the field's validity constraint (missing value, short address buffer,
 * malformed UUID text).
 *
 * The report is left unmodified when this is thrown.
 */
export class InvalidArgumentError extends Error {
	constructor(
		public readonly argument: string,
		message: string,
	) {
		super(`Invalid ${argument}: ${message}`);
		this.name = "InvalidArgumentError";
	}
}

/**
 * Error thrown when a collaborator is observed in an inconsistent state,
 * e.g. a report whose presence mask claims a field it cannot produce.
 */
export class InternalError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InternalError";
	}
}

/**
 * Type guard for {@link InvalidArgumentError}, also matching errors that
 * crossed a realm boundary and only kept their name.
 */
export function isInvalidArgumentError(
	error: unknown,
): error is InvalidArgumentError {
	return (
		error instanceof InvalidArgumentError ||
		(error instanceof Error && error.name === "InvalidArgumentError")
	);
}
