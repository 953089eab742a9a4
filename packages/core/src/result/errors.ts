/** Base error class for all forcegate errors */
export class ForceGateError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** Connector configuration is missing a field or holds an invalid value */
export class ConfigError extends ForceGateError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
