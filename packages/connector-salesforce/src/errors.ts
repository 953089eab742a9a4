import { ForceGateError } from "@forcegate/core";

/** Authentication failure from the Salesforce OAuth token endpoint. */
export class AuthenticationError extends ForceGateError {
	constructor(message: string, cause?: Error) {
		super(message, "SALESFORCE_AUTH_ERROR", cause);
	}
}

/** HTTP verb outside GET, POST, PATCH and DELETE. */
export class UnsupportedMethodError extends ForceGateError {
	readonly method: string;

	constructor(method: string) {
		super(`Method "${method}" isn't supported`, "SALESFORCE_UNSUPPORTED_METHOD");
		this.method = method;
	}
}

/** The request path names an object the org does not have. */
export class UnknownObjectError extends ForceGateError {
	readonly objectName: string;

	constructor(objectName: string) {
		super(`${objectName} isn't a valid object`, "SALESFORCE_UNKNOWN_OBJECT");
		this.objectName = objectName;
	}
}

/** POST or PATCH issued without a payload. */
export class MissingPayloadError extends ForceGateError {
	readonly method: string;

	constructor(method: string) {
		super(`Payload must be defined for a ${method} request`, "SALESFORCE_MISSING_PAYLOAD");
		this.method = method;
	}
}

/** Payload key that is not a field of the target object. Only the first offender is reported. */
export class InvalidFieldError extends ForceGateError {
	readonly field: string;
	readonly objectName: string;

	constructor(field: string, objectName = "") {
		super(
			objectName ? `${field} isn't a valid field of ${objectName}` : `${field} isn't a valid field`,
			"SALESFORCE_INVALID_FIELD",
		);
		this.field = field;
		this.objectName = objectName;
	}
}

/** Non-2xx HTTP status, network failure or timeout. Network failures carry status 0. */
export class RequestError extends ForceGateError {
	/** HTTP status code returned by Salesforce. */
	readonly statusCode: number;
	/** Raw response body from Salesforce. */
	readonly responseBody: string;

	constructor(statusCode: number, responseBody: string, cause?: Error) {
		super(`Salesforce API error (${statusCode}): ${responseBody}`, "SALESFORCE_REQUEST_ERROR", cause);
		this.statusCode = statusCode;
		this.responseBody = responseBody;
	}
}

/** A successful response whose body does not have the expected shape. */
export class InvalidResponseError extends ForceGateError {
	constructor(message: string, cause?: Error) {
		super(message, "SALESFORCE_INVALID_RESPONSE", cause);
	}
}

/** Batch is empty, too large, or has missing or repeated entry ids. */
export class BatchLimitError extends ForceGateError {
	constructor(message: string) {
		super(message, "SALESFORCE_BATCH_LIMIT");
	}
}

/** Any error a dispatch can fail with. */
export type DispatchError =
	| AuthenticationError
	| UnsupportedMethodError
	| UnknownObjectError
	| MissingPayloadError
	| InvalidFieldError
	| RequestError
	| InvalidResponseError;
