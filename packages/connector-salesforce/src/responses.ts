// ---------------------------------------------------------------------------
// Response body parsing — JSON decode plus structural checks
// ---------------------------------------------------------------------------

import { Err, Ok, type Result, toError } from "@forcegate/core";
import { InvalidResponseError } from "./errors";
import type {
	SalesforceAuthResponse,
	SalesforceQueryResponse,
	SalesforceRecord,
	SObjectDescribeResponse,
	SObjectListResponse,
} from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNamedEntry(value: unknown): value is { name: string } {
	return isRecord(value) && typeof value.name === "string";
}

/** Decode a JSON body, failing with {@link InvalidResponseError}. */
export function parseJson(body: string, what: string): Result<unknown, InvalidResponseError> {
	try {
		return Ok(JSON.parse(body));
	} catch (err) {
		return Err(new InvalidResponseError(`${what} response is not valid JSON`, toError(err)));
	}
}

/** Parse the OAuth token endpoint response. */
export function parseAuthResponse(body: string): Result<SalesforceAuthResponse, InvalidResponseError> {
	const parsed = parseJson(body, "Authentication");
	if (!parsed.ok) return parsed;

	const data = parsed.value;
	if (
		!isRecord(data) ||
		typeof data.instance_url !== "string" ||
		typeof data.access_token !== "string"
	) {
		return Err(
			new InvalidResponseError("Authentication response is missing instance_url or access_token"),
		);
	}
	return Ok({ instance_url: data.instance_url, access_token: data.access_token });
}

/** Parse a `GET sobjects` response. */
export function parseObjectList(body: string): Result<SObjectListResponse, InvalidResponseError> {
	const parsed = parseJson(body, "Object list");
	if (!parsed.ok) return parsed;

	const data = parsed.value;
	if (!isRecord(data) || !Array.isArray(data.sobjects)) {
		return Err(new InvalidResponseError("Object list response has no sobjects array"));
	}
	const sobjects = data.sobjects.filter(isNamedEntry);
	if (sobjects.length !== data.sobjects.length) {
		return Err(new InvalidResponseError("Object list response has an entry without a name"));
	}
	return Ok({ sobjects });
}

/** Parse a `GET sobjects/<Name>/describe` response. */
export function parseDescribe(
	body: string,
	objectName: string,
): Result<SObjectDescribeResponse, InvalidResponseError> {
	const parsed = parseJson(body, `Describe ${objectName}`);
	if (!parsed.ok) return parsed;

	const data = parsed.value;
	if (!isRecord(data) || !Array.isArray(data.fields)) {
		return Err(new InvalidResponseError(`Describe ${objectName} response has no fields array`));
	}
	const fields = data.fields.filter(isNamedEntry);
	if (fields.length !== data.fields.length) {
		return Err(new InvalidResponseError(`Describe ${objectName} response has a field without a name`));
	}
	return Ok({ fields });
}

/** Parse a SOQL query response. */
export function parseQueryResponse(
	body: string,
): Result<SalesforceQueryResponse<SalesforceRecord>, InvalidResponseError> {
	const parsed = parseJson(body, "Query");
	if (!parsed.ok) return parsed;

	const data = parsed.value;
	if (!isRecord(data) || !Array.isArray(data.records)) {
		return Err(new InvalidResponseError("Query response has no records array"));
	}
	const records = data.records.filter(isRecord);
	if (records.length !== data.records.length) {
		return Err(new InvalidResponseError("Query response has a record that is not an object"));
	}
	const totalSize = typeof data.totalSize === "number" ? data.totalSize : records.length;
	return Ok({ totalSize, done: data.done !== false, records });
}
