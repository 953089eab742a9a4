// ---------------------------------------------------------------------------
// Salesforce Connector — Type Definitions
// ---------------------------------------------------------------------------

import type { Logger, Result } from "@forcegate/core";
import type { RequestError } from "./errors";

/** Connection configuration for a Salesforce org. */
export interface SalesforceConnectorConfig {
	/** OAuth token endpoint (e.g. "https://login.salesforce.com/services/oauth2/token"). */
	authUrl: string;
	/** Salesforce username. */
	username: string;
	/** Salesforce password + security token concatenated. */
	password: string;
	/** Connected App consumer key. */
	clientId: string;
	/** Connected App consumer secret. */
	clientSecret: string;
	/** REST API version (default 47.0). */
	apiVersion?: number;
	/** OAuth grant type (default "password"). */
	grantType?: string;
	/** Per-request timeout in milliseconds (default 30 000). */
	timeoutMs?: number;
	/** Log sink (default writes to `console`). */
	logger?: Logger;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/** HTTP verbs the connector dispatches. */
export const HTTP_METHODS = ["GET", "POST", "PATCH", "DELETE"] as const;

/** One of {@link HTTP_METHODS}. */
export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Field name to value mapping sent as the JSON body of POST and PATCH requests. */
export type SalesforcePayload = Record<string, string>;

/** A single request to the Salesforce REST API. */
export interface RequestSpec {
	/** HTTP verb; anything outside {@link HTTP_METHODS} is rejected. */
	method: string;
	/** Path relative to `/services/data/v<version>/`, e.g. "sobjects/Contact". */
	path: string;
	/** Body for POST and PATCH. */
	payload?: SalesforcePayload;
	/** Record id appended to `path` as `<path>/<id>`. */
	id?: string;
}

/** Options accepted by {@link SalesforceConnection.request}. */
export type RequestOptions = Pick<RequestSpec, "payload" | "id">;

/** A batch entry: a request tagged with a caller-chosen id. */
export interface BatchEntry extends RequestSpec {
	/** Unique within the batch; echoed back in the entry's result. */
	entryId: string;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/** Outgoing HTTP request handed to an {@link HttpTransport}. */
export interface HttpRequest {
	method: HttpMethod;
	url: string;
	headers: Record<string, string>;
	body?: string;
}

/** Status and raw body of an HTTP response. */
export interface HttpResponse {
	status: number;
	body: string;
}

/**
 * Sends one HTTP request.
 *
 * Resolves with any response the server returned, successful or not.
 * Only network failures and timeouts produce an error.
 */
export interface HttpTransport {
	send(request: HttpRequest): Promise<Result<HttpResponse, RequestError>>;
}

// ---------------------------------------------------------------------------
// Salesforce REST API — Response Types
// ---------------------------------------------------------------------------

/** OAuth 2.0 token response from the Salesforce token endpoint. */
export interface SalesforceAuthResponse {
	access_token: string;
	instance_url: string;
	token_type?: string;
	issued_at?: string;
	signature?: string;
}

/** `GET sobjects` response (fields used by the connector). */
export interface SObjectListResponse {
	sobjects: Array<{ name: string }>;
}

/** `GET sobjects/<Name>/describe` response (fields used by the connector). */
export interface SObjectDescribeResponse {
	fields: Array<{ name: string }>;
}

/** SOQL query response envelope. */
export interface SalesforceQueryResponse<T> {
	totalSize: number;
	done?: boolean;
	records: T[];
}

/** A record as returned by a SOQL query. */
export type SalesforceRecord = Record<string, unknown>;
