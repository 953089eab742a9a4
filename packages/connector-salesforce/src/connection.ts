// ---------------------------------------------------------------------------
// SalesforceConnection — validating client for the Salesforce REST API
// ---------------------------------------------------------------------------

import { defaultLogger, Err, type Logger, Ok, type Result, SerialQueue } from "@forcegate/core";
import { SalesforceAuthenticator } from "./authenticator";
import {
	type AuthenticationError,
	BatchLimitError,
	type DispatchError,
	MissingPayloadError,
	RequestError,
	UnknownObjectError,
	UnsupportedMethodError,
} from "./errors";
import { objectNameFromPath } from "./path";
import { parseQueryResponse } from "./responses";
import { SchemaCache } from "./schema-cache";
import { FetchTransport, isSuccessStatus } from "./transport";
import {
	type BatchEntry,
	HTTP_METHODS,
	type HttpMethod,
	type HttpTransport,
	type RequestOptions,
	type RequestSpec,
	type SalesforceConnectorConfig,
	type SalesforcePayload,
	type SalesforceQueryResponse,
	type SalesforceRecord,
} from "./types";
import { validatePayload } from "./validate-payload";

export const DEFAULT_API_VERSION = 47.0;

/** Most requests {@link SalesforceConnection.sendBatch} accepts at once. */
export const MAX_BATCH_SIZE = 10;

/** Whether a verb carries a JSON body. */
const BODY_MODE: Record<HttpMethod, "none" | "json"> = {
	GET: "none",
	DELETE: "none",
	POST: "json",
	PATCH: "json",
};

/** Per-call state passed down the dispatch chain. */
interface DispatchContext {
	/** Check the target object and payload against the schema cache. */
	validate: boolean;
}

/** A request that passed method, object and payload checks. */
interface PreparedRequest {
	method: HttpMethod;
	path: string;
	payload?: SalesforcePayload;
}

/** Outcome of one entry of {@link SalesforceConnection.sendBatch}. */
export interface BatchEntryResult {
	entryId: string;
	result: Result<string, DispatchError>;
}

function isHttpMethod(method: string): method is HttpMethod {
	return HTTP_METHODS.some((supported) => supported === method);
}

/**
 * Client for the Salesforce REST API that validates requests against the
 * org's schema before sending them.
 *
 * Authentication happens on the first request. Object names and per-object
 * field lists are fetched on first need and cached for the lifetime of the
 * instance. Every request naming an object must name one the org has, and
 * POST/PATCH payloads may only use that object's fields.
 *
 * Public operations run one at a time per instance: a call waits for the
 * previous one (and any schema fetches it triggered) to finish. Responses are
 * returned as raw text except where a method documents otherwise.
 */
export class SalesforceConnection {
	private readonly apiVersion: number;
	private readonly transport: HttpTransport;
	private readonly logger: Logger;
	private readonly authenticator: SalesforceAuthenticator;
	private readonly schema: SchemaCache;
	private readonly queue = new SerialQueue();

	constructor(config: SalesforceConnectorConfig, options: { transport?: HttpTransport } = {}) {
		this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
		this.logger = config.logger ?? defaultLogger;
		this.transport = options.transport ?? new FetchTransport({ timeoutMs: config.timeoutMs });
		this.authenticator = new SalesforceAuthenticator(config, this.transport, this.logger);
		this.schema = new SchemaCache((path) => this.send({ method: "GET", path }, { validate: false }));
	}

	/** Whether the connection holds a session. */
	get isAuthenticated(): boolean {
		return this.authenticator.isAuthenticated;
	}

	/** Authenticate now instead of on the first request. No-op once authenticated. */
	async authenticate(): Promise<Result<void, AuthenticationError>> {
		return this.queue.run(async () => {
			const session = await this.authenticator.ensureAuthenticated();
			return session.ok ? Ok(undefined) : session;
		});
	}

	/**
	 * Validate and send one request, resolving with the raw response body.
	 *
	 * Fails without sending when the method is unsupported, the path names an
	 * unknown object, a POST/PATCH has no payload, or the payload uses a field
	 * the object does not have. Non-2xx responses fail with {@link RequestError}.
	 * Nothing is retried.
	 */
	async dispatch(spec: RequestSpec): Promise<Result<string, DispatchError>> {
		return this.queue.run(() => this.send(spec, { validate: true }));
	}

	/** {@link dispatch} with positional arguments. */
	async request(
		method: string,
		path: string,
		options: RequestOptions = {},
	): Promise<Result<string, DispatchError>> {
		return this.dispatch({ method, path, ...options });
	}

	/**
	 * Run a SOQL query and return the full response envelope.
	 *
	 * Spaces are sent as `+`; the target object is validated like any other path.
	 */
	async query(
		soql: string,
	): Promise<Result<SalesforceQueryResponse<SalesforceRecord>, DispatchError>> {
		const response = await this.dispatch({
			method: "GET",
			path: `query?q=${soql.replaceAll(" ", "+")}`,
		});
		if (!response.ok) return response;
		return parseQueryResponse(response.value);
	}

	/** Run a SOQL query and return its records. */
	async queryWithSOQL(soql: string): Promise<Result<SalesforceRecord[], DispatchError>> {
		const response = await this.query(soql);
		if (!response.ok) return response;
		return Ok(response.value.records);
	}

	/** `GET sobjects/<objectName>/<id>` */
	async getRecord(objectName: string, id: string): Promise<Result<string, DispatchError>> {
		return this.dispatch({ method: "GET", path: `sobjects/${objectName}`, id });
	}

	/** `POST sobjects/<objectName>` */
	async createRecord(
		objectName: string,
		payload: SalesforcePayload,
	): Promise<Result<string, DispatchError>> {
		return this.dispatch({ method: "POST", path: `sobjects/${objectName}`, payload });
	}

	/** `PATCH sobjects/<objectName>/<id>` */
	async updateRecord(
		objectName: string,
		id: string,
		payload: SalesforcePayload,
	): Promise<Result<string, DispatchError>> {
		return this.dispatch({ method: "PATCH", path: `sobjects/${objectName}`, id, payload });
	}

	/** `DELETE sobjects/<objectName>/<id>` */
	async deleteRecord(objectName: string, id: string): Promise<Result<string, DispatchError>> {
		return this.dispatch({ method: "DELETE", path: `sobjects/${objectName}`, id });
	}

	/** Names of every object in the org, sorted. */
	async listObjectNames(): Promise<Result<string[], DispatchError>> {
		return this.queue.run(async () => {
			const auth = await this.authenticator.ensureAuthenticated();
			if (!auth.ok) return auth;

			const names = await this.schema.objectNames();
			if (!names.ok) return names;
			return Ok([...names.value].sort());
		});
	}

	/** Field names of an object, in describe order. */
	async describeObject(objectName: string): Promise<Result<string[], DispatchError>> {
		return this.queue.run(async () => {
			const auth = await this.authenticator.ensureAuthenticated();
			if (!auth.ok) return auth;

			const names = await this.schema.objectNames();
			if (!names.ok) return names;
			if (!names.value.has(objectName)) return Err(new UnknownObjectError(objectName));

			const fields = await this.schema.objectFields(objectName);
			if (!fields.ok) return fields;
			return Ok([...fields.value]);
		});
	}

	/**
	 * Send up to {@link MAX_BATCH_SIZE} requests as independent dispatches.
	 *
	 * The batch is rejected as a whole, before anything is written, if it is
	 * empty, too large, repeats an entry id, or any entry fails validation.
	 * Otherwise entries are sent in order and each gets its own result: a
	 * failed entry neither stops the rest nor undoes the ones before it.
	 */
	async sendBatch(
		entries: readonly BatchEntry[],
	): Promise<Result<BatchEntryResult[], BatchLimitError | DispatchError>> {
		const limit = checkBatch(entries);
		if (!limit.ok) return limit;

		return this.queue.run(async () => {
			const auth = await this.authenticator.ensureAuthenticated();
			if (!auth.ok) return auth;

			const prepared: Array<{ entryId: string; request: PreparedRequest }> = [];
			for (const entry of entries) {
				const request = await this.prepare(entry, { validate: true });
				if (!request.ok) return request;
				prepared.push({ entryId: entry.entryId, request: request.value });
			}

			const results: BatchEntryResult[] = [];
			for (const { entryId, request } of prepared) {
				results.push({ entryId, result: await this.transmit(request) });
			}
			return Ok(results);
		});
	}

	// -----------------------------------------------------------------------
	// Dispatch pipeline
	// -----------------------------------------------------------------------

	/** Authenticate, check and transmit. Bypasses the queue; callers hold it. */
	private async send(
		spec: RequestSpec,
		context: DispatchContext,
	): Promise<Result<string, DispatchError>> {
		const auth = await this.authenticator.ensureAuthenticated();
		if (!auth.ok) return auth;

		const request = await this.prepare(spec, context);
		if (!request.ok) return request;

		return this.transmit(request.value);
	}

	/** Method, object and payload checks. May fetch schema metadata. */
	private async prepare(
		spec: RequestSpec,
		context: DispatchContext,
	): Promise<Result<PreparedRequest, DispatchError>> {
		const { method } = spec;
		if (!isHttpMethod(method)) {
			return Err(new UnsupportedMethodError(method));
		}

		const path = spec.id ? `${spec.path}/${spec.id}` : spec.path;
		const objectName = context.validate ? objectNameFromPath(path) : "";

		if (objectName) {
			const names = await this.schema.objectNames();
			if (!names.ok) return names;
			if (!names.value.has(objectName)) {
				return Err(new UnknownObjectError(objectName));
			}
		}

		if (BODY_MODE[method] === "none") {
			return Ok({ method, path });
		}

		const { payload } = spec;
		if (!payload || Object.keys(payload).length === 0) {
			return Err(new MissingPayloadError(method));
		}

		if (objectName) {
			const fields = await this.schema.objectFields(objectName);
			if (!fields.ok) return fields;

			const valid = validatePayload(payload, fields.value, objectName);
			if (!valid.ok) return valid;
		}

		return Ok({ method, path, payload });
	}

	/** Send a prepared request. Requires an established session. */
	private async transmit(request: PreparedRequest): Promise<Result<string, DispatchError>> {
		const session = await this.authenticator.ensureAuthenticated();
		if (!session.ok) return session;

		const { baseUrl, bearerToken } = session.value;
		const url = `${baseUrl}/services/data/v${this.apiVersion.toFixed(1)}/${request.path}`;
		const headers: Record<string, string> = {
			Authorization: `Bearer ${bearerToken}`,
			Accept: "application/json",
		};

		let body: string | undefined;
		if (BODY_MODE[request.method] === "json") {
			headers["Content-Type"] = "application/json";
			body = JSON.stringify(request.payload);
		}

		this.logger("debug", `${request.method} ${request.path}`);

		const sent = await this.transport.send({ method: request.method, url, headers, body });
		if (!sent.ok) {
			this.logger("warn", `${request.method} ${request.path} failed`, {
				error: sent.error.responseBody,
			});
			return sent;
		}

		const response = sent.value;
		if (!isSuccessStatus(response.status)) {
			this.logger("warn", `${request.method} ${request.path} failed`, { status: response.status });
			return Err(new RequestError(response.status, response.body));
		}

		return Ok(response.body);
	}
}

/** Size and entry-id checks for {@link SalesforceConnection.sendBatch}. */
function checkBatch(entries: readonly BatchEntry[]): Result<void, BatchLimitError> {
	if (entries.length === 0) {
		return Err(new BatchLimitError("The list of entries cannot be empty"));
	}
	if (entries.length > MAX_BATCH_SIZE) {
		return Err(
			new BatchLimitError(
				`The maximum number of requests allowed in a batch is ${MAX_BATCH_SIZE}, got ${entries.length}`,
			),
		);
	}

	const seen = new Set<string>();
	for (const entry of entries) {
		if (!entry.entryId) {
			return Err(new BatchLimitError("Every batch entry needs an entryId"));
		}
		if (seen.has(entry.entryId)) {
			return Err(new BatchLimitError(`Entry id "${entry.entryId}" is used more than once`));
		}
		seen.add(entry.entryId);
	}
	return Ok(undefined);
}
