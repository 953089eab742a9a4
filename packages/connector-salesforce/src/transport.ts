import { Err, Ok, type Result, toError } from "@forcegate/core";
import { RequestError } from "./errors";
import type { HttpRequest, HttpResponse, HttpTransport } from "./types";

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * {@link HttpTransport} backed by global `fetch`.
 *
 * Every request is aborted after `timeoutMs`. Timeouts and network failures
 * resolve to a {@link RequestError} with status 0.
 */
export class FetchTransport implements HttpTransport {
	private readonly timeoutMs: number;

	constructor(options: { timeoutMs?: number } = {}) {
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	}

	async send(request: HttpRequest): Promise<Result<HttpResponse, RequestError>> {
		try {
			const response = await fetch(request.url, {
				method: request.method,
				headers: request.headers,
				body: request.body,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			return Ok({ status: response.status, body: await response.text() });
		} catch (err) {
			const error = toError(err);
			const reason =
				error.name === "TimeoutError"
					? `Request timed out after ${this.timeoutMs}ms`
					: `Failed to reach Salesforce: ${error.message}`;
			return Err(new RequestError(0, reason, error));
		}
	}
}

/** Whether an HTTP status code denotes success. */
export function isSuccessStatus(status: number): boolean {
	return status >= 200 && status < 300;
}
