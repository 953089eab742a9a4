import { defaultLogger, Err, type Logger, Ok, type Result } from "@forcegate/core";
import { AuthenticationError } from "./errors";
import { parseAuthResponse } from "./responses";
import { isSuccessStatus } from "./transport";
import type { HttpTransport, SalesforceConnectorConfig } from "./types";

const DEFAULT_GRANT_TYPE = "password";

/** Bearer token and instance URL obtained from the token endpoint. */
export interface SalesforceSession {
	readonly baseUrl: string;
	readonly bearerToken: string;
}

type Credentials = Pick<
	SalesforceConnectorConfig,
	"authUrl" | "username" | "password" | "clientId" | "clientSecret" | "grantType"
>;

/**
 * Holds the session of one connection.
 *
 * Authenticates with the OAuth 2.0 password grant on first use and keeps the
 * token for the lifetime of the instance. There is no refresh: an expired
 * token shows up as a 401 on a later request.
 */
export class SalesforceAuthenticator {
	private readonly credentials: Credentials;
	private readonly transport: HttpTransport;
	private readonly logger: Logger;
	private session: SalesforceSession | null = null;

	constructor(credentials: Credentials, transport: HttpTransport, logger: Logger = defaultLogger) {
		this.credentials = credentials;
		this.transport = transport;
		this.logger = logger;
	}

	/** Whether a session has been established. */
	get isAuthenticated(): boolean {
		return this.session !== null;
	}

	/**
	 * Return the current session, authenticating first if there is none.
	 *
	 * A failed attempt leaves the authenticator unauthenticated, so the next
	 * call tries again.
	 */
	async ensureAuthenticated(): Promise<Result<SalesforceSession, AuthenticationError>> {
		if (this.session) return Ok(this.session);

		const body = new URLSearchParams({
			grant_type: this.credentials.grantType ?? DEFAULT_GRANT_TYPE,
			username: this.credentials.username,
			password: this.credentials.password,
			client_id: this.credentials.clientId,
			client_secret: this.credentials.clientSecret,
		});

		this.logger("debug", "Authenticating with Salesforce", { authUrl: this.credentials.authUrl });

		const sent = await this.transport.send({
			method: "POST",
			url: this.credentials.authUrl,
			headers: {
				Accept: "application/json",
				"Content-Type": "application/x-www-form-urlencoded",
			},
			body: body.toString(),
		});

		if (!sent.ok) {
			return Err(
				new AuthenticationError(
					`Failed to connect to Salesforce auth endpoint: ${sent.error.responseBody}`,
					sent.error,
				),
			);
		}

		const response = sent.value;
		if (!isSuccessStatus(response.status)) {
			return Err(
				new AuthenticationError(
					`Salesforce authentication failed (${response.status}): ${response.body}`,
				),
			);
		}

		const parsed = parseAuthResponse(response.body);
		if (!parsed.ok) {
			return Err(new AuthenticationError(parsed.error.message, parsed.error));
		}

		this.session = {
			baseUrl: parsed.value.instance_url,
			bearerToken: parsed.value.access_token,
		};
		this.logger("debug", "Authenticated with Salesforce", { instanceUrl: this.session.baseUrl });

		return Ok(this.session);
	}
}
