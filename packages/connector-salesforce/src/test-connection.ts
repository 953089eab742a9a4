import type { Result } from "@forcegate/core";
import { SalesforceConnection } from "./connection";
import type { AuthenticationError } from "./errors";
import type { HttpTransport, SalesforceConnectorConfig } from "./types";

/**
 * Test a Salesforce connection by attempting OAuth authentication.
 *
 * Creates a `SalesforceConnection` internally and calls `authenticate()`.
 * The credentials are valid when the OAuth flow succeeds.
 */
export async function testConnection(
	config: SalesforceConnectorConfig,
	options: { transport?: HttpTransport } = {},
): Promise<Result<void, AuthenticationError>> {
	const connection = new SalesforceConnection(config, options);
	return connection.authenticate();
}
