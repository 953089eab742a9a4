import { ConfigError, Err, type Logger, Ok, type Result } from "@forcegate/core";
import type { SalesforceConnectorConfig } from "./types";

function isLogger(value: unknown): value is Logger {
	return typeof value === "function";
}

const REQUIRED_STRINGS = ["authUrl", "username", "password", "clientId", "clientSecret"] as const;

/** Environment variables read by {@link salesforceConfigFromEnv}. */
export const SALESFORCE_ENV = {
	authUrl: "SF_AUTH_URL",
	username: "SF_USERNAME",
	password: "SF_PASSWORD",
	clientId: "SF_CLIENT_ID",
	clientSecret: "SF_CLIENT_SECRET",
	apiVersion: "SF_API_VERSION",
	grantType: "SF_GRANT_TYPE",
	timeoutMs: "SF_TIMEOUT_MS",
} as const;

/**
 * Validate a Salesforce connector configuration for structural correctness.
 *
 * Checks:
 * - `authUrl`, `username`, `password`, `clientId`, `clientSecret` are non-empty strings
 * - `authUrl` is an http(s) URL
 * - optional `apiVersion` is a positive number
 * - optional `grantType` is a non-empty string
 * - optional `timeoutMs` is a positive integer
 *
 * A `logger` property is passed through when it is a function.
 *
 * @param input - Raw input to validate.
 * @returns The validated {@link SalesforceConnectorConfig} or a validation error.
 */
export function validateSalesforceConfig(
	input: unknown,
): Result<SalesforceConnectorConfig, ConfigError> {
	if (typeof input !== "object" || input === null) {
		return Err(new ConfigError("Salesforce config must be an object"));
	}

	const obj: Record<string, unknown> = { ...input };

	// --- credentials ---
	const strings: Record<(typeof REQUIRED_STRINGS)[number], string> = {
		authUrl: "",
		username: "",
		password: "",
		clientId: "",
		clientSecret: "",
	};
	for (const key of REQUIRED_STRINGS) {
		const value = obj[key];
		if (typeof value !== "string" || value.length === 0) {
			return Err(new ConfigError(`Salesforce config requires a non-empty ${key}`));
		}
		strings[key] = value;
	}

	if (!/^https?:\/\//.test(strings.authUrl)) {
		return Err(new ConfigError("Salesforce authUrl must be an http(s) URL"));
	}

	const config: SalesforceConnectorConfig = { ...strings };

	// --- apiVersion ---
	if (obj.apiVersion !== undefined) {
		if (typeof obj.apiVersion !== "number" || !Number.isFinite(obj.apiVersion) || obj.apiVersion <= 0) {
			return Err(new ConfigError("Salesforce apiVersion must be a positive number"));
		}
		config.apiVersion = obj.apiVersion;
	}

	// --- grantType ---
	if (obj.grantType !== undefined) {
		if (typeof obj.grantType !== "string" || obj.grantType.length === 0) {
			return Err(new ConfigError("Salesforce grantType must be a non-empty string"));
		}
		config.grantType = obj.grantType;
	}

	// --- timeoutMs ---
	if (obj.timeoutMs !== undefined) {
		if (
			typeof obj.timeoutMs !== "number" ||
			!Number.isInteger(obj.timeoutMs) ||
			obj.timeoutMs <= 0
		) {
			return Err(new ConfigError("Salesforce timeoutMs must be a positive integer"));
		}
		config.timeoutMs = obj.timeoutMs;
	}

	// --- logger ---
	const { logger } = obj;
	if (logger !== undefined) {
		if (!isLogger(logger)) {
			return Err(new ConfigError("Salesforce logger must be a function"));
		}
		config.logger = logger;
	}

	return Ok(config);
}

/**
 * Build a connector configuration from environment variables.
 *
 * Numeric variables are parsed before validation, so `SF_API_VERSION=abc`
 * fails the same way a non-numeric `apiVersion` would.
 *
 * @param env - Variables to read (default `process.env`).
 */
export function salesforceConfigFromEnv(
	env: Record<string, string | undefined> = process.env,
): Result<SalesforceConnectorConfig, ConfigError> {
	const input: Record<string, unknown> = {
		authUrl: env[SALESFORCE_ENV.authUrl],
		username: env[SALESFORCE_ENV.username],
		password: env[SALESFORCE_ENV.password],
		clientId: env[SALESFORCE_ENV.clientId],
		clientSecret: env[SALESFORCE_ENV.clientSecret],
	};

	const apiVersion = env[SALESFORCE_ENV.apiVersion];
	if (apiVersion) input.apiVersion = Number(apiVersion);

	const grantType = env[SALESFORCE_ENV.grantType];
	if (grantType) input.grantType = grantType;

	const timeoutMs = env[SALESFORCE_ENV.timeoutMs];
	if (timeoutMs) input.timeoutMs = Number(timeoutMs);

	return validateSalesforceConfig(input);
}
