import { silentLogger } from "@forcegate/core";
import { vi } from "vitest";
import type { SalesforceAuthResponse, SalesforceConnectorConfig } from "../types";

export const mockFetch = vi.fn<(...args: Parameters<typeof fetch>) => Promise<Response>>();

export const AUTH_URL = "https://login.example.com/services/oauth2/token";
export const INSTANCE_URL = "https://example.my.salesforce.com";
export const API_BASE = `${INSTANCE_URL}/services/data/v47.0`;

export const config: SalesforceConnectorConfig = {
	authUrl: AUTH_URL,
	username: "user@example.com",
	password: "test-password",
	clientId: "test-client-id",
	clientSecret: "test-client-secret",
	logger: silentLogger,
};

export const authResponse: SalesforceAuthResponse = {
	access_token: "test-token",
	instance_url: INSTANCE_URL,
	token_type: "Bearer",
	issued_at: "1700000000000",
	signature: "sig",
};

export const objectList = {
	sobjects: [{ name: "Account" }, { name: "Contact" }, { name: "Lead" }],
};

export const contactDescribe = {
	fields: [{ name: "Id" }, { name: "FirstName" }, { name: "LastName" }, { name: "Email" }],
};

export const accountDescribe = {
	fields: [{ name: "Id" }, { name: "Name" }, { name: "Industry" }],
};

export function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

export function textResponse(body: string, status = 200): Response {
	return new Response(body, { status });
}

/** `"<METHOD> <url>"` for every fetch call so far. */
export function fetchCalls(): string[] {
	return mockFetch.mock.calls.map(([url, init]) => `${init?.method ?? "GET"} ${String(url)}`);
}

/** The init of the fetch call at `index`. */
export function fetchInit(index: number): RequestInit {
	const call = mockFetch.mock.calls[index];
	if (!call) throw new Error(`fetch was called ${mockFetch.mock.calls.length} times`);
	return call[1] ?? {};
}
