import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MAX_BATCH_SIZE, SalesforceConnection } from "../connection";
import { BatchLimitError, InvalidFieldError, RequestError } from "../errors";
import type { BatchEntry } from "../types";
import {
	API_BASE,
	AUTH_URL,
	authResponse,
	config,
	contactDescribe,
	fetchCalls,
	jsonResponse,
	mockFetch,
	objectList,
	textResponse,
} from "./helpers";

beforeEach(() => {
	mockFetch.mockReset();
	vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
	vi.unstubAllGlobals();
});

function contactEntry(entryId: string, payload: Record<string, string>): BatchEntry {
	return { entryId, method: "POST", path: "sobjects/Contact", payload };
}

describe("SalesforceConnection.sendBatch", () => {
	it("rejects more than the batch limit before any network call", async () => {
		const entries = Array.from({ length: MAX_BATCH_SIZE + 1 }, (_, i) =>
			contactEntry(`e${i}`, { LastName: `L${i}` }),
		);

		const result = await new SalesforceConnection(config).sendBatch(entries);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(BatchLimitError);
			expect(result.error.message).toBe(
				"The maximum number of requests allowed in a batch is 10, got 11",
			);
		}
		expect(mockFetch).not.toHaveBeenCalled();
	});

	it("rejects an empty batch", async () => {
		const result = await new SalesforceConnection(config).sendBatch([]);

		expect(!result.ok && result.error.message).toBe("The list of entries cannot be empty");
		expect(mockFetch).not.toHaveBeenCalled();
	});

	it("rejects repeated entry ids", async () => {
		const result = await new SalesforceConnection(config).sendBatch([
			contactEntry("same", { LastName: "A" }),
			contactEntry("same", { LastName: "B" }),
		]);

		expect(!result.ok && result.error.message).toBe('Entry id "same" is used more than once');
		expect(mockFetch).not.toHaveBeenCalled();
	});

	it("validates every entry before sending any", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse(authResponse));
		mockFetch.mockResolvedValueOnce(jsonResponse(objectList));
		mockFetch.mockResolvedValueOnce(jsonResponse(contactDescribe));

		const result = await new SalesforceConnection(config).sendBatch([
			contactEntry("good", { LastName: "A" }),
			contactEntry("bad", { Nickname: "B" }),
		]);

		expect(!result.ok && result.error).toBeInstanceOf(InvalidFieldError);
		expect(fetchCalls()).toEqual([
			`POST ${AUTH_URL}`,
			`GET ${API_BASE}/sobjects`,
			`GET ${API_BASE}/sobjects/Contact/describe`,
		]);
	});

	it("reports each entry's outcome without undoing earlier ones", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse(authResponse));
		mockFetch.mockResolvedValueOnce(jsonResponse(objectList));
		mockFetch.mockResolvedValueOnce(jsonResponse(contactDescribe));
		mockFetch.mockResolvedValueOnce(textResponse('{"id":"003A","success":true,"errors":[]}', 201));
		mockFetch.mockResolvedValueOnce(textResponse('[{"errorCode":"DUPLICATES_DETECTED"}]', 400));
		mockFetch.mockResolvedValueOnce(textResponse("", 200));

		const result = await new SalesforceConnection(config).sendBatch([
			contactEntry("first", { LastName: "A" }),
			contactEntry("second", { LastName: "A" }),
			{ entryId: "third", method: "GET", path: "sobjects/Contact", id: "003A" },
		]);

		expect(result.ok).toBe(true);
		if (!result.ok) return;

		const [first, second, third] = result.value;
		expect(first).toEqual({
			entryId: "first",
			result: { ok: true, value: '{"id":"003A","success":true,"errors":[]}' },
		});
		expect(second?.entryId).toBe("second");
		expect(second?.result.ok).toBe(false);
		if (second && !second.result.ok) {
			expect(second.result.error).toBeInstanceOf(RequestError);
			expect(second.result.error.message).toBe(
				'Salesforce API error (400): [{"errorCode":"DUPLICATES_DETECTED"}]',
			);
		}
		expect(third).toEqual({ entryId: "third", result: { ok: true, value: "" } });

		expect(fetchCalls().slice(3)).toEqual([
			`POST ${API_BASE}/sobjects/Contact`,
			`POST ${API_BASE}/sobjects/Contact`,
			`GET ${API_BASE}/sobjects/Contact/003A`,
		]);
	});
});
