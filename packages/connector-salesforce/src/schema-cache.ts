import { Ok, type Result } from "@forcegate/core";
import type { DispatchError } from "./errors";
import { parseDescribe, parseObjectList } from "./responses";

/**
 * Issues a GET with schema validation suspended and resolves with the raw body.
 *
 * The schema cache calls back into the dispatcher through this function; the
 * dispatcher must not validate these requests, or resolving the object list
 * would itself need the object list.
 */
export type SchemaFetcher = (path: string) => Promise<Result<string, DispatchError>>;

/**
 * Per-connection cache of the org's object names and object fields.
 *
 * Both caches fill lazily on first miss and are never invalidated. A failed
 * fetch stores nothing, so the next lookup fetches again.
 */
export class SchemaCache {
	private readonly fetch: SchemaFetcher;
	private objectNameCache: ReadonlySet<string> | null = null;
	private readonly objectFieldCache = new Map<string, ReadonlySet<string>>();

	constructor(fetch: SchemaFetcher) {
		this.fetch = fetch;
	}

	/** Names of every object in the org, fetched with `GET sobjects` on first use. */
	async objectNames(): Promise<Result<ReadonlySet<string>, DispatchError>> {
		if (this.objectNameCache) return Ok(this.objectNameCache);

		const response = await this.fetch("sobjects");
		if (!response.ok) return response;

		const parsed = parseObjectList(response.value);
		if (!parsed.ok) return parsed;

		this.objectNameCache = new Set(parsed.value.sobjects.map((sobject) => sobject.name));
		return Ok(this.objectNameCache);
	}

	/** Field names of `objectName`, fetched with `GET sobjects/<name>/describe` on first use. */
	async objectFields(objectName: string): Promise<Result<ReadonlySet<string>, DispatchError>> {
		const cached = this.objectFieldCache.get(objectName);
		if (cached) return Ok(cached);

		const response = await this.fetch(`sobjects/${objectName}/describe`);
		if (!response.ok) return response;

		const parsed = parseDescribe(response.value, objectName);
		if (!parsed.ok) return parsed;

		const fields: ReadonlySet<string> = new Set(parsed.value.fields.map((field) => field.name));
		this.objectFieldCache.set(objectName, fields);
		return Ok(fields);
	}
}
