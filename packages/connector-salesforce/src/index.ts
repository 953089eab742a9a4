export { SalesforceAuthenticator, type SalesforceSession } from "./authenticator";
export { SALESFORCE_ENV, salesforceConfigFromEnv, validateSalesforceConfig } from "./config";
export {
	type BatchEntryResult,
	DEFAULT_API_VERSION,
	MAX_BATCH_SIZE,
	SalesforceConnection,
} from "./connection";
export {
	AuthenticationError,
	BatchLimitError,
	type DispatchError,
	InvalidFieldError,
	InvalidResponseError,
	MissingPayloadError,
	RequestError,
	UnknownObjectError,
	UnsupportedMethodError,
} from "./errors";
export { objectNameFromPath } from "./path";
export { SchemaCache, type SchemaFetcher } from "./schema-cache";
export { testConnection } from "./test-connection";
export { DEFAULT_TIMEOUT_MS, FetchTransport, isSuccessStatus } from "./transport";
export {
	type BatchEntry,
	HTTP_METHODS,
	type HttpMethod,
	type HttpRequest,
	type HttpResponse,
	type HttpTransport,
	type RequestOptions,
	type RequestSpec,
	type SalesforceAuthResponse,
	type SalesforceConnectorConfig,
	type SalesforcePayload,
	type SalesforceQueryResponse,
	type SalesforceRecord,
	type SObjectDescribeResponse,
	type SObjectListResponse,
} from "./types";
export { validatePayload } from "./validate-payload";
