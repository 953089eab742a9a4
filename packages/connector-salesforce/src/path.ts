// ---------------------------------------------------------------------------
// Object name derivation from REST paths
// ---------------------------------------------------------------------------

const SOQL_MARKER = "query?q=SELECT";
const FROM_TOKEN = "FROM+";
const WHERE_TOKEN = "+WHERE";

/**
 * Extract the Salesforce object a request path targets.
 *
 * Recognised shapes, checked in order:
 * - `sobjects/Account/describe` → `"Account"`
 * - `query?q=SELECT+Name+FROM+Account+WHERE+...` → `"Account"` (text between
 *   `FROM+` and `+WHERE`, or to the end when there is no `+WHERE`)
 * - `sobjects` → `""`
 * - `sobjects/Account`, `sobjects/Account/001xx` → `"Account"`
 *
 * An empty result means the path targets no specific object and needs no
 * schema validation. A SOQL string without `FROM+` also yields `""`.
 */
export function objectNameFromPath(path: string): string {
	if (path.includes("describe")) {
		return path.split("/")[1] ?? "";
	}

	if (path.includes(SOQL_MARKER)) {
		return objectNameFromSoql(path);
	}

	if (path === "sobjects") {
		return "";
	}

	const segments = path.split("/");
	const index = segments.indexOf("sobjects");
	if (index === -1) return "";
	return segments[index + 1] ?? "";
}

function objectNameFromSoql(path: string): string {
	const from = path.indexOf(FROM_TOKEN);
	if (from === -1) return "";

	const rest = path.slice(from + FROM_TOKEN.length);
	const where = rest.indexOf(WHERE_TOKEN);
	return where === -1 ? rest : rest.slice(0, where);
}
