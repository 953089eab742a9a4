import { Err, Ok, type Result } from "@forcegate/core";
import { InvalidFieldError } from "./errors";
import type { SalesforcePayload } from "./types";

/**
 * Check that every payload key is a field of the target object.
 *
 * Stops at the first unknown key. Only field presence is checked, not values.
 *
 * @param payload - Outgoing POST/PATCH body.
 * @param allowedFields - Field names of the target object.
 * @param objectName - Included in the error message when given.
 */
export function validatePayload(
	payload: SalesforcePayload,
	allowedFields: ReadonlySet<string>,
	objectName = "",
): Result<void, InvalidFieldError> {
	for (const field of Object.keys(payload)) {
		if (!allowedFields.has(field)) {
			return Err(new InvalidFieldError(field, objectName));
		}
	}
	return Ok(undefined);
}
