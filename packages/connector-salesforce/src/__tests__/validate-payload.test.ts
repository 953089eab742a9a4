import { describe, expect, it } from "vitest";
import { InvalidFieldError } from "../errors";
import { validatePayload } from "../validate-payload";

const allowed = new Set(["Name", "Email"]);

describe("validatePayload", () => {
	it("accepts a payload whose keys are all known fields", () => {
		expect(validatePayload({ Name: "Ada", Email: "ada@example.com" }, allowed).ok).toBe(true);
	});

	it("accepts an empty payload", () => {
		expect(validatePayload({}, allowed).ok).toBe(true);
		expect(validatePayload({}, new Set()).ok).toBe(true);
	});

	it("rejects an unknown field", () => {
		const result = validatePayload({ Bogus: "x" }, allowed);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(InvalidFieldError);
			expect(result.error.field).toBe("Bogus");
			expect(result.error.code).toBe("SALESFORCE_INVALID_FIELD");
			expect(result.error.message).toBe("Bogus isn't a valid field");
		}
	});

	it("reports only the first unknown field", () => {
		const result = validatePayload({ Name: "Ada", First: "1", Second: "2" }, allowed, "Contact");

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.field).toBe("First");
			expect(result.error.objectName).toBe("Contact");
			expect(result.error.message).toBe("First isn't a valid field of Contact");
		}
	});

	it("checks presence only, not values", () => {
		expect(validatePayload({ Name: "" }, allowed).ok).toBe(true);
	});
});
