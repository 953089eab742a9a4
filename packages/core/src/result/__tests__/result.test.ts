import { describe, expect, it } from "vitest";
import { ConfigError, Err, ForceGateError, Ok, toError } from "../../result";

describe("Result", () => {
	it("Ok/Err have correct discriminants", () => {
		const ok = Ok(42);
		const err = Err(new ForceGateError("fail", "TEST"));

		expect(ok).toEqual({ ok: true, value: 42 });
		expect(err.ok).toBe(false);
		if (!err.ok) expect(err.error).toBeInstanceOf(ForceGateError);
	});
});

describe("errors", () => {
	it("ConfigError is a ForceGateError with its own code", () => {
		const error = new ConfigError("bad config");
		expect(error).toBeInstanceOf(ForceGateError);
		expect(error.code).toBe("CONFIG_ERROR");
		expect(error.name).toBe("ConfigError");
		expect(error.message).toBe("bad config");
	});

	it("keeps the cause", () => {
		const cause = new Error("root");
		expect(new ForceGateError("outer", "TEST", cause).cause).toBe(cause);
	});

	it("toError coerces non-Error values", () => {
		const original = new Error("x");
		expect(toError(original)).toBe(original);
		expect(toError("plain").message).toBe("plain");
		expect(toError(7).message).toBe("7");
	});
});
