import { describe, expect, it } from "vitest";
import { ErrorCategory } from "../../shared/errors.js";
import { ValidationError, formatIssue, validate, z } from "./index.js";

describe("validate", () => {
	const schema = z.object({
		symbol: z.string().min(1),
		takeProfit: z.object({ levels: z.number().int().positive() }),
	});

	it("returns ok with parsed data", () => {
		const result = validate(schema, { symbol: "BTCUSDT", takeProfit: { levels: 5 } });
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value.takeProfit.levels).toBe(5);
	});

	it("returns a fatal ValidationError listing every issue", () => {
		const result = validate(schema, { symbol: "", takeProfit: { levels: 0 } }, "config");

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(ValidationError);
		expect(result.error.category).toBe(ErrorCategory.Fatal);
		expect(result.error.code).toBe("VALIDATION_FAILED");
		expect(result.error.issues.map((i) => i.path.join("."))).toEqual(["symbol", "takeProfit.levels"]);
		expect(result.error.message.startsWith("Invalid config: symbol:")).toBe(true);
	});

	it("applies schema defaults", () => {
		const withDefault = z.object({ levels: z.number().default(5) });
		const result = validate(withDefault, {});
		expect(result.ok && result.value.levels).toBe(5);
	});
});

describe("formatIssue", () => {
	it("joins the path with dots", () => {
		expect(formatIssue({ path: ["a", 0, "b"], message: "bad" })).toBe("a.0.b: bad");
	});

	it("labels root issues", () => {
		expect(formatIssue({ path: [], message: "bad" })).toBe("(root): bad");
	});
});
