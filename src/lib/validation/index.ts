/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Re-exports `z` so schemas are defined through this module; only this file
 * imports zod directly.
 */

import { z } from "zod";
import { FatalError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Fatal error listing every invalid field. */
export class ValidationError extends FatalError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, { issues: issues.map(formatIssue) }, "VALIDATION_FAILED");
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Renders an issue as `path.to.field: message`. */
export function formatIssue(issue: ValidationIssue): string {
	const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
	return `${path}: ${issue.message}`;
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "input",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(`Invalid ${label}: ${issues.map(formatIssue).join("; ")}`, issues));
}
