/**
 * Validation wrapper — Zod behind Result<T, ValidationError>.
 *
 * Ledger code imports `{ z }` from here rather than from "zod" so the
 * dependency stays behind one import path.
 */

import { z } from "zod";
import { ErrorCategory, LedgerError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error carrying every issue Zod reported. */
export class ValidationError extends LedgerError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/**
 * Validate data against a Zod schema without throwing.
 * @param label - Names the value in the error message
 */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	label = "value",
): Result<z.output<S>, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	const first = issues[0];
	const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
	const detail = first ? `: ${first.message}${where}` : "";
	return err(new ValidationError(`Invalid ${label}${detail}`, issues));
}
