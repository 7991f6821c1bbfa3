/**
 * Error taxonomy for the leveling and giveaway engines.
 *
 * Handlers switch on `code` to pick a user-facing reply; anything that is not
 * an EngagementError is unexpected and gets logged.
 *
 * @module utils/errors
 */

import type { ZodError } from "zod";

export type EngagementErrorCode =
	| "VALIDATION"
	| "NOT_FOUND"
	| "INELIGIBLE"
	| "CONCURRENCY_CONFLICT";

export class EngagementError extends Error {
	constructor(
		public readonly code: EngagementErrorCode,
		message: string,
	) {
		super(message);
		this.name = "EngagementError";
	}
}

/**
 * Malformed configuration or parameters. Always raised before any write.
 */
export class ValidationError extends EngagementError {
	constructor(
		message: string,
		public readonly issues: readonly string[] = [message],
	) {
		super("VALIDATION", message);
		this.name = "ValidationError";
	}

	static fromZod(error: ZodError, subject: string): ValidationError {
		const issues = error.issues.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		);
		return new ValidationError(`Invalid ${subject}: ${issues.join("; ")}`, issues);
	}
}

export class NotFoundError extends EngagementError {
	constructor(
		public readonly entity: "giveaway" | "guild" | "role" | "user" | "timer",
		public readonly id: number | string,
	) {
		super("NOT_FOUND", `${entity} ${id} not found`);
		this.name = "NotFoundError";
	}
}

export type Ineligibility =
	| { reason: "LEVEL_TOO_LOW"; required: number; actual: number }
	| { reason: "MISSING_ROLE"; anyOf: readonly number[] };

/**
 * A giveaway entry refused by its level or role gate. Reported to the
 * entrant; not a failure of the bot.
 */
export class IneligibleError extends EngagementError {
	constructor(public readonly detail: Ineligibility) {
		super(
			"INELIGIBLE",
			detail.reason === "LEVEL_TOO_LOW"
				? `Level ${detail.required} required (current level ${detail.actual})`
				: "Missing a required role",
		);
		this.name = "IneligibleError";
	}
}

/**
 * Lost a race on an atomic claim. Callers treat it as a no-op.
 */
export class ConcurrencyConflictError extends EngagementError {
	constructor(message: string) {
		super("CONCURRENCY_CONFLICT", message);
		this.name = "ConcurrencyConflictError";
	}
}

/**
 * Text to show a user for an expected failure, or null when the error is
 * unexpected and should be logged instead.
 */
export function userMessageFor(error: unknown): string | null {
	if (error instanceof ValidationError) return error.issues.join("\n");
	if (error instanceof EngagementError) return error.message;
	return null;
}
