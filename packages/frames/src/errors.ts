import type { NavigationErrorCode } from "@framenav/types";

export class NavigationError extends Error {
	readonly code: NavigationErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(
		code: NavigationErrorCode,
		message: string,
		details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "NavigationError";
		this.code = code;
		this.details = details;
	}
}

export function isNavigationError(error: unknown): error is NavigationError {
	return error instanceof NavigationError;
}
