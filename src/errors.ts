/**
 * Base error class for deno-deps failures
 */
export class DenoDepsError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "DenoDepsError";
	}
}

/**
 * Error thrown when a lock file is not valid JSON or does not match the
 * deno.lock schema
 */
export class MalformedLockError extends DenoDepsError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "MalformedLockError";
	}
}

/**
 * Error thrown when a derived value violates a precondition
 * (e.g. a non-https URL handed to the cache-path deriver)
 */
export class InvalidInputError extends DenoDepsError {
	constructor(message: string) {
		super(message);
		this.name = "InvalidInputError";
	}
}

/**
 * Error thrown when a registry request fails, either with a non-success
 * status or before a response arrives
 */
export class FetchFailedError extends DenoDepsError {
	readonly url: string;
	readonly status?: number;

	constructor(
		url: string,
		details: { status?: number; statusText?: string; cause?: unknown },
	) {
		super(describeFetchFailure(url, details), { cause: details.cause });
		this.name = "FetchFailedError";
		this.url = url;
		this.status = details.status;
	}
}

/**
 * Error thrown when a persisted manifest cannot be read back
 */
export class MalformedManifestError extends DenoDepsError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "MalformedManifestError";
	}
}

/**
 * Error thrown when a configuration value is invalid
 */
export class ConfigError extends DenoDepsError {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Get a human-readable description for common HTTP status codes
 */
function getHttpStatusDescription(status: number): string {
	const descriptions: Record<number, string> = {
		400: "Bad Request",
		401: "Unauthorized",
		403: "Forbidden",
		404: "Not Found",
		410: "Gone",
		429: "Too Many Requests",
		500: "Internal Server Error",
		502: "Bad Gateway",
		503: "Service Unavailable",
		504: "Gateway Timeout",
	};
	return descriptions[status] ?? "HTTP Error";
}

function describeFetchFailure(
	url: string,
	details: { status?: number; statusText?: string; cause?: unknown },
): string {
	if (details.status !== undefined) {
		const text = details.statusText || getHttpStatusDescription(details.status);
		return `Request to ${url} failed: HTTP ${details.status} ${text}`;
	}
	const reason =
		details.cause instanceof Error
			? details.cause.message
			: String(details.cause ?? "unknown error");
	return `Request to ${url} failed: ${reason}`;
}

/**
 * Render an error for the terminal. Falls back to the error's class name
 * when it carries no message.
 */
export function formatError(
	error: unknown,
	options: { includeStack?: boolean } = {},
): string {
	if (!(error instanceof Error)) {
		return String(error);
	}

	const message = error.message || error.name;
	if (!options.includeStack || !error.stack) {
		return message;
	}
	return `${message}\n${error.stack}`;
}
