/**
 * HTTP client for the JSR registry.
 *
 * Thin wrapper around fetch that turns every failure into a
 * FetchFailedError and retries transient ones.
 */

import { FetchFailedError } from "./errors";

export interface RegistryClientOptions {
	/** Custom fetch function (defaults to globalThis.fetch) */
	fetch?: typeof fetch;
	/** Request timeout in milliseconds (default: 30000) */
	timeout?: number;
	/** Extra attempts after a transient failure (default: 2) */
	retries?: number;
	/** Base delay between attempts in milliseconds, doubled each time (default: 1000) */
	retryDelay?: number;
	/** User-Agent header sent with every request */
	userAgent?: string;
}

/** Statuses worth another attempt */
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export const DEFAULT_TIMEOUT = 30_000;
export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY = 1000;
export const DEFAULT_USER_AGENT = "deno-deps";

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RegistryClient {
	private readonly fetchImpl: typeof fetch;
	private readonly timeout: number;
	private readonly retries: number;
	private readonly retryDelay: number;
	private readonly userAgent: string;

	constructor(options: RegistryClientOptions = {}) {
		this.fetchImpl = options.fetch ?? globalThis.fetch;
		this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
		this.retries = options.retries ?? DEFAULT_RETRIES;
		this.retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY;
		this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
	}

	/**
	 * Fetch a URL and return the raw response body.
	 *
	 * @throws FetchFailedError on a non-2xx status, once retries are spent,
	 * or when the request never gets a response
	 */
	async getBytes(url: string): Promise<Buffer> {
		for (let attempt = 0; ; attempt++) {
			const canRetry = attempt < this.retries;

			if (process.env.DENO_DEPS_DEBUG) {
				console.log(`[http] GET ${url} (attempt ${attempt + 1})`);
			}

			let response: Response;
			try {
				response = await this.fetchImpl(url, {
					headers: { "User-Agent": this.userAgent },
					signal: AbortSignal.timeout(this.timeout),
				});
			} catch (error) {
				if (canRetry) {
					await this.backoff(url, attempt, error);
					continue;
				}
				throw new FetchFailedError(url, { cause: error });
			}

			if (response.ok) {
				try {
					return Buffer.from(await response.arrayBuffer());
				} catch (error) {
					throw new FetchFailedError(url, { cause: error });
				}
			}

			// Release the connection before retrying or failing
			await response.body?.cancel();

			if (canRetry && RETRYABLE_STATUSES.has(response.status)) {
				await this.backoff(url, attempt, `HTTP ${response.status}`);
				continue;
			}

			throw new FetchFailedError(url, {
				status: response.status,
				statusText: response.statusText,
			});
		}
	}

	private async backoff(
		url: string,
		attempt: number,
		reason: unknown,
	): Promise<void> {
		const delay = this.retryDelay * 2 ** attempt;
		if (process.env.DENO_DEPS_DEBUG) {
			const detail = reason instanceof Error ? reason.message : String(reason);
			console.log(`[http] Retrying ${url} in ${delay}ms (${detail})`);
		}
		await sleep(delay);
	}
}

/**
 * Parse a response body as JSON, reporting failures against its URL
 */
export function parseJsonBody(url: string, body: Buffer): unknown {
	try {
		return JSON.parse(body.toString("utf-8"));
	} catch (error) {
		throw new FetchFailedError(url, {
			cause: new Error(
				`Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
			),
		});
	}
}
