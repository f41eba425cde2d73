import { createHash } from "node:crypto";
import { InvalidInputError } from "@/errors";

const HTTPS_PREFIX = "https://";

/**
 * Cache path of the npm tarball layout inside DENO_DIR. Fixed to the public
 * registry host regardless of where the tarball is downloaded from.
 */
export const NPM_CACHE_ROOT = "npm/registry.npmjs.org";

/**
 * Compute the DENO_DIR cache path for an https URL.
 *
 * Deno stores remote modules at `remote/https/{host}/{sha256(path+query)}`.
 * The host ends at the first `/`; a query directly after the host stays
 * part of it. The fragment never takes part in the hash, and a URL with
 * nothing after the host hashes as `/`.
 *
 * @example
 * ```typescript
 * urlToCachePath("https://jsr.io/@std/path/1.0.0/mod.ts")
 * // => "remote/https/jsr.io/<64 hex chars>"
 * ```
 */
export function urlToCachePath(url: string): string {
	if (!url.startsWith(HTTPS_PREFIX)) {
		throw new InvalidInputError(`Expected https URL: ${url}`);
	}

	let rest = url.slice(HTTPS_PREFIX.length);
	const fragmentIndex = rest.indexOf("#");
	if (fragmentIndex !== -1) {
		rest = rest.slice(0, fragmentIndex);
	}

	const slashIndex = rest.indexOf("/");
	const host = slashIndex === -1 ? rest : rest.slice(0, slashIndex);
	const path = slashIndex === -1 ? "/" : rest.slice(slashIndex);
	if (!host) {
		throw new InvalidInputError(`URL has no host: ${url}`);
	}

	const digest = createHash("sha256").update(path, "utf8").digest("hex");
	return `remote/https/${host}/${digest}`;
}

/**
 * Guess the media type Deno records for a module from its file extension.
 */
export function guessMediaType(path: string): string {
	if (path.endsWith(".ts") || path.endsWith(".tsx")) {
		return "text/typescript";
	}
	if (path.endsWith(".js") || path.endsWith(".jsx") || path.endsWith(".mjs")) {
		return "text/javascript";
	}
	if (path.endsWith(".json")) {
		return "application/json";
	}
	if (path.endsWith(".wasm")) {
		return "application/wasm";
	}
	return "text/plain";
}

/**
 * Cache path of an npm package inside DENO_DIR
 */
export function npmCachePath(name: string, version: string): string {
	return `${NPM_CACHE_ROOT}/${name}/${version}`;
}
