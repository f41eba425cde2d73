import * as semver from "semver";
import { z } from "zod";
import { MalformedLockError } from "@/errors";
import { parseJsrKey, parseNpmKey } from "./specifier";

/**
 * deno.lock versions this resolver was written against. Other versions are
 * still processed, with a warning.
 */
export const SUPPORTED_LOCK_VERSIONS = ["4", "5"] as const;

/**
 * deno.lock format (the parts this resolver reads)
 *
 * Format notes:
 * - v4 and v5 share the `jsr` and `npm` sections used here.
 * - Both sections are omitted when empty.
 * - npm entries carry extra fields (`dependencies`, `os`, `cpu`, ...)
 *   which are ignored.
 */
const lockEntrySchema = z.object({
	integrity: z.string(),
});

const lockfileSchema = z.object({
	version: z.union([z.string(), z.number()]).transform(String),
	jsr: z.record(z.string(), lockEntrySchema).default({}),
	npm: z.record(z.string(), lockEntrySchema).default({}),
});

/**
 * Lock entry for a JSR package (resolved file by file from the registry).
 * Key format in the `jsr` section: "@scope/name@version"
 */
export interface RegistryEntry {
	kind: "jsr";
	/** Original lock key */
	key: string;
	/** Scope including "@" (e.g., "@std") */
	scope: string;
	/** Name without the scope */
	name: string;
	version: string;
	/** Integrity copied verbatim from the lock */
	integrity: string;
}

/**
 * Lock entry for an npm package (resolved to a single tarball).
 * Key format in the `npm` section: "name@version[_peerqualifier]"
 */
export interface TarballEntry {
	kind: "npm";
	/** Original lock key */
	key: string;
	/** Full name, scope included */
	name: string;
	version: string;
	peerQualifier?: string;
	/** Integrity copied verbatim from the lock */
	integrity: string;
}

export type LockEntry = RegistryEntry | TarballEntry;

/**
 * Parsed deno.lock. Entries keep the key order of the source document.
 */
export interface LockFile {
	version: string;
	registryEntries: RegistryEntry[];
	tarballEntries: TarballEntry[];
}

/**
 * Check whether a lock version is one of the supported ones
 */
export function isSupportedLockVersion(version: string): boolean {
	return (SUPPORTED_LOCK_VERSIONS as readonly string[]).includes(version);
}

/**
 * Parse the text of a deno.lock.
 *
 * Entry versions that are not semantic versions are kept, with a warning.
 *
 * @throws MalformedLockError on invalid JSON, a missing `version`, an entry
 * without `integrity`, or a key that is not `name@version`
 */
export function parseLockfile(content: string): LockFile {
	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		throw new MalformedLockError(
			`Lock file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
			{ cause: error },
		);
	}

	const result = lockfileSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => {
				const path = issue.path.join(".") || "(root)";
				return `  - ${path}: ${issue.message}`;
			})
			.join("\n");
		throw new MalformedLockError(`Invalid lock file:\n${issues}`);
	}

	const { version, jsr, npm } = result.data;

	const registryEntries: RegistryEntry[] = Object.entries(jsr).map(
		([key, entry]) => {
			const parsed = parseJsrKey(key);
			if (!parsed) {
				throw new MalformedLockError(`Invalid jsr lock key: "${key}"`);
			}
			checkVersion(key, parsed.version);
			return {
				kind: "jsr",
				key,
				scope: parsed.scope,
				name: parsed.name,
				version: parsed.version,
				integrity: entry.integrity,
			};
		},
	);

	const tarballEntries: TarballEntry[] = Object.entries(npm).map(
		([key, entry]) => {
			const parsed = parseNpmKey(key);
			if (!parsed) {
				throw new MalformedLockError(`Invalid npm lock key: "${key}"`);
			}
			checkVersion(key, parsed.version);
			return {
				kind: "npm",
				key,
				name: parsed.name,
				version: parsed.version,
				peerQualifier: parsed.peerQualifier,
				integrity: entry.integrity,
			};
		},
	);

	return { version, registryEntries, tarballEntries };
}

function checkVersion(key: string, version: string): void {
	if (!semver.valid(version)) {
		console.warn(
			`Warning: Version "${version}" in lock key "${key}" is not a semantic version`,
		);
	}
}
