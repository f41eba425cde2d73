/**
 * deno.lock Resolver
 *
 * Turns a parsed lock file into a flat manifest of everything a
 * deterministic DENO_DIR must contain:
 * - JSR packages: one entry per source file, plus the registry's
 *   `meta.json` and `{version}_meta.json` index documents
 * - npm packages: one tarball per (name, version)
 *
 * JSR packages need the registry to list their files; npm packages are
 * computed from the lock alone.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { FetchFailedError, MalformedLockError } from "@/errors";
import {
	parseJsonBody,
	RegistryClient,
	type RegistryClientOptions,
} from "@/registry-client";
import { guessMediaType, npmCachePath, urlToCachePath } from "./cache-path";
import { checksumToHex, sha256Hex } from "./integrity";
import {
	isSupportedLockVersion,
	parseLockfile,
	type RegistryEntry,
	SUPPORTED_LOCK_VERSIONS,
	type TarballEntry,
} from "./lockfile";
import {
	comparePackages,
	type DependencyManifest,
	type RegistryFile,
	type RegistryPackage,
	type TarballPackage,
} from "./manifest";
import { DEFAULT_CONCURRENCY, mapWithConcurrency } from "./pool";
import { generatePackageKey, getPackageBasename } from "./specifier";

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_JSR_REGISTRY = "https://jsr.io";
export const DEFAULT_NPM_REGISTRY = "https://registry.npmjs.org";

// =============================================================================
// Types
// =============================================================================

export interface ResolverOptions {
	/** JSR registry base URL, no trailing slash (default: https://jsr.io) */
	jsrRegistry?: string;
	/** npm registry base URL, no trailing slash (default: https://registry.npmjs.org) */
	npmRegistry?: string;
	/** Maximum JSR packages resolved at once (default: 20) */
	concurrency?: number;
	/** Client used for registry requests; built from `http` when absent */
	client?: RegistryClient;
	/** Transport options for the client built when `client` is absent */
	http?: RegistryClientOptions;
}

/**
 * Version `_meta.json` document (the parts this resolver reads)
 */
const versionMetaSchema = z.object({
	manifest: z.record(
		z.string(),
		z.object({
			checksum: z.string(),
		}),
	),
});

// =============================================================================
// JSR
// =============================================================================

/**
 * Resolve a single JSR package into its files.
 *
 * Fetches `{version}_meta.json` once, using its body both for the file list
 * and as the version index entry, then fetches `meta.json` for the package
 * index entry.
 */
export async function resolveRegistryPackage(
	client: RegistryClient,
	entry: RegistryEntry,
	jsrRegistry: string = DEFAULT_JSR_REGISTRY,
): Promise<RegistryPackage> {
	const packageBase = `${jsrRegistry}/${entry.scope}/${entry.name}`;
	const versionMetaUrl = `${packageBase}/${entry.version}_meta.json`;
	const packageMetaUrl = `${packageBase}/meta.json`;

	const versionMetaBody = await client.getBytes(versionMetaUrl);
	const parsed = versionMetaSchema.safeParse(
		parseJsonBody(versionMetaUrl, versionMetaBody),
	);
	if (!parsed.success) {
		throw new FetchFailedError(versionMetaUrl, {
			cause: new Error(
				`Unexpected version metadata: ${parsed.error.issues[0]?.message ?? "invalid document"}`,
			),
		});
	}

	const files: RegistryFile[] = Object.entries(parsed.data.manifest)
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([filePath, { checksum }]) => {
			const url = `${packageBase}/${entry.version}${filePath}`;
			return {
				url,
				sha256: checksumToHex(checksum),
				cachePath: urlToCachePath(url),
				mediaType: guessMediaType(filePath),
			};
		});

	const packageMetaBody = await client.getBytes(packageMetaUrl);

	files.push(
		{
			url: packageMetaUrl,
			sha256: sha256Hex(packageMetaBody),
			cachePath: urlToCachePath(packageMetaUrl),
			mediaType: "application/json",
		},
		{
			url: versionMetaUrl,
			sha256: sha256Hex(versionMetaBody),
			cachePath: urlToCachePath(versionMetaUrl),
			mediaType: "application/json",
		},
	);

	return {
		name: `${entry.scope}/${entry.name}`,
		version: entry.version,
		integrity: entry.integrity,
		files,
	};
}

// =============================================================================
// npm
// =============================================================================

/**
 * Compute the npm tarball URL for a package.
 *
 * @example
 * ```typescript
 * npmTarballUrl("@types/node", "20.1.0")
 * // => "https://registry.npmjs.org/@types/node/-/node-20.1.0.tgz"
 * ```
 */
export function npmTarballUrl(
	name: string,
	version: string,
	npmRegistry: string = DEFAULT_NPM_REGISTRY,
): string {
	return `${npmRegistry}/${name}/-/${getPackageBasename(name)}-${version}.tgz`;
}

/**
 * Resolve npm lock entries into tarballs. No network access.
 *
 * Keys that differ only by peer qualifier name the same tarball; the first
 * one in lock order is kept. When a dropped duplicate carries a different
 * integrity a warning is logged.
 */
export function resolveTarballPackages(
	entries: readonly TarballEntry[],
	npmRegistry: string = DEFAULT_NPM_REGISTRY,
): TarballPackage[] {
	const seen = new Map<string, TarballEntry>();
	const packages: TarballPackage[] = [];

	for (const entry of entries) {
		const id = generatePackageKey(entry.name, entry.version);
		const first = seen.get(id);
		if (first) {
			if (first.integrity !== entry.integrity) {
				console.warn(
					`Warning: npm lock keys "${first.key}" and "${entry.key}" resolve to ${id} with different integrity; keeping "${first.key}"`,
				);
			}
			continue;
		}
		seen.set(id, entry);

		packages.push({
			name: entry.name,
			version: entry.version,
			integrity: entry.integrity,
			tarballUrl: npmTarballUrl(entry.name, entry.version, npmRegistry),
			cachePath: npmCachePath(entry.name, entry.version),
		});
	}

	return packages.sort(comparePackages);
}

// =============================================================================
// Main Resolution Function
// =============================================================================

/**
 * Resolve all dependencies of a deno.lock.
 *
 * JSR packages are resolved through a bounded pool; the first failure
 * rejects the whole call, so a manifest is either complete or not
 * produced at all.
 *
 * @param content - Text of the deno.lock file
 * @returns A manifest with both package lists sorted by (name, version)
 */
export async function resolveLock(
	content: string,
	options: ResolverOptions = {},
): Promise<DependencyManifest> {
	const lockfile = parseLockfile(content);
	const jsrRegistry = options.jsrRegistry ?? DEFAULT_JSR_REGISTRY;
	const npmRegistry = options.npmRegistry ?? DEFAULT_NPM_REGISTRY;
	const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
	const client = options.client ?? new RegistryClient(options.http);

	if (!isSupportedLockVersion(lockfile.version)) {
		console.warn(
			`Warning: Unexpected deno.lock version ${lockfile.version} (expected ${SUPPORTED_LOCK_VERSIONS.join(" or ")})`,
		);
	}

	if (process.env.DENO_DEPS_DEBUG) {
		console.log(
			`[resolve] ${lockfile.registryEntries.length} JSR + ${lockfile.tarballEntries.length} npm lock entries`,
		);
	}

	const jsrPackages = await mapWithConcurrency(
		lockfile.registryEntries,
		concurrency,
		async (entry) => {
			try {
				return await resolveRegistryPackage(client, entry, jsrRegistry);
			} catch (error) {
				console.error(`Failed to resolve JSR package ${entry.key}`);
				throw error;
			}
		},
	);
	jsrPackages.sort(comparePackages);

	const npmPackages = resolveTarballPackages(
		lockfile.tarballEntries,
		npmRegistry,
	);

	if (process.env.DENO_DEPS_DEBUG) {
		const fileCount = jsrPackages.reduce((n, pkg) => n + pkg.files.length, 0);
		console.log(
			`[resolve] ${jsrPackages.length} JSR packages (${fileCount} files), ${npmPackages.length} npm packages`,
		);
	}

	return {
		lockVersion: lockfile.version,
		jsrPackages,
		npmPackages,
	};
}

/**
 * Read a deno.lock from disk and resolve it.
 *
 * @throws MalformedLockError if the file cannot be read
 */
export async function resolveLockFile(
	lockPath: string,
	options: ResolverOptions = {},
): Promise<DependencyManifest> {
	let content: string;
	try {
		content = await readFile(lockPath, "utf-8");
	} catch (error) {
		throw new MalformedLockError(
			`Cannot read lock file ${lockPath}: ${error instanceof Error ? error.message : String(error)}`,
			{ cause: error },
		);
	}
	return resolveLock(content, options);
}
