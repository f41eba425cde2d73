/**
 * Resolve command - Turn a deno.lock into deno-deps.json.
 *
 * Resolves every JSR and npm package of the lock file and writes the
 * manifest atomically. With --check nothing is written; the command fails
 * when the manifest on disk is missing or differs.
 */

import { resolve as resolvePath } from "node:path";
import { type RawConfig, resolveConfig } from "../config.js";
import { formatError } from "../errors.js";
import { atomicWriteFile, readTextIfExists } from "../io.js";
import {
	DEFAULT_MANIFEST_FILE,
	type ManifestSummary,
	type ResolverOptions,
	resolveLockFile,
	serializeManifest,
	summarizeManifest,
} from "../lib/index.js";

export const DEFAULT_LOCK_FILE = "deno.lock";

export interface ResolveOptions {
	output?: string;
	concurrency?: string;
	jsrRegistry?: string;
	npmRegistry?: string;
	check?: boolean;
}

/**
 * Check whether the manifest at `path` already holds exactly `content`
 */
export async function isManifestCurrent(
	path: string,
	content: string,
): Promise<boolean> {
	const existing = await readTextIfExists(path);
	return existing === content;
}

export interface ResolveRun {
	/** "written" after a write; with check, "current" or "stale" */
	status: "written" | "current" | "stale";
	summary: ManifestSummary;
}

/**
 * Resolve `lockPath` and write the manifest to `outputPath`, or with
 * `check` compare it against the file on disk. Nothing is written unless
 * every package resolved.
 */
export async function runResolve(
	lockPath: string,
	outputPath: string,
	options: { check?: boolean; resolver?: ResolverOptions } = {},
): Promise<ResolveRun> {
	const manifest = await resolveLockFile(lockPath, options.resolver);
	const content = serializeManifest(manifest);
	const summary = summarizeManifest(manifest);

	if (options.check) {
		const current = await isManifestCurrent(outputPath, content);
		return { status: current ? "current" : "stale", summary };
	}

	await atomicWriteFile(outputPath, content, { mkdir: true });
	return { status: "written", summary };
}

export async function resolve(
	lockfile: string | undefined,
	options: ResolveOptions,
): Promise<void> {
	try {
		const overrides: RawConfig = {};
		if (options.concurrency !== undefined) {
			overrides.concurrency = options.concurrency;
		}
		if (options.jsrRegistry !== undefined) {
			overrides.jsrRegistry = options.jsrRegistry;
		}
		if (options.npmRegistry !== undefined) {
			overrides.npmRegistry = options.npmRegistry;
		}
		const config = await resolveConfig({ overrides });

		const lockPath = resolvePath(lockfile ?? DEFAULT_LOCK_FILE);
		const outputPath = resolvePath(options.output ?? DEFAULT_MANIFEST_FILE);

		console.log(`Resolving ${lockPath}...`);
		const { status, summary } = await runResolve(lockPath, outputPath, {
			check: options.check,
			resolver: {
				jsrRegistry: config.jsrRegistry,
				npmRegistry: config.npmRegistry,
				concurrency: config.concurrency,
				http: {
					timeout: config.timeout,
					retries: config.retries,
					userAgent: config.userAgent,
				},
			},
		});

		console.log(
			`Resolved ${summary.jsrPackages} JSR packages (${summary.jsrFiles} files) + ${summary.npmPackages} npm packages`,
		);

		if (status === "current") {
			console.log(`${outputPath} is up to date.`);
		} else if (status === "stale") {
			console.error(`Error: ${outputPath} is missing or out of date.`);
			console.error("Run 'deno-deps resolve' to regenerate it.");
			process.exit(1);
		} else {
			console.log(`Wrote ${outputPath}`);
		}
	} catch (error) {
		const message = formatError(error, {
			includeStack: Boolean(process.env.DENO_DEPS_DEBUG),
		});
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
