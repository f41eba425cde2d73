/**
 * Show command - Summarize a resolved manifest.
 *
 * Displays:
 * - Lock version
 * - JSR packages with their file counts
 * - npm packages
 */

import { resolve as resolvePath } from "node:path";
import { formatError, MalformedManifestError } from "../errors.js";
import { readTextIfExists } from "../io.js";
import {
	DEFAULT_MANIFEST_FILE,
	type DependencyManifest,
	deserializeManifest,
	summarizeManifest,
} from "../lib/index.js";

export interface ShowOptions {
	json?: boolean;
}

interface PackageListItem {
	name: string;
	version: string;
	source: "jsr" | "npm";
	files: number;
}

/**
 * Flatten a manifest into one row per package
 */
export function listManifestPackages(
	manifest: DependencyManifest,
): PackageListItem[] {
	return [
		...manifest.jsrPackages.map((pkg) => ({
			name: pkg.name,
			version: pkg.version,
			source: "jsr" as const,
			files: pkg.files.length,
		})),
		...manifest.npmPackages.map((pkg) => ({
			name: pkg.name,
			version: pkg.version,
			source: "npm" as const,
			files: 1,
		})),
	];
}

export async function show(
	manifestFile: string | undefined,
	options: ShowOptions,
): Promise<void> {
	try {
		const manifestPath = resolvePath(manifestFile ?? DEFAULT_MANIFEST_FILE);
		const content = await readTextIfExists(manifestPath);
		if (content === null) {
			throw new MalformedManifestError(`No manifest found at ${manifestPath}`);
		}

		const manifest = deserializeManifest(content);
		const packages = listManifestPackages(manifest);

		if (options.json) {
			console.log(JSON.stringify(packages, null, 2));
			return;
		}

		const summary = summarizeManifest(manifest);
		console.log(`Manifest: ${manifestPath}`);
		console.log(`Lock version: ${manifest.lockVersion}\n`);

		if (packages.length === 0) {
			console.log("No packages.");
			return;
		}

		for (const pkg of packages) {
			const files = pkg.source === "jsr" ? ` (${pkg.files} files)` : "";
			console.log(`  ${pkg.source}:${pkg.name}@${pkg.version}${files}`);
		}

		console.log("");
		console.log(
			`Total: ${summary.jsrPackages} JSR packages (${summary.jsrFiles} files), ${summary.npmPackages} npm packages`,
		);
	} catch (error) {
		console.error(`Error: ${formatError(error)}`);
		process.exit(1);
	}
}
