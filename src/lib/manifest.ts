import { z } from "zod";
import { MalformedManifestError } from "@/errors";

/**
 * Default file name of the resolved manifest
 */
export const DEFAULT_MANIFEST_FILE = "deno-deps.json";

/**
 * A single remote file of a JSR package
 */
export interface RegistryFile {
	/** Source URL (identity of the file) */
	readonly url: string;
	/** Lowercase hex SHA-256, no algorithm prefix */
	readonly sha256: string;
	/** Path inside DENO_DIR */
	readonly cachePath: string;
	readonly mediaType: string;
}

/**
 * A resolved JSR package with all its files.
 * Files are ordered by source path, followed by the package index
 * (`meta.json`) and the version index (`{version}_meta.json`).
 */
export interface RegistryPackage {
	/** "scope/name" including the "@" of the scope */
	readonly name: string;
	readonly version: string;
	/** Integrity copied verbatim from the lock */
	readonly integrity: string;
	readonly files: readonly RegistryFile[];
}

/**
 * A resolved npm package tarball
 */
export interface TarballPackage {
	readonly name: string;
	readonly version: string;
	readonly integrity: string;
	readonly tarballUrl: string;
	/** Path inside DENO_DIR, independent of the digest */
	readonly cachePath: string;
}

/**
 * Complete resolved dependency manifest (deno-deps.json).
 * Both package lists are sorted by (name, version).
 */
export interface DependencyManifest {
	readonly lockVersion: string;
	readonly jsrPackages: readonly RegistryPackage[];
	readonly npmPackages: readonly TarballPackage[];
}

// =============================================================================
// Wire format
// =============================================================================

const registryFileSchema = z.object({
	url: z.string(),
	sha256: z.string(),
	cache_path: z.string(),
	media_type: z.string(),
});

const registryPackageSchema = z.object({
	name: z.string(),
	version: z.string(),
	integrity: z.string(),
	files: z.array(registryFileSchema),
});

const tarballPackageSchema = z.object({
	name: z.string(),
	version: z.string(),
	integrity: z.string(),
	tarball_url: z.string(),
	cache_path: z.string(),
});

const manifestSchema = z.object({
	lock_version: z.string(),
	jsr_packages: z.array(registryPackageSchema).default([]),
	npm_packages: z.array(tarballPackageSchema).default([]),
});

type ManifestDocument = z.infer<typeof manifestSchema>;

type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

/**
 * Rebuild a JSON value with every object's keys in code-unit order
 */
function sortKeys(value: JsonValue): JsonValue {
	if (Array.isArray(value)) {
		return value.map(sortKeys);
	}
	if (value !== null && typeof value === "object") {
		const sorted: { [key: string]: JsonValue } = {};
		for (const key of Object.keys(value).sort()) {
			const child = value[key];
			if (child !== undefined) {
				sorted[key] = sortKeys(child);
			}
		}
		return sorted;
	}
	return value;
}

/**
 * Compare two package identities by (name, version) in code-unit order
 */
export function comparePackages(
	a: { name: string; version: string },
	b: { name: string; version: string },
): number {
	if (a.name !== b.name) {
		return a.name < b.name ? -1 : 1;
	}
	if (a.version !== b.version) {
		return a.version < b.version ? -1 : 1;
	}
	return 0;
}

function toDocument(manifest: DependencyManifest): ManifestDocument {
	return {
		lock_version: manifest.lockVersion,
		jsr_packages: manifest.jsrPackages.map((pkg) => ({
			name: pkg.name,
			version: pkg.version,
			integrity: pkg.integrity,
			files: pkg.files.map((file) => ({
				url: file.url,
				sha256: file.sha256,
				cache_path: file.cachePath,
				media_type: file.mediaType,
			})),
		})),
		npm_packages: manifest.npmPackages.map((pkg) => ({
			name: pkg.name,
			version: pkg.version,
			integrity: pkg.integrity,
			tarball_url: pkg.tarballUrl,
			cache_path: pkg.cachePath,
		})),
	};
}

/**
 * Serialize a manifest to its canonical JSON text: keys sorted at every
 * level, 2-space indentation and a trailing newline. Equal manifests
 * always produce identical bytes.
 */
export function serializeManifest(manifest: DependencyManifest): string {
	const document: JsonValue = toDocument(manifest);
	return `${JSON.stringify(sortKeys(document), null, 2)}\n`;
}

/**
 * Parse a manifest previously written by {@link serializeManifest}.
 * Unknown fields are ignored; missing required fields are rejected.
 *
 * @throws MalformedManifestError if the text is not a valid manifest
 */
export function deserializeManifest(content: string): DependencyManifest {
	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		throw new MalformedManifestError(
			`Manifest is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
			{ cause: error },
		);
	}

	const result = manifestSchema.safeParse(raw);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("\n");
		throw new MalformedManifestError(`Invalid manifest:\n${issues}`);
	}

	const data = result.data;
	return {
		lockVersion: data.lock_version,
		jsrPackages: data.jsr_packages.map((pkg) => ({
			name: pkg.name,
			version: pkg.version,
			integrity: pkg.integrity,
			files: pkg.files.map((file) => ({
				url: file.url,
				sha256: file.sha256,
				cachePath: file.cache_path,
				mediaType: file.media_type,
			})),
		})),
		npmPackages: data.npm_packages.map((pkg) => ({
			name: pkg.name,
			version: pkg.version,
			integrity: pkg.integrity,
			tarballUrl: pkg.tarball_url,
			cachePath: pkg.cache_path,
		})),
	};
}

/**
 * Summary counts of a manifest
 */
export interface ManifestSummary {
	jsrPackages: number;
	jsrFiles: number;
	npmPackages: number;
}

export function summarizeManifest(manifest: DependencyManifest): ManifestSummary {
	return {
		jsrPackages: manifest.jsrPackages.length,
		jsrFiles: manifest.jsrPackages.reduce(
			(total, pkg) => total + pkg.files.length,
			0,
		),
		npmPackages: manifest.npmPackages.length,
	};
}
