/**
 * Parsed JSR lock key
 * e.g., "@std/path@1.0.8"
 */
export interface JsrSpecifier {
	/** Scope including the leading "@" (e.g., "@std") */
	scope: string;
	name: string;
	version: string;
}

/**
 * Parsed npm lock key
 * e.g., "@types/react@18.3.3_csstype@3.1.3"
 */
export interface NpmSpecifier {
	/** Full package name, scope included (e.g., "@types/react") */
	name: string;
	version: string;
	/** Peer-dependency qualifier that followed the first "_" of the version */
	peerQualifier?: string;
}

/**
 * JSR key regex pattern
 * Matches: @{scope}/{name}@{version}
 */
const JSR_KEY_PATTERN = /^(@[^/@]+)\/([^/@]+)@([^@]+)$/;

/**
 * Parse a key of the lock file's `jsr` section.
 *
 * @param key - The lock key (e.g., "@std/path@1.0.8")
 * @returns Parsed specifier or null if invalid
 *
 * @example
 * ```typescript
 * parseJsrKey("@std/path@1.0.8")
 * // => { scope: "@std", name: "path", version: "1.0.8" }
 * ```
 */
export function parseJsrKey(key: string): JsrSpecifier | null {
	const match = key.match(JSR_KEY_PATTERN);
	if (!match) {
		return null;
	}

	const [, scope, name, version] = match;
	if (!scope || !name || !version) {
		return null;
	}

	return { scope, name, version };
}

/**
 * Parse a key of the lock file's `npm` section.
 *
 * Scoped keys take the name up to the second "@", unscoped ones up to the
 * first. Anything after the first "_" of the version is a peer-dependency
 * qualifier and is not part of the version.
 *
 * @param key - The lock key (e.g., "@scope/name@1.2.3_peer@4.5.6")
 * @returns Parsed specifier or null if invalid
 *
 * @example
 * ```typescript
 * parseNpmKey("@scope/name@1.2.3_peer@4.5.6")
 * // => { name: "@scope/name", version: "1.2.3", peerQualifier: "peer@4.5.6" }
 *
 * parseNpmKey("chalk@5.3.0")
 * // => { name: "chalk", version: "5.3.0", peerQualifier: undefined }
 * ```
 */
export function parseNpmKey(key: string): NpmSpecifier | null {
	const atIndex = key.startsWith("@") ? key.indexOf("@", 1) : key.indexOf("@");
	if (atIndex <= 0) {
		return null;
	}

	const name = key.slice(0, atIndex);
	const versionPart = key.slice(atIndex + 1);
	const underscoreIndex = versionPart.indexOf("_");
	const version =
		underscoreIndex === -1 ? versionPart : versionPart.slice(0, underscoreIndex);
	if (!version) {
		return null;
	}

	return {
		name,
		version,
		peerQualifier:
			underscoreIndex === -1
				? undefined
				: versionPart.slice(underscoreIndex + 1),
	};
}

/**
 * Last path segment of a package name ("@scope/name" -> "name")
 */
export function getPackageBasename(name: string): string {
	const slashIndex = name.lastIndexOf("/");
	return slashIndex === -1 ? name : name.slice(slashIndex + 1);
}

/**
 * Generate a lock key string from its parts.
 *
 * @returns Key in lock format (e.g., "@std/path@1.0.8")
 */
export function generatePackageKey(name: string, version: string): string {
	return `${name}@${version}`;
}
