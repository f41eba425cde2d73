/**
 * deno-deps core - lock parsing, cache layout and manifest resolution
 *
 * Everything here is free of CLI concerns; the commands in ../commands
 * wire it to configuration and the file system.
 */

// Cache layout
export {
	guessMediaType,
	NPM_CACHE_ROOT,
	npmCachePath,
	urlToCachePath,
} from "./cache-path";
// Integrity utilities
export { checksumToHex, sha256Hex } from "./integrity";
// Lockfile types
export {
	isSupportedLockVersion,
	type LockEntry,
	type LockFile,
	parseLockfile,
	type RegistryEntry,
	SUPPORTED_LOCK_VERSIONS,
	type TarballEntry,
} from "./lockfile";
// Manifest types (deno-deps.json)
export {
	comparePackages,
	DEFAULT_MANIFEST_FILE,
	type DependencyManifest,
	deserializeManifest,
	type ManifestSummary,
	type RegistryFile,
	type RegistryPackage,
	serializeManifest,
	summarizeManifest,
	type TarballPackage,
} from "./manifest";
// Bounded concurrency
export { DEFAULT_CONCURRENCY, mapWithConcurrency } from "./pool";
// Resolver
export {
	DEFAULT_JSR_REGISTRY,
	DEFAULT_NPM_REGISTRY,
	npmTarballUrl,
	type ResolverOptions,
	resolveLock,
	resolveLockFile,
	resolveRegistryPackage,
	resolveTarballPackages,
} from "./resolver";
// Lock key parsing
export {
	generatePackageKey,
	getPackageBasename,
	type JsrSpecifier,
	type NpmSpecifier,
	parseJsrKey,
	parseNpmKey,
} from "./specifier";
