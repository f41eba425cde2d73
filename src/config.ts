import { readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import * as ini from "ini";
import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_CONCURRENCY } from "./lib/pool";
import { DEFAULT_JSR_REGISTRY, DEFAULT_NPM_REGISTRY } from "./lib/resolver";
import {
	DEFAULT_RETRIES,
	DEFAULT_TIMEOUT,
	DEFAULT_USER_AGENT,
} from "./registry-client";

// =============================================================================
// Types
// =============================================================================

export const CONFIG_FILE_NAME = ".denodepsrc";

export const CONFIG_KEYS = [
	"jsrRegistry",
	"npmRegistry",
	"concurrency",
	"timeout",
	"retries",
	"userAgent",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/**
 * Raw config values as read from an INI file, the environment or flags
 */
export type RawConfig = Partial<Record<ConfigKey, string | number>>;

/**
 * Where a resolved value came from
 */
export type ConfigSource = "default" | "user" | "project" | "env" | "flag";

/**
 * Fully resolved configuration (after cascade)
 */
export interface ResolvedConfig {
	jsrRegistry: string;
	npmRegistry: string;
	concurrency: number;
	timeout: number;
	retries: number;
	userAgent: string;
	/** Source of each value */
	sources: Record<ConfigKey, ConfigSource>;
	/** Project config file in effect, if any */
	projectConfigPath?: string;
}

export interface ResolveConfigOptions {
	/** Directory the project config search starts from (default: process.cwd()) */
	cwd?: string;
	/** Home directory holding the user config (default: os.homedir()) */
	homeDir?: string;
	/** Environment to read DENO_DEPS_* variables from (default: process.env) */
	env?: NodeJS.ProcessEnv;
	/** Command-line overrides, highest priority */
	overrides?: RawConfig;
}

// =============================================================================
// Constants
// =============================================================================

const DEFAULTS: Record<ConfigKey, string | number> = {
	jsrRegistry: DEFAULT_JSR_REGISTRY,
	npmRegistry: DEFAULT_NPM_REGISTRY,
	concurrency: DEFAULT_CONCURRENCY,
	timeout: DEFAULT_TIMEOUT,
	retries: DEFAULT_RETRIES,
	userAgent: DEFAULT_USER_AGENT,
};

/**
 * Environment variable for each config key
 */
export const ENV_VARS: Record<ConfigKey, string> = {
	jsrRegistry: "DENO_DEPS_JSR_REGISTRY",
	npmRegistry: "DENO_DEPS_NPM_REGISTRY",
	concurrency: "DENO_DEPS_CONCURRENCY",
	timeout: "DENO_DEPS_HTTP_TIMEOUT",
	retries: "DENO_DEPS_RETRIES",
	userAgent: "DENO_DEPS_USER_AGENT",
};

const registryUrlSchema = z
	.string()
	.url()
	.refine((value) => value.startsWith("https://"), {
		message: "Registry URL must use https",
	})
	.transform((value) => value.replace(/\/+$/, ""));

const configSchema = z.object({
	jsrRegistry: registryUrlSchema,
	npmRegistry: registryUrlSchema,
	concurrency: z.coerce.number().int().positive(),
	timeout: z.coerce.number().int().positive(),
	retries: z.coerce.number().int().nonnegative(),
	userAgent: z.string().min(1),
});

function configError(
	issues: z.ZodIssue[],
	sourceOf: (key: ConfigKey) => ConfigSource,
): ConfigError {
	const lines = issues
		.map((issue) => {
			const key = CONFIG_KEYS.find((name) => name === issue.path[0]);
			const label = key ? `${key} (from ${sourceOf(key)})` : "config";
			return `  - ${label}: ${issue.message}`;
		})
		.join("\n");
	return new ConfigError(`Invalid configuration:\n${lines}`);
}

function isFsError(error: unknown, code: string): boolean {
	return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Get the user config file path (~/.denodepsrc)
 */
export function getConfigPath(homeDir: string = homedir()): string {
	return join(homeDir, CONFIG_FILE_NAME);
}

// =============================================================================
// INI Config Functions
// =============================================================================

/**
 * Read a config file (INI format). Returns null if it does not exist.
 *
 * ```ini
 * ; Registries
 * jsrRegistry = https://jsr.io
 * npmRegistry = https://registry.npmjs.org
 *
 * ; Resolution
 * concurrency = 20
 * timeout = 30000
 * retries = 2
 * ```
 */
export async function readConfigFile(path: string): Promise<RawConfig | null> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		// Missing file, or a directory with the config's name
		if (isFsError(error, "ENOENT") || isFsError(error, "EISDIR")) {
			return null;
		}
		throw error;
	}

	const parsed = ini.parse(content);
	if (process.env.DENO_DEPS_DEBUG) {
		console.log(`[config] Parsed ${path}:`, JSON.stringify(parsed, null, 2));
	}

	const config: RawConfig = {};
	for (const key of CONFIG_KEYS) {
		const value: unknown = parsed[key];
		if (typeof value === "string" || typeof value === "number") {
			config[key] = value;
		} else if (value !== undefined) {
			throw new ConfigError(`${path}: "${key}" must be a single value`);
		}
	}
	return config;
}

/**
 * Find the nearest project config (.denodepsrc) by searching up the
 * directory tree from `cwd`
 */
export async function findProjectConfig(
	cwd: string = process.cwd(),
): Promise<{ path: string; config: RawConfig } | null> {
	let currentDir = cwd;

	for (;;) {
		const configPath = join(currentDir, CONFIG_FILE_NAME);
		const config = await readConfigFile(configPath);
		if (config) {
			return { path: configPath, config };
		}

		const parentDir = dirname(currentDir);
		if (parentDir === currentDir) {
			return null;
		}
		currentDir = parentDir;
	}
}

/**
 * Read config values from DENO_DEPS_* environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): RawConfig {
	const config: RawConfig = {};
	for (const key of CONFIG_KEYS) {
		const value = env[ENV_VARS[key]];
		if (value) {
			config[key] = value;
		}
	}
	return config;
}

/**
 * Resolve the full configuration using cascade priority:
 * 1. Command-line flags
 * 2. Environment variables (DENO_DEPS_*)
 * 3. Project config (.denodepsrc in the project directory or a parent)
 * 4. User config (~/.denodepsrc)
 * 5. Defaults
 *
 * @throws ConfigError if a value fails validation
 */
export async function resolveConfig(
	options: ResolveConfigOptions = {},
): Promise<ResolvedConfig> {
	const env = options.env ?? process.env;
	const userConfigPath = getConfigPath(options.homeDir);
	const userConfig = await readConfigFile(userConfigPath);
	const project = await findProjectConfig(options.cwd);

	// A project config in the home directory is the user config
	const projectConfig =
		project && project.path !== userConfigPath ? project : null;

	const layers: Array<[ConfigSource, RawConfig | null | undefined]> = [
		["user", userConfig],
		["project", projectConfig?.config],
		["env", readEnvConfig(env)],
		["flag", options.overrides],
	];

	const merged: Record<ConfigKey, string | number> = { ...DEFAULTS };
	const sources: Record<ConfigKey, ConfigSource> = {
		jsrRegistry: "default",
		npmRegistry: "default",
		concurrency: "default",
		timeout: "default",
		retries: "default",
		userAgent: "default",
	};

	for (const [source, layer] of layers) {
		if (!layer) continue;
		for (const key of CONFIG_KEYS) {
			const value = layer[key];
			if (value !== undefined) {
				merged[key] = value;
				sources[key] = source;
			}
		}
	}

	const result = configSchema.safeParse(merged);
	if (!result.success) {
		throw configError(result.error.issues, (key) => sources[key]);
	}

	const resolved: ResolvedConfig = {
		...result.data,
		sources,
		projectConfigPath: projectConfig?.path,
	};

	if (env.DENO_DEPS_DEBUG) {
		console.log("[config] Resolved config:");
		for (const key of CONFIG_KEYS) {
			console.log(`[config]   ${key}: ${resolved[key]} (${sources[key]})`);
		}
	}

	return resolved;
}

/**
 * Validate and normalize values given on the command line before they are
 * written to a config file. Only the keys present are checked.
 *
 * @throws ConfigError naming each invalid key
 */
export function validateConfigValues(config: RawConfig): RawConfig {
	const result = configSchema.partial().safeParse(config);
	if (!result.success) {
		throw configError(result.error.issues, () => "flag");
	}
	return result.data;
}

/**
 * Write a project config file (INI format)
 */
export async function writeConfigFile(
	path: string,
	config: RawConfig,
): Promise<void> {
	const lines: string[] = ["; deno-deps configuration", ""];

	for (const key of CONFIG_KEYS) {
		const value = config[key];
		if (value !== undefined) {
			lines.push(`${key} = ${value}`);
		}
	}

	// Always end with a newline
	lines.push("");

	await writeFile(path, lines.join("\n"));

	if (process.env.DENO_DEPS_DEBUG) {
		console.log(`[config] Wrote config to: ${path}`);
	}
}
