import { CONFIG_KEYS, ENV_VARS, getConfigPath, resolveConfig } from "../../config.js";
import { formatError } from "../../errors.js";

/**
 * Show resolved configuration
 */
export async function configShow(): Promise<void> {
	try {
		const resolved = await resolveConfig();

		console.log("Resolved Configuration:\n");
		for (const key of CONFIG_KEYS) {
			console.log(
				`  ${key.padEnd(13)} ${String(resolved[key]).padEnd(30)} (${resolved.sources[key]})`,
			);
		}
		console.log("");
		console.log("Config Locations:");
		console.log(`  User config:    ${getConfigPath()}`);
		console.log(`  Project config: ${resolved.projectConfigPath ?? "(none)"}`);
		console.log("");
		console.log("Environment Variables:");
		for (const key of CONFIG_KEYS) {
			const name = ENV_VARS[key];
			console.log(`  ${name.padEnd(24)} ${process.env[name] || "(not set)"}`);
		}
	} catch (error) {
		console.error(`Error: ${formatError(error)}`);
		process.exit(1);
	}
}
