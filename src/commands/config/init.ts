import { join } from "node:path";
import {
	CONFIG_FILE_NAME,
	validateConfigValues,
	writeConfigFile,
} from "../../config.js";
import { formatError } from "../../errors.js";
import { readTextIfExists } from "../../io.js";

export interface ConfigInitOptions {
	jsrRegistry?: string;
	npmRegistry?: string;
	concurrency?: string;
	force?: boolean;
}

/**
 * Create a .denodepsrc file in the current directory (INI format)
 */
export async function configInit(options: ConfigInitOptions): Promise<void> {
	try {
		const configPath = join(process.cwd(), CONFIG_FILE_NAME);

		if (!options.force && (await readTextIfExists(configPath)) !== null) {
			console.error(`Error: ${CONFIG_FILE_NAME} already exists in this directory.`);
			console.error("Use --force to overwrite it.");
			process.exit(1);
		}

		const config = validateConfigValues({
			jsrRegistry: options.jsrRegistry,
			npmRegistry: options.npmRegistry,
			concurrency: options.concurrency,
		});
		await writeConfigFile(configPath, config);

		console.log(`Created ${CONFIG_FILE_NAME}`);
		console.log("Note: commit it so every checkout resolves against the same registries.");
	} catch (error) {
		console.error(`Error: ${formatError(error)}`);
		process.exit(1);
	}
}
