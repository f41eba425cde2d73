import { randomBytes } from "node:crypto";
import {
	chmod,
	mkdir,
	open,
	readFile,
	rename,
	rm,
	stat,
} from "node:fs/promises";
import { basename, dirname, join } from "node:path";

export interface AtomicWriteOptions {
	/** Create the parent directory if it does not exist */
	mkdir?: boolean;
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Write a file atomically: the content goes to a temp file in the same
 * directory, is fsynced, and is renamed over the target. An existing
 * target keeps its permission bits.
 */
export async function atomicWriteFile(
	path: string,
	content: string,
	options: AtomicWriteOptions = {},
): Promise<void> {
	const directory = dirname(path);
	if (options.mkdir) {
		await mkdir(directory, { recursive: true });
	}

	let mode: number | undefined;
	try {
		mode = (await stat(path)).mode & 0o777;
	} catch (error) {
		if (!isNotFound(error)) {
			throw error;
		}
	}

	const tmpPath = join(
		directory,
		`.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`,
	);
	let renamed = false;
	try {
		const handle = await open(tmpPath, "wx");
		try {
			await handle.writeFile(content, "utf-8");
			await handle.sync();
		} finally {
			await handle.close();
		}
		if (mode !== undefined) {
			await chmod(tmpPath, mode);
		}
		await rename(tmpPath, path);
		renamed = true;
	} finally {
		if (!renamed) {
			await rm(tmpPath, { force: true });
		}
	}
}

/**
 * Read a text file, returning null when it does not exist
 */
export async function readTextIfExists(path: string): Promise<string | null> {
	try {
		return await readFile(path, "utf-8");
	} catch (error) {
		if (isNotFound(error)) {
			return null;
		}
		throw error;
	}
}
