#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { configInit, configShow, resolve, show } from "./commands/index";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(
	readFileSync(join(__dirname, "..", "package.json"), "utf-8"),
);
const version =
	typeof packageJson === "object" &&
	packageJson !== null &&
	"version" in packageJson &&
	typeof packageJson.version === "string"
		? packageJson.version
		: "0.0.0";

const program = new Command();

program
	.name("deno-deps")
	.description(
		"Resolve a deno.lock into a flat manifest for deterministic DENO_DIR builds",
	)
	.version(version);

// =============================================================================
// Config commands
// =============================================================================

const configCmd = program
	.command("config")
	.description("Manage deno-deps configuration");

configCmd
	.command("show")
	.description("Show resolved configuration")
	.action(async () => {
		await configShow();
	});

configCmd
	.command("init")
	.description("Create a .denodepsrc file in the current directory")
	.option("--jsr-registry <url>", "JSR registry URL")
	.option("--npm-registry <url>", "npm registry URL")
	.option("--concurrency <n>", "Maximum JSR packages resolved at once")
	.option("-f, --force", "Overwrite an existing .denodepsrc")
	.action(async (options) => {
		await configInit({
			jsrRegistry: options.jsrRegistry,
			npmRegistry: options.npmRegistry,
			concurrency: options.concurrency,
			force: options.force,
		});
	});

// =============================================================================
// Resolution commands
// =============================================================================

program
	.command("resolve [lockfile]")
	.description("Resolve a deno.lock (default: ./deno.lock) into deno-deps.json")
	.option("-o, --output <path>", "Manifest path (default: ./deno-deps.json)")
	.option("--concurrency <n>", "Maximum JSR packages resolved at once")
	.option("--jsr-registry <url>", "JSR registry URL")
	.option("--npm-registry <url>", "npm registry URL")
	.option(
		"--check",
		"Fail if the manifest on disk is missing or out of date (never writes)",
	)
	.action(async (lockfile, options) => {
		await resolve(lockfile, {
			output: options.output,
			concurrency: options.concurrency,
			jsrRegistry: options.jsrRegistry,
			npmRegistry: options.npmRegistry,
			check: options.check,
		});
	});

program
	.command("show [manifest]")
	.alias("ls")
	.description("Summarize a resolved manifest (default: ./deno-deps.json)")
	.option("--json", "Output as JSON")
	.action(async (manifest, options) => {
		await show(manifest, { json: options.json });
	});

await program.parseAsync();
