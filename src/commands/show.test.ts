import { describe, expect, it } from "vitest";
import type { DependencyManifest } from "../lib/index.js";
import { listManifestPackages } from "./show.js";

describe("listManifestPackages", () => {
	it("should list JSR packages before npm packages", () => {
		const manifest: DependencyManifest = {
			lockVersion: "5",
			jsrPackages: [
				{
					name: "@x/y",
					version: "1.0.0",
					integrity: "sha256-y",
					files: [
						{
							url: "https://jsr.io/@x/y/meta.json",
							sha256: "c".repeat(64),
							cachePath: "remote/https/jsr.io/meta",
							mediaType: "application/json",
						},
					],
				},
			],
			npmPackages: [
				{
					name: "chalk",
					version: "5.3.0",
					integrity: "sha512-c",
					tarballUrl: "https://registry.npmjs.org/chalk/-/chalk-5.3.0.tgz",
					cachePath: "npm/registry.npmjs.org/chalk/5.3.0",
				},
			],
		};

		expect(listManifestPackages(manifest)).toEqual([
			{ name: "@x/y", version: "1.0.0", source: "jsr", files: 1 },
			{ name: "chalk", version: "5.3.0", source: "npm", files: 1 },
		]);
	});
});
