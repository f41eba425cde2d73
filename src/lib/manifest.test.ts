import { describe, expect, it } from "vitest";
import { MalformedManifestError } from "@/errors";
import {
	comparePackages,
	type DependencyManifest,
	deserializeManifest,
	serializeManifest,
	summarizeManifest,
} from "./manifest";

const manifest: DependencyManifest = {
	lockVersion: "5",
	jsrPackages: [
		{
			name: "@x/y",
			version: "1.0.0",
			integrity: "sha256-deadbeef",
			files: [
				{
					url: "https://jsr.io/@x/y/1.0.0/mod.ts",
					sha256: "aa",
					cachePath: "remote/https/jsr.io/bb",
					mediaType: "text/typescript",
				},
			],
		},
	],
	npmPackages: [
		{
			name: "chalk",
			version: "5.3.0",
			integrity: "sha512-chalk",
			tarballUrl: "https://registry.npmjs.org/chalk/-/chalk-5.3.0.tgz",
			cachePath: "npm/registry.npmjs.org/chalk/5.3.0",
		},
	],
};

const expectedJson = `{
  "jsr_packages": [
    {
      "files": [
        {
          "cache_path": "remote/https/jsr.io/bb",
          "media_type": "text/typescript",
          "sha256": "aa",
          "url": "https://jsr.io/@x/y/1.0.0/mod.ts"
        }
      ],
      "integrity": "sha256-deadbeef",
      "name": "@x/y",
      "version": "1.0.0"
    }
  ],
  "lock_version": "5",
  "npm_packages": [
    {
      "cache_path": "npm/registry.npmjs.org/chalk/5.3.0",
      "integrity": "sha512-chalk",
      "name": "chalk",
      "tarball_url": "https://registry.npmjs.org/chalk/-/chalk-5.3.0.tgz",
      "version": "5.3.0"
    }
  ]
}
`;

describe("serializeManifest", () => {
	it("should write sorted keys, 2-space indentation and a trailing newline", () => {
		expect(serializeManifest(manifest)).toBe(expectedJson);
	});

	it("should be byte-identical across calls", () => {
		expect(serializeManifest(manifest)).toBe(serializeManifest(manifest));
	});

	it("should write empty package lists", () => {
		expect(
			serializeManifest({ lockVersion: "4", jsrPackages: [], npmPackages: [] }),
		).toBe(
			'{\n  "jsr_packages": [],\n  "lock_version": "4",\n  "npm_packages": []\n}\n',
		);
	});
});

describe("deserializeManifest", () => {
	it("should round-trip a serialized manifest", () => {
		expect(deserializeManifest(serializeManifest(manifest))).toEqual(manifest);
	});

	it("should ignore unknown fields", () => {
		const document = JSON.parse(expectedJson);
		document.generated_by = "someone";
		document.npm_packages[0].extra = true;
		expect(deserializeManifest(JSON.stringify(document))).toEqual(manifest);
	});

	it("should default missing package lists to empty", () => {
		expect(deserializeManifest('{"lock_version":"5"}')).toEqual({
			lockVersion: "5",
			jsrPackages: [],
			npmPackages: [],
		});
	});

	it("should reject missing required fields", () => {
		const document = JSON.parse(expectedJson);
		delete document.jsr_packages[0].files[0].sha256;
		expect(() => deserializeManifest(JSON.stringify(document))).toThrow(
			/jsr_packages\.0\.files\.0\.sha256/,
		);
	});

	it("should reject invalid JSON", () => {
		expect(() => deserializeManifest("")).toThrow(MalformedManifestError);
	});
});

describe("comparePackages", () => {
	it("should order by name, then version, in code-unit order", () => {
		const sorted = [
			{ name: "b", version: "1.0.0" },
			{ name: "a", version: "2.0.0" },
			{ name: "a", version: "10.0.0" },
			{ name: "B", version: "1.0.0" },
		].sort(comparePackages);
		expect(sorted).toEqual([
			{ name: "B", version: "1.0.0" },
			{ name: "a", version: "10.0.0" },
			{ name: "a", version: "2.0.0" },
			{ name: "b", version: "1.0.0" },
		]);
	});
});

describe("summarizeManifest", () => {
	it("should count packages and files", () => {
		expect(summarizeManifest(manifest)).toEqual({
			jsrPackages: 1,
			jsrFiles: 1,
			npmPackages: 1,
		});
	});
});
