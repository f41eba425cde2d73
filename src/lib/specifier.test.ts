import { describe, expect, it } from "vitest";
import {
	generatePackageKey,
	getPackageBasename,
	parseJsrKey,
	parseNpmKey,
} from "./specifier.js";

describe("specifier utilities", () => {
	describe("parseJsrKey", () => {
		it("should parse scoped key", () => {
			expect(parseJsrKey("@std/path@1.0.8")).toEqual({
				scope: "@std",
				name: "path",
				version: "1.0.8",
			});
		});

		it("should keep prerelease versions", () => {
			expect(parseJsrKey("@cliffy/ansi@1.0.0-rc.8")).toEqual({
				scope: "@cliffy",
				name: "ansi",
				version: "1.0.0-rc.8",
			});
		});

		it("should return null for invalid keys", () => {
			expect(parseJsrKey("std/path@1.0.8")).toBeNull();
			expect(parseJsrKey("@std/path")).toBeNull();
			expect(parseJsrKey("@std@1.0.0")).toBeNull();
			expect(parseJsrKey("@std/path@")).toBeNull();
		});
	});

	describe("parseNpmKey", () => {
		it("should parse unscoped key", () => {
			expect(parseNpmKey("name@1.2.3")).toEqual({
				name: "name",
				version: "1.2.3",
				peerQualifier: undefined,
			});
		});

		it("should parse scoped key with peer qualifier", () => {
			expect(parseNpmKey("@scope/name@1.2.3_peer@4.5.6")).toEqual({
				name: "@scope/name",
				version: "1.2.3",
				peerQualifier: "peer@4.5.6",
			});
		});

		it("should cut the version at the first underscore", () => {
			expect(parseNpmKey("react-dom@18.3.1_react@18.3.1_scheduler@0.23.2")).toEqual({
				name: "react-dom",
				version: "18.3.1",
				peerQualifier: "react@18.3.1_scheduler@0.23.2",
			});
		});

		it("should return null for invalid keys", () => {
			expect(parseNpmKey("name")).toBeNull();
			expect(parseNpmKey("@scope/name")).toBeNull();
			expect(parseNpmKey("@1.0.0")).toBeNull();
			expect(parseNpmKey("name@")).toBeNull();
			expect(parseNpmKey("name@_peer@1.0.0")).toBeNull();
		});
	});

	describe("getPackageBasename", () => {
		it("should drop the scope", () => {
			expect(getPackageBasename("@types/node")).toBe("node");
			expect(getPackageBasename("chalk")).toBe("chalk");
		});
	});

	describe("generatePackageKey", () => {
		it("should join name and version", () => {
			expect(generatePackageKey("@std/path", "1.0.8")).toBe("@std/path@1.0.8");
		});
	});
});
