import { describe, expect, it } from "vitest";
import { InvalidInputError } from "@/errors";
import { checksumToHex, sha256Hex } from "./integrity";

const HEX = "ab".repeat(32);

describe("sha256Hex", () => {
	it("should hash raw bytes to lowercase hex", () => {
		expect(sha256Hex(Buffer.from("/"))).toBe(
			"8a5edab282632443219e051e4ade2d1d5bbc671c781051bf1437897cbdfea0f1",
		);
	});
});

describe("checksumToHex", () => {
	it("should strip the sha256- prefix", () => {
		expect(checksumToHex(`sha256-${HEX}`)).toBe(HEX);
	});

	it("should reject other algorithms", () => {
		expect(() => checksumToHex(`sha512-${HEX}`)).toThrow(InvalidInputError);
	});

	it("should reject a missing prefix", () => {
		expect(() => checksumToHex(HEX)).toThrow(InvalidInputError);
	});

	it("should reject digests that are not 64 lowercase hex chars", () => {
		expect(() => checksumToHex("sha256-abc")).toThrow(InvalidInputError);
		expect(() => checksumToHex(`sha256-${HEX.toUpperCase()}`)).toThrow(
			InvalidInputError,
		);
	});
});
