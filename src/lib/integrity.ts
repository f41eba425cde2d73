import { createHash } from "node:crypto";
import { InvalidInputError } from "@/errors";

const CHECKSUM_PATTERN = /^sha256-([0-9a-f]{64})$/;

/**
 * Calculate the lowercase hex SHA-256 digest of a buffer.
 *
 * @param data - The bytes to hash
 * @returns Hex digest without an algorithm prefix
 */
export function sha256Hex(data: Uint8Array): string {
	return createHash("sha256").update(data).digest("hex");
}

/**
 * Convert a JSR file checksum (`sha256-<hex>`) to its bare hex digest.
 *
 * @param checksum - Checksum as listed in a version `_meta.json`
 * @returns The 64-character hex digest
 * @throws InvalidInputError if the prefix or digest is malformed
 *
 * @example
 * ```typescript
 * checksumToHex(`sha256-${"ab".repeat(32)}`)
 * // => "abab...ab"
 * ```
 */
export function checksumToHex(checksum: string): string {
	const match = checksum.match(CHECKSUM_PATTERN);
	if (!match?.[1]) {
		throw new InvalidInputError(
			`Unsupported checksum "${checksum}" (expected sha256-<hex>)`,
		);
	}
	return match[1];
}
