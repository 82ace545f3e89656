/**
 * Encoding utilities for the SDK
 */

import { base58 } from "@scure/base";

/**
 * Convert bytes to base58 string
 */
export function bytesToBase58(bytes: Uint8Array): string {
	return base58.encode(bytes);
}

/**
 * Convert a string to bytes using UTF-8 encoding
 */
export function stringToBytes(str: string): Uint8Array {
	return new TextEncoder().encode(str);
}

/**
 * Concatenate multiple byte arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
	const result = new Uint8Array(totalLength);
	let offset = 0;
	for (const arr of arrays) {
		result.set(arr, offset);
		offset += arr.length;
	}
	return result;
}
