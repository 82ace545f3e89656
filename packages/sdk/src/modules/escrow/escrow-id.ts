/**
 * Deterministic escrow and vault addressing.
 */

import { sha256 } from "@noble/hashes/sha256";
import {
	bytesToBase58,
	concatBytes,
	stringToBytes,
} from "../../utils/index.js";
import { CustodyHandle } from "../../ledger/types.js";

const ESCROW_SEED = stringToBytes("escrow");
const SEPARATOR = new Uint8Array([0]);

/**
 * Derive the escrow id from its initializer and a nonce.
 *
 * `base58(sha256("escrow" 0x00 initializer 0x00 nonce))`. The separator keeps
 * `("ab", "c")` and `("a", "bc")` apart.
 */
export function deriveEscrowId(initializer: string, nonce: string): string {
	const digest = sha256(
		concatBytes(
			ESCROW_SEED,
			SEPARATOR,
			stringToBytes(initializer),
			SEPARATOR,
			stringToBytes(nonce),
		),
	);
	return bytesToBase58(digest);
}

/**
 * Custody handle of the vault owned by an escrow.
 */
export function vaultHandleFor(escrowId: string): CustodyHandle {
	return `vault:${escrowId}`;
}
