/**
 * Role checks. Authorization is plain equality against the identities
 * stored on the escrow.
 */

import { EscrowError } from "./errors.js";
import { EscrowData, EscrowRole, RolePolicy } from "./types.js";

type Parties = Pick<EscrowData, "initializer" | "recipient" | "arbiter">;

export function hasRole(
	parties: Parties,
	identity: string,
	role: EscrowRole,
): boolean {
	return parties[role] === identity;
}

/**
 * Validate the three identities of a new escrow against the role policy.
 *
 * @throws EscrowError `INVALID_PARTIES`
 */
export function assertValidParties(parties: Parties, policy: RolePolicy): void {
	for (const role of ["initializer", "recipient", "arbiter"] as const) {
		const identity: unknown = parties[role];
		if (typeof identity !== "string" || identity.trim().length === 0) {
			throw new EscrowError("INVALID_PARTIES", `Missing ${role} identity`, {
				role,
			});
		}
	}

	if (
		!policy.allowRecipientAsInitializer &&
		parties.recipient === parties.initializer
	) {
		throw new EscrowError(
			"INVALID_PARTIES",
			"Recipient must differ from the initializer",
			{ initializer: parties.initializer, recipient: parties.recipient },
		);
	}

	if (
		!policy.allowArbiterAsParty &&
		(parties.arbiter === parties.initializer ||
			parties.arbiter === parties.recipient)
	) {
		throw new EscrowError(
			"INVALID_PARTIES",
			"Arbiter must differ from the initializer and the recipient",
			{ arbiter: parties.arbiter },
		);
	}
}
