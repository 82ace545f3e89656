import type { Clock } from "@custody-escrow/sdk";

/**
 * Injection token for the clock deadlines are checked against.
 */
export const ESCROW_CLOCK = "ESCROW_CLOCK";

export type EscrowClock = Clock;
