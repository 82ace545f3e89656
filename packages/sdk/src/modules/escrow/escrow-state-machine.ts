/**
 * Escrow State Machine Configuration
 *
 * Defines the state machine for the escrow lifecycle.
 */

import {
	StateMachineConfig,
	createState,
	createTransition,
} from "../../contracts/index.js";
import { EscrowError } from "./errors.js";
import {
	ACTION_PAYEE,
	ACTION_WINDOW,
	DeadlineWindow,
	Escrow,
	EscrowAction,
	EscrowStatus,
	ResolutionTarget,
} from "./types.js";

/**
 * Context handed to escrow transitions.
 */
export interface EscrowTransitionContext {
	/** The escrow as loaded under the lock */
	escrow: Escrow;
	/** Clock reading taken once per request */
	now: number;
	/** Moves the whole vault to the given party; rejects on ledger failure */
	moveFunds: (payee: ResolutionTarget) => Promise<void>;
}

/**
 * Whether `now` falls inside an action's deadline window.
 */
export function isWithinWindow(
	window: DeadlineWindow,
	now: number,
	deadline: number,
): boolean {
	switch (window) {
		case "until-deadline":
			return now <= deadline;
		case "after-deadline":
			return now > deadline;
		case "any-time":
			return true;
	}
}

function deadlineGuard(action: EscrowAction) {
	const window = ACTION_WINDOW[action];
	return ({ escrow, now }: EscrowTransitionContext): boolean => {
		if (isWithinWindow(window, now, escrow.deadline)) {
			return true;
		}
		const details = { escrowId: escrow.id, action, now, deadline: escrow.deadline };
		if (window === "after-deadline") {
			throw new EscrowError(
				"DEADLINE_NOT_REACHED",
				`Escrow ${escrow.id} cannot be refunded before its deadline`,
				details,
			);
		}
		throw new EscrowError(
			"DEADLINE_PASSED",
			`Escrow ${escrow.id} deadline has passed, ${action} is no longer possible`,
			details,
		);
	};
}

function escrowTransition(action: EscrowAction, to: EscrowStatus) {
	return createTransition<EscrowStatus, EscrowAction, EscrowTransitionContext>(
		"initialized",
		action,
		to,
		{
			guard: deadlineGuard(action),
			onTransition: (ctx) => ctx.moveFunds(ACTION_PAYEE[action]),
		},
	);
}

/**
 * Escrow state machine configuration.
 *
 * States:
 * - initialized: Funds locked in the vault
 * - withdrawn: Paid to the recipient (terminal)
 * - refunded: Paid back to the initializer (terminal)
 * - cancelled: Cancelled by the initializer before the deadline (terminal)
 */
export const ESCROW_STATE_MACHINE: StateMachineConfig<
	EscrowStatus,
	EscrowAction,
	EscrowTransitionContext
> = {
	initialState: "initialized",
	states: [
		createState<EscrowStatus, EscrowAction>(
			"initialized",
			["withdraw", "refund", "cancel", "resolve-release", "resolve-refund"],
			{ description: "Vault funded, awaiting an outcome" },
		),
		createState<EscrowStatus, EscrowAction>("withdrawn", [], {
			isFinal: true,
			description: "Vault paid out to the recipient",
		}),
		createState<EscrowStatus, EscrowAction>("refunded", [], {
			isFinal: true,
			description: "Vault paid back to the initializer",
		}),
		createState<EscrowStatus, EscrowAction>("cancelled", [], {
			isFinal: true,
			description: "Cancelled by the initializer before the deadline",
		}),
	],
	transitions: [
		escrowTransition("withdraw", "withdrawn"),
		escrowTransition("refund", "refunded"),
		escrowTransition("cancel", "cancelled"),
		escrowTransition("resolve-release", "withdrawn"),
		escrowTransition("resolve-refund", "refunded"),
	],
};

/**
 * Narrow a persisted state string to an escrow status.
 */
export function isEscrowStatus(value: string): value is EscrowStatus {
	return ESCROW_STATE_MACHINE.states.some((s) => s.name === value);
}

/**
 * Get the actions the state machine allows from a state, ignoring roles and time.
 */
export function getAllowedActions(state: EscrowStatus): EscrowAction[] {
	const stateConfig = ESCROW_STATE_MACHINE.states.find((s) => s.name === state);
	return stateConfig ? [...stateConfig.allowedActions] : [];
}
