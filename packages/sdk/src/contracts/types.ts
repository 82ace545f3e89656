/**
 * Contract layer types
 *
 * Types for defining contract state machines and lifecycle management.
 */

/**
 * Generic state definition for a contract state machine.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Is this a terminal state (no further transitions)? */
	isFinal: boolean;
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
	TContext = unknown,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
	/**
	 * Optional guard. Returning `false` rejects the transition with
	 * `GUARD_FAILED`; throwing rejects it with the thrown error.
	 */
	guard?: (context: TContext) => boolean;
	/** Side effects to execute before the state changes */
	onTransition?: (context: TContext) => void | Promise<void>;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
	TContext = unknown,
> {
	/** Initial state when contract is created */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState, TAction>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction, TContext>[];
}

/**
 * Contract metadata stored alongside contract data.
 */
export interface ContractMetadata {
	/** Unique contract identifier */
	id: string;
	/** When the contract was created (Unix timestamp ms) */
	createdAt: number;
	/** When the contract was last updated (Unix timestamp ms) */
	updatedAt: number;
	/** Version number (incremented on each update) */
	version: number;
	/** Contract type identifier (e.g., "escrow") */
	contractType: string;
}

/**
 * Contract action result.
 */
export interface ActionResult<TState extends string, TAction extends string> {
	/** Previous state */
	previousState: TState;
	/** New state after action */
	newState: TState;
	/** The action that was performed */
	action: TAction;
}

/**
 * Error thrown during contract operations.
 */
export class ContractError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ContractError";
	}
}
