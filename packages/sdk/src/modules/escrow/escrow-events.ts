/**
 * Escrow Events
 *
 * Every accepted transition produces exactly one event. Events are numbered
 * in the order the transitions committed and are only ever appended; the
 * engine itself never reads them back.
 */

import { ResolutionTarget } from "./types.js";

interface EscrowEventBase {
	escrowId: string;
	/** Position in the global event order, starting at 1 */
	sequence: number;
	/** Clock reading of the transition (Unix timestamp ms) */
	occurredAt: number;
}

export interface EscrowInitializedEvent extends EscrowEventBase {
	type: "escrow.initialized";
	initializer: string;
	recipient: string;
	arbiter: string;
	amount: number;
	deadline: number;
	vault: string;
}

export interface EscrowWithdrawnEvent extends EscrowEventBase {
	type: "escrow.withdrawn";
	recipient: string;
	amount: number;
}

export interface EscrowRefundedEvent extends EscrowEventBase {
	type: "escrow.refunded";
	initializer: string;
	amount: number;
}

export interface EscrowCancelledEvent extends EscrowEventBase {
	type: "escrow.cancelled";
	initializer: string;
	amount: number;
}

export interface EscrowResolvedEvent extends EscrowEventBase {
	type: "escrow.resolved";
	arbiter: string;
	amount: number;
	releasedTo: ResolutionTarget;
}

export type EscrowEvent =
	| EscrowInitializedEvent
	| EscrowWithdrawnEvent
	| EscrowRefundedEvent
	| EscrowCancelledEvent
	| EscrowResolvedEvent;

export type EscrowEventType = EscrowEvent["type"];

export type EscrowEventOfType<K extends EscrowEventType> = Extract<
	EscrowEvent,
	{ type: K }
>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
	? Omit<T, K>
	: never;

/**
 * An event before the bus numbered it.
 */
export type EscrowEventInput = DistributiveOmit<
	EscrowEvent,
	"sequence" | "occurredAt"
>;

export type EscrowEventListener<E extends EscrowEvent = EscrowEvent> = (
	event: E,
) => void;

/**
 * Minimal logger the SDK reports to. Nest's `Logger` and `console` both fit.
 */
export interface EngineLogger {
	log(message: string): void;
	warn(message: string): void;
	error(message: string, trace?: string): void;
}

export function isEventOfType<K extends EscrowEventType>(
	event: EscrowEvent,
	type: K,
): event is EscrowEventOfType<K> {
	return event.type === type;
}

/**
 * Ordered, append-only escrow event log with subscriptions.
 *
 * @example
 * ```typescript
 * const events = new EscrowEventBus();
 * events.on("escrow.resolved", (e) => {
 *   console.log(`${e.escrowId} resolved in favour of ${e.releasedTo}`);
 * });
 * ```
 */
export class EscrowEventBus {
	private sequence = 0;
	private readonly log: EscrowEvent[] = [];
	private readonly listeners: Set<EscrowEventListener> = new Set();
	private readonly errorListeners: Set<(err: Error, event: EscrowEvent) => void> =
		new Set();

	constructor(
		private readonly options: {
			/** Number of events kept for {@link history}; older ones are dropped */
			maxHistory?: number;
			logger?: EngineLogger;
		} = {},
	) {}

	/**
	 * Number an event, append it and deliver it to every listener.
	 *
	 * Listener failures never propagate to the publisher.
	 */
	publish(input: EscrowEventInput, occurredAt: number): EscrowEvent {
		const event: EscrowEvent = {
			...input,
			sequence: ++this.sequence,
			occurredAt,
		};

		this.log.push(event);
		const maxHistory = this.options.maxHistory ?? 10_000;
		if (this.log.length > maxHistory) {
			this.log.splice(0, this.log.length - maxHistory);
		}

		for (const listener of this.listeners) {
			try {
				listener(event);
			} catch (err) {
				this.reportListenerError(err, event);
			}
		}
		return event;
	}

	/**
	 * Subscribe to every event.
	 *
	 * @returns A function to unsubscribe
	 */
	subscribe(listener: EscrowEventListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Subscribe to one event type.
	 *
	 * @returns A function to unsubscribe
	 */
	on<K extends EscrowEventType>(
		type: K,
		listener: EscrowEventListener<EscrowEventOfType<K>>,
	): () => void {
		return this.subscribe((event) => {
			if (isEventOfType(event, type)) {
				listener(event);
			}
		});
	}

	/**
	 * Be told when a listener throws.
	 */
	onError(listener: (err: Error, event: EscrowEvent) => void): () => void {
		this.errorListeners.add(listener);
		return () => {
			this.errorListeners.delete(listener);
		};
	}

	/**
	 * Retained events in publication order.
	 */
	history(filter: { escrowId?: string; afterSequence?: number } = {}): EscrowEvent[] {
		return this.log.filter(
			(e) =>
				(filter.escrowId === undefined || e.escrowId === filter.escrowId) &&
				(filter.afterSequence === undefined || e.sequence > filter.afterSequence),
		);
	}

	/**
	 * Sequence number of the last published event (0 before the first).
	 */
	lastSequence(): number {
		return this.sequence;
	}

	private reportListenerError(err: unknown, event: EscrowEvent): void {
		const error = err instanceof Error ? err : new Error(String(err));
		if (this.errorListeners.size === 0) {
			this.options.logger?.error(
				`Unhandled listener error on "${event.type}" for ${event.escrowId}: ${error.message}`,
				error.stack,
			);
			return;
		}
		for (const listener of this.errorListeners) {
			try {
				listener(error, event);
			} catch (nested) {
				this.options.logger?.warn(
					`Error listener threw: ${nested instanceof Error ? nested.message : String(nested)}`,
				);
			}
		}
	}
}
