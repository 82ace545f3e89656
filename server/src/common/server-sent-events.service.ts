import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import type { EscrowEvent } from "@custody-escrow/sdk";
import { filter, Subject } from "rxjs";
import {
	ESCROW_CANCELLED_ID,
	ESCROW_INITIALIZED_ID,
	ESCROW_REFUNDED_ID,
	ESCROW_RESOLVED_ID,
	ESCROW_WITHDRAWN_ID,
	type EscrowCancelled,
	type EscrowId,
	type EscrowInitialized,
	type EscrowRefunded,
	type EscrowResolved,
	type EscrowWithdrawn,
} from "./escrow.event";

export type SseEvent<T = EscrowEvent> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowEvent>();

	escrowEvents(id?: EscrowId) {
		if (id) {
			return this.events$.pipe(filter((e) => e.escrowId === id));
		}
		return this.events$.asObservable();
	}

	@OnEvent(ESCROW_INITIALIZED_ID)
	onEscrowInitialized(evt: EscrowInitialized) {
		this.events$.next(evt);
	}

	@OnEvent(ESCROW_WITHDRAWN_ID)
	onEscrowWithdrawn(evt: EscrowWithdrawn) {
		this.events$.next(evt);
	}

	@OnEvent(ESCROW_REFUNDED_ID)
	onEscrowRefunded(evt: EscrowRefunded) {
		this.events$.next(evt);
	}

	@OnEvent(ESCROW_CANCELLED_ID)
	onEscrowCancelled(evt: EscrowCancelled) {
		this.events$.next(evt);
	}

	@OnEvent(ESCROW_RESOLVED_ID)
	onEscrowResolved(evt: EscrowResolved) {
		this.events$.next(evt);
	}
}
