import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { SystemClock } from "@custody-escrow/sdk";

import { AuthModule } from "../auth/auth.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { LedgerModule } from "../ledger/ledger.module";
import { ESCROW_CLOCK } from "./escrow-clock";
import { EscrowRecord } from "./escrow.entity";
import { EscrowsController } from "./escrows.controller";
import { EscrowsService } from "./escrows.service";

@Module({
	imports: [
		TypeOrmModule.forFeature([EscrowRecord]),
		AuthModule,
		LedgerModule,
	],
	providers: [
		EscrowsService,
		ServerSentEventsService,
		{ provide: ESCROW_CLOCK, useValue: new SystemClock() },
	],
	controllers: [EscrowsController],
	exports: [EscrowsService],
})
export class EscrowsModule {}
