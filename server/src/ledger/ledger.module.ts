import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthModule } from "../auth/auth.module";
import { LedgerAccount } from "./ledger-account.entity";
import { AdminLedgerController, LedgerController } from "./ledger.controller";
import { TypeOrmLedger } from "./typeorm-ledger";

@Module({
	imports: [TypeOrmModule.forFeature([LedgerAccount]), AuthModule],
	providers: [TypeOrmLedger],
	controllers: [LedgerController, AdminLedgerController],
	exports: [TypeOrmLedger],
})
export class LedgerModule {}
