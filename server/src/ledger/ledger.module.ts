import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { LedgerController } from "./ledger.controller";
import { LedgerService } from "./ledger.service";

@Module({
	imports: [AuthModule],
	providers: [LedgerService],
	controllers: [LedgerController],
})
export class LedgerModule {}
