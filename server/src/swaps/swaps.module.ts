import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AuthModule } from "../auth/auth.module";
import { SwapEventRecord } from "./swap-event.entity";
import { SwapAuditService } from "./swap-audit.service";
import { SwapsService } from "./swaps.service";
import { SwapsController } from "./swaps.controller";

@Module({
	imports: [TypeOrmModule.forFeature([SwapEventRecord]), AuthModule],
	providers: [SwapsService, SwapAuditService],
	controllers: [SwapsController],
	exports: [SwapsService],
})
export class SwapsModule {}
