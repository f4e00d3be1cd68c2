import { Injectable, Logger } from "@nestjs/common";
import { type Identity, SerialExecutor, SwapEngine } from "@swap-escrow/sdk";
import { AdminConfigDto } from "./dto/admin-config.dto";

@Injectable()
export class AdminService {
	private readonly logger = new Logger(AdminService.name);

	constructor(
		private readonly engine: SwapEngine,
		private readonly executor: SerialExecutor,
	) {}

	getConfig(): AdminConfigDto {
		return { ...this.engine.getConfig(), custodian: this.engine.custodian };
	}

	async setTreasury(caller: Identity, treasury: Identity): Promise<AdminConfigDto> {
		await this.executor.run(() => this.engine.setTreasury(caller, treasury));
		this.logger.log(`Treasury set to ${treasury} by ${caller}`);
		return this.getConfig();
	}

	async setFeePercent(caller: Identity, feePercent: number): Promise<AdminConfigDto> {
		await this.executor.run(() => this.engine.setFeePercent(caller, feePercent));
		this.logger.log(`Fee set to ${feePercent}% by ${caller}`);
		return this.getConfig();
	}

	async transferOwnership(caller: Identity, owner: Identity): Promise<AdminConfigDto> {
		await this.executor.run(() => this.engine.transferOwnership(caller, owner));
		this.logger.log(`Ownership transferred from ${caller} to ${owner}`);
		return this.getConfig();
	}
}
