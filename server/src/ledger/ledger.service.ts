import { Injectable, Logger, NotFoundException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
	type Identity,
	MemoryAssetLedger,
	SerialExecutor,
	SwapEngine,
	SwapError,
	parseAmount,
} from "@swap-escrow/sdk";
import {
	BalanceDto,
	GrantAllowanceInDto,
	MintInDto,
	TransferInDto,
} from "./dto/ledger.dto";

/**
 * Account operations on the ledger the escrow holds custody on. Writes go
 * through the same executor as engine calls.
 */
@Injectable()
export class LedgerService {
	private readonly logger = new Logger(LedgerService.name);

	constructor(
		private readonly ledger: MemoryAssetLedger,
		private readonly executor: SerialExecutor,
		private readonly engine: SwapEngine,
		private readonly config: ConfigService,
	) {}

	balanceOf(asset: string, owner: Identity): BalanceDto {
		return {
			asset,
			owner,
			balance: this.ledger.balanceOf(asset, owner).toString(),
			allowance: this.ledger
				.allowance(asset, owner, this.engine.custodian)
				.toString(),
		};
	}

	async grantAllowance(
		dto: GrantAllowanceInDto,
		owner: Identity,
	): Promise<BalanceDto> {
		this.requireNotCustodian(owner);
		const amount = requireAmount(dto.amount);
		await this.executor.run(() =>
			this.ledger.approve(dto.asset, owner, this.engine.custodian, amount),
		);
		return this.balanceOf(dto.asset, owner);
	}

	/**
	 * Transfers addressed to the custodian are refused by the engine itself.
	 */
	async transfer(dto: TransferInDto, from: Identity): Promise<BalanceDto> {
		this.requireNotCustodian(from);
		const amount = requireAmount(dto.amount);
		await this.executor.run(() =>
			this.ledger.transfer(dto.asset, from, dto.to, amount),
		);
		return this.balanceOf(dto.asset, from);
	}

	async mint(dto: MintInDto, caller: Identity): Promise<BalanceDto> {
		if (this.config.get<string>("LEDGER_FAUCET_ENABLED") !== "true") {
			throw new NotFoundException("Faucet is disabled");
		}
		const to = dto.to ?? caller;
		const amount = requireAmount(dto.amount);
		if (to === this.engine.custodian) {
			this.engine.onInboundTransfer({
				asset: dto.asset,
				from: caller,
				to,
				amount,
			});
		}
		await this.executor.run(() => this.ledger.mint(dto.asset, to, amount));
		this.logger.log(`Minted ${amount} ${dto.asset} to ${to}`);
		return this.balanceOf(dto.asset, to);
	}

	private requireNotCustodian(caller: Identity): void {
		if (caller === this.engine.custodian) {
			throw new SwapError(
				"The custodial account cannot be operated directly",
				"INVALID_ARGUMENT",
			);
		}
	}
}

function requireAmount(value: string): bigint {
	const amount = parseAmount(value);
	if (amount === undefined) {
		throw new SwapError("amount must be a decimal integer", "INVALID_ARGUMENT");
	}
	return amount;
}
