import { Injectable, Logger } from "@nestjs/common";
import {
	type Identity,
	SerialExecutor,
	type SettlementPlan,
	SwapEngine,
	type SwapRequest,
	type SwapRequestId,
	getAllowedActions,
	parseAmount,
	SwapError,
} from "@swap-escrow/sdk";
import { Cursor, cursorToString } from "../common/dto/envelopes";
import { CreateSwapInDto } from "./dto/create-swap.dto";
import { GetSwapDto } from "./dto/get-swap.dto";
import { SwapQuoteDto } from "./dto/swap-quote.dto";
import { SwapEventDto } from "./dto/swap-event.dto";
import { SwapAuditService } from "./swap-audit.service";

type Transition = "approve" | "reject" | "cancel";

@Injectable()
export class SwapsService {
	private readonly logger = new Logger(SwapsService.name);

	constructor(
		private readonly engine: SwapEngine,
		private readonly executor: SerialExecutor,
		private readonly audit: SwapAuditService,
	) {}

	async create(dto: CreateSwapInDto, requester: Identity): Promise<GetSwapDto> {
		const offerAmount = requireAmount(dto.offerAmount, "offerAmount");
		const receiveAmount = requireAmount(dto.receiveAmount, "receiveAmount");
		const id = await this.executor.run(() =>
			this.engine.create(requester, {
				recipient: dto.recipient,
				offerAsset: dto.offerAsset,
				offerAmount,
				receiveAsset: dto.receiveAsset,
				receiveAmount,
			}),
		);
		this.logger.log(`Swap request ${id} created by ${requester}`);
		return toSwapDto(this.engine.get(id));
	}

	getById(id: SwapRequestId): GetSwapDto {
		return toSwapDto(this.engine.get(id));
	}

	getByParty(
		party: Identity,
		limit: number,
		cursor: Cursor,
	): { items: GetSwapDto[]; total: number; nextCursor?: string } {
		const { items, total, hasMore } = this.engine.list({
			party,
			idBefore: cursor.idBefore,
			limit: Math.min(Math.max(limit, 1), 100),
		});
		const last = items[items.length - 1];
		return {
			items: items.map(toSwapDto),
			total,
			nextCursor: hasMore && last ? cursorToString(last.id) : undefined,
		};
	}

	quote(id: SwapRequestId): SwapQuoteDto {
		return toQuoteDto(this.engine.quote(id));
	}

	async history(id: SwapRequestId): Promise<SwapEventDto[]> {
		// 404 for unknown ids rather than an empty list
		this.engine.get(id);
		const rows = await this.audit.historyOf(id);
		return rows.map((row) => ({
			type: row.type,
			payload: row.payload,
			createdAt: row.createdAt.getTime(),
		}));
	}

	approve(id: SwapRequestId, caller: Identity): Promise<GetSwapDto> {
		return this.transition("approve", id, caller);
	}

	reject(id: SwapRequestId, caller: Identity): Promise<GetSwapDto> {
		return this.transition("reject", id, caller);
	}

	cancel(id: SwapRequestId, caller: Identity): Promise<GetSwapDto> {
		return this.transition("cancel", id, caller);
	}

	private async transition(
		action: Transition,
		id: SwapRequestId,
		caller: Identity,
	): Promise<GetSwapDto> {
		await this.executor.run(() => this.engine[action](id, caller));
		const request = this.engine.get(id);
		this.logger.log(`Swap request ${id} is now ${request.status} (${action} by ${caller})`);
		return toSwapDto(request);
	}
}

function requireAmount(value: string, field: string): bigint {
	const amount = parseAmount(value);
	if (amount === undefined) {
		throw new SwapError(`${field} must be a decimal integer`, "INVALID_ARGUMENT", {
			field,
		});
	}
	return amount;
}

export function toSwapDto(request: Readonly<SwapRequest>): GetSwapDto {
	return {
		id: request.id,
		requester: request.requester,
		recipient: request.recipient,
		offerAsset: request.offerAsset,
		offerAmount: request.offerAmount.toString(),
		receiveAsset: request.receiveAsset,
		receiveAmount: request.receiveAmount.toString(),
		status: request.status,
		allowedActions: getAllowedActions(request.status),
	};
}

export function toQuoteDto(plan: SettlementPlan): SwapQuoteDto {
	return {
		requestId: plan.requestId,
		feePercent: plan.feePercent,
		offerFee: plan.offerFee.toString(),
		receiveFee: plan.receiveFee.toString(),
		disbursements: plan.disbursements.map((d) => ({
			asset: d.asset,
			to: d.to,
			amount: d.amount.toString(),
		})),
	};
}
