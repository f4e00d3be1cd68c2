import { Injectable, Logger } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { InjectRepository } from "@nestjs/typeorm";
import type { Repository } from "typeorm";
import { nanoid } from "nanoid";
import {
	FEE_PERCENT_UPDATED,
	OWNERSHIP_TRANSFERRED,
	REQUEST_CREATED,
	STATUS_CHANGED,
	type SwapEvent,
	type SwapRequestId,
	TREASURY_UPDATED,
} from "@swap-escrow/sdk";
import { SwapEventRecord } from "./swap-event.entity";
import { toError } from "../common/errors";
import { toJsonSafe } from "../common/json";

@Injectable()
export class SwapAuditService {
	private readonly logger = new Logger(SwapAuditService.name);
	readonly runId = nanoid(16);

	constructor(
		@InjectRepository(SwapEventRecord)
		private readonly repository: Repository<SwapEventRecord>,
	) {}

	@OnEvent(REQUEST_CREATED)
	@OnEvent(STATUS_CHANGED)
	@OnEvent(TREASURY_UPDATED)
	@OnEvent(FEE_PERCENT_UPDATED)
	@OnEvent(OWNERSHIP_TRANSFERRED)
	async record(event: SwapEvent): Promise<SwapEventRecord> {
		const { type, ...rest } = event;
		const entity = this.repository.create({
			runId: this.runId,
			type,
			requestId: "id" in event ? event.id : null,
			payload: payloadOf(rest),
		});
		try {
			return await this.repository.save(entity);
		} catch (e) {
			const error = toError(e);
			this.logger.error(`Failed to record ${type}: ${error.message}`, error.stack);
			throw error;
		}
	}

	async historyOf(requestId: SwapRequestId): Promise<SwapEventRecord[]> {
		return this.repository.find({
			where: { runId: this.runId, requestId },
			order: { id: "ASC" },
		});
	}
}

function payloadOf(value: object): Record<string, unknown> {
	const safe = toJsonSafe(value);
	const payload: Record<string, unknown> = {};
	if (safe !== null && typeof safe === "object") {
		for (const [key, v] of Object.entries(safe)) payload[key] = v;
	}
	return payload;
}
