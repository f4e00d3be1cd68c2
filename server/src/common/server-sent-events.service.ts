import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { Subject } from "rxjs";
import {
	FEE_PERCENT_UPDATED,
	type FeePercentUpdated,
	OWNERSHIP_TRANSFERRED,
	type OwnershipTransferred,
	REQUEST_CREATED,
	type RequestCreated,
	STATUS_CHANGED,
	type StatusChanged,
	type SwapRequestId,
	type SwapStatus,
	TREASURY_UPDATED,
	type TreasuryUpdated,
} from "@swap-escrow/sdk";

export type SwapSse =
	| {
			type: "new_swap";
			id: SwapRequestId;
			requester: string;
			recipient: string;
	  }
	| { type: "swap_updated"; id: SwapRequestId; status: SwapStatus }
	| { type: "config_updated"; field: "treasury" | "feePercent" | "owner" };

export type SseEvent<T = SwapSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<SwapSse>();

	get allEvents() {
		return this.events$.asObservable();
	}

	@OnEvent(REQUEST_CREATED)
	onRequestCreated(evt: RequestCreated) {
		this.events$.next({
			type: "new_swap",
			id: evt.id,
			requester: evt.requester,
			recipient: evt.recipient,
		});
	}

	@OnEvent(STATUS_CHANGED)
	onStatusChanged(evt: StatusChanged) {
		this.events$.next({ type: "swap_updated", id: evt.id, status: evt.newStatus });
	}

	@OnEvent(TREASURY_UPDATED)
	onTreasuryUpdated(_evt: TreasuryUpdated) {
		this.events$.next({ type: "config_updated", field: "treasury" });
	}

	@OnEvent(FEE_PERCENT_UPDATED)
	onFeePercentUpdated(_evt: FeePercentUpdated) {
		this.events$.next({ type: "config_updated", field: "feePercent" });
	}

	@OnEvent(OWNERSHIP_TRANSFERRED)
	onOwnershipTransferred(_evt: OwnershipTransferred) {
		this.events$.next({ type: "config_updated", field: "owner" });
	}
}
