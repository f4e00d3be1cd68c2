/**
 * Swap Module Types
 */

import { Amount, AssetId, Identity } from "../../core/identity.js";

/**
 * Sequential request identifier. The first request is 0.
 */
export type SwapRequestId = number;

/**
 * Swap request statuses.
 *
 * Lifecycle:
 * - Pending: offer held in custody, waiting for the recipient
 * - Approved: both legs settled (terminal)
 * - Rejected: recipient declined, offer refunded (terminal)
 * - Cancelled: requester withdrew, offer refunded (terminal)
 */
export const SWAP_STATUS = [
	"Pending",
	"Approved",
	"Rejected",
	"Cancelled",
] as const;
export type SwapStatus = (typeof SWAP_STATUS)[number];

/**
 * Swap request actions.
 */
export type SwapAction =
	| "approve" // Recipient deposits the receive leg and settles
	| "reject" // Recipient declines
	| "cancel"; // Requester withdraws

/**
 * A swap request as recorded in the registry.
 */
export interface SwapRequest {
	id: SwapRequestId;
	requester: Identity;
	recipient: Identity;
	offerAsset: AssetId;
	offerAmount: Amount;
	receiveAsset: AssetId;
	receiveAmount: Amount;
	status: SwapStatus;
}

/**
 * Terms of a new request. The requester is the caller.
 */
export interface CreateSwapParams {
	recipient: Identity;
	offerAsset: AssetId;
	offerAmount: Amount;
	receiveAsset: AssetId;
	receiveAmount: Amount;
}

/**
 * Administrative parameters.
 */
export interface AdminConfigState {
	owner: Identity;
	treasury: Identity;
	/** Integer percentage, 0–100 */
	feePercent: number;
}

export interface InitializeParams {
	owner: Identity;
	treasury: Identity;
	/** Defaults to {@link DEFAULT_FEE_PERCENT} */
	feePercent?: number;
}

export const DEFAULT_FEE_PERCENT = 5;
export const MAX_FEE_PERCENT = 100;

/**
 * One payout of a settlement.
 */
export interface Disbursement {
	asset: AssetId;
	to: Identity;
	amount: Amount;
}

/**
 * How an approval would pay out at a given fee.
 */
export interface SettlementPlan {
	requestId: SwapRequestId;
	feePercent: number;
	offerFee: Amount;
	receiveFee: Amount;
	/** Non-zero payouts, in the order they are made */
	disbursements: Disbursement[];
}

/**
 * Filters for listing requests, newest first.
 */
export interface SwapQueryOptions {
	/** Only requests where this identity is requester or recipient */
	party?: Identity;
	/** Filter by status(es) */
	status?: SwapStatus | SwapStatus[];
	/** Only ids strictly lower than this (cursor) */
	idBefore?: SwapRequestId;
	/** Maximum number of results */
	limit?: number;
}

export interface SwapQueryResult {
	items: SwapRequest[];
	/** Matching requests before `idBefore` and `limit` were applied */
	total: number;
	hasMore: boolean;
}

// ==================== Notifications ====================

export const REQUEST_CREATED = "swap.request.created";
export type RequestCreated = {
	type: typeof REQUEST_CREATED;
	id: SwapRequestId;
	requester: Identity;
	recipient: Identity;
	offerAsset: AssetId;
	offerAmount: Amount;
	receiveAsset: AssetId;
	receiveAmount: Amount;
};

export const STATUS_CHANGED = "swap.request.status-changed";
export type StatusChanged = {
	type: typeof STATUS_CHANGED;
	id: SwapRequestId;
	newStatus: SwapStatus;
};

export const TREASURY_UPDATED = "swap.config.treasury-updated";
export type TreasuryUpdated = {
	type: typeof TREASURY_UPDATED;
	previousTreasury: Identity;
	newTreasury: Identity;
};

export const FEE_PERCENT_UPDATED = "swap.config.fee-percent-updated";
export type FeePercentUpdated = {
	type: typeof FEE_PERCENT_UPDATED;
	previousFeePercent: number;
	newFeePercent: number;
};

export const OWNERSHIP_TRANSFERRED = "swap.config.ownership-transferred";
export type OwnershipTransferred = {
	type: typeof OWNERSHIP_TRANSFERRED;
	previousOwner: Identity;
	newOwner: Identity;
};

export type SwapEvent =
	| RequestCreated
	| StatusChanged
	| TreasuryUpdated
	| FeePercentUpdated
	| OwnershipTransferred;

/**
 * Receives notifications after the operation that produced them has
 * committed. Awaited in order.
 */
export type SwapEventSink = (event: SwapEvent) => void | Promise<void>;

/**
 * Told about a sink failure. The operation has committed by then and
 * delivery carries on with the next event.
 */
export type SwapEventErrorHandler = (error: unknown, event: SwapEvent) => void;
