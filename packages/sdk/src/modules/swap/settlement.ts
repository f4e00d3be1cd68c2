/**
 * Settlement arithmetic
 *
 * Fees are floored independently on each leg. The truncated remainder stays
 * with the counterparty's payout; nothing is created or destroyed.
 */

import { Amount } from "../../core/identity.js";
import { SwapError } from "../../core/errors.js";
import {
	AdminConfigState,
	Disbursement,
	MAX_FEE_PERCENT,
	SettlementPlan,
	SwapRequest,
} from "./types.js";

/**
 * `floor(amount * feePercent / 100)`.
 */
export function computeFee(amount: Amount, feePercent: number): Amount {
	assertFeePercent(feePercent);
	if (amount < 0n) {
		throw new SwapError("Amount cannot be negative", "INVALID_ARGUMENT", {
			amount: amount.toString(),
		});
	}
	return (amount * BigInt(feePercent)) / 100n;
}

export function assertFeePercent(feePercent: number): void {
	if (
		!Number.isInteger(feePercent) ||
		feePercent < 0 ||
		feePercent > MAX_FEE_PERCENT
	) {
		throw new SwapError(
			`Fee percent must be an integer between 0 and ${MAX_FEE_PERCENT}`,
			"INVALID_ARGUMENT",
			{ feePercent },
		);
	}
}

/**
 * Payouts of an approval at the given config.
 *
 * Order: offer leg to the recipient, its fee to the treasury, receive leg
 * to the requester, its fee to the treasury. Zero payouts are dropped.
 */
export function planSettlement(
	request: Readonly<SwapRequest>,
	config: Readonly<AdminConfigState>,
): SettlementPlan {
	const offerFee = computeFee(request.offerAmount, config.feePercent);
	const receiveFee = computeFee(request.receiveAmount, config.feePercent);

	const legs: Disbursement[] = [
		{
			asset: request.offerAsset,
			to: request.recipient,
			amount: request.offerAmount - offerFee,
		},
		{ asset: request.offerAsset, to: config.treasury, amount: offerFee },
		{
			asset: request.receiveAsset,
			to: request.requester,
			amount: request.receiveAmount - receiveFee,
		},
		{ asset: request.receiveAsset, to: config.treasury, amount: receiveFee },
	];

	return {
		requestId: request.id,
		feePercent: config.feePercent,
		offerFee,
		receiveFee,
		disbursements: legs.filter((leg) => leg.amount > 0n),
	};
}

/**
 * The single payout of a reject or cancel: the whole offer, no fee.
 */
export function planRefund(request: Readonly<SwapRequest>): Disbursement {
	return {
		asset: request.offerAsset,
		to: request.requester,
		amount: request.offerAmount,
	};
}
