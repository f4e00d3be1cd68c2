/**
 * Value Transfer Types
 *
 * The engine never moves balances itself. It consumes a value-transfer
 * service, one call per leg, and relies on that service to make each call
 * all-or-nothing and to discard a whole group of calls on request.
 */

import { Amount, AssetId, Identity } from "../core/identity.js";

/**
 * External collaborator that debits and credits balances.
 */
export interface ValueTransferService {
	/**
	 * Move `amount` of `asset` from `from` to `to`, spending an allowance
	 * `from` granted to the caller.
	 *
	 * Must fail without partial effect when `from` lacks balance or allowance.
	 */
	pull(asset: AssetId, from: Identity, to: Identity, amount: Amount): Promise<void>;

	/**
	 * Credit `to` with `amount` of `asset` from the caller's own custodial
	 * balance.
	 */
	push(asset: AssetId, to: Identity, amount: Amount): Promise<void>;
}

/**
 * Value-transfer service that can group calls into one atomic unit.
 */
export interface TransactionalValueTransferService extends ValueTransferService {
	/**
	 * Execute a function within a transaction.
	 *
	 * If the function throws, every transfer made inside it is rolled back
	 * and the error is rethrown. Otherwise the transfers stand.
	 */
	withTransaction<T>(fn: () => Promise<T>): Promise<T>;
}

export type TransferKind = "mint" | "pull" | "push" | "transfer";

/**
 * A completed balance movement, as seen by transfer hooks.
 */
export interface TransferRecord {
	kind: TransferKind;
	asset: AssetId;
	/** Absent for mints */
	from?: Identity;
	to: Identity;
	amount: Amount;
}

/**
 * Called after every balance movement of one asset. A hook may call back
 * into whoever initiated the movement; if it throws, the movement is undone.
 */
export type TransferHook = (record: TransferRecord) => void | Promise<void>;

/**
 * An unsolicited transfer addressed to a registered receiver.
 */
export interface InboundTransfer {
	asset: AssetId;
	from: Identity;
	to: Identity;
	amount: Amount;
}

/**
 * Account that is consulted before it is credited by a direct transfer.
 * Throwing refuses the transfer.
 */
export interface InboundReceiver {
	onInboundTransfer(transfer: InboundTransfer): void | Promise<void>;
}

export type TransferErrorCode =
	| "INVALID_AMOUNT"
	| "INVALID_ACCOUNT"
	| "INSUFFICIENT_BALANCE"
	| "INSUFFICIENT_ALLOWANCE";

/**
 * Error thrown by ledger operations.
 */
export class TransferError extends Error {
	constructor(
		message: string,
		public readonly code: TransferErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "TransferError";
	}
}
