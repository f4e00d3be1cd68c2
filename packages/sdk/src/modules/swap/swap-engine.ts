/**
 * Swap Engine
 *
 * Two-party conditional exchange. The requester deposits an offer into
 * custody and names a recipient; the recipient either deposits the
 * requested asset (both legs settle at once, minus fees) or declines; the
 * requester may cancel while the request is pending.
 */

import { Amount, AssetId, Identity, isNullIdentity } from "../../core/identity.js";
import { SwapError } from "../../core/errors.js";
import { ReentrancyGuard } from "../../concurrency/index.js";
import {
	InboundReceiver,
	InboundTransfer,
	TransactionalValueTransferService,
} from "../../transfer/index.js";
import {
	AdminConfigState,
	CreateSwapParams,
	Disbursement,
	InitializeParams,
	REQUEST_CREATED,
	STATUS_CHANGED,
	SettlementPlan,
	SwapAction,
	SwapEvent,
	SwapEventErrorHandler,
	SwapEventSink,
	SwapQueryOptions,
	SwapQueryResult,
	SwapRequest,
	SwapRequestId,
} from "./types.js";
import { SwapRequestRegistry } from "./swap-registry.js";
import { AdminConfig } from "./admin-config.js";
import {
	RECIPIENT_CHAIN,
	REQUESTER_CHAIN,
	requireExists,
	requirePending,
	runGuards,
} from "./swap-guards.js";
import { planRefund, planSettlement } from "./settlement.js";
import { swapStateMachine } from "./swap-state-machine.js";

export interface SwapEngineOptions {
	/** Ledger access; every operation runs inside one of its transactions */
	transfers: TransactionalValueTransferService;
	/** Identity under which the engine holds custody */
	custodian: Identity;
	/** Receives notifications after each committed operation */
	onEvent?: SwapEventSink;
	/** Called when `onEvent` throws; defaults to `console.error` */
	onEventError?: SwapEventErrorHandler;
}

type Emit = (event: SwapEvent) => void;

/**
 * @example
 * ```typescript
 * const ledger = new MemoryAssetLedger();
 * const engine = new SwapEngine({
 *   transfers: ledger.forCustodian("escrow"),
 *   custodian: "escrow",
 * });
 * engine.initialize({ owner: "admin", treasury: "treasury" });
 *
 * ledger.mint("GOLD", "alice", 1_000n);
 * ledger.approve("GOLD", "alice", "escrow", 1_000n);
 * const id = await engine.create("alice", {
 *   recipient: "bob",
 *   offerAsset: "GOLD",
 *   offerAmount: 1_000n,
 *   receiveAsset: "SILVER",
 *   receiveAmount: 2_000n,
 * });
 *
 * // bob funds and approves: he gets 950 GOLD, alice 1900 SILVER
 * await engine.approve(id, "bob");
 * ```
 */
export class SwapEngine implements InboundReceiver {
	readonly custodian: Identity;
	private readonly transfers: TransactionalValueTransferService;
	private readonly onEvent?: SwapEventSink;
	private readonly onEventError: SwapEventErrorHandler;
	private readonly registry = new SwapRequestRegistry();
	private readonly admin: AdminConfig;
	private readonly guard = new ReentrancyGuard();
	private readonly custody = new Map<AssetId, Amount>();

	constructor(options: SwapEngineOptions) {
		if (isNullIdentity(options.custodian)) {
			throw new SwapError("Invalid custodian: null identity", "INVALID_ARGUMENT");
		}
		this.custodian = options.custodian;
		this.transfers = options.transfers;
		this.onEvent = options.onEvent;
		this.onEventError =
			options.onEventError ??
			((error, event) => console.error(`Failed to deliver ${event.type}:`, error));
		this.admin = new AdminConfig(this.custodian);
	}

	// ==================== Bootstrap ====================

	get initialized(): boolean {
		return this.admin.initialized;
	}

	/**
	 * Set owner, treasury and fee. Must run once before anything else.
	 */
	initialize(params: InitializeParams): Readonly<AdminConfigState> {
		return this.admin.initialize(params);
	}

	// ==================== Queries ====================

	get(id: SwapRequestId): Readonly<SwapRequest> {
		return this.registry.get(id);
	}

	count(): number {
		return this.registry.length;
	}

	list(options?: SwapQueryOptions): SwapQueryResult {
		return this.registry.query(options);
	}

	/**
	 * Custody held for pending requests in `asset`.
	 */
	custodyOf(asset: AssetId): Amount {
		return this.custody.get(asset) ?? 0n;
	}

	getConfig(): Readonly<AdminConfigState> {
		return this.admin.current();
	}

	/**
	 * What approving a pending request would pay out at the current fee.
	 * The fee is bound when `approve` runs, so this may change.
	 */
	quote(id: SwapRequestId): SettlementPlan {
		const request = runGuards({ registry: this.registry, id, caller: "" }, [
			requireExists,
			requirePending,
		]);
		return planSettlement(request, this.admin.current());
	}

	// ==================== Lifecycle ====================

	/**
	 * Take custody of the offer and record a pending request.
	 *
	 * @returns The new request's id
	 */
	async create(
		requester: Identity,
		params: CreateSwapParams,
	): Promise<SwapRequestId> {
		return this.execute("create", async (emit) => {
			this.admin.current();
			validateCreate(requester, params, this.custodian);

			await this.pull(params.offerAsset, requester, params.offerAmount);

			const request = this.registry.append({
				requester,
				recipient: params.recipient,
				offerAsset: params.offerAsset,
				offerAmount: params.offerAmount,
				receiveAsset: params.receiveAsset,
				receiveAmount: params.receiveAmount,
			});
			this.adjustCustody(request.offerAsset, request.offerAmount);
			emit({
				type: REQUEST_CREATED,
				id: request.id,
				requester: request.requester,
				recipient: request.recipient,
				offerAsset: request.offerAsset,
				offerAmount: request.offerAmount,
				receiveAsset: request.receiveAsset,
				receiveAmount: request.receiveAmount,
			});
			return request.id;
		});
	}

	/**
	 * Recipient deposits the receive leg; both legs settle minus fees.
	 */
	async approve(id: SwapRequestId, caller: Identity): Promise<void> {
		await this.transition(id, caller, "approve", async (request) => {
			await this.pull(request.receiveAsset, caller, request.receiveAmount);
			const plan = planSettlement(request, this.admin.current());
			for (const leg of plan.disbursements) {
				await this.push(leg);
			}
		});
	}

	/**
	 * Recipient declines; the whole offer goes back to the requester.
	 */
	async reject(id: SwapRequestId, caller: Identity): Promise<void> {
		await this.transition(id, caller, "reject", (request) =>
			this.push(planRefund(request)),
		);
	}

	/**
	 * Requester withdraws; the whole offer goes back to them.
	 */
	async cancel(id: SwapRequestId, caller: Identity): Promise<void> {
		await this.transition(id, caller, "cancel", (request) =>
			this.push(planRefund(request)),
		);
	}

	// ==================== Administration ====================

	async setTreasury(caller: Identity, newTreasury: Identity): Promise<void> {
		await this.publish([this.admin.setTreasury(caller, newTreasury)]);
	}

	async setFeePercent(caller: Identity, newFeePercent: number): Promise<void> {
		await this.publish([this.admin.setFeePercent(caller, newFeePercent)]);
	}

	async transferOwnership(caller: Identity, newOwner: Identity): Promise<void> {
		await this.publish([this.admin.transferOwnership(caller, newOwner)]);
	}

	// ==================== Inbound ====================

	/**
	 * Unsolicited transfers to the custodian are always refused.
	 */
	onInboundTransfer(transfer: InboundTransfer): never {
		throw new SwapError("direct transfers are not accepted", "INBOUND_REJECTED", {
			asset: transfer.asset,
			from: transfer.from,
			amount: transfer.amount.toString(),
		});
	}

	// ==================== Internals ====================

	private async transition(
		id: SwapRequestId,
		caller: Identity,
		action: SwapAction,
		settle: (request: Readonly<SwapRequest>) => Promise<void>,
	): Promise<void> {
		await this.execute(action, async (emit) => {
			this.admin.current();
			const request = runGuards(
				{ registry: this.registry, id, caller },
				action === "cancel" ? REQUESTER_CHAIN : RECIPIENT_CHAIN,
			);
			const next = swapStateMachine.next(request.status, action);

			await settle(request);

			this.registry.setStatus(id, next);
			this.adjustCustody(request.offerAsset, -request.offerAmount);
			emit({ type: STATUS_CHANGED, id, newStatus: next });
		});
	}

	/**
	 * One all-or-nothing unit: reentrancy guard, then a ledger transaction.
	 * Engine state is only written after the last transfer, and events are
	 * published only once the unit has committed.
	 */
	private async execute<T>(
		operation: SwapAction | "create",
		fn: (emit: Emit) => Promise<T>,
	): Promise<T> {
		const events: SwapEvent[] = [];
		const result = await this.guard.run(operation, () =>
			this.transfers.withTransaction(() => fn((event) => events.push(event))),
		);
		await this.publish(events);
		return result;
	}

	private async publish(events: SwapEvent[]): Promise<void> {
		if (!this.onEvent) return;
		for (const event of events) {
			try {
				await this.onEvent(event);
			} catch (err) {
				this.onEventError(err, event);
			}
		}
	}

	private async pull(asset: AssetId, from: Identity, amount: Amount): Promise<void> {
		await this.transfer({ asset, to: this.custodian, amount }, () =>
			this.transfers.pull(asset, from, this.custodian, amount),
		);
	}

	private async push(leg: Disbursement): Promise<void> {
		await this.transfer(leg, () =>
			this.transfers.push(leg.asset, leg.to, leg.amount),
		);
	}

	private async transfer(
		leg: Disbursement,
		move: () => Promise<void>,
	): Promise<void> {
		try {
			await move();
		} catch (err) {
			if (err instanceof SwapError) throw err;
			throw new SwapError(
				`Transfer of ${leg.amount} ${leg.asset} to ${leg.to} failed`,
				"TRANSFER_FAILURE",
				{ asset: leg.asset, to: leg.to, amount: leg.amount.toString() },
				{ cause: err },
			);
		}
	}

	private adjustCustody(asset: AssetId, delta: Amount): void {
		const next = this.custodyOf(asset) + delta;
		if (next === 0n) {
			this.custody.delete(asset);
		} else {
			this.custody.set(asset, next);
		}
	}
}

function validateCreate(
	requester: Identity,
	params: CreateSwapParams,
	custodian: Identity,
): void {
	const problems: string[] = [];
	if (isNullIdentity(requester)) problems.push("requester is the null identity");
	if (requester === custodian) problems.push("requester is the custodian");
	if (isNullIdentity(params.recipient))
		problems.push("recipient is the null identity");
	if (params.recipient === custodian) problems.push("recipient is the custodian");
	if (isNullIdentity(params.offerAsset)) problems.push("offerAsset is null");
	if (isNullIdentity(params.receiveAsset)) problems.push("receiveAsset is null");
	if (params.offerAmount <= 0n) problems.push("offerAmount must be positive");
	if (params.receiveAmount <= 0n)
		problems.push("receiveAmount must be positive");

	if (problems.length > 0) {
		throw new SwapError(
			`Invalid swap request: ${problems.join(", ")}`,
			"INVALID_ARGUMENT",
			{ problems },
		);
	}
}
