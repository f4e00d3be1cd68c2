/**
 * Swap Escrow SDK
 *
 * Custody and settlement engine for two-party conditional swaps.
 *
 * @example
 * ```typescript
 * import {
 *   MemoryAssetLedger,
 *   SerialExecutor,
 *   SwapEngine,
 * } from "@swap-escrow/sdk";
 *
 * const ledger = new MemoryAssetLedger();
 * const engine = new SwapEngine({
 *   transfers: ledger.forCustodian("escrow"),
 *   custodian: "escrow",
 *   onEvent: (event) => console.log(event.type),
 * });
 * engine.initialize({ owner: "admin", treasury: "treasury", feePercent: 5 });
 * ledger.setReceiver("escrow", engine);
 *
 * const host = new SerialExecutor();
 * const id = await host.run(() =>
 *   engine.create("alice", {
 *     recipient: "bob",
 *     offerAsset: "GOLD",
 *     offerAmount: 1_000n,
 *     receiveAsset: "SILVER",
 *     receiveAmount: 2_000n,
 *   }),
 * );
 * ```
 */

// Core - identities and errors
export {
	type Identity,
	type AssetId,
	type Amount,
	NULL_IDENTITY,
	isNullIdentity,
	parseAmount,
} from "./core/index.js";
export { type SwapErrorCode, SwapError } from "./core/index.js";

// Contracts - lifecycle state machines
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	StateMachine,
	createState,
	createTransition,
} from "./contracts/index.js";

// Transfer - value movement
export {
	type ValueTransferService,
	type TransactionalValueTransferService,
	type TransferKind,
	type TransferRecord,
	type TransferHook,
	type InboundTransfer,
	type InboundReceiver,
	type TransferErrorCode,
	TransferError,
	MemoryAssetLedger,
} from "./transfer/index.js";

// Concurrency
export { ReentrancyGuard, SerialExecutor } from "./concurrency/index.js";

// Modules - Swap
export * from "./modules/swap/index.js";
