/**
 * Swap Module
 *
 * Escrowed two-party exchange with fee-split settlement.
 */

// Types
export type {
	SwapRequestId,
	SwapStatus,
	SwapAction,
	SwapRequest,
	CreateSwapParams,
	AdminConfigState,
	InitializeParams,
	Disbursement,
	SettlementPlan,
	SwapQueryOptions,
	SwapQueryResult,
	RequestCreated,
	StatusChanged,
	TreasuryUpdated,
	FeePercentUpdated,
	OwnershipTransferred,
	SwapEvent,
	SwapEventSink,
	SwapEventErrorHandler,
} from "./types.js";

export {
	SWAP_STATUS,
	DEFAULT_FEE_PERCENT,
	MAX_FEE_PERCENT,
	REQUEST_CREATED,
	STATUS_CHANGED,
	TREASURY_UPDATED,
	FEE_PERCENT_UPDATED,
	OWNERSHIP_TRANSFERRED,
} from "./types.js";

// State machine
export {
	SWAP_STATE_MACHINE,
	swapStateMachine,
	isFinalState,
	getAllowedActions,
} from "./swap-state-machine.js";

// Building blocks
export { SwapRequestRegistry } from "./swap-registry.js";
export {
	type GuardContext,
	type SwapGuard,
	requireExists,
	requirePending,
	requireRecipient,
	requireRequester,
	RECIPIENT_CHAIN,
	REQUESTER_CHAIN,
	runGuards,
} from "./swap-guards.js";
export {
	computeFee,
	assertFeePercent,
	planSettlement,
	planRefund,
} from "./settlement.js";
export { AdminConfig } from "./admin-config.js";

// Main engine class
export { type SwapEngineOptions, SwapEngine } from "./swap-engine.js";
