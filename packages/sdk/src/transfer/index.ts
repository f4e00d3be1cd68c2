/**
 * Transfer module - value-transfer abstraction
 *
 * The engine consumes {@link TransactionalValueTransferService}; bring your
 * own ledger or use the in-memory reference implementation.
 */

// Types
export type {
	ValueTransferService,
	TransactionalValueTransferService,
	TransferKind,
	TransferRecord,
	TransferHook,
	InboundTransfer,
	InboundReceiver,
	TransferErrorCode,
} from "./types.js";

export { TransferError } from "./types.js";

// Reference implementations
export { MemoryAssetLedger } from "./memory-ledger.js";
