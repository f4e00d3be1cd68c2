/**
 * Error taxonomy of the swap engine.
 */
export type SwapErrorCode =
	| "INVALID_ARGUMENT"
	| "NOT_FOUND"
	| "UNAUTHORIZED"
	| "INVALID_STATE"
	| "TRANSFER_FAILURE"
	| "REENTRANT"
	| "ALREADY_INITIALIZED"
	| "NOT_INITIALIZED"
	| "INBOUND_REJECTED";

/**
 * Error thrown by every engine operation. No operation leaves partial
 * effects behind when it throws one of these.
 */
export class SwapError extends Error {
	constructor(
		message: string,
		public readonly code: SwapErrorCode,
		public readonly details?: unknown,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "SwapError";
	}
}
