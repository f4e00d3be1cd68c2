/**
 * Core module - identities, amounts and the error taxonomy
 */

export type { Identity, AssetId, Amount } from "./identity.js";
export { NULL_IDENTITY, isNullIdentity, parseAmount } from "./identity.js";

export type { SwapErrorCode } from "./errors.js";
export { SwapError } from "./errors.js";
