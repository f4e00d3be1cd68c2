/**
 * Authorization Guard
 *
 * Small preconditions evaluated in order before a transition. The first
 * failing check throws; none of them has side effects.
 */

import { Identity } from "../../core/identity.js";
import { SwapError } from "../../core/errors.js";
import { SwapRequest, SwapRequestId } from "./types.js";
import { SwapRequestRegistry } from "./swap-registry.js";

export interface GuardContext {
	registry: SwapRequestRegistry;
	id: SwapRequestId;
	caller: Identity;
}

export type SwapGuard = (context: GuardContext) => void;

export const requireExists: SwapGuard = ({ registry, id }) => {
	if (!registry.has(id)) {
		throw new SwapError(`Swap request ${id} not found`, "NOT_FOUND", { id });
	}
};

export const requirePending: SwapGuard = ({ registry, id }) => {
	const { status } = registry.get(id);
	if (status !== "Pending") {
		throw new SwapError(`Swap request ${id} is ${status}`, "INVALID_STATE", {
			id,
			status,
		});
	}
};

export const requireRecipient: SwapGuard = ({ registry, id, caller }) => {
	if (registry.get(id).recipient !== caller) {
		throw new SwapError(
			"Only the recipient can perform this action",
			"UNAUTHORIZED",
			{ id, caller },
		);
	}
};

export const requireRequester: SwapGuard = ({ registry, id, caller }) => {
	if (registry.get(id).requester !== caller) {
		throw new SwapError(
			"Only the requester can perform this action",
			"UNAUTHORIZED",
			{ id, caller },
		);
	}
};

/** approve, reject */
export const RECIPIENT_CHAIN: readonly SwapGuard[] = [
	requireExists,
	requirePending,
	requireRecipient,
];

/** cancel */
export const REQUESTER_CHAIN: readonly SwapGuard[] = [
	requireExists,
	requirePending,
	requireRequester,
];

/**
 * Run a chain and return the request it admitted.
 */
export function runGuards(
	context: GuardContext,
	chain: readonly SwapGuard[],
): Readonly<SwapRequest> {
	for (const guard of chain) {
		guard(context);
	}
	return context.registry.get(context.id);
}
