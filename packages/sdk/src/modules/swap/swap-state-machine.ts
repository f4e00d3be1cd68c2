/**
 * Swap State Machine Configuration
 */

import {
	StateMachine,
	StateMachineConfig,
	createState,
	createTransition,
} from "../../contracts/index.js";
import { SwapAction, SwapStatus } from "./types.js";

/**
 * States:
 * - Pending: the only non-terminal state
 * - Approved, Rejected, Cancelled: terminal and mutually exclusive
 */
export const SWAP_STATE_MACHINE: StateMachineConfig<SwapStatus, SwapAction> = {
	initialState: "Pending",
	states: [
		createState<SwapStatus, SwapAction>(
			"Pending",
			["approve", "reject", "cancel"],
			{ description: "Offer in custody, waiting for the recipient" },
		),
		createState<SwapStatus, SwapAction>("Approved", [], {
			isFinal: true,
			description: "Both legs settled",
		}),
		createState<SwapStatus, SwapAction>("Rejected", [], {
			isFinal: true,
			description: "Recipient declined, offer refunded",
		}),
		createState<SwapStatus, SwapAction>("Cancelled", [], {
			isFinal: true,
			description: "Requester withdrew, offer refunded",
		}),
	],
	transitions: [
		createTransition<SwapStatus, SwapAction>("Pending", "approve", "Approved"),
		createTransition<SwapStatus, SwapAction>("Pending", "reject", "Rejected"),
		createTransition<SwapStatus, SwapAction>("Pending", "cancel", "Cancelled"),
	],
};

export const swapStateMachine = new StateMachine(SWAP_STATE_MACHINE);

export function isFinalState(status: SwapStatus): boolean {
	return swapStateMachine.isFinal(status);
}

export function getAllowedActions(status: SwapStatus): SwapAction[] {
	return swapStateMachine.getAllowedActions(status);
}
