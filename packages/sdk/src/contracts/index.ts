/**
 * Contracts module - lifecycle state machines
 */

// Types
export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
} from "./types.js";

// State machine
export {
	StateMachine,
	createState,
	createTransition,
} from "./state-machine.js";
