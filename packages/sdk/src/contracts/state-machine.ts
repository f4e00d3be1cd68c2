/**
 * Lifecycle State Machine
 *
 * A transition table shared by every record of one kind. The machine holds
 * no current state: callers pass the record's state in and store the state
 * that comes out, so a single instance serves the whole registry.
 */

import { SwapError } from "../core/errors.js";
import {
	StateMachineConfig,
	StateDefinition,
	StateTransition,
} from "./types.js";

/**
 * @example
 * ```typescript
 * type DoorState = "open" | "closed" | "bricked";
 * type DoorAction = "close" | "open" | "brick";
 *
 * const door = new StateMachine<DoorState, DoorAction>({
 *   initialState: "open",
 *   states: [
 *     createState("open", ["close"]),
 *     createState("closed", ["open", "brick"]),
 *     createState("bricked", [], { isFinal: true }),
 *   ],
 *   transitions: [
 *     createTransition("open", "close", "closed"),
 *     createTransition("closed", "open", "open"),
 *     createTransition("closed", "brick", "bricked"),
 *   ],
 * });
 *
 * door.next("open", "close"); // "closed"
 * door.next("bricked", "open"); // throws SwapError INVALID_STATE
 * ```
 */
export class StateMachine<TState extends string, TAction extends string> {
	private readonly config: StateMachineConfig<TState, TAction>;
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<string, StateTransition<TState, TAction>>;

	constructor(config: StateMachineConfig<TState, TAction>) {
		this.config = config;

		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}
	}

	get initialState(): TState {
		return this.config.initialState;
	}

	/**
	 * Check if an action is allowed from the given state.
	 */
	canPerform(state: TState, action: TAction): boolean {
		const definition = this.stateMap.get(state);
		return (
			(definition?.allowedActions.includes(action) ?? false) &&
			this.transitionMap.has(`${state}:${action}`)
		);
	}

	getAllowedActions(state: TState): TAction[] {
		return [...(this.stateMap.get(state)?.allowedActions ?? [])];
	}

	/**
	 * Resolve the state an action leads to.
	 *
	 * @throws SwapError INVALID_STATE if the action is not allowed from `state`
	 */
	next(state: TState, action: TAction): TState {
		const transition = this.transitionMap.get(`${state}:${action}`);
		if (!transition || !this.canPerform(state, action)) {
			throw new SwapError(
				`Action "${action}" is not allowed from state "${state}"`,
				"INVALID_STATE",
				{ action, state, allowedActions: this.getAllowedActions(state) },
			);
		}
		return transition.to;
	}

	isFinal(state: TState): boolean {
		return this.stateMap.get(state)?.isFinal ?? false;
	}

	getFinalStates(): TState[] {
		return Array.from(this.stateMap.values())
			.filter((s) => s.isFinal)
			.map((s) => s.name);
	}
}

/**
 * Helper to create a state definition.
 */
export function createState<TState extends string, TAction extends string>(
	name: TState,
	allowedActions: TAction[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

/**
 * Helper to create a state transition.
 */
export function createTransition<TState extends string, TAction extends string>(
	from: TState | TState[],
	action: TAction,
	to: TState,
): StateTransition<TState, TAction> {
	return { from, action, to };
}
