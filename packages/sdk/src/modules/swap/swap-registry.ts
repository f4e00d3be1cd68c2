/**
 * Swap Request Registry
 *
 * Append-only arena of swap requests. A request's id is its index, so ids
 * are dense, start at 0 and are never reused. Nothing is ever removed:
 * terminal requests stay queryable as the audit trail.
 */

import { SwapError } from "../../core/errors.js";
import {
	SwapQueryOptions,
	SwapQueryResult,
	SwapRequest,
	SwapRequestId,
	SwapStatus,
} from "./types.js";
import { isFinalState, swapStateMachine } from "./swap-state-machine.js";

export class SwapRequestRegistry {
	private readonly records: SwapRequest[] = [];

	get length(): number {
		return this.records.length;
	}

	has(id: SwapRequestId): boolean {
		return Number.isInteger(id) && id >= 0 && id < this.records.length;
	}

	/**
	 * Record a new request in the machine's initial state.
	 */
	append(
		terms: Omit<SwapRequest, "id" | "status">,
	): Readonly<SwapRequest> {
		const record: SwapRequest = {
			...terms,
			id: this.records.length,
			status: swapStateMachine.initialState,
		};
		this.records.push(record);
		return this.snapshot(record);
	}

	/**
	 * @throws SwapError NOT_FOUND for any id outside the registry
	 */
	get(id: SwapRequestId): Readonly<SwapRequest> {
		return this.snapshot(this.require(id));
	}

	/**
	 * Write a terminal status. The only mutation a record ever receives.
	 */
	setStatus(id: SwapRequestId, status: SwapStatus): void {
		const record = this.require(id);
		if (isFinalState(record.status)) {
			throw new SwapError(
				`Swap request ${id} is already ${record.status}`,
				"INVALID_STATE",
				{ id, status: record.status },
			);
		}
		record.status = status;
	}

	/**
	 * Requests matching the options, newest first.
	 */
	query(options: SwapQueryOptions = {}): SwapQueryResult {
		const statuses =
			options.status === undefined
				? undefined
				: Array.isArray(options.status)
					? options.status
					: [options.status];

		let matching = this.records.filter(
			(r) =>
				(options.party === undefined ||
					r.requester === options.party ||
					r.recipient === options.party) &&
				(statuses === undefined || statuses.includes(r.status)),
		);
		const total = matching.length;

		if (options.idBefore !== undefined) {
			const idBefore = options.idBefore;
			matching = matching.filter((r) => r.id < idBefore);
		}
		matching.reverse();

		const limit = options.limit ?? matching.length;
		const page = matching.slice(0, Math.max(0, limit));
		return {
			items: page.map((r) => this.snapshot(r)),
			total,
			hasMore: matching.length > page.length,
		};
	}

	private require(id: SwapRequestId): SwapRequest {
		const record = this.has(id) ? this.records[id] : undefined;
		if (!record) {
			throw new SwapError(`Swap request ${id} not found`, "NOT_FOUND", { id });
		}
		return record;
	}

	private snapshot(record: SwapRequest): Readonly<SwapRequest> {
		return Object.freeze({ ...record });
	}
}
