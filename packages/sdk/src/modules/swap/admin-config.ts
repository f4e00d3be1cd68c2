/**
 * Administrative Config
 *
 * Fee rate, treasury and owner of one engine. Set once at bootstrap, then
 * changed only by the current owner.
 */

import { Identity, isNullIdentity } from "../../core/identity.js";
import { SwapError } from "../../core/errors.js";
import {
	AdminConfigState,
	DEFAULT_FEE_PERCENT,
	FEE_PERCENT_UPDATED,
	FeePercentUpdated,
	InitializeParams,
	OWNERSHIP_TRANSFERRED,
	OwnershipTransferred,
	TREASURY_UPDATED,
	TreasuryUpdated,
} from "./types.js";
import { assertFeePercent } from "./settlement.js";

export class AdminConfig {
	private state?: AdminConfigState;

	/**
	 * @param custodian - identity holding custody; never an owner or treasury
	 */
	constructor(private readonly custodian: Identity) {}

	get initialized(): boolean {
		return this.state !== undefined;
	}

	/**
	 * @throws SwapError ALREADY_INITIALIZED on the second call
	 */
	initialize(params: InitializeParams): Readonly<AdminConfigState> {
		if (this.state) {
			throw new SwapError("Engine is already initialized", "ALREADY_INITIALIZED");
		}
		this.requireParty(params.owner, "owner");
		this.requireParty(params.treasury, "treasury");
		const feePercent = params.feePercent ?? DEFAULT_FEE_PERCENT;
		assertFeePercent(feePercent);

		this.state = {
			owner: params.owner,
			treasury: params.treasury,
			feePercent,
		};
		return this.current();
	}

	/**
	 * @throws SwapError NOT_INITIALIZED before bootstrap
	 */
	current(): Readonly<AdminConfigState> {
		return { ...this.require() };
	}

	setTreasury(caller: Identity, newTreasury: Identity): TreasuryUpdated {
		const state = this.requireOwner(caller);
		this.requireParty(newTreasury, "treasury");
		const previousTreasury = state.treasury;
		state.treasury = newTreasury;
		return { type: TREASURY_UPDATED, previousTreasury, newTreasury };
	}

	setFeePercent(caller: Identity, newFeePercent: number): FeePercentUpdated {
		const state = this.requireOwner(caller);
		assertFeePercent(newFeePercent);
		const previousFeePercent = state.feePercent;
		state.feePercent = newFeePercent;
		return { type: FEE_PERCENT_UPDATED, previousFeePercent, newFeePercent };
	}

	transferOwnership(caller: Identity, newOwner: Identity): OwnershipTransferred {
		const state = this.requireOwner(caller);
		this.requireParty(newOwner, "owner");
		const previousOwner = state.owner;
		state.owner = newOwner;
		return { type: OWNERSHIP_TRANSFERRED, previousOwner, newOwner };
	}

	private requireParty(value: Identity, field: string): void {
		if (isNullIdentity(value)) {
			throw new SwapError(`Invalid ${field}: null identity`, "INVALID_ARGUMENT", {
				field,
			});
		}
		if (value === this.custodian) {
			throw new SwapError(
				`Invalid ${field}: the custodian cannot be the ${field}`,
				"INVALID_ARGUMENT",
				{ field },
			);
		}
	}

	private requireOwner(caller: Identity): AdminConfigState {
		const state = this.require();
		if (caller !== state.owner) {
			throw new SwapError("Only the owner can change the config", "UNAUTHORIZED", {
				caller,
			});
		}
		return state;
	}

	private require(): AdminConfigState {
		if (!this.state) {
			throw new SwapError("Engine is not initialized", "NOT_INITIALIZED");
		}
		return this.state;
	}
}
