import { SwapError } from "../core/errors.js";

/**
 * Per-instance busy flag.
 *
 * Wrap every entry point that moves custody in {@link run}. A second entry
 * while the first is still on the call stack (for example from a transfer
 * hook) fails with REENTRANT before it can observe or change any state.
 */
export class ReentrancyGuard {
	private busy = false;
	private current?: string;

	get locked(): boolean {
		return this.busy;
	}

	async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		if (this.busy) {
			throw new SwapError(
				`Reentrant call to "${operation}" while "${this.current}" is in progress`,
				"REENTRANT",
				{ operation, inProgress: this.current },
			);
		}
		this.busy = true;
		this.current = operation;
		try {
			return await fn();
		} finally {
			this.busy = false;
			this.current = undefined;
		}
	}
}
