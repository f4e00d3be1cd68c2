/**
 * Runs tasks one at a time, in submission order.
 *
 * A host process shares one executor between every caller that mutates
 * engine or ledger state, so concurrent requests never interleave. Tasks
 * running inside another task (transfer hooks) must call the engine
 * directly; submitting to the executor from inside a task would wait on
 * itself forever.
 *
 * @example
 * ```typescript
 * const host = new SerialExecutor();
 * const [a, b] = await Promise.all([
 *   host.run(() => engine.approve(0, bob)),
 *   host.run(() => engine.cancel(1, alice)),
 * ]);
 * ```
 */
export class SerialExecutor {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	/**
	 * Number of tasks submitted and not yet settled.
	 */
	get size(): number {
		return this.pending;
	}

	run<T>(task: () => T | Promise<T>): Promise<T> {
		this.pending++;
		const result = this.tail.then(task);
		// The chain only tracks completion; the outcome reaches the caller
		// through `result`.
		this.tail = result.then(
			() => this.settle(),
			() => this.settle(),
		);
		return result;
	}

	private settle(): void {
		this.pending--;
	}
}
