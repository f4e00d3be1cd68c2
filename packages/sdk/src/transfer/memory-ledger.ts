/**
 * In-Memory Asset Ledger
 *
 * A simple multi-asset ledger for testing and development. Balances and
 * allowances are lost when the process exits.
 */

import { Amount, AssetId, Identity, isNullIdentity } from "../core/identity.js";
import {
	InboundReceiver,
	TransactionalValueTransferService,
	TransferError,
	TransferHook,
	TransferRecord,
} from "./types.js";

type Book = Map<AssetId, Map<Identity, Amount>>;

interface Snapshot {
	balances: Book;
	allowances: Map<AssetId, Map<string, Amount>>;
}

function cloneBook<K>(book: Map<AssetId, Map<K, Amount>>): Map<AssetId, Map<K, Amount>> {
	return new Map(Array.from(book, ([asset, entries]) => [asset, new Map(entries)]));
}

function allowanceKey(owner: Identity, spender: Identity): string {
	return `${owner}\u0000${spender}`;
}

/**
 * In-memory ledger.
 *
 * Every mutating call is atomic on its own, and {@link withTransaction}
 * groups calls into one unit that is rolled back as a whole. Nested
 * transactions behave like savepoints. Callers must not interleave two
 * transactions: the ledger expects its owner to serialize access.
 *
 * @example
 * ```typescript
 * const ledger = new MemoryAssetLedger();
 * ledger.mint("USD", "alice", 1_000n);
 * ledger.approve("USD", "alice", "escrow", 1_000n);
 *
 * const custody = ledger.forCustodian("escrow");
 * await custody.pull("USD", "alice", "escrow", 400n);
 * ledger.balanceOf("USD", "escrow"); // 400n
 * ```
 */
export class MemoryAssetLedger {
	private balances: Book = new Map();
	private allowances: Map<AssetId, Map<string, Amount>> = new Map();
	private readonly hooks: Map<AssetId, TransferHook[]> = new Map();
	private readonly receivers: Map<Identity, InboundReceiver> = new Map();

	// ==================== Queries ====================

	balanceOf(asset: AssetId, owner: Identity): Amount {
		return this.balances.get(asset)?.get(owner) ?? 0n;
	}

	allowance(asset: AssetId, owner: Identity, spender: Identity): Amount {
		return this.allowances.get(asset)?.get(allowanceKey(owner, spender)) ?? 0n;
	}

	/**
	 * Sum of all balances of an asset.
	 */
	totalSupply(asset: AssetId): Amount {
		let total = 0n;
		for (const value of this.balances.get(asset)?.values() ?? []) {
			total += value;
		}
		return total;
	}

	// ==================== Account management ====================

	/**
	 * Create `amount` of `asset` out of nothing and credit it to `to`.
	 */
	mint(asset: AssetId, to: Identity, amount: Amount): void {
		this.requireAccount(asset, "asset");
		this.requireAccount(to, "account");
		this.requirePositive(amount);
		this.credit(asset, to, amount);
	}

	/**
	 * Set the allowance `owner` grants to `spender`. Replaces any previous
	 * allowance. Zero revokes.
	 */
	approve(
		asset: AssetId,
		owner: Identity,
		spender: Identity,
		amount: Amount,
	): void {
		this.requireAccount(asset, "asset");
		this.requireAccount(owner, "account");
		this.requireAccount(spender, "account");
		if (amount < 0n) {
			throw new TransferError("Allowance cannot be negative", "INVALID_AMOUNT", {
				amount: amount.toString(),
			});
		}
		let entries = this.allowances.get(asset);
		if (!entries) {
			entries = new Map();
			this.allowances.set(asset, entries);
		}
		entries.set(allowanceKey(owner, spender), amount);
	}

	/**
	 * Register a hook run after every movement of `asset`.
	 *
	 * @returns Unsubscribe function
	 */
	onTransfer(asset: AssetId, hook: TransferHook): () => void {
		const hooks = this.hooks.get(asset) ?? [];
		hooks.push(hook);
		this.hooks.set(asset, hooks);
		return () => {
			const current = this.hooks.get(asset) ?? [];
			this.hooks.set(
				asset,
				current.filter((h) => h !== hook),
			);
		};
	}

	/**
	 * Make `identity` a receiver that must accept each direct transfer to it.
	 *
	 * @returns Unregister function
	 */
	setReceiver(identity: Identity, receiver: InboundReceiver): () => void {
		this.receivers.set(identity, receiver);
		return () => {
			if (this.receivers.get(identity) === receiver) {
				this.receivers.delete(identity);
			}
		};
	}

	// ==================== Movements ====================

	/**
	 * Move `amount` from `from` to `to` on behalf of `spender`, consuming the
	 * allowance `from` granted to `spender`.
	 */
	async transferFrom(
		spender: Identity,
		asset: AssetId,
		from: Identity,
		to: Identity,
		amount: Amount,
	): Promise<void> {
		await this.withTransaction(async () => {
			this.requireAccount(asset, "asset");
			this.requireAccount(to, "account");
			this.requirePositive(amount);
			const allowed = this.allowance(asset, from, spender);
			if (allowed < amount) {
				throw new TransferError(
					`Allowance of ${from} for ${spender} is too low`,
					"INSUFFICIENT_ALLOWANCE",
					{ asset, allowed: allowed.toString(), amount: amount.toString() },
				);
			}
			this.debit(asset, from, amount);
			this.credit(asset, to, amount);
			this.approve(asset, from, spender, allowed - amount);
			await this.runHooks({ kind: "pull", asset, from, to, amount });
		});
	}

	/**
	 * Move `amount` from `from` to `to` without touching allowances.
	 */
	async send(
		asset: AssetId,
		from: Identity,
		to: Identity,
		amount: Amount,
	): Promise<void> {
		await this.withTransaction(async () => {
			this.requireAccount(asset, "asset");
			this.requireAccount(to, "account");
			this.requirePositive(amount);
			this.debit(asset, from, amount);
			this.credit(asset, to, amount);
			await this.runHooks({ kind: "push", asset, from, to, amount });
		});
	}

	/**
	 * Direct party-to-party transfer. A registered receiver is asked first
	 * and may refuse by throwing.
	 */
	async transfer(
		asset: AssetId,
		from: Identity,
		to: Identity,
		amount: Amount,
	): Promise<void> {
		await this.withTransaction(async () => {
			this.requireAccount(asset, "asset");
			this.requireAccount(to, "account");
			this.requirePositive(amount);
			const receiver = this.receivers.get(to);
			if (receiver) {
				await receiver.onInboundTransfer({ asset, from, to, amount });
			}
			this.debit(asset, from, amount);
			this.credit(asset, to, amount);
			await this.runHooks({ kind: "transfer", asset, from, to, amount });
		});
	}

	/**
	 * Run `fn`; if it throws, restore balances and allowances to what they
	 * were when it started.
	 */
	async withTransaction<T>(fn: () => Promise<T>): Promise<T> {
		const snapshot = this.snapshot();
		try {
			return await fn();
		} catch (err) {
			this.restore(snapshot);
			throw err;
		}
	}

	/**
	 * The value-transfer service an engine holding custody as `custodian`
	 * consumes. Pulls spend allowances granted to the custodian; pushes pay
	 * out of the custodian's balance.
	 */
	forCustodian(custodian: Identity): TransactionalValueTransferService {
		this.requireAccount(custodian, "account");
		return {
			pull: (asset, from, to, amount) =>
				this.transferFrom(custodian, asset, from, to, amount),
			push: (asset, to, amount) => this.send(asset, custodian, to, amount),
			withTransaction: (fn) => this.withTransaction(fn),
		};
	}

	// ==================== Internals ====================

	private snapshot(): Snapshot {
		return {
			balances: cloneBook(this.balances),
			allowances: cloneBook(this.allowances),
		};
	}

	private restore(snapshot: Snapshot): void {
		this.balances = snapshot.balances;
		this.allowances = snapshot.allowances;
	}

	private credit(asset: AssetId, owner: Identity, amount: Amount): void {
		let entries = this.balances.get(asset);
		if (!entries) {
			entries = new Map();
			this.balances.set(asset, entries);
		}
		entries.set(owner, (entries.get(owner) ?? 0n) + amount);
	}

	private debit(asset: AssetId, owner: Identity, amount: Amount): void {
		const balance = this.balanceOf(asset, owner);
		if (balance < amount) {
			throw new TransferError(
				`Balance of ${owner} is too low`,
				"INSUFFICIENT_BALANCE",
				{ asset, balance: balance.toString(), amount: amount.toString() },
			);
		}
		this.balances.get(asset)?.set(owner, balance - amount);
	}

	private async runHooks(record: TransferRecord): Promise<void> {
		// copy: a hook may unsubscribe itself
		for (const hook of [...(this.hooks.get(record.asset) ?? [])]) {
			await hook(record);
		}
	}

	private requirePositive(amount: Amount): void {
		if (amount <= 0n) {
			throw new TransferError("Amount must be positive", "INVALID_AMOUNT", {
				amount: amount.toString(),
			});
		}
	}

	private requireAccount(value: string, kind: "asset" | "account"): void {
		if (isNullIdentity(value)) {
			throw new TransferError(`Invalid ${kind}: "${value}"`, "INVALID_ACCOUNT");
		}
	}
}
