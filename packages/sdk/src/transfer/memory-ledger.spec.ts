import { MemoryAssetLedger } from "./memory-ledger.js";
import { TransferError, TransferRecord } from "./types.js";

describe("MemoryAssetLedger", () => {
	let ledger: MemoryAssetLedger;

	beforeEach(() => {
		ledger = new MemoryAssetLedger();
		ledger.mint("USD", "alice", 1_000n);
	});

	describe("mint", () => {
		it("should credit the account and grow the supply", () => {
			ledger.mint("USD", "bob", 250n);

			expect(ledger.balanceOf("USD", "bob")).toBe(250n);
			expect(ledger.totalSupply("USD")).toBe(1_250n);
		});

		it("should reject non-positive amounts and null accounts", () => {
			expect(() => ledger.mint("USD", "bob", 0n)).toThrow(TransferError);
			expect(() => ledger.mint("USD", "", 10n)).toThrow('Invalid account: ""');
		});
	});

	describe("transferFrom", () => {
		it("should move funds and consume the allowance", async () => {
			ledger.approve("USD", "alice", "escrow", 600n);

			await ledger.transferFrom("escrow", "USD", "alice", "escrow", 400n);

			expect(ledger.balanceOf("USD", "alice")).toBe(600n);
			expect(ledger.balanceOf("USD", "escrow")).toBe(400n);
			expect(ledger.allowance("USD", "alice", "escrow")).toBe(200n);
		});

		it("should fail without enough allowance", async () => {
			ledger.approve("USD", "alice", "escrow", 100n);

			await expect(
				ledger.transferFrom("escrow", "USD", "alice", "escrow", 400n),
			).rejects.toMatchObject({ code: "INSUFFICIENT_ALLOWANCE" });
			expect(ledger.balanceOf("USD", "alice")).toBe(1_000n);
		});

		it("should fail without enough balance and keep the allowance", async () => {
			ledger.approve("USD", "alice", "escrow", 5_000n);

			await expect(
				ledger.transferFrom("escrow", "USD", "alice", "escrow", 2_000n),
			).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
			expect(ledger.allowance("USD", "alice", "escrow")).toBe(5_000n);
		});
	});

	describe("hooks", () => {
		it("should report each movement", async () => {
			const seen: TransferRecord[] = [];
			ledger.onTransfer("USD", (record) => {
				seen.push(record);
			});

			await ledger.send("USD", "alice", "bob", 5n);

			expect(seen).toEqual([
				{ kind: "push", asset: "USD", from: "alice", to: "bob", amount: 5n },
			]);
		});

		it("should undo the movement when a hook throws", async () => {
			ledger.onTransfer("USD", () => {
				throw new Error("paused");
			});

			await expect(ledger.send("USD", "alice", "bob", 5n)).rejects.toThrow(
				"paused",
			);
			expect(ledger.balanceOf("USD", "alice")).toBe(1_000n);
			expect(ledger.balanceOf("USD", "bob")).toBe(0n);
		});

		it("should stop calling a hook once unsubscribed", async () => {
			const hook = jest.fn();
			const unsubscribe = ledger.onTransfer("USD", hook);
			unsubscribe();

			await ledger.send("USD", "alice", "bob", 5n);

			expect(hook).not.toHaveBeenCalled();
		});
	});

	describe("receivers", () => {
		it("should let a receiver refuse a direct transfer", async () => {
			ledger.setReceiver("vault", {
				onInboundTransfer: () => {
					throw new Error("closed");
				},
			});

			await expect(ledger.transfer("USD", "alice", "vault", 1n)).rejects.toThrow(
				"closed",
			);
			expect(ledger.balanceOf("USD", "vault")).toBe(0n);
		});

		it("should not consult the receiver for custodial pushes", async () => {
			const onInboundTransfer = jest.fn();
			ledger.setReceiver("bob", { onInboundTransfer });

			await ledger.send("USD", "alice", "bob", 1n);

			expect(onInboundTransfer).not.toHaveBeenCalled();
			expect(ledger.balanceOf("USD", "bob")).toBe(1n);
		});
	});

	describe("withTransaction", () => {
		it("should restore balances and allowances on failure", async () => {
			ledger.approve("USD", "alice", "escrow", 1_000n);
			const custody = ledger.forCustodian("escrow");

			await expect(
				custody.withTransaction(async () => {
					await custody.pull("USD", "alice", "escrow", 300n);
					await custody.push("USD", "bob", 300n);
					await custody.push("USD", "bob", 1n);
				}),
			).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });

			expect(ledger.balanceOf("USD", "alice")).toBe(1_000n);
			expect(ledger.balanceOf("USD", "bob")).toBe(0n);
			expect(ledger.allowance("USD", "alice", "escrow")).toBe(1_000n);
		});

		it("should keep the outer work when an inner transaction fails and is caught", async () => {
			await ledger.withTransaction(async () => {
				await ledger.send("USD", "alice", "bob", 10n);
				await ledger
					.withTransaction(async () => {
						await ledger.send("USD", "alice", "carol", 20n);
						throw new Error("inner");
					})
					.catch(() => undefined);
			});

			expect(ledger.balanceOf("USD", "bob")).toBe(10n);
			expect(ledger.balanceOf("USD", "carol")).toBe(0n);
			expect(ledger.balanceOf("USD", "alice")).toBe(990n);
		});
	});
});
