import { MemoryAssetLedger, TransferError } from "../../transfer/index.js";
import { NULL_IDENTITY } from "../../core/index.js";
import { SwapError } from "../../core/errors.js";
import { SwapEngine } from "./swap-engine.js";
import {
	CreateSwapParams,
	FEE_PERCENT_UPDATED,
	OWNERSHIP_TRANSFERRED,
	REQUEST_CREATED,
	STATUS_CHANGED,
	SwapEvent,
} from "./types.js";

const ESCROW = "escrow";
const OWNER = "owner";
const TREASURY = "treasury";
const ALICE = "alice";
const BOB = "bob";
const CAROL = "carol";
const GOLD = "GOLD";
const SILVER = "SILVER";

const terms: CreateSwapParams = {
	recipient: BOB,
	offerAsset: GOLD,
	offerAmount: 1000n,
	receiveAsset: SILVER,
	receiveAmount: 2000n,
};

function setup(feePercent = 5) {
	const ledger = new MemoryAssetLedger();
	const events: SwapEvent[] = [];
	const engine = new SwapEngine({
		transfers: ledger.forCustodian(ESCROW),
		custodian: ESCROW,
		onEvent: (event) => {
			events.push(event);
		},
	});
	engine.initialize({ owner: OWNER, treasury: TREASURY, feePercent });

	ledger.mint(GOLD, ALICE, 10_000n);
	ledger.approve(GOLD, ALICE, ESCROW, 10_000n);
	ledger.mint(SILVER, BOB, 10_000n);
	ledger.approve(SILVER, BOB, ESCROW, 10_000n);

	return { ledger, engine, events };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
	return promise.then(
		() => {
			throw new Error("expected the operation to fail");
		},
		(err: unknown) => err,
	);
}

describe("SwapEngine", () => {
	describe("create", () => {
		it("should take custody of the offer and record a pending request", async () => {
			const { ledger, engine, events } = setup();

			const id = await engine.create(ALICE, terms);

			expect(id).toBe(0);
			expect(engine.get(0)).toEqual({
				id: 0,
				requester: ALICE,
				recipient: BOB,
				offerAsset: GOLD,
				offerAmount: 1000n,
				receiveAsset: SILVER,
				receiveAmount: 2000n,
				status: "Pending",
			});
			expect(ledger.balanceOf(GOLD, ALICE)).toBe(9000n);
			expect(ledger.balanceOf(GOLD, ESCROW)).toBe(1000n);
			expect(engine.custodyOf(GOLD)).toBe(1000n);
			expect(events).toEqual([
				{
					type: REQUEST_CREATED,
					id: 0,
					requester: ALICE,
					recipient: BOB,
					offerAsset: GOLD,
					offerAmount: 1000n,
					receiveAsset: SILVER,
					receiveAmount: 2000n,
				},
			]);
		});

		it("should assign dense sequential ids", async () => {
			const { engine } = setup();

			const ids = [
				await engine.create(ALICE, terms),
				await engine.create(ALICE, { ...terms, recipient: CAROL }),
				await engine.create(ALICE, terms),
			];

			expect(ids).toEqual([0, 1, 2]);
			expect(engine.count()).toBe(3);
		});

		const invalid: Array<[string, Partial<CreateSwapParams>]> = [
			["a zero offer amount", { offerAmount: 0n }],
			["a zero receive amount", { receiveAmount: 0n }],
			["a null recipient", { recipient: NULL_IDENTITY }],
			["an empty recipient", { recipient: "" }],
			["a null offer asset", { offerAsset: "" }],
			["a null receive asset", { receiveAsset: NULL_IDENTITY }],
		];

		it.each(invalid)("should reject %s without recording anything", async (_, patch) => {
			const { ledger, engine, events } = setup();

			const err = await rejection(engine.create(ALICE, { ...terms, ...patch }));

			expect(err).toBeInstanceOf(SwapError);
			expect(err).toMatchObject({ code: "INVALID_ARGUMENT" });
			expect(engine.count()).toBe(0);
			expect(ledger.balanceOf(GOLD, ALICE)).toBe(10_000n);
			expect(events).toEqual([]);
		});

		it("should refuse the custodian as requester or recipient", async () => {
			const { ledger, engine, events } = setup();
			await engine.create(ALICE, terms);
			events.length = 0;

			await expect(engine.create(ESCROW, terms)).rejects.toMatchObject({
				code: "INVALID_ARGUMENT",
				message: "Invalid swap request: requester is the custodian",
			});
			await expect(
				engine.create(ALICE, { ...terms, recipient: ESCROW }),
			).rejects.toMatchObject({
				code: "INVALID_ARGUMENT",
				message: "Invalid swap request: recipient is the custodian",
			});

			expect(engine.count()).toBe(1);
			expect(ledger.balanceOf(GOLD, ESCROW)).toBe(1000n);
			expect(engine.custodyOf(GOLD)).toBe(1000n);
			expect(events).toEqual([]);

			await engine.cancel(0, ALICE);
			expect(ledger.balanceOf(GOLD, ALICE)).toBe(10_000n);
		});

		it("should fail with TRANSFER_FAILURE and record nothing when the pull fails", async () => {
			const { ledger, engine, events } = setup();
			ledger.approve(GOLD, ALICE, ESCROW, 500n);

			const err = await rejection(engine.create(ALICE, terms));

			expect(err).toMatchObject({ code: "TRANSFER_FAILURE" });
			expect(err instanceof SwapError && err.cause).toBeInstanceOf(TransferError);
			expect(engine.count()).toBe(0);
			expect(engine.custodyOf(GOLD)).toBe(0n);
			expect(ledger.allowance(GOLD, ALICE, ESCROW)).toBe(500n);
			expect(events).toEqual([]);
		});
	});

	describe("get", () => {
		it("should fail with NOT_FOUND outside the registry", async () => {
			const { engine } = setup();
			await engine.create(ALICE, terms);

			expect(() => engine.get(1)).toThrow(SwapError);
			expect(() => engine.get(-1)).toThrow("Swap request -1 not found");
			expect(() => engine.get(0.5)).toThrow("Swap request 0.5 not found");
		});

		it("should return a frozen copy", async () => {
			const { engine } = setup();
			await engine.create(ALICE, terms);

			const request = engine.get(0);

			expect(Object.isFrozen(request)).toBe(true);
			expect(request).not.toBe(engine.get(0));
		});
	});

	describe("approve", () => {
		it("should settle both legs minus a 5% fee", async () => {
			const { ledger, engine, events } = setup(5);
			const id = await engine.create(ALICE, terms);

			await engine.approve(id, BOB);

			expect(engine.get(id).status).toBe("Approved");
			expect(ledger.balanceOf(GOLD, BOB)).toBe(950n);
			expect(ledger.balanceOf(GOLD, TREASURY)).toBe(50n);
			expect(ledger.balanceOf(SILVER, ALICE)).toBe(1900n);
			expect(ledger.balanceOf(SILVER, TREASURY)).toBe(100n);
			expect(ledger.balanceOf(SILVER, BOB)).toBe(8000n);
			expect(ledger.balanceOf(GOLD, ESCROW)).toBe(0n);
			expect(ledger.balanceOf(SILVER, ESCROW)).toBe(0n);
			expect(engine.custodyOf(GOLD)).toBe(0n);
			expect(ledger.totalSupply(GOLD)).toBe(10_000n);
			expect(ledger.totalSupply(SILVER)).toBe(10_000n);
			expect(events[1]).toEqual({
				type: STATUS_CHANGED,
				id,
				newStatus: "Approved",
			});
		});

		it("should pay full amounts and nothing to the treasury at a zero fee", async () => {
			const { ledger, engine } = setup(0);
			const id = await engine.create(ALICE, terms);

			await engine.approve(id, BOB);

			expect(ledger.balanceOf(GOLD, BOB)).toBe(1000n);
			expect(ledger.balanceOf(SILVER, ALICE)).toBe(2000n);
			expect(ledger.balanceOf(GOLD, TREASURY)).toBe(0n);
			expect(ledger.balanceOf(SILVER, TREASURY)).toBe(0n);
		});

		it("should floor each fee independently", async () => {
			const { ledger, engine } = setup(5);
			const id = await engine.create(ALICE, {
				...terms,
				offerAmount: 999n,
				receiveAmount: 19n,
			});

			await engine.approve(id, BOB);

			expect(ledger.balanceOf(GOLD, TREASURY)).toBe(49n);
			expect(ledger.balanceOf(GOLD, BOB)).toBe(950n);
			expect(ledger.balanceOf(SILVER, TREASURY)).toBe(0n);
			expect(ledger.balanceOf(SILVER, ALICE)).toBe(19n);
		});

		it("should use the fee current when it runs, not when the request was made", async () => {
			const { ledger, engine } = setup(5);
			const id = await engine.create(ALICE, terms);
			await engine.setFeePercent(OWNER, 10);

			await engine.approve(id, BOB);

			expect(ledger.balanceOf(GOLD, TREASURY)).toBe(100n);
			expect(ledger.balanceOf(SILVER, TREASURY)).toBe(200n);
		});

		it("should send everything to the treasury at a 100% fee", async () => {
			const { ledger, engine } = setup(5);
			const id = await engine.create(ALICE, terms);
			await engine.setFeePercent(OWNER, 100);

			await engine.approve(id, BOB);

			expect(ledger.balanceOf(GOLD, TREASURY)).toBe(1000n);
			expect(ledger.balanceOf(SILVER, TREASURY)).toBe(2000n);
			expect(ledger.balanceOf(GOLD, BOB)).toBe(0n);
			expect(ledger.balanceOf(SILVER, ALICE)).toBe(0n);
		});

		it("should pay the current treasury", async () => {
			const { ledger, engine } = setup(5);
			const id = await engine.create(ALICE, terms);
			await engine.setTreasury(OWNER, CAROL);

			await engine.approve(id, BOB);

			expect(ledger.balanceOf(GOLD, CAROL)).toBe(50n);
			expect(ledger.balanceOf(GOLD, TREASURY)).toBe(0n);
		});

		it("should fail with TRANSFER_FAILURE when the recipient cannot fund the receive leg", async () => {
			const { ledger, engine } = setup();
			const id = await engine.create(ALICE, terms);
			ledger.approve(SILVER, BOB, ESCROW, 0n);

			const err = await rejection(engine.approve(id, BOB));

			expect(err).toMatchObject({ code: "TRANSFER_FAILURE" });
			expect(engine.get(id).status).toBe("Pending");
			expect(engine.custodyOf(GOLD)).toBe(1000n);
		});

		it("should roll back every transfer when a payout fails mid-settlement", async () => {
			const { ledger, engine, events } = setup();
			const id = await engine.create(ALICE, terms);
			ledger.onTransfer(SILVER, (record) => {
				if (record.kind === "push") throw new Error("asset paused");
			});

			const err = await rejection(engine.approve(id, BOB));

			expect(err).toMatchObject({ code: "TRANSFER_FAILURE" });
			expect(engine.get(id).status).toBe("Pending");
			expect(ledger.balanceOf(SILVER, BOB)).toBe(10_000n);
			expect(ledger.allowance(SILVER, BOB, ESCROW)).toBe(10_000n);
			expect(ledger.balanceOf(GOLD, BOB)).toBe(0n);
			expect(ledger.balanceOf(GOLD, TREASURY)).toBe(0n);
			expect(ledger.balanceOf(GOLD, ESCROW)).toBe(1000n);
			expect(engine.custodyOf(GOLD)).toBe(1000n);
			expect(events.map((e) => e.type)).toEqual([REQUEST_CREATED]);
		});
	});

	describe("reject and cancel", () => {
		it("should refund the whole offer to the requester when the recipient rejects", async () => {
			const { ledger, engine, events } = setup(5);
			const id = await engine.create(ALICE, terms);

			await engine.reject(id, BOB);

			expect(engine.get(id).status).toBe("Rejected");
			expect(ledger.balanceOf(GOLD, ALICE)).toBe(10_000n);
			expect(ledger.balanceOf(GOLD, TREASURY)).toBe(0n);
			expect(ledger.balanceOf(SILVER, BOB)).toBe(10_000n);
			expect(engine.custodyOf(GOLD)).toBe(0n);
			expect(events[1]).toEqual({
				type: STATUS_CHANGED,
				id,
				newStatus: "Rejected",
			});
		});

		it("should refund the whole offer when the requester cancels", async () => {
			const { ledger, engine } = setup(5);
			const id = await engine.create(ALICE, terms);

			await engine.cancel(id, ALICE);

			expect(engine.get(id).status).toBe("Cancelled");
			expect(ledger.balanceOf(GOLD, ALICE)).toBe(10_000n);
			expect(ledger.balanceOf(GOLD, ESCROW)).toBe(0n);
		});
	});

	describe("authorization", () => {
		it.each([
			["approve", CAROL],
			["approve", ALICE],
			["reject", CAROL],
			["reject", ALICE],
			["cancel", BOB],
			["cancel", CAROL],
		] as const)("should refuse %s by %s", async (action, caller) => {
			const { ledger, engine } = setup();
			const id = await engine.create(ALICE, terms);

			const err = await rejection(engine[action](id, caller));

			expect(err).toMatchObject({ code: "UNAUTHORIZED" });
			expect(engine.get(id).status).toBe("Pending");
			expect(ledger.balanceOf(GOLD, ESCROW)).toBe(1000n);
		});

		it("should report NOT_FOUND before anything else", async () => {
			const { engine } = setup();

			await expect(engine.approve(7, CAROL)).rejects.toMatchObject({
				code: "NOT_FOUND",
			});
		});
	});

	describe("terminal states", () => {
		it.each(["approve", "reject", "cancel"] as const)(
			"should refuse %s on a settled request without moving funds",
			async (action) => {
				const { ledger, engine, events } = setup();
				const id = await engine.create(ALICE, terms);
				await engine.approve(id, BOB);
				const before = {
					alice: ledger.balanceOf(GOLD, ALICE),
					bob: ledger.balanceOf(GOLD, BOB),
					treasury: ledger.balanceOf(GOLD, TREASURY),
				};

				const caller = action === "cancel" ? ALICE : BOB;
				const err = await rejection(engine[action](id, caller));

				expect(err).toMatchObject({ code: "INVALID_STATE" });
				expect(engine.get(id).status).toBe("Approved");
				expect({
					alice: ledger.balanceOf(GOLD, ALICE),
					bob: ledger.balanceOf(GOLD, BOB),
					treasury: ledger.balanceOf(GOLD, TREASURY),
				}).toEqual(before);
				expect(events).toHaveLength(2);
			},
		);

		it("should check the status before the caller", async () => {
			const { engine } = setup();
			const id = await engine.create(ALICE, terms);
			await engine.cancel(id, ALICE);

			await expect(engine.approve(id, CAROL)).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
		});
	});

	describe("custody accounting", () => {
		it("should hold exactly the pending offers", async () => {
			const { ledger, engine } = setup();
			const first = await engine.create(ALICE, terms);
			await engine.create(ALICE, { ...terms, offerAmount: 300n });
			expect(engine.custodyOf(GOLD)).toBe(1300n);

			await engine.approve(first, BOB);

			expect(engine.custodyOf(GOLD)).toBe(300n);
			expect(ledger.balanceOf(GOLD, ESCROW)).toBe(300n);
		});
	});

	describe("reentrancy", () => {
		it("should refuse a reentrant approve from inside a pull", async () => {
			const { ledger, engine, events } = setup(5);
			const id = await engine.create(ALICE, terms);
			let reentry: unknown;
			ledger.onTransfer(SILVER, async (record) => {
				if (record.kind === "pull") {
					reentry = await engine.approve(id, BOB).then(
						() => "approved twice",
						(err: unknown) => err,
					);
				}
			});

			await engine.approve(id, BOB);

			expect(reentry).toBeInstanceOf(SwapError);
			expect(reentry).toMatchObject({ code: "REENTRANT" });
			expect(engine.get(id).status).toBe("Approved");
			expect(ledger.balanceOf(GOLD, BOB)).toBe(950n);
			expect(ledger.balanceOf(SILVER, ALICE)).toBe(1900n);
			expect(ledger.balanceOf(SILVER, BOB)).toBe(8000n);
			expect(events.filter((e) => e.type === STATUS_CHANGED)).toHaveLength(1);
		});

		it("should refuse a reentrant cancel from inside a payout", async () => {
			const { ledger, engine } = setup(5);
			const id = await engine.create(ALICE, terms);
			let reentry: unknown;
			ledger.onTransfer(GOLD, async (record) => {
				if (record.kind === "push" && record.to === BOB) {
					reentry = await engine.cancel(id, ALICE).then(
						() => "cancelled mid-settlement",
						(err: unknown) => err,
					);
				}
			});

			await engine.approve(id, BOB);

			expect(reentry).toMatchObject({ code: "REENTRANT" });
			expect(engine.get(id).status).toBe("Approved");
			expect(ledger.balanceOf(GOLD, ALICE)).toBe(9000n);
		});

		it("should abort the outer operation when a hostile asset rethrows", async () => {
			const { ledger, engine } = setup();
			const id = await engine.create(ALICE, terms);
			ledger.onTransfer(SILVER, async () => {
				await engine.approve(id, BOB);
			});

			const err = await rejection(engine.approve(id, BOB));

			expect(err).toMatchObject({ code: "REENTRANT" });
			expect(engine.get(id).status).toBe("Pending");
			expect(ledger.balanceOf(SILVER, BOB)).toBe(10_000n);
		});

		it("should release the guard after a failure", async () => {
			const { engine } = setup();
			await rejection(engine.create(ALICE, { ...terms, offerAmount: 0n }));

			await expect(engine.create(ALICE, terms)).resolves.toBe(0);
		});
	});

	describe("administration", () => {
		it("should default the fee to 5%", () => {
			const engine = new SwapEngine({
				transfers: new MemoryAssetLedger().forCustodian(ESCROW),
				custodian: ESCROW,
			});

			engine.initialize({ owner: OWNER, treasury: TREASURY });

			expect(engine.getConfig()).toEqual({
				owner: OWNER,
				treasury: TREASURY,
				feePercent: 5,
			});
		});

		it("should refuse a second initialization", () => {
			const { engine } = setup();

			expect(() =>
				engine.initialize({ owner: CAROL, treasury: CAROL }),
			).toThrow(expect.objectContaining({ code: "ALREADY_INITIALIZED" }));
			expect(engine.getConfig().owner).toBe(OWNER);
		});

		it("should refuse operations before initialization", async () => {
			const ledger = new MemoryAssetLedger();
			const engine = new SwapEngine({
				transfers: ledger.forCustodian(ESCROW),
				custodian: ESCROW,
			});

			await expect(engine.create(ALICE, terms)).rejects.toMatchObject({
				code: "NOT_INITIALIZED",
			});
			expect(() => engine.getConfig()).toThrow("Engine is not initialized");
		});

		it("should reject a fee above 100 and keep the old one", async () => {
			const { engine } = setup(5);

			await expect(engine.setFeePercent(OWNER, 101)).rejects.toMatchObject({
				code: "INVALID_ARGUMENT",
			});
			expect(engine.getConfig().feePercent).toBe(5);
		});

		it("should let only the owner change parameters", async () => {
			const { engine } = setup();

			await expect(engine.setFeePercent(ALICE, 10)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
			await expect(engine.setTreasury(ALICE, ALICE)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
			await expect(
				engine.transferOwnership(ALICE, ALICE),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("should refuse the custodian as owner or treasury", async () => {
			const { engine, events } = setup();
			const fresh = new SwapEngine({
				transfers: new MemoryAssetLedger().forCustodian(ESCROW),
				custodian: ESCROW,
			});

			expect(() =>
				fresh.initialize({ owner: OWNER, treasury: ESCROW }),
			).toThrow("Invalid treasury: the custodian cannot be the treasury");
			expect(() =>
				fresh.initialize({ owner: ESCROW, treasury: TREASURY }),
			).toThrow("Invalid owner: the custodian cannot be the owner");
			expect(fresh.initialized).toBe(false);

			await expect(engine.setTreasury(OWNER, ESCROW)).rejects.toMatchObject({
				code: "INVALID_ARGUMENT",
			});
			await expect(
				engine.transferOwnership(OWNER, ESCROW),
			).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
			expect(engine.getConfig()).toEqual({
				owner: OWNER,
				treasury: TREASURY,
				feePercent: 5,
			});
			expect(events).toEqual([]);
		});

		it("should hand over ownership", async () => {
			const { engine, events } = setup(5);

			await engine.transferOwnership(OWNER, CAROL);
			await engine.setFeePercent(CAROL, 7);

			await expect(engine.setFeePercent(OWNER, 1)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
			expect(engine.getConfig()).toEqual({
				owner: CAROL,
				treasury: TREASURY,
				feePercent: 7,
			});
			expect(events).toEqual([
				{ type: OWNERSHIP_TRANSFERRED, previousOwner: OWNER, newOwner: CAROL },
				{ type: FEE_PERCENT_UPDATED, previousFeePercent: 5, newFeePercent: 7 },
			]);
		});
	});

	describe("notifications", () => {
		it("should commit and keep delivering when the sink throws", async () => {
			const ledger = new MemoryAssetLedger();
			const delivered: SwapEvent[] = [];
			const onEventError = jest.fn();
			const engine = new SwapEngine({
				transfers: ledger.forCustodian(ESCROW),
				custodian: ESCROW,
				onEvent: (event) => {
					if (event.type === REQUEST_CREATED) {
						throw new Error("observer down");
					}
					delivered.push(event);
				},
				onEventError,
			});
			engine.initialize({ owner: OWNER, treasury: TREASURY });
			ledger.mint(GOLD, ALICE, 1000n);
			ledger.approve(GOLD, ALICE, ESCROW, 1000n);

			await expect(engine.create(ALICE, terms)).resolves.toBe(0);
			await engine.cancel(0, ALICE);

			expect(onEventError).toHaveBeenCalledTimes(1);
			expect(onEventError).toHaveBeenCalledWith(
				new Error("observer down"),
				expect.objectContaining({ type: REQUEST_CREATED, id: 0 }),
			);
			expect(delivered).toEqual([
				{ type: STATUS_CHANGED, id: 0, newStatus: "Cancelled" },
			]);
			expect(ledger.balanceOf(GOLD, ALICE)).toBe(1000n);
		});

		it("should report sink failures on the console by default", async () => {
			const consoleError = jest
				.spyOn(console, "error")
				.mockImplementation(() => undefined);
			const engine = new SwapEngine({
				transfers: new MemoryAssetLedger().forCustodian(ESCROW),
				custodian: ESCROW,
				onEvent: () => {
					throw new Error("observer down");
				},
			});
			engine.initialize({ owner: OWNER, treasury: TREASURY });

			try {
				await expect(engine.setFeePercent(OWNER, 9)).resolves.toBeUndefined();
				expect(engine.getConfig().feePercent).toBe(9);
				expect(consoleError).toHaveBeenCalledWith(
					`Failed to deliver ${FEE_PERCENT_UPDATED}:`,
					new Error("observer down"),
				);
			} finally {
				consoleError.mockRestore();
			}
		});
	});

	describe("inbound transfers", () => {
		it("should refuse direct transfers to the custodian", async () => {
			const { ledger, engine } = setup();
			ledger.setReceiver(ESCROW, engine);

			await expect(
				ledger.transfer(GOLD, ALICE, ESCROW, 10n),
			).rejects.toThrow("direct transfers are not accepted");
			expect(ledger.balanceOf(GOLD, ALICE)).toBe(10_000n);
			expect(ledger.balanceOf(GOLD, ESCROW)).toBe(0n);

			await ledger.transfer(GOLD, ALICE, CAROL, 10n);
			expect(ledger.balanceOf(GOLD, CAROL)).toBe(10n);
		});
	});

	describe("queries", () => {
		it("should quote a pending request at the current fee", async () => {
			const { engine } = setup(5);
			const id = await engine.create(ALICE, terms);

			expect(engine.quote(id)).toEqual({
				requestId: id,
				feePercent: 5,
				offerFee: 50n,
				receiveFee: 100n,
				disbursements: [
					{ asset: GOLD, to: BOB, amount: 950n },
					{ asset: GOLD, to: TREASURY, amount: 50n },
					{ asset: SILVER, to: ALICE, amount: 1900n },
					{ asset: SILVER, to: TREASURY, amount: 100n },
				],
			});
		});

		it("should not quote a settled request", async () => {
			const { engine } = setup();
			const id = await engine.create(ALICE, terms);
			await engine.reject(id, BOB);

			expect(() => engine.quote(id)).toThrow(
				expect.objectContaining({ code: "INVALID_STATE" }),
			);
		});

		it("should list a party's requests newest first", async () => {
			const { engine } = setup();
			await engine.create(ALICE, terms);
			await engine.create(ALICE, { ...terms, recipient: CAROL });
			await engine.create(ALICE, terms);
			await engine.cancel(2, ALICE);

			const bobs = engine.list({ party: BOB });
			expect(bobs.items.map((r) => r.id)).toEqual([2, 0]);
			expect(bobs.total).toBe(2);

			const pending = engine.list({ party: ALICE, status: "Pending", limit: 1 });
			expect(pending.items.map((r) => r.id)).toEqual([1]);
			expect(pending.hasMore).toBe(true);

			const older = engine.list({ idBefore: 1 });
			expect(older.items.map((r) => r.id)).toEqual([0]);
			expect(older.total).toBe(3);
		});
	});
});
