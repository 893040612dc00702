import type { TestingModule } from "@nestjs/testing";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DataSource } from "typeorm";
import {
	ManualClock,
	ONE_YEAR,
	T0,
	createLendingTestingModule,
	errorCodeOf,
	listMarkets,
	units,
} from "../../test/utils";
import { AdminService } from "../admin/admin.service";
import { cursorFromString } from "../common/dto/envelopes";
import { LENDING_ACTIVITY_ID, LendingActivity } from "../common/lending.event";
import { RecordLockService } from "../common/record-lock.service";
import { StaticPriceFeed } from "../oracle/static-price-feed";
import { poolLock } from "./ledger-transactions.service";
import { LendingService } from "./lending.service";
import { Loan } from "./loans/loan.entity";
import { Pool } from "./pools/pool.entity";

const FLAT_TEN_PERCENT = {
	baseRateBps: 1_000,
	slope1Bps: 0,
	slope2Bps: 0,
	optimalUtilizationBps: 8_000,
	reserveFactorBps: 1_000,
};

describe("LendingService", () => {
	let clock: ManualClock;
	let moduleRef: TestingModule;
	let lending: LendingService;
	let admin: AdminService;

	beforeEach(async () => {
		clock = new ManualClock();
		moduleRef = await createLendingTestingModule(clock);
		lending = moduleRef.get(LendingService);
		admin = moduleRef.get(AdminService);
		await listMarkets(moduleRef);
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	/** Persisted pool row, bypassing projection. */
	const storedPool = (asset: string) =>
		moduleRef.get(DataSource).getRepository(Pool).findOneByOrFail({ asset });
	const storedLoan = (id: number) =>
		moduleRef.get(DataSource).getRepository(Loan).findOneByOrFail({ id });

	describe("deposits and withdrawals", () => {
		test("a deposit grows the pool and leaves an idle rate unchanged", async () => {
			await lending.deposit("alice", "USDC", units(1000));
			const before = await lending.getPool("USDC");
			expect(before.pool.totalDeposits).toBe(units(1000));
			expect(before.borrowRateBps).toBe(200);

			const { result } = await lending.deposit("alice", "USDC", units(500));
			expect(result.balance).toBe(units(1500));

			const after = await lending.getPool("USDC");
			expect(after.pool.totalDeposits).toBe(units(1500));
			expect(after.utilizationBps).toBe(0);
			expect(after.borrowRateBps).toBe(200);
		});

		test("rejects zero amounts and unknown assets", async () => {
			expect(await errorCodeOf(lending.deposit("alice", "USDC", 0n))).toBe(
				"ZeroAmount",
			);
			expect(await errorCodeOf(lending.deposit("alice", "DOGE", 1n))).toBe(
				"AssetNotSupported",
			);
		});

		test("a withdrawal beyond the user's balance fails", async () => {
			await lending.deposit("alice", "USDC", units(100));
			expect(
				await errorCodeOf(lending.withdraw("alice", "USDC", units(101))),
			).toBe("InsufficientBalance");
		});

		test("a withdrawal beyond pool liquidity fails even when the balance covers it", async () => {
			await lending.deposit("alice", "USDC", units(1000));
			await lending.createLoan({
				borrower: "bob",
				collateralAsset: "WETH",
				borrowAsset: "USDC",
				collateralAmount: units(2000),
				borrowAmount: units(900),
			});

			expect(
				await errorCodeOf(lending.withdraw("alice", "USDC", units(200))),
			).toBe("InsufficientLiquidity");

			const { result } = await lending.withdraw("alice", "USDC", units(100));
			expect(result.balance).toBe(units(900));
			expect((await lending.getPool("USDC")).availableLiquidity).toBe(0n);
		});

		test("balances are listed per asset", async () => {
			await lending.deposit("alice", "WETH", units(3));
			await lending.deposit("alice", "USDC", units(7));
			const balances = await lending.listBalances("alice");
			expect(
				balances.map((b) => [b.asset, b.depositedAmount.toString()]),
			).toEqual([
				["USDC", units(7).toString()],
				["WETH", units(3).toString()],
			]);
			expect(await lending.getBalance("bob", "USDC")).toBe(0n);
			expect(await errorCodeOf(lending.getBalance("bob", "DOGE"))).toBe(
				"AssetNotSupported",
			);
		});
	});

	describe("loan origination", () => {
		beforeEach(async () => {
			await admin.setRiskParameters("admin", "WETH", {
				collateralFactorBps: 8_000,
				liquidationThresholdBps: 8_500,
				liquidationBonusBps: 500,
			});
			await lending.deposit("alice", "USDC", units(10000));
		});

		test("borrows up to the collateral factor", async () => {
			const { result: loan, notification } = await lending.createLoan({
				borrower: "bob",
				collateralAsset: "WETH",
				borrowAsset: "USDC",
				collateralAmount: units(1000),
				borrowAmount: units(800),
			});
			expect(loan).toMatchObject({
				id: 1,
				status: "active",
				principal: units(800),
				accruedInterest: 0n,
				collateralAmount: units(1000),
				liquidationThresholdBps: 8_500,
				interestRateBps: 200,
				startTime: T0,
			});
			expect(notification.delivered).toBe(true);
			expect((await lending.getPool("USDC")).pool.totalBorrows).toBe(units(800));
		});

		test("one unit past the collateral factor is rejected", async () => {
			expect(
				await errorCodeOf(
					lending.createLoan({
						borrower: "carol",
						collateralAsset: "WETH",
						borrowAsset: "USDC",
						collateralAmount: units(1000),
						borrowAmount: units(801),
					}),
				),
			).toBe("InsufficientCollateral");
			expect((await lending.getPool("USDC")).pool.totalBorrows).toBe(0n);
		});

		test("enforces the minimum loan size", async () => {
			expect(
				await errorCodeOf(
					lending.createLoan({
						borrower: "bob",
						collateralAsset: "WETH",
						borrowAsset: "USDC",
						collateralAmount: units(10),
						borrowAmount: units("0.5"),
					}),
				),
			).toBe("LoanBelowMinimum");
		});

		test("enforces the utilization ceiling", async () => {
			expect(
				await errorCodeOf(
					lending.createLoan({
						borrower: "bob",
						collateralAsset: "WETH",
						borrowAsset: "USDC",
						collateralAmount: units(20000),
						borrowAmount: units(9600),
					}),
				),
			).toBe("UtilizationLimitExceeded");
		});

		test("honours the pool's borrowing flag", async () => {
			await admin.setPoolFlags("admin", "USDC", { borrowingEnabled: false });
			expect(
				await errorCodeOf(
					lending.createLoan({
						borrower: "bob",
						collateralAsset: "WETH",
						borrowAsset: "USDC",
						collateralAmount: units(100),
						borrowAmount: units(10),
					}),
				),
			).toBe("BorrowingDisabled");
		});

		test("fixes each loan's rate from utilization before it", async () => {
			const rates: number[] = [];
			for (let i = 0; i < 3; i++) {
				const { result } = await lending.createLoan({
					borrower: "bob",
					collateralAsset: "WETH",
					borrowAsset: "USDC",
					collateralAmount: units(2000),
					borrowAmount: units(1000),
				});
				rates.push(result.interestRateBps);
			}
			// 0%, 10% and 20% utilization on a 2% + 4% * u / 80% curve
			expect(rates).toEqual([200, 250, 300]);
		});

		test("quotes the largest borrow a position supports", async () => {
			await admin.setPrice("admin", "WETH", units(2000));
			expect(await lending.maxBorrow("WETH", "USDC", units(2))).toBe(
				units(3200),
			);
		});
	});

	describe("interest and repayment", () => {
		beforeEach(async () => {
			await admin.setInterestRateCurve("admin", "USDC", FLAT_TEN_PERCENT);
			await lending.deposit("alice", "USDC", units(2000));
			await lending.createLoan({
				borrower: "bob",
				collateralAsset: "WETH",
				borrowAsset: "USDC",
				collateralAmount: units(2000),
				borrowAmount: units(1000),
			});
		});

		test("a year at 10% adds 100 of interest to the loan", async () => {
			clock.advance(ONE_YEAR);
			const loan = await lending.getLoan(1);
			expect(loan.interestRateBps).toBe(1_000);
			expect(loan.accruedInterest).toBe(units(100));
			expect(loan.principal).toBe(units(1000));
		});

		test("an interest-only repayment leaves principal and pool borrows unchanged", async () => {
			clock.advance(ONE_YEAR);
			const { result } = await lending.repayLoan("bob", 1, units(50));
			expect(result).toMatchObject({
				amountApplied: units(50),
				interestPaid: units(50),
				principalPaid: 0n,
				collateralReleased: 0n,
			});
			expect(result.loan.accruedInterest).toBe(units(50));
			expect(result.loan.principal).toBe(units(1000));
			expect(result.loan.status).toBe("active");
			expect((await storedPool("USDC")).totalBorrows).toBe(units(1100));
		});

		test("overpaying closes the loan at its debt and releases the collateral", async () => {
			clock.advance(ONE_YEAR);
			const { result } = await lending.repayLoan("bob", 1, units(5000));
			expect(result).toMatchObject({
				amountApplied: units(1100),
				interestPaid: units(100),
				principalPaid: units(1000),
				collateralReleased: units(2000),
			});
			expect(result.loan).toMatchObject({
				status: "repaid",
				principal: 0n,
				accruedInterest: 0n,
				collateralAmount: 0n,
				closedAt: T0 + ONE_YEAR,
			});
			expect(await errorCodeOf(lending.repayLoan("bob", 1, units(1)))).toBe(
				"LoanNotActive",
			);
		});

		test("only the borrower may repay", async () => {
			expect(await errorCodeOf(lending.repayLoan("carol", 1, units(1)))).toBe(
				"Unauthorized",
			);
			expect(await errorCodeOf(lending.repayLoan("bob", 42, units(1)))).toBe(
				"LoanNotFound",
			);
		});

		test("reading a pool projects interest without persisting it", async () => {
			clock.advance(ONE_YEAR);
			const view = await lending.getPool("USDC");
			expect(view.pool.totalBorrows).toBe(units(1100));
			expect(view.pool.totalReserves).toBe(units(10));

			const stored = await storedPool("USDC");
			expect(stored.totalBorrows).toBe(units(1000));
			expect(stored.lastUpdateTime).toBe(T0);
		});

		test("accruing twice at the same time adds nothing the second time", async () => {
			clock.advance(ONE_YEAR);
			const first = await lending.accruePool("USDC");
			const second = await lending.accruePool("USDC");
			expect(first.pool.totalBorrows).toBe(units(1100));
			expect(second.pool.totalBorrows).toBe(units(1100));
			expect(second.pool.totalReserves).toBe(units(10));
		});

		test("pool interest compounds across accruals", async () => {
			clock.advance(ONE_YEAR / 2);
			expect((await lending.accruePool("USDC")).pool.totalBorrows).toBe(
				units(1050),
			);
			clock.advance(ONE_YEAR / 2);
			const view = await lending.accruePool("USDC");
			expect(view.pool.totalBorrows).toBe(units("1102.5"));
			expect(view.pool.totalReserves).toBe(units("10.25"));
		});
	});

	describe("pool solvency", () => {
		beforeEach(async () => {
			await lending.deposit("alice", "USDC", units(1000));
			await lending.createLoan({
				borrower: "bob",
				collateralAsset: "WETH",
				borrowAsset: "USDC",
				collateralAmount: units(2000),
				borrowAmount: units(950),
			});
			clock.advance(ONE_YEAR);
		});

		test("accrual at high utilization keeps borrows within deposits", async () => {
			// 95% utilization: 2% + 4% + 60% * 15/20 = 51%, on 950
			const { pool, availableLiquidity } = await lending.accruePool("USDC");
			expect(pool.totalBorrows).toBe(units("1434.5"));
			expect(pool.totalDeposits).toBe(units("1484.5"));
			expect(pool.totalReserves).toBe(units("48.45"));
			expect(pool.totalBorrows <= pool.totalDeposits).toBe(true);
			expect(availableLiquidity).toBe(units(50));
		});

		test("reserves cannot be drawn from liquidity that is lent out", async () => {
			await lending.withdraw("alice", "USDC", units(50));
			expect(
				await errorCodeOf(lending.withdraw("alice", "USDC", units(1))),
			).toBe("InsufficientLiquidity");
			expect(
				await errorCodeOf(admin.withdrawReserves("admin", "USDC", units(1))),
			).toBe("InsufficientLiquidity");

			const stored = await storedPool("USDC");
			expect(stored.totalDeposits).toBe(units("1434.5"));
			expect(stored.totalBorrows).toBe(units("1434.5"));
		});
	});

	describe("liquidation", () => {
		const DROPPED_WETH_PRICE = 843_750_000_000_000_000n;

		beforeEach(async () => {
			await lending.deposit("alice", "USDC", units(1000));
			await lending.createLoan({
				borrower: "bob",
				collateralAsset: "WETH",
				borrowAsset: "USDC",
				collateralAmount: units(1000),
				borrowAmount: units(750),
			});
		});

		test("a healthy loan cannot be liquidated", async () => {
			const health = await lending.getLoanHealth(1);
			expect(health.liquidatable).toBe(false);
			expect(health.healthFactor).toBe(units("1.066666666666666666"));
			expect(
				await errorCodeOf(lending.liquidate("liam", 1, units(100))),
			).toBe("NotLiquidatable");
		});

		test("a full liquidation closes the loan and returns the remainder", async () => {
			await admin.setPrice("admin", "WETH", DROPPED_WETH_PRICE);
			const health = await lending.getLoanHealth(1);
			expect(health.healthFactor).toBe(units("0.9"));
			expect(health.liquidatable).toBe(true);

			const { result } = await lending.liquidate("liam", 1, units(750));
			expect(result).toMatchObject({
				repaid: units(750),
				interestPaid: 0n,
				principalPaid: units(750),
				bonus: 44_444_444_444_444_444_444n,
				collateralSeized: 933_333_333_333_333_333_332n,
				collateralReturned: 66_666_666_666_666_666_668n,
			});
			expect(result.loan).toMatchObject({
				status: "liquidated",
				collateralAmount: 0n,
				principal: 0n,
				closedAt: T0,
			});
			expect((await lending.getPool("USDC")).pool.totalBorrows).toBe(0n);
			expect(await errorCodeOf(lending.getLoanHealth(1))).toBe("LoanNotActive");
		});

		test("a stale price leaves no accrual behind", async () => {
			clock.advance(ONE_YEAR);
			moduleRef
				.get(StaticPriceFeed)
				.setPrice("WETH", DROPPED_WETH_PRICE, { timestamp: T0 });

			expect(await errorCodeOf(lending.liquidate("liam", 1, units(750)))).toBe(
				"StalePriceData",
			);
			expect(
				await errorCodeOf(
					lending.createLoan({
						borrower: "carol",
						collateralAsset: "WETH",
						borrowAsset: "USDC",
						collateralAmount: units(100),
						borrowAmount: units(10),
					}),
				),
			).toBe("StalePriceData");

			const pool = await storedPool("USDC");
			expect(pool.lastUpdateTime).toBe(T0);
			expect(pool.totalBorrows).toBe(units(750));
			const loan = await storedLoan(1);
			expect(loan.lastAccrualTime).toBe(T0);
			expect(loan.accruedInterest).toBe(0n);
			expect((await lending.listLoans("carol", {}, 10)).total).toBe(0);
		});

		test("only one of two racing liquidators closes the loan", async () => {
			await admin.setPrice("admin", "WETH", DROPPED_WETH_PRICE);
			const outcomes = await Promise.all([
				errorCodeOf(lending.liquidate("liam", 1, units(750))),
				errorCodeOf(lending.liquidate("lena", 1, units(750))),
			]);
			expect(outcomes).toEqual([undefined, "LoanNotActive"]);
			expect((await storedPool("USDC")).totalBorrows).toBe(0n);
			expect((await storedLoan(1)).status).toBe("liquidated");
		});

		test("a partial liquidation keeps the loan open", async () => {
			await admin.setPrice("admin", "WETH", DROPPED_WETH_PRICE);
			const { result } = await lending.liquidate("liam", 1, units(300));
			expect(result.collateralSeized).toBe(373_333_333_333_333_333_332n);
			expect(result.collateralReturned).toBe(0n);
			expect(result.loan).toMatchObject({
				status: "active",
				principal: units(450),
				collateralAmount: 626_666_666_666_666_666_668n,
			});
			expect((await lending.getPool("USDC")).pool.totalBorrows).toBe(
				units(450),
			);
		});
	});

	describe("pausing", () => {
		test("a paused protocol rejects every user operation", async () => {
			await lending.deposit("alice", "USDC", units(10));
			await admin.setProtocolPaused("risk", true);
			expect(await errorCodeOf(lending.deposit("alice", "USDC", units(1)))).toBe(
				"ProtocolPaused",
			);
			expect(
				await errorCodeOf(lending.withdraw("alice", "USDC", units(1))),
			).toBe("ProtocolPaused");

			await admin.setProtocolPaused("risk", false);
			const { result } = await lending.deposit("alice", "USDC", units(1));
			expect(result.balance).toBe(units(11));
		});

		test("a paused pool rejects deposits and withdrawals", async () => {
			await lending.deposit("alice", "USDC", units(10));
			await admin.setPoolPaused("admin", "USDC", true);
			expect(await errorCodeOf(lending.deposit("alice", "USDC", units(1)))).toBe(
				"PoolInactive",
			);
			expect(
				await errorCodeOf(lending.withdraw("alice", "USDC", units(1))),
			).toBe("PoolInactive");
		});

		test("a delisted pool takes no deposits but still pays out", async () => {
			await lending.deposit("alice", "USDC", units(10));
			await admin.delistAsset("admin", "USDC");
			expect(await errorCodeOf(lending.deposit("alice", "USDC", units(1)))).toBe(
				"PoolInactive",
			);
			const { result } = await lending.withdraw("alice", "USDC", units(10));
			expect(result.balance).toBe(0n);
		});

		test("disabled deposits are reported as such", async () => {
			await admin.setPoolFlags("admin", "USDC", { depositsEnabled: false });
			expect(await errorCodeOf(lending.deposit("alice", "USDC", units(1)))).toBe(
				"DepositsDisabled",
			);
		});
	});

	describe("loan listing", () => {
		beforeEach(async () => {
			await lending.deposit("alice", "USDC", units(1000));
			for (let i = 0; i < 3; i++) {
				await lending.createLoan({
					borrower: "bob",
					collateralAsset: "WETH",
					borrowAsset: "USDC",
					collateralAmount: units(200),
					borrowAmount: units(100),
				});
			}
		});

		test("pages newest first with an opaque cursor", async () => {
			const first = await lending.listLoans("bob", {}, 2);
			expect(first.items.map((l) => l.id)).toEqual([3, 2]);
			expect(first.total).toBe(3);
			expect(first.nextCursor).toBe("Mg==");

			const second = await lending.listLoans(
				"bob",
				{},
				2,
				cursorFromString("Mg=="),
			);
			expect(second.items.map((l) => l.id)).toEqual([1]);
			expect(second.nextCursor).toBeUndefined();
		});

		test("filters by status and borrower", async () => {
			await lending.repayLoan("bob", 2, units(100));
			const repaid = await lending.listLoans("bob", { status: "repaid" }, 10);
			expect(repaid.items.map((l) => l.id)).toEqual([2]);
			expect(repaid.total).toBe(1);
			expect((await lending.listLoans("carol", {}, 10)).total).toBe(0);
		});
	});

	describe("timestamps", () => {
		test("an operation waiting on a lock is stamped when it runs", async () => {
			await lending.deposit("alice", "USDC", units(10));
			const { pending } = await moduleRef
				.get(RecordLockService)
				.withLocks([poolLock("USDC")], async () => {
					const pending = lending.deposit("alice", "USDC", units(5));
					clock.advance(60);
					return { pending };
				});

			const { result } = await pending;
			expect(result.balance).toBe(units(15));
			expect((await storedPool("USDC")).lastUpdateTime).toBe(T0 + 60);
		});
	});

	describe("activity", () => {
		test("announces committed operations", async () => {
			const seen: LendingActivity[] = [];
			moduleRef
				.get(EventEmitter2)
				.on(LENDING_ACTIVITY_ID, (activity: LendingActivity) => {
					seen.push(activity);
				});

			const { notification } = await lending.deposit("alice", "USDC", units(5));
			expect(notification.delivered).toBe(true);
			expect(seen).toEqual([
				{
					type: "deposit",
					at: T0,
					user: "alice",
					asset: "USDC",
					amount: units(5).toString(),
					eventId: notification.eventId,
				},
			]);
		});

		test("a failing listener does not undo the operation", async () => {
			moduleRef.get(EventEmitter2).on(LENDING_ACTIVITY_ID, async () => {
				throw new Error("listener down");
			});

			const { notification } = await lending.deposit("alice", "USDC", units(5));
			expect(notification.delivered).toBe(false);
			expect(await lending.getBalance("alice", "USDC")).toBe(units(5));
		});
	});
});
