import { EventEmitter2 } from "@nestjs/event-emitter";
import type { TestingModule } from "@nestjs/testing";
import {
	ManualClock,
	ONE_YEAR,
	createLendingTestingModule,
	errorCodeOf,
	listMarkets,
	units,
} from "../../test/utils";
import { LENDING_ACTIVITY_ID, LendingActivity } from "../common/lending.event";
import { LedgerTransactions } from "../lending/ledger-transactions.service";
import { LendingService } from "../lending/lending.service";
import { AdminService } from "./admin.service";

describe("AdminService", () => {
	let clock: ManualClock;
	let moduleRef: TestingModule;
	let admin: AdminService;
	let lending: LendingService;

	beforeEach(async () => {
		clock = new ManualClock();
		moduleRef = await createLendingTestingModule(clock);
		admin = moduleRef.get(AdminService);
		lending = moduleRef.get(LendingService);
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	describe("access", () => {
		test("every mutation is refused to callers without a role", async () => {
			await listMarkets(moduleRef);
			const attempts: Array<() => Promise<unknown>> = [
				() =>
					admin.listAsset("mallory", {
						asset: "DAI",
						collateralFactorBps: 1_000,
						liquidationBonusBps: 100,
					}),
				() => admin.delistAsset("mallory", "USDC"),
				() => admin.setPoolPaused("mallory", "USDC", true),
				() => admin.setProtocolPaused("mallory", true),
				() => admin.withdrawReserves("mallory", "USDC", 1n),
				() => admin.setPrice("mallory", "USDC", 1n),
				() => admin.stats("mallory"),
			];
			for (const attempt of attempts) {
				expect(await errorCodeOf(attempt())).toBe("Unauthorized");
			}
		});

		test("risk managers may tune pools but not list assets", async () => {
			await listMarkets(moduleRef);
			expect(
				await errorCodeOf(
					admin.listAsset("risk", {
						asset: "DAI",
						collateralFactorBps: 1_000,
						liquidationBonusBps: 100,
					}),
				),
			).toBe("Unauthorized");

			const { result } = await admin.setRiskParameters("risk", "USDC", {
				collateralFactorBps: 7_000,
				liquidationThresholdBps: 7_500,
				liquidationBonusBps: 800,
			});
			expect(result.pool).toMatchObject({
				collateralFactorBps: 7_000,
				liquidationThresholdBps: 7_500,
				liquidationBonusBps: 800,
			});
		});
	});

	describe("listing", () => {
		test("a new pool starts empty with the default threshold", async () => {
			const { result, notification } = await admin.listAsset("admin", {
				asset: "DAI",
				collateralFactorBps: 8_000,
				liquidationBonusBps: 500,
			});
			expect(result.pool).toMatchObject({
				asset: "DAI",
				totalDeposits: 0n,
				totalBorrows: 0n,
				totalReserves: 0n,
				isActive: true,
				isPaused: false,
				liquidationThresholdBps: 8_500,
			});
			expect(notification.delivered).toBe(true);
		});

		test("an active asset cannot be listed twice", async () => {
			await listMarkets(moduleRef);
			expect(
				await errorCodeOf(
					admin.listAsset("admin", {
						asset: "USDC",
						collateralFactorBps: 8_000,
						liquidationBonusBps: 500,
					}),
				),
			).toBe("AssetAlreadyListed");
		});

		test("relisting a delisted asset keeps its deposits", async () => {
			await listMarkets(moduleRef);
			await lending.deposit("alice", "USDC", units(100));
			await admin.delistAsset("admin", "USDC");

			const { result } = await admin.listAsset("admin", {
				asset: "USDC",
				collateralFactorBps: 6_000,
				liquidationThresholdBps: 7_000,
				liquidationBonusBps: 300,
			});
			expect(result.pool).toMatchObject({
				isActive: true,
				totalDeposits: units(100),
				collateralFactorBps: 6_000,
			});
		});
	});

	describe("risk parameters", () => {
		beforeEach(async () => {
			await listMarkets(moduleRef);
		});

		test.each([
			[
				"a factor above the protocol maximum",
				{
					collateralFactorBps: 9_500,
					liquidationThresholdBps: 9_800,
					liquidationBonusBps: 500,
				},
			],
			[
				"a bonus above the protocol maximum",
				{
					collateralFactorBps: 8_000,
					liquidationThresholdBps: 8_500,
					liquidationBonusBps: 2_500,
				},
			],
			[
				"a factor above the liquidation threshold",
				{
					collateralFactorBps: 8_600,
					liquidationThresholdBps: 8_500,
					liquidationBonusBps: 500,
				},
			],
			[
				"a value outside 0..10000",
				{
					collateralFactorBps: 8_000,
					liquidationThresholdBps: 10_001,
					liquidationBonusBps: 500,
				},
			],
		])("rejects %s", async (_name, params) => {
			expect(
				await errorCodeOf(admin.setRiskParameters("admin", "USDC", params)),
			).toBe("InvalidParameter");
		});

		test("an unknown asset is reported as unsupported", async () => {
			expect(
				await errorCodeOf(
					admin.setRiskParameters("admin", "DOGE", {
						collateralFactorBps: 1_000,
						liquidationThresholdBps: 2_000,
						liquidationBonusBps: 100,
					}),
				),
			).toBe("AssetNotSupported");
		});
	});

	describe("interest curves", () => {
		beforeEach(async () => {
			await listMarkets(moduleRef);
		});

		test("the default curve comes from configuration until one is stored", async () => {
			await expect(admin.getCurve("default")).resolves.toEqual({
				scope: "default",
				baseRateBps: 200,
				slope1Bps: 400,
				slope2Bps: 6_000,
				optimalUtilizationBps: 8_000,
				reserveFactorBps: 1_000,
			});
		});

		test("an asset override applies only to that pool", async () => {
			const curve = {
				baseRateBps: 500,
				slope1Bps: 500,
				slope2Bps: 5_000,
				optimalUtilizationBps: 9_000,
				reserveFactorBps: 2_000,
			};
			await admin.setInterestRateCurve("risk", "WETH", curve);
			await expect(admin.getCurve("WETH")).resolves.toEqual({
				scope: "WETH",
				...curve,
			});
			expect((await lending.getPool("WETH")).borrowRateBps).toBe(500);
			expect((await lending.getPool("USDC")).borrowRateBps).toBe(200);
		});

		test("a changed curve charges interest so far at the old rate", async () => {
			await lending.deposit("alice", "USDC", units(2000));
			await lending.createLoan({
				borrower: "bob",
				collateralAsset: "WETH",
				borrowAsset: "USDC",
				collateralAmount: units(2000),
				borrowAmount: units(1000),
			});
			clock.advance(ONE_YEAR);

			// 50% utilization on the default curve: 2% + 4% * 50/80 = 4.5%
			await admin.setInterestRateCurve("admin", "default", {
				baseRateBps: 0,
				slope1Bps: 0,
				slope2Bps: 0,
				optimalUtilizationBps: 8_000,
				reserveFactorBps: 0,
			});
			const view = await lending.getPool("USDC");
			expect(view.pool.totalBorrows).toBe(units(1045));
			expect(view.pool.totalReserves).toBe(units("4.5"));
			expect(view.borrowRateBps).toBe(0);
		});

		test("a pool listed while the change waits for its locks is covered", async () => {
			const curveUpdates: string[] = [];
			moduleRef
				.get(EventEmitter2)
				.on(LENDING_ACTIVITY_ID, (activity: LendingActivity) => {
					if (activity.type === "pool-updated" && activity.reason === "curve") {
						curveUpdates.push(activity.asset);
					}
				});
			const tx = moduleRef.get(LedgerTransactions);
			const run = tx.run.bind(tx);
			jest.spyOn(tx, "run").mockImplementationOnce(async (keys, work) => {
				const affected = await run(keys, work);
				await admin.listAsset("admin", {
					asset: "DAI",
					collateralFactorBps: 1_000,
					liquidationBonusBps: 100,
				});
				return affected;
			});

			await admin.setInterestRateCurve("admin", "default", {
				baseRateBps: 300,
				slope1Bps: 400,
				slope2Bps: 6_000,
				optimalUtilizationBps: 8_000,
				reserveFactorBps: 1_000,
			});
			expect(curveUpdates).toEqual(["DAI", "USDC", "WETH"]);
			expect((await lending.getPool("DAI")).borrowRateBps).toBe(300);
		});

		test("malformed curves and unknown assets are rejected", async () => {
			expect(
				await errorCodeOf(
					admin.setInterestRateCurve("admin", "USDC", {
						baseRateBps: 200,
						slope1Bps: 400,
						slope2Bps: 6_000,
						optimalUtilizationBps: 0,
						reserveFactorBps: 1_000,
					}),
				),
			).toBe("InvalidParameter");
			expect(
				await errorCodeOf(
					admin.setInterestRateCurve("admin", "DOGE", {
						baseRateBps: 200,
						slope1Bps: 400,
						slope2Bps: 6_000,
						optimalUtilizationBps: 8_000,
						reserveFactorBps: 1_000,
					}),
				),
			).toBe("AssetNotSupported");
		});
	});

	describe("reserves", () => {
		beforeEach(async () => {
			await listMarkets(moduleRef);
			await admin.setInterestRateCurve("admin", "USDC", {
				baseRateBps: 1_000,
				slope1Bps: 0,
				slope2Bps: 0,
				optimalUtilizationBps: 8_000,
				reserveFactorBps: 1_000,
			});
			await lending.deposit("alice", "USDC", units(2000));
			await lending.createLoan({
				borrower: "bob",
				collateralAsset: "WETH",
				borrowAsset: "USDC",
				collateralAmount: units(2000),
				borrowAmount: units(1000),
			});
			clock.advance(ONE_YEAR);
		});

		test("accrues before withdrawing and lowers the reserve total", async () => {
			const { result } = await admin.withdrawReserves(
				"admin",
				"USDC",
				units(4),
			);
			expect(result.pool.totalReserves).toBe(units(6));
			// 2000 deposited plus 100 of interest, less the 4 taken out
			expect(result.pool.totalDeposits).toBe(units(2096));
		});

		test("cannot withdraw more than has accumulated", async () => {
			expect(
				await errorCodeOf(admin.withdrawReserves("admin", "USDC", units(11))),
			).toBe("InsufficientReserves");
		});
	});

	describe("prices and stats", () => {
		test("set prices are served by the feed", async () => {
			await expect(
				admin.setPrice("admin", "WETH", units(2500), 9_500),
			).resolves.toEqual({
				asset: "WETH",
				price: units(2500),
				confidenceBps: 9_500,
			});
			expect(await errorCodeOf(admin.setPrice("admin", "WETH", 0n))).toBe(
				"InvalidParameter",
			);
		});

		test("stats count pools and loans by status", async () => {
			await listMarkets(moduleRef);
			await lending.deposit("alice", "USDC", units(1000));
			for (let i = 0; i < 2; i++) {
				await lending.createLoan({
					borrower: "bob",
					collateralAsset: "WETH",
					borrowAsset: "USDC",
					collateralAmount: units(200),
					borrowAmount: units(100),
				});
			}
			await lending.repayLoan("bob", 1, units(100));
			await admin.setPoolPaused("admin", "WETH", true);
			await admin.setProtocolPaused("admin", true);

			await expect(admin.stats("risk")).resolves.toEqual({
				protocolPaused: true,
				pools: { total: 2, active: 2, paused: 1 },
				loans: { active: 1, repaid: 1, liquidated: 0, defaulted: 0 },
			});
		});
	});
});
