import { Inject, Injectable, Logger } from "@nestjs/common";
import { CLOCK, Clock } from "../common/clock";
import { Cursor, emptyCursor } from "../common/dto/envelopes";
import { NewActivity } from "../common/lending.event";
import {
	ACTIVITY_NOTIFIER,
	ActivityNotifier,
	NotificationResult,
	dispatchActivity,
} from "./activity-notifier";
import {
	LedgerTransactions,
	loanLock,
	poolLock,
} from "./ledger-transactions.service";
import {
	HealthReport,
	LiquidationEngineService,
	LiquidationResult,
} from "./liquidation/liquidation-engine.service";
import {
	CreateLoanInput,
	LoanQueryFilter,
	LoanRegistryService,
	RepaymentResult,
} from "./loans/loan-registry.service";
import { Loan } from "./loans/loan.entity";
import type { CurveParameters } from "./pools/interest-rate-curve.entity";
import {
	borrowRateBps,
	supplyRateBps,
	utilizationBps,
} from "./pools/interest-rate-model";
import {
	PoolLedgerService,
	applyAccrual,
	availableLiquidity,
	computePoolAccrual,
} from "./pools/pool-ledger.service";
import { Pool, snapshotOf } from "./pools/pool.entity";

/** Result of a committed mutation plus the outcome of announcing it. */
export type Notified<T> = {
	result: T;
	notification: NotificationResult;
};

export type PoolView = {
	pool: Pool;
	utilizationBps: number;
	borrowRateBps: number;
	supplyRateBps: number;
	availableLiquidity: bigint;
};

export type BalanceChange = {
	user: string;
	asset: string;
	amount: bigint;
	balance: bigint;
};

/**
 * Entry point for every user-facing lending operation. Each mutation runs
 * under the locks of the records it touches and inside one transaction;
 * activity is announced only after commit.
 */
@Injectable()
export class LendingService {
	private readonly logger = new Logger(LendingService.name);

	constructor(
		@Inject(CLOCK) private readonly clock: Clock,
		@Inject(ACTIVITY_NOTIFIER) private readonly notifier: ActivityNotifier,
		private readonly tx: LedgerTransactions,
		private readonly ledger: PoolLedgerService,
		private readonly loans: LoanRegistryService,
		private readonly liquidations: LiquidationEngineService,
	) {}

	async deposit(
		user: string,
		asset: string,
		amount: bigint,
	): Promise<Notified<BalanceChange>> {
		const { now, balance } = await this.tx.run([poolLock(asset)], async (m) => {
			await this.ledger.assertProtocolOpen(m);
			const at = this.clock.now();
			const { balance } = await this.ledger.deposit(m, user, asset, amount, at);
			return { now: at, balance };
		});
		return this.announce(
			{ user, asset, amount, balance },
			{ type: "deposit", at: now, user, asset, amount: amount.toString() },
		);
	}

	async withdraw(
		user: string,
		asset: string,
		amount: bigint,
	): Promise<Notified<BalanceChange>> {
		const { now, balance } = await this.tx.run([poolLock(asset)], async (m) => {
			await this.ledger.assertProtocolOpen(m);
			const at = this.clock.now();
			const { balance } = await this.ledger.withdraw(m, user, asset, amount, at);
			return { now: at, balance };
		});
		return this.announce(
			{ user, asset, amount, balance },
			{ type: "withdraw", at: now, user, asset, amount: amount.toString() },
		);
	}

	async createLoan(input: CreateLoanInput): Promise<Notified<Loan>> {
		const { now, loan } = await this.tx.run(
			[poolLock(input.collateralAsset), poolLock(input.borrowAsset)],
			async (m) => {
				await this.ledger.assertProtocolOpen(m);
				const at = this.clock.now();
				return { now: at, loan: await this.loans.createLoan(m, input, at) };
			},
		);
		return this.announce(loan, {
			type: "loan-created",
			at: now,
			loanId: loan.id,
			borrower: loan.borrower,
			collateralAsset: loan.collateralAsset,
			borrowAsset: loan.borrowAsset,
			collateralAmount: loan.collateralAmount.toString(),
			borrowAmount: input.borrowAmount.toString(),
		});
	}

	async repayLoan(
		caller: string,
		loanId: number,
		amount: bigint,
	): Promise<Notified<RepaymentResult>> {
		const keys = await this.lockKeysFor(loanId);
		const { now, repayment } = await this.tx.run(keys, async (m) => {
			await this.ledger.assertProtocolOpen(m);
			const at = this.clock.now();
			return {
				now: at,
				repayment: await this.loans.repayLoan(m, caller, loanId, amount, at),
			};
		});
		return this.announce(repayment, {
			type: "loan-repaid",
			at: now,
			loanId,
			borrower: repayment.loan.borrower,
			amount: repayment.amountApplied.toString(),
			closed: repayment.loan.status !== "active",
		});
	}

	async liquidate(
		liquidator: string,
		loanId: number,
		repayAmount: bigint,
	): Promise<Notified<LiquidationResult>> {
		const keys = await this.lockKeysFor(loanId);
		const { now, liquidation } = await this.tx.run(keys, async (m) => {
			await this.ledger.assertProtocolOpen(m);
			const at = this.clock.now();
			return {
				now: at,
				liquidation: await this.liquidations.liquidate(
					m,
					liquidator,
					loanId,
					repayAmount,
					at,
				),
			};
		});
		return this.announce(liquidation, {
			type: "loan-liquidated",
			at: now,
			loanId,
			borrower: liquidation.loan.borrower,
			liquidator,
			repaid: liquidation.repaid.toString(),
			collateralSeized: liquidation.collateralSeized.toString(),
			closed: liquidation.loan.status !== "active",
		});
	}

	/** Persists accrued interest for a pool without any other change. */
	async accruePool(asset: string): Promise<PoolView> {
		return this.tx.run([poolLock(asset)], async (m) => {
			const pool = await this.ledger.findPool(m, asset);
			await this.ledger.accrue(m, pool, this.clock.now());
			return viewOf(pool, await this.ledger.getCurve(m, asset));
		});
	}

	/** Pool totals and rates with interest projected to now, nothing persisted. */
	async getPool(asset: string): Promise<PoolView> {
		const now = this.clock.now();
		return this.tx.run([], async (m) => {
			const pool = await this.ledger.findPool(m, asset);
			const curve = await this.ledger.getCurve(m, asset);
			return viewOf(projectPool(pool, curve, now), curve);
		});
	}

	async listPools(): Promise<PoolView[]> {
		const now = this.clock.now();
		return this.tx.run([], async (m) => {
			const views: PoolView[] = [];
			for (const pool of await this.ledger.listPools(m)) {
				const curve = await this.ledger.getCurve(m, pool.asset);
				views.push(viewOf(projectPool(pool, curve, now), curve));
			}
			return views;
		});
	}

	async getBalance(user: string, asset: string): Promise<bigint> {
		return this.tx.run([], async (m) => {
			await this.ledger.findPool(m, asset);
			return this.ledger.getBalance(m, user, asset);
		});
	}

	async listBalances(user: string) {
		return this.tx.run([], (m) => this.ledger.listBalances(m, user));
	}

	/** The loan with interest projected to now. */
	async getLoan(loanId: number): Promise<Loan> {
		const loan = await this.tx.run([], (m) => this.loans.findLoan(m, loanId));
		return this.loans.project(loan, this.clock.now());
	}

	async getLoanHealth(loanId: number): Promise<HealthReport> {
		const loan = await this.getLoan(loanId);
		this.loans.assertCan(loan, "accrue");
		return this.liquidations.evaluate(loan);
	}

	async listLoans(
		borrower: string,
		filter: LoanQueryFilter,
		limit: number,
		cursor: Cursor = emptyCursor,
	) {
		const now = this.clock.now();
		const page = await this.tx.run([], (m) =>
			this.loans.findByBorrower(m, borrower, filter, limit, cursor),
		);
		return {
			...page,
			items: page.items.map((loan) => this.loans.project(loan, now)),
		};
	}

	async maxBorrow(
		collateralAsset: string,
		borrowAsset: string,
		collateralAmount: bigint,
	): Promise<bigint> {
		return this.tx.run([], (m) =>
			this.loans.maxBorrow(m, collateralAsset, borrowAsset, collateralAmount),
		);
	}

	/*
	 * The assets of a loan never change, so they can be read before taking
	 * the locks; the loan itself is re-read once they are held.
	 */
	private async lockKeysFor(loanId: number): Promise<string[]> {
		const loan = await this.tx.run([loanLock(loanId)], (m) =>
			this.loans.findLoan(m, loanId),
		);
		return [
			loanLock(loanId),
			poolLock(loan.collateralAsset),
			poolLock(loan.borrowAsset),
		];
	}

	private async announce<T>(
		result: T,
		activity: NewActivity,
	): Promise<Notified<T>> {
		const notification = await dispatchActivity(
			this.notifier,
			activity,
			this.logger,
		);
		return { result, notification };
	}
}

function projectPool(pool: Pool, curve: CurveParameters, now: number): Pool {
	const accrual = computePoolAccrual(snapshotOf(pool), curve, now);
	if (accrual.elapsed === 0) {
		return pool;
	}
	const projected = Object.assign(new Pool(), pool);
	applyAccrual(projected, accrual, now);
	return projected;
}

export function viewOf(pool: Pool, curve: CurveParameters): PoolView {
	const snapshot = snapshotOf(pool);
	return {
		pool,
		utilizationBps: utilizationBps(snapshot),
		borrowRateBps: borrowRateBps(snapshot, curve),
		supplyRateBps: supplyRateBps(snapshot, curve),
		availableLiquidity: availableLiquidity(snapshot),
	};
}
