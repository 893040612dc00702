import { Inject, Injectable, Logger } from "@nestjs/common";
import { EntityManager } from "typeorm";
import { Cursor, cursorToString, emptyCursor } from "../../common/dto/envelopes";
import { LendingException } from "../../common/errors";
import { BPS, SECONDS_PER_YEAR, minBigInt } from "../../common/fixed-point";
import { LENDING_CONFIG, LendingConfig } from "../../config/lending.config";
import { ValuationService, convert, valueOf } from "../../oracle/valuation.service";
import { borrowRateBps } from "../pools/interest-rate-model";
import {
	PoolLedgerService,
	assertPositive,
	availableLiquidity,
} from "../pools/pool-ledger.service";
import { snapshotOf } from "../pools/pool.entity";
import { LOAN_STATE_MACHINE, LoanAction } from "./loan-state-machine";
import { Loan, LoanStatus, totalDebt } from "./loan.entity";

export type CreateLoanInput = {
	borrower: string;
	collateralAsset: string;
	borrowAsset: string;
	collateralAmount: bigint;
	borrowAmount: bigint;
};

export type PaymentSplit = {
	interestPaid: bigint;
	principalPaid: bigint;
};

export type RepaymentResult = PaymentSplit & {
	loan: Loan;
	amountApplied: bigint;
	collateralReleased: bigint;
};

/**
 * Simple interest on the outstanding principal at the loan's fixed rate:
 * principal * rateBps * elapsed / (SECONDS_PER_YEAR * 10000).
 */
export function computeLoanInterest(
	loan: Pick<Loan, "principal" | "interestRateBps" | "lastAccrualTime">,
	now: number,
): bigint {
	const elapsed = now - loan.lastAccrualTime;
	if (elapsed <= 0 || loan.principal === 0n) {
		return 0n;
	}
	return (
		(loan.principal * BigInt(loan.interestRateBps) * BigInt(elapsed)) /
		(SECONDS_PER_YEAR * BPS)
	);
}

/**
 * Splits a payment interest first, then principal, and applies it to the
 * loan. The payment must not exceed the loan's total debt.
 */
export function applyPayment(
	loan: Pick<Loan, "principal" | "accruedInterest">,
	amount: bigint,
): PaymentSplit {
	const debt = totalDebt(loan);
	if (amount > debt) {
		throw new LendingException(
			"RepaymentExceedsDebt",
			`Payment ${amount} exceeds total debt ${debt}`,
		);
	}
	const interestPaid = minBigInt(amount, loan.accruedInterest);
	const principalPaid = amount - interestPaid;
	loan.accruedInterest -= interestPaid;
	loan.principal -= principalPaid;
	return { interestPaid, principalPaid };
}

export type LoanQueryFilter = {
	status?: LoanStatus;
};

/**
 * Owns loan records: origination, interest accrual, repayment and the
 * lifecycle transitions driven by the liquidation engine.
 */
@Injectable()
export class LoanRegistryService {
	private readonly logger = new Logger(LoanRegistryService.name);

	constructor(
		@Inject(LENDING_CONFIG) private readonly config: LendingConfig,
		private readonly ledger: PoolLedgerService,
		private readonly valuation: ValuationService,
	) {}

	async findLoan(manager: EntityManager, loanId: number): Promise<Loan> {
		const loan = await manager.findOne(Loan, { where: { id: loanId } });
		if (!loan) {
			throw new LendingException("LoanNotFound", `Loan ${loanId} not found`);
		}
		return loan;
	}

	/** Throws LoanNotActive when the loan's state does not allow the action. */
	assertCan(loan: Loan, action: LoanAction): void {
		if (!LOAN_STATE_MACHINE.canPerform(loan.status, action)) {
			throw new LendingException(
				"LoanNotActive",
				`Loan ${loan.id} is ${loan.status}`,
			);
		}
	}

	transition(loan: Loan, action: LoanAction, now: number): void {
		this.assertCan(loan, action);
		loan.status = LOAN_STATE_MACHINE.next(loan.status, action);
		if (LOAN_STATE_MACHINE.isFinal(loan.status)) {
			loan.closedAt = now;
		}
	}

	/** Adds interest since the last accrual; a second call at `now` adds nothing. */
	accrue(loan: Loan, now: number): bigint {
		this.assertCan(loan, "accrue");
		const interest = computeLoanInterest(loan, now);
		if (now > loan.lastAccrualTime) {
			loan.accruedInterest += interest;
			loan.lastAccrualTime = now;
		}
		return interest;
	}

	async createLoan(
		manager: EntityManager,
		input: CreateLoanInput,
		now: number,
	): Promise<Loan> {
		assertPositive(input.collateralAmount);
		assertPositive(input.borrowAmount);

		const collateralPool = await this.ledger.findPool(
			manager,
			input.collateralAsset,
		);
		const borrowPool =
			input.borrowAsset === input.collateralAsset
				? collateralPool
				: await this.ledger.findPool(manager, input.borrowAsset);
		this.ledger.assertPoolUsable(collateralPool);
		this.ledger.assertPoolUsable(borrowPool);
		await this.ledger.accrue(manager, collateralPool, now);
		await this.ledger.accrue(manager, borrowPool, now);

		if (input.borrowAmount < this.config.minLoanAmount) {
			throw new LendingException(
				"LoanBelowMinimum",
				`Borrow amount ${input.borrowAmount} is below the minimum ${this.config.minLoanAmount}`,
			);
		}
		if (!borrowPool.borrowingEnabled) {
			throw new LendingException(
				"BorrowingDisabled",
				`Borrowing is disabled for ${borrowPool.asset}`,
			);
		}

		const [collateralPrice, borrowPrice] = await Promise.all([
			this.valuation.getPrice(input.collateralAsset),
			this.valuation.getPrice(input.borrowAsset),
		]);
		const collateralValue = valueOf(
			input.collateralAmount,
			collateralPrice.price,
		);
		const borrowValue = valueOf(input.borrowAmount, borrowPrice.price);
		if (
			collateralValue * BigInt(collateralPool.collateralFactorBps) <
			borrowValue * BPS
		) {
			throw new LendingException(
				"InsufficientCollateral",
				`Collateral worth ${collateralValue} at ${collateralPool.collateralFactorBps}bps does not cover ${borrowValue}`,
			);
		}

		const available = availableLiquidity(borrowPool);
		if (input.borrowAmount > available) {
			throw new LendingException(
				"InsufficientLiquidity",
				`Borrow of ${input.borrowAmount} exceeds available liquidity ${available}`,
			);
		}
		const borrowsAfter = borrowPool.totalBorrows + input.borrowAmount;
		if (
			borrowsAfter * BPS >
			borrowPool.totalDeposits * BigInt(this.config.maxUtilizationBps)
		) {
			throw new LendingException(
				"UtilizationLimitExceeded",
				`Borrow would push ${borrowPool.asset} utilization past ${this.config.maxUtilizationBps}bps`,
			);
		}

		const curve = await this.ledger.getCurve(manager, borrowPool.asset);
		const loan = manager.create(Loan, {
			borrower: input.borrower,
			collateralAsset: input.collateralAsset,
			borrowAsset: input.borrowAsset,
			collateralAmount: input.collateralAmount,
			principal: input.borrowAmount,
			accruedInterest: 0n,
			interestRateBps: borrowRateBps(snapshotOf(borrowPool), curve),
			liquidationThresholdBps: collateralPool.liquidationThresholdBps,
			startTime: now,
			lastAccrualTime: now,
			status: LOAN_STATE_MACHINE.config.initialState,
			closedAt: null,
		});
		const persisted = await manager.save(Loan, loan);
		await this.ledger.recordBorrow(manager, borrowPool, input.borrowAmount);

		this.logger.log(
			`Loan ${persisted.id} opened by ${input.borrower}: ${input.borrowAmount} ${input.borrowAsset} against ${input.collateralAmount} ${input.collateralAsset} at ${persisted.interestRateBps}bps`,
		);
		return persisted;
	}

	async repayLoan(
		manager: EntityManager,
		caller: string,
		loanId: number,
		amount: bigint,
		now: number,
	): Promise<RepaymentResult> {
		assertPositive(amount);
		const loan = await this.findLoan(manager, loanId);
		this.assertCan(loan, "repay-partial");
		if (loan.borrower !== caller) {
			throw new LendingException(
				"Unauthorized",
				`Only the borrower can repay loan ${loanId}`,
			);
		}

		const pool = await this.ledger.findPool(manager, loan.borrowAsset);
		await this.ledger.accrue(manager, pool, now);
		this.accrue(loan, now);

		const debt = totalDebt(loan);
		const amountApplied = minBigInt(amount, debt);
		const split = applyPayment(loan, amountApplied);
		let collateralReleased = 0n;
		if (amountApplied === debt) {
			this.transition(loan, "repay-full", now);
			collateralReleased = loan.collateralAmount;
			loan.collateralAmount = 0n;
		} else {
			this.transition(loan, "repay-partial", now);
		}

		await this.ledger.recordPrincipalRepaid(manager, pool, split.principalPaid);
		const persisted = await manager.save(Loan, loan);

		this.logger.log(
			`Loan ${loanId} repaid ${amountApplied} (interest ${split.interestPaid}, principal ${split.principalPaid}), status ${persisted.status}`,
		);
		return {
			loan: persisted,
			amountApplied,
			collateralReleased,
			...split,
		};
	}

	/** Loan with interest projected to `now`, without persisting it. */
	project(loan: Loan, now: number): Loan {
		if (loan.status !== "active") {
			return loan;
		}
		const projected = Object.assign(new Loan(), loan);
		projected.accruedInterest += computeLoanInterest(loan, now);
		projected.lastAccrualTime = Math.max(now, loan.lastAccrualTime);
		return projected;
	}

	/**
	 * Largest amount of `borrowAsset` the collateral would support at the
	 * collateral pool's factor and current prices.
	 */
	async maxBorrow(
		manager: EntityManager,
		collateralAsset: string,
		borrowAsset: string,
		collateralAmount: bigint,
	): Promise<bigint> {
		const collateralPool = await this.ledger.findPool(manager, collateralAsset);
		await this.ledger.findPool(manager, borrowAsset);
		const [collateralPrice, borrowPrice] = await Promise.all([
			this.valuation.getPrice(collateralAsset),
			this.valuation.getPrice(borrowAsset),
		]);
		const borrowable = convert(
			collateralAmount,
			collateralPrice.price,
			borrowPrice.price,
		);
		return (borrowable * BigInt(collateralPool.collateralFactorBps)) / BPS;
	}

	/*
	 * Newest first. The cursor is base64 of the last id returned.
	 */
	async findByBorrower(
		manager: EntityManager,
		borrower: string,
		filter: LoanQueryFilter,
		limit: number,
		cursor: Cursor = emptyCursor,
	): Promise<{ items: Loan[]; nextCursor?: string; total: number }> {
		const take = Math.max(1, Math.min(limit, 100));
		const qb = manager
			.createQueryBuilder(Loan, "l")
			.where("l.borrower = :borrower", { borrower });
		if (filter.status) {
			qb.andWhere("l.status = :status", { status: filter.status });
		}
		const total = await qb.clone().getCount();

		if (cursor.idBefore !== undefined) {
			qb.andWhere("l.id < :idBefore", { idBefore: cursor.idBefore });
		}
		const items = await qb
			.orderBy("l.id", "DESC")
			.take(take)
			.getMany();

		let nextCursor: string | undefined;
		if (items.length === take) {
			const last = items[items.length - 1];
			nextCursor = cursorToString(last.id);
		}
		return { items, nextCursor, total };
	}
}
