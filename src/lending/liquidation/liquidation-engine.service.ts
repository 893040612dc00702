import { Injectable, Logger } from "@nestjs/common";
import { EntityManager } from "typeorm";
import { LendingException } from "../../common/errors";
import { BPS, PRECISION, minBigInt } from "../../common/fixed-point";
import { ValuationService, convert, valueOf } from "../../oracle/valuation.service";
import { LoanRegistryService, applyPayment } from "../loans/loan-registry.service";
import { Loan, totalDebt } from "../loans/loan.entity";
import { PoolLedgerService, assertPositive } from "../pools/pool-ledger.service";

export type Seizure = {
	collateralToSeize: bigint;
	bonus: bigint;
	totalSeized: bigint;
	capped: boolean;
};

export type HealthReport = {
	/** PRECISION-scaled; undefined when the loan carries no debt. */
	healthFactor: bigint | undefined;
	collateralValue: bigint;
	debtValue: bigint;
	liquidatable: boolean;
};

export type LiquidationResult = {
	loan: Loan;
	repaid: bigint;
	interestPaid: bigint;
	principalPaid: bigint;
	collateralSeized: bigint;
	bonus: bigint;
	collateralReturned: bigint;
};

/**
 * collateralValue * thresholdBps / (debtValue * 10000), PRECISION-scaled.
 */
export function healthFactor(
	collateralValue: bigint,
	debtValue: bigint,
	liquidationThresholdBps: number,
): bigint | undefined {
	if (debtValue === 0n) {
		return undefined;
	}
	return (
		(collateralValue * BigInt(liquidationThresholdBps) * PRECISION) /
		(debtValue * BPS)
	);
}

export function isLiquidatable(
	collateralValue: bigint,
	debtValue: bigint,
	liquidationThresholdBps: number,
): boolean {
	return (
		debtValue * BPS > collateralValue * BigInt(liquidationThresholdBps)
	);
}

/**
 * Collateral owed to a liquidator repaying `repayAmount` of debt. When the
 * seizure plus bonus exceeds what is left, both are scaled down to the
 * remaining collateral in the same ratio.
 */
export function computeSeizure(
	repayAmount: bigint,
	borrowPrice: bigint,
	collateralPrice: bigint,
	liquidationBonusBps: number,
	collateralAmount: bigint,
): Seizure {
	const bonusBps = BigInt(liquidationBonusBps);
	const collateralToSeize = convert(repayAmount, borrowPrice, collateralPrice);
	const bonus = (collateralToSeize * bonusBps) / BPS;
	const totalSeized = collateralToSeize + bonus;
	if (totalSeized <= collateralAmount) {
		return { collateralToSeize, bonus, totalSeized, capped: false };
	}
	const cappedSeize = (collateralAmount * BPS) / (BPS + bonusBps);
	return {
		collateralToSeize: cappedSeize,
		bonus: collateralAmount - cappedSeize,
		totalSeized: collateralAmount,
		capped: true,
	};
}

@Injectable()
export class LiquidationEngineService {
	private readonly logger = new Logger(LiquidationEngineService.name);

	constructor(
		private readonly ledger: PoolLedgerService,
		private readonly loans: LoanRegistryService,
		private readonly valuation: ValuationService,
	) {}

	/** Health of a loan whose interest has already been brought up to date. */
	async evaluate(loan: Loan): Promise<HealthReport> {
		const [collateralPrice, borrowPrice] = await Promise.all([
			this.valuation.getPrice(loan.collateralAsset),
			this.valuation.getPrice(loan.borrowAsset),
		]);
		const collateralValue = valueOf(loan.collateralAmount, collateralPrice.price);
		const debtValue = valueOf(totalDebt(loan), borrowPrice.price);
		return {
			healthFactor: healthFactor(
				collateralValue,
				debtValue,
				loan.liquidationThresholdBps,
			),
			collateralValue,
			debtValue,
			liquidatable: isLiquidatable(
				collateralValue,
				debtValue,
				loan.liquidationThresholdBps,
			),
		};
	}

	/**
	 * Must run under the loan's and both pools' locks: eligibility is decided
	 * here, after accrual, never from an earlier read.
	 */
	async liquidate(
		manager: EntityManager,
		liquidator: string,
		loanId: number,
		repayAmount: bigint,
		now: number,
	): Promise<LiquidationResult> {
		assertPositive(repayAmount);
		const loan = await this.loans.findLoan(manager, loanId);
		this.loans.assertCan(loan, "liquidate-partial");

		const borrowPool = await this.ledger.findPool(manager, loan.borrowAsset);
		const collateralPool =
			loan.collateralAsset === loan.borrowAsset
				? borrowPool
				: await this.ledger.findPool(manager, loan.collateralAsset);
		await this.ledger.accrue(manager, borrowPool, now);
		if (collateralPool !== borrowPool) {
			await this.ledger.accrue(manager, collateralPool, now);
		}
		this.loans.accrue(loan, now);

		const [collateralPrice, borrowPrice] = await Promise.all([
			this.valuation.getPrice(loan.collateralAsset),
			this.valuation.getPrice(loan.borrowAsset),
		]);
		const collateralValue = valueOf(loan.collateralAmount, collateralPrice.price);
		const debt = totalDebt(loan);
		const debtValue = valueOf(debt, borrowPrice.price);
		if (!isLiquidatable(collateralValue, debtValue, loan.liquidationThresholdBps)) {
			throw new LendingException(
				"NotLiquidatable",
				`Loan ${loanId} is healthy (factor ${healthFactor(collateralValue, debtValue, loan.liquidationThresholdBps)})`,
			);
		}

		const repaid = minBigInt(repayAmount, debt);
		const seizure = computeSeizure(
			repaid,
			borrowPrice.price,
			collateralPrice.price,
			collateralPool.liquidationBonusBps,
			loan.collateralAmount,
		);
		const split = applyPayment(loan, repaid);
		loan.collateralAmount -= seizure.totalSeized;

		let collateralReturned = 0n;
		if (repaid === debt) {
			this.loans.transition(loan, "liquidate-full", now);
			collateralReturned = loan.collateralAmount;
			loan.collateralAmount = 0n;
		} else {
			this.loans.transition(loan, "liquidate-partial", now);
		}

		await this.ledger.recordPrincipalRepaid(
			manager,
			borrowPool,
			split.principalPaid,
		);
		const persisted = await manager.save(Loan, loan);

		this.logger.log(
			`Loan ${loanId} liquidated by ${liquidator}: repaid ${repaid}, seized ${seizure.totalSeized} (bonus ${seizure.bonus}${seizure.capped ? ", capped" : ""}), status ${persisted.status}`,
		);
		return {
			loan: persisted,
			repaid,
			interestPaid: split.interestPaid,
			principalPaid: split.principalPaid,
			collateralSeized: seizure.totalSeized,
			bonus: seizure.bonus,
			collateralReturned,
		};
	}
}
