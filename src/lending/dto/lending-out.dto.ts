import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { NotificationResult } from "../activity-notifier";
import { HealthReport, LiquidationResult } from "../liquidation/liquidation-engine.service";
import type { BalanceChange, Notified, PoolView } from "../lending.service";
import { RepaymentResult } from "../loans/loan-registry.service";
import { LOAN_STATUS, Loan, LoanStatus, totalDebt } from "../loans/loan.entity";
import { UserBalance } from "../pools/user-balance.entity";

export class PoolDto {
	@ApiProperty({ example: "USDC" })
	asset!: string;

	@ApiProperty({ example: "1500000000000000000000" })
	totalDeposits!: string;

	@ApiProperty({ example: "800000000000000000000" })
	totalBorrows!: string;

	@ApiProperty({ example: "0" })
	totalReserves!: string;

	@ApiProperty({ example: "700000000000000000000" })
	availableLiquidity!: string;

	@ApiProperty({ description: "Unix seconds", example: 1735689600 })
	lastUpdateTime!: number;

	@ApiProperty({ example: 5333 })
	utilizationBps!: number;

	@ApiProperty({ example: 466 })
	borrowRateBps!: number;

	@ApiProperty({ example: 223 })
	supplyRateBps!: number;

	@ApiProperty()
	isActive!: boolean;

	@ApiProperty()
	isPaused!: boolean;

	@ApiProperty()
	borrowingEnabled!: boolean;

	@ApiProperty()
	depositsEnabled!: boolean;

	@ApiProperty({ example: 7500 })
	collateralFactorBps!: number;

	@ApiProperty({ example: 8000 })
	liquidationThresholdBps!: number;

	@ApiProperty({ example: 500 })
	liquidationBonusBps!: number;
}

export class BalanceDto {
	@ApiProperty({ example: "USDC" })
	asset!: string;

	@ApiProperty({ example: "1000000000000000000000" })
	balance!: string;
}

export class LoanDto {
	@ApiProperty({ example: 1 })
	id!: number;

	@ApiProperty()
	borrower!: string;

	@ApiProperty({ example: "WETH" })
	collateralAsset!: string;

	@ApiProperty({ example: "USDC" })
	borrowAsset!: string;

	@ApiProperty()
	collateralAmount!: string;

	@ApiProperty()
	principal!: string;

	@ApiProperty({ description: "Interest owed up to the time of the read" })
	accruedInterest!: string;

	@ApiProperty()
	totalDebt!: string;

	@ApiProperty({ example: 466 })
	interestRateBps!: number;

	@ApiProperty({ example: 8000 })
	liquidationThresholdBps!: number;

	@ApiProperty({ description: "Unix seconds" })
	startTime!: number;

	@ApiProperty({ description: "Unix seconds" })
	lastAccrualTime!: number;

	@ApiProperty({ enum: LOAN_STATUS })
	status!: LoanStatus;

	@ApiPropertyOptional({ description: "Unix seconds" })
	closedAt?: number;
}

export class NotificationDto {
	@ApiProperty()
	delivered!: boolean;

	@ApiProperty({ example: "V1StGXR8" })
	eventId!: string;

	@ApiPropertyOptional()
	error?: string;
}

export class BalanceChangeDto {
	@ApiProperty({ example: "USDC" })
	asset!: string;

	@ApiProperty()
	amount!: string;

	@ApiProperty({ description: "Deposited balance after the operation" })
	balance!: string;

	@ApiProperty({ type: () => NotificationDto })
	notification!: NotificationDto;
}

export class LoanCreatedDto {
	@ApiProperty({ type: () => LoanDto })
	loan!: LoanDto;

	@ApiProperty({ type: () => NotificationDto })
	notification!: NotificationDto;
}

export class RepaymentDto {
	@ApiProperty({ type: () => LoanDto })
	loan!: LoanDto;

	@ApiProperty({ description: "Amount actually applied after capping" })
	amountApplied!: string;

	@ApiProperty()
	interestPaid!: string;

	@ApiProperty()
	principalPaid!: string;

	@ApiProperty()
	collateralReleased!: string;

	@ApiProperty({ type: () => NotificationDto })
	notification!: NotificationDto;
}

export class LiquidationDto {
	@ApiProperty({ type: () => LoanDto })
	loan!: LoanDto;

	@ApiProperty()
	repaid!: string;

	@ApiProperty()
	interestPaid!: string;

	@ApiProperty()
	principalPaid!: string;

	@ApiProperty({ description: "Collateral paid to the liquidator, bonus included" })
	collateralSeized!: string;

	@ApiProperty()
	bonus!: string;

	@ApiProperty({ description: "Collateral returned to the borrower" })
	collateralReturned!: string;

	@ApiProperty({ type: () => NotificationDto })
	notification!: NotificationDto;
}

export class HealthDto {
	@ApiPropertyOptional({
		description: "18-decimal ratio; omitted when the loan has no debt",
		example: "900000000000000000",
	})
	healthFactor?: string;

	@ApiProperty()
	collateralValue!: string;

	@ApiProperty()
	debtValue!: string;

	@ApiProperty()
	liquidatable!: boolean;
}

export class MaxBorrowDto {
	@ApiProperty()
	maxBorrow!: string;
}

export function toPoolDto(view: PoolView): PoolDto {
	const { pool } = view;
	return {
		asset: pool.asset,
		totalDeposits: pool.totalDeposits.toString(),
		totalBorrows: pool.totalBorrows.toString(),
		totalReserves: pool.totalReserves.toString(),
		availableLiquidity: view.availableLiquidity.toString(),
		lastUpdateTime: pool.lastUpdateTime,
		utilizationBps: view.utilizationBps,
		borrowRateBps: view.borrowRateBps,
		supplyRateBps: view.supplyRateBps,
		isActive: pool.isActive,
		isPaused: pool.isPaused,
		borrowingEnabled: pool.borrowingEnabled,
		depositsEnabled: pool.depositsEnabled,
		collateralFactorBps: pool.collateralFactorBps,
		liquidationThresholdBps: pool.liquidationThresholdBps,
		liquidationBonusBps: pool.liquidationBonusBps,
	};
}

export function toBalanceDto(balance: UserBalance): BalanceDto {
	return {
		asset: balance.asset,
		balance: balance.depositedAmount.toString(),
	};
}

export function toLoanDto(loan: Loan): LoanDto {
	return {
		id: loan.id,
		borrower: loan.borrower,
		collateralAsset: loan.collateralAsset,
		borrowAsset: loan.borrowAsset,
		collateralAmount: loan.collateralAmount.toString(),
		principal: loan.principal.toString(),
		accruedInterest: loan.accruedInterest.toString(),
		totalDebt: totalDebt(loan).toString(),
		interestRateBps: loan.interestRateBps,
		liquidationThresholdBps: loan.liquidationThresholdBps,
		startTime: loan.startTime,
		lastAccrualTime: loan.lastAccrualTime,
		status: loan.status,
		closedAt: loan.closedAt ?? undefined,
	};
}

export function toNotificationDto(result: NotificationResult): NotificationDto {
	return result.delivered
		? { delivered: true, eventId: result.eventId }
		: { delivered: false, eventId: result.eventId, error: result.error.message };
}

export function toBalanceChangeDto({
	result,
	notification,
}: Notified<BalanceChange>): BalanceChangeDto {
	return {
		asset: result.asset,
		amount: result.amount.toString(),
		balance: result.balance.toString(),
		notification: toNotificationDto(notification),
	};
}

export function toRepaymentDto(
	result: RepaymentResult,
	notification: NotificationResult,
): RepaymentDto {
	return {
		loan: toLoanDto(result.loan),
		amountApplied: result.amountApplied.toString(),
		interestPaid: result.interestPaid.toString(),
		principalPaid: result.principalPaid.toString(),
		collateralReleased: result.collateralReleased.toString(),
		notification: toNotificationDto(notification),
	};
}

export function toLiquidationDto(
	result: LiquidationResult,
	notification: NotificationResult,
): LiquidationDto {
	return {
		loan: toLoanDto(result.loan),
		repaid: result.repaid.toString(),
		interestPaid: result.interestPaid.toString(),
		principalPaid: result.principalPaid.toString(),
		collateralSeized: result.collateralSeized.toString(),
		bonus: result.bonus.toString(),
		collateralReturned: result.collateralReturned.toString(),
		notification: toNotificationDto(notification),
	};
}

export function toHealthDto(report: HealthReport): HealthDto {
	return {
		healthFactor: report.healthFactor?.toString(),
		collateralValue: report.collateralValue.toString(),
		debtValue: report.debtValue.toString(),
		liquidatable: report.liquidatable,
	};
}
