import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../../common/fixed-point";

export const LOAN_STATUS = [
	"active",
	"repaid",
	"liquidated",
	// declared for completeness, nothing transitions into it
	"defaulted",
] as const;
export type LoanStatus = (typeof LOAN_STATUS)[number];

@Entity("loans")
export class Loan {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	borrower!: string;

	@Column({ type: "text" })
	collateralAsset!: string;

	@Index()
	@Column({ type: "text" })
	borrowAsset!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	collateralAmount!: bigint;

	/** Outstanding borrowed amount net of repayments. */
	@Column({ type: "text", transformer: bigintTransformer })
	principal!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	accruedInterest!: bigint;

	/** Annualized, fixed at origination. */
	@Column({ type: "integer" })
	interestRateBps!: number;

	@Column({ type: "integer" })
	liquidationThresholdBps!: number;

	@Column({ type: "integer" })
	startTime!: number;

	@Column({ type: "integer" })
	lastAccrualTime!: number;

	@Index()
	@Column({ type: "text", enum: LOAN_STATUS })
	status!: LoanStatus;

	@Column({ type: "integer", nullable: true })
	closedAt?: number | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}

export function totalDebt(loan: Pick<Loan, "principal" | "accruedInterest">) {
	return loan.principal + loan.accruedInterest;
}
