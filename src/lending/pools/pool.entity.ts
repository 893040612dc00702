import {
	Column,
	CreateDateColumn,
	Entity,
	PrimaryColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../../common/fixed-point";

@Entity("pools")
export class Pool {
	/** Asset identifier, e.g. a token symbol or address. */
	@PrimaryColumn({ type: "text" })
	asset!: string;

	@Column({ type: "text", transformer: bigintTransformer, default: "0" })
	totalDeposits!: bigint;

	@Column({ type: "text", transformer: bigintTransformer, default: "0" })
	totalBorrows!: bigint;

	@Column({ type: "text", transformer: bigintTransformer, default: "0" })
	totalReserves!: bigint;

	/** Unix seconds of the last accrual. */
	@Column({ type: "integer" })
	lastUpdateTime!: number;

	@Column({ type: "boolean", default: true })
	isActive!: boolean;

	@Column({ type: "boolean", default: false })
	isPaused!: boolean;

	@Column({ type: "boolean", default: true })
	borrowingEnabled!: boolean;

	@Column({ type: "boolean", default: true })
	depositsEnabled!: boolean;

	@Column({ type: "integer" })
	collateralFactorBps!: number;

	@Column({ type: "integer" })
	liquidationThresholdBps!: number;

	@Column({ type: "integer" })
	liquidationBonusBps!: number;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}

export type PoolSnapshot = Readonly<
	Pick<
		Pool,
		"asset" | "totalDeposits" | "totalBorrows" | "totalReserves" | "lastUpdateTime"
	>
>;

export function snapshotOf(pool: Pool): PoolSnapshot {
	return Object.freeze({
		asset: pool.asset,
		totalDeposits: pool.totalDeposits,
		totalBorrows: pool.totalBorrows,
		totalReserves: pool.totalReserves,
		lastUpdateTime: pool.lastUpdateTime,
	});
}
