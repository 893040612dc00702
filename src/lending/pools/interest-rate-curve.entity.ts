import { Column, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";

export const DEFAULT_CURVE_SCOPE = "default";

/**
 * Kinked borrow-rate curve. The "default" scope applies to every pool
 * without an override keyed by its asset.
 */
@Entity("interest_rate_curves")
export class InterestRateCurve {
	@PrimaryColumn({ type: "text" })
	scope!: string;

	@Column({ type: "integer" })
	baseRateBps!: number;

	@Column({ type: "integer" })
	slope1Bps!: number;

	@Column({ type: "integer" })
	slope2Bps!: number;

	@Column({ type: "integer" })
	optimalUtilizationBps!: number;

	@Column({ type: "integer" })
	reserveFactorBps!: number;

	@UpdateDateColumn()
	updatedAt!: Date;
}

export type CurveParameters = Readonly<
	Pick<
		InterestRateCurve,
		| "baseRateBps"
		| "slope1Bps"
		| "slope2Bps"
		| "optimalUtilizationBps"
		| "reserveFactorBps"
	>
>;
