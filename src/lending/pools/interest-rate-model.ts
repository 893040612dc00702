import { BPS, PRECISION, mulDiv } from "../../common/fixed-point";
import type { CurveParameters } from "./interest-rate-curve.entity";

type PoolTotals = Readonly<{ totalDeposits: bigint; totalBorrows: bigint }>;

/**
 * Share of deposits currently borrowed out, PRECISION-scaled.
 * An empty pool has zero utilization.
 */
export function utilization(pool: PoolTotals): bigint {
	if (pool.totalDeposits === 0n) {
		return 0n;
	}
	return mulDiv(pool.totalBorrows, PRECISION, pool.totalDeposits);
}

function bpsToRate(bps: number): bigint {
	return mulDiv(BigInt(bps), PRECISION, BPS);
}

/**
 * Annualized borrow rate, PRECISION-scaled.
 *
 * Below the optimal utilization the rate climbs along slope1; past it the
 * excess utilization is charged along slope2, so that the full slope2 is
 * reached at 100% utilization.
 */
export function borrowRate(pool: PoolTotals, curve: CurveParameters): bigint {
	const base = bpsToRate(curve.baseRateBps);
	const slope1 = bpsToRate(curve.slope1Bps);
	const u = utilization(pool);
	const optimal = bpsToRate(curve.optimalUtilizationBps);

	if (u <= optimal) {
		return base + mulDiv(slope1, u, optimal);
	}
	const excess = u - optimal;
	const slope2 = bpsToRate(curve.slope2Bps);
	return base + slope1 + mulDiv(slope2, excess, PRECISION - optimal);
}

export function borrowRateBps(pool: PoolTotals, curve: CurveParameters): number {
	return Number(mulDiv(borrowRate(pool, curve), BPS, PRECISION));
}

/** borrowRate * utilization * (1 - reserveFactor), PRECISION-scaled. */
export function supplyRate(pool: PoolTotals, curve: CurveParameters): bigint {
	const kept = BPS - BigInt(curve.reserveFactorBps);
	return (
		(borrowRate(pool, curve) * utilization(pool) * kept) / (PRECISION * BPS)
	);
}

export function supplyRateBps(pool: PoolTotals, curve: CurveParameters): number {
	return Number(mulDiv(supplyRate(pool, curve), BPS, PRECISION));
}

export function utilizationBps(pool: PoolTotals): number {
	return Number(mulDiv(utilization(pool), BPS, PRECISION));
}

/** Returns the first violated constraint, or undefined for a valid curve. */
export function validateCurve(curve: CurveParameters): string | undefined {
	const fields = [
		"baseRateBps",
		"slope1Bps",
		"slope2Bps",
		"optimalUtilizationBps",
		"reserveFactorBps",
	] as const;
	for (const field of fields) {
		const value = curve[field];
		if (!Number.isInteger(value) || value < 0) {
			return `${field} must be a non-negative integer`;
		}
	}
	if (
		curve.optimalUtilizationBps === 0 ||
		curve.optimalUtilizationBps >= Number(BPS)
	) {
		return "optimalUtilizationBps must be between 1 and 9999";
	}
	if (curve.reserveFactorBps > Number(BPS)) {
		return "reserveFactorBps must not exceed 10000";
	}
	return undefined;
}
