import { ConfigService } from "@nestjs/config";
import { isBps } from "../common/fixed-point";
import type { CurveParameters } from "../lending/pools/interest-rate-curve.entity";

export const LENDING_CONFIG = Symbol("LENDING_CONFIG");

export type LendingConfig = {
	minLoanAmount: bigint;
	maxUtilizationBps: number;
	maxPriceAgeSeconds: number;
	minPriceConfidenceBps: number;
	priceFeedTimeoutMs: number;
	maxCollateralFactorBps: number;
	maxLiquidationBonusBps: number;
	defaultLiquidationThresholdBps: number;
	defaultCurve: CurveParameters;
};

function readInteger(
	config: ConfigService,
	key: string,
	fallback: number,
): number {
	const raw = config.get<string>(key);
	if (raw === undefined || raw === "") {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value < 0) {
		throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
	}
	return value;
}

function readBps(config: ConfigService, key: string, fallback: number): number {
	const value = readInteger(config, key, fallback);
	if (!isBps(value)) {
		throw new Error(`${key} must be between 0 and 10000, got ${value}`);
	}
	return value;
}

function readAmount(
	config: ConfigService,
	key: string,
	fallback: bigint,
): bigint {
	const raw = config.get<string>(key);
	if (raw === undefined || raw === "") {
		return fallback;
	}
	if (!/^\d+$/.test(raw)) {
		throw new Error(`${key} must be an integer amount in base units`);
	}
	return BigInt(raw);
}

export function loadLendingConfig(config: ConfigService): LendingConfig {
	return {
		// 1 whole unit at 18 decimals
		minLoanAmount: readAmount(config, "MIN_LOAN_AMOUNT", 10n ** 18n),
		maxUtilizationBps: readBps(config, "MAX_UTILIZATION_BPS", 9_500),
		maxPriceAgeSeconds: readInteger(config, "MAX_PRICE_AGE_SECONDS", 3_600),
		minPriceConfidenceBps: readBps(config, "MIN_PRICE_CONFIDENCE_BPS", 9_000),
		priceFeedTimeoutMs: readInteger(config, "PRICE_FEED_TIMEOUT_MS", 5_000),
		maxCollateralFactorBps: readBps(config, "MAX_COLLATERAL_FACTOR_BPS", 9_000),
		maxLiquidationBonusBps: readBps(config, "MAX_LIQUIDATION_BONUS_BPS", 2_000),
		defaultLiquidationThresholdBps: readBps(
			config,
			"DEFAULT_LIQUIDATION_THRESHOLD_BPS",
			8_500,
		),
		defaultCurve: {
			baseRateBps: readInteger(config, "DEFAULT_BASE_RATE_BPS", 200),
			slope1Bps: readInteger(config, "DEFAULT_SLOPE1_BPS", 400),
			slope2Bps: readInteger(config, "DEFAULT_SLOPE2_BPS", 6_000),
			optimalUtilizationBps: readBps(
				config,
				"DEFAULT_OPTIMAL_UTILIZATION_BPS",
				8_000,
			),
			reserveFactorBps: readBps(config, "DEFAULT_RESERVE_FACTOR_BPS", 1_000),
		},
	};
}
