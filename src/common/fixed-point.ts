import type { ValueTransformer } from "typeorm";

/** 18-decimal scale shared by amounts, prices and rates. */
export const PRECISION = 10n ** 18n;

/** 10000 bps = 100% */
export const BPS = 10_000n;

export const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n;

/**
 * Fixed-point quantities are persisted as base-10 text so that SQLite
 * keeps every digit.
 */
export const bigintTransformer: ValueTransformer = {
	to: (value: bigint | null | undefined) =>
		value === null || value === undefined ? value : value.toString(10),
	from: (value: string | null) => (value === null ? null : BigInt(value)),
};

/**
 * Multiplies before dividing; the quotient truncates toward zero, which for
 * non-negative inputs rounds down in the protocol's favour.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
	if (denominator === 0n) {
		throw new RangeError("Division by zero");
	}
	return (a * b) / denominator;
}

export function minBigInt(a: bigint, b: bigint): bigint {
	return a < b ? a : b;
}

/** Whole units (e.g. "1.5") to 18-decimal base units. */
export function toBaseUnits(units: string): bigint {
	const match = /^(\d+)(?:\.(\d{1,18}))?$/.exec(units.trim());
	if (!match) {
		throw new RangeError(`Invalid decimal amount: ${units}`);
	}
	const [, whole, fraction = ""] = match;
	return BigInt(whole) * PRECISION + BigInt(fraction.padEnd(18, "0"));
}

/** 18-decimal base units to a trimmed decimal string. */
export function fromBaseUnits(amount: bigint): string {
	const negative = amount < 0n;
	const abs = negative ? -amount : amount;
	const whole = abs / PRECISION;
	const fraction = (abs % PRECISION).toString().padStart(18, "0").replace(/0+$/, "");
	const text = fraction.length > 0 ? `${whole}.${fraction}` : `${whole}`;
	return negative ? `-${text}` : text;
}

export function isBps(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= Number(BPS);
}
