export const CLOCK = Symbol("CLOCK");

/** Source of "now" for accrual and price freshness, in unix seconds. */
export interface Clock {
	now(): number;
}

export class SystemClock implements Clock {
	now(): number {
		return Math.floor(Date.now() / 1000);
	}
}
