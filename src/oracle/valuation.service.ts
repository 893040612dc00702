import { Inject, Injectable, Logger } from "@nestjs/common";
import { TimeoutError, defer, firstValueFrom, timeout } from "rxjs";
import { CLOCK, Clock } from "../common/clock";
import { LendingException } from "../common/errors";
import { PRECISION, mulDiv } from "../common/fixed-point";
import { LENDING_CONFIG, LendingConfig } from "../config/lending.config";
import { PRICE_FEED, PriceData, PriceFeed } from "./price-feed";

/** USD value of an amount at a price, both 18-decimal. */
export function valueOf(amount: bigint, price: bigint): bigint {
	return mulDiv(amount, price, PRECISION);
}

/** Converts an amount of one asset into the equivalent amount of another. */
export function convert(
	amount: bigint,
	fromPrice: bigint,
	toPrice: bigint,
): bigint {
	return mulDiv(amount, fromPrice, toPrice);
}

@Injectable()
export class ValuationService {
	private readonly logger = new Logger(ValuationService.name);

	constructor(
		@Inject(PRICE_FEED) private readonly feed: PriceFeed,
		@Inject(CLOCK) private readonly clock: Clock,
		@Inject(LENDING_CONFIG) private readonly config: LendingConfig,
	) {}

	/**
	 * Fetches a price and rejects it when it is late, old, unconfident or
	 * non-positive.
	 */
	async getPrice(asset: string): Promise<PriceData> {
		let data: PriceData;
		try {
			data = await firstValueFrom(
				defer(() => this.feed.getPrice(asset)).pipe(
					timeout(this.config.priceFeedTimeoutMs),
				),
			);
		} catch (e) {
			if (e instanceof TimeoutError) {
				this.logger.warn(`Price feed timed out for ${asset}`);
				throw new LendingException(
					"PriceFeedTimeout",
					`Price feed did not answer for ${asset} within ${this.config.priceFeedTimeoutMs}ms`,
					{ cause: e },
				);
			}
			throw e;
		}

		if (data.price <= 0n) {
			throw new LendingException(
				"InvalidPriceData",
				`Price for ${asset} must be positive`,
			);
		}
		const age = this.clock.now() - data.timestamp;
		if (age > this.config.maxPriceAgeSeconds) {
			throw new LendingException(
				"StalePriceData",
				`Price for ${asset} is ${age}s old, max ${this.config.maxPriceAgeSeconds}s`,
			);
		}
		if (data.confidenceBps < this.config.minPriceConfidenceBps) {
			throw new LendingException(
				"LowConfidencePrice",
				`Price for ${asset} has confidence ${data.confidenceBps}bps, min ${this.config.minPriceConfidenceBps}bps`,
			);
		}
		return data;
	}
}
