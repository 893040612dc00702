import { Inject, Injectable, Logger } from "@nestjs/common";
import { CLOCK, Clock } from "../common/clock";
import { LendingException } from "../common/errors";
import { PriceData, PriceFeed } from "./price-feed";

type StaticQuote = {
	price: bigint;
	confidenceBps: number;
	/** Fixed observation time; quotes without one are reported as fresh. */
	timestamp?: number;
};

/**
 * Operator-maintained price table. Serves as the feed in development and
 * tests, and as a manual override when no external feed is wired.
 */
@Injectable()
export class StaticPriceFeed implements PriceFeed {
	private readonly logger = new Logger(StaticPriceFeed.name);
	private readonly quotes = new Map<string, StaticQuote>();

	constructor(@Inject(CLOCK) private readonly clock: Clock) {}

	setPrice(
		asset: string,
		price: bigint,
		options: { confidenceBps?: number; timestamp?: number } = {},
	): void {
		this.quotes.set(asset, {
			price,
			confidenceBps: options.confidenceBps ?? 10_000,
			timestamp: options.timestamp,
		});
		this.logger.log(`Price for ${asset} set to ${price}`);
	}

	async getPrice(asset: string): Promise<PriceData> {
		const quote = this.quotes.get(asset);
		if (!quote) {
			throw new LendingException(
				"InvalidPriceData",
				`No price available for ${asset}`,
			);
		}
		return {
			price: quote.price,
			confidenceBps: quote.confidenceBps,
			timestamp: quote.timestamp ?? this.clock.now(),
		};
	}
}
