import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { CLOCK, Clock } from "../common/clock";
import { toBaseUnits } from "../common/fixed-point";
import { PRICE_FEED } from "./price-feed";
import { StaticPriceFeed } from "./static-price-feed";
import { ValuationService } from "./valuation.service";

/**
 * PRICE_FEED_SEED is a JSON object of asset to USD price in whole units,
 * e.g. {"USDC":"1","WETH":"2500.5"}.
 */
export function parsePriceSeed(raw: string | undefined): Map<string, bigint> {
	const seed = new Map<string, bigint>();
	if (!raw) {
		return seed;
	}
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		throw new Error("PRICE_FEED_SEED must be a JSON object");
	}
	for (const [asset, price] of Object.entries(parsed)) {
		if (typeof price !== "string" && typeof price !== "number") {
			throw new Error(`PRICE_FEED_SEED: invalid price for ${asset}`);
		}
		seed.set(asset, toBaseUnits(String(price)));
	}
	return seed;
}

@Module({
	providers: [
		{
			provide: StaticPriceFeed,
			inject: [CLOCK, ConfigService],
			useFactory: (clock: Clock, cfg: ConfigService) => {
				const feed = new StaticPriceFeed(clock);
				const seed = parsePriceSeed(cfg.get<string>("PRICE_FEED_SEED"));
				for (const [asset, price] of seed) {
					feed.setPrice(asset, price);
				}
				Logger.log(`Static price feed seeded with ${seed.size} assets`);
				return feed;
			},
		},
		{ provide: PRICE_FEED, useExisting: StaticPriceFeed },
		ValuationService,
	],
	exports: [ValuationService, StaticPriceFeed, PRICE_FEED],
})
export class OracleModule {}
