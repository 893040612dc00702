export const PRICE_FEED = Symbol("PRICE_FEED");

export type PriceData = {
	/** USD per whole unit, 18-decimal fixed point. */
	price: bigint;
	/** Unix seconds at which the price was observed. */
	timestamp: number;
	/** Publisher confidence, 10000 = fully confident. */
	confidenceBps: number;
};

export interface PriceFeed {
	getPrice(asset: string): Promise<PriceData>;
}
